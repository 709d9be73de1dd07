#!/usr/bin/env npx tsx
/**
 * SMC Order Block Engine — Main Entry Point
 *
 * Backfills closed candles from Bybit, then streams public trades into one
 * lane per symbol. Paper mode (default) fills against the live price; live
 * mode sends orders to Bybit.
 *
 * Handles SIGTERM/SIGINT for graceful shutdown.
 *
 * Usage:
 *   npx tsx scripts/run-engine.ts
 *   npx tsx scripts/run-engine.ts --config config/engine.json
 *   npx tsx scripts/run-engine.ts --capital 5000 --mode A
 *   npx tsx scripts/run-engine.ts --symbols BTCUSDT,ETHUSDT --verbose
 *   npx tsx scripts/run-engine.ts --live   # Real orders (needs BYBIT_API_KEY / BYBIT_API_SECRET)
 */

import fs from 'fs';
import path from 'path';
import {
  AlertManager,
  BybitBroker,
  BybitCandleSource,
  Engine,
  PaperBroker,
  PriceStream,
  loadEngineConfig,
  parseEngineConfig,
  type Broker,
  type EngineConfig,
  type EngineConfigInput,
} from '../src/lib/engine';
import { MemoryStateStore, SqliteStateStore, type StateStore } from '../src/lib/data/state-store';
import { ConfigError, errorMessage } from '../src/lib/errors';

// ============================================
// Parse CLI arguments
// ============================================

interface CliOverrides {
  configPath: string;
  capital?: number;
  mode?: string;
  symbols?: string[];
  paper?: boolean;
  verbose?: boolean;
}

function parseArgs(): CliOverrides {
  const args = process.argv.slice(2);
  const overrides: CliOverrides = {
    configPath: path.join(process.cwd(), 'config', 'engine.json'),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        overrides.configPath = path.resolve(requireValue(args, ++i, arg));
        break;
      case '--capital':
        overrides.capital = parseFloat(requireValue(args, ++i, arg));
        break;
      case '--mode':
        overrides.mode = requireValue(args, ++i, arg).toUpperCase();
        break;
      case '--symbols':
        overrides.symbols = requireValue(args, ++i, arg).split(',').map((s) => s.trim().toUpperCase());
        break;
      case '--paper':
        overrides.paper = true;
        break;
      case '--live':
        overrides.paper = false;
        break;
      case '--verbose':
        overrides.verbose = true;
        break;
    }
  }

  return overrides;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

/** File config with CLI flags applied, validated again as a whole */
function resolveConfig(overrides: CliOverrides): EngineConfig {
  const base: EngineConfigInput = fs.existsSync(overrides.configPath)
    ? loadEngineConfig(overrides.configPath)
    : { symbols: [{ symbol: 'BTCUSDT' }] };

  let symbols = base.symbols;
  if (overrides.symbols) {
    const wanted = overrides.symbols;
    symbols = wanted.map((symbol) => base.symbols.find((s) => s.symbol === symbol) ?? { symbol });
  }

  return parseEngineConfig({
    ...base,
    initialEquity: overrides.capital ?? base.initialEquity,
    paper: overrides.paper ?? base.paper,
    verbose: overrides.verbose ?? base.verbose,
    symbols: symbols.map((s) => (overrides.mode ? { ...s, executionMode: overrides.mode } : s)),
  });
}

function createBroker(config: EngineConfig): Broker {
  if (config.paper) {
    return new PaperBroker({ slippage: config.paperSlippage });
  }

  const apiKey = config.bybit.apiKey ?? process.env.BYBIT_API_KEY;
  const apiSecret = config.bybit.apiSecret ?? process.env.BYBIT_API_SECRET;
  if (!apiKey || !apiSecret) {
    throw new ConfigError('Live mode needs Bybit credentials', [
      'bybit.apiKey / BYBIT_API_KEY',
      'bybit.apiSecret / BYBIT_API_SECRET',
    ]);
  }
  return new BybitBroker({ apiKey, apiSecret, testnet: config.bybit.testnet });
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const config = resolveConfig(parseArgs());

  const store: StateStore = config.databasePath
    ? new SqliteStateStore(config.databasePath)
    : new MemoryStateStore();
  const alerts = new AlertManager(
    config.telegram?.botToken ?? process.env.TELEGRAM_BOT_TOKEN,
    config.telegram?.chatId ?? process.env.TELEGRAM_CHAT_ID,
  );
  const broker = createBroker(config);
  const engine = new Engine({ config, broker, alerts, store });

  console.log('='.repeat(60));
  console.log(`SMC Order Block Engine (${config.paper ? 'PAPER' : 'LIVE'})`);
  console.log('='.repeat(60));

  await engine.start();

  console.log('\nBackfilling candle history...');
  await engine.backfill(new BybitCandleSource({ testnet: config.bybit.testnet, store }));

  const stream = new PriceStream({
    symbols: Object.fromEntries(config.symbols.map((s) => [s.symbol, s.intervalMs])),
    testnet: config.bybit.testnet,
  });
  stream.on('tick', (symbol, tick) => {
    void engine.ingestTick(symbol, tick);
  });
  stream.on('candle', (symbol, candle) => {
    void engine.ingestCandle(symbol, candle);
  });
  stream.on('error', (err) => {
    void alerts.error(`Price stream: ${err.message}`);
  });

  await stream.connect();
  engine.startClock();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\nReceived ${signal}, shutting down...`);
    stream.disconnect();
    await engine.stop(signal);
    await store.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
