#!/usr/bin/env npx tsx
/**
 * Replay Candles — run the engine over a historical candle file.
 *
 * Feeds each closed candle (and its intra-candle price path) through a lane
 * backed by the PaperBroker and an in-memory store, then prints the zones,
 * trades and resulting equity.
 *
 * Usage:
 *   npx tsx scripts/replay-candles.ts --file data/BTCUSDT_1h.json
 *   npx tsx scripts/replay-candles.ts --symbol ETHUSDT --mode A
 *   npx tsx scripts/replay-candles.ts --capital 1000 --verbose
 *   npx tsx scripts/replay-candles.ts --config config/engine.json --symbol SOLUSDT
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Candle } from '../src/types/candle';
import {
  AlertManager,
  Engine,
  PaperBroker,
  loadEngineConfig,
  parseEngineConfig,
  type SymbolConfigInput,
} from '../src/lib/engine';
import { MemoryStateStore } from '../src/lib/data/state-store';
import { errorMessage } from '../src/lib/errors';

// ============================================
// CLI Parsing
// ============================================

interface ReplayArgs {
  symbol: string;
  file: string | null;
  configPath: string | null;
  mode: string | null;
  capital: number;
  verbose: boolean;
}

function parseArgs(): ReplayArgs {
  const args = process.argv.slice(2);
  const parsed: ReplayArgs = {
    symbol: 'BTCUSDT',
    file: null,
    configPath: null,
    mode: null,
    capital: 10000,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    switch (args[i]) {
      case '--symbol':
        if (next) parsed.symbol = next.toUpperCase();
        i++;
        break;
      case '--file':
        if (next) parsed.file = next;
        i++;
        break;
      case '--config':
        if (next) parsed.configPath = next;
        i++;
        break;
      case '--mode':
        if (next) parsed.mode = next.toUpperCase();
        i++;
        break;
      case '--capital':
        if (next) parsed.capital = parseFloat(next);
        i++;
        break;
      case '--verbose':
        parsed.verbose = true;
        break;
    }
  }

  return parsed;
}

// ============================================
// Data Loading
// ============================================

const candleFileSchema = z.array(
  z.object({
    timestamp: z.number(),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
  }),
);

function loadCandles(filePath: string): Candle[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Data file not found: ${filePath}`);
  }
  const candles = candleFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  // Ensure chronological order
  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

function symbolSettings(args: ReplayArgs): SymbolConfigInput {
  const fromFile = args.configPath
    ? loadEngineConfig(path.resolve(args.configPath)).symbols.find((s) => s.symbol === args.symbol)
    : undefined;
  const base: SymbolConfigInput = fromFile ?? { symbol: args.symbol };
  return args.mode === 'A' || args.mode === 'B' ? { ...base, executionMode: args.mode } : base;
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs();
  const file = args.file ?? path.join(process.cwd(), 'data', `${args.symbol}_1h.json`);
  const candles = loadCandles(file);

  const config = parseEngineConfig({
    initialEquity: args.capital,
    verbose: args.verbose,
    paper: true,
    symbols: [symbolSettings(args)],
  });

  const alerts = new AlertManager();
  const engine = new Engine({
    config,
    broker: new PaperBroker({ slippage: config.paperSlippage }),
    alerts,
    store: new MemoryStateStore(),
  });

  await engine.start();
  console.log(`\nReplaying ${candles.length} candles for ${args.symbol}...`);

  const started = Date.now();
  for (const candle of candles) {
    await engine.replayCandle(args.symbol, candle);
  }
  const elapsed = ((Date.now() - started) / 1000).toFixed(1);

  const lane = engine.getLane(args.symbol);
  if (!lane) throw new Error(`No lane for ${args.symbol}`);

  const status = lane.getStatus();
  const closed = lane.getClosedPositions();
  const blocks = [...lane.getArchivedBlocks(), ...lane.getLiveBlocks()];

  console.log('\n' + '='.repeat(60));
  console.log(`REPLAY RESULTS: ${args.symbol} (${elapsed}s)`);
  console.log('='.repeat(60));
  console.log(`Trend:          ${status.structure.trend}`);
  console.log(`Order blocks:   ${blocks.length} (${blocks.filter((b) => b.kind === 'breaker').length} breakers, ${status.liveBlocks} live)`);
  console.log(`Trades:         ${status.positions.closed} (${status.positions.wins}W / ${status.positions.losses}L / ${status.positions.breakevens}BE)`);
  console.log(`Win rate:       ${(status.positions.winRate * 100).toFixed(1)}%`);
  console.log(`Forced exits:   ${status.positions.forced}`);
  console.log(`Total PnL:      $${status.positions.totalPnl.toFixed(2)}`);
  console.log(`Equity:         $${engine.getLedger().getEquity().toFixed(2)}`);
  console.log(`Max drawdown:   ${(engine.getLedger().getDrawdown() * 100).toFixed(2)}%`);

  if (closed.length > 0) {
    console.log('\nTrades:');
    for (const p of closed) {
      console.log(
        `  ${new Date(p.openedAt).toISOString()} ${p.direction === 'bullish' ? 'LONG ' : 'SHORT'} ${p.kind.padEnd(7)} ` +
          `${p.entryPrice.toFixed(2)} -> ${p.exitPrice?.toFixed(2) ?? 'n/a'} ${(p.exitCause ?? '').padEnd(13)} ` +
          `${(p.realizedPnl ?? 0) >= 0 ? '+' : ''}${(p.realizedPnl ?? 0).toFixed(2)}`,
      );
    }
  }

  await engine.stop('replay complete');
}

main().catch((err: unknown) => {
  console.error(`Replay failed: ${errorMessage(err)}`);
  process.exit(1);
});
