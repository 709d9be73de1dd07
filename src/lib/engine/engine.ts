/**
 * Engine — Orchestrator
 *
 * Wires one SymbolLane per configured symbol around a shared CapitalLedger,
 * Broker, StateStore and AlertManager. Routes candles, ticks, broker fills
 * and the clock to the owning lane. A lane that halts stops only itself.
 */

import type { BrokerFill, Candle, Tick } from '@/types';
import type { StateStore } from '@/lib/data/state-store';
import { errorMessage } from '@/lib/errors';
import { AlertManager } from './alerts';
import type { Broker } from './broker';
import { CapitalLedger } from './capital-ledger';
import type { CandleSource } from './candle-source';
import type { EngineConfig } from './config';
import { PaperBroker } from './paper-broker';
import { SymbolLane, type LaneStatus } from './symbol-lane';

export interface EngineOptions {
  config: EngineConfig;
  broker: Broker;
  alerts?: AlertManager;
  store?: StateStore;
  /** Broker request deadline per call */
  requestTimeoutMs?: number;
}

export interface EngineStatus {
  running: boolean;
  equity: number;
  available: number;
  drawdown: number;
  lanes: LaneStatus[];
}

export class Engine {
  private config: EngineConfig;
  private broker: Broker;
  private alerts: AlertManager;
  private store: StateStore | undefined;
  private ledger: CapitalLedger;
  private lanes = new Map<string, SymbolLane>();
  private unsubscribeFills: (() => void) | null = null;
  private clockTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(options: EngineOptions) {
    this.config = options.config;
    this.broker = options.broker;
    this.alerts = options.alerts ?? new AlertManager();
    this.store = options.store;
    this.ledger = new CapitalLedger(options.config.initialEquity);

    for (const symbolConfig of options.config.symbols) {
      this.lanes.set(symbolConfig.symbol, new SymbolLane({
        config: symbolConfig,
        ledger: this.ledger,
        broker: this.broker,
        notifier: this.alerts,
        store: this.store,
        verbose: options.config.verbose,
        requestTimeoutMs: options.requestTimeoutMs,
      }));
    }
  }

  /**
   * Restore persisted equity, block numbering and open positions, then start
   * routing fills.
   */
  async start(): Promise<void> {
    if (this.running) return;

    if (this.store) {
      const saved = await this.store.loadLedger();
      if (saved) {
        this.ledger.restore(saved.equity, saved.peakEquity);
        console.log(`[Engine] Restored equity $${saved.equity.toFixed(2)} (peak $${saved.peakEquity.toFixed(2)})`);
      }

      for (const lane of this.lanes.values()) {
        lane.resumeBlockIds(await this.store.nextOrderBlockId(lane.symbol));
        const open = await this.store.loadOpenPositions(lane.symbol);
        if (open.length > 0) await lane.restorePositions(open);
      }
    }

    this.unsubscribeFills = this.broker.onFill((fill) => this.routeFill(fill));
    this.running = true;

    console.log('\n--- SMC Order Block Engine ---');
    console.log(`Broker: ${this.broker.name}`);
    console.log(`Equity: $${this.ledger.getEquity().toFixed(2)}`);
    for (const s of this.config.symbols) {
      console.log(
        `  ${s.symbol}: mode ${s.executionMode}, ${s.intervalMs / 60000}m candles, ` +
          `fresh ${s.freshAllocationPct * 100}% @ ${s.freshLeverage}x, breaker ${s.breakerAllocationPct * 100}% @ ${s.breakerLeverage}x`,
      );
    }

    await this.alerts.engineStarted([...this.lanes.keys()]);
  }

  /** Build structure from history before live data starts */
  async backfill(source: CandleSource): Promise<void> {
    for (const s of this.config.symbols) {
      const lane = this.requireLane(s.symbol);
      try {
        const candles = await source.fetchClosedCandles(s.symbol, s.intervalMs, s.maxCandles);
        await lane.warmUp(candles);
      } catch (err) {
        console.error(`[Engine] Backfill failed for ${s.symbol}: ${errorMessage(err)}`);
        await this.alerts.error(`Backfill failed for ${s.symbol}`, { error: errorMessage(err) });
      }
    }
  }

  /** Drive candidate deadlines from wall-clock time */
  startClock(intervalMs = this.config.clockIntervalMs): void {
    this.stopClock();
    this.clockTimer = setInterval(() => {
      const now = Date.now();
      for (const lane of this.lanes.values()) void lane.onClock(now);
    }, intervalMs);
  }

  stopClock(): void {
    if (this.clockTimer) {
      clearInterval(this.clockTimer);
      this.clockTimer = null;
    }
  }

  // ============================================
  // Routing
  // ============================================

  ingestCandle(symbol: string, candle: Candle, closeTime?: number): Promise<void> {
    const lane = this.lanes.get(symbol);
    if (!lane) {
      console.warn(`[Engine] Candle for unconfigured symbol ${symbol}`);
      return Promise.resolve();
    }
    return lane.onCandle(candle, closeTime);
  }

  ingestTick(symbol: string, tick: Tick): Promise<void> {
    const lane = this.lanes.get(symbol);
    if (!lane) return Promise.resolve();
    if (this.broker instanceof PaperBroker) {
      this.broker.updatePrice(symbol, tick.price, tick.timestamp);
    }
    return lane.onTick(tick);
  }

  /**
   * Replay one closed candle through the paper broker: its price path
   * (open, the two extremes, close) is fed as ticks, then the candle itself
   * and a clock tick at its close. Waits for the lane to settle.
   */
  async replayCandle(symbol: string, candle: Candle): Promise<void> {
    const lane = this.requireLane(symbol);
    const intervalMs = this.requireSymbolConfig(symbol).intervalMs;

    for (const tick of pricePath(candle, intervalMs)) {
      await this.ingestTick(symbol, tick);
      await lane.idle();
    }

    const closeTime = candle.timestamp + intervalMs;
    await lane.onCandle(candle, closeTime);
    await lane.onClock(closeTime);
    await lane.idle();
  }

  forceClose(symbol: string, positionId: string): Promise<void> {
    return this.requireLane(symbol).forceClose(positionId);
  }

  // ============================================
  // Inspection
  // ============================================

  getLane(symbol: string): SymbolLane | undefined {
    return this.lanes.get(symbol);
  }

  getLanes(): SymbolLane[] {
    return [...this.lanes.values()];
  }

  getLedger(): CapitalLedger {
    return this.ledger;
  }

  getStatus(): EngineStatus {
    const ledger = this.ledger.snapshot();
    return {
      running: this.running,
      equity: ledger.equity,
      available: ledger.available,
      drawdown: this.ledger.getDrawdown(),
      lanes: this.getLanes().map((lane) => lane.getStatus()),
    };
  }

  /** Resolves once every lane has drained */
  async idle(): Promise<void> {
    await Promise.all(this.getLanes().map((lane) => lane.idle()));
  }

  /**
   * Stop the clock, cancel working entry orders and wait for in-flight
   * broker calls. Open positions are left to the exchange.
   */
  async stop(reason = 'shutdown'): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopClock();

    for (const lane of this.lanes.values()) {
      await lane.stop();
    }
    await this.idle();

    if (this.unsubscribeFills) {
      this.unsubscribeFills();
      this.unsubscribeFills = null;
    }
    if (this.broker.close) await this.broker.close();

    if (this.store) {
      const snapshot = this.ledger.snapshot();
      await this.store.saveLedger({
        equity: snapshot.equity,
        peakEquity: snapshot.peakEquity,
        updatedAt: Date.now(),
      });
    }

    console.log(`[Engine] Stopped (${reason})`);
    await this.alerts.engineStopped(reason);
  }

  // ============================================
  // Helpers
  // ============================================

  private routeFill(fill: BrokerFill): void {
    const lane = this.lanes.get(fill.symbol);
    if (!lane) {
      console.warn(`[Engine] Fill for unconfigured symbol ${fill.symbol}`);
      return;
    }
    void lane.onFill(fill);
  }

  private requireLane(symbol: string): SymbolLane {
    const lane = this.lanes.get(symbol);
    if (!lane) throw new Error(`No lane for ${symbol}`);
    return lane;
  }

  private requireSymbolConfig(symbol: string): EngineConfig['symbols'][number] {
    const config = this.config.symbols.find((s) => s.symbol === symbol);
    if (!config) throw new Error(`No config for ${symbol}`);
    return config;
  }
}

/**
 * Intra-candle price path: open, then low and high (high first on a bearish
 * candle), then close.
 */
export function pricePath(candle: Candle, intervalMs: number): Tick[] {
  const step = intervalMs / 4;
  const [first, second] = candle.close >= candle.open
    ? [candle.low, candle.high]
    : [candle.high, candle.low];

  return [candle.open, first, second, candle.close].map((price, i) => ({
    price,
    timestamp: candle.timestamp + Math.floor(i * step),
  }));
}
