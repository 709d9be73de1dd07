/**
 * Candle Source — REST backfill of closed candles from Bybit.
 *
 * Candles are cached through the state store so restarts only fetch what
 * is missing. The candle still forming at the exchange is never returned.
 */

import { RestClientV5, type KlineIntervalV3 } from 'bybit-api';
import type { Candle } from '@/types/candle';
import type { StateStore } from '@/lib/data/state-store';

export interface CandleSource {
  /** Most recent closed candles, oldest first */
  fetchClosedCandles(symbol: string, intervalMs: number, limit: number): Promise<Candle[]>;
}

/** Max candles per Bybit API request */
const BYBIT_MAX_LIMIT = 1000;

const MINUTE_MS = 60_000;

const BYBIT_INTERVALS: ReadonlyMap<number, KlineIntervalV3> = new Map([
  [MINUTE_MS, '1'],
  [3 * MINUTE_MS, '3'],
  [5 * MINUTE_MS, '5'],
  [15 * MINUTE_MS, '15'],
  [30 * MINUTE_MS, '30'],
  [60 * MINUTE_MS, '60'],
  [120 * MINUTE_MS, '120'],
  [240 * MINUTE_MS, '240'],
  [360 * MINUTE_MS, '360'],
  [720 * MINUTE_MS, '720'],
  [1440 * MINUTE_MS, 'D'],
]);

export function toBybitInterval(intervalMs: number): KlineIntervalV3 {
  const interval = BYBIT_INTERVALS.get(intervalMs);
  if (!interval) {
    throw new Error(`No Bybit kline interval for ${intervalMs}ms`);
  }
  return interval;
}

export class BybitCandleSource implements CandleSource {
  private client: RestClientV5;
  private store: StateStore | undefined;
  private now: () => number;

  constructor(
    options: { testnet?: boolean; store?: StateStore; now?: () => number } = {},
  ) {
    this.client = new RestClientV5({ testnet: options.testnet ?? false });
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  async fetchClosedCandles(symbol: string, intervalMs: number, limit: number): Promise<Candle[]> {
    const since = this.now() - (limit + 1) * intervalMs;

    const cached = this.store ? await this.store.loadCandles(symbol, since, limit + 1) : [];
    const lastCached = cached[cached.length - 1];
    const fresh = await this.fetchKlines(
      symbol,
      intervalMs,
      lastCached ? lastCached.timestamp + intervalMs : since,
    );

    if (this.store && fresh.length > 0) {
      await this.store.saveCandles(symbol, fresh);
    }

    const merged = new Map<number, Candle>();
    for (const c of [...cached, ...fresh]) merged.set(c.timestamp, c);
    return [...merged.values()]
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(-limit);
  }

  private async fetchKlines(symbol: string, intervalMs: number, start: number): Promise<Candle[]> {
    const now = this.now();
    const out: Candle[] = [];
    let cursor = start;

    while (cursor + intervalMs <= now) {
      const response = await this.client.getKline({
        category: 'linear',
        symbol,
        interval: toBybitInterval(intervalMs),
        start: cursor,
        limit: BYBIT_MAX_LIMIT,
      });

      if (response.retCode !== 0) {
        throw new Error(`Bybit API error: ${response.retMsg} (code: ${response.retCode})`);
      }

      const rows = response.result.list;
      if (!rows || rows.length === 0) break;

      // Bybit returns newest first, reverse to chronological order
      const page: Candle[] = rows
        .map((row) => ({
          timestamp: parseInt(row[0], 10),
          open: parseFloat(row[1]),
          high: parseFloat(row[2]),
          low: parseFloat(row[3]),
          close: parseFloat(row[4]),
          volume: parseFloat(row[5]),
          isClosed: true,
        }))
        .reverse()
        .filter((c) => c.timestamp >= cursor && c.timestamp + intervalMs <= now);

      const last = page[page.length - 1];
      if (!last) break;
      out.push(...page);
      cursor = last.timestamp + intervalMs;
      if (rows.length < BYBIT_MAX_LIMIT) break;
    }

    return out;
  }
}
