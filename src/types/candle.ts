/**
 * Core OHLCV candle and tick types
 */

export interface Candle {
  /** Candle open time (ms since epoch) */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** False while the candle is still forming. Absent means closed. */
  isClosed?: boolean;
}

export interface Tick {
  price: number;
  timestamp: number;
  volume?: number;
}

export type Timeframe = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';

export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1m': 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000,
  '1d': 24 * 60 * 60_000,
};

export function isBullish(candle: Candle): boolean {
  return candle.close > candle.open;
}

export function isBearish(candle: Candle): boolean {
  return candle.close < candle.open;
}

export function bodyHigh(candle: Candle): number {
  return Math.max(candle.open, candle.close);
}

export function bodyLow(candle: Candle): number {
  return Math.min(candle.open, candle.close);
}

export function bodySize(candle: Candle): number {
  return Math.abs(candle.close - candle.open);
}

export function range(candle: Candle): number {
  return candle.high - candle.low;
}
