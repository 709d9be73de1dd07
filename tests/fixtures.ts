import type { Candle, OrderBlock } from '@/types';
import { CandleBuffer } from '@/lib/smc/candle-buffer';
import { parseSymbolConfig, type SymbolConfig, type SymbolConfigInput } from '@/lib/engine/config';

export const HOUR = 60 * 60 * 1000;
export const T0 = 1_700_000_000_000 - (1_700_000_000_000 % HOUR);

/** Hourly candle at position `i` from T0 */
export function candle(i: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp: T0 + i * HOUR, open, high, low, close, volume: 100 };
}

export function bufferOf(candles: Candle[], maxCandles = 500): CandleBuffer {
  const buffer = new CandleBuffer({ maxCandles, intervalMs: HOUR });
  for (const c of candles) buffer.append(c);
  return buffer;
}

/**
 * Swing high at #1 (105), swing low at #3 (100) with one confirmation bar,
 * then #5 closes through 105. With wick zones the bullish block is #3's
 * candle: [100, 104].
 */
export function bullishBreakSeries(): Candle[] {
  return [
    candle(0, 100, 101, 99, 100.5),
    candle(1, 100.5, 105, 100, 104.5),
    candle(2, 104.5, 104.8, 102, 102.5),
    candle(3, 102.5, 104, 100, 100.8),
    candle(4, 100.8, 103.5, 100.5, 103),
    candle(5, 104.6, 107, 104.5, 106.5),
  ];
}

export function symbolConfig(overrides: Partial<SymbolConfigInput> = {}): SymbolConfig {
  return parseSymbolConfig({ symbol: 'TESTUSDT', ...overrides });
}

export function makeBlock(overrides: Partial<OrderBlock> = {}): OrderBlock {
  return {
    id: 1,
    direction: 'bullish',
    kind: 'fresh',
    status: 'armed',
    zoneHigh: 110,
    zoneLow: 100,
    originIndex: 3,
    originTimestamp: T0 + 3 * HOUR,
    createdIndex: 5,
    createdAt: T0 + 5 * HOUR,
    sourceEvent: 'choch',
    swingIndex: 1,
    parentId: null,
    resolution: null,
    touchedAt: null,
    resolvedAt: null,
    statusHistory: ['armed'],
    ...overrides,
  };
}
