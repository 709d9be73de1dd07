/**
 * Candle Buffer
 * Bounded rolling window of closed candles for one symbol.
 *
 * Candles are addressed by a global index that keeps counting after old
 * candles fall out of the window, so swing points and order blocks can
 * refer to candles without holding references to them.
 */

import type { Candle } from '@/types/candle';
import { detectGap, validateCandle, type GapReport } from './candle-validator';

export interface CandleBufferConfig {
  maxCandles: number;
  intervalMs: number;
}

export interface AppendResult {
  index: number;
  gap: GapReport | null;
}

export class CandleBuffer {
  private config: CandleBufferConfig;
  private candles: Candle[] = [];
  private firstIndex = 0;
  private lastTimestamp: number | null = null;

  constructor(config: CandleBufferConfig) {
    if (config.maxCandles < 1) {
      throw new Error(`maxCandles must be positive, got ${config.maxCandles}`);
    }
    this.config = config;
  }

  /**
   * Validate and append a closed candle.
   * Throws DataIntegrityError without touching the buffer on bad input.
   */
  append(candle: Candle): AppendResult {
    validateCandle(candle, this.lastTimestamp);
    const gap = detectGap(candle, this.lastTimestamp, this.config.intervalMs);

    this.candles.push(Object.freeze({ ...candle, isClosed: true }));
    this.lastTimestamp = candle.timestamp;

    if (this.candles.length > this.config.maxCandles) {
      this.candles.shift();
      this.firstIndex++;
    }

    return { index: this.lastIndex(), gap };
  }

  /** Candle at a global index, or undefined if outside the window */
  get(index: number): Candle | undefined {
    return this.candles[index - this.firstIndex];
  }

  latest(): Candle | undefined {
    return this.candles[this.candles.length - 1];
  }

  /** Global index of the newest candle (-1 when empty) */
  lastIndex(): number {
    return this.firstIndex + this.candles.length - 1;
  }

  /** Global index of the oldest candle still held */
  oldestIndex(): number {
    return this.firstIndex;
  }

  getLastTimestamp(): number | null {
    return this.lastTimestamp;
  }

  get size(): number {
    return this.candles.length;
  }

  /** Candles between two global indices, inclusive, clamped to the window */
  range(fromIndex: number, toIndex: number): Array<{ index: number; candle: Candle }> {
    const result: Array<{ index: number; candle: Candle }> = [];
    const start = Math.max(fromIndex, this.firstIndex);
    const end = Math.min(toIndex, this.lastIndex());
    for (let i = start; i <= end; i++) {
      const candle = this.get(i);
      if (candle) result.push({ index: i, candle });
    }
    return result;
  }

  getCandles(): readonly Candle[] {
    return this.candles;
  }
}
