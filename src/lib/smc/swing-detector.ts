/**
 * Swing Detection (incremental)
 *
 * Fractal confirmation: a candle is a swing high when the `confirmationBars`
 * candles on each side all have strictly lower highs (swing low: strictly
 * higher lows). A candidate is only evaluated once its right-hand side is
 * complete, so every swing is confirmed `confirmationBars` candles late and
 * is never revised afterwards.
 */

import type { SwingPoint } from '@/types';
import type { CandleBuffer } from './candle-buffer';

export interface SwingDetectorConfig {
  confirmationBars: number;
}

export class SwingDetector {
  private config: SwingDetectorConfig;
  private highs: SwingPoint[] = [];
  private lows: SwingPoint[] = [];
  private lastEvaluated = -1;
  private maxHistory: number;

  constructor(config: SwingDetectorConfig, maxHistory = 100) {
    if (!Number.isInteger(config.confirmationBars) || config.confirmationBars < 1) {
      throw new Error(`confirmationBars must be a positive integer, got ${config.confirmationBars}`);
    }
    this.config = config;
    this.maxHistory = maxHistory;
  }

  /**
   * Evaluate the candle that just gained a complete right-hand window.
   * Call once after every append; returns swings confirmed by this candle.
   */
  update(buffer: CandleBuffer): SwingPoint[] {
    const n = this.config.confirmationBars;
    const center = buffer.lastIndex() - n;
    if (center <= this.lastEvaluated || center - n < buffer.oldestIndex()) {
      return [];
    }
    this.lastEvaluated = center;

    const pivot = buffer.get(center);
    if (!pivot) return [];

    let isHigh = true;
    let isLow = true;

    for (let offset = 1; offset <= n && (isHigh || isLow); offset++) {
      const left = buffer.get(center - offset);
      const right = buffer.get(center + offset);
      if (!left || !right) return [];

      if (left.high >= pivot.high || right.high >= pivot.high) isHigh = false;
      if (left.low <= pivot.low || right.low <= pivot.low) isLow = false;
    }

    const confirmed: SwingPoint[] = [];
    if (isHigh) {
      confirmed.push({ index: center, timestamp: pivot.timestamp, price: pivot.high, kind: 'high' });
    }
    if (isLow) {
      confirmed.push({ index: center, timestamp: pivot.timestamp, price: pivot.low, kind: 'low' });
    }

    for (const swing of confirmed) {
      const list = swing.kind === 'high' ? this.highs : this.lows;
      list.push(swing);
      if (list.length > this.maxHistory) list.shift();
    }

    return confirmed;
  }

  getSwingHighs(): readonly SwingPoint[] {
    return this.highs;
  }

  getSwingLows(): readonly SwingPoint[] {
    return this.lows;
  }
}
