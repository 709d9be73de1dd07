/**
 * Timestamp-aligned candle building.
 *
 * - aggregateCandles: lower-timeframe candles → higher-timeframe candles
 *   aligned to wall-clock boundaries (e.g. 15m → 1H aligned to hour start).
 * - CandleBuilder: live ticks → closed candles, one bucket at a time.
 */

import type { Candle, Tick } from '@/types/candle';

/**
 * Get the bucket start timestamp for a given timestamp.
 */
export function getBucketTimestamp(timestamp: number, intervalMs: number): number {
  return Math.floor(timestamp / intervalMs) * intervalMs;
}

/**
 * Aggregate candles to a higher timeframe aligned to time boundaries.
 *
 * @param candles - Source candles sorted by timestamp ascending
 * @param sourceMs - Source candle duration
 * @param targetMs - Target candle duration, a multiple of sourceMs
 * @returns Closed aggregated candles. A trailing bucket that does not reach
 *          its boundary yet is dropped.
 */
export function aggregateCandles(
  candles: Candle[],
  sourceMs: number,
  targetMs: number,
): Candle[] {
  if (targetMs % sourceMs !== 0) {
    throw new Error(`Target interval ${targetMs} is not a multiple of ${sourceMs}`);
  }

  const result: Candle[] = [];
  let bucketStart = -1;
  let bucket: Candle[] = [];

  const flush = (): void => {
    const merged = mergeBucket(bucket, bucketStart);
    const last = bucket[bucket.length - 1];
    if (merged && last && last.timestamp + sourceMs >= bucketStart + targetMs) {
      result.push(merged);
    }
  };

  for (const candle of candles) {
    const start = getBucketTimestamp(candle.timestamp, targetMs);
    if (start !== bucketStart) {
      flush();
      bucketStart = start;
      bucket = [candle];
    } else {
      bucket.push(candle);
    }
  }
  flush();

  return result;
}

function mergeBucket(candles: Candle[], bucketStart: number): Candle | null {
  const first = candles[0];
  const last = candles[candles.length - 1];
  if (!first || !last) return null;

  let high = first.high;
  let low = first.low;
  let volume = 0;

  for (const c of candles) {
    if (c.high > high) high = c.high;
    if (c.low < low) low = c.low;
    volume += c.volume;
  }

  return {
    timestamp: bucketStart,
    open: first.open,
    high,
    low,
    close: last.close,
    volume,
    isClosed: true,
  };
}

/**
 * Builds candles from a tick stream. The first tick of a new bucket closes
 * the current candle, which is returned from `push`.
 */
export class CandleBuilder {
  private intervalMs: number;
  private current: Candle | null = null;

  constructor(intervalMs: number) {
    this.intervalMs = intervalMs;
  }

  push(tick: Tick): Candle | null {
    const bucket = getBucketTimestamp(tick.timestamp, this.intervalMs);
    const volume = tick.volume ?? 0;

    if (!this.current) {
      this.current = this.open(bucket, tick.price, volume);
      return null;
    }

    if (bucket < this.current.timestamp) {
      // Late tick for an already closed bucket
      return null;
    }

    if (bucket === this.current.timestamp) {
      this.current.high = Math.max(this.current.high, tick.price);
      this.current.low = Math.min(this.current.low, tick.price);
      this.current.close = tick.price;
      this.current.volume += volume;
      return null;
    }

    const closed: Candle = { ...this.current, isClosed: true };
    this.current = this.open(bucket, tick.price, volume);
    return closed;
  }

  /** Close the forming candle if its bucket has ended by `now` */
  flush(now: number): Candle | null {
    if (!this.current || now < this.current.timestamp + this.intervalMs) return null;
    const closed: Candle = { ...this.current, isClosed: true };
    this.current = null;
    return closed;
  }

  getForming(): Candle | null {
    return this.current ? { ...this.current } : null;
  }

  private open(timestamp: number, price: number, volume: number): Candle {
    return {
      timestamp,
      open: price,
      high: price,
      low: price,
      close: price,
      volume,
      isClosed: false,
    };
  }
}
