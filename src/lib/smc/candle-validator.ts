/**
 * Candle & Tick Validation
 *
 * Rejects malformed market data before it reaches structure detection.
 * Validation is stateless; callers pass the previous accepted timestamp.
 */

import type { Candle, Tick } from '@/types/candle';
import { DataIntegrityError } from '@/lib/errors';

export interface GapReport {
  expectedTimestamp: number;
  actualTimestamp: number;
  missingCandles: number;
}

/**
 * Throws DataIntegrityError if the candle is not a well-formed closed candle
 * following `previousTimestamp`.
 */
export function validateCandle(candle: Candle, previousTimestamp: number | null): void {
  const prices: Array<[string, number]> = [
    ['open', candle.open],
    ['high', candle.high],
    ['low', candle.low],
    ['close', candle.close],
  ];

  for (const [field, value] of prices) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new DataIntegrityError(`Invalid ${field} price: ${value}`, field);
    }
  }

  if (!Number.isFinite(candle.volume) || candle.volume < 0) {
    throw new DataIntegrityError(`Invalid volume: ${candle.volume}`, 'volume');
  }
  if (candle.high < candle.low) {
    throw new DataIntegrityError(`High ${candle.high} below low ${candle.low}`, 'high');
  }
  if (candle.high < Math.max(candle.open, candle.close)) {
    throw new DataIntegrityError(`High ${candle.high} below body`, 'high');
  }
  if (candle.low > Math.min(candle.open, candle.close)) {
    throw new DataIntegrityError(`Low ${candle.low} above body`, 'low');
  }
  if (!Number.isFinite(candle.timestamp)) {
    throw new DataIntegrityError(`Invalid timestamp: ${candle.timestamp}`, 'timestamp');
  }
  if (previousTimestamp !== null && candle.timestamp <= previousTimestamp) {
    throw new DataIntegrityError(
      `Non-increasing timestamp ${candle.timestamp} (previous ${previousTimestamp})`,
      'timestamp',
    );
  }
  if (candle.isClosed === false) {
    throw new DataIntegrityError('Candle is not closed', 'isClosed');
  }
}

export function validateTick(tick: Tick, previousTimestamp: number | null): void {
  if (!Number.isFinite(tick.price) || tick.price <= 0) {
    throw new DataIntegrityError(`Invalid tick price: ${tick.price}`, 'price');
  }
  if (!Number.isFinite(tick.timestamp)) {
    throw new DataIntegrityError(`Invalid tick timestamp: ${tick.timestamp}`, 'timestamp');
  }
  if (previousTimestamp !== null && tick.timestamp < previousTimestamp) {
    throw new DataIntegrityError(
      `Tick timestamp ${tick.timestamp} before previous ${previousTimestamp}`,
      'timestamp',
    );
  }
}

/** Returns a report when the candle skips one or more intervals, else null. */
export function detectGap(
  candle: Candle,
  previousTimestamp: number | null,
  intervalMs: number,
): GapReport | null {
  if (previousTimestamp === null) return null;
  const expected = previousTimestamp + intervalMs;
  if (candle.timestamp <= expected) return null;

  return {
    expectedTimestamp: expected,
    actualTimestamp: candle.timestamp,
    missingCandles: Math.floor((candle.timestamp - previousTimestamp) / intervalMs) - 1,
  };
}
