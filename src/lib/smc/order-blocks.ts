/**
 * Order Block Origin Selection
 *
 * Bullish OB = last bearish candle before the impulse that broke a swing high.
 * Bearish OB = last bullish candle before the impulse that broke a swing low.
 *
 * The impulse is anchored at the extreme of the move (lowest low between the
 * broken swing and the break candle for a bullish break). From there the
 * search walks back to the nearest opposite-colour candle.
 */

import type {
  Candle,
  Direction,
  OriginCandleRule,
  StructureEvent,
  ZoneSource,
} from '@/types';
import { isBearish, isBullish, bodyHigh, bodyLow } from '@/types/candle';
import type { CandleBuffer } from './candle-buffer';

export interface OriginConfig {
  originCandle: OriginCandleRule;
  /** Merge up to this many consecutive opposite candles into one zone */
  originCandleCount: number;
  zoneSource: ZoneSource;
}

export const DEFAULT_ORIGIN_CONFIG: OriginConfig = {
  originCandle: 'last_opposite',
  originCandleCount: 1,
  zoneSource: 'wick',
};

export interface ZoneProposal {
  zoneHigh: number;
  zoneLow: number;
  originIndex: number;
  originTimestamp: number;
}

interface IndexedCandle {
  index: number;
  candle: Candle;
}

/**
 * Derive the order block zone for a structure event, or null when the
 * buffer no longer holds the move or the zone would have no height.
 */
export function findOriginZone(
  buffer: CandleBuffer,
  event: StructureEvent,
  config: OriginConfig = DEFAULT_ORIGIN_CONFIG,
): ZoneProposal | null {
  const extreme = findImpulseExtreme(buffer, event);
  if (!extreme) return null;

  const origin = config.originCandle === 'extreme'
    ? [extreme]
    : findOppositeRun(buffer, extreme, event.direction, config.originCandleCount);

  const selected = origin.length > 0 ? origin : [extreme];
  const zone = zoneBounds(selected.map((c) => c.candle), config.zoneSource);
  if (!zone) return null;

  // selected[0] is the candle nearest the impulse
  const nearest = selected[0] ?? extreme;

  return {
    zoneHigh: zone.high,
    zoneLow: zone.low,
    originIndex: nearest.index,
    originTimestamp: nearest.candle.timestamp,
  };
}

/**
 * Lowest-low (bullish) or highest-high (bearish) candle between the broken
 * swing and the break candle, inclusive. Ties keep the later candle.
 */
export function findImpulseExtreme(
  buffer: CandleBuffer,
  event: StructureEvent,
): IndexedCandle | null {
  const window = buffer.range(event.brokenSwing.index, event.index);
  let extreme: IndexedCandle | null = null;

  for (const entry of window) {
    if (!extreme) {
      extreme = entry;
      continue;
    }
    const better = event.direction === 'bullish'
      ? entry.candle.low <= extreme.candle.low
      : entry.candle.high >= extreme.candle.high;
    if (better) extreme = entry;
  }

  return extreme;
}

function isOpposite(candle: Candle, direction: Direction): boolean {
  return direction === 'bullish' ? isBearish(candle) : isBullish(candle);
}

/**
 * Walk back from the extreme to the first opposite-colour candle, then keep
 * collecting while the run of opposite candles continues (up to `count`).
 */
function findOppositeRun(
  buffer: CandleBuffer,
  from: IndexedCandle,
  direction: Direction,
  count: number,
): IndexedCandle[] {
  const run: IndexedCandle[] = [];

  for (let i = from.index; i >= buffer.oldestIndex() && run.length < count; i--) {
    const candle = buffer.get(i);
    if (!candle) break;

    if (isOpposite(candle, direction)) {
      run.push({ index: i, candle });
    } else if (run.length > 0) {
      break;
    }
  }

  return run;
}

export function zoneBounds(
  candles: Candle[],
  source: ZoneSource,
): { high: number; low: number } | null {
  if (candles.length === 0) return null;

  const pick = (useBody: boolean) => {
    let high = -Infinity;
    let low = Infinity;
    for (const c of candles) {
      high = Math.max(high, useBody ? bodyHigh(c) : c.high);
      low = Math.min(low, useBody ? bodyLow(c) : c.low);
    }
    return { high, low };
  };

  let zone = pick(source === 'body');
  if (zone.high <= zone.low && source === 'body') {
    zone = pick(false);
  }

  return zone.high > zone.low ? zone : null;
}
