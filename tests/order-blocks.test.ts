import { describe, it, expect } from 'vitest';
import type { Candle, StructureEvent } from '@/types';
import { findOriginZone, zoneBounds } from '@/lib/smc/order-blocks';
import { OrderBlockTracker } from '@/lib/smc/order-block-tracker';
import type { CandleBuffer } from '@/lib/smc/candle-buffer';
import { HOUR, T0, bufferOf, bullishBreakSeries, candle } from './fixtures';

function breakEvent(
  direction: 'bullish' | 'bearish',
  swingIndex: number,
  swingPrice: number,
  at: Candle,
  index: number,
  type: 'bos' | 'choch' = 'choch',
): StructureEvent {
  return {
    type,
    direction,
    brokenSwing: {
      index: swingIndex,
      timestamp: T0 + swingIndex * HOUR,
      price: swingPrice,
      kind: direction === 'bullish' ? 'high' : 'low',
    },
    index,
    timestamp: at.timestamp,
    closePrice: at.close,
    previousTrend: type === 'bos' ? direction : 'undetermined',
    trend: direction,
  };
}

/** Tracker holding fresh bullish block #1 [100, 104] created at #5 */
function seeded(config: ConstructorParameters<typeof OrderBlockTracker>[0] = {}): {
  tracker: OrderBlockTracker;
  buffer: CandleBuffer;
} {
  const series = bullishBreakSeries();
  const buffer = bufferOf(series);
  const tracker = new OrderBlockTracker(config);
  const last = series[5];
  if (!last) throw new Error('series too short');
  tracker.onCandle(last, 5, breakEvent('bullish', 1, 105, last, 5), buffer);
  return { tracker, buffer };
}

function step(tracker: OrderBlockTracker, buffer: CandleBuffer, c: Candle, event: StructureEvent | null = null) {
  const { index } = buffer.append(c);
  return tracker.onCandle(c, index, event, buffer);
}

describe('order block origin', () => {
  it('takes the last opposite candle before the impulse extreme', () => {
    const series = bullishBreakSeries();
    const last = series[5];
    if (!last) throw new Error('series too short');

    const zone = findOriginZone(bufferOf(series), breakEvent('bullish', 1, 105, last, 5));

    expect(zone).toEqual({
      zoneHigh: 104,
      zoneLow: 100,
      originIndex: 3,
      originTimestamp: T0 + 3 * HOUR,
    });
  });

  it('merges a run of opposite candles when asked', () => {
    const series = bullishBreakSeries();
    const last = series[5];
    if (!last) throw new Error('series too short');

    const zone = findOriginZone(bufferOf(series), breakEvent('bullish', 1, 105, last, 5), {
      originCandle: 'last_opposite',
      originCandleCount: 2,
      zoneSource: 'wick',
    });

    expect(zone?.zoneHigh).toBe(104.8);
    expect(zone?.zoneLow).toBe(100);
    expect(zone?.originIndex).toBe(3);
  });

  it('uses the body when configured', () => {
    const series = bullishBreakSeries();
    const last = series[5];
    if (!last) throw new Error('series too short');

    const zone = findOriginZone(bufferOf(series), breakEvent('bullish', 1, 105, last, 5), {
      originCandle: 'last_opposite',
      originCandleCount: 1,
      zoneSource: 'body',
    });

    expect(zone?.zoneHigh).toBe(102.5);
    expect(zone?.zoneLow).toBe(100.8);
  });

  it('falls back to the wick for a doji and refuses a flat candle', () => {
    expect(zoneBounds([candle(0, 100, 101, 99, 100)], 'body')).toEqual({ high: 101, low: 99 });
    expect(zoneBounds([candle(0, 100, 100, 100, 100)], 'wick')).toBeNull();
  });
});

describe('OrderBlockTracker', () => {
  it('creates a fresh block from a structure event', () => {
    const { tracker } = seeded();
    const [block] = tracker.getLive();

    expect(block).toMatchObject({
      id: 1,
      direction: 'bullish',
      kind: 'fresh',
      status: 'armed',
      zoneHigh: 104,
      zoneLow: 100,
      createdIndex: 5,
      sourceEvent: 'choch',
      swingIndex: 1,
      parentId: null,
    });
  });

  it('moves armed → touched → mitigated', () => {
    const { tracker, buffer } = seeded();

    const touched = step(tracker, buffer, candle(6, 106, 106.2, 101.5, 103));
    expect(touched.map((c) => c.type)).toEqual(['touched']);

    const mitigated = step(tracker, buffer, candle(7, 99, 99.5, 96, 97));
    expect(mitigated.map((c) => c.type)).toEqual(['resolved']);

    const block = tracker.get(1);
    expect(block?.status).toBe('mitigated');
    expect(block?.resolution).toBe('mitigated');
    expect(block?.statusHistory).toEqual(['armed', 'touched', 'mitigated']);
    expect(tracker.getLive()).toHaveLength(0);
  });

  it('needs the whole body through the zone under body mitigation', () => {
    const { tracker, buffer } = seeded();
    step(tracker, buffer, candle(6, 101, 101.5, 96, 97));

    expect(tracker.get(1)?.status).toBe('touched');
  });

  it('mitigates on the close alone under close mitigation', () => {
    const { tracker, buffer } = seeded({ mitigationSource: 'close' });
    step(tracker, buffer, candle(6, 101, 101.5, 96, 97));

    expect(tracker.get(1)?.status).toBe('mitigated');
  });

  it('expires an untouched block after maxZoneAgeCandles', () => {
    const { tracker, buffer } = seeded({ maxZoneAgeCandles: 3 });
    expect(step(tracker, buffer, candle(6, 111, 113, 110, 112))).toEqual([]);
    expect(step(tracker, buffer, candle(7, 112, 114, 111, 113))).toEqual([]);

    const changes = step(tracker, buffer, candle(8, 113, 115, 112, 114));

    expect(changes).toHaveLength(1);
    expect(tracker.get(1)?.status).toBe('invalidated');
    expect(tracker.get(1)?.resolution).toBe('expired');
  });

  it('turns a block broken by an opposite event into a breaker', () => {
    const { tracker, buffer } = seeded();
    const breakCandle = candle(6, 104, 104.2, 97, 98);

    const changes = step(tracker, buffer, breakCandle, breakEvent('bearish', 3, 100, breakCandle, 6));

    expect(changes.map((c) => c.type)).toEqual(['touched', 'resolved', 'breaker_armed', 'created']);

    const parent = tracker.get(1);
    expect(parent?.status).toBe('invalidated');
    expect(parent?.resolution).toBe('structural_break');
    expect(parent?.statusHistory).toEqual(['armed', 'touched', 'invalidated']);

    const breaker = tracker.get(2);
    expect(breaker).toMatchObject({
      direction: 'bearish',
      kind: 'breaker',
      status: 'armed',
      zoneHigh: 104,
      zoneLow: 100,
      parentId: 1,
      createdIndex: 6,
    });

    // The bearish fresh block from the same event does not overlap the breaker
    expect(tracker.get(3)).toMatchObject({ direction: 'bearish', kind: 'fresh', zoneHigh: 107, zoneLow: 104.5 });
    expect(tracker.getLive().map((b) => b.id)).toEqual([2, 3]);
  });

  it('evaluates a breaker from the candle after it was armed', () => {
    const { tracker, buffer } = seeded();
    const breakCandle = candle(6, 104, 104.2, 97, 98);
    step(tracker, buffer, breakCandle, breakEvent('bearish', 3, 100, breakCandle, 6));
    expect(tracker.get(2)?.status).toBe('armed');

    step(tracker, buffer, candle(7, 99, 103, 98.5, 102));

    expect(tracker.get(2)?.status).toBe('touched');
    expect(tracker.get(3)?.status).toBe('armed');
  });

  it('supersedes an older non-overlapping block of the same direction', () => {
    const { tracker, buffer } = seeded();
    step(tracker, buffer, candle(6, 111, 115, 110, 114));
    step(tracker, buffer, candle(7, 114, 114.5, 109, 110));
    const breakCandle = candle(8, 115, 118, 114.8, 117);

    const changes = step(tracker, buffer, breakCandle, breakEvent('bullish', 6, 115, breakCandle, 8, 'bos'));

    expect(changes.map((c) => c.type)).toEqual(['resolved', 'created']);
    expect(tracker.get(1)?.resolution).toBe('superseded');
    expect(tracker.getLive()).toHaveLength(1);
    expect(tracker.get(2)).toMatchObject({ zoneHigh: 114.5, zoneLow: 109, sourceEvent: 'bos' });
  });

  it('merges an overlapping block into the new one', () => {
    const { tracker, buffer } = seeded();
    step(tracker, buffer, candle(6, 111, 113, 108, 112));
    step(tracker, buffer, candle(7, 112, 112.5, 104, 105));
    const breakCandle = candle(8, 105, 116, 104.5, 115);

    const changes = step(tracker, buffer, breakCandle, breakEvent('bullish', 5, 107, breakCandle, 8, 'bos'));

    expect(changes.map((c) => c.type)).toEqual(['resolved', 'created', 'touched']);
    expect(changes[1]?.block).toMatchObject({ id: 2, zoneHigh: 112.5, zoneLow: 100 });
    expect(tracker.get(1)?.resolution).toBe('merged');
    expect(tracker.getLive()).toHaveLength(1);
    expect(tracker.get(2)).toMatchObject({ zoneHigh: 112.5, zoneLow: 100, status: 'touched' });
  });

  it('merges a breaker armed on the same candle into an overlapping new block', () => {
    const { tracker, buffer } = seeded();
    step(tracker, buffer, candle(6, 104, 108, 103, 107.5));
    const breakCandle = candle(7, 107, 107.2, 97, 98);

    const changes = step(tracker, buffer, breakCandle, breakEvent('bearish', 3, 100, breakCandle, 7));

    expect(changes.map((c) => c.type)).toEqual(['resolved', 'breaker_armed', 'resolved', 'created', 'touched']);
    expect(tracker.get(2)).toMatchObject({ kind: 'breaker', status: 'invalidated', resolution: 'merged' });
    expect(changes[3]?.block).toMatchObject({ id: 3, kind: 'fresh', zoneHigh: 108, zoneLow: 100 });
    expect(tracker.getLive().map((b) => [b.id, b.kind, b.direction, b.zoneLow, b.zoneHigh])).toEqual([
      [3, 'fresh', 'bearish', 100, 108],
    ]);
  });

  it('continues numbering from a resumed id', () => {
    const tracker = new OrderBlockTracker();
    tracker.resumeIdsFrom(42);
    const series = bullishBreakSeries();
    const last = series[5];
    if (!last) throw new Error('series too short');

    tracker.onCandle(last, 5, breakEvent('bullish', 1, 105, last, 5), bufferOf(series));

    expect(tracker.getLive().map((b) => b.id)).toEqual([42]);
  });

  it('invalidates a block on request', () => {
    const { tracker } = seeded();
    const changes = tracker.invalidate(1, 'penetrated', T0 + 7 * HOUR);

    expect(changes.map((c) => c.type)).toEqual(['touched', 'resolved']);
    expect(tracker.get(1)?.resolution).toBe('penetrated');
    expect(tracker.invalidate(1, 'penetrated', T0 + 8 * HOUR)).toEqual([]);
  });
});
