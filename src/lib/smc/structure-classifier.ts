/**
 * Structure Classification
 * Labels each closed candle as NONE, BOS or CHoCH against the last confirmed swings.
 *
 * - BOS: close strictly beyond the last swing in the direction of the trend.
 * - CHoCH: close strictly beyond the last swing against the trend; trend flips.
 *   With no trend yet, the first break is a CHoCH and sets it.
 *
 * A broken swing is consumed, so the same level never breaks twice.
 */

import type {
  Candle,
  StructureEvent,
  StructureState,
  SwingPoint,
  Trend,
  Direction,
} from '@/types';
import { StructureCorruptionError } from '@/lib/errors';

const MAX_EVENT_HISTORY = 50;

export class StructureClassifier {
  private state: StructureState = {
    trend: 'undetermined',
    lastConfirmedHigh: null,
    lastConfirmedLow: null,
  };
  private lastSwingIndex: Record<'high' | 'low', number> = { high: -1, low: -1 };
  private lastClassifiedIndex = -1;
  private events: StructureEvent[] = [];

  /** Register a newly confirmed swing as the level to watch */
  onSwing(swing: SwingPoint): void {
    if (swing.index <= this.lastSwingIndex[swing.kind]) {
      throw new StructureCorruptionError(
        `Swing ${swing.kind} at ${swing.index} confirmed after ${this.lastSwingIndex[swing.kind]}`,
      );
    }
    this.lastSwingIndex[swing.kind] = swing.index;

    if (swing.kind === 'high') {
      this.state.lastConfirmedHigh = swing;
    } else {
      this.state.lastConfirmedLow = swing;
    }
  }

  /**
   * Classify a closed candle. Returns the structure event it produced, or
   * null. At most one event per candle; when a candle closes beyond both
   * levels the high is evaluated first and the low stays for later candles.
   */
  classify(candle: Candle, index: number): StructureEvent | null {
    if (index <= this.lastClassifiedIndex) {
      throw new StructureCorruptionError(
        `Candle ${index} classified after ${this.lastClassifiedIndex}`,
      );
    }
    this.lastClassifiedIndex = index;

    const { lastConfirmedHigh: high, lastConfirmedLow: low } = this.state;

    if (high && high.index < index && candle.close > high.price) {
      this.state.lastConfirmedHigh = null;
      return this.record(candle, index, high, 'bullish');
    }

    if (low && low.index < index && candle.close < low.price) {
      this.state.lastConfirmedLow = null;
      return this.record(candle, index, low, 'bearish');
    }

    return null;
  }

  getState(): StructureState {
    return { ...this.state };
  }

  getTrend(): Trend {
    return this.state.trend;
  }

  getEvents(): readonly StructureEvent[] {
    return this.events;
  }

  private record(
    candle: Candle,
    index: number,
    brokenSwing: SwingPoint,
    direction: Direction,
  ): StructureEvent {
    const previousTrend = this.state.trend;
    const type = previousTrend === direction ? 'bos' : 'choch';
    const nextTrend: Direction = direction;

    assertTrendTransition(previousTrend, nextTrend, type);
    this.state.trend = nextTrend;

    const event: StructureEvent = {
      type,
      direction,
      brokenSwing,
      index,
      timestamp: candle.timestamp,
      closePrice: candle.close,
      previousTrend,
      trend: nextTrend,
    };

    this.events.push(event);
    if (this.events.length > MAX_EVENT_HISTORY) this.events.shift();

    return event;
  }
}

function assertTrendTransition(previous: Trend, next: Trend, type: 'bos' | 'choch'): void {
  if (type === 'bos' && previous !== next) {
    throw new StructureCorruptionError(`BOS changed trend ${previous} -> ${next}`);
  }
  if (type === 'choch' && previous === next) {
    throw new StructureCorruptionError(`CHoCH kept trend ${previous}`);
  }
}
