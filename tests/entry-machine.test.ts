import { describe, it, expect } from 'vitest';
import type { OrderBlock } from '@/types';
import { EntryMachine, penetrationPrice, type Allocation } from '@/lib/engine/entry-machine';
import { sizePosition } from '@/lib/engine/risk-sizer';
import { candle, makeBlock, symbolConfig } from './fixtures';

const config = symbolConfig({
  penetrationRatio: 0.2,
  modeATimeoutMs: 1000,
  modeBTimeoutMs: 500,
  modeBInvalidationPenetration: 1,
});

function allocation(entryPrice: number, block: OrderBlock): Allocation {
  const outcome = sizePosition({ equity: 1000, kind: block.kind, entryPrice, direction: block.direction }, config);
  if (!outcome.ok) throw new Error('expected sizing');
  return { sizing: outcome.sizing, reservationId: 7 };
}

function machine(mode: 'A' | 'B', block: OrderBlock = makeBlock()): EntryMachine {
  return new EntryMachine({ id: 1, block, symbol: 'TESTUSDT', mode, now: 0, index: 5, config });
}

describe('penetrationPrice', () => {
  it('measures into the zone from the edge price reaches first', () => {
    expect(penetrationPrice({ direction: 'bullish', zoneHigh: 110, zoneLow: 100 }, 0.2)).toBe(108);
    expect(penetrationPrice({ direction: 'bearish', zoneHigh: 110, zoneLow: 100 }, 0.2)).toBe(102);
  });

  it('stays strictly inside the zone', () => {
    expect(() => penetrationPrice({ direction: 'bullish', zoneHigh: 110, zoneLow: 100 }, 0)).toThrow();
    expect(() => penetrationPrice({ direction: 'bullish', zoneHigh: 110, zoneLow: 100 }, 1)).toThrow();
  });
});

describe('Mode B entry', () => {
  it('places a limit at the penetration level', () => {
    const block = makeBlock();
    const m = machine('B', block);
    const intent = m.placeLimit(allocation(108, block), 0);

    expect(m.state).toBe('limit_placed');
    expect(intent).toMatchObject({ type: 'place_limit', side: 'buy', price: 108, candidateId: 1 });
    expect(m.getCandidate().deadline).toBe(500);
    expect(m.getCandidate().reservationId).toBe(7);
  });

  it('cancels at the deadline', () => {
    const block = makeBlock();
    const m = machine('B', block);
    const placed = m.placeLimit(allocation(108, block), 0);

    expect(m.onClock(499)).toEqual([]);
    const intents = m.onClock(500);

    expect(intents).toEqual([{ type: 'cancel', candidateId: 1, clientOrderId: placed.clientOrderId }]);
    expect(m.state).toBe('cancelled');
    expect(m.getCandidate().terminalReason).toBe('timeout');
  });

  it('cancels when the block resolves', () => {
    const block = makeBlock();
    const m = machine('B', block);
    m.placeLimit(allocation(108, block), 0);

    const step = m.onCandle(candle(6, 112, 113, 111, 112.5), 6, { ...block, status: 'mitigated' });

    expect(step.intents).toHaveLength(1);
    expect(step.invalidateBlock).toBe(false);
    expect(m.getCandidate().terminalReason).toBe('block_resolved');
  });

  it('invalidates the block when price runs through the zone before the limit is working', () => {
    const block = makeBlock();
    const m = machine('B', block);
    m.placeLimit(allocation(108, block), 0);

    expect(m.onCandle(candle(5, 105, 106, 99, 105.5), 5, block).intents).toEqual([]);
    expect(m.onCandle(candle(6, 105, 106, 100, 105.5), 6, block).intents).toEqual([]);

    const step = m.onCandle(candle(7, 105, 106, 99, 105.5), 7, block);
    expect(step.invalidateBlock).toBe(true);
    expect(m.state).toBe('cancelled');
    expect(m.getCandidate().terminalReason).toBe('penetrated');
  });

  it('waits for the fill once price traded at the resting limit', () => {
    const block = makeBlock();
    const m = machine('B', block);
    m.placeLimit(allocation(108, block), 0);
    m.onLimitAccepted();

    const reached = m.onCandle(candle(7, 105, 106, 99, 105.5), 7, block);
    expect(reached).toEqual({ intents: [], invalidateBlock: false });
    expect(m.getCandidate()).toMatchObject({ state: 'limit_placed', entryReached: true });

    expect(m.onCandle(candle(8, 100, 101, 95, 96), 8, block).intents).toEqual([]);
    expect(m.onFill(108)).toBe(true);
    expect(m.state).toBe('filled');
  });

  it('fills once and reports late fills', () => {
    const block = makeBlock();
    const filled = machine('B', block);
    filled.placeLimit(allocation(108, block), 0);
    expect(filled.onFill(108)).toBe(true);
    expect(filled.getCandidate().fillPrice).toBe(108);
    expect(filled.onFill(108)).toBe(false);

    const late = machine('B', block);
    late.placeLimit(allocation(108, block), 0);
    late.onClock(500);
    expect(late.onFill(108)).toBe(false);
  });

  it('ends cancelled when the broker rejects the limit', () => {
    const block = makeBlock();
    const m = machine('B', block);
    m.placeLimit(allocation(108, block), 0);
    m.onRejected();

    expect(m.state).toBe('cancelled');
    expect(m.getCandidate().terminalReason).toBe('rejected');
  });

  it('will not drop a candidate with a working order', () => {
    const block = makeBlock();
    const m = machine('B', block);
    m.placeLimit(allocation(108, block), 0);

    expect(() => m.drop('insufficient_capital')).toThrow();
    expect(m.abort('lane_halted')).toHaveLength(1);
    expect(m.getCandidate().terminalReason).toBe('lane_halted');
  });
});

describe('Mode A entry', () => {
  it('triggers on a close beyond the zone after touching it', () => {
    const block = makeBlock();
    const m = machine('A', block);
    m.beginWaiting(0);

    expect(m.checkClose(candle(6, 112, 113, 111, 112.5), block)).toBe('wait');
    expect(m.checkClose(candle(7, 108, 109, 104, 106), block)).toBe('wait');
    expect(m.checkClose(candle(8, 106, 111.5, 105, 111), block)).toBe('trigger');
    expect(m.getCandidate().entryPrice).toBe(111);

    const intent = m.sendMarket(allocation(111, block));
    expect(m.state).toBe('market_sent');
    expect(intent).toMatchObject({ type: 'place_market', side: 'buy' });
  });

  it('triggers a short on a close below a supply zone', () => {
    const block = makeBlock({ direction: 'bearish' });
    const m = machine('A', block);
    m.beginWaiting(0);

    expect(m.checkClose(candle(6, 104, 105, 98.5, 99), block)).toBe('trigger');
  });

  it('expires when the block resolves or the deadline passes', () => {
    const block = makeBlock();
    const resolved = machine('A', block);
    resolved.beginWaiting(0);
    expect(resolved.checkClose(candle(6, 112, 113, 111, 112.5), undefined)).toBe('expired');
    expect(resolved.getCandidate().terminalReason).toBe('block_resolved');

    const timedOut = machine('A', block);
    timedOut.beginWaiting(0);
    expect(timedOut.onClock(1000)).toEqual([]);
    expect(timedOut.state).toBe('expired');
    expect(timedOut.getCandidate().terminalReason).toBe('timeout');
  });

  it('expires without retry when the market order is rejected', () => {
    const block = makeBlock();
    const m = machine('A', block);
    m.beginWaiting(0);
    m.checkClose(candle(8, 106, 111.5, 105, 111), block);
    m.sendMarket(allocation(111, block));
    m.onRejected();

    expect(m.state).toBe('expired');
    expect(m.getCandidate().terminalReason).toBe('rejected');
  });

  it('refuses Mode B transitions', () => {
    const block = makeBlock();
    const m = machine('A', block);
    expect(() => m.placeLimit(allocation(108, block), 0)).toThrow();
  });
});
