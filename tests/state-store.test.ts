import { describe, it, expect, afterEach } from 'vitest';
import type { Position } from '@/types';
import { MemoryStateStore, SqliteStateStore, type StateStore } from '@/lib/data/state-store';
import { candle, makeBlock } from './fixtures';

function position(overrides: Partial<Position> = {}): Position {
  return {
    id: 'pos-1',
    symbol: 'TESTUSDT',
    direction: 'bullish',
    kind: 'fresh',
    orderBlockId: 1,
    candidateId: 1,
    reservationId: 3,
    size: 80,
    leverage: 20,
    margin: 400,
    entryPrice: 100,
    stopPrice: 95,
    initialStopPrice: 95,
    targetPrice: 110,
    trailing: { triggerPct: 0.01, distancePct: 0.005, active: false },
    liquidationPrice: 95.25,
    openedAt: 1000,
    status: 'open',
    lastPrice: 100,
    exitClientOrderId: null,
    pendingExitCause: null,
    exitCause: null,
    exitPrice: null,
    closedAt: null,
    realizedPnl: null,
    outcome: null,
    needsReview: false,
    ...overrides,
  };
}

const stores: Array<[string, () => StateStore]> = [
  ['MemoryStateStore', () => new MemoryStateStore()],
  ['SqliteStateStore', () => new SqliteStateStore(':memory:')],
];

describe.each(stores)('%s', (_name, create) => {
  let store: StateStore;

  afterEach(async () => {
    await store.close();
  });

  it('caches candles once per timestamp', async () => {
    store = create();
    await store.saveCandles('TESTUSDT', [candle(0, 100, 101, 99, 100.5), candle(1, 100.5, 102, 100, 101)]);
    await store.saveCandles('TESTUSDT', [candle(1, 1, 1, 1, 1), candle(2, 101, 103, 100.5, 102)]);

    const loaded = await store.loadCandles('TESTUSDT', candle(1, 0, 0, 0, 0).timestamp, 10);

    expect(loaded.map((c) => c.close)).toEqual([101, 102]);
    expect(await store.loadCandles('OTHER', 0, 10)).toEqual([]);
  });

  it('keeps the latest state of each order block', async () => {
    store = create();
    await store.saveOrderBlock('TESTUSDT', makeBlock());
    await store.saveOrderBlock('TESTUSDT', makeBlock({ status: 'mitigated', resolution: 'mitigated', resolvedAt: 5000 }));

    const blocks = await store.getOrderBlocks('TESTUSDT');

    expect(blocks).toHaveLength(1);
    expect(blocks[0]).toMatchObject({ id: 1, status: 'mitigated', resolution: 'mitigated', resolvedAt: 5000 });
  });

  it('rewrites every column when a block id is saved again', async () => {
    store = create();
    await store.saveOrderBlock('TESTUSDT', makeBlock());
    await store.saveOrderBlock('TESTUSDT', makeBlock({
      direction: 'bearish',
      kind: 'breaker',
      zoneHigh: 120,
      zoneLow: 115,
      createdAt: 9000,
      sourceEvent: 'bos',
      parentId: 7,
    }));

    const [block] = await store.getOrderBlocks('TESTUSDT');

    expect(block).toMatchObject({
      id: 1,
      direction: 'bearish',
      kind: 'breaker',
      zoneHigh: 120,
      zoneLow: 115,
      createdAt: 9000,
      sourceEvent: 'bos',
      parentId: 7,
    });
  });

  it('hands out block ids past those already stored', async () => {
    store = create();
    expect(await store.nextOrderBlockId('TESTUSDT')).toBe(1);

    await store.saveOrderBlock('TESTUSDT', makeBlock({ id: 1 }));
    await store.saveOrderBlock('TESTUSDT', makeBlock({ id: 4 }));
    await store.saveOrderBlock('OTHER', makeBlock({ id: 9 }));

    expect(await store.nextOrderBlockId('TESTUSDT')).toBe(5);
    expect(await store.nextOrderBlockId('OTHER')).toBe(10);
  });

  it('round-trips open positions without the reservation', async () => {
    store = create();
    await store.savePosition(position({ trailing: { triggerPct: 0.01, distancePct: 0.005, active: true } }));

    const [loaded] = await store.loadOpenPositions('TESTUSDT');

    expect(loaded).toEqual({ ...withoutReservation(position()), trailing: { triggerPct: 0.01, distancePct: 0.005, active: true } });
  });

  it('moves a closed position out of the open set', async () => {
    store = create();
    await store.savePosition(position());
    await store.savePosition(position({
      status: 'closed',
      exitCause: 'target',
      exitPrice: 110,
      closedAt: 2000,
      realizedPnl: 800,
      outcome: 'win',
      needsReview: true,
    }));

    expect(await store.loadOpenPositions('TESTUSDT')).toEqual([]);
    const [closed] = await store.getClosedPositions('TESTUSDT');
    expect(closed).toMatchObject({ exitCause: 'target', realizedPnl: 800, outcome: 'win', needsReview: true });
  });

  it('overwrites the ledger snapshot', async () => {
    store = create();
    expect(await store.loadLedger()).toBeNull();

    await store.saveLedger({ equity: 1000, peakEquity: 1000, updatedAt: 1 });
    await store.saveLedger({ equity: 950, peakEquity: 1000, updatedAt: 2 });

    expect(await store.loadLedger()).toEqual({ equity: 950, peakEquity: 1000, updatedAt: 2 });
  });
});

function withoutReservation(p: Position): Omit<Position, 'reservationId'> {
  const { reservationId: _reservationId, ...rest } = p;
  return rest;
}
