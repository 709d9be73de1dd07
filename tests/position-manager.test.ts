import { describe, it, expect } from 'vitest';
import type { Direction, ExitPlan, SizingResult } from '@/types';
import { PositionManager, pnl } from '@/lib/engine/position-manager';

const sizing: SizingResult = {
  kind: 'fresh',
  allocationFraction: 0.4,
  leverage: 20,
  equity: 1000,
  margin: 400,
  notional: 8000,
  size: 80,
  entryPrice: 100,
  liquidationPrice: 95.25,
};

function openPosition(
  manager: PositionManager,
  direction: Direction = 'bullish',
  exit: Partial<ExitPlan> = {},
) {
  const long = direction === 'bullish';
  return manager.open({
    symbol: 'TESTUSDT',
    direction,
    kind: 'fresh',
    orderBlockId: 1,
    candidateId: 1,
    reservationId: 1,
    sizing,
    fillPrice: 100,
    exitPlan: {
      stopPrice: long ? 95 : 105,
      targetPrice: long ? 110 : 90,
      trailingTriggerPct: 0,
      trailingDistancePct: 0.02,
      ...exit,
    },
    openedAt: 1000,
  });
}

describe('PositionManager', () => {
  it('exits at the stop', () => {
    const manager = new PositionManager();
    const position = openPosition(manager);

    expect(manager.onTick(96)).toEqual([]);
    const [action] = manager.onTick(95);
    expect(action).toMatchObject({ type: 'exit', cause: 'stop' });
    expect(manager.get(position.id)?.status).toBe('closing');

    const closed = manager.confirmExit(position.id, 95, 2000);
    expect(closed).toMatchObject({ exitCause: 'stop', outcome: 'loss', realizedPnl: -400, closedAt: 2000 });
    expect(manager.hasOpenPosition()).toBe(false);
  });

  it('exits at the target', () => {
    const manager = new PositionManager();
    const position = openPosition(manager);

    const [action] = manager.onTick(110);
    expect(action).toMatchObject({ type: 'exit', cause: 'target' });

    const closed = manager.confirmExit(position.id, 110, 2000);
    expect(closed?.realizedPnl).toBe(800);
    expect(closed?.outcome).toBe('win');
  });

  it('handles shorts symmetrically', () => {
    const manager = new PositionManager();
    const position = openPosition(manager, 'bearish');

    expect(manager.onTick(104)).toEqual([]);
    const [action] = manager.onTick(90);
    expect(action).toMatchObject({ type: 'exit', cause: 'target' });
    expect(manager.confirmExit(position.id, 90, 2000)?.realizedPnl).toBe(800);
  });

  it('ratchets the trailing stop and exits on it', () => {
    const manager = new PositionManager();
    const position = openPosition(manager, 'bullish', { trailingTriggerPct: 0.05, targetPrice: 120 });

    expect(manager.onTick(104)).toEqual([]);

    const [moved] = manager.onTick(106);
    expect(moved?.type).toBe('stop_moved');
    expect(manager.get(position.id)?.stopPrice).toBeCloseTo(103.88, 9);

    expect(manager.onTick(105)).toEqual([]);
    expect(manager.get(position.id)?.stopPrice).toBeCloseTo(103.88, 9);

    const [exit] = manager.onTick(103.5);
    expect(exit).toMatchObject({ type: 'exit', cause: 'trailing_stop' });
  });

  it('only tightens a short trailing stop', () => {
    const manager = new PositionManager();
    const position = openPosition(manager, 'bearish', { trailingTriggerPct: 0.05, targetPrice: 80 });

    manager.onTick(94);
    const afterFirst = manager.get(position.id)?.stopPrice ?? 0;
    expect(afterFirst).toBeCloseTo(95.88, 9);

    manager.onTick(95);
    expect(manager.get(position.id)?.stopPrice).toBe(afterFirst);
  });

  it('calls an exit at entry breakeven', () => {
    const manager = new PositionManager();
    const position = openPosition(manager);
    manager.forceClose(position.id);

    const closed = manager.confirmExit(position.id, 100, 2000);
    expect(closed).toMatchObject({ exitCause: 'forced', outcome: 'breakeven', realizedPnl: 0 });
  });

  it('force-closes an unreconciled exit at the last price for review', () => {
    const manager = new PositionManager();
    const position = openPosition(manager);
    manager.onTick(97);

    expect(manager.forceClose(position.id)).toMatchObject({ type: 'exit', cause: 'forced' });
    expect(manager.forceClose(position.id)).toBeNull();

    const closed = manager.failExit(position.id, 3000);
    expect(closed).toMatchObject({
      exitCause: 'forced',
      exitPrice: 97,
      realizedPnl: -240,
      outcome: 'loss',
      needsReview: true,
    });
  });

  it('keeps the review flag of a flagged force close', () => {
    const manager = new PositionManager();
    const position = openPosition(manager);
    manager.forceClose(position.id, true);

    expect(manager.confirmExit(position.id, 101, 2000)?.needsReview).toBe(true);
  });

  it('summarizes closed trades', () => {
    const manager = new PositionManager();
    const win = openPosition(manager);
    manager.onTick(110);
    manager.confirmExit(win.id, 110, 2000);
    const loss = openPosition(manager);
    manager.onTick(95);
    manager.confirmExit(loss.id, 95, 3000);

    expect(manager.getStats()).toMatchObject({
      open: 0,
      closed: 2,
      wins: 1,
      losses: 1,
      totalPnl: 400,
      winRate: 0.5,
    });
  });

  it('computes signed PnL', () => {
    expect(pnl('bullish', 100, 105, 2)).toBe(10);
    expect(pnl('bearish', 100, 105, 2)).toBe(-10);
  });
});
