/**
 * Position Manager
 *
 * Owns the open positions of one lane from fill to close:
 * - Stop and target checked on every price tick (stop first)
 * - Trailing stop ratchets once profit reaches the trigger; it only tightens
 * - Exits go out as market closes; the broker's fill closes the position
 * - An exit the broker cannot reconcile is force-closed at the last known
 *   price and flagged for manual review
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  Direction,
  ExitCause,
  ExitPlan,
  OrderBlockKind,
  Position,
  SizingResult,
  TradeOutcome,
} from '@/types';

export interface OpenPositionParams {
  symbol: string;
  direction: Direction;
  kind: OrderBlockKind;
  orderBlockId: number;
  candidateId: number;
  reservationId: number;
  sizing: SizingResult;
  fillPrice: number;
  exitPlan: ExitPlan;
  openedAt: number;
}

export type PositionAction =
  | { type: 'exit'; position: Position; cause: ExitCause; clientOrderId: string }
  | { type: 'stop_moved'; position: Position; previousStop: number; newStop: number };

export interface PositionStats {
  open: number;
  closed: number;
  wins: number;
  losses: number;
  breakevens: number;
  forced: number;
  totalPnl: number;
  winRate: number;
}

/** Relative price difference treated as a flat exit */
const BREAKEVEN_TOLERANCE = 1e-9;
const MAX_CLOSED_HISTORY = 200;

export class PositionManager {
  private positions = new Map<string, Position>();
  private closed: Position[] = [];

  /**
   * Take ownership of a freshly filled entry.
   */
  open(params: OpenPositionParams): Position {
    const { exitPlan, sizing } = params;
    const position: Position = {
      id: uuidv4(),
      symbol: params.symbol,
      direction: params.direction,
      kind: params.kind,
      orderBlockId: params.orderBlockId,
      candidateId: params.candidateId,
      reservationId: params.reservationId,
      size: sizing.size,
      leverage: sizing.leverage,
      margin: sizing.margin,
      entryPrice: params.fillPrice,
      stopPrice: exitPlan.stopPrice,
      initialStopPrice: exitPlan.stopPrice,
      targetPrice: exitPlan.targetPrice,
      trailing: {
        triggerPct: exitPlan.trailingTriggerPct,
        distancePct: exitPlan.trailingDistancePct,
        active: false,
      },
      liquidationPrice: sizing.liquidationPrice,
      openedAt: params.openedAt,
      status: 'open',
      lastPrice: params.fillPrice,
      exitClientOrderId: null,
      pendingExitCause: null,
      exitCause: null,
      exitPrice: null,
      closedAt: null,
      realizedPnl: null,
      outcome: null,
      needsReview: false,
    };

    this.positions.set(position.id, position);
    return { ...position };
  }

  /** Re-adopt a position loaded from persistent state */
  restore(position: Position): void {
    this.positions.set(position.id, { ...position, trailing: { ...position.trailing } });
  }

  /**
   * Evaluate every open position against a price tick.
   */
  onTick(price: number): PositionAction[] {
    const actions: PositionAction[] = [];

    for (const position of this.positions.values()) {
      position.lastPrice = price;
      if (position.status !== 'open') continue;

      const cause = this.checkExit(position, price);
      if (cause) {
        actions.push(this.beginExit(position, cause));
        continue;
      }

      const moved = this.updateTrailingStop(position, price);
      if (moved) actions.push(moved);
    }

    return actions;
  }

  /**
   * Externally triggered exit (manual close, late fill, shutdown).
   * Returns null when the position is unknown or already exiting.
   */
  forceClose(positionId: string, flagForReview = false): PositionAction | null {
    const position = this.positions.get(positionId);
    if (!position || position.status !== 'open') return null;
    if (flagForReview) position.needsReview = true;
    return this.beginExit(position, 'forced');
  }

  /** Broker confirmed the exit fill */
  confirmExit(positionId: string, exitPrice: number, timestamp: number): Position | null {
    const position = this.positions.get(positionId);
    if (!position || position.status !== 'closing') return null;
    return this.close(position, position.pendingExitCause ?? 'forced', exitPrice, timestamp, false);
  }

  /**
   * Exit order could not be reconciled: close at the last known price as
   * FORCED and flag for review.
   */
  failExit(positionId: string, timestamp: number): Position | null {
    const position = this.positions.get(positionId);
    if (!position || position.status === 'closed') return null;
    return this.close(position, 'forced', position.lastPrice, timestamp, true);
  }

  get(positionId: string): Position | undefined {
    const position = this.positions.get(positionId);
    return position ? { ...position, trailing: { ...position.trailing } } : undefined;
  }

  getOpen(): Position[] {
    return [...this.positions.values()].map((p) => ({ ...p, trailing: { ...p.trailing } }));
  }

  getClosed(): Position[] {
    return this.closed.map((p) => ({ ...p }));
  }

  hasOpenPosition(): boolean {
    return this.positions.size > 0;
  }

  getStats(): PositionStats {
    let wins = 0;
    let losses = 0;
    let breakevens = 0;
    let forced = 0;
    let totalPnl = 0;

    for (const p of this.closed) {
      if (p.outcome === 'win') wins++;
      else if (p.outcome === 'loss') losses++;
      else breakevens++;
      if (p.exitCause === 'forced') forced++;
      totalPnl += p.realizedPnl ?? 0;
    }

    const decided = wins + losses;
    return {
      open: this.positions.size,
      closed: this.closed.length,
      wins,
      losses,
      breakevens,
      forced,
      totalPnl,
      winRate: decided > 0 ? wins / decided : 0,
    };
  }

  // ============================================
  // Private Helpers
  // ============================================

  private checkExit(position: Position, price: number): ExitCause | null {
    const long = position.direction === 'bullish';
    const stopHit = long ? price <= position.stopPrice : price >= position.stopPrice;
    if (stopHit) {
      return position.stopPrice !== position.initialStopPrice ? 'trailing_stop' : 'stop';
    }

    const targetHit = long ? price >= position.targetPrice : price <= position.targetPrice;
    return targetHit ? 'target' : null;
  }

  private updateTrailingStop(position: Position, price: number): PositionAction | null {
    const { trailing } = position;
    if (trailing.triggerPct <= 0) return null;

    const long = position.direction === 'bullish';
    const profitPct = long
      ? (price - position.entryPrice) / position.entryPrice
      : (position.entryPrice - price) / position.entryPrice;

    if (!trailing.active && profitPct < trailing.triggerPct) return null;
    trailing.active = true;

    const candidate = long
      ? price * (1 - trailing.distancePct)
      : price * (1 + trailing.distancePct);

    // Only tighten
    const improved = long ? candidate > position.stopPrice : candidate < position.stopPrice;
    if (!improved) return null;

    const previousStop = position.stopPrice;
    position.stopPrice = candidate;
    return { type: 'stop_moved', position: { ...position }, previousStop, newStop: candidate };
  }

  private beginExit(position: Position, cause: ExitCause): PositionAction {
    const clientOrderId = uuidv4();
    position.status = 'closing';
    position.pendingExitCause = cause;
    position.exitClientOrderId = clientOrderId;
    return { type: 'exit', position: { ...position }, cause, clientOrderId };
  }

  private close(
    position: Position,
    cause: ExitCause,
    exitPrice: number,
    timestamp: number,
    needsReview: boolean,
  ): Position {
    const realizedPnl = pnl(position.direction, position.entryPrice, exitPrice, position.size);

    position.status = 'closed';
    position.exitCause = cause;
    position.exitPrice = exitPrice;
    position.closedAt = timestamp;
    position.realizedPnl = realizedPnl;
    position.outcome = outcomeOf(position.entryPrice, exitPrice, realizedPnl);
    position.needsReview = position.needsReview || needsReview;
    position.pendingExitCause = null;

    this.positions.delete(position.id);
    this.closed.push(position);
    if (this.closed.length > MAX_CLOSED_HISTORY) this.closed.shift();

    return { ...position };
  }
}

export function pnl(direction: Direction, entry: number, exit: number, size: number): number {
  return direction === 'bullish' ? (exit - entry) * size : (entry - exit) * size;
}

function outcomeOf(entry: number, exit: number, realizedPnl: number): TradeOutcome {
  if (Math.abs(exit - entry) <= entry * BREAKEVEN_TOLERANCE) return 'breakeven';
  return realizedPnl > 0 ? 'win' : 'loss';
}
