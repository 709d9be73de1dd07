/**
 * Execution types: entry candidates, orders, sizing, positions, alerts
 */

import type { Direction, OrderBlockKind } from './smc';

// ============================================
// Entry Candidates
// ============================================

export type ExecutionMode = 'A' | 'B';

export type EntryState =
  | 'armed'
  | 'waiting_close'
  | 'market_sent'
  | 'limit_placed'
  | 'filled'
  | 'cancelled'
  | 'expired';

export type EntryTerminalReason =
  | 'filled'
  | 'block_resolved'
  | 'timeout'
  | 'rejected'
  | 'insufficient_capital'
  | 'penetrated'
  | 'position_open'
  | 'lane_halted';

export interface EntryCandidate {
  id: number;
  orderBlockId: number;
  symbol: string;
  mode: ExecutionMode;
  direction: Direction;
  kind: OrderBlockKind;
  /** Limit price (Mode B) or triggering close (Mode A, once triggered) */
  entryPrice: number | null;
  penetrationRatio: number;
  state: EntryState;
  createdAt: number;
  createdIndex: number;
  deadline: number | null;
  clientOrderId: string | null;
  reservationId: number | null;
  sizing: SizingResult | null;
  terminalReason: EntryTerminalReason | null;
  fillPrice: number | null;
  /** Mode B: the broker acknowledged the limit */
  limitResting: boolean;
  /** Mode B: a candle traded at the limit while it was resting */
  entryReached: boolean;
}

// ============================================
// Sizing
// ============================================

export interface SizingResult {
  kind: OrderBlockKind;
  allocationFraction: number;
  leverage: number;
  equity: number;
  margin: number;
  notional: number;
  size: number;
  entryPrice: number;
  liquidationPrice: number;
}

export type SizingOutcome =
  | { ok: true; sizing: SizingResult }
  | { ok: false; reason: 'insufficient_capital'; notional: number; minNotional: number };

export interface ExitPlan {
  stopPrice: number;
  targetPrice: number;
  trailingTriggerPct: number;
  trailingDistancePct: number;
}

// ============================================
// Orders
// ============================================

export type OrderSide = 'buy' | 'sell';

export interface MarketOrderRequest {
  symbol: string;
  side: OrderSide;
  size: number;
  clientOrderId: string;
  reduceOnly?: boolean;
}

export interface LimitOrderRequest {
  symbol: string;
  side: OrderSide;
  size: number;
  price: number;
  clientOrderId: string;
}

export interface OrderAck {
  clientOrderId: string;
  orderId: string;
  status: 'filled' | 'open';
  fillPrice?: number;
  filledAt?: number;
}

export interface BrokerFill {
  symbol: string;
  clientOrderId: string;
  orderId: string;
  price: number;
  size: number;
  timestamp: number;
}

export type OrderIntent =
  | {
    type: 'place_market';
    candidateId: number;
    clientOrderId: string;
    side: OrderSide;
    size: number;
  }
  | {
    type: 'place_limit';
    candidateId: number;
    clientOrderId: string;
    side: OrderSide;
    size: number;
    price: number;
  }
  | { type: 'cancel'; candidateId: number; clientOrderId: string };

export type TrackedOrderStatus =
  | 'pending'
  | 'open'
  | 'filled'
  | 'cancelled'
  | 'rejected';

export interface TrackedOrder {
  clientOrderId: string;
  orderId: string | null;
  symbol: string;
  type: 'market' | 'limit';
  side: OrderSide;
  size: number;
  price: number | null;
  status: TrackedOrderStatus;
  attempts: number;
  cancelRequested: boolean;
  createdAt: number;
  updatedAt: number;
  fillPrice: number | null;
  error: string | null;
}

// ============================================
// Positions
// ============================================

export type PositionStatus = 'open' | 'closing' | 'closed';
export type ExitCause = 'target' | 'stop' | 'trailing_stop' | 'forced';
export type TradeOutcome = 'win' | 'loss' | 'breakeven';

export interface TrailingState {
  triggerPct: number;
  distancePct: number;
  active: boolean;
}

export interface Position {
  id: string;
  symbol: string;
  direction: Direction;
  kind: OrderBlockKind;
  orderBlockId: number;
  candidateId: number;
  reservationId: number;
  size: number;
  leverage: number;
  margin: number;
  entryPrice: number;
  stopPrice: number;
  initialStopPrice: number;
  targetPrice: number;
  trailing: TrailingState;
  liquidationPrice: number;
  openedAt: number;
  status: PositionStatus;
  lastPrice: number;
  exitClientOrderId: string | null;
  pendingExitCause: ExitCause | null;
  exitCause: ExitCause | null;
  exitPrice: number | null;
  closedAt: number | null;
  realizedPnl: number | null;
  outcome: TradeOutcome | null;
  needsReview: boolean;
}

// ============================================
// Alerts
// ============================================

export type AlertLevel = 'info' | 'warning' | 'error' | 'critical';

export type AlertEvent =
  | 'zone_created'
  | 'entry_filled'
  | 'position_closed'
  | 'capital_insufficient'
  | 'manual_review'
  | 'lane_halted'
  | 'engine_started'
  | 'engine_stopped'
  | 'error';

export interface EngineAlert {
  level: AlertLevel;
  event: AlertEvent;
  message: string;
  details?: Record<string, unknown>;
  timestamp: number;
}
