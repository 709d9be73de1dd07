/**
 * Capital Ledger — account-level equity shared by every symbol lane.
 *
 * Sizing reads the unreserved equity and reserves the resulting margin in
 * the same synchronous call. Nothing in reserve() awaits, so two lanes
 * cannot size against the same free equity.
 */

import type { SizingOutcome, SizingResult } from '@/types';
import { sizePosition, type RiskSizingConfig, type SizingInput } from './risk-sizer';

export interface Reservation {
  id: number;
  owner: string;
  amount: number;
  createdAt: number;
}

export type ReserveOutcome =
  | { ok: true; reservationId: number; sizing: SizingResult }
  | Extract<SizingOutcome, { ok: false }>;

export interface LedgerSnapshot {
  equity: number;
  peakEquity: number;
  reserved: number;
  available: number;
  reservations: number;
}

export class CapitalLedger {
  private equity: number;
  private peakEquity: number;
  private reservations = new Map<number, Reservation>();
  private nextId = 1;

  constructor(initialEquity: number) {
    if (!(initialEquity >= 0)) {
      throw new Error(`Initial equity must be non-negative, got ${initialEquity}`);
    }
    this.equity = initialEquity;
    this.peakEquity = initialEquity;
  }

  /**
   * Size a position against free equity and reserve its margin.
   */
  reserve(
    owner: string,
    input: Omit<SizingInput, 'equity'>,
    config: RiskSizingConfig,
    now = Date.now(),
  ): ReserveOutcome {
    const outcome = sizePosition({ ...input, equity: this.getAvailable() }, config);
    if (!outcome.ok) return outcome;

    const reservation: Reservation = {
      id: this.nextId++,
      owner,
      amount: outcome.sizing.margin,
      createdAt: now,
    };
    this.reservations.set(reservation.id, reservation);

    return { ok: true, reservationId: reservation.id, sizing: outcome.sizing };
  }

  /** Reserve a known margin, e.g. for a position restored after restart */
  hold(owner: string, amount: number, now = Date.now()): number {
    const reservation: Reservation = { id: this.nextId++, owner, amount, createdAt: now };
    this.reservations.set(reservation.id, reservation);
    return reservation.id;
  }

  /** Return a reservation's margin to the free pool (order cancelled/rejected) */
  release(reservationId: number): boolean {
    return this.reservations.delete(reservationId);
  }

  /** Close out a reservation with the realized PnL of its position */
  settle(reservationId: number, realizedPnl: number): void {
    this.reservations.delete(reservationId);
    this.equity += realizedPnl;
    if (this.equity > this.peakEquity) this.peakEquity = this.equity;
  }

  getEquity(): number {
    return this.equity;
  }

  getReserved(): number {
    let total = 0;
    for (const r of this.reservations.values()) total += r.amount;
    return total;
  }

  getAvailable(): number {
    return Math.max(0, this.equity - this.getReserved());
  }

  getDrawdown(): number {
    if (this.peakEquity <= 0) return 0;
    return (this.peakEquity - this.equity) / this.peakEquity;
  }

  getReservation(id: number): Reservation | undefined {
    return this.reservations.get(id);
  }

  snapshot(): LedgerSnapshot {
    return {
      equity: this.equity,
      peakEquity: this.peakEquity,
      reserved: this.getReserved(),
      available: this.getAvailable(),
      reservations: this.reservations.size,
    };
  }

  /** Restore equity from persisted state (reservations are not carried over) */
  restore(equity: number, peakEquity: number): void {
    this.equity = equity;
    this.peakEquity = Math.max(equity, peakEquity);
  }
}
