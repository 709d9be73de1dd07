/**
 * Entry State Machine — one instance per Entry Candidate.
 *
 * Mode A (close confirmation):
 *   armed → waiting_close → market_sent → filled
 *   waiting_close → expired   (block resolved, deadline, no capital)
 *   market_sent   → expired   (broker rejected/timed out; never retried)
 *
 * Mode B (limit at penetration level):
 *   armed → limit_placed → filled
 *   limit_placed → cancelled  (block resolved, penetrated, deadline, rejected twice)
 *
 * A Mode B zone counts as penetrated only when price went past the
 * invalidation depth without trading at a resting limit. Once the limit has
 * been reached the machine waits for the fill (or the deadline).
 *
 * The machine never talks to the broker. It returns order intents and is
 * advanced by candles, clock ticks and broker confirmations delivered by
 * its lane.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  Candle,
  EntryCandidate,
  EntryState,
  EntryTerminalReason,
  ExecutionMode,
  OrderBlock,
  OrderIntent,
  OrderSide,
  SizingResult,
} from '@/types';
import { isLive } from '@/types/smc';
import type { SymbolConfig } from './config';

export type EntryMachineConfig = Pick<
  SymbolConfig,
  'penetrationRatio' | 'modeATimeoutMs' | 'modeBTimeoutMs' | 'modeBInvalidationPenetration'
>;

export interface Allocation {
  sizing: SizingResult;
  reservationId: number;
}

export type CloseCheck = 'trigger' | 'wait' | 'expired';

export interface CandleStep {
  intents: OrderIntent[];
  /** Zone penetrated past the threshold without a fill */
  invalidateBlock: boolean;
}

const TERMINAL: ReadonlySet<EntryState> = new Set(['filled', 'cancelled', 'expired']);

/**
 * Mode B limit price: `ratio` of the zone depth in from the edge price
 * reaches first (top of a demand zone, bottom of a supply zone).
 */
export function penetrationPrice(
  block: Pick<OrderBlock, 'direction' | 'zoneHigh' | 'zoneLow'>,
  ratio: number,
): number {
  if (!(ratio > 0 && ratio < 1)) {
    throw new Error(`Penetration ratio must be inside (0, 1), got ${ratio}`);
  }
  const depth = block.zoneHigh - block.zoneLow;
  return block.direction === 'bullish'
    ? block.zoneHigh - ratio * depth
    : block.zoneLow + ratio * depth;
}

export class EntryMachine {
  private candidate: EntryCandidate;
  private config: EntryMachineConfig;

  constructor(params: {
    id: number;
    block: OrderBlock;
    symbol: string;
    mode: ExecutionMode;
    now: number;
    index: number;
    config: EntryMachineConfig;
  }) {
    const { block, mode, config } = params;
    this.config = config;
    this.candidate = {
      id: params.id,
      orderBlockId: block.id,
      symbol: params.symbol,
      mode,
      direction: block.direction,
      kind: block.kind,
      entryPrice: mode === 'B' ? penetrationPrice(block, config.penetrationRatio) : null,
      penetrationRatio: config.penetrationRatio,
      state: 'armed',
      createdAt: params.now,
      createdIndex: params.index,
      deadline: null,
      clientOrderId: null,
      reservationId: null,
      sizing: null,
      terminalReason: null,
      fillPrice: null,
      limitResting: false,
      entryReached: false,
    };
  }

  get id(): number {
    return this.candidate.id;
  }

  get state(): EntryState {
    return this.candidate.state;
  }

  get mode(): ExecutionMode {
    return this.candidate.mode;
  }

  getCandidate(): EntryCandidate {
    return { ...this.candidate };
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.candidate.state);
  }

  /** True while an order for this candidate may still be live at the broker */
  hasOrderInFlight(): boolean {
    return this.candidate.state === 'market_sent' || this.candidate.state === 'limit_placed';
  }

  // ============================================
  // Mode A
  // ============================================

  /** Mode A: armed → waiting_close */
  beginWaiting(now: number): void {
    this.expectMode('A');
    this.expectState('armed');
    this.candidate.state = 'waiting_close';
    this.candidate.deadline = now + this.config.modeATimeoutMs;
  }

  /**
   * Mode A check on a closed candle: did it touch the zone and close beyond
   * the zone edge in the trade direction? A resolved block expires the
   * candidate instead.
   */
  checkClose(candle: Candle, block: OrderBlock | undefined): CloseCheck {
    if (this.candidate.state !== 'waiting_close') return 'wait';

    if (!block || !isLive(block)) {
      this.finish('expired', 'block_resolved');
      return 'expired';
    }

    const touched = candle.low <= block.zoneHigh && candle.high >= block.zoneLow;
    const favorable = block.direction === 'bullish'
      ? candle.close > block.zoneHigh
      : candle.close < block.zoneLow;

    if (touched && favorable) {
      this.candidate.entryPrice = candle.close;
      return 'trigger';
    }
    return 'wait';
  }

  /** Mode A: waiting_close → market_sent */
  sendMarket(allocation: Allocation): OrderIntent {
    this.expectState('waiting_close');
    this.attach(allocation);
    this.candidate.state = 'market_sent';

    return {
      type: 'place_market',
      candidateId: this.candidate.id,
      clientOrderId: this.requireClientOrderId(),
      side: this.side(),
      size: allocation.sizing.size,
    };
  }

  // ============================================
  // Mode B
  // ============================================

  /** Mode B: armed → limit_placed, returning the limit order intent */
  placeLimit(allocation: Allocation, now: number): OrderIntent {
    this.expectMode('B');
    this.expectState('armed');
    const price = this.candidate.entryPrice;
    if (price === null) {
      throw new Error(`Candidate ${this.candidate.id} has no limit price`);
    }

    this.attach(allocation);
    this.candidate.state = 'limit_placed';
    this.candidate.deadline = now + this.config.modeBTimeoutMs;

    return {
      type: 'place_limit',
      candidateId: this.candidate.id,
      clientOrderId: this.requireClientOrderId(),
      side: this.side(),
      size: allocation.sizing.size,
      price,
    };
  }

  /** Mode B: the broker accepted the limit and it is working */
  onLimitAccepted(): void {
    if (this.candidate.state === 'limit_placed') this.candidate.limitResting = true;
  }

  /**
   * Mode B candle step: cancel when the block resolved, or when the candle
   * pushed deeper into the zone than the invalidation threshold without
   * ever trading at the resting limit.
   */
  onCandle(candle: Candle, index: number, block: OrderBlock | undefined): CandleStep {
    const idle: CandleStep = { intents: [], invalidateBlock: false };
    if (this.candidate.mode !== 'B' || this.candidate.state !== 'limit_placed') return idle;

    if (!block || !isLive(block)) {
      return { intents: this.cancel('block_resolved'), invalidateBlock: false };
    }

    if (this.candidate.limitResting && this.reachesEntry(candle)) {
      // Fill is on its way
      this.candidate.entryReached = true;
    }
    if (this.candidate.entryReached || index <= this.candidate.createdIndex) return idle;

    if (this.penetrationDepth(candle, block) > this.config.modeBInvalidationPenetration) {
      return { intents: this.cancel('penetrated'), invalidateBlock: true };
    }

    return idle;
  }

  // ============================================
  // Shared transitions
  // ============================================

  /** Deadline check driven by the lane clock */
  onClock(now: number): OrderIntent[] {
    const { deadline, state } = this.candidate;
    if (deadline === null || now < deadline) return [];

    if (state === 'waiting_close') {
      this.finish('expired', 'timeout');
      return [];
    }
    if (state === 'limit_placed') {
      return this.cancel('timeout');
    }
    return [];
  }

  /**
   * Broker fill. Returns false when the candidate was already cancelled or
   * expired, i.e. the fill arrived late and must be flattened by the caller.
   */
  onFill(price: number): boolean {
    if (!this.hasOrderInFlight()) return false;
    this.candidate.fillPrice = price;
    this.finish('filled', 'filled');
    return true;
  }

  /** Broker rejected the entry order (after any retries) */
  onRejected(): void {
    if (this.candidate.state === 'market_sent') {
      this.finish('expired', 'rejected');
    } else if (this.candidate.state === 'limit_placed') {
      this.finish('cancelled', 'rejected');
    }
  }

  /** Drop the candidate before any order was sent */
  drop(reason: EntryTerminalReason): void {
    if (this.isTerminal()) return;
    if (this.hasOrderInFlight()) {
      throw new Error(`Candidate ${this.candidate.id} has an order in flight; cancel it instead`);
    }
    this.finish(this.candidate.mode === 'A' ? 'expired' : 'cancelled', reason);
  }

  /** Cancel any in-flight order and terminate (lane halt/shutdown) */
  abort(reason: EntryTerminalReason): OrderIntent[] {
    if (this.isTerminal()) return [];
    if (this.candidate.state === 'limit_placed') return this.cancel(reason);
    if (this.candidate.state === 'market_sent') return [];
    this.finish(this.candidate.mode === 'A' ? 'expired' : 'cancelled', reason);
    return [];
  }

  // ============================================
  // Helpers
  // ============================================

  private cancel(reason: EntryTerminalReason): OrderIntent[] {
    const clientOrderId = this.candidate.clientOrderId;
    this.finish('cancelled', reason);
    return clientOrderId
      ? [{ type: 'cancel', candidateId: this.candidate.id, clientOrderId }]
      : [];
  }

  private finish(state: 'filled' | 'cancelled' | 'expired', reason: EntryTerminalReason): void {
    this.candidate.state = state;
    this.candidate.terminalReason = reason;
  }

  private attach(allocation: Allocation): void {
    this.candidate.sizing = allocation.sizing;
    this.candidate.reservationId = allocation.reservationId;
    this.candidate.clientOrderId = uuidv4();
  }

  private requireClientOrderId(): string {
    if (!this.candidate.clientOrderId) {
      throw new Error(`Candidate ${this.candidate.id} has no client order id`);
    }
    return this.candidate.clientOrderId;
  }

  private reachesEntry(candle: Candle): boolean {
    const price = this.candidate.entryPrice;
    if (price === null) return false;
    return this.candidate.direction === 'bullish' ? candle.low <= price : candle.high >= price;
  }

  /** Fraction of zone depth reached, measured from the near edge */
  private penetrationDepth(candle: Candle, block: OrderBlock): number {
    const depth = block.zoneHigh - block.zoneLow;
    return block.direction === 'bullish'
      ? (block.zoneHigh - candle.low) / depth
      : (candle.high - block.zoneLow) / depth;
  }

  private side(): OrderSide {
    return this.candidate.direction === 'bullish' ? 'buy' : 'sell';
  }

  private expectMode(mode: ExecutionMode): void {
    if (this.candidate.mode !== mode) {
      throw new Error(`Candidate ${this.candidate.id} is mode ${this.candidate.mode}, expected ${mode}`);
    }
  }

  private expectState(state: EntryState): void {
    if (this.candidate.state !== state) {
      throw new Error(`Candidate ${this.candidate.id} is ${this.candidate.state}, expected ${state}`);
    }
  }
}
