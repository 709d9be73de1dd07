/**
 * Symbol Lane — everything the engine does for one symbol.
 *
 * Every input (closed candle, price tick, clock tick, broker callback) is
 * queued and processed in arrival order. Per closed candle:
 *   1. Validate and append to the buffer (bad candles are skipped)
 *   2. Confirm swings, classify structure, update order blocks
 *   3. Spawn entry candidates for new live blocks
 *   4. Advance every candidate against the candle
 *
 * Broker calls never block the queue. Their results come back as new queue
 * entries, so the lane is the only writer of its own state.
 */

import type {
  BrokerFill,
  Candle,
  EntryCandidate,
  EntryTerminalReason,
  OrderBlock,
  OrderBlockChange,
  OrderIntent,
  Position,
  StructureState,
  Tick,
} from '@/types';
import {
  BrokerError,
  DataIntegrityError,
  StructureCorruptionError,
  errorMessage,
} from '@/lib/errors';
import { isLive } from '@/types/smc';
import { CandleBuffer } from '@/lib/smc/candle-buffer';
import { validateTick } from '@/lib/smc/candle-validator';
import { SwingDetector } from '@/lib/smc/swing-detector';
import { StructureClassifier } from '@/lib/smc/structure-classifier';
import { OrderBlockTracker } from '@/lib/smc/order-block-tracker';
import type { StateStore, StoredPosition } from '@/lib/data/state-store';
import type { Broker } from './broker';
import type { CapitalLedger } from './capital-ledger';
import type { SymbolConfig } from './config';
import type { Notifier } from './alerts';
import { EntryMachine, type Allocation } from './entry-machine';
import { OrderManager, type MarketFill } from './order-manager';
import { PositionManager, type PositionAction, type PositionStats } from './position-manager';
import { buildExitPlan } from './risk-sizer';
import { SerialQueue } from './serial-queue';

export interface SymbolLaneOptions {
  config: SymbolConfig;
  ledger: CapitalLedger;
  broker: Broker;
  notifier: Notifier;
  store?: StateStore;
  verbose?: boolean;
  /** Broker request deadline */
  requestTimeoutMs?: number;
}

export interface LaneStatus {
  symbol: string;
  halted: boolean;
  haltReason: string | null;
  candles: number;
  structure: StructureState;
  liveBlocks: number;
  activeCandidates: number;
  openPositions: number;
  positions: PositionStats;
}

type Zone = Pick<OrderBlock, 'direction' | 'zoneHigh' | 'zoneLow'>;

interface TrackedCandidate {
  machine: EntryMachine;
  /** Zone at spawn time; the exit plan is built from it on fill */
  zone: Zone;
}

const MAX_FINISHED_CANDIDATES = 200;

export class SymbolLane {
  readonly symbol: string;
  private config: SymbolConfig;
  private ledger: CapitalLedger;
  private notifier: Notifier;
  private store: StateStore | undefined;
  private verbose: boolean;

  private buffer: CandleBuffer;
  private swings: SwingDetector;
  private classifier: StructureClassifier;
  private tracker: OrderBlockTracker;
  private orders: OrderManager;
  private positions = new PositionManager();
  private queue: SerialQueue;

  private candidates = new Map<number, TrackedCandidate>();
  private finished: number[] = [];
  private byClientOrderId = new Map<string, number>();
  /** Latest candidate spawned for each block */
  private blockCandidates = new Map<number, EntryMachine>();
  private nextCandidateId = 1;
  private inflight = new Set<Promise<void>>();
  private lastTickTimestamp: number | null = null;
  private lastEventTime = 0;
  private halted = false;
  private haltReason: string | null = null;

  constructor(options: SymbolLaneOptions) {
    const { config } = options;
    this.symbol = config.symbol;
    this.config = config;
    this.ledger = options.ledger;
    this.notifier = options.notifier;
    this.store = options.store;
    this.verbose = options.verbose ?? false;

    this.buffer = new CandleBuffer({ maxCandles: config.maxCandles, intervalMs: config.intervalMs });
    this.swings = new SwingDetector({ confirmationBars: config.swingConfirmationBars });
    this.classifier = new StructureClassifier();
    this.tracker = new OrderBlockTracker({
      maxZoneAgeCandles: config.maxZoneAgeCandles,
      mitigationSource: config.mitigationSource,
      zoneSource: config.zoneSource,
      originCandle: config.originCandle,
      originCandleCount: config.originCandleCount,
    });
    this.orders = new OrderManager(options.broker, {
      symbol: config.symbol,
      limitRetryBackoffMs: config.limitRetryBackoffMs,
      requestTimeoutMs: options.requestTimeoutMs ?? 10_000,
      verbose: this.verbose,
    }, () => this.lastEventTime || Date.now());
    this.queue = new SerialQueue((err) => this.onTaskError(err));
  }

  // ============================================
  // Inputs (all serialized)
  // ============================================

  /** Closed candle. `closeTime` drives candidate deadlines. */
  onCandle(candle: Candle, closeTime = candle.timestamp + this.config.intervalMs): Promise<void> {
    return this.queue.push(() => this.processCandle(candle, closeTime));
  }

  /**
   * Feed historic candles: structure and order blocks are built, but no
   * candidates are spawned for them until the next live candle.
   */
  warmUp(candles: Candle[]): Promise<void> {
    return this.queue.push(() => {
      for (const candle of candles) {
        this.processCandle(candle, candle.timestamp + this.config.intervalMs, false);
      }
      console.log(
        `[SymbolLane:${this.symbol}] Warmed up on ${candles.length} candles, ${this.tracker.getLive().length} live block(s)`,
      );
    });
  }

  onTick(tick: Tick): Promise<void> {
    return this.queue.push(() => this.processTick(tick));
  }

  /** Lane clock: enforces Mode A / Mode B deadlines */
  onClock(now: number): Promise<void> {
    return this.queue.push(() => this.processClock(now));
  }

  /** Asynchronous limit fill delivered by the broker */
  onFill(fill: BrokerFill): Promise<void> {
    return this.queue.push(() => this.processFill(fill));
  }

  forceClose(positionId: string): Promise<void> {
    return this.queue.push(() => {
      const action = this.positions.forceClose(positionId);
      if (action) this.handlePositionAction(action);
    });
  }

  /** Re-adopt positions persisted by a previous run */
  restorePositions(stored: StoredPosition[]): Promise<void> {
    return this.queue.push(() => {
      for (const position of stored) {
        const reservationId = this.ledger.hold(`${this.symbol}:restored`, position.margin, position.openedAt);
        this.positions.restore({
          ...position,
          status: 'open',
          pendingExitCause: null,
          exitClientOrderId: null,
          reservationId,
        });
        console.log(
          `[SymbolLane:${this.symbol}] Resumed ${position.direction} position ${position.id} @ ${position.entryPrice}`,
        );
      }
    });
  }

  /** Continue block numbering after blocks persisted by an earlier run */
  resumeBlockIds(nextId: number): void {
    this.tracker.resumeIdsFrom(nextId);
  }

  /** Cancel working orders and stop accepting input */
  stop(reason: EntryTerminalReason = 'lane_halted'): Promise<void> {
    return this.queue.push(() => {
      this.abortCandidates(reason);
      this.halted = true;
      if (this.haltReason === null) this.haltReason = 'stopped';
    });
  }

  /** Resolves once the queue and every outstanding broker call have settled */
  async idle(): Promise<void> {
    await this.queue.drain();
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
      await this.queue.drain();
    }
  }

  // ============================================
  // Inspection
  // ============================================

  isHalted(): boolean {
    return this.halted;
  }

  getStatus(): LaneStatus {
    return {
      symbol: this.symbol,
      halted: this.halted,
      haltReason: this.haltReason,
      candles: this.buffer.size,
      structure: this.classifier.getState(),
      liveBlocks: this.tracker.getLive().length,
      activeCandidates: this.getActiveCandidates().length,
      openPositions: this.positions.getOpen().length,
      positions: this.positions.getStats(),
    };
  }

  getLiveBlocks(): OrderBlock[] {
    return this.tracker.getLive();
  }

  getBlock(id: number): OrderBlock | undefined {
    return this.tracker.get(id);
  }

  getArchivedBlocks(): OrderBlock[] {
    return this.tracker.getArchive();
  }

  getCandidates(): EntryCandidate[] {
    return [...this.candidates.values()].map((c) => c.machine.getCandidate());
  }

  getActiveCandidates(): EntryCandidate[] {
    return this.getCandidates().filter((c) => !isTerminalState(c));
  }

  getOpenPositions(): Position[] {
    return this.positions.getOpen();
  }

  getClosedPositions(): Position[] {
    return this.positions.getClosed();
  }

  getStructure(): StructureState {
    return this.classifier.getState();
  }

  // ============================================
  // Candle pipeline
  // ============================================

  private processCandle(candle: Candle, closeTime: number, trade = true): void {
    if (this.halted) return;
    this.lastEventTime = closeTime;

    let index: number;
    try {
      const appended = this.buffer.append(candle);
      index = appended.index;
      if (appended.gap) {
        console.warn(
          `[SymbolLane:${this.symbol}] Gap of ${appended.gap.missingCandles} candle(s) before ${new Date(candle.timestamp).toISOString()}`,
        );
      }
    } catch (err) {
      if (err instanceof DataIntegrityError) {
        console.warn(`[SymbolLane:${this.symbol}] Skipped candle (${err.field}): ${err.message}`);
        return;
      }
      throw err;
    }

    const changes = this.updateStructure(candle, index);
    if (!changes) return;
    this.applyBlockChanges(changes, trade);
    if (!trade) return;

    this.spawnCandidates(closeTime, index);
    this.advanceCandidates(candle, index, closeTime);
  }

  /** Returns null when the lane halted on corrupted structure */
  private updateStructure(candle: Candle, index: number): OrderBlockChange[] | null {
    try {
      for (const swing of this.swings.update(this.buffer)) {
        this.classifier.onSwing(swing);
        if (this.verbose) {
          console.log(`[SymbolLane:${this.symbol}] Swing ${swing.kind} @ ${swing.price} (#${swing.index})`);
        }
      }

      const event = this.classifier.classify(candle, index);
      if (event && this.verbose) {
        console.log(
          `[SymbolLane:${this.symbol}] ${event.type.toUpperCase()} ${event.direction} ` +
            `through ${event.brokenSwing.price} (close ${event.closePrice}), trend ${event.previousTrend} -> ${event.trend}`,
        );
      }

      return this.tracker.onCandle(candle, index, event, this.buffer);
    } catch (err) {
      if (err instanceof StructureCorruptionError) {
        this.halt(err.message);
        return null;
      }
      throw err;
    }
  }

  private applyBlockChanges(changes: OrderBlockChange[], announce = true): void {
    for (const change of changes) {
      this.persist(this.store?.saveOrderBlock(this.symbol, change.block));

      switch (change.type) {
        case 'created':
        case 'breaker_armed':
          // A breaker merged away on the candle that armed it is not announced
          if (!announce || !this.isLiveBlock(change.block.id)) break;
          console.log(
            `[SymbolLane:${this.symbol}] ${change.block.kind.toUpperCase()} ${change.block.direction} block #${change.block.id} ` +
              `[${change.block.zoneLow}, ${change.block.zoneHigh}]` +
              (change.type === 'breaker_armed' ? ` from #${change.parent.id}` : ''),
          );
          this.notify(this.notifier.zoneCreated(this.symbol, change.block));
          break;
        case 'touched':
          if (this.verbose) console.log(`[SymbolLane:${this.symbol}] Block #${change.block.id} touched`);
          break;
        case 'resolved':
          if (this.verbose) {
            console.log(
              `[SymbolLane:${this.symbol}] Block #${change.block.id} ${change.block.status} (${change.block.resolution ?? 'n/a'})`,
            );
          }
          break;
      }
    }
  }

  private isLiveBlock(id: number): boolean {
    const block = this.tracker.get(id);
    return block !== undefined && isLive(block);
  }

  private spawnCandidates(now: number, index: number): void {
    if (this.positions.hasOpenPosition()) return;

    const live = this.tracker.getLive();
    for (const id of this.blockCandidates.keys()) {
      if (!live.some((b) => b.id === id)) this.blockCandidates.delete(id);
    }

    for (const block of live) {
      const previous = this.blockCandidates.get(block.id);
      if (previous && !canRespawn(previous.getCandidate())) continue;

      const machine = new EntryMachine({
        id: this.nextCandidateId++,
        block,
        symbol: this.symbol,
        mode: this.config.executionMode,
        now,
        index,
        config: this.config,
      });
      this.candidates.set(machine.id, { machine, zone: zoneOf(block) });
      this.blockCandidates.set(block.id, machine);

      if (machine.mode === 'A') {
        machine.beginWaiting(now);
        if (this.verbose) {
          console.log(`[SymbolLane:${this.symbol}] Candidate #${machine.id} waiting for close on block #${block.id}`);
        }
        continue;
      }

      const candidate = machine.getCandidate();
      if (candidate.entryPrice === null) continue;
      const allocation = this.reserve(machine, block, candidate.entryPrice, now);
      if (!allocation) continue;

      this.registerOrder(machine, machine.placeLimit(allocation, now));
    }
  }

  private advanceCandidates(candle: Candle, index: number, now: number): void {
    for (const { machine } of this.candidates.values()) {
      if (machine.isTerminal()) continue;
      const candidate = machine.getCandidate();
      const block = this.tracker.get(candidate.orderBlockId);

      if (machine.mode === 'B') {
        const step = machine.onCandle(candle, index, block);
        this.executeAll(step.intents);
        if (step.invalidateBlock) {
          this.applyBlockChanges(this.tracker.invalidate(candidate.orderBlockId, 'penetrated', candle.timestamp));
        }
      } else {
        const check = machine.checkClose(candle, block);
        if (check === 'trigger' && block) {
          this.triggerMarketEntry(machine, block, candle.close, now);
        }
      }

      this.settleCandidate(machine);
    }
  }

  private triggerMarketEntry(machine: EntryMachine, block: OrderBlock, entryPrice: number, now: number): void {
    if (this.positions.hasOpenPosition()) {
      machine.drop('position_open');
      return;
    }

    const allocation = this.reserve(machine, block, entryPrice, now);
    if (!allocation) return;

    console.log(
      `[SymbolLane:${this.symbol}] Candidate #${machine.id} triggered on close ${entryPrice}, sending market order`,
    );
    this.registerOrder(machine, machine.sendMarket(allocation));
  }

  /** Size and reserve margin; drops the candidate when capital is short */
  private reserve(
    machine: EntryMachine,
    block: OrderBlock,
    entryPrice: number,
    now: number,
  ): Allocation | null {
    const outcome = this.ledger.reserve(
      `${this.symbol}:${machine.id}`,
      { kind: block.kind, entryPrice, direction: block.direction },
      this.config,
      now,
    );

    if (!outcome.ok) {
      machine.drop('insufficient_capital');
      console.warn(
        `[SymbolLane:${this.symbol}] Candidate #${machine.id} dropped: notional ${outcome.notional.toFixed(2)} < ${outcome.minNotional}`,
      );
      this.notify(this.notifier.capitalInsufficient(this.symbol, block.id, outcome.notional, outcome.minNotional));
      return null;
    }

    return { sizing: outcome.sizing, reservationId: outcome.reservationId };
  }

  // ============================================
  // Ticks & clock
  // ============================================

  private processTick(tick: Tick): void {
    if (this.halted) return;

    try {
      validateTick(tick, this.lastTickTimestamp);
    } catch (err) {
      if (err instanceof DataIntegrityError) {
        console.warn(`[SymbolLane:${this.symbol}] Skipped tick (${err.field}): ${err.message}`);
        return;
      }
      throw err;
    }
    this.lastTickTimestamp = tick.timestamp;
    this.lastEventTime = tick.timestamp;

    for (const action of this.positions.onTick(tick.price)) {
      this.handlePositionAction(action);
    }
  }

  private processClock(now: number): void {
    if (this.halted) return;
    if (now > this.lastEventTime) this.lastEventTime = now;

    for (const { machine } of this.candidates.values()) {
      if (machine.isTerminal()) continue;
      this.executeAll(machine.onClock(now));
      this.settleCandidate(machine);
    }
  }

  // ============================================
  // Orders
  // ============================================

  private registerOrder(machine: EntryMachine, intent: OrderIntent): void {
    this.byClientOrderId.set(intent.clientOrderId, machine.id);
    this.execute(intent);
  }

  private executeAll(intents: OrderIntent[]): void {
    for (const intent of intents) this.execute(intent);
  }

  private execute(intent: OrderIntent): void {
    switch (intent.type) {
      case 'place_market':
        this.background(
          this.orders
            .placeMarket({ side: intent.side, size: intent.size, clientOrderId: intent.clientOrderId })
            .then(
              (fill) => this.queue.push(() => this.processMarketFill(intent.candidateId, fill)),
              (err: unknown) => this.queue.push(() => this.processEntryRejected(intent.candidateId, err)),
            ),
        );
        break;

      case 'place_limit':
        this.background(
          this.orders
            .placeLimit({
              side: intent.side,
              size: intent.size,
              price: intent.price,
              clientOrderId: intent.clientOrderId,
            })
            .then(
              (ack) => this.queue.push(() => {
                if (ack.status === 'filled') {
                  this.processMarketFill(intent.candidateId, {
                    price: ack.fillPrice ?? intent.price,
                    timestamp: ack.filledAt ?? this.lastEventTime,
                  });
                  return;
                }
                this.candidates.get(intent.candidateId)?.machine.onLimitAccepted();
                if (this.verbose) {
                  console.log(
                    `[SymbolLane:${this.symbol}] Limit ${intent.side} ${intent.size} @ ${intent.price} resting (${ack.orderId})`,
                  );
                }
              }),
              (err: unknown) => this.queue.push(() => this.processEntryRejected(intent.candidateId, err)),
            ),
        );
        break;

      case 'cancel':
        this.background(
          this.orders.cancel(intent.clientOrderId).then(
            (outcome) => {
              if (this.verbose) {
                console.log(`[SymbolLane:${this.symbol}] Cancel ${intent.clientOrderId}: ${outcome}`);
              }
            },
            (err: unknown) => {
              console.warn(`[SymbolLane:${this.symbol}] Cancel ${intent.clientOrderId} failed: ${errorMessage(err)}`);
            },
          ),
        );
        break;
    }
  }

  private processMarketFill(candidateId: number, fill: MarketFill): void {
    const tracked = this.candidates.get(candidateId);
    if (!tracked) return;
    this.acceptFill(tracked, fill.price, fill.timestamp);
  }

  private processFill(fill: BrokerFill): void {
    const candidateId = this.byClientOrderId.get(fill.clientOrderId);
    const tracked = candidateId === undefined ? undefined : this.candidates.get(candidateId);
    if (!tracked) {
      if (this.verbose) {
        console.log(`[SymbolLane:${this.symbol}] Ignoring fill for unknown order ${fill.clientOrderId}`);
      }
      return;
    }

    this.orders.markFilled(fill.clientOrderId, fill.price);
    this.lastEventTime = Math.max(this.lastEventTime, fill.timestamp);
    this.acceptFill(tracked, fill.price, fill.timestamp);
  }

  private acceptFill(tracked: TrackedCandidate, price: number, timestamp: number): void {
    const { machine } = tracked;
    if (machine.state === 'filled') return;

    if (machine.onFill(price)) {
      this.openPosition(tracked, price, timestamp, false);
      return;
    }

    // Cancelled or expired before the fill arrived
    console.warn(
      `[SymbolLane:${this.symbol}] Late fill on ${machine.state} candidate #${machine.id} @ ${price}, flattening`,
    );
    this.openPosition(tracked, price, timestamp, true);
  }

  private openPosition(tracked: TrackedCandidate, price: number, timestamp: number, lateFill: boolean): void {
    const candidate = tracked.machine.getCandidate();
    const sizing = candidate.sizing;
    if (!sizing) {
      throw new Error(`Candidate ${candidate.id} filled without sizing`);
    }

    // A late fill lost its reservation when the candidate was cancelled
    let reservationId = candidate.reservationId;
    if (lateFill || reservationId === null || !this.ledger.getReservation(reservationId)) {
      reservationId = this.ledger.hold(`${this.symbol}:${candidate.id}`, sizing.margin, timestamp);
    }

    const position = this.positions.open({
      symbol: this.symbol,
      direction: candidate.direction,
      kind: candidate.kind,
      orderBlockId: candidate.orderBlockId,
      candidateId: candidate.id,
      reservationId,
      sizing,
      fillPrice: price,
      exitPlan: buildExitPlan(tracked.zone, price, this.config),
      openedAt: timestamp,
    });

    console.log(
      `[SymbolLane:${this.symbol}] Opened ${position.direction} ${position.size.toFixed(6)} @ ${price} ` +
        `(SL ${position.stopPrice.toFixed(4)}, TP ${position.targetPrice.toFixed(4)}, ${position.leverage}x)`,
    );
    this.persist(this.store?.savePosition(position));

    if (lateFill) {
      const action = this.positions.forceClose(position.id, true);
      if (action) this.handlePositionAction(action);
      return;
    }

    this.notify(this.notifier.entryFilled(position));
    this.abortCandidates('position_open');
  }

  private processEntryRejected(candidateId: number, err: unknown): void {
    const tracked = this.candidates.get(candidateId);
    if (!tracked) return;
    const { machine } = tracked;

    const code = err instanceof BrokerError ? err.code : 'connectivity';
    console.warn(`[SymbolLane:${this.symbol}] Entry order for candidate #${machine.id} failed (${code}): ${errorMessage(err)}`);
    machine.onRejected();
    this.settleCandidate(machine);
  }

  /** Release margin of a candidate that ended without a fill and archive it */
  private settleCandidate(machine: EntryMachine): void {
    if (!machine.isTerminal()) return;
    const candidate = machine.getCandidate();
    if (candidate.state !== 'filled' && candidate.reservationId !== null) {
      this.ledger.release(candidate.reservationId);
    }

    if (this.finished.includes(machine.id)) return;
    this.finished.push(machine.id);
    if (this.verbose) {
      console.log(`[SymbolLane:${this.symbol}] Candidate #${machine.id} ${candidate.state} (${candidate.terminalReason ?? 'n/a'})`);
    }

    while (this.finished.length > MAX_FINISHED_CANDIDATES) {
      const id = this.finished.shift();
      if (id === undefined) break;
      const old = this.candidates.get(id);
      if (old && !old.machine.hasOrderInFlight()) {
        const clientOrderId = old.machine.getCandidate().clientOrderId;
        if (clientOrderId) this.byClientOrderId.delete(clientOrderId);
        this.candidates.delete(id);
      }
    }
  }

  private abortCandidates(reason: EntryTerminalReason): void {
    for (const { machine } of this.candidates.values()) {
      if (machine.isTerminal()) continue;
      this.executeAll(machine.abort(reason));
      this.settleCandidate(machine);
    }
  }

  // ============================================
  // Positions
  // ============================================

  private handlePositionAction(action: PositionAction): void {
    const { position } = action;

    if (action.type === 'stop_moved') {
      if (this.verbose) {
        console.log(
          `[SymbolLane:${this.symbol}] Trailing stop ${action.previousStop.toFixed(4)} -> ${action.newStop.toFixed(4)}`,
        );
      }
      this.persist(this.store?.savePosition(position));
      return;
    }

    console.log(`[SymbolLane:${this.symbol}] Exit ${action.cause} for ${position.id} @ ~${position.lastPrice}`);
    this.persist(this.store?.savePosition(position));

    this.background(
      this.orders
        .closePosition({
          side: position.direction === 'bullish' ? 'sell' : 'buy',
          size: position.size,
          clientOrderId: action.clientOrderId,
        })
        .then(
          (fill) => this.queue.push(() => this.processExitFill(position.id, fill)),
          (err: unknown) => this.queue.push(() => this.processExitFailed(position.id, err)),
        ),
    );
  }

  private processExitFill(positionId: string, fill: MarketFill): void {
    const closed = this.positions.confirmExit(positionId, fill.price, fill.timestamp);
    if (closed) this.finishPosition(closed);
  }

  private processExitFailed(positionId: string, err: unknown): void {
    console.error(`[SymbolLane:${this.symbol}] Exit order for ${positionId} failed: ${errorMessage(err)}`);
    const closed = this.positions.failExit(positionId, this.lastEventTime);
    if (!closed) return;
    this.finishPosition(closed);
    this.notify(this.notifier.manualReview(closed, errorMessage(err)));
  }

  private finishPosition(position: Position): void {
    this.ledger.settle(position.reservationId, position.realizedPnl ?? 0);
    console.log(
      `[SymbolLane:${this.symbol}] Closed ${position.id}: ${position.exitCause ?? 'n/a'} ` +
        `${position.outcome ?? 'n/a'} PnL ${(position.realizedPnl ?? 0).toFixed(2)}` +
        (position.needsReview ? ' [REVIEW]' : ''),
    );

    this.persist(this.store?.savePosition(position));
    const snapshot = this.ledger.snapshot();
    this.persist(this.store?.saveLedger({
      equity: snapshot.equity,
      peakEquity: snapshot.peakEquity,
      updatedAt: position.closedAt ?? this.lastEventTime,
    }));
    this.notify(this.notifier.positionClosed(position));
  }

  // ============================================
  // Failure handling
  // ============================================

  private halt(reason: string): void {
    if (this.halted) return;
    console.error(`[SymbolLane:${this.symbol}] HALTED: ${reason}`);
    this.abortCandidates('lane_halted');
    this.halted = true;
    this.haltReason = reason;
    this.notify(this.notifier.laneHalted(this.symbol, reason));
  }

  private onTaskError(err: unknown): void {
    console.error(`[SymbolLane:${this.symbol}] Unhandled error:`, err);
    this.notify(this.notifier.error(`${this.symbol}: ${errorMessage(err)}`));
  }

  // ============================================
  // Helpers
  // ============================================

  /** Track a broker round-trip that never rejects */
  private background(task: Promise<void>): void {
    const tracked: Promise<void> = task.finally(() => {
      this.inflight.delete(tracked);
    });
    this.inflight.add(tracked);
  }

  private persist(write: Promise<void> | undefined): void {
    if (!write) return;
    write.catch((err: unknown) => {
      console.error(`[SymbolLane:${this.symbol}] Persist failed: ${errorMessage(err)}`);
    });
  }

  private notify(delivery: Promise<void>): void {
    delivery.catch((err: unknown) => {
      console.error(`[SymbolLane:${this.symbol}] Alert failed: ${errorMessage(err)}`);
    });
  }
}

function zoneOf(block: OrderBlock): Zone {
  return { direction: block.direction, zoneHigh: block.zoneHigh, zoneLow: block.zoneLow };
}

/**
 * A block gets a new candidate only after the previous one ended for a
 * reason that says nothing about the zone itself.
 */
function canRespawn(candidate: EntryCandidate): boolean {
  return candidate.terminalReason === 'position_open' || candidate.terminalReason === 'timeout';
}

function isTerminalState(candidate: EntryCandidate): boolean {
  return candidate.state === 'filled' || candidate.state === 'cancelled' || candidate.state === 'expired';
}
