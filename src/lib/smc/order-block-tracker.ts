/**
 * Order Block Tracker
 *
 * Owns every order block of one symbol, addressed by arena integer ids.
 *
 * Lifecycle per closed candle:
 * 1. A structure event closing through an opposite FRESH block invalidates it
 *    and arms a BREAKER (new id, reversed direction) on the same zone.
 * 2. The event's own zone is created and supersedes or merges older live
 *    blocks of the same direction.
 * 3. Live blocks are updated: touch, mitigation, expiry. Breakers armed on
 *    this candle are evaluated from the next candle on.
 *
 * Status only moves forward: armed → touched → mitigated | invalidated.
 */

import type {
  Candle,
  Direction,
  MitigationSource,
  OrderBlock,
  OrderBlockChange,
  OrderBlockKind,
  OrderBlockResolution,
  OrderBlockStatus,
  StructureEvent,
} from '@/types';
import { isLive } from '@/types/smc';
import { bodyHigh, bodyLow } from '@/types/candle';
import { StructureCorruptionError } from '@/lib/errors';
import type { CandleBuffer } from './candle-buffer';
import { findOriginZone, type OriginConfig, DEFAULT_ORIGIN_CONFIG } from './order-blocks';

export interface OrderBlockTrackerConfig extends OriginConfig {
  maxZoneAgeCandles: number;
  mitigationSource: MitigationSource;
  /** Resolved blocks kept for lookup before being dropped */
  maxArchive: number;
}

export const DEFAULT_TRACKER_CONFIG: OrderBlockTrackerConfig = {
  ...DEFAULT_ORIGIN_CONFIG,
  maxZoneAgeCandles: 50,
  mitigationSource: 'body',
  maxArchive: 200,
};

const KIND_RANK: Record<OrderBlockKind, number> = {
  breaker: 0,
  fresh: 1,
};

const STATUS_RANK: Record<OrderBlockStatus, number> = {
  armed: 0,
  touched: 1,
  mitigated: 2,
  invalidated: 2,
};

export class OrderBlockTracker {
  private config: OrderBlockTrackerConfig;
  private blocks = new Map<number, OrderBlock>();
  private liveIds: number[] = [];
  private archiveIds: number[] = [];
  private nextId = 1;

  constructor(config: Partial<OrderBlockTrackerConfig> = {}) {
    this.config = { ...DEFAULT_TRACKER_CONFIG, ...config };
  }

  /**
   * Apply one closed candle and its structure event (if any).
   * Returns every change in the order it happened.
   */
  onCandle(
    candle: Candle,
    index: number,
    event: StructureEvent | null,
    buffer: CandleBuffer,
  ): OrderBlockChange[] {
    const changes: OrderBlockChange[] = [];

    if (event) {
      this.reviewStructuralBreak(candle, index, event, changes);
      this.createFromEvent(index, event, buffer, changes);
    }

    for (const block of this.getLiveBlocks()) {
      if (block.kind === 'breaker' && block.createdIndex === index) continue;
      this.updateStatus(block, candle, index, changes);
    }

    this.compact();
    return changes;
  }

  /**
   * Invalidate a live block from outside the candle pass (Mode B zone
   * penetrated without a fill). No breaker is armed for it.
   */
  invalidate(
    id: number,
    resolution: OrderBlockResolution,
    timestamp: number,
  ): OrderBlockChange[] {
    const block = this.blocks.get(id);
    if (!block || !isLive(block)) return [];

    const changes: OrderBlockChange[] = [];
    if (block.status === 'armed') {
      this.transition(block, 'touched', timestamp);
      changes.push({ type: 'touched', block: snapshot(block) });
    }
    this.resolve(block, 'invalidated', resolution, timestamp);
    changes.push({ type: 'resolved', block: snapshot(block) });
    this.compact();
    return changes;
  }

  /** Continue numbering after ids persisted by an earlier run */
  resumeIdsFrom(nextId: number): void {
    this.nextId = Math.max(this.nextId, nextId);
  }

  get(id: number): OrderBlock | undefined {
    const block = this.blocks.get(id);
    return block ? snapshot(block) : undefined;
  }

  getLive(): OrderBlock[] {
    return this.getLiveBlocks().map(snapshot);
  }

  getArchive(): OrderBlock[] {
    return this.archiveIds
      .map((id) => this.blocks.get(id))
      .filter((b): b is OrderBlock => b !== undefined)
      .map(snapshot);
  }

  // ============================================
  // Structure events
  // ============================================

  private reviewStructuralBreak(
    candle: Candle,
    index: number,
    event: StructureEvent,
    changes: OrderBlockChange[],
  ): void {
    for (const block of this.getLiveBlocks()) {
      if (block.kind !== 'fresh' || block.direction === event.direction) continue;
      if (!closesBeyond(block, candle.close)) continue;

      if (block.status === 'armed') {
        this.transition(block, 'touched', candle.timestamp);
        changes.push({ type: 'touched', block: snapshot(block) });
      }
      this.resolve(block, 'invalidated', 'structural_break', candle.timestamp);
      changes.push({ type: 'resolved', block: snapshot(block) });

      const breaker = this.add({
        direction: opposite(block.direction),
        kind: 'breaker',
        zoneHigh: block.zoneHigh,
        zoneLow: block.zoneLow,
        originIndex: block.originIndex,
        originTimestamp: block.originTimestamp,
        createdIndex: index,
        createdAt: candle.timestamp,
        sourceEvent: event.type,
        swingIndex: block.swingIndex,
        parentId: block.id,
      });
      const merged = this.consolidate(breaker, candle.timestamp);
      changes.push({ type: 'breaker_armed', block: snapshot(breaker), parent: snapshot(block) }, ...merged);
    }
  }

  private createFromEvent(
    index: number,
    event: StructureEvent,
    buffer: CandleBuffer,
    changes: OrderBlockChange[],
  ): void {
    const zone = findOriginZone(buffer, event, this.config);
    if (!zone) return;

    // One block per direction per broken swing
    const duplicate = this.getLiveBlocks().some(
      (b) => b.kind === 'fresh' && b.direction === event.direction && b.swingIndex === event.brokenSwing.index,
    );
    if (duplicate) return;

    const block = this.add({
      direction: event.direction,
      kind: 'fresh',
      zoneHigh: zone.zoneHigh,
      zoneLow: zone.zoneLow,
      originIndex: zone.originIndex,
      originTimestamp: zone.originTimestamp,
      createdIndex: index,
      createdAt: event.timestamp,
      sourceEvent: event.type,
      swingIndex: event.brokenSwing.index,
      parentId: null,
    });
    const merged = this.consolidate(block, event.timestamp);
    changes.push(...merged, { type: 'created', block: snapshot(block) });
  }

  /**
   * Older live blocks of the same direction are merged into the new block
   * when their zones overlap (any kind), otherwise superseded when they do
   * not outrank it. A block armed on the same candle is only ever merged.
   * Returns the resolutions; the new block is widened in place.
   */
  private consolidate(newest: OrderBlock, timestamp: number): OrderBlockChange[] {
    const changes: OrderBlockChange[] = [];
    for (const block of this.getLiveBlocks()) {
      if (block.id === newest.id || block.direction !== newest.direction) continue;

      const overlaps = block.zoneLow <= newest.zoneHigh && block.zoneHigh >= newest.zoneLow;
      if (!overlaps && block.createdIndex === newest.createdIndex) continue;
      if (!overlaps && KIND_RANK[block.kind] > KIND_RANK[newest.kind]) continue;

      if (overlaps) {
        newest.zoneHigh = Math.max(newest.zoneHigh, block.zoneHigh);
        newest.zoneLow = Math.min(newest.zoneLow, block.zoneLow);
      }
      this.resolve(block, 'invalidated', overlaps ? 'merged' : 'superseded', timestamp);
      changes.push({ type: 'resolved', block: snapshot(block) });
    }
    return changes;
  }

  // ============================================
  // Per-candle status
  // ============================================

  private updateStatus(
    block: OrderBlock,
    candle: Candle,
    index: number,
    changes: OrderBlockChange[],
  ): void {
    const intersects = candle.low <= block.zoneHigh && candle.high >= block.zoneLow;

    if (intersects && block.status === 'armed') {
      this.transition(block, 'touched', candle.timestamp);
      changes.push({ type: 'touched', block: snapshot(block) });
    }

    if (this.isMitigated(block, candle)) {
      this.resolve(block, 'mitigated', 'mitigated', candle.timestamp);
      changes.push({ type: 'resolved', block: snapshot(block) });
      return;
    }

    if (block.status === 'armed' && index - block.createdIndex >= this.config.maxZoneAgeCandles) {
      this.resolve(block, 'invalidated', 'expired', candle.timestamp);
      changes.push({ type: 'resolved', block: snapshot(block) });
    }
  }

  private isMitigated(block: OrderBlock, candle: Candle): boolean {
    const bullish = block.direction === 'bullish';
    let probe = candle.close;
    if (this.config.mitigationSource === 'body') {
      // Whole body past the far edge
      probe = bullish ? bodyHigh(candle) : bodyLow(candle);
    } else if (this.config.mitigationSource === 'wick') {
      probe = bullish ? candle.low : candle.high;
    }
    return closesBeyond(block, probe);
  }

  // ============================================
  // Arena
  // ============================================

  private add(
    fields: Omit<OrderBlock, 'id' | 'status' | 'resolution' | 'touchedAt' | 'resolvedAt' | 'statusHistory'>,
  ): OrderBlock {
    if (fields.zoneHigh <= fields.zoneLow) {
      throw new StructureCorruptionError(
        `Order block zone ${fields.zoneLow}-${fields.zoneHigh} has no height`,
      );
    }

    const block: OrderBlock = {
      ...fields,
      id: this.nextId++,
      status: 'armed',
      resolution: null,
      touchedAt: null,
      resolvedAt: null,
      statusHistory: ['armed'],
    };
    this.blocks.set(block.id, block);
    this.liveIds.push(block.id);
    return block;
  }

  private transition(block: OrderBlock, status: OrderBlockStatus, timestamp: number): void {
    if (STATUS_RANK[status] <= STATUS_RANK[block.status]) {
      throw new StructureCorruptionError(
        `Order block ${block.id} cannot move ${block.status} -> ${status}`,
      );
    }
    block.status = status;
    block.statusHistory.push(status);
    if (status === 'touched') block.touchedAt = timestamp;
  }

  private resolve(
    block: OrderBlock,
    status: 'mitigated' | 'invalidated',
    resolution: OrderBlockResolution,
    timestamp: number,
  ): void {
    this.transition(block, status, timestamp);
    block.resolution = resolution;
    block.resolvedAt = timestamp;
    this.liveIds = this.liveIds.filter((id) => id !== block.id);
    this.archiveIds.push(block.id);
  }

  private compact(): void {
    while (this.archiveIds.length > this.config.maxArchive) {
      const id = this.archiveIds.shift();
      if (id !== undefined) this.blocks.delete(id);
    }
  }

  private getLiveBlocks(): OrderBlock[] {
    return this.liveIds
      .map((id) => this.blocks.get(id))
      .filter((b): b is OrderBlock => b !== undefined);
  }
}

function opposite(direction: Direction): Direction {
  return direction === 'bullish' ? 'bearish' : 'bullish';
}

/** Price beyond the far edge: below a demand zone, above a supply zone */
function closesBeyond(block: OrderBlock, price: number): boolean {
  return block.direction === 'bullish' ? price < block.zoneLow : price > block.zoneHigh;
}

function snapshot(block: OrderBlock): OrderBlock {
  return { ...block, statusHistory: [...block.statusHistory] };
}
