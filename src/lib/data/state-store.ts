/**
 * Engine State Store
 *
 * Abstracts persistence so lanes can run against SQLite (live/paper) or an
 * in-memory store (tests, replay).
 */

import { and, asc, desc, eq, gte, ne } from 'drizzle-orm';
import type { Candle, OrderBlock, Position } from '@/types';
import { createDatabase, schema, type DatabaseHandle } from './db';

/** Position as persisted; the ledger reservation is runtime-only */
export type StoredPosition = Omit<Position, 'reservationId'>;

export type StoredOrderBlock = Pick<
  OrderBlock,
  | 'id'
  | 'direction'
  | 'kind'
  | 'status'
  | 'zoneHigh'
  | 'zoneLow'
  | 'originTimestamp'
  | 'createdAt'
  | 'sourceEvent'
  | 'parentId'
  | 'resolution'
  | 'resolvedAt'
> & { symbol: string };

export interface LedgerRow {
  equity: number;
  peakEquity: number;
  updatedAt: number;
}

export interface StateStore {
  saveCandles(symbol: string, candles: Candle[]): Promise<void>;
  /** Cached candles at or after `since`, oldest first */
  loadCandles(symbol: string, since: number, limit: number): Promise<Candle[]>;

  saveOrderBlock(symbol: string, block: OrderBlock): Promise<void>;
  getOrderBlocks(symbol: string): Promise<StoredOrderBlock[]>;
  /** First block id not used by a previous run */
  nextOrderBlockId(symbol: string): Promise<number>;

  savePosition(position: Position): Promise<void>;
  /** Positions not yet closed */
  loadOpenPositions(symbol: string): Promise<StoredPosition[]>;
  getClosedPositions(symbol: string): Promise<StoredPosition[]>;

  saveLedger(row: LedgerRow): Promise<void>;
  loadLedger(): Promise<LedgerRow | null>;

  close(): Promise<void>;
}

// ============================================
// SQLite
// ============================================

export class SqliteStateStore implements StateStore {
  private handle: DatabaseHandle;

  constructor(dbPath: string) {
    this.handle = createDatabase(dbPath);
  }

  async saveCandles(symbol: string, candles: Candle[]): Promise<void> {
    if (candles.length === 0) return;
    const rows = candles.map((c) => ({
      symbol,
      timestamp: c.timestamp,
      open: c.open,
      high: c.high,
      low: c.low,
      close: c.close,
      volume: c.volume,
    }));
    this.handle.db.transaction((tx) => {
      for (const row of rows) {
        tx.insert(schema.engineCandles).values(row).onConflictDoNothing().run();
      }
    });
  }

  async loadCandles(symbol: string, since: number, limit: number): Promise<Candle[]> {
    const rows = await this.handle.db
      .select()
      .from(schema.engineCandles)
      .where(and(eq(schema.engineCandles.symbol, symbol), gte(schema.engineCandles.timestamp, since)))
      .orderBy(asc(schema.engineCandles.timestamp))
      .limit(limit);

    return rows.map((r) => ({
      timestamp: r.timestamp,
      open: r.open,
      high: r.high,
      low: r.low,
      close: r.close,
      volume: r.volume,
      isClosed: true,
    }));
  }

  async saveOrderBlock(symbol: string, block: OrderBlock): Promise<void> {
    const row = {
      key: `${symbol}:${block.id}`,
      symbol,
      blockId: block.id,
      direction: block.direction,
      kind: block.kind,
      status: block.status,
      zoneHigh: block.zoneHigh,
      zoneLow: block.zoneLow,
      originTimestamp: block.originTimestamp,
      createdAt: block.createdAt,
      sourceEvent: block.sourceEvent,
      parentId: block.parentId,
      resolution: block.resolution,
      resolvedAt: block.resolvedAt,
    };
    await this.handle.db
      .insert(schema.engineOrderBlocks)
      .values(row)
      .onConflictDoUpdate({
        target: schema.engineOrderBlocks.key,
        set: {
          direction: row.direction,
          kind: row.kind,
          status: row.status,
          zoneHigh: row.zoneHigh,
          zoneLow: row.zoneLow,
          originTimestamp: row.originTimestamp,
          createdAt: row.createdAt,
          sourceEvent: row.sourceEvent,
          parentId: row.parentId,
          resolution: row.resolution,
          resolvedAt: row.resolvedAt,
        },
      });
  }

  async nextOrderBlockId(symbol: string): Promise<number> {
    const [last] = await this.handle.db
      .select({ blockId: schema.engineOrderBlocks.blockId })
      .from(schema.engineOrderBlocks)
      .where(eq(schema.engineOrderBlocks.symbol, symbol))
      .orderBy(desc(schema.engineOrderBlocks.blockId))
      .limit(1);
    return last ? last.blockId + 1 : 1;
  }

  async getOrderBlocks(symbol: string): Promise<StoredOrderBlock[]> {
    const rows = await this.handle.db
      .select()
      .from(schema.engineOrderBlocks)
      .where(eq(schema.engineOrderBlocks.symbol, symbol))
      .orderBy(asc(schema.engineOrderBlocks.blockId));

    return rows.map((r) => ({
      symbol: r.symbol,
      id: r.blockId,
      direction: r.direction,
      kind: r.kind,
      status: r.status,
      zoneHigh: r.zoneHigh,
      zoneLow: r.zoneLow,
      originTimestamp: r.originTimestamp,
      createdAt: r.createdAt,
      sourceEvent: r.sourceEvent,
      parentId: r.parentId,
      resolution: r.resolution,
      resolvedAt: r.resolvedAt,
    }));
  }

  async savePosition(position: Position): Promise<void> {
    const row = toPositionRow(position);
    const { id: _id, ...changes } = row;
    await this.handle.db
      .insert(schema.enginePositions)
      .values(row)
      .onConflictDoUpdate({ target: schema.enginePositions.id, set: changes });
  }

  async loadOpenPositions(symbol: string): Promise<StoredPosition[]> {
    const rows = await this.handle.db
      .select()
      .from(schema.enginePositions)
      .where(and(eq(schema.enginePositions.symbol, symbol), ne(schema.enginePositions.status, 'closed')))
      .orderBy(asc(schema.enginePositions.openedAt));
    return rows.map(fromPositionRow);
  }

  async getClosedPositions(symbol: string): Promise<StoredPosition[]> {
    const rows = await this.handle.db
      .select()
      .from(schema.enginePositions)
      .where(and(eq(schema.enginePositions.symbol, symbol), eq(schema.enginePositions.status, 'closed')))
      .orderBy(desc(schema.enginePositions.closedAt));
    return rows.map(fromPositionRow);
  }

  async saveLedger(row: LedgerRow): Promise<void> {
    await this.handle.db
      .insert(schema.engineLedger)
      .values({ id: 1, ...row })
      .onConflictDoUpdate({ target: schema.engineLedger.id, set: row });
  }

  async loadLedger(): Promise<LedgerRow | null> {
    const rows = await this.handle.db
      .select()
      .from(schema.engineLedger)
      .where(eq(schema.engineLedger.id, 1));
    const row = rows[0];
    return row ? { equity: row.equity, peakEquity: row.peakEquity, updatedAt: row.updatedAt } : null;
  }

  async close(): Promise<void> {
    this.handle.sqlite.close();
  }
}

type PositionRow = typeof schema.enginePositions.$inferSelect;

function toPositionRow(p: Position): PositionRow {
  return {
    id: p.id,
    symbol: p.symbol,
    direction: p.direction,
    kind: p.kind,
    status: p.status,
    orderBlockId: p.orderBlockId,
    candidateId: p.candidateId,
    size: p.size,
    leverage: p.leverage,
    margin: p.margin,
    entryPrice: p.entryPrice,
    stopPrice: p.stopPrice,
    initialStopPrice: p.initialStopPrice,
    targetPrice: p.targetPrice,
    trailingTriggerPct: p.trailing.triggerPct,
    trailingDistancePct: p.trailing.distancePct,
    trailingActive: p.trailing.active,
    liquidationPrice: p.liquidationPrice,
    openedAt: p.openedAt,
    lastPrice: p.lastPrice,
    exitCause: p.exitCause,
    exitPrice: p.exitPrice,
    closedAt: p.closedAt,
    realizedPnl: p.realizedPnl,
    outcome: p.outcome,
    needsReview: p.needsReview,
  };
}

function fromPositionRow(r: PositionRow): StoredPosition {
  return {
    id: r.id,
    symbol: r.symbol,
    direction: r.direction,
    kind: r.kind,
    status: r.status,
    orderBlockId: r.orderBlockId,
    candidateId: r.candidateId,
    size: r.size,
    leverage: r.leverage,
    margin: r.margin,
    entryPrice: r.entryPrice,
    stopPrice: r.stopPrice,
    initialStopPrice: r.initialStopPrice,
    targetPrice: r.targetPrice,
    trailing: {
      triggerPct: r.trailingTriggerPct,
      distancePct: r.trailingDistancePct,
      active: r.trailingActive,
    },
    liquidationPrice: r.liquidationPrice,
    openedAt: r.openedAt,
    lastPrice: r.lastPrice,
    exitClientOrderId: null,
    pendingExitCause: null,
    exitCause: r.exitCause,
    exitPrice: r.exitPrice,
    closedAt: r.closedAt,
    realizedPnl: r.realizedPnl,
    outcome: r.outcome,
    needsReview: r.needsReview,
  };
}

// ============================================
// In-memory
// ============================================

export class MemoryStateStore implements StateStore {
  private candles = new Map<string, Map<number, Candle>>();
  private blocks = new Map<string, StoredOrderBlock>();
  private positions = new Map<string, Position>();
  private ledger: LedgerRow | null = null;

  async saveCandles(symbol: string, candles: Candle[]): Promise<void> {
    let series = this.candles.get(symbol);
    if (!series) {
      series = new Map();
      this.candles.set(symbol, series);
    }
    for (const c of candles) {
      if (!series.has(c.timestamp)) series.set(c.timestamp, { ...c, isClosed: true });
    }
  }

  async loadCandles(symbol: string, since: number, limit: number): Promise<Candle[]> {
    const series = this.candles.get(symbol);
    if (!series) return [];
    return [...series.values()]
      .filter((c) => c.timestamp >= since)
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(0, limit);
  }

  async saveOrderBlock(symbol: string, block: OrderBlock): Promise<void> {
    this.blocks.set(`${symbol}:${block.id}`, {
      symbol,
      id: block.id,
      direction: block.direction,
      kind: block.kind,
      status: block.status,
      zoneHigh: block.zoneHigh,
      zoneLow: block.zoneLow,
      originTimestamp: block.originTimestamp,
      createdAt: block.createdAt,
      sourceEvent: block.sourceEvent,
      parentId: block.parentId,
      resolution: block.resolution,
      resolvedAt: block.resolvedAt,
    });
  }

  async getOrderBlocks(symbol: string): Promise<StoredOrderBlock[]> {
    return [...this.blocks.values()]
      .filter((b) => b.symbol === symbol)
      .sort((a, b) => a.id - b.id);
  }

  async nextOrderBlockId(symbol: string): Promise<number> {
    let last = 0;
    for (const b of this.blocks.values()) {
      if (b.symbol === symbol) last = Math.max(last, b.id);
    }
    return last + 1;
  }

  async savePosition(position: Position): Promise<void> {
    this.positions.set(position.id, { ...position, trailing: { ...position.trailing } });
  }

  async loadOpenPositions(symbol: string): Promise<StoredPosition[]> {
    return [...this.positions.values()]
      .filter((p) => p.symbol === symbol && p.status !== 'closed')
      .map(stripReservation);
  }

  async getClosedPositions(symbol: string): Promise<StoredPosition[]> {
    return [...this.positions.values()]
      .filter((p) => p.symbol === symbol && p.status === 'closed')
      .map(stripReservation);
  }

  async saveLedger(row: LedgerRow): Promise<void> {
    this.ledger = { ...row };
  }

  async loadLedger(): Promise<LedgerRow | null> {
    return this.ledger ? { ...this.ledger } : null;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

function stripReservation(p: Position): StoredPosition {
  const { reservationId: _reservationId, ...rest } = p;
  return { ...rest, trailing: { ...rest.trailing } };
}
