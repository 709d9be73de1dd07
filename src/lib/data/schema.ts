/**
 * SQLite Table Definitions
 *
 * Candle cache, order block journal, positions and the ledger snapshot.
 * The CREATE statements mirror the drizzle tables and are run on startup.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  primaryKey,
} from 'drizzle-orm/sqlite-core';

const DIRECTIONS = ['bullish', 'bearish'] as const;
const KINDS = ['fresh', 'breaker'] as const;

export const engineCandles = sqliteTable('engine_candles', {
  symbol: text('symbol').notNull(),
  timestamp: integer('timestamp').notNull(),
  open: real('open').notNull(),
  high: real('high').notNull(),
  low: real('low').notNull(),
  close: real('close').notNull(),
  volume: real('volume').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.symbol, table.timestamp] }),
}));

export const engineOrderBlocks = sqliteTable('engine_order_blocks', {
  key: text('key').primaryKey(),
  symbol: text('symbol').notNull(),
  blockId: integer('block_id').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  kind: text('kind', { enum: KINDS }).notNull(),
  status: text('status', { enum: ['armed', 'touched', 'mitigated', 'invalidated'] }).notNull(),
  zoneHigh: real('zone_high').notNull(),
  zoneLow: real('zone_low').notNull(),
  originTimestamp: integer('origin_timestamp').notNull(),
  createdAt: integer('created_at').notNull(),
  sourceEvent: text('source_event', { enum: ['bos', 'choch'] }).notNull(),
  parentId: integer('parent_id'),
  resolution: text('resolution', {
    enum: ['mitigated', 'structural_break', 'penetrated', 'expired', 'superseded', 'merged'],
  }),
  resolvedAt: integer('resolved_at'),
});

export const enginePositions = sqliteTable('engine_positions', {
  id: text('id').primaryKey(),
  symbol: text('symbol').notNull(),
  direction: text('direction', { enum: DIRECTIONS }).notNull(),
  kind: text('kind', { enum: KINDS }).notNull(),
  status: text('status', { enum: ['open', 'closing', 'closed'] }).notNull(),
  orderBlockId: integer('order_block_id').notNull(),
  candidateId: integer('candidate_id').notNull(),
  size: real('size').notNull(),
  leverage: real('leverage').notNull(),
  margin: real('margin').notNull(),
  entryPrice: real('entry_price').notNull(),
  stopPrice: real('stop_price').notNull(),
  initialStopPrice: real('initial_stop_price').notNull(),
  targetPrice: real('target_price').notNull(),
  trailingTriggerPct: real('trailing_trigger_pct').notNull(),
  trailingDistancePct: real('trailing_distance_pct').notNull(),
  trailingActive: integer('trailing_active', { mode: 'boolean' }).notNull(),
  liquidationPrice: real('liquidation_price').notNull(),
  openedAt: integer('opened_at').notNull(),
  lastPrice: real('last_price').notNull(),
  exitCause: text('exit_cause', { enum: ['target', 'stop', 'trailing_stop', 'forced'] }),
  exitPrice: real('exit_price'),
  closedAt: integer('closed_at'),
  realizedPnl: real('realized_pnl'),
  outcome: text('outcome', { enum: ['win', 'loss', 'breakeven'] }),
  needsReview: integer('needs_review', { mode: 'boolean' }).notNull(),
});

export const engineLedger = sqliteTable('engine_ledger', {
  id: integer('id').primaryKey(),
  equity: real('equity').notNull(),
  peakEquity: real('peak_equity').notNull(),
  updatedAt: integer('updated_at').notNull(),
});

export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS engine_candles (
  symbol TEXT NOT NULL,
  timestamp INTEGER NOT NULL,
  open REAL NOT NULL,
  high REAL NOT NULL,
  low REAL NOT NULL,
  close REAL NOT NULL,
  volume REAL NOT NULL,
  PRIMARY KEY (symbol, timestamp)
);

CREATE TABLE IF NOT EXISTS engine_order_blocks (
  key TEXT PRIMARY KEY,
  symbol TEXT NOT NULL,
  block_id INTEGER NOT NULL,
  direction TEXT NOT NULL,
  kind TEXT NOT NULL,
  status TEXT NOT NULL,
  zone_high REAL NOT NULL,
  zone_low REAL NOT NULL,
  origin_timestamp INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  source_event TEXT NOT NULL,
  parent_id INTEGER,
  resolution TEXT,
  resolved_at INTEGER
);

CREATE TABLE IF NOT EXISTS engine_positions (
  id TEXT PRIMARY KEY,
  symbol TEXT NOT NULL,
  direction TEXT NOT NULL,
  kind TEXT NOT NULL,
  status TEXT NOT NULL,
  order_block_id INTEGER NOT NULL,
  candidate_id INTEGER NOT NULL,
  size REAL NOT NULL,
  leverage REAL NOT NULL,
  margin REAL NOT NULL,
  entry_price REAL NOT NULL,
  stop_price REAL NOT NULL,
  initial_stop_price REAL NOT NULL,
  target_price REAL NOT NULL,
  trailing_trigger_pct REAL NOT NULL,
  trailing_distance_pct REAL NOT NULL,
  trailing_active INTEGER NOT NULL,
  liquidation_price REAL NOT NULL,
  opened_at INTEGER NOT NULL,
  last_price REAL NOT NULL,
  exit_cause TEXT,
  exit_price REAL,
  closed_at INTEGER,
  realized_pnl REAL,
  outcome TEXT,
  needs_review INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS engine_positions_symbol_status ON engine_positions (symbol, status);

CREATE TABLE IF NOT EXISTS engine_ledger (
  id INTEGER PRIMARY KEY,
  equity REAL NOT NULL,
  peak_equity REAL NOT NULL,
  updated_at INTEGER NOT NULL
);
`;
