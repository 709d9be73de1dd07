/**
 * Smart Money Concept types: swings, structure breaks, order blocks
 */

// Market Structure
export type Direction = 'bullish' | 'bearish';
export type Trend = Direction | 'undetermined';
export type StructureEventType = 'bos' | 'choch';

export interface SwingPoint {
  /** Global candle index (counts every accepted candle, not buffer position) */
  index: number;
  timestamp: number;
  price: number;
  kind: 'high' | 'low';
}

export interface StructureState {
  trend: Trend;
  lastConfirmedHigh: SwingPoint | null;
  lastConfirmedLow: SwingPoint | null;
}

export interface StructureEvent {
  type: StructureEventType;
  direction: Direction;
  brokenSwing: SwingPoint;
  index: number;
  timestamp: number;
  closePrice: number;
  previousTrend: Trend;
  trend: Direction;
}

// Order Blocks
export type OrderBlockKind = 'fresh' | 'breaker';
export type OrderBlockStatus = 'armed' | 'touched' | 'mitigated' | 'invalidated';

export type OrderBlockResolution =
  | 'mitigated'
  | 'structural_break'
  | 'penetrated'
  | 'expired'
  | 'superseded'
  | 'merged';

export interface OrderBlock {
  id: number;
  direction: Direction;
  kind: OrderBlockKind;
  status: OrderBlockStatus;
  zoneHigh: number;
  zoneLow: number;
  originIndex: number;
  originTimestamp: number;
  createdIndex: number;
  createdAt: number;
  sourceEvent: StructureEventType;
  /** Swing whose break produced this block (breakers inherit the parent's) */
  swingIndex: number;
  /** Fresh block this breaker was converted from */
  parentId: number | null;
  resolution: OrderBlockResolution | null;
  touchedAt: number | null;
  resolvedAt: number | null;
  statusHistory: OrderBlockStatus[];
}

export type ZoneSource = 'wick' | 'body';
export type OriginCandleRule = 'last_opposite' | 'extreme';
export type MitigationSource = 'body' | 'close' | 'wick';

export type OrderBlockChange =
  | { type: 'created'; block: OrderBlock }
  | { type: 'touched'; block: OrderBlock }
  | { type: 'resolved'; block: OrderBlock }
  | { type: 'breaker_armed'; block: OrderBlock; parent: OrderBlock };

export function isLive(block: OrderBlock): boolean {
  return block.status === 'armed' || block.status === 'touched';
}
