/**
 * SMC Module
 * Candle handling, swing/structure detection and order block tracking
 */

// Candles
export { CandleBuffer, type CandleBufferConfig, type AppendResult } from './candle-buffer';
export { validateCandle, validateTick, detectGap, type GapReport } from './candle-validator';
export { CandleBuilder, aggregateCandles, getBucketTimestamp } from './candle-aggregator';

// Structure
export { SwingDetector, type SwingDetectorConfig } from './swing-detector';
export { StructureClassifier } from './structure-classifier';

// Order Blocks
export {
  findOriginZone,
  findImpulseExtreme,
  zoneBounds,
  DEFAULT_ORIGIN_CONFIG,
  type OriginConfig,
  type ZoneProposal,
} from './order-blocks';
export {
  OrderBlockTracker,
  DEFAULT_TRACKER_CONFIG,
  type OrderBlockTrackerConfig,
} from './order-block-tracker';
