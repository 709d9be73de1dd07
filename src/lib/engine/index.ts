/**
 * Execution Engine Module
 * Symbol lanes, entry machines, sizing, positions and broker adapters
 */

// Orchestration
export { Engine, pricePath, type EngineOptions, type EngineStatus } from './engine';
export { SymbolLane, type SymbolLaneOptions, type LaneStatus } from './symbol-lane';
export { SerialQueue } from './serial-queue';

// Configuration
export {
  symbolConfigSchema,
  engineConfigSchema,
  parseSymbolConfig,
  parseEngineConfig,
  loadEngineConfig,
  type SymbolConfig,
  type SymbolConfigInput,
  type EngineConfig,
  type EngineConfigInput,
} from './config';

// Risk & capital
export {
  sizePosition,
  allocationFor,
  liquidationPrice,
  buildExitPlan,
  type RiskSizingConfig,
  type ExitPlanConfig,
  type SizingInput,
} from './risk-sizer';
export { CapitalLedger, type Reservation, type ReserveOutcome, type LedgerSnapshot } from './capital-ledger';

// Entries & positions
export { EntryMachine, penetrationPrice, type Allocation, type CloseCheck } from './entry-machine';
export { PositionManager, pnl, type PositionAction, type PositionStats } from './position-manager';
export { OrderManager, type CancelOutcome, type MarketFill } from './order-manager';

// Adapters
export type { Broker, FillListener } from './broker';
export { PaperBroker, type PaperBrokerConfig } from './paper-broker';
export { BybitBroker, type BybitBrokerConfig } from './bybit-broker';
export { BybitCandleSource, toBybitInterval, type CandleSource } from './candle-source';
export { PriceStream, parseTradeMessage, type PriceStreamConfig } from './price-stream';

// Alerts
export { AlertManager, type Notifier } from './alerts';
