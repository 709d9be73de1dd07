/**
 * Risk Sizing Engine
 *
 * Allocation and leverage come straight from configuration by zone kind:
 * - FRESH block: freshAllocationPct × freshLeverage (e.g. 40% at 20x)
 * - BREAKER block: breakerAllocationPct × breakerLeverage (e.g. 30% at 10x)
 *
 * size = equity × allocation × leverage / entryPrice
 *
 * No price-path logic here: stops, targets and trailing parameters are
 * derived once from the zone and copied onto the position.
 */

import type {
  Direction,
  ExitPlan,
  OrderBlock,
  OrderBlockKind,
  SizingOutcome,
} from '@/types';
import type { SymbolConfig } from './config';

export type RiskSizingConfig = Pick<
  SymbolConfig,
  | 'freshAllocationPct'
  | 'freshLeverage'
  | 'breakerAllocationPct'
  | 'breakerLeverage'
  | 'minNotional'
  | 'sizeStep'
>;

export type ExitPlanConfig = Pick<
  SymbolConfig,
  'targetRR' | 'stopBufferPct' | 'trailingTriggerPct' | 'trailingDistancePct'
>;

export interface SizingInput {
  equity: number;
  kind: OrderBlockKind;
  entryPrice: number;
  direction: Direction;
}

/** Share of liquidation distance the exchange keeps as maintenance margin */
const LIQUIDATION_BUFFER = 0.95;

export function allocationFor(
  kind: OrderBlockKind,
  config: RiskSizingConfig,
): { allocationFraction: number; leverage: number } {
  return kind === 'fresh'
    ? { allocationFraction: config.freshAllocationPct, leverage: config.freshLeverage }
    : { allocationFraction: config.breakerAllocationPct, leverage: config.breakerLeverage };
}

export function sizePosition(input: SizingInput, config: RiskSizingConfig): SizingOutcome {
  if (!(input.entryPrice > 0)) {
    throw new Error(`Entry price must be positive, got ${input.entryPrice}`);
  }

  const { allocationFraction, leverage } = allocationFor(input.kind, config);
  const equity = Math.max(0, input.equity);
  const margin = equity * allocationFraction;

  let size = (margin * leverage) / input.entryPrice;
  if (config.sizeStep > 0) {
    size = Math.floor(size / config.sizeStep) * config.sizeStep;
  }
  const notional = size * input.entryPrice;

  if (size <= 0 || notional < config.minNotional) {
    return {
      ok: false,
      reason: 'insufficient_capital',
      notional,
      minNotional: config.minNotional,
    };
  }

  return {
    ok: true,
    sizing: {
      kind: input.kind,
      allocationFraction,
      leverage,
      equity,
      margin,
      notional,
      size,
      entryPrice: input.entryPrice,
      liquidationPrice: liquidationPrice(input.entryPrice, input.direction, leverage),
    },
  };
}

export function liquidationPrice(entryPrice: number, direction: Direction, leverage: number): number {
  const distance = LIQUIDATION_BUFFER / leverage;
  return direction === 'bullish'
    ? entryPrice * (1 - distance)
    : entryPrice * (1 + distance);
}

/**
 * Stop beyond the zone's far edge, target at targetRR × risk from entry.
 */
export function buildExitPlan(
  block: Pick<OrderBlock, 'direction' | 'zoneHigh' | 'zoneLow'>,
  entryPrice: number,
  config: ExitPlanConfig,
): ExitPlan {
  const stopPrice = block.direction === 'bullish'
    ? block.zoneLow * (1 - config.stopBufferPct)
    : block.zoneHigh * (1 + config.stopBufferPct);

  const risk = Math.abs(entryPrice - stopPrice);
  const targetPrice = block.direction === 'bullish'
    ? entryPrice + config.targetRR * risk
    : entryPrice - config.targetRR * risk;

  return {
    stopPrice,
    targetPrice,
    trailingTriggerPct: config.trailingTriggerPct,
    trailingDistancePct: config.trailingDistancePct,
  };
}
