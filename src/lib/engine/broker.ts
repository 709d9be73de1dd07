/**
 * Broker collaborator contract.
 *
 * Every call is asynchronous and may fail with a BrokerError:
 * - rejected: exchange refused the order
 * - connectivity: transport failure, outcome unknown
 * - not_found: cancel/lookup of an order the exchange does not know
 * - timeout: no answer within the caller's deadline
 *
 * Market orders resolve with their fill. Limit orders resolve once accepted;
 * their fill arrives later through onFill.
 */

import type {
  BrokerFill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderAck,
} from '@/types';

export type FillListener = (fill: BrokerFill) => void;

export interface Broker {
  readonly name: string;
  placeMarketOrder(request: MarketOrderRequest): Promise<OrderAck>;
  placeLimitOrder(request: LimitOrderRequest): Promise<OrderAck>;
  cancelOrder(symbol: string, clientOrderId: string): Promise<void>;
  /** Subscribe to asynchronous limit fills; returns an unsubscribe function */
  onFill(listener: FillListener): () => void;
  close?(): Promise<void>;
}
