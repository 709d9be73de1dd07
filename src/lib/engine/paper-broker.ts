/**
 * Paper Broker — in-process order simulation.
 *
 * Market orders fill at the last seen price plus slippage against the taker.
 * Limit orders rest until a tick trades through the limit and then fill at
 * the limit price.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  BrokerFill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderAck,
  OrderSide,
} from '@/types';
import { BrokerError, type BrokerErrorCode } from '@/lib/errors';
import type { Broker, FillListener } from './broker';

interface RestingOrder {
  request: LimitOrderRequest;
  orderId: string;
}

export interface PaperBrokerConfig {
  /** Fractional slippage applied to market fills (0.001 = 0.1%) */
  slippage: number;
}

export class PaperBroker implements Broker {
  readonly name = 'paper';
  private config: PaperBrokerConfig;
  private lastPrices = new Map<string, { price: number; timestamp: number }>();
  private resting = new Map<string, RestingOrder>();
  private listeners = new Set<FillListener>();
  private scriptedFailures: Array<{ op: 'market' | 'limit' | 'cancel'; code: BrokerErrorCode }> = [];

  constructor(config: Partial<PaperBrokerConfig> = {}) {
    this.config = { slippage: 0, ...config };
  }

  // ============================================
  // Broker interface
  // ============================================

  async placeMarketOrder(request: MarketOrderRequest): Promise<OrderAck> {
    this.maybeFail('market');
    const last = this.lastPrices.get(request.symbol);
    if (!last) {
      throw new BrokerError('rejected', `No price for ${request.symbol}`);
    }

    return {
      clientOrderId: request.clientOrderId,
      orderId: uuidv4(),
      status: 'filled',
      fillPrice: this.applySlippage(last.price, request.side),
      filledAt: last.timestamp,
    };
  }

  async placeLimitOrder(request: LimitOrderRequest): Promise<OrderAck> {
    this.maybeFail('limit');
    if (!(request.price > 0) || !(request.size > 0)) {
      throw new BrokerError('rejected', `Invalid limit order ${request.size} @ ${request.price}`);
    }

    const order: RestingOrder = { request, orderId: uuidv4() };
    this.resting.set(request.clientOrderId, order);
    return { clientOrderId: request.clientOrderId, orderId: order.orderId, status: 'open' };
  }

  async cancelOrder(symbol: string, clientOrderId: string): Promise<void> {
    this.maybeFail('cancel');
    const order = this.resting.get(clientOrderId);
    if (!order || order.request.symbol !== symbol) {
      throw new BrokerError('not_found', `No open order ${clientOrderId} for ${symbol}`);
    }
    this.resting.delete(clientOrderId);
  }

  onFill(listener: FillListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================
  // Market data
  // ============================================

  /** Feed a trade price; fills any resting limit it reaches */
  updatePrice(symbol: string, price: number, timestamp: number): void {
    this.lastPrices.set(symbol, { price, timestamp });
    this.matchResting(symbol, price, timestamp);
  }

  getOpenOrders(symbol?: string): LimitOrderRequest[] {
    return [...this.resting.values()]
      .map((o) => o.request)
      .filter((r) => symbol === undefined || r.symbol === symbol);
  }

  /** Make the next call of the given kind fail (in call order) */
  failNext(op: 'market' | 'limit' | 'cancel', code: BrokerErrorCode = 'rejected'): void {
    this.scriptedFailures.push({ op, code });
  }

  // ============================================
  // Helpers
  // ============================================

  private matchResting(symbol: string, price: number, timestamp: number): void {
    for (const [clientOrderId, order] of [...this.resting]) {
      const { request } = order;
      if (request.symbol !== symbol) continue;

      const reached = request.side === 'buy' ? price <= request.price : price >= request.price;
      if (!reached) continue;

      this.resting.delete(clientOrderId);
      const fill: BrokerFill = {
        symbol,
        clientOrderId,
        orderId: order.orderId,
        price: request.price,
        size: request.size,
        timestamp,
      };
      for (const listener of this.listeners) listener(fill);
    }
  }

  private applySlippage(price: number, side: OrderSide): number {
    return side === 'buy'
      ? price * (1 + this.config.slippage)
      : price * (1 - this.config.slippage);
  }

  private maybeFail(op: 'market' | 'limit' | 'cancel'): void {
    const idx = this.scriptedFailures.findIndex((f) => f.op === op);
    if (idx === -1) return;
    const [failure] = this.scriptedFailures.splice(idx, 1);
    if (failure) {
      throw new BrokerError(failure.code, `Scripted ${op} failure (${failure.code})`);
    }
  }
}
