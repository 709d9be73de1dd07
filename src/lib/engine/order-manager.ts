/**
 * Order Manager — tracks every order one lane sends through the broker.
 *
 * - Market orders: single attempt, bounded by a request timeout.
 * - Limit orders: one retry after a backoff when placement fails.
 * - Cancels requested before the broker acknowledged the order are held
 *   and sent once the acknowledgement arrives.
 */

import type {
  LimitOrderRequest,
  MarketOrderRequest,
  OrderAck,
  TrackedOrder,
  TrackedOrderStatus,
} from '@/types';
import { BrokerError } from '@/lib/errors';
import type { Broker } from './broker';

export interface OrderManagerConfig {
  symbol: string;
  limitRetryBackoffMs: number;
  requestTimeoutMs: number;
  verbose: boolean;
}

export interface MarketFill {
  price: number;
  timestamp: number;
}

export type CancelOutcome = 'cancelled' | 'deferred' | 'not_found' | 'already_final';

const MAX_HISTORY = 500;

export class OrderManager {
  private broker: Broker;
  private config: OrderManagerConfig;
  private orders = new Map<string, TrackedOrder>();
  private now: () => number;

  constructor(broker: Broker, config: OrderManagerConfig, now: () => number = Date.now) {
    this.broker = broker;
    this.config = config;
    this.now = now;
  }

  // ============================================
  // Placement
  // ============================================

  /** Send a market order; rejects with BrokerError, never retries */
  async placeMarket(request: Omit<MarketOrderRequest, 'symbol'>): Promise<MarketFill> {
    const order = this.track({
      clientOrderId: request.clientOrderId,
      type: 'market',
      side: request.side,
      size: request.size,
      price: null,
    });

    try {
      order.attempts++;
      const ack = await this.withTimeout(
        this.broker.placeMarketOrder({ ...request, symbol: this.config.symbol }),
        'market order',
      );
      if (ack.status !== 'filled' || ack.fillPrice === undefined) {
        throw new BrokerError('rejected', `Market order ${request.clientOrderId} not filled`);
      }
      order.orderId = ack.orderId;
      this.update(order, 'filled', { fillPrice: ack.fillPrice });
      return { price: ack.fillPrice, timestamp: ack.filledAt ?? this.now() };
    } catch (err) {
      this.update(order, 'rejected', { error: describe(err) });
      throw asBrokerError(err);
    }
  }

  /**
   * Place a limit order, retrying once after the configured backoff.
   * Resolves with the acknowledgement (status 'filled' when marketable).
   */
  async placeLimit(request: Omit<LimitOrderRequest, 'symbol'>): Promise<OrderAck> {
    const order = this.track({
      clientOrderId: request.clientOrderId,
      type: 'limit',
      side: request.side,
      size: request.size,
      price: request.price,
    });

    let lastError: BrokerError | null = null;
    for (let attempt = 1; attempt <= 2; attempt++) {
      if (order.cancelRequested) {
        this.update(order, 'cancelled');
        throw new BrokerError('rejected', `Limit order ${request.clientOrderId} cancelled before placement`);
      }

      order.attempts = attempt;
      const ack = await this.withTimeout(
        this.broker.placeLimitOrder({ ...request, symbol: this.config.symbol }),
        'limit order',
      ).catch((err: unknown) => asBrokerError(err));

      if (ack instanceof BrokerError) {
        lastError = ack;
        console.warn(
          `[OrderManager:${this.config.symbol}] Limit ${request.clientOrderId} attempt ${attempt} failed: ${ack.message}`,
        );
        if (attempt === 1) await sleep(this.config.limitRetryBackoffMs);
        continue;
      }

      order.orderId = ack.orderId;
      if (ack.status === 'filled') {
        this.update(order, 'filled', { fillPrice: ack.fillPrice ?? request.price });
        return ack;
      }

      this.update(order, 'open');
      if (order.cancelRequested) {
        await this.sendCancel(order);
      }
      return ack;
    }

    this.update(order, 'rejected', { error: lastError?.message ?? 'unknown' });
    throw lastError ?? new BrokerError('rejected', `Limit order ${request.clientOrderId} failed`);
  }

  /** Market close of an open position */
  async closePosition(request: Omit<MarketOrderRequest, 'symbol' | 'reduceOnly'>): Promise<MarketFill> {
    return this.placeMarket({ ...request, reduceOnly: true });
  }

  // ============================================
  // Cancellation & fills
  // ============================================

  async cancel(clientOrderId: string): Promise<CancelOutcome> {
    const order = this.orders.get(clientOrderId);
    if (!order) return 'not_found';
    if (order.status === 'filled' || order.status === 'cancelled' || order.status === 'rejected') {
      return 'already_final';
    }

    order.cancelRequested = true;
    if (order.status === 'pending') {
      // Sent once placement is acknowledged
      return 'deferred';
    }

    return this.sendCancel(order);
  }

  /** Record a fill delivered through the broker's fill stream */
  markFilled(clientOrderId: string, price: number): TrackedOrder | undefined {
    const order = this.orders.get(clientOrderId);
    if (!order) return undefined;
    this.update(order, 'filled', { fillPrice: price });
    return { ...order };
  }

  isTracked(clientOrderId: string): boolean {
    return this.orders.has(clientOrderId);
  }

  getOrder(clientOrderId: string): TrackedOrder | undefined {
    const order = this.orders.get(clientOrderId);
    return order ? { ...order } : undefined;
  }

  getOpenOrders(): TrackedOrder[] {
    return [...this.orders.values()]
      .filter((o) => o.status === 'pending' || o.status === 'open')
      .map((o) => ({ ...o }));
  }

  getStats(): Record<TrackedOrderStatus, number> & { total: number } {
    const stats = { pending: 0, open: 0, filled: 0, cancelled: 0, rejected: 0, total: 0 };
    for (const order of this.orders.values()) {
      stats[order.status]++;
      stats.total++;
    }
    return stats;
  }

  // ============================================
  // Helpers
  // ============================================

  private async sendCancel(order: TrackedOrder): Promise<CancelOutcome> {
    try {
      await this.withTimeout(
        this.broker.cancelOrder(this.config.symbol, order.clientOrderId),
        'cancel',
      );
      this.update(order, 'cancelled');
      return 'cancelled';
    } catch (err) {
      const error = asBrokerError(err);
      if (error.code === 'not_found') {
        // Already filled or expired at the exchange; the fill stream decides
        if (this.config.verbose) {
          console.log(`[OrderManager:${this.config.symbol}] Cancel ${order.clientOrderId}: not found`);
        }
        return 'not_found';
      }
      throw error;
    }
  }

  private track(fields: Pick<TrackedOrder, 'clientOrderId' | 'type' | 'side' | 'size' | 'price'>): TrackedOrder {
    const now = this.now();
    const order: TrackedOrder = {
      ...fields,
      orderId: null,
      symbol: this.config.symbol,
      status: 'pending',
      attempts: 0,
      cancelRequested: false,
      createdAt: now,
      updatedAt: now,
      fillPrice: null,
      error: null,
    };
    this.orders.set(order.clientOrderId, order);
    this.prune();
    return order;
  }

  private update(
    order: TrackedOrder,
    status: TrackedOrderStatus,
    extra: Partial<Pick<TrackedOrder, 'fillPrice' | 'error'>> = {},
  ): void {
    order.status = status;
    order.updatedAt = this.now();
    if (extra.fillPrice !== undefined) order.fillPrice = extra.fillPrice;
    if (extra.error !== undefined) order.error = extra.error;
  }

  private prune(): void {
    if (this.orders.size <= MAX_HISTORY) return;
    for (const [id, order] of this.orders) {
      if (this.orders.size <= MAX_HISTORY) break;
      if (order.status !== 'pending' && order.status !== 'open') this.orders.delete(id);
    }
  }

  private async withTimeout<T>(promise: Promise<T>, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new BrokerError('timeout', `${label} timed out after ${this.config.requestTimeoutMs}ms`)),
        this.config.requestTimeoutMs,
      );
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function asBrokerError(err: unknown): BrokerError {
  if (err instanceof BrokerError) return err;
  return new BrokerError('connectivity', describe(err));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
