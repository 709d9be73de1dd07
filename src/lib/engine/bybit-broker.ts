/**
 * Bybit Broker — live execution on USDT perpetuals through RestClientV5.
 *
 * Orders are addressed by orderLinkId (our clientOrderId). Market fills are
 * read back from the order history; resting limit orders are polled until
 * they fill, cancel or get rejected.
 */

import { RestClientV5 } from 'bybit-api';
import type {
  BrokerFill,
  LimitOrderRequest,
  MarketOrderRequest,
  OrderAck,
  OrderSide,
} from '@/types';
import { BrokerError, errorMessage } from '@/lib/errors';
import type { Broker, FillListener } from './broker';

export interface BybitBrokerConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  /** How often resting limits are checked for fills */
  pollIntervalMs: number;
  /** Attempts to read back a market fill before giving up */
  marketFillAttempts: number;
}

interface WatchedOrder {
  symbol: string;
  clientOrderId: string;
  size: number;
}

interface OrderSnapshot {
  orderId: string;
  orderStatus: string;
  avgPrice: string;
  cumExecQty: string;
  updatedTime: string;
}

/** Bybit "order does not exist / too late to cancel" */
const ORDER_NOT_FOUND_CODES = new Set([110001, 170213]);

const FINISHED_STATUSES = new Set(['Cancelled', 'Rejected', 'Deactivated']);

export class BybitBroker implements Broker {
  readonly name = 'bybit';
  private client: RestClientV5;
  private config: BybitBrokerConfig;
  private listeners = new Set<FillListener>();
  private watched = new Map<string, WatchedOrder>();
  private pollTimer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(config: Partial<BybitBrokerConfig> & Pick<BybitBrokerConfig, 'apiKey' | 'apiSecret'>) {
    this.config = { testnet: false, pollIntervalMs: 2000, marketFillAttempts: 5, ...config };
    this.client = new RestClientV5({
      key: this.config.apiKey,
      secret: this.config.apiSecret,
      testnet: this.config.testnet,
    });
  }

  async placeMarketOrder(request: MarketOrderRequest): Promise<OrderAck> {
    const response = await this.call('submitOrder', () =>
      this.client.submitOrder({
        category: 'linear',
        symbol: request.symbol,
        side: toBybitSide(request.side),
        orderType: 'Market',
        qty: formatNumber(request.size),
        orderLinkId: request.clientOrderId,
        reduceOnly: request.reduceOnly,
      }),
    );

    for (let attempt = 0; attempt < this.config.marketFillAttempts; attempt++) {
      const order = await this.lookup(request.symbol, request.clientOrderId);
      if (order && order.orderStatus === 'Filled') {
        return {
          clientOrderId: request.clientOrderId,
          orderId: response.orderId,
          status: 'filled',
          fillPrice: parseFloat(order.avgPrice),
          filledAt: parseInt(order.updatedTime, 10),
        };
      }
      if (order && FINISHED_STATUSES.has(order.orderStatus)) {
        throw new BrokerError('rejected', `Market order ${request.clientOrderId} ${order.orderStatus}`);
      }
      await sleep(250 * (attempt + 1));
    }

    throw new BrokerError('timeout', `Market order ${request.clientOrderId} fill not confirmed`);
  }

  async placeLimitOrder(request: LimitOrderRequest): Promise<OrderAck> {
    const response = await this.call('submitOrder', () =>
      this.client.submitOrder({
        category: 'linear',
        symbol: request.symbol,
        side: toBybitSide(request.side),
        orderType: 'Limit',
        qty: formatNumber(request.size),
        price: formatNumber(request.price),
        timeInForce: 'GTC',
        orderLinkId: request.clientOrderId,
      }),
    );

    this.watched.set(request.clientOrderId, {
      symbol: request.symbol,
      clientOrderId: request.clientOrderId,
      size: request.size,
    });
    this.ensurePolling();

    return { clientOrderId: request.clientOrderId, orderId: response.orderId, status: 'open' };
  }

  async cancelOrder(symbol: string, clientOrderId: string): Promise<void> {
    await this.call('cancelOrder', () =>
      this.client.cancelOrder({ category: 'linear', symbol, orderLinkId: clientOrderId }),
    );
    this.watched.delete(clientOrderId);
  }

  onFill(listener: FillListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.watched.clear();
  }

  // ============================================
  // Fill polling
  // ============================================

  private ensurePolling(): void {
    if (this.pollTimer) return;
    this.pollTimer = setInterval(() => {
      this.pollWatched().catch((err: unknown) => {
        console.error(`[BybitBroker] Poll failed: ${errorMessage(err)}`);
      });
    }, this.config.pollIntervalMs);
  }

  private async pollWatched(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      for (const order of [...this.watched.values()]) {
        const snapshot = await this.lookup(order.symbol, order.clientOrderId);
        if (!snapshot) continue;

        if (snapshot.orderStatus === 'Filled') {
          this.watched.delete(order.clientOrderId);
          const fill: BrokerFill = {
            symbol: order.symbol,
            clientOrderId: order.clientOrderId,
            orderId: snapshot.orderId,
            price: parseFloat(snapshot.avgPrice),
            size: parseFloat(snapshot.cumExecQty) || order.size,
            timestamp: parseInt(snapshot.updatedTime, 10),
          };
          for (const listener of this.listeners) listener(fill);
        } else if (FINISHED_STATUSES.has(snapshot.orderStatus)) {
          this.watched.delete(order.clientOrderId);
          console.warn(`[BybitBroker] Order ${order.clientOrderId} ${snapshot.orderStatus}`);
        }
      }
    } finally {
      this.polling = false;
    }

    if (this.watched.size === 0 && this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  /** Current state of an order, open or historic */
  private async lookup(symbol: string, clientOrderId: string): Promise<OrderSnapshot | null> {
    const active = await this.call('getActiveOrders', () =>
      this.client.getActiveOrders({ category: 'linear', symbol, orderLinkId: clientOrderId }),
    );
    const open = active.list[0];
    if (open) return open;

    const history = await this.call('getHistoricOrders', () =>
      this.client.getHistoricOrders({ category: 'linear', symbol, orderLinkId: clientOrderId }),
    );
    return history.list[0] ?? null;
  }

  /**
   * Run a REST call and unwrap its result. Non-zero retCodes become
   * rejections (or not_found), thrown errors become connectivity failures.
   */
  private async call<T>(
    label: string,
    request: () => Promise<{ retCode: number; retMsg: string; result: T }>,
  ): Promise<T> {
    let response: { retCode: number; retMsg: string; result: T };
    try {
      response = await request();
    } catch (err) {
      throw new BrokerError('connectivity', `${label}: ${errorMessage(err)}`);
    }

    if (response.retCode !== 0) {
      const code = ORDER_NOT_FOUND_CODES.has(response.retCode) ? 'not_found' : 'rejected';
      throw new BrokerError(code, `${label}: ${response.retMsg} (code: ${response.retCode})`);
    }
    return response.result;
  }
}

function toBybitSide(side: OrderSide): 'Buy' | 'Sell' {
  return side === 'buy' ? 'Buy' : 'Sell';
}

/** Decimal string without exponent notation */
function formatNumber(value: number): string {
  return value.toFixed(8).replace(/\.?0+$/, '');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
