import { describe, it, expect } from 'vitest';
import type { BrokerFill, OrderAck } from '@/types';
import { OrderManager } from '@/lib/engine/order-manager';
import { PaperBroker } from '@/lib/engine/paper-broker';
import type { Broker } from '@/lib/engine/broker';
import { BrokerError } from '@/lib/errors';

const SYMBOL = 'TESTUSDT';

function manager(broker: Broker, requestTimeoutMs = 1000): OrderManager {
  return new OrderManager(broker, { symbol: SYMBOL, limitRetryBackoffMs: 0, requestTimeoutMs, verbose: false }, () => 42);
}

async function brokerErrorCode(promise: Promise<unknown>): Promise<string | null> {
  try {
    await promise;
    return null;
  } catch (err) {
    return err instanceof BrokerError ? err.code : 'unexpected';
  }
}

/** Broker whose calls never answer */
class SilentBroker implements Broker {
  readonly name = 'silent';
  placeMarketOrder(): Promise<OrderAck> {
    return new Promise(() => undefined);
  }
  placeLimitOrder(): Promise<OrderAck> {
    return new Promise(() => undefined);
  }
  cancelOrder(): Promise<void> {
    return new Promise(() => undefined);
  }
  onFill(): () => void {
    return () => undefined;
  }
}

describe('PaperBroker', () => {
  it('fills market orders at the last price plus slippage', async () => {
    const broker = new PaperBroker({ slippage: 0.001 });
    broker.updatePrice(SYMBOL, 100, 1000);

    const buy = await broker.placeMarketOrder({ symbol: SYMBOL, side: 'buy', size: 1, clientOrderId: 'b' });
    const sell = await broker.placeMarketOrder({ symbol: SYMBOL, side: 'sell', size: 1, clientOrderId: 's' });

    expect(buy.fillPrice).toBeCloseTo(100.1, 9);
    expect(sell.fillPrice).toBeCloseTo(99.9, 9);
    expect(buy.filledAt).toBe(1000);
  });

  it('fills a resting limit when price trades through it', async () => {
    const broker = new PaperBroker();
    const fills: BrokerFill[] = [];
    broker.onFill((fill) => fills.push(fill));

    await broker.placeLimitOrder({ symbol: SYMBOL, side: 'buy', size: 2, price: 102, clientOrderId: 'l1' });
    broker.updatePrice(SYMBOL, 102.5, 1000);
    expect(fills).toHaveLength(0);

    broker.updatePrice(SYMBOL, 101.9, 2000);
    expect(fills).toEqual([
      { symbol: SYMBOL, clientOrderId: 'l1', orderId: expect.any(String), price: 102, size: 2, timestamp: 2000 },
    ]);
    expect(broker.getOpenOrders(SYMBOL)).toEqual([]);
  });

  it('reports unknown cancels as not_found', async () => {
    const broker = new PaperBroker();
    expect(await brokerErrorCode(broker.cancelOrder(SYMBOL, 'missing'))).toBe('not_found');
  });
});

describe('OrderManager', () => {
  it('returns the fill of a market order', async () => {
    const broker = new PaperBroker();
    broker.updatePrice(SYMBOL, 100, 1000);
    const orders = manager(broker);

    const fill = await orders.placeMarket({ side: 'buy', size: 1, clientOrderId: 'm1' });

    expect(fill).toEqual({ price: 100, timestamp: 1000 });
    expect(orders.getOrder('m1')?.status).toBe('filled');
  });

  it('never retries a rejected market order', async () => {
    const broker = new PaperBroker();
    broker.updatePrice(SYMBOL, 100, 1000);
    broker.failNext('market');
    const orders = manager(broker);

    expect(await brokerErrorCode(orders.placeMarket({ side: 'buy', size: 1, clientOrderId: 'm1' }))).toBe('rejected');
    expect(orders.getOrder('m1')).toMatchObject({ status: 'rejected', attempts: 1 });
  });

  it('retries a failed limit placement once', async () => {
    const broker = new PaperBroker();
    broker.failNext('limit', 'connectivity');
    const orders = manager(broker);

    const ack = await orders.placeLimit({ side: 'buy', size: 1, price: 102, clientOrderId: 'l1' });

    expect(ack.status).toBe('open');
    expect(orders.getOrder('l1')).toMatchObject({ status: 'open', attempts: 2 });
    expect(broker.getOpenOrders(SYMBOL)).toHaveLength(1);
  });

  it('gives up after the second limit failure', async () => {
    const broker = new PaperBroker();
    broker.failNext('limit', 'connectivity');
    broker.failNext('limit', 'rejected');
    const orders = manager(broker);

    const code = await brokerErrorCode(orders.placeLimit({ side: 'buy', size: 1, price: 102, clientOrderId: 'l1' }));

    expect(code).toBe('rejected');
    expect(orders.getOrder('l1')?.status).toBe('rejected');
  });

  it('holds a cancel until the placement is acknowledged', async () => {
    const broker = new PaperBroker();
    const orders = manager(broker);

    const placing = orders.placeLimit({ side: 'buy', size: 1, price: 102, clientOrderId: 'l1' });
    expect(await orders.cancel('l1')).toBe('deferred');
    await placing;

    expect(orders.getOrder('l1')?.status).toBe('cancelled');
    expect(broker.getOpenOrders(SYMBOL)).toEqual([]);
  });

  it('treats a cancel racing a fill as not_found', async () => {
    const broker = new PaperBroker();
    const orders = manager(broker);
    await orders.placeLimit({ side: 'buy', size: 1, price: 102, clientOrderId: 'l1' });
    broker.updatePrice(SYMBOL, 101, 1000);

    expect(await orders.cancel('l1')).toBe('not_found');
    expect(await orders.cancel('unknown')).toBe('not_found');
  });

  it('does not cancel a final order', async () => {
    const broker = new PaperBroker();
    broker.updatePrice(SYMBOL, 100, 1000);
    const orders = manager(broker);
    await orders.placeMarket({ side: 'buy', size: 1, clientOrderId: 'm1' });

    expect(await orders.cancel('m1')).toBe('already_final');
  });

  it('times out a broker that never answers', async () => {
    const orders = manager(new SilentBroker(), 10);

    expect(await brokerErrorCode(orders.placeMarket({ side: 'sell', size: 1, clientOrderId: 'm1' }))).toBe('timeout');
  });

  it('marks reduce-only closes', async () => {
    const requests: boolean[] = [];
    const broker = new PaperBroker();
    broker.updatePrice(SYMBOL, 100, 1000);
    const spy: Broker = {
      name: 'spy',
      placeMarketOrder: (request) => {
        requests.push(request.reduceOnly === true);
        return broker.placeMarketOrder(request);
      },
      placeLimitOrder: (request) => broker.placeLimitOrder(request),
      cancelOrder: (symbol, id) => broker.cancelOrder(symbol, id),
      onFill: (listener) => broker.onFill(listener),
    };

    await manager(spy).closePosition({ side: 'sell', size: 1, clientOrderId: 'x1' });

    expect(requests).toEqual([true]);
  });
});
