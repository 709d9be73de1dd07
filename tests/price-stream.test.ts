import { describe, it, expect } from 'vitest';
import type { Candle, Tick } from '@/types';
import { PriceStream, parseTradeMessage } from '@/lib/engine/price-stream';
import { T0 } from './fixtures';

const MINUTE = 60_000;

function tradeFrame(trades: Array<{ T: number; p: string; v?: string; s?: string }>): string {
  return JSON.stringify({
    topic: 'publicTrade.BTCUSDT',
    type: 'snapshot',
    ts: T0,
    data: trades.map((t) => ({ T: t.T, s: t.s ?? 'BTCUSDT', S: 'Buy', v: t.v ?? '0.5', p: t.p, i: 'trade-id' })),
  });
}

describe('parseTradeMessage', () => {
  it('turns a trade frame into ordered ticks', () => {
    const trades = parseTradeMessage(tradeFrame([
      { T: T0 + 2000, p: '101.5' },
      { T: T0 + 1000, p: '101.25', v: '2' },
    ]));

    expect(trades).toEqual([
      { symbol: 'BTCUSDT', tick: { price: 101.25, timestamp: T0 + 1000, volume: 2 } },
      { symbol: 'BTCUSDT', tick: { price: 101.5, timestamp: T0 + 2000, volume: 0.5 } },
    ]);
  });

  it('ignores acks, pongs and garbage', () => {
    expect(parseTradeMessage('{"success":true,"op":"subscribe"}')).toBeNull();
    expect(parseTradeMessage('{"op":"pong"}')).toBeNull();
    expect(parseTradeMessage('not json')).toBeNull();
  });
});

describe('PriceStream', () => {
  it('emits ticks and closes candles on bucket change', () => {
    const stream = new PriceStream({ symbols: { BTCUSDT: MINUTE } });
    const ticks: Tick[] = [];
    const candles: Candle[] = [];
    stream.on('tick', (_symbol, tick) => ticks.push(tick));
    stream.on('candle', (_symbol, candle) => candles.push(candle));

    stream.processMessage(tradeFrame([{ T: T0 + 1000, p: '100' }, { T: T0 + 30_000, p: '103' }]));
    stream.processMessage(tradeFrame([{ T: T0 + MINUTE + 500, p: '102' }]));

    expect(ticks).toHaveLength(3);
    expect(candles).toEqual([
      { timestamp: T0, open: 100, high: 103, low: 100, close: 103, volume: 1, isClosed: true },
    ]);
  });

  it('skips symbols it was not configured for', () => {
    const stream = new PriceStream({ symbols: { ETHUSDT: MINUTE } });
    const ticks: Tick[] = [];
    stream.on('tick', (_symbol, tick) => ticks.push(tick));

    stream.processMessage(tradeFrame([{ T: T0 + 1000, p: '100' }]));

    expect(ticks).toEqual([]);
  });

  it('flushes a candle whose bucket ended without a new trade', () => {
    const stream = new PriceStream({ symbols: { BTCUSDT: MINUTE } });
    const candles: Candle[] = [];
    stream.on('candle', (_symbol, candle) => candles.push(candle));

    stream.processMessage(tradeFrame([{ T: T0 + 1000, p: '100' }]));
    stream.flushCandles(T0 + MINUTE);

    expect(candles.map((c) => c.close)).toEqual([100]);
    expect(stream.getState()).toBe('disconnected');
  });
});
