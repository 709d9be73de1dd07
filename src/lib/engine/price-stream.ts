/**
 * Bybit Price Stream
 * Subscribes to the public trade stream for each symbol, with ping keepalive
 * and reconnection with exponential backoff. Emits every trade as a tick and
 * every completed bucket as a closed candle.
 */

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { z } from 'zod';
import type { Candle, Tick } from '@/types/candle';
import { CandleBuilder } from '@/lib/smc/candle-aggregator';

export type StreamConnectionState = 'connecting' | 'connected' | 'disconnected' | 'reconnecting';

export interface PriceStreamConfig {
  /** Symbol → candle interval */
  symbols: Record<string, number>;
  testnet?: boolean;
  baseUrl?: string;
  maxReconnectAttempts?: number;
  reconnectDelayMs?: number;
  reconnectBackoffMultiplier?: number;
  pingIntervalMs?: number;
}

export interface PriceStreamEvents {
  connected: () => void;
  disconnected: (reason: string) => void;
  error: (error: Error) => void;
  tick: (symbol: string, tick: Tick) => void;
  candle: (symbol: string, candle: Candle) => void;
  reconnecting: (attempt: number) => void;
}

const MAINNET_URL = 'wss://stream.bybit.com/v5/public/linear';
const TESTNET_URL = 'wss://stream-testnet.bybit.com/v5/public/linear';

const tradeMessageSchema = z.object({
  topic: z.string().startsWith('publicTrade.'),
  data: z.array(
    z.object({
      T: z.number(),
      s: z.string(),
      p: z.string(),
      v: z.string(),
    }),
  ),
});

export interface ParsedTrade {
  symbol: string;
  tick: Tick;
}

/**
 * Extract trades from a raw stream frame. Returns null for anything that
 * is not a trade message (subscription acks, pongs).
 */
export function parseTradeMessage(raw: string): ParsedTrade[] | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = tradeMessageSchema.safeParse(json);
  if (!parsed.success) return null;

  return parsed.data.data
    .map((t) => ({
      symbol: t.s,
      tick: { price: parseFloat(t.p), timestamp: t.T, volume: parseFloat(t.v) },
    }))
    .sort((a, b) => a.tick.timestamp - b.tick.timestamp);
}

export class PriceStream extends EventEmitter {
  private config: Required<Omit<PriceStreamConfig, 'testnet'>>;
  private ws: WebSocket | null = null;
  private state: StreamConnectionState = 'disconnected';
  private reconnectAttempts = 0;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private flushInterval: NodeJS.Timeout | null = null;
  private lastPongTime = 0;
  private shouldReconnect = true;
  private builders = new Map<string, CandleBuilder>();

  constructor(config: PriceStreamConfig) {
    super();
    this.config = {
      baseUrl: config.testnet ? TESTNET_URL : MAINNET_URL,
      maxReconnectAttempts: 10,
      reconnectDelayMs: 1000,
      reconnectBackoffMultiplier: 2,
      pingIntervalMs: 20000,
      ...config,
    };

    for (const [symbol, intervalMs] of Object.entries(config.symbols)) {
      this.builders.set(symbol, new CandleBuilder(intervalMs));
    }
  }

  /**
   * Connect and subscribe to every configured symbol
   */
  async connect(): Promise<void> {
    if (this.state === 'connected' || this.state === 'connecting') {
      return;
    }

    this.shouldReconnect = true;
    this.state = 'connecting';

    return new Promise((resolve, reject) => {
      console.log(`[PriceStream] Connecting to ${this.config.baseUrl}...`);

      try {
        const ws = new WebSocket(this.config.baseUrl);
        this.ws = ws;

        ws.on('open', () => {
          this.state = 'connected';
          this.reconnectAttempts = 0;
          this.lastPongTime = Date.now();
          console.log('[PriceStream] Connected');
          ws.send(JSON.stringify({
            op: 'subscribe',
            args: [...this.builders.keys()].map((s) => `publicTrade.${s}`),
          }));
          this.emit('connected');
          this.startTimers();
          resolve();
        });

        ws.on('message', (data: WebSocket.RawData) => {
          this.processMessage(data.toString());
        });

        ws.on('close', (code, reason) => {
          const reasonStr = reason.toString() || 'unknown';
          console.log(`[PriceStream] Disconnected: ${code} - ${reasonStr}`);
          this.handleDisconnect(reasonStr);
        });

        ws.on('error', (error) => {
          console.error('[PriceStream] Error:', error.message);
          this.emit('error', error);
          if (this.state === 'connecting') {
            reject(error);
          }
        });
      } catch (error) {
        this.state = 'disconnected';
        reject(error);
      }
    });
  }

  /**
   * Disconnect from WebSocket
   */
  disconnect(): void {
    this.shouldReconnect = false;
    this.stopTimers();
    this.clearReconnectTimeout();

    if (this.ws) {
      this.ws.removeAllListeners();
      if (this.ws.readyState === WebSocket.OPEN) {
        this.ws.close(1000, 'Client disconnect');
      }
      this.ws = null;
    }

    this.state = 'disconnected';
    console.log('[PriceStream] Disconnected by client');
  }

  /**
   * Handle one raw frame: pongs refresh the keepalive, trades become ticks
   * and feed the candle builders.
   */
  processMessage(raw: string): void {
    if (raw.includes('"pong"')) {
      this.lastPongTime = Date.now();
      return;
    }

    const trades = parseTradeMessage(raw);
    if (!trades) return;

    for (const { symbol, tick } of trades) {
      const builder = this.builders.get(symbol);
      if (!builder) continue;

      const closed = builder.push(tick);
      if (closed) this.emit('candle', symbol, closed);
      this.emit('tick', symbol, tick);
    }
  }

  /** Close candles whose bucket ended without a trade in the next one */
  flushCandles(now: number): void {
    for (const [symbol, builder] of this.builders) {
      const closed = builder.flush(now);
      if (closed) this.emit('candle', symbol, closed);
    }
  }

  getState(): StreamConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  // ============================================
  // Connection management
  // ============================================

  private handleDisconnect(reason: string): void {
    this.stopTimers();
    this.state = 'disconnected';
    this.emit('disconnected', reason);

    if (this.shouldReconnect) {
      this.scheduleReconnect();
    }
  }

  /**
   * Schedule reconnection with exponential backoff
   */
  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      console.error('[PriceStream] Max reconnect attempts reached');
      this.emit('error', new Error('Max reconnect attempts reached'));
      return;
    }

    this.state = 'reconnecting';
    this.reconnectAttempts++;

    const delay = this.config.reconnectDelayMs *
      Math.pow(this.config.reconnectBackoffMultiplier, this.reconnectAttempts - 1);

    console.log(`[PriceStream] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.config.maxReconnectAttempts})`);
    this.emit('reconnecting', this.reconnectAttempts);

    this.reconnectTimeout = setTimeout(() => {
      this.connect().catch((err: unknown) => {
        // The close handler schedules the next attempt
        console.warn(`[PriceStream] Reconnect failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, delay);
  }

  private clearReconnectTimeout(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  private startTimers(): void {
    this.stopTimers();

    this.pingInterval = setInterval(() => {
      if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
        return;
      }

      const timeSinceLastPong = Date.now() - this.lastPongTime;
      if (timeSinceLastPong > this.config.pingIntervalMs * 2) {
        console.warn('[PriceStream] No pong received, reconnecting...');
        this.ws.terminate();
        return;
      }

      this.ws.send(JSON.stringify({ op: 'ping' }));
    }, this.config.pingIntervalMs);

    this.flushInterval = setInterval(() => this.flushCandles(Date.now()), 1000);
  }

  private stopTimers(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
  }

  /**
   * Type-safe event emitter methods
   */
  override on<K extends keyof PriceStreamEvents>(
    event: K,
    listener: PriceStreamEvents[K],
  ): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof PriceStreamEvents>(
    event: K,
    ...args: Parameters<PriceStreamEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
