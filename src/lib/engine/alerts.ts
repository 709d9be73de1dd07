/**
 * Alerts — Telegram Bot Integration
 *
 * Sends notifications for zones, fills, closes and lane failures.
 * Falls back to console logging if Telegram is not configured.
 * Callers fire and forget: delivery failures are logged, never thrown.
 */

import type {
  EngineAlert,
  OrderBlock,
  Position,
} from '@/types';

export interface Notifier {
  zoneCreated(symbol: string, block: OrderBlock): Promise<void>;
  entryFilled(position: Position): Promise<void>;
  positionClosed(position: Position): Promise<void>;
  capitalInsufficient(symbol: string, blockId: number, notional: number, minNotional: number): Promise<void>;
  manualReview(position: Position, reason: string): Promise<void>;
  laneHalted(symbol: string, reason: string): Promise<void>;
  error(message: string, details?: Record<string, unknown>): Promise<void>;
}

export class AlertManager implements Notifier {
  private botToken: string | undefined;
  private chatId: string | undefined;
  private enabled: boolean;
  private queue: EngineAlert[] = [];
  private sending = false;
  private sent: EngineAlert[] = [];

  constructor(botToken?: string, chatId?: string) {
    this.botToken = botToken;
    this.chatId = chatId;
    this.enabled = !!(botToken && chatId);
  }

  // ============================================
  // High-Level Alert Methods
  // ============================================

  async zoneCreated(symbol: string, block: OrderBlock): Promise<void> {
    await this.send({
      level: 'info',
      event: 'zone_created',
      message: [
        `Zone: ${symbol} ${block.direction.toUpperCase()} ${block.kind.toUpperCase()} #${block.id}`,
        `Range: ${block.zoneLow.toFixed(2)} - ${block.zoneHigh.toFixed(2)}`,
        `From: ${block.sourceEvent.toUpperCase()}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async entryFilled(position: Position): Promise<void> {
    await this.send({
      level: 'info',
      event: 'entry_filled',
      message: [
        `Filled: ${position.symbol} ${position.direction === 'bullish' ? 'LONG' : 'SHORT'} (${position.kind})`,
        `Entry: $${position.entryPrice.toFixed(2)}`,
        `Size: ${position.size.toFixed(4)} @ ${position.leverage}x`,
        `SL: $${position.stopPrice.toFixed(2)}`,
        `TP: $${position.targetPrice.toFixed(2)}`,
        `Liq: $${position.liquidationPrice.toFixed(2)}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async positionClosed(position: Position): Promise<void> {
    const realized = position.realizedPnl ?? 0;
    const sign = realized >= 0 ? '+' : '';
    await this.send({
      level: realized >= 0 ? 'info' : 'warning',
      event: 'position_closed',
      message: [
        `Closed: ${position.symbol} ${position.direction === 'bullish' ? 'LONG' : 'SHORT'}`,
        `Exit: $${position.exitPrice?.toFixed(2) ?? 'N/A'}`,
        `Cause: ${position.exitCause ?? 'unknown'}`,
        `Outcome: ${position.outcome?.toUpperCase() ?? 'N/A'}`,
        `PnL: ${sign}$${realized.toFixed(2)}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async capitalInsufficient(
    symbol: string,
    blockId: number,
    notional: number,
    minNotional: number,
  ): Promise<void> {
    await this.send({
      level: 'warning',
      event: 'capital_insufficient',
      message: `Skipped ${symbol} zone #${blockId}: notional $${notional.toFixed(2)} below minimum $${minNotional.toFixed(2)}`,
      timestamp: Date.now(),
    });
  }

  async manualReview(position: Position, reason: string): Promise<void> {
    await this.send({
      level: 'critical',
      event: 'manual_review',
      message: [
        `REVIEW: ${position.symbol} position ${position.id}`,
        `Force-closed at $${position.exitPrice?.toFixed(2) ?? 'N/A'}`,
        `Reason: ${reason}`,
      ].join('\n'),
      timestamp: Date.now(),
    });
  }

  async laneHalted(symbol: string, reason: string): Promise<void> {
    await this.send({
      level: 'critical',
      event: 'lane_halted',
      message: `LANE HALTED: ${symbol}\n${reason}`,
      timestamp: Date.now(),
    });
  }

  async engineStarted(symbols: string[]): Promise<void> {
    await this.send({
      level: 'info',
      event: 'engine_started',
      message: `Engine started: ${symbols.join(', ')}`,
      timestamp: Date.now(),
    });
  }

  async engineStopped(reason: string): Promise<void> {
    await this.send({
      level: 'warning',
      event: 'engine_stopped',
      message: `Engine stopped: ${reason}`,
      timestamp: Date.now(),
    });
  }

  async error(message: string, details?: Record<string, unknown>): Promise<void> {
    await this.send({
      level: 'error',
      event: 'error',
      message: `ERROR: ${message}`,
      details,
      timestamp: Date.now(),
    });
  }

  /** Alerts emitted so far (most recent last) */
  getHistory(): readonly EngineAlert[] {
    return this.sent;
  }

  // ============================================
  // Core Send Logic
  // ============================================

  private async send(alert: EngineAlert): Promise<void> {
    // Always log to console
    const prefix = `[${alert.level.toUpperCase()}] [${alert.event}]`;
    console.log(`${prefix} ${alert.message}`);

    this.sent.push(alert);
    if (this.sent.length > 100) this.sent.shift();

    if (!this.enabled) return;

    this.queue.push(alert);
    await this.processQueue();
  }

  private async processQueue(): Promise<void> {
    if (this.sending || this.queue.length === 0) return;

    this.sending = true;
    try {
      let alert = this.queue.shift();
      while (alert) {
        await this.sendTelegram(alert);
        // Rate limit: max 1 msg per second
        await sleep(1000);
        alert = this.queue.shift();
      }
    } finally {
      this.sending = false;
    }
  }

  private async sendTelegram(alert: EngineAlert): Promise<void> {
    if (!this.botToken || !this.chatId) return;

    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: alert.message,
        }),
      });

      if (!response.ok) {
        console.error(`[Alerts] Telegram API error: ${response.status} ${response.statusText}`);
      }
    } catch (err) {
      console.error('[Alerts] Telegram send failed:', err);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
