/**
 * Serial Queue — runs tasks one at a time in submission order.
 *
 * Each lane funnels candles, ticks, clock checks and broker callbacks
 * through one queue, which makes the lane the single writer of its
 * structure state, candidates and positions.
 */

export type QueueErrorHandler = (err: unknown) => void;

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private onError: QueueErrorHandler;

  constructor(onError: QueueErrorHandler) {
    this.onError = onError;
  }

  /**
   * Append a task. The returned promise settles when the task has run;
   * it never rejects, errors go to the queue's handler.
   */
  push(task: () => void | Promise<void>): Promise<void> {
    this.pending++;
    const run = this.tail.then(async () => {
      try {
        await task();
      } catch (err) {
        this.onError(err);
      } finally {
        this.pending--;
      }
    });
    this.tail = run;
    return run;
  }

  /** Resolves once every task queued so far has run */
  drain(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
