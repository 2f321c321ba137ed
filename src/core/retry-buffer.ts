/**
 * RetryBuffer - Order-preserving holding area for failed deliveries
 *
 * Deliveries refused by the breaker or failed by the downstream are parked
 * here and drained on a fixed cadence. Draining always works from the head:
 * the head is removed only after it has been forwarded, and the first
 * payload that still fails stops the drain where it is. Later payloads are
 * never attempted ahead of an earlier one.
 *
 * The buffer is unbounded unless a capacity is configured; see
 * BoundedQueue for the overflow policies.
 */

import { BoundedQueue, type OverflowPolicy } from './bounded-queue';
import { errorMessage } from '../errors';

export interface RetryBufferOptions {
  retryIntervalMs: number;
  capacity?: number; // 0 = unbounded
  overflowPolicy?: OverflowPolicy;
}

/**
 * Sends one payload downstream; resolves true when delivered
 */
export type ForwardFn = (payload: string) => boolean | Promise<boolean>;

export interface DrainResult {
  ran: boolean;
  delivered: number;
  remaining: number;
}

export class RetryBuffer {
  private readonly queue: BoundedQueue<string>;
  private readonly retryIntervalMs: number;
  private lastDrainTime: number;

  constructor(options: RetryBufferOptions, startedAt: number = Date.now()) {
    this.retryIntervalMs = options.retryIntervalMs;
    this.lastDrainTime = startedAt;
    this.queue = new BoundedQueue<string>({
      capacity: options.capacity ?? 0,
      overflowPolicy: options.overflowPolicy ?? 'drop-oldest',
      onDrop: (item) => {
        console.warn('[RETRY] Buffer full, dropping payload queued at', new Date(item.enqueuedAt).toISOString());
      },
    });
  }

  /**
   * Park a payload at the tail
   *
   * @returns false when the buffer is full and the payload itself was dropped
   */
  enqueue(payload: string): boolean {
    return this.queue.enqueue(payload);
  }

  /**
   * Forward buffered payloads, oldest first, if the retry interval has passed
   *
   * A forward that throws counts as a failed delivery.
   */
  async drainTick(now: number, forward: ForwardFn): Promise<DrainResult> {
    if (now - this.lastDrainTime < this.retryIntervalMs) {
      return { ran: false, delivered: 0, remaining: this.queue.size() };
    }
    this.lastDrainTime = now;

    if (this.queue.isEmpty()) {
      return { ran: true, delivered: 0, remaining: 0 };
    }

    console.log(`[RETRY] Retrying ${this.queue.size()} queued messages`);

    let delivered = 0;
    let head = this.queue.peek();
    while (head) {
      let ok: boolean;
      try {
        ok = await forward(head.data);
      } catch (error) {
        console.error('[RETRY] Forward threw:', errorMessage(error));
        ok = false;
      }

      if (!ok) {
        break;
      }

      this.queue.dequeue();
      delivered++;
      head = this.queue.peek();
    }

    const remaining = this.queue.size();
    if (remaining > 0) {
      console.log(`[RETRY] Drain halted, ${remaining} still queued`);
    }
    return { ran: true, delivered, remaining };
  }

  size(): number {
    return this.queue.size();
  }

  peek(): string | null {
    return this.queue.peek()?.data ?? null;
  }

  /**
   * Pending payloads, oldest first
   */
  pending(): string[] {
    return this.queue.toArray();
  }

  snapshot(): Record<string, unknown> {
    return {
      size: this.queue.size(),
      capacity: this.queue.getCapacity(),
      utilization: this.queue.getUtilization(),
      dropped: this.queue.getDroppedCount(),
      retryIntervalMs: this.retryIntervalMs,
      lastDrainTime: this.lastDrainTime,
    };
  }
}
