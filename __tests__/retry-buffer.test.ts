/**
 * Tests for the bounded queue and the FIFO retry buffer
 */

import { describe, it, expect, vi } from 'vitest';
import { BoundedQueue } from '../src/core/bounded-queue';
import { RetryBuffer } from '../src/core/retry-buffer';

describe('BoundedQueue', () => {
  it('should never be full when unbounded', () => {
    const queue = new BoundedQueue<number>();
    for (let i = 0; i < 50; i++) {
      expect(queue.enqueue(i)).toBe(true);
    }
    expect(queue.isFull()).toBe(false);
    expect(queue.getUtilization()).toBe(0);
    expect(queue.size()).toBe(50);
  });

  it('should dequeue in FIFO order', () => {
    const queue = new BoundedQueue<string>();
    queue.enqueue('a');
    queue.enqueue('b');

    expect(queue.dequeue()?.data).toBe('a');
    expect(queue.dequeue()?.data).toBe('b');
    expect(queue.dequeue()).toBeNull();
  });

  it('should refuse the newest item when full under drop-newest', () => {
    const onDrop = vi.fn();
    const queue = new BoundedQueue<string>({ capacity: 2, overflowPolicy: 'drop-newest', onDrop });
    queue.enqueue('a');
    queue.enqueue('b');

    expect(queue.enqueue('c')).toBe(false);
    expect(queue.toArray()).toEqual(['a', 'b']);
    expect(queue.getDroppedCount()).toBe(1);
    expect(onDrop).toHaveBeenCalledWith(expect.objectContaining({ data: 'c' }));
  });

  it('should evict the head when full under drop-oldest', () => {
    const onDrop = vi.fn();
    const queue = new BoundedQueue<string>({ capacity: 2, overflowPolicy: 'drop-oldest', onDrop });
    queue.enqueue('a');
    queue.enqueue('b');

    expect(queue.enqueue('c')).toBe(true);
    expect(queue.toArray()).toEqual(['b', 'c']);
    expect(onDrop).toHaveBeenCalledWith(expect.objectContaining({ data: 'a' }));
    expect(queue.getUtilization()).toBe(100);
  });

  it('should reject a negative capacity', () => {
    expect(() => new BoundedQueue({ capacity: -1 })).toThrow('Queue capacity must be a non-negative integer');
  });
});

describe('RetryBuffer', () => {
  const newBuffer = (capacity = 0, overflowPolicy: 'drop-oldest' | 'drop-newest' = 'drop-oldest') =>
    new RetryBuffer({ retryIntervalMs: 5_000, capacity, overflowPolicy }, 0);

  it('should not drain before the retry interval has passed', async () => {
    const buffer = newBuffer();
    buffer.enqueue('a');
    const forward = vi.fn(() => true);

    const result = await buffer.drainTick(4_999, forward);

    expect(result).toEqual({ ran: false, delivered: 0, remaining: 1 });
    expect(forward).not.toHaveBeenCalled();
  });

  it('should deliver everything in order when the downstream accepts', async () => {
    const buffer = newBuffer();
    buffer.enqueue('a');
    buffer.enqueue('b');
    buffer.enqueue('c');
    const delivered: string[] = [];

    const result = await buffer.drainTick(5_000, (payload) => {
      delivered.push(payload);
      return true;
    });

    expect(delivered).toEqual(['a', 'b', 'c']);
    expect(result).toEqual({ ran: true, delivered: 3, remaining: 0 });
  });

  it('should stop at the first failure and leave it at the head', async () => {
    const buffer = newBuffer();
    buffer.enqueue('a');
    buffer.enqueue('b');
    buffer.enqueue('c');
    const attempted: string[] = [];

    const result = await buffer.drainTick(5_000, (payload) => {
      attempted.push(payload);
      return payload !== 'b';
    });

    expect(attempted).toEqual(['a', 'b']);
    expect(result).toEqual({ ran: true, delivered: 1, remaining: 2 });
    expect(buffer.peek()).toBe('b');
    expect(buffer.pending()).toEqual(['b', 'c']);
  });

  it('should keep FIFO order across interleaved enqueue and drain calls', async () => {
    const buffer = newBuffer();
    const delivered: string[] = [];
    let downstreamUp = false;
    const forward = async (payload: string) => {
      if (!downstreamUp) return false;
      delivered.push(payload);
      return true;
    };

    buffer.enqueue('m1');
    buffer.enqueue('m2');
    await buffer.drainTick(5_000, forward);
    buffer.enqueue('m3');
    await buffer.drainTick(10_000, forward);
    buffer.enqueue('m4');

    downstreamUp = true;
    await buffer.drainTick(15_000, forward);

    expect(delivered).toEqual(['m1', 'm2', 'm3', 'm4']);
    expect(buffer.size()).toBe(0);
  });

  it('should treat a throwing forward as a failed delivery', async () => {
    const buffer = newBuffer();
    buffer.enqueue('a');
    buffer.enqueue('b');

    const result = await buffer.drainTick(5_000, () => {
      throw new Error('socket closed');
    });

    expect(result).toEqual({ ran: true, delivered: 0, remaining: 2 });
    expect(buffer.pending()).toEqual(['a', 'b']);
  });

  it('should measure the interval from the last drain', async () => {
    const buffer = newBuffer();
    buffer.enqueue('a');
    const forward = vi.fn(() => false);

    await buffer.drainTick(5_000, forward);
    await buffer.drainTick(9_999, forward);
    await buffer.drainTick(10_000, forward);

    expect(forward).toHaveBeenCalledTimes(2);
  });

  it('should drop the oldest payload when a bounded buffer overflows', () => {
    const buffer = newBuffer(2, 'drop-oldest');
    buffer.enqueue('a');
    buffer.enqueue('b');

    expect(buffer.enqueue('c')).toBe(true);
    expect(buffer.pending()).toEqual(['b', 'c']);
    expect(buffer.snapshot()).toMatchObject({ size: 2, capacity: 2, dropped: 1 });
  });

  it('should refuse the new payload when a drop-newest buffer overflows', () => {
    const buffer = newBuffer(2, 'drop-newest');
    buffer.enqueue('a');
    buffer.enqueue('b');

    expect(buffer.enqueue('c')).toBe(false);
    expect(buffer.pending()).toEqual(['a', 'b']);
  });
});
