/**
 * BoundedQueue - FIFO queue with an optional capacity and overflow policy
 *
 * Backs both the transport inbox (messages waiting for the poll loop) and
 * the retry buffer (deliveries waiting for the downstream to recover).
 *
 * Capacity 0 means unbounded. When a bounded queue is full:
 * - 'drop-newest': the incoming item is refused and enqueue() returns false
 * - 'drop-oldest': the head is evicted to make room and enqueue() returns true
 *
 * Either way the lost item is handed to onDrop and counted.
 */

export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

/**
 * Work item in the queue
 */
export interface QueueItem<T> {
  data: T;
  enqueuedAt: number; // Timestamp for observability
}

export interface BoundedQueueOptions<T> {
  capacity?: number;
  overflowPolicy?: OverflowPolicy;
  onDrop?: (item: QueueItem<T>) => void;
}

export class BoundedQueue<T> {
  private queue: QueueItem<T>[] = [];
  private readonly capacity: number;
  private readonly overflowPolicy: OverflowPolicy;
  private readonly onDrop?: (item: QueueItem<T>) => void;
  private dropped = 0;

  constructor(options: BoundedQueueOptions<T> = {}) {
    const capacity = options.capacity ?? 0;
    if (capacity < 0 || !Number.isInteger(capacity)) {
      throw new Error('Queue capacity must be a non-negative integer');
    }
    this.capacity = capacity;
    this.overflowPolicy = options.overflowPolicy ?? 'drop-newest';
    this.onDrop = options.onDrop;
  }

  /**
   * Append item to the tail
   *
   * @returns false only when the item itself was refused (full, drop-newest)
   */
  enqueue(data: T): boolean {
    const item: QueueItem<T> = { data, enqueuedAt: Date.now() };

    if (this.isFull()) {
      if (this.overflowPolicy === 'drop-newest') {
        this.drop(item);
        return false;
      }
      const evicted = this.queue.shift();
      if (evicted) {
        this.drop(evicted);
      }
    }

    this.queue.push(item);
    return true;
  }

  /**
   * Remove and return oldest item from queue
   */
  dequeue(): QueueItem<T> | null {
    return this.queue.shift() ?? null;
  }

  /**
   * Oldest item without removing it
   */
  peek(): QueueItem<T> | null {
    return this.queue[0] ?? null;
  }

  isFull(): boolean {
    return this.capacity > 0 && this.queue.length >= this.capacity;
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  size(): number {
    return this.queue.length;
  }

  /**
   * Get queue capacity (0 = unbounded)
   */
  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Queue utilization as percentage (0-100); always 0 when unbounded
   */
  getUtilization(): number {
    return this.capacity === 0 ? 0 : (this.queue.length / this.capacity) * 100;
  }

  getDroppedCount(): number {
    return this.dropped;
  }

  /**
   * Payloads in FIFO order, oldest first
   */
  toArray(): T[] {
    return this.queue.map((item) => item.data);
  }

  clear(): void {
    this.queue = [];
  }

  private drop(item: QueueItem<T>): void {
    this.dropped++;
    this.onDrop?.(item);
  }
}
