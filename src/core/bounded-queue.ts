/**
 * BoundedQueue - Fixed-capacity FIFO for pending webhook jobs
 *
 * enqueue() returns false when full; the webhook handler turns that into
 * a 429 instead of accepting work it cannot get to.
 */

export interface QueueItem<T> {
  data: T;
  /** Used to log how long a job waited for a worker */
  enqueuedAt: number;
}

export class BoundedQueue<T> {
  private items: QueueItem<T>[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('Queue capacity must be a positive integer');
    }
    this.capacity = capacity;
  }

  /**
   * @returns false if the queue is full
   */
  enqueue(data: T): boolean {
    if (this.isFull()) {
      return false;
    }

    this.items.push({ data, enqueuedAt: Date.now() });
    return true;
  }

  /**
   * Remove and return the oldest item, or null when empty
   */
  dequeue(): QueueItem<T> | null {
    return this.items.shift() ?? null;
  }

  /**
   * Remove every item, oldest first
   */
  drain(): QueueItem<T>[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Utilization as a percentage (0-100)
   */
  getUtilization(): number {
    return (this.items.length / this.capacity) * 100;
  }
}
