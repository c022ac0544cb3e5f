/**
 * CorrelationRegistry - Match asynchronous callbacks to waiting callers
 *
 * Every in-flight round trip registers its request ID and receives a
 * single-slot DeliverySlot. The /roundtrip handler delivers into the slot;
 * the orchestrator waits on it. The entry lives exactly as long as one
 * roundTripPost call: the orchestrator unregisters it on every exit path.
 *
 * Delivery outcomes:
 * - delivered: the slot was empty and open, the value is now in it
 * - gone: the ID is still registered but its slot is already full or closed
 * - not_found: nothing registered under the ID (never was, or cleaned up)
 *
 * All methods are synchronous, so each one runs to completion on the event
 * loop before any other handler touches the map.
 *
 * EXAMPLE USAGE:
 * ```typescript
 * const registry = new CorrelationRegistry<RoundTripResult>();
 * const slot = registry.register('req_1');
 * try {
 *   const outcome = await slot.wait(5000);
 *   if (outcome.status === 'delivered') use(outcome.value);
 * } finally {
 *   registry.unregister('req_1');
 * }
 *
 * // elsewhere, in the callback handler
 * registry.deliver('req_1', result); // 'delivered' | 'gone' | 'not_found'
 * ```
 */

import { DuplicateRequestError } from '../errors';
import type { DeliveryOutcome } from '../types';

export type WaitOutcome<T> =
  | { status: 'delivered'; value: T }
  | { status: 'timeout' }
  | { status: 'closed' };

/**
 * Capacity-1 hand-off between one producer call and one waiter
 */
export class DeliverySlot<T> {
  private value: { present: true; item: T } | { present: false } = { present: false };
  private closed = false;
  private waiter?: (outcome: WaitOutcome<T>) => void;

  /**
   * Put a value in the slot without waiting
   *
   * @returns false if the slot already holds a value or is closed
   */
  offer(item: T): boolean {
    if (this.value.present || this.closed) {
      return false;
    }

    this.value = { present: true, item };
    this.settle({ status: 'delivered', value: item });
    return true;
  }

  /**
   * Wait for the value, at most timeoutMs
   *
   * A value offered before wait() is returned immediately. Only one
   * waiter is supported.
   */
  wait(timeoutMs: number): Promise<WaitOutcome<T>> {
    if (this.value.present) {
      return Promise.resolve({ status: 'delivered', value: this.value.item });
    }
    if (this.closed) {
      return Promise.resolve({ status: 'closed' });
    }
    if (this.waiter) {
      return Promise.reject(new Error('DeliverySlot already has a waiter'));
    }

    return new Promise<WaitOutcome<T>>((resolve) => {
      // An expired slot takes no more values
      const timer = setTimeout(() => {
        this.waiter = undefined;
        this.closed = true;
        resolve({ status: 'timeout' });
      }, timeoutMs);

      this.waiter = (outcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };
    });
  }

  /**
   * Close the slot; a pending waiter resolves with 'closed'
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settle({ status: 'closed' });
  }

  isClosed(): boolean {
    return this.closed;
  }

  private settle(outcome: WaitOutcome<T>): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(outcome);
  }
}

/**
 * In-memory map from request ID to the slot its caller waits on
 *
 * Not persisted; does not survive a restart.
 */
export class CorrelationRegistry<T> {
  private slots = new Map<string, DeliverySlot<T>>();

  /**
   * Create and store a slot for a request ID
   *
   * @throws DuplicateRequestError if the ID is already registered
   */
  register(requestId: string): DeliverySlot<T> {
    if (this.slots.has(requestId)) {
      throw new DuplicateRequestError(requestId);
    }

    const slot = new DeliverySlot<T>();
    this.slots.set(requestId, slot);
    return slot;
  }

  /**
   * Hand a result to the caller waiting on requestId, never blocking
   */
  deliver(requestId: string, item: T): DeliveryOutcome {
    const slot = this.slots.get(requestId);
    if (!slot) {
      return 'not_found';
    }

    return slot.offer(item) ? 'delivered' : 'gone';
  }

  /**
   * Remove the entry and close its slot. Unknown IDs are ignored.
   */
  unregister(requestId: string): void {
    const slot = this.slots.get(requestId);
    if (!slot) {
      return;
    }

    this.slots.delete(requestId);
    slot.close();
  }

  /**
   * Close every slot, waking all waiters with 'closed'
   *
   * Entries stay registered until their callers unregister them, so a
   * late callback still gets 'gone' in the meantime.
   */
  closeAll(): void {
    for (const slot of this.slots.values()) {
      slot.close();
    }
  }

  has(requestId: string): boolean {
    return this.slots.has(requestId);
  }

  /**
   * Number of in-flight round trips
   */
  size(): number {
    return this.slots.size;
  }

  ids(): string[] {
    return [...this.slots.keys()];
  }
}
