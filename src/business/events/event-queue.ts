// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

interface Taker<T> {
  resolve(item: T): void;
}

interface BlockedPut<T> {
  item: T;
  onAdmitted: () => void;
}

/**
 * Bounded FIFO queue with blocking hand-off.
 *
 * `put` resolves once the item is queued or handed to a waiting consumer, so producers wait while the queue is full.
 * `take` waits until an item is available or its signal aborts.
 */
export class EventQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Taker<T>[] = [];
  private readonly blocked: BlockedPut<T>[] = [];

  public constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new IllegalArgumentError('queue capacity must be a positive integer', capacity);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  /** Producers currently waiting for room. */
  public get pending(): number {
    return this.blocked.length;
  }

  /**
   * Resolves once the item is queued. An abort of `signal` only cancels a put that is still waiting for room.
   */
  public put(item: T, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject): void => {
      const parked: BlockedPut<T> | undefined = this.admit(item, resolve);
      if (!parked || !signal) {
        return;
      }

      const onAbort = (): void => {
        const index: number = this.blocked.indexOf(parked);
        if (index !== -1) {
          this.blocked.splice(index, 1);
          reject(signal.reason);
        }
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, {once: true});
      parked.onAdmitted = (): void => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
    });
  }

  /**
   * Puts an item back after a failed delivery. It joins the tail, behind items already queued.
   */
  public requeue(item: T): void {
    this.admit(item, (): void => {});
  }

  public take(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const item: T = this.items.splice(0, 1)[0];
      this.admitBlocked();
      return Promise.resolve(item);
    }

    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject): void => {
      const onAbort = (): void => {
        const index: number = this.takers.indexOf(taker);
        if (index !== -1) {
          this.takers.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const taker: Taker<T> = {
        resolve: (item: T): void => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
      };

      signal?.addEventListener('abort', onAbort, {once: true});
      this.takers.push(taker);
    });
  }

  /**
   * Hands the item to a waiting consumer, queues it, or parks it until room frees up. Returns the parked entry.
   */
  private admit(item: T, onAdmitted: () => void): BlockedPut<T> | undefined {
    const taker: Taker<T> | undefined = this.takers.shift();
    if (taker) {
      taker.resolve(item);
      onAdmitted();
      return undefined;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      onAdmitted();
      return undefined;
    }

    const parked: BlockedPut<T> = {item, onAdmitted};
    this.blocked.push(parked);
    return parked;
  }

  private admitBlocked(): void {
    const next: BlockedPut<T> | undefined = this.blocked.shift();
    if (next) {
      this.items.push(next.item);
      next.onAdmitted();
    }
  }
}
