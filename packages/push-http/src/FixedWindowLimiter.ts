import type { RateLimiter } from '@pushlane/core';
import { LimiterClosedError } from './errors';

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

/**
 * Fixed-window permit pool. Each `acquire` deposits one permit; `reset`
 * drains the pool back to zero in one step, so a window admits at most
 * `capacity` callers and bursts may straddle a window boundary.
 */
export class FixedWindowLimiter implements RateLimiter {
  private capacity: number;
  private occupied = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    this.capacity = assertCapacity(capacity);
  }

  get size(): number {
    return this.capacity;
  }

  get inUse(): number {
    return this.occupied;
  }

  get pending(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new LimiterClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.occupied < this.capacity) {
      this.occupied += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort)
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  reset(): void {
    this.occupied = 0;
    this.admitWaiting();
  }

  /** Swaps in an empty pool of the new capacity; queued callers carry over. */
  resize(capacity: number): void {
    this.capacity = assertCapacity(capacity);
    this.reset();
  }

  close(): void {
    this.closed = true;
    const error = new LimiterClosedError();
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.reject(error);
    }
  }

  private admitWaiting(): void {
    while (!this.closed && this.occupied < this.capacity) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        return;
      }
      waiter.detach();
      this.occupied += 1;
      waiter.resolve();
    }
  }
}

function assertCapacity(capacity: number): number {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new RangeError(`limiter rate must be a non-negative integer, got ${capacity}`);
  }
  return capacity;
}
