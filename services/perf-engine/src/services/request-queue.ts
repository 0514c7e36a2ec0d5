import type { AdmissionRejectReason } from '../types/index.js';

export type OfferResult = { accepted: true } | { accepted: false; reason: AdmissionRejectReason };

interface Waiter<T> {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout;
  cleanup: () => void;
}

/**
 * Bounded FIFO between producers and worker executors.
 *
 * Producers never wait: `offer` either hands the item to an idle executor,
 * enqueues it, or rejects it on the spot. Executors wait in `take` for a
 * bounded time.
 */
export class RequestQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get depth(): number {
    return this.items.length;
  }

  get maxDepth(): number {
    return this.capacity;
  }

  get idleWaiters(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): OfferResult {
    if (this.closed) {
      return { accepted: false, reason: 'stopping' };
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return { accepted: true };
    }

    if (this.items.length >= this.capacity) {
      return { accepted: false, reason: 'queue_full' };
    }

    this.items.push(item);
    return { accepted: true };
  }

  take(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          resolve(null);
        }, timeoutMs),
        cleanup: () => {
          clearTimeout(waiter.timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };
      const onAbort = () => {
        this.removeWaiter(waiter);
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Stop admitting items. Idle executors are released; queued items stay
   * available to `take` until drained.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.resolve(null);
    }
  }

  /**
   * Remove and return every item still queued.
   */
  drain(): T[] {
    return this.items.splice(0);
  }

  private removeWaiter(waiter: Waiter<T>): void {
    waiter.cleanup();
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }
}
