/**
 * Rate Limiter Utility
 * Spaces successive marketplace calls at least a fixed interval apart
 */

import { AbortedError } from './sleep.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * The first caller passes at once; each later caller waits until
 * `minSpacingMs` after the previous one passed. Callers are served in
 * arrival order.
 */
export class SpacingGate {
  private nextSlot = 0;
  private queue: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly minSpacingMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /**
   * Wait for this caller's turn. An aborted caller leaves the queue and
   * rejects with AbortedError without taking a slot.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new AbortedError());
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          this.queue = this.queue.filter(w => w !== waiter);
          reject(new AbortedError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
      this.drain();
    });
  }

  /** Ms until the next caller could pass */
  getWaitTime(): number {
    return Math.max(0, this.nextSlot - this.now());
  }

  /**
   * Reject every queued caller and cancel the pending timer
   */
  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const waiting = this.queue;
    this.queue = [];
    for (const waiter of waiting) {
      this.detach(waiter);
      waiter.reject(new AbortedError('Rate limiter disposed'));
    }
  }

  private drain(): void {
    if (this.timer) return;

    const next = this.queue[0];
    if (!next) return;

    const wait = this.getWaitTime();
    if (wait > 0) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.drain();
      }, wait);
      return;
    }

    this.queue.shift();
    this.detach(next);
    this.nextSlot = this.now() + this.minSpacingMs;
    next.resolve();
    this.drain();
  }

  private detach(waiter: Waiter): void {
    if (waiter.onAbort) {
      waiter.signal?.removeEventListener('abort', waiter.onAbort);
    }
  }
}
