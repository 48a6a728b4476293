import type { Clock } from '@window-gate/core';

/** Wall clock in epoch milliseconds that never runs backwards after an adjustment. */
export class SystemClock implements Clock {
  private last = Number.NEGATIVE_INFINITY;

  now(): number {
    this.last = Math.max(this.last, Date.now());
    return this.last;
  }
}
