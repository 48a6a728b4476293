import { parseRuleOptions } from '../domain/models';
import type { AdmitResult, RuleOptions } from '../domain/models';

/**
 * Sliding-window counter for a single "at most `limit` per `windowMs`" rule.
 *
 * `tryAdmit` and `commit` are synchronous, so each runs to completion before any
 * other caller on the event loop can observe the history. Admission and
 * recording are split: `tryAdmit` never writes, `commit` never checks.
 */
export class RateLimitRule {
  public readonly limit: number;
  public readonly windowMs: number;
  public readonly name: string;
  private readonly history: number[] = [];

  constructor(options: RuleOptions) {
    const { limit, windowMs, name } = parseRuleOptions(options);
    this.limit = limit;
    this.windowMs = windowMs;
    this.name = name ?? `${limit}/${windowMs}ms`;
  }

  tryAdmit(now: number): AdmitResult {
    this.evict(now);

    if (this.history.length < this.limit) {
      return { status: 'available' };
    }

    return { status: 'busy', readyAt: this.history[0] + this.windowMs };
  }

  commit(timestamp: number): void {
    this.history.push(timestamp);
  }

  count(now: number): number {
    this.evict(now);
    return this.history.length;
  }

  snapshot(): readonly number[] {
    return [...this.history];
  }

  // The window is (now - windowMs, now]; an entry exactly windowMs old has expired.
  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.history.length && this.history[expired] <= cutoff) {
      expired += 1;
    }
    if (expired > 0) {
      this.history.splice(0, expired);
    }
  }
}
