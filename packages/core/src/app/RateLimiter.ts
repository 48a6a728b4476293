import { AdmissionCancelledError, RateLimiterConfigurationError } from '../domain/errors';
import type { Clock } from '../ports/Clock';
import type { Sleeper } from '../ports/Sleeper';
import type { RateLimitRule } from './RateLimitRule';

export const MIN_RETRY_DELAY_MS = 1;

export type RateLimitedAction<TArg, TResult = void> = (arg: TArg) => Promise<TResult>;

export interface RateLimiterLogger {
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface RateLimiterDeps {
  clock: Clock;
  sleeper: Sleeper;
  logger?: RateLimiterLogger;
}

export interface PerformOptions {
  /** Observed only while waiting for capacity; ignored once the admission is committed. */
  signal?: AbortSignal;
}

/**
 * Runs an action only once every rule has capacity for it.
 *
 * Each rule is polled in its own wait loop. When all loops report capacity, the
 * rules are re-checked and committed together in one synchronous step, so a rule
 * is never charged for a call that another rule turned away. Every rule records
 * the same instant: the re-check happens at that instant, so it is the moment each
 * rule confirmed capacity. Admission is best-effort rather than FIFO: a newcomer
 * may take a freed slot ahead of an older waiter.
 *
 * There is no default clock or sleeper here; `createRateLimiter` in the runtime
 * package supplies the system ones.
 */
export class RateLimiter<TArg, TResult = void> {
  private readonly rules: readonly RateLimitRule[];
  private readonly clock: Clock;
  private readonly sleeper: Sleeper;
  private readonly logger?: RateLimiterLogger;

  constructor(
    private readonly action: RateLimitedAction<TArg, TResult>,
    rules: readonly RateLimitRule[],
    deps: RateLimiterDeps
  ) {
    if (typeof action !== 'function') {
      throw new RateLimiterConfigurationError('action', 'Rate limited action must be a function');
    }
    if (rules.length === 0) {
      throw new RateLimiterConfigurationError('rules', 'At least one rate limit rule is required');
    }
    if (!deps?.clock || !deps.sleeper) {
      throw new RateLimiterConfigurationError('deps', 'A clock and a sleeper are required');
    }

    this.rules = [...rules];
    this.clock = deps.clock;
    this.sleeper = deps.sleeper;
    this.logger = deps.logger;
  }

  async perform(arg: TArg, options: PerformOptions = {}): Promise<TResult> {
    if (arg === null || arg === undefined) {
      throw new RateLimiterConfigurationError('arg', 'Argument is required');
    }

    await this.admit(options.signal);
    return this.action(arg);
  }

  private async admit(signal: AbortSignal | undefined): Promise<void> {
    const startedAt = this.clock.now();
    let attempts = 0;

    for (;;) {
      attempts += 1;
      await Promise.all(this.rules.map((rule) => this.waitForSlot(rule, signal)));

      const now = this.clock.now();
      const blocked = this.rules.find((rule) => rule.tryAdmit(now).status === 'busy');
      if (!blocked) {
        for (const rule of this.rules) {
          rule.commit(now);
        }
        this.logger?.debug('Admission granted', {
          waitedMs: now - startedAt,
          attempts
        });
        return;
      }

      this.logger?.debug('Admission lost to a concurrent call; waiting again', {
        rule: blocked.name,
        attempts
      });
    }
  }

  private async waitForSlot(rule: RateLimitRule, signal: AbortSignal | undefined): Promise<void> {
    for (;;) {
      this.throwIfCancelled(rule, signal);

      const now = this.clock.now();
      const result = rule.tryAdmit(now);
      if (result.status === 'available') {
        return;
      }

      const delay = Math.max(result.readyAt - now, MIN_RETRY_DELAY_MS);
      try {
        await this.sleeper.sleep(delay, signal);
      } catch (error) {
        this.throwIfCancelled(rule, signal);
        throw error;
      }
    }
  }

  private throwIfCancelled(rule: RateLimitRule, signal: AbortSignal | undefined): void {
    if (!signal?.aborted) {
      return;
    }
    this.logger?.debug('Admission cancelled', { rule: rule.name });
    throw new AdmissionCancelledError(signal.reason);
  }
}
