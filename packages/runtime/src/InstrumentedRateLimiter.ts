import { MetricUnit } from '@aws-lambda-powertools/metrics';
import type { Metrics } from '@aws-lambda-powertools/metrics';
import {
  AdmissionCancelledError,
  RateLimiter,
  RateLimiterConfigurationError,
  type PerformOptions,
  type RateLimitRule,
  type RateLimitedAction,
  type RateLimiterDeps
} from '@window-gate/core';

export type MetricsSink = Pick<Metrics, 'addMetric' | 'publishStoredMetrics'>;

interface Admission<TArg> {
  arg: TArg;
  requestedAt: number;
}

/**
 * RateLimiter that records admission and action outcomes as Powertools metrics.
 * Metrics are buffered until `flush` is called.
 */
export class InstrumentedRateLimiter<TArg, TResult = void> {
  public readonly rules: readonly RateLimitRule[];
  private readonly limiter: RateLimiter<Admission<TArg>, TResult>;

  constructor(
    private readonly action: RateLimitedAction<TArg, TResult>,
    rules: readonly RateLimitRule[],
    private readonly deps: RateLimiterDeps & { metrics: MetricsSink }
  ) {
    this.rules = [...rules];
    this.limiter = new RateLimiter((admission) => this.run(admission), rules, deps);
  }

  async perform(arg: TArg, options: PerformOptions = {}): Promise<TResult> {
    if (arg === null || arg === undefined) {
      throw new RateLimiterConfigurationError('arg', 'Argument is required');
    }

    try {
      return await this.limiter.perform({ arg, requestedAt: this.deps.clock.now() }, options);
    } catch (error) {
      if (error instanceof AdmissionCancelledError) {
        this.deps.metrics.addMetric('admission_cancelled', MetricUnit.Count, 1);
      }
      throw error;
    }
  }

  flush(): void {
    this.deps.metrics.publishStoredMetrics();
  }

  private async run(admission: Admission<TArg>): Promise<TResult> {
    const { metrics, clock } = this.deps;
    metrics.addMetric('admission_granted', MetricUnit.Count, 1);
    metrics.addMetric('admission_wait', MetricUnit.Milliseconds, clock.now() - admission.requestedAt);

    try {
      const result = await this.action(admission.arg);
      metrics.addMetric('action_success', MetricUnit.Count, 1);
      return result;
    } catch (error) {
      metrics.addMetric('action_error', MetricUnit.Count, 1);
      throw error;
    }
  }
}
