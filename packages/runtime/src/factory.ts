import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';
import {
  RateLimitRule,
  type Clock,
  type RateLimitedAction,
  type RuleOptions,
  type Sleeper
} from '@window-gate/core';
import { SystemClock, TimerSleeper } from '@window-gate/timers';
import { loadConfig } from './env';
import { InstrumentedRateLimiter, type MetricsSink } from './InstrumentedRateLimiter';

const DEFAULT_SERVICE_NAME = 'window-gate';

export interface CreateRateLimiterOptions {
  rules: readonly RuleOptions[];
  clock?: Clock;
  sleeper?: Sleeper;
  logger?: Logger;
  metrics?: MetricsSink;
}

export function createRateLimiter<TArg, TResult = void>(
  action: RateLimitedAction<TArg, TResult>,
  options: CreateRateLimiterOptions
): InstrumentedRateLimiter<TArg, TResult> {
  const logger = options.logger ?? new Logger({ serviceName: DEFAULT_SERVICE_NAME });
  const metrics = options.metrics ?? new Metrics({ namespace: DEFAULT_SERVICE_NAME });
  const rules = options.rules.map((rule) => new RateLimitRule(rule));

  logger.appendKeys({ rules: rules.map((rule) => rule.name) });
  logger.debug('Rate limiter created', { ruleCount: rules.length });

  return new InstrumentedRateLimiter(action, rules, {
    clock: options.clock ?? new SystemClock(),
    sleeper: options.sleeper ?? new TimerSleeper(),
    logger: {
      debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message))
    },
    metrics
  });
}

/** Builds a limiter from `RATE_LIMIT_RULES`, `APP_NAME`, `LOG_LEVEL` and `METRICS_NAMESPACE`. */
export function createRateLimiterFromEnv<TArg, TResult = void>(
  action: RateLimitedAction<TArg, TResult>,
  overrides: Omit<CreateRateLimiterOptions, 'rules'> = {}
): InstrumentedRateLimiter<TArg, TResult> {
  const config = loadConfig();
  const logger =
    overrides.logger ?? new Logger({ serviceName: config.appName, logLevel: config.logLevel });
  const metrics =
    overrides.metrics ??
    new Metrics({ namespace: config.metricsNamespace, serviceName: config.appName });

  return createRateLimiter(action, { ...overrides, rules: config.rules, logger, metrics });
}
