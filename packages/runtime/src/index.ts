export * from './env';
export * from './rule-spec';
export * from './factory';
export { InstrumentedRateLimiter, type MetricsSink } from './InstrumentedRateLimiter';
