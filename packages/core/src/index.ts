export * from './domain/errors';
export * from './domain/models';
export * from './app/RateLimitRule';
export * from './app/RateLimiter';
export * from './ports/Clock';
export * from './ports/Sleeper';
