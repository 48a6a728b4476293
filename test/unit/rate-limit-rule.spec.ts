import { describe, expect, it } from 'vitest';
import { RateLimitRule, RateLimiterConfigurationError } from '@window-gate/core';

describe('RateLimitRule', () => {
  it.each([
    ['zero limit', { limit: 0, windowMs: 1000 }, 'limit'],
    ['negative limit', { limit: -2, windowMs: 1000 }, 'limit'],
    ['fractional limit', { limit: 1.5, windowMs: 1000 }, 'limit'],
    ['zero window', { limit: 1, windowMs: 0 }, 'windowMs'],
    ['negative window', { limit: 1, windowMs: -5 }, 'windowMs'],
    ['infinite window', { limit: 1, windowMs: Number.POSITIVE_INFINITY }, 'windowMs']
  ])('rejects %s with a configuration error', (_label, options, field) => {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      let caught: unknown;
      try {
        new RateLimitRule(options);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(RateLimiterConfigurationError);
      expect(caught).toMatchObject({ code: 'CONFIGURATION', field });
    }
  });

  it('names rules after their limits unless told otherwise', () => {
    expect(new RateLimitRule({ limit: 3, windowMs: 5000 }).name).toBe('3/5000ms');
    expect(new RateLimitRule({ limit: 3, windowMs: 5000, name: 'burst' }).name).toBe('burst');
  });

  it('walks the three-per-five-seconds timeline', () => {
    const rule = new RateLimitRule({ limit: 3, windowMs: 5000 });

    for (const at of [0, 1000, 2000]) {
      expect(rule.tryAdmit(at)).toEqual({ status: 'available' });
      rule.commit(at);
    }

    expect(rule.tryAdmit(2500)).toEqual({ status: 'busy', readyAt: 5000 });
    expect(rule.tryAdmit(4999)).toEqual({ status: 'busy', readyAt: 5000 });
    expect(rule.tryAdmit(5000)).toEqual({ status: 'available' });
    rule.commit(5000);

    expect(rule.tryAdmit(6000)).toEqual({ status: 'available' });
    expect(rule.snapshot()).toEqual([2000, 5000]);
  });

  it('expires an entry that is exactly one window old', () => {
    const rule = new RateLimitRule({ limit: 1, windowMs: 1000 });
    rule.commit(0);

    expect(rule.tryAdmit(999)).toEqual({ status: 'busy', readyAt: 1000 });
    expect(rule.count(999)).toBe(1);
    expect(rule.count(1000)).toBe(0);
  });

  it('never records anything from tryAdmit alone', () => {
    const rule = new RateLimitRule({ limit: 2, windowMs: 1000 });

    rule.tryAdmit(0);
    rule.tryAdmit(1);
    rule.tryAdmit(2);

    expect(rule.snapshot()).toEqual([]);
  });

  it('commits without re-checking capacity', () => {
    const rule = new RateLimitRule({ limit: 1, windowMs: 1000 });

    rule.commit(10);
    rule.commit(20);

    expect(rule.count(20)).toBe(2);
    expect(rule.tryAdmit(20)).toEqual({ status: 'busy', readyAt: 1010 });
  });

  it('hands out copies of its history', () => {
    const rule = new RateLimitRule({ limit: 2, windowMs: 1000 });
    rule.commit(0);

    const copy = rule.snapshot();
    rule.commit(1);

    expect(copy).toEqual([0]);
    expect(rule.snapshot()).toEqual([0, 1]);
  });
});
