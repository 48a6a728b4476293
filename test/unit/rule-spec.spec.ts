import { describe, expect, it } from 'vitest';
import { RateLimiterConfigurationError } from '@window-gate/core';
import { parseRuleSpecs } from '@window-gate/runtime';

describe('parseRuleSpecs', () => {
  it('reads limits and durations in every unit', () => {
    expect(parseRuleSpecs('3/5s, 10/1m,1/1h,250/500ms,5/200,2/1.5s')).toEqual([
      { limit: 3, windowMs: 5000 },
      { limit: 10, windowMs: 60_000 },
      { limit: 1, windowMs: 3_600_000 },
      { limit: 250, windowMs: 500 },
      { limit: 5, windowMs: 200 },
      { limit: 2, windowMs: 1500 }
    ]);
  });

  it('ignores empty entries left by stray commas', () => {
    expect(parseRuleSpecs('3/5s,,')).toEqual([{ limit: 3, windowMs: 5000 }]);
  });

  it.each(['', ' , ', 'three/5s', '3/5d', '0/5s', '3/0s', '3'])(
    'rejects %j',
    (text) => {
      expect(() => parseRuleSpecs(text)).toThrow(RateLimiterConfigurationError);
    }
  );

  it('names the offending setting and entry', () => {
    expect(() => parseRuleSpecs('3/5s,0/1m', 'API_RULES')).toThrow(
      'API_RULES entry "0/1m": Number must be greater than 0'
    );
  });
});
