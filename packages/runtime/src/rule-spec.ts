import { z } from 'zod';
import { RateLimiterConfigurationError, RuleOptionsSchema } from '@window-gate/core';
import type { RuleOptions } from '@window-gate/core';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

const RULE_PATTERN = /^(\d+)\s*\/\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/;

const RuleSpecSchema = z
  .string()
  .trim()
  .regex(RULE_PATTERN, 'expected <limit>/<duration>, e.g. 3/5s')
  .transform((value) => {
    const [, limit, amount, unit] = RULE_PATTERN.exec(value) ?? [];
    const scale = UNIT_MS[unit ?? 'ms'] ?? 1;
    return { limit: Number(limit), windowMs: Number(amount) * scale };
  })
  .pipe(RuleOptionsSchema);

/**
 * Parses a comma separated rule list such as `3/5s,10/1m`.
 * Durations take `ms`, `s`, `m` or `h`; a bare number is milliseconds.
 */
export function parseRuleSpecs(text: string, field = 'RATE_LIMIT_RULES'): RuleOptions[] {
  const entries = text
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    throw new RateLimiterConfigurationError(field, `${field} must list at least one rule`);
  }

  return entries.map((entry) => {
    const parsed = RuleSpecSchema.safeParse(entry);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid rule';
      throw new RateLimiterConfigurationError(field, `${field} entry "${entry}": ${reason}`);
    }
    return parsed.data;
  });
}

