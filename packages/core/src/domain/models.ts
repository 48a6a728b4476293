import { z } from 'zod';
import { RateLimiterConfigurationError } from './errors';

export const RuleOptionsSchema = z.object({
  limit: z.number().int().positive(),
  windowMs: z.number().finite().positive(),
  name: z.string().min(1).optional()
});

export type RuleOptions = z.infer<typeof RuleOptionsSchema>;

export type AdmitResult =
  | { status: 'available' }
  | { status: 'busy'; readyAt: number };

export function parseRuleOptions(input: unknown): RuleOptions {
  const parsed = RuleOptionsSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue?.path.join('.') || 'rule';
  throw new RateLimiterConfigurationError(
    field,
    `Invalid rate limit rule: ${field} ${issue?.message ?? 'is invalid'}`
  );
}
