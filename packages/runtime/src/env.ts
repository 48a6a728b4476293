import { z } from 'zod';
import { RateLimiterConfigurationError } from '@window-gate/core';
import type { RuleOptions } from '@window-gate/core';
import { parseRuleSpecs } from './rule-spec';

export const LogLevelSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL', 'SILENT']));

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface AppConfig {
  appName: string;
  logLevel: LogLevel;
  metricsNamespace: string;
  rules: RuleOptions[];
}

let cachedConfig: AppConfig | undefined;

export function loadConfig(
  options: { forceRefresh?: boolean; env?: NodeJS.ProcessEnv } = {}
): AppConfig {
  if (!options.forceRefresh && !options.env && cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const appName = env.APP_NAME ?? 'window-gate';
  const metricsNamespace = env.METRICS_NAMESPACE ?? appName;
  const rules = parseRuleSpecs(requiredEnv(env, 'RATE_LIMIT_RULES'));

  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL ?? 'INFO');
  if (!logLevel.success) {
    throw new RateLimiterConfigurationError('LOG_LEVEL', `Unsupported LOG_LEVEL ${env.LOG_LEVEL}`);
  }

  const config: AppConfig = {
    appName,
    logLevel: logLevel.data,
    metricsNamespace,
    rules
  };

  if (!options.env) {
    cachedConfig = config;
  }
  return config;
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function requiredEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new RateLimiterConfigurationError(name, `${name} environment variable is required`);
  }
  return value;
}
