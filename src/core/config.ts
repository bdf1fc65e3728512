import { z } from 'zod';

/**
 * Environment-driven settings, validated once at load.
 *
 * FILING_STATEMENTS_LOG_LEVEL       silent | warn | debug (default warn)
 * FILING_STATEMENTS_DEFAULT_MONTHS  legacy period length when the cash-flow
 *                                   statement declares none (default 12)
 */

const configSchema = z.object({
  FILING_STATEMENTS_LOG_LEVEL: z.enum(['silent', 'warn', 'debug']).default('warn'),
  FILING_STATEMENTS_DEFAULT_MONTHS: z.coerce.number().int().positive().max(12).default(12),
});

export type LogLevel = z.infer<typeof configSchema>['FILING_STATEMENTS_LOG_LEVEL'];

export interface AppConfig {
  logLevel: LogLevel;
  defaultMonths: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse(env);
  return {
    logLevel: parsed.FILING_STATEMENTS_LOG_LEVEL,
    defaultMonths: parsed.FILING_STATEMENTS_DEFAULT_MONTHS,
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
