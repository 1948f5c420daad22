import dotenv from 'dotenv';
import { z } from 'zod';

import { parseLogLevel, type LogLevel } from '../logger.ts';
import { ConfigError } from './errors.ts';

export interface CatalogSettings {
  configPath: string;
  namespace: string;
  /** Region of the CloudWatch client; `null` when the environment names none. */
  region: string | null;
  alarmConsoleRegion: string;
  lookbackDays: number;
  requestTimeoutMs: number;
  maxAttempts: number;
  port: number;
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveIntFromEnv = (fallback: number) =>
  optionalString.pipe(
    z.coerce.number().int().positive({ message: 'Must be a positive integer' }).default(fallback)
  );

const environmentSchema = z.object({
  BENCHMARK_CONFIG_PATH: optionalString,
  BENCHMARK_METRICS_NAMESPACE: optionalString,
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  BENCHMARK_ALARM_CONSOLE_REGION: optionalString,
  BENCHMARK_LOOKBACK_DAYS: positiveIntFromEnv(7),
  BENCHMARK_REQUEST_TIMEOUT_MS: positiveIntFromEnv(10000),
  BENCHMARK_MAX_ATTEMPTS: positiveIntFromEnv(3),
  PORT: positiveIntFromEnv(8080),
  LOG_LEVEL: optionalString,
});

export const DEFAULT_CONFIG_PATH = 'config/benchmarks.yaml';
export const DEFAULT_NAMESPACE = 'benchmarkai-metrics-prod';
export const DEFAULT_ALARM_CONSOLE_REGION = 'us-east-1';

export function readCatalogSettings(
  env: Record<string, string | undefined> = process.env
): CatalogSettings {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    configPath: parsed.BENCHMARK_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
    namespace: parsed.BENCHMARK_METRICS_NAMESPACE ?? DEFAULT_NAMESPACE,
    region: parsed.AWS_REGION ?? parsed.AWS_DEFAULT_REGION ?? null,
    alarmConsoleRegion: parsed.BENCHMARK_ALARM_CONSOLE_REGION ?? DEFAULT_ALARM_CONSOLE_REGION,
    lookbackDays: parsed.BENCHMARK_LOOKBACK_DAYS,
    requestTimeoutMs: parsed.BENCHMARK_REQUEST_TIMEOUT_MS,
    maxAttempts: parsed.BENCHMARK_MAX_ATTEMPTS,
    port: parsed.PORT,
    logLevel: parseLogLevel(parsed.LOG_LEVEL),
  };
}

/**
 * Loads `.env` (or the file named by `ENV_PATH`) into `process.env`, then reads settings.
 */
export function loadCatalogSettings(): CatalogSettings {
  dotenv.config({ path: process.env.ENV_PATH || '.env' });
  return readCatalogSettings(process.env);
}
