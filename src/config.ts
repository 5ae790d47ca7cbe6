/**
 * Runtime configuration from environment variables
 *
 * LOG_LEVEL, LOG_FORMAT, CATALOG_PATH, EXPORT_CONCURRENCY, METRICS_ENABLED
 * and SOURCE_TIMEOUT_MS. The command line loads `.env` through dotenv before
 * this runs.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level "${value}"` });
        return z.NEVER;
      }
      return level;
    }),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),
  CATALOG_PATH: z.string().min(1).default('./catalog.json'),
  EXPORT_CONCURRENCY: positiveInt.default(8),
  METRICS_ENABLED: booleanFlag.default('false'),
  SOURCE_TIMEOUT_MS: positiveInt.default(10_000),
});

export interface CatalogConfig {
  logLevel: LogLevel;
  logFormat: 'console' | 'json';
  catalogPath: string;
  exportConcurrency: number;
  metricsEnabled: boolean;
  sourceTimeoutMs: number;
}

/**
 * Read and validate the configuration; empty variables count as unset
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ConfigurationError(
      `Invalid configuration: ${first ? `${first.variable}: ${first.message}` : 'unknown problem'}`,
      { issues }
    );
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    logFormat: parsed.data.LOG_FORMAT,
    catalogPath: parsed.data.CATALOG_PATH,
    exportConcurrency: parsed.data.EXPORT_CONCURRENCY,
    metricsEnabled: parsed.data.METRICS_ENABLED,
    sourceTimeoutMs: parsed.data.SOURCE_TIMEOUT_MS,
  };
}
