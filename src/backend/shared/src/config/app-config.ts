/**
 * Application Configuration
 *
 * Reads runtime settings from environment variables and validates them
 * with Zod.
 *
 * @tested tests/property/app-config.property.test.ts
 */

import { z } from 'zod';

import { ConfigError, formatValidationIssues } from '../errors/errors.js';
import { LogLevel } from '../logging/logger.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

/**
 * Environment variable schema
 */
export const AppConfigEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  VILLAGE_DATA_FILE: z.string().min(1).default('data/sample_villages.csv'),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  ENABLE_SWAGGER: booleanFlag,
  TOP_N: z.coerce.number().int().min(1).max(100).default(5),
  REPORT_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(20),
});

/**
 * Application configuration
 */
export interface AppConfig {
  port: number;
  villageDataFile: string;
  logLevel: LogLevel;
  enableSwagger: boolean;
  topN: number;
  reportPageSize: number;
}

/**
 * Loads configuration from an environment map (defaults to process.env)
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const result = AppConfigEnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError('Invalid environment configuration', formatValidationIssues(result.error));
  }

  const parsed = result.data;
  return Object.freeze({
    port: parsed.PORT,
    villageDataFile: parsed.VILLAGE_DATA_FILE,
    logLevel: parsed.LOG_LEVEL,
    enableSwagger: parsed.ENABLE_SWAGGER,
    topN: parsed.TOP_N,
    reportPageSize: parsed.REPORT_PAGE_SIZE,
  });
}
