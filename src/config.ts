/**
 * Runtime configuration from environment variables
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { ConfigurationError } from './errors.js';
import { parseLogLevel, type LogFormat, type LogLevel } from './logger.js';

const envSchema = z.object({
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toUpperCase() : undefined),
    z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).optional()
  ),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),
  APIDOC_EVALUATOR: z.enum(['on', 'off']).default('on'),
  APIDOC_EVALUATOR_COMMAND: z.string().min(1).optional(),
  APIDOC_EVALUATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULTS.EVALUATOR_TIMEOUT_MS),
  APIDOC_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(DEFAULTS.CACHE_MAX_ENTRIES),
});

export interface RuntimeConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  evaluator: {
    enabled: boolean;
    command?: string;
    timeoutMs: number;
  };
  cacheMaxEntries: number;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid environment configuration', {
      issues: result.error.issues.map((issue) => ({
        variable: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const vars = result.data;
  return {
    logLevel: parseLogLevel(vars.LOG_LEVEL),
    logFormat: vars.LOG_FORMAT,
    evaluator: {
      enabled: vars.APIDOC_EVALUATOR === 'on',
      command: vars.APIDOC_EVALUATOR_COMMAND,
      timeoutMs: vars.APIDOC_EVALUATOR_TIMEOUT_MS,
    },
    cacheMaxEntries: vars.APIDOC_CACHE_MAX_ENTRIES,
  };
}
