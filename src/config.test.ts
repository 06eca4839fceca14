/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadRuntimeConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { LogLevel } from './logger.js';

describe('loadRuntimeConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      logLevel: LogLevel.INFO,
      logFormat: 'console',
      evaluator: { enabled: true, command: undefined, timeoutMs: 60000 },
      cacheMaxEntries: 8,
    });
  });

  it('reads every variable', () => {
    const config = loadRuntimeConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      APIDOC_EVALUATOR: 'off',
      APIDOC_EVALUATOR_COMMAND: '/usr/local/bin/node',
      APIDOC_EVALUATOR_TIMEOUT_MS: '1500',
      APIDOC_CACHE_MAX_ENTRIES: '2',
    });

    expect(config).toEqual({
      logLevel: LogLevel.DEBUG,
      logFormat: 'json',
      evaluator: { enabled: false, command: '/usr/local/bin/node', timeoutMs: 1500 },
      cacheMaxEntries: 2,
    });
  });

  it('treats a blank LOG_LEVEL as unset', () => {
    expect(loadRuntimeConfig({ LOG_LEVEL: '  ' }).logLevel).toBe(LogLevel.INFO);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadRuntimeConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });

  it('lists the offending variables', () => {
    try {
      loadRuntimeConfig({ APIDOC_EVALUATOR_TIMEOUT_MS: 'soon', APIDOC_EVALUATOR: 'maybe' });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        details: {
          issues: expect.arrayContaining([
            expect.objectContaining({ variable: 'APIDOC_EVALUATOR_TIMEOUT_MS' }),
            expect.objectContaining({ variable: 'APIDOC_EVALUATOR' }),
          ]),
        },
      });
    }
  });

  it('rejects a non-positive cache size', () => {
    expect(() => loadRuntimeConfig({ APIDOC_CACHE_MAX_ENTRIES: '0' })).toThrow('Invalid environment configuration');
  });
});
