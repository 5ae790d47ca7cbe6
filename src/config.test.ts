/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { LogLevel } from './logger.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logLevel: LogLevel.INFO,
      logFormat: 'console',
      catalogPath: './catalog.json',
      exportConcurrency: 8,
      metricsEnabled: false,
      sourceTimeoutMs: 10000,
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      CATALOG_PATH: '/tmp/catalog.json',
      EXPORT_CONCURRENCY: '3',
      METRICS_ENABLED: 'true',
      SOURCE_TIMEOUT_MS: '2500',
    });

    expect(config).toEqual({
      logLevel: LogLevel.DEBUG,
      logFormat: 'json',
      catalogPath: '/tmp/catalog.json',
      exportConcurrency: 3,
      metricsEnabled: true,
      sourceTimeoutMs: 2500,
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ LOG_FORMAT: '', EXPORT_CONCURRENCY: '' }).exportConcurrency).toBe(8);
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ HOME: '/root', PATH: '/usr/bin' }).logFormat).toBe('console');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid configuration: LOG_LEVEL: Unknown log level "verbose"'
    );
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => loadConfig({ EXPORT_CONCURRENCY: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ EXPORT_CONCURRENCY: 'many' })).toThrow(ConfigurationError);
  });

  it('should reject an unknown log format', () => {
    try {
      loadConfig({ LOG_FORMAT: 'xml' });
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.details?.issues).toEqual([
          { variable: 'LOG_FORMAT', message: expect.stringContaining('Invalid enum value') },
        ]);
      }
    }
  });

  it('should accept 1 and 0 as metric flags', () => {
    expect(loadConfig({ METRICS_ENABLED: '1' }).metricsEnabled).toBe(true);
    expect(loadConfig({ METRICS_ENABLED: '0' }).metricsEnabled).toBe(false);
  });
});
