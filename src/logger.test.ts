/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ConsoleLogger, JsonLogger, LogLevel, createLogger, parseLogLevel } from './logger.js';

let consoleErrorSpy: MockInstance<typeof console.error>;

function firstLine(): string {
  return String(consoleErrorSpy.mock.calls[0]?.[0]);
}

beforeEach(() => {
  consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  consoleErrorSpy.mockRestore();
  delete process.env.LOG_LEVEL;
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown or missing names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('ConsoleLogger', () => {
  it('logs info messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('Import finished', { service: 'Users API' });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[.*\] INFO: Import finished {"service":"Users API"}$/)
    );
  });

  it('filters out debug messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.debug('Dropping parameter');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('logs debug messages at DEBUG level', () => {
    const logger = new ConsoleLogger(LogLevel.DEBUG);
    logger.debug('Dropping parameter');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/\[.*\] DEBUG: Dropping parameter$/)
    );
  });

  it('logs error with message and stack', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    logger.error('Import failed', new Error('Document is empty'));

    expect(firstLine()).toMatch(/ERROR: Import failed {"error":"Document is empty","stack":"Error: Document is empty/);
  });

  it('respects LOG_LEVEL env var', () => {
    process.env.LOG_LEVEL = 'WARN';
    const logger = new ConsoleLogger();

    logger.info('info message');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    logger.warn('warn message');
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/WARN: warn message$/)
    );
  });

  it('silences all logs at SILENT level', () => {
    const logger = new ConsoleLogger(LogLevel.SILENT);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });
});

describe('JsonLogger', () => {
  it('outputs one JSON object per line', () => {
    const logger = new JsonLogger(LogLevel.INFO);
    logger.info('Export finished', { format: 'yaml', paths: 3 });

    expect(consoleErrorSpy).toHaveBeenCalledOnce();
    const parsed: unknown = JSON.parse(firstLine());

    expect(parsed).toMatchObject({
      level: 'info',
      message: 'Export finished',
      format: 'yaml',
      paths: 3,
    });
    expect(parsed).toHaveProperty('timestamp', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/));
  });

  it('includes error details in JSON', () => {
    const logger = new JsonLogger(LogLevel.ERROR);
    logger.error('Export failed', new Error('Service not found: billing'), { format: 'json' });

    const parsed: unknown = JSON.parse(firstLine());

    expect(parsed).toMatchObject({
      level: 'error',
      message: 'Export failed',
      error: 'Service not found: billing',
      format: 'json',
    });
    expect(parsed).toHaveProperty('stack');
  });

  it('filters by log level', () => {
    const logger = new JsonLogger(LogLevel.WARN);

    logger.debug('debug');
    logger.info('info');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    logger.warn('warn');
    expect(consoleErrorSpy).toHaveBeenCalledOnce();
  });
});

describe('createLogger', () => {
  it('picks the implementation by format', () => {
    expect(createLogger('json', LogLevel.INFO)).toBeInstanceOf(JsonLogger);
    expect(createLogger('console', LogLevel.INFO)).toBeInstanceOf(ConsoleLogger);
  });
});
