/**
 * Tests for the structured logger
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  Logger,
  createLogger,
  configureLogger,
  loadLoggerConfig,
  parseLogLevel,
  enableLogCapture,
  disableLogCapture,
  getCapturedLogs,
  clearCapturedLogs,
  generateCorrelationId,
} from './logger.js';

describe('Logger configuration', () => {
  it('parses levels case-insensitively and falls back on unknown ones', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
  });

  it('reads LOG_LEVEL, LOG_DIR and NODE_ENV', () => {
    expect(loadLoggerConfig({ LOG_LEVEL: 'debug', LOG_DIR: '/var/log/veille', NODE_ENV: 'development' })).toEqual({
      level: 'debug',
      pretty: true,
      logDir: '/var/log/veille',
    });
    expect(loadLoggerConfig({})).toEqual({ level: 'info', pretty: false, logDir: 'logs' });
  });
});

describe('Logger', () => {
  beforeEach(() => {
    configureLogger({ level: 'debug', logDir: '' });
    clearCapturedLogs();
    enableLogCapture();
  });

  afterEach(() => {
    disableLogCapture();
    clearCapturedLogs();
    configureLogger({ level: 'error' });
  });

  it('generates distinct correlation IDs', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateCorrelationId()));
    expect(ids.size).toBe(50);
    expect(new Logger().getCorrelationId()).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('keeps the correlation ID in child loggers and merges context', () => {
    const logger = createLogger('run-1', { command: 'veille' });
    logger.child({ component: 'emailer' }).info('Email sent', { to: 2 });

    const [entry] = getCapturedLogs();
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Email sent',
      correlationId: 'run-1',
      command: 'veille',
      component: 'emailer',
      to: 2,
    });
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('does not capture entries below the configured level', () => {
    configureLogger({ level: 'warn' });
    const logger = createLogger('run-2');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(getCapturedLogs().map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('logs request outcomes at a level that follows the status code', () => {
    const logger = createLogger('run-3');

    logger.logRequestEnd('POST', 'https://api.example.test/chat/completions', 200, 12);
    logger.logRequestEnd('POST', 'https://api.example.test/chat/completions', 429, 5);
    logger.logRequestEnd('POST', 'https://api.example.test/chat/completions', 502, 8);

    expect(getCapturedLogs().map((entry) => [entry.level, entry.statusCode])).toEqual([
      ['debug', 200],
      ['warn', 429],
      ['error', 502],
    ]);
  });
});
