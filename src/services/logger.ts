/**
 * Structured JSON Logger
 *
 * Every run gets one correlation ID so the console output and the
 * rotated log file of a scheduled run can be matched up.
 * Uses Winston for transport management (Console + daily rotated file).
 */

import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import winston from 'winston';
import 'winston-daily-rotate-file';

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId: string;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  /** Directory for rotated log files; empty disables file logging */
  logDir: string;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: parseLogLevel(env.LOG_LEVEL),
    pretty: env.NODE_ENV === 'development',
    logDir: env.LOG_DIR ?? 'logs',
  };
}

type LogTransport = Parameters<winston.Logger['add']>[0];

let config: LoggerConfig = loadLoggerConfig();

function buildTransports(loggerConfig: LoggerConfig): LogTransport[] {
  const transports: LogTransport[] = [
    new winston.transports.Console({
      format: loggerConfig.pretty
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json(),
    }),
  ];

  if (loggerConfig.logDir) {
    if (!fs.existsSync(loggerConfig.logDir)) {
      fs.mkdirSync(loggerConfig.logDir, { recursive: true });
    }
    transports.push(
      new winston.transports.DailyRotateFile({
        filename: path.join(loggerConfig.logDir, 'veille-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: '14d',
      })
    );
  }

  return transports;
}

/**
 * Winston Logger Instance
 */
const winstonLogger = winston.createLogger({
  level: config.level,
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: buildTransports(config),
});

/**
 * Configure the logger. Changing `logDir` or `pretty` rebuilds the transports.
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  const previous = config;
  config = { ...config, ...newConfig };
  winstonLogger.level = config.level;

  if (previous.logDir !== config.logDir || previous.pretty !== config.pretty) {
    winstonLogger.clear();
    for (const transport of buildTransports(config)) {
      winstonLogger.add(transport);
    }
  }
}

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

// In-memory capture, used by tests to assert on emitted entries
let captureEnabled = false;
let capturedLogs: LogEntry[] = [];

export function enableLogCapture(): void {
  captureEnabled = true;
}

export function disableLogCapture(): void {
  captureEnabled = false;
}

export function getCapturedLogs(): LogEntry[] {
  return [...capturedLogs];
}

export function clearCapturedLogs(): void {
  capturedLogs = [];
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(config.level);
}

/**
 * Logger class for run-scoped logging
 */
export class Logger {
  private correlationId: string;
  private context: Record<string, unknown>;

  constructor(correlationId?: string, context: Record<string, unknown> = {}) {
    this.correlationId = correlationId || generateCorrelationId();
    this.context = context;
  }

  /**
   * Get the correlation ID
   */
  getCorrelationId(): string {
    return this.correlationId;
  }

  /**
   * Add context to all subsequent logs
   */
  withContext(context: Record<string, unknown>): Logger {
    return new Logger(this.correlationId, { ...this.context, ...context });
  }

  /**
   * Create a child logger with the same correlation ID
   */
  child(context: Record<string, unknown> = {}): Logger {
    return new Logger(this.correlationId, { ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, extra: Record<string, unknown> = {}): void {
    if (captureEnabled && isEnabled(level)) {
      capturedLogs.push({
        ...this.context,
        ...extra,
        timestamp: new Date().toISOString(),
        level,
        message,
        correlationId: this.correlationId,
      });
    }

    winstonLogger.log({
      level,
      message,
      correlationId: this.correlationId,
      ...this.context,
      ...extra,
    });
  }

  debug(message: string, extra: Record<string, unknown> = {}): void {
    this.log('debug', message, extra);
  }

  info(message: string, extra: Record<string, unknown> = {}): void {
    this.log('info', message, extra);
  }

  warn(message: string, extra: Record<string, unknown> = {}): void {
    this.log('warn', message, extra);
  }

  error(message: string, extra: Record<string, unknown> = {}): void {
    this.log('error', message, extra);
  }

  /**
   * Log an outbound API call
   */
  logRequestStart(method: string, url: string, extra: Record<string, unknown> = {}): void {
    this.debug('Request started', {
      method,
      url,
      ...extra,
    });
  }

  /**
   * Log the outcome of an outbound API call
   */
  logRequestEnd(
    method: string,
    url: string,
    statusCode: number,
    durationMs: number,
    extra: Record<string, unknown> = {}
  ): void {
    const level: LogLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'debug';

    this.log(level, 'Request completed', {
      method,
      url,
      statusCode,
      durationMs,
      ...extra,
    });
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(correlationId?: string, context: Record<string, unknown> = {}): Logger {
  return new Logger(correlationId, context);
}

/**
 * Default logger instance (for code paths that are not given one)
 */
export const defaultLogger = new Logger('system');
