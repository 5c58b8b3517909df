// Structured logging
//
// The merge engine takes a logger through its options; nothing logs through a
// global. Console output is level-filtered, with the level read from
// REELCUT_LOG_LEVEL.

import { z } from 'zod';

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Environment variable holding the console log level. */
export const LOG_LEVEL_ENV = 'REELCUT_LOG_LEVEL';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const noop = () => {};

/**
 * Console logger that drops messages below `level`.
 */
export function createConsoleLogger(level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const enabled = (target: LogLevel) => SEVERITY[target] >= SEVERITY[level];

  return {
    debug: enabled('debug')
      ? (message, data) => console.debug(`[DEBUG] ${message}`, data ?? '')
      : noop,
    info: enabled('info') ? (message, data) => console.info(`[INFO] ${message}`, data ?? '') : noop,
    warn: enabled('warn') ? (message, data) => console.warn(`[WARN] ${message}`, data ?? '') : noop,
    error: enabled('error')
      ? (message, data) => console.error(`[ERROR] ${message}`, data ?? '')
      : noop,
  };
}

/**
 * Default console logger implementation
 */
export const consoleLogger: Logger = createConsoleLogger('debug');

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Log level from the environment. Unset or unrecognized values give 'info'.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  const parsed = LogLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
