/**
 * Structured logging utility using pino
 *
 * Provides consistent logging across the application with:
 * - Environment-based log levels
 * - Pretty printing outside production
 * - Component-based context
 * - A server logger driven by the loglevel and logfile settings
 */

import pino from 'pino';
import { ConfigError } from '../core/errors.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isProduction = process.env.NODE_ENV === 'production';

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function envLogLevel(): pino.LevelWithSilent {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find((candidate) => candidate === level) ?? 'info';
}

const pinoOptions: pino.LoggerOptions = {
  level: envLogLevel(),
  enabled: !isTest,
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// Logs go to stderr so stdout stays clean for command output.
// No pretty-print transport under test: it would start a worker thread.
const stderr = isProduction || isTest ? pino.destination({ dest: 2, sync: false }) : undefined;

export const logger: pino.Logger = stderr
  ? pino(pinoOptions, stderr)
  : pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });

/**
 * Write out buffered log lines. Call before process.exit().
 */
export function flushLogger(): void {
  if (stderr) {
    stderr.flushSync();
    return;
  }
  logger.flush();
}

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'config', 'cli', 'worker')
 * @returns Child logger with component context
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

// =============================================================================
// SERVER LOGGER
// =============================================================================

const SERVER_LEVELS: Record<string, pino.Level> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

/**
 * Map a loglevel setting value to a pino level
 */
export function toPinoLevel(loglevel: string): pino.Level {
  const level = SERVER_LEVELS[loglevel.toLowerCase()];
  if (!level) {
    throw new ConfigError(`Invalid log level: '${loglevel}'`, {
      setting: 'loglevel',
      allowed: Object.keys(SERVER_LEVELS),
    });
  }
  return level;
}

export interface ServerLogSettings {
  loglevel: string | undefined;
  logfile: string | undefined;
}

/**
 * Build the logger a server uses from its logging settings.
 * A logfile of '-' (or none) writes to stdout; any other value appends
 * to that file.
 */
export function createServerLogger(settings: ServerLogSettings): pino.Logger {
  const level = toPinoLevel(settings.loglevel ?? 'info');
  const logfile = settings.logfile;
  const destination =
    logfile === undefined || logfile === '-'
      ? pino.destination({ dest: 1, sync: false })
      : pino.destination({ dest: logfile, append: true, mkdir: true, sync: false });
  return pino({ level, enabled: !isTest }, destination);
}
