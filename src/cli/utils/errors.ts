/**
 * CLI Error Handling
 *
 * Provides consistent error handling for CLI commands.
 */

import { CommanderError } from 'commander';
import { ErrorCodes, SettingsError } from '../../core/errors.js';
import { createComponentLogger, flushLogger } from '../../utils/logger.js';

const logger = createComponentLogger('cli');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized format
 */
export function mapError(error: unknown): MappedError {
  if (error instanceof SettingsError) {
    return {
      message: error.message,
      code: error.code,
      details: error.context,
    };
  }

  if (error instanceof Error) {
    logger.warn({ error: error.message }, 'Unmapped internal error');
    return { message: error.message, code: ErrorCodes.UNKNOWN_ERROR };
  }

  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return { message: String(error), code: ErrorCodes.UNKNOWN_ERROR };
}

/**
 * Handle CLI errors consistently: JSON on stderr, exit status 1.
 * Commander has already printed its own parse errors and help/version
 * output, so those only set the exit code. Buffered log lines are
 * flushed before exiting.
 */
export function handleCliError(error: unknown): never {
  if (error instanceof CommanderError) {
    flushLogger();
    process.exit(error.exitCode);
  }

  const mapped = mapError(error);
  const output = {
    error: mapped.message,
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };

  console.error(JSON.stringify(output, null, 2));
  flushLogger();
  process.exit(1);
}
