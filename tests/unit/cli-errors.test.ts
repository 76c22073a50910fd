import { describe, it, expect, vi, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { handleCliError, mapError } from '../../src/cli/utils/errors.js';
import { ErrorCodes, UnknownSettingError, ValidationError } from '../../src/core/errors.js';
import { flushLogger } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/utils/logger.js')>();
  return { ...actual, flushLogger: vi.fn() };
});

describe('mapError', () => {
  it('should keep the message, code and context of settings errors', () => {
    const error = new ValidationError('Invalid integer: abc', 'timeout');

    expect(mapError(error)).toEqual({
      message: "Invalid value for setting 'timeout': Invalid integer: abc",
      code: ErrorCodes.VALIDATION_FAILED,
      details: { reason: 'Invalid integer: abc', setting: 'timeout' },
    });
  });

  it('should map other errors to UNKNOWN_ERROR', () => {
    expect(mapError(new Error('boom'))).toEqual({
      message: 'boom',
      code: ErrorCodes.UNKNOWN_ERROR,
    });
    expect(mapError('boom')).toEqual({ message: 'boom', code: ErrorCodes.UNKNOWN_ERROR });
  });
});

describe('handleCliError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(flushLogger).mockClear();
  });

  it('should print the mapped error and exit with status 1', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => handleCliError(new UnknownSettingError('wokers'))).toThrow('exit');
    expect(exit).toHaveBeenCalledWith(1);
    expect(stderr).toHaveBeenCalledTimes(1);

    const printed: unknown = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(printed).toEqual({
      error: 'No configuration setting for: wokers',
      code: ErrorCodes.UNKNOWN_SETTING,
      details: {
        setting: 'wokers',
        suggestion: 'Check the setting name against the registered settings (--list)',
      },
    });
  });

  it('should exit with the commander exit code for parse errors', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() =>
      handleCliError(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))
    ).toThrow('exit');
    expect(exit).toHaveBeenCalledWith(0);
    expect(stderr).not.toHaveBeenCalled();
    expect(flushLogger).toHaveBeenCalledTimes(1);
  });

  it('should flush buffered log lines before exiting', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => handleCliError(new Error('boom'))).toThrow('exit');

    const flushOrder = vi.mocked(flushLogger).mock.invocationCallOrder[0] ?? Infinity;
    const exitOrder = exit.mock.invocationCallOrder[0] ?? -Infinity;
    expect(flushLogger).toHaveBeenCalledTimes(1);
    expect(flushOrder).toBeLessThan(exitOrder);
  });
});
