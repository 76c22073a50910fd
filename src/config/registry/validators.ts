/**
 * Setting Validators
 *
 * Pure functions turning raw setting input (CLI text, values from a
 * config file, callables) into typed values. Each throws ValidationError
 * with a human-readable reason on bad input.
 */

import { ValidationError, createNoSuchAccountError } from '../../core/errors.js';
import { systemAccounts, type AccountDirectory } from '../accounts.js';
import type { Validator } from './types.js';

// =============================================================================
// PRIMITIVE VALIDATORS
// =============================================================================

/**
 * Validate a boolean.
 * Booleans pass through; text is trimmed and compared case-insensitively
 * against 'true' and 'false'.
 */
export function validateBool(val: unknown): boolean {
  if (typeof val === 'boolean') return val;
  if (typeof val !== 'string') {
    throw new ValidationError(`Invalid type for casting: ${String(val)}`);
  }
  const normalized = val.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ValidationError(`Invalid boolean: ${val}`);
}

// sign, then one of: hex, 0o octal, binary, legacy leading-zero octal, decimal
const AUTO_BASE_INT =
  /^([+-]?)(?:0[xX]([0-9a-fA-F]+)|0[oO]([0-7]+)|0[bB]([01]+)|0([0-7]*)|([1-9][0-9]*))$/;

/**
 * Parse an integer literal, guessing the base from its prefix:
 * `0x` hex, `0o` or a bare leading `0` octal, `0b` binary, else decimal.
 * Returns undefined when the text is not an integer literal.
 */
export function parseAutoBaseInt(text: string): number | undefined {
  const match = AUTO_BASE_INT.exec(text.trim());
  if (!match) return undefined;

  const [, sign, hex, octal, binary, legacyOctal, decimal] = match;
  let value: number;
  if (hex !== undefined) value = parseInt(hex, 16);
  else if (octal !== undefined) value = parseInt(octal, 8);
  else if (binary !== undefined) value = parseInt(binary, 2);
  else if (legacyOctal !== undefined) value = legacyOctal === '' ? 0 : parseInt(legacyOctal, 8);
  else if (decimal !== undefined) value = parseInt(decimal, 10);
  else return undefined;

  return sign === '-' ? -value : value;
}

/**
 * Validate a non-negative integer.
 * Booleans count as integers (0/1). Text is parsed with parseAutoBaseInt.
 * Values past Number.MAX_SAFE_INTEGER are rejected rather than rounded.
 */
export function validatePosInt(val: unknown): number {
  let parsed: number;
  if (typeof val === 'boolean') {
    parsed = val ? 1 : 0;
  } else if (typeof val === 'number') {
    if (!Number.isInteger(val)) {
      throw new ValidationError(`Not an integer: ${val}`);
    }
    parsed = val;
  } else if (typeof val === 'string') {
    const result = parseAutoBaseInt(val);
    if (result === undefined) {
      throw new ValidationError(`Invalid integer: ${val}`);
    }
    parsed = result;
  } else {
    throw new ValidationError(`Invalid type for casting: ${String(val)}`);
  }

  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`Integer out of range: ${String(val)}`);
  }
  if (parsed < 0) {
    throw new ValidationError(`Value must be positive: ${parsed}`);
  }
  // -0 from "-0"
  return parsed === 0 ? 0 : parsed;
}

/**
 * Validate an optional string. null and undefined become undefined,
 * anything else must be a string and is trimmed.
 */
export function validateString(val: unknown): string | undefined {
  if (val === undefined || val === null) return undefined;
  if (typeof val !== 'string') {
    throw new ValidationError(`Not a string: ${String(val)}`);
  }
  return val.trim();
}

// =============================================================================
// CALLABLES
// =============================================================================

/**
 * Narrow to a function type by its declared parameter count.
 */
export function hasArity<F extends (...args: never) => unknown>(
  val: unknown,
  arity: number
): val is F {
  return typeof val === 'function' && val.length === arity;
}

/**
 * Build a validator accepting functions that declare exactly `arity`
 * parameters. Parameters with defaults and rest parameters do not count.
 */
export function validateCallable<F extends (...args: never) => unknown>(
  arity: number
): Validator<F> {
  return (val: unknown): F => {
    if (typeof val !== 'function') {
      throw new ValidationError(`Value is not callable: ${String(val)}`);
    }
    if (!hasArity<F>(val, arity)) {
      throw new ValidationError(`Value must have an arity of: ${arity}`, undefined, {
        expected: arity,
        actual: val.length,
      });
    }
    return val;
  };
}

// =============================================================================
// ACCOUNTS
// =============================================================================

function isNumericId(val: unknown): boolean {
  if (typeof val === 'number') return Number.isInteger(val);
  return typeof val === 'string' && /^\d+$/.test(val);
}

function createAccountValidator(
  kind: 'user' | 'group',
  effectiveId: () => number,
  lookup: (name: string) => number | undefined
): Validator<number> {
  return (val: unknown): number => {
    if (val === undefined || val === null) return effectiveId();
    if (isNumericId(val)) {
      const id = Number(val);
      if (!Number.isSafeInteger(id)) {
        throw new ValidationError(`Invalid ${kind} id: ${String(val)}`);
      }
      return id;
    }
    if (typeof val !== 'string') {
      throw new ValidationError(`Invalid ${kind}: ${String(val)}`);
    }
    const id = lookup(val);
    if (id === undefined) {
      throw createNoSuchAccountError(kind, val);
    }
    return id;
  };
}

/**
 * User validator over an account directory: absent means the effective
 * uid, digits are taken as an id, anything else is looked up by name.
 */
export function createUserValidator(directory: AccountDirectory): Validator<number> {
  return createAccountValidator(
    'user',
    () => directory.effectiveUid(),
    (name) => directory.lookupUser(name)
  );
}

/**
 * Group counterpart of createUserValidator
 */
export function createGroupValidator(directory: AccountDirectory): Validator<number> {
  return createAccountValidator(
    'group',
    () => directory.effectiveGid(),
    (name) => directory.lookupGroup(name)
  );
}

export const validateUser: Validator<number> = createUserValidator(systemAccounts);

export const validateGroup: Validator<number> = createGroupValidator(systemAccounts);
