/**
 * Core error definitions
 *
 * All errors raised by the settings registry, the validators and the
 * configuration object derive from SettingsError so callers (the CLI,
 * config-file loaders) can map them to a message and exit code.
 */

export class SettingsError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SettingsError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  VALIDATION_FAILED: 'E1000',
  INVALID_DEFINITION: 'E1001',

  // Registry errors (2000-2999)
  UNKNOWN_SETTING: 'E2000',
  DUPLICATE_SETTING: 'E2001',
  REGISTRY_FROZEN: 'E2002',

  // Access errors (3000-3999)
  ILLEGAL_MUTATION: 'E3000',

  // Environment errors (4000-4999)
  CONFIG_ERROR: 'E4000',
  WORKER_CLASS_NOT_FOUND: 'E4001',
  INVALID_ADDRESS: 'E4002',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Raw input failed coercion. `setting` is filled in once the failure is
 * re-raised by Config.set; validators themselves do not know which
 * setting they serve.
 */
export class ValidationError extends SettingsError {
  constructor(
    public readonly reason: string,
    public readonly setting?: string,
    context?: Record<string, unknown>
  ) {
    super(
      setting ? `Invalid value for setting '${setting}': ${reason}` : reason,
      ErrorCodes.VALIDATION_FAILED,
      { ...context, reason, ...(setting ? { setting } : {}) }
    );
    this.name = 'ValidationError';
  }

  /**
   * Same failure, attributed to a setting
   */
  forSetting(setting: string): ValidationError {
    const error = new ValidationError(this.reason, setting, this.context);
    error.cause = this;
    return error;
  }
}

export class DuplicateSettingError extends SettingsError {
  constructor(public readonly setting: string) {
    super(`Setting already registered: ${setting}`, ErrorCodes.DUPLICATE_SETTING, { setting });
    this.name = 'DuplicateSettingError';
  }
}

export class UnknownSettingError extends SettingsError {
  constructor(public readonly setting: string) {
    super(`No configuration setting for: ${setting}`, ErrorCodes.UNKNOWN_SETTING, {
      setting,
      suggestion: 'Check the setting name against the registered settings (--list)',
    });
    this.name = 'UnknownSettingError';
  }
}

export class IllegalMutationError extends SettingsError {
  constructor(public readonly setting: string) {
    super(
      `Invalid access: '${setting}' can only be changed through set()`,
      ErrorCodes.ILLEGAL_MUTATION,
      { setting }
    );
    this.name = 'IllegalMutationError';
  }
}

export class RegistryFrozenError extends SettingsError {
  constructor(public readonly setting: string) {
    super(
      `Cannot register '${setting}': the settings registry is frozen`,
      ErrorCodes.REGISTRY_FROZEN,
      { setting }
    );
    this.name = 'RegistryFrozenError';
  }
}

/**
 * Configuration that is well-formed but cannot be satisfied on this host,
 * e.g. an unknown user or group name.
 */
export class ConfigError extends SettingsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, context);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a missing-account error naming the account
 */
export function createNoSuchAccountError(kind: 'user' | 'group', name: string): ConfigError {
  return new ConfigError(`No such ${kind}: '${name}'`, { kind, name });
}

/**
 * Create an invalid setting definition error from formatted schema issues
 */
export function createDefinitionError(setting: string, issues: string[]): SettingsError {
  return new SettingsError(
    `Invalid definition for setting '${setting}':\n${issues.map((i) => `  - ${i}`).join('\n')}`,
    ErrorCodes.INVALID_DEFINITION,
    { setting, issues }
  );
}

/**
 * Create a worker class resolution error
 */
export function createWorkerClassNotFoundError(uri: string): SettingsError {
  return new SettingsError(
    `Worker class not found: ${uri}`,
    ErrorCodes.WORKER_CLASS_NOT_FOUND,
    { uri, suggestion: 'Use a bundled worker name such as sync, or register the class first' }
  );
}

/**
 * Create an invalid bind address error
 */
export function createInvalidAddressError(bind: string, reason: string): SettingsError {
  return new SettingsError(`Invalid bind address '${bind}': ${reason}`, ErrorCodes.INVALID_ADDRESS, {
    bind,
  });
}
