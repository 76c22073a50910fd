/**
 * prefork-settings
 *
 * Declarative settings registry for a pre-forking server: typed,
 * documented settings, a validated configuration object and a
 * generated command line.
 */

export { Config, type ConfigOptions } from './config/index.js';
export {
  coreSettings,
  createCoreRegistry,
  defineSetting,
  describeSettings,
  settingsRegistry,
  SettingsRegistry,
  ValueHolder,
  type CoreSettingName,
  type CoreSettingValues,
  type SettingDefinition,
  type SettingDescriptor,
  type SettingSummary,
  type Validator,
} from './config/registry/index.js';
export {
  createGroupValidator,
  createUserValidator,
  parseAutoBaseInt,
  validateBool,
  validateCallable,
  validateGroup,
  validatePosInt,
  validateString,
  validateUser,
} from './config/registry/validators.js';
export {
  SystemAccountDirectory,
  parseAccountDatabase,
  systemAccounts,
  type AccountDirectory,
} from './config/accounts.js';
export { parseAddress, formatAddress, DEFAULT_PORT, type BindAddress } from './config/address.js';
export {
  WorkerCatalog,
  SyncWorker,
  createDefaultWorkerCatalog,
  defaultWorkerCatalog,
  type WorkerClass,
  type WorkerClassResolver,
} from './config/workers.js';
export type * from './config/hooks.js';
export {
  applyCommandLine,
  buildOptionSpecs,
  createProgram,
  summarizeConfig,
  type CliOptionSpec,
} from './cli/index.js';
export * from './core/errors.js';
export { createServerLogger, toPinoLevel } from './utils/logger.js';
export { VERSION } from './version.js';
