/**
 * Settings Registry
 *
 * Assembles the core setting sections, in display order, into the
 * process-wide registry. This is the single source of truth for setting
 * metadata.
 */

import { SettingsRegistry } from './registry.js';
import type { SettingValues } from './types.js';

// Import all sections
import { configFileSettings } from './sections/configFile.js';
import { serverSocketSettings } from './sections/serverSocket.js';
import { workerProcessesSettings } from './sections/workerProcesses.js';
import { debuggingSettings } from './sections/debugging.js';
import { serverMechanicsSettings } from './sections/serverMechanics.js';
import { loggingSettings } from './sections/logging.js';
import { processNamingSettings } from './sections/processNaming.js';
import { serverHooksSettings } from './sections/serverHooks.js';

// =============================================================================
// CORE SETTINGS
// =============================================================================

/**
 * Every core setting, in registration order
 */
export const coreSettings = [
  ...configFileSettings,
  ...serverSocketSettings,
  ...workerProcessesSettings,
  ...debuggingSettings,
  ...serverMechanicsSettings,
  ...loggingSettings,
  ...processNamingSettings,
  ...serverHooksSettings,
] as const;

export type CoreSetting = (typeof coreSettings)[number];

export type CoreSettingName = CoreSetting['name'];

/**
 * Value type of every core setting, keyed by name
 */
export type CoreSettingValues = SettingValues<CoreSetting>;

/**
 * Registry holding the core settings. Extensions register their own
 * settings here before the first Config is built.
 */
export function createCoreRegistry(): SettingsRegistry {
  const registry = new SettingsRegistry();
  registry.registerAll(coreSettings);
  return registry;
}

export const settingsRegistry: SettingsRegistry = createCoreRegistry();

// Re-export types and utilities
export type {
  ActionKind,
  SettingDefinition,
  SettingDescriptor,
  SettingValue,
  SettingValues,
  Validator,
  ValueType,
} from './types.js';
export { SettingsRegistry, defineSetting } from './registry.js';
export { ValueHolder } from './value-holder.js';
export { describeSettings, formatValue, normalizeDoc, type SettingSummary } from './schema-builder.js';
