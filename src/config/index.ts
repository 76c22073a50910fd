/**
 * Configuration object
 *
 * A Config holds one live value per registered setting, built from a
 * snapshot of the settings registry. Values change only through set(),
 * which runs the setting's validator; the generated accessors
 * (config.bind, config.workers, ...) are read-only.
 *
 * To add a new setting:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Declare it with defineSetting: name, section, cli, meta, validator,
 *      default and desc
 *   3. Add the section to coreSettings in src/config/registry/index.ts,
 *      or register it on the registry before the first Config is built
 *
 * Usage:
 *   import { Config } from './config/index.js';
 *   const config = new Config();
 *   config.set('workers', '4');
 *   config.get('workers'); // 4
 */

import { IllegalMutationError, UnknownSettingError, createInvalidAddressError } from '../core/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { systemAccounts, type AccountDirectory } from './accounts.js';
import { parseAddress, type BindAddress } from './address.js';
import {
  formatValue,
  settingsRegistry,
  type CoreSettingName,
  type CoreSettingValues,
  type SettingDescriptor,
  type SettingsRegistry,
  type ValueHolder,
} from './registry/index.js';
import { defaultWorkerCatalog, type WorkerClass, type WorkerClassResolver } from './workers.js';

const logger = createComponentLogger('config');

export interface ConfigOptions {
  /** Usage line for the generated CLI help */
  usage?: string;
  /** Registry to snapshot; defaults to the process-wide registry */
  registry?: SettingsRegistry;
  /** Setting names to leave out of this Config */
  ignore?: Iterable<string>;
  /** Resolves worker_class URIs; defaults to the bundled worker catalog */
  workerClasses?: WorkerClassResolver;
  /** Source of the effective uid/gid when user/group are not set */
  accounts?: AccountDirectory;
}

// Accessors for the core settings are defined per instance in the constructor.
export interface Config extends Readonly<CoreSettingValues> {}

/**
 * Field-style reads exist only for registered settings. A property that is
 * not a setting is an ordinary missing property (undefined); use get() to
 * have an unregistered name raise UnknownSettingError.
 */
export class Config {
  usage: string | undefined;

  private readonly settings: Map<string, ValueHolder>;
  private readonly resolveWorkerClass: WorkerClassResolver;
  private readonly accounts: AccountDirectory;

  /**
   * Build a Config from the registry. Defaults are validated here and a
   * failing default aborts construction. The registry is frozen afterwards.
   */
  constructor(options: ConfigOptions = {}) {
    const registry = options.registry ?? settingsRegistry;

    this.usage = options.usage;
    this.settings = registry.makeSettings(options.ignore);
    this.resolveWorkerClass =
      options.workerClasses ?? ((uri: string) => defaultWorkerCatalog.resolve(uri));
    this.accounts = options.accounts ?? systemAccounts;
    registry.freeze();

    for (const name of this.settings.keys()) {
      this.defineAccessor(name);
    }

    logger.debug({ settings: this.settings.size }, 'Configuration built');
  }

  // ===========================================================================
  // SETTINGS
  // ===========================================================================

  has(name: string): boolean {
    return this.settings.has(name);
  }

  /**
   * Setting names in registration order
   */
  names(): string[] {
    return [...this.settings.keys()];
  }

  descriptor(name: string): SettingDescriptor {
    return this.holder(name).descriptor;
  }

  /**
   * Descriptors in registration order
   */
  descriptors(): SettingDescriptor[] {
    return [...this.settings.values()].map((holder) => holder.descriptor);
  }

  get<K extends CoreSettingName>(name: K): CoreSettingValues[K];
  get(name: string): unknown;
  get(name: string): unknown {
    return this.holder(name).get();
  }

  /**
   * Validate `value` and store it. On failure the error propagates and the
   * current value is kept.
   */
  set(name: string, value: unknown): void {
    this.holder(name).set(value);
    logger.debug({ setting: name }, 'Setting changed');
  }

  /**
   * Current value of every setting; callables rendered by name
   */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, holder] of this.settings) {
      const value = holder.get();
      result[name] = typeof value === 'function' ? formatValue(value) : value;
    }
    return result;
  }

  // ===========================================================================
  // DERIVED VALUES
  // Recomputed on every call so they follow the latest set().
  // ===========================================================================

  /**
   * Resolve worker_class, running the type's one-time setup if it has one
   */
  workerClass(): WorkerClass {
    const uri = this.get('worker_class');
    const type = this.resolveWorkerClass(uri ?? '');
    type.setup?.();
    return type;
  }

  address(): BindAddress {
    const bind = this.get('bind');
    if (bind === undefined) {
      throw createInvalidAddressError('none', 'no bind address is set');
    }
    return parseAddress(bind);
  }

  /**
   * Worker uid; the effective uid when no user is set
   */
  uid(): number {
    return this.get('user') ?? this.accounts.effectiveUid();
  }

  /**
   * Worker gid; the effective gid when no group is set
   */
  gid(): number {
    return this.get('group') ?? this.accounts.effectiveGid();
  }

  procName(): string | undefined {
    return this.get('proc_name') ?? this.get('default_proc_name');
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private holder(name: string): ValueHolder {
    const holder = this.settings.get(name);
    if (!holder) {
      throw new UnknownSettingError(name);
    }
    return holder;
  }

  private defineAccessor(name: string): void {
    // Never shadow a member of Config itself; such settings stay reachable via get()
    if (name in this) return;

    Object.defineProperty(this, name, {
      enumerable: true,
      configurable: false,
      get: () => this.get(name),
      set: () => {
        throw new IllegalMutationError(name);
      },
    });
  }
}

export { parseAddress, formatAddress, DEFAULT_PORT, type BindAddress } from './address.js';
export type { AccountDirectory } from './accounts.js';
