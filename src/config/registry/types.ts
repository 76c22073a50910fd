/**
 * Settings Registry Type Definitions
 *
 * A setting is declared once as a SettingDefinition and becomes an
 * immutable SettingDescriptor when registered.
 */

// =============================================================================
// VALIDATOR TYPES
// =============================================================================

/**
 * Converts raw input (CLI text, config values, callables) into a typed
 * value, or throws ValidationError.
 */
export type Validator<T> = (raw: unknown) => T;

// =============================================================================
// SETTING TYPES
// =============================================================================

/**
 * How the CLI treats a flag: `store` takes a value, `store_true` is a switch
 */
export type ActionKind = 'store' | 'store_true';

/**
 * Value type tag shown to the CLI layer
 */
export type ValueType = 'string' | 'int' | 'bool' | 'callable';

/**
 * A setting as written by its author, before registration
 */
export interface SettingDefinition<T = unknown, N extends string = string> {
  /** Unique snake_case name (e.g. 'worker_class') */
  name: N;

  /** Display group for help output (e.g. 'Server Socket') */
  section: string;

  /** CLI flags, short form first; omit for file/programmatic-only settings */
  cli?: readonly string[];

  /** Placeholder shown in help (e.g. 'ADDRESS') */
  meta?: string;

  action?: ActionKind;

  type?: ValueType;

  validator: Validator<T>;

  /** Applied through the validator when a Config is built; undefined means absent */
  default: T;

  /** Free-form documentation; dedented, first line becomes the short doc */
  desc: string;
}

/**
 * A registered setting
 */
export interface SettingDescriptor<T = unknown, N extends string = string> {
  readonly name: N;
  readonly section: string;
  /** Registry size at registration time */
  readonly order: number;
  readonly cli: readonly string[];
  readonly meta: string | undefined;
  readonly action: ActionKind;
  readonly type: ValueType;
  readonly validator: Validator<T>;
  readonly default: T;
  readonly shortDoc: string;
  readonly longDoc: string;
}

// =============================================================================
// UTILITY TYPES
// =============================================================================

/**
 * Extract the value type from a definition or descriptor
 */
export type SettingValue<D> = D extends { validator: Validator<infer T> } ? T : never;

/**
 * Map a tuple of definitions to a name -> value record
 */
export type SettingValues<D extends { name: string }> = {
  [S in D as S['name']]: SettingValue<S>;
};
