/**
 * Settings Registry
 *
 * Ordered, append-only catalog of setting descriptors. Each registration
 * is assigned the registry's size as its order, so orders run 0..N-1.
 * The registry is frozen once a Config has been built from it.
 */

import { DuplicateSettingError, RegistryFrozenError } from '../../core/errors.js';
import { normalizeDoc, validateDefinition } from './schema-builder.js';
import { ValueHolder } from './value-holder.js';
import type { SettingDefinition, SettingDescriptor } from './types.js';

/**
 * Declare a setting. Returns the definition unchanged; the name and value
 * types are inferred so typed accessors can be derived from it.
 */
export function defineSetting<T, N extends string>(
  definition: SettingDefinition<T, N>
): SettingDefinition<T, N> {
  return definition;
}

export class SettingsRegistry {
  private readonly descriptors: SettingDescriptor[] = [];
  private readonly byName = new Map<string, SettingDescriptor>();
  private frozen = false;

  get size(): number {
    return this.descriptors.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Validate, normalize and append a definition
   */
  register<T, N extends string>(definition: SettingDefinition<T, N>): SettingDescriptor<T, N> {
    if (this.frozen) {
      throw new RegistryFrozenError(definition.name);
    }
    validateDefinition(definition);
    if (this.byName.has(definition.name)) {
      throw new DuplicateSettingError(definition.name);
    }

    const { shortDoc, longDoc } = normalizeDoc(definition.desc);
    const descriptor: SettingDescriptor<T, N> = Object.freeze({
      name: definition.name,
      section: definition.section,
      order: this.descriptors.length,
      cli: Object.freeze([...(definition.cli ?? [])]),
      meta: definition.meta,
      action: definition.action ?? 'store',
      type: definition.type ?? 'string',
      validator: definition.validator,
      default: definition.default,
      shortDoc,
      longDoc,
    });

    this.descriptors.push(descriptor);
    this.byName.set(descriptor.name, descriptor);
    return descriptor;
  }

  /**
   * Register several definitions in order
   */
  registerAll(definitions: Iterable<SettingDefinition<unknown>>): void {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  /**
   * End the registration phase
   */
  freeze(): void {
    this.frozen = true;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): SettingDescriptor | undefined {
    return this.byName.get(name);
  }

  /**
   * Descriptors in registration order
   */
  all(): readonly SettingDescriptor[] {
    return [...this.descriptors];
  }

  /**
   * Fresh value holders, in registration order, for every setting not in
   * `ignore`. Defaults go through their validators here.
   */
  makeSettings(ignore: Iterable<string> = []): Map<string, ValueHolder> {
    const skip = new Set(ignore);
    const settings = new Map<string, ValueHolder>();
    for (const descriptor of this.descriptors) {
      if (skip.has(descriptor.name)) continue;
      settings.set(descriptor.name, new ValueHolder(descriptor));
    }
    return settings;
  }
}
