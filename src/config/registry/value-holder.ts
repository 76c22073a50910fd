/**
 * Live value of one setting inside one Config
 */

import { ValidationError } from '../../core/errors.js';
import type { SettingDescriptor } from './types.js';

export class ValueHolder<T = unknown> {
  private value: T;

  /**
   * Applies the descriptor's default through its validator. A default that
   * fails validation is a bug in the definition and the error propagates.
   */
  constructor(readonly descriptor: SettingDescriptor<T>) {
    this.value =
      descriptor.default === undefined ? descriptor.default : this.validate(descriptor.default);
  }

  get name(): string {
    return this.descriptor.name;
  }

  get(): T {
    return this.value;
  }

  /**
   * Replace the value; on failure the current value is kept
   */
  set(raw: unknown): void {
    this.value = this.validate(raw);
  }

  private validate(raw: unknown): T {
    try {
      return this.descriptor.validator(raw);
    } catch (error) {
      if (error instanceof ValidationError && error.setting === undefined) {
        throw error.forSetting(this.name);
      }
      throw error;
    }
  }
}
