/**
 * CLI Option Builder
 *
 * Turns the settings of a Config into command-line option specs, sorted
 * by (section, order) so help output is stable, and into commander
 * options. Parsed values go back into the Config through set().
 */

import { Option, type Command } from 'commander';
import type { Config } from '../config/index.js';
import {
  formatValue,
  type ActionKind,
  type SettingDescriptor,
  type ValueType,
} from '../config/registry/index.js';

export interface CliOptionSpec {
  flags: readonly string[];
  /** Setting the parsed value is stored into */
  dest: string;
  metavar: string | undefined;
  action: ActionKind;
  /** Only present for 'store' options; switches carry no value type */
  type?: ValueType;
  help: string;
}

/**
 * Order by section label, then registration order
 */
export function compareSettings(a: SettingDescriptor, b: SettingDescriptor): number {
  if (a.section < b.section) return -1;
  if (a.section > b.section) return 1;
  return a.order - b.order;
}

export function toOptionSpec(descriptor: SettingDescriptor): CliOptionSpec {
  const spec: CliOptionSpec = {
    flags: descriptor.cli,
    dest: descriptor.name,
    metavar: descriptor.meta,
    action: descriptor.action,
    help: `${descriptor.shortDoc} [${formatValue(descriptor.default)}]`,
  };
  if (descriptor.action === 'store') {
    spec.type = descriptor.type;
  }
  return spec;
}

/**
 * Option specs for every setting that has CLI flags
 */
export function buildOptionSpecs(config: Config): CliOptionSpec[] {
  return config
    .descriptors()
    .filter((descriptor) => descriptor.cli.length > 0)
    .sort(compareSettings)
    .map(toOptionSpec);
}

/**
 * Commander option for a spec. No default is attached: a flag the user
 * did not pass stays undefined and the Config keeps its own default.
 */
export function toCommanderOption(spec: CliOptionSpec): Option {
  const flags = spec.flags.join(', ');
  if (spec.action === 'store_true') {
    return new Option(flags, spec.help);
  }
  return new Option(`${flags} <${spec.metavar ?? spec.dest.toUpperCase()}>`, spec.help);
}

/**
 * Write every flag present on the parsed command line into the Config.
 * Returns the names of the settings that were set.
 */
export function applyCommandLine(config: Config, program: Command): string[] {
  const values = program.opts<Record<string, unknown>>();
  const applied: string[] = [];

  for (const spec of buildOptionSpecs(config)) {
    const value = values[toCommanderOption(spec).attributeName()];
    if (value === undefined) continue;
    config.set(spec.dest, value);
    applied.push(spec.dest);
  }

  return applied;
}
