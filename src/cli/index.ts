/**
 * CLI Main Program
 *
 * Commander.js program generated from the settings of a Config.
 */

import { Command, Option } from 'commander';
import type { Config } from '../config/index.js';
import { formatAddress } from '../config/address.js';
import { VERSION } from '../version.js';
import { buildOptionSpecs, toCommanderOption } from './options.js';

/**
 * Create the Commander.js program: one option per setting with CLI flags,
 * in (section, order) order, plus the output options of this tool.
 */
export function createProgram(config: Config): Command {
  const program = new Command();

  program
    .name('prefork-settings')
    .description('Validate server settings from the command line and print the result')
    .version(VERSION)
    .argument('[APP_MODULE]', 'Application module to serve');

  if (config.usage) {
    program.usage(config.usage);
  }

  for (const spec of buildOptionSpecs(config)) {
    program.addOption(toCommanderOption(spec));
  }

  program
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    )
    .option('--list', 'List every setting with its flags and default', false);

  return program;
}

export interface ConfigSummary {
  app: string | undefined;
  address: string;
  workerClass: string;
  uid: number;
  gid: number;
  procName: string | undefined;
  settings: Record<string, unknown>;
}

/**
 * Effective configuration: derived values followed by every setting
 */
export function summarizeConfig(config: Config, app?: string): ConfigSummary {
  return {
    app,
    address: formatAddress(config.address()),
    workerClass: config.workerClass().name,
    uid: config.uid(),
    gid: config.gid(),
    procName: config.procName(),
    settings: config.toJSON(),
  };
}

export { applyCommandLine, buildOptionSpecs, type CliOptionSpec } from './options.js';
