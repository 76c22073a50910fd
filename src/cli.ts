#!/usr/bin/env node
// CLI entry point for prefork-settings

import { Config } from './config/index.js';
import { describeSettings } from './config/registry/index.js';
import { applyCommandLine, createProgram, summarizeConfig } from './cli/index.js';
import { handleCliError } from './cli/utils/errors.js';
import { formatOutput, type OutputFormat } from './cli/utils/output.js';
import { createComponentLogger, toPinoLevel } from './utils/logger.js';

const logger = createComponentLogger('cli');

function main(argv: string[]): void {
  const config = new Config({ usage: '[OPTIONS] [APP_MODULE]' });
  const program = createProgram(config).exitOverride();
  program.parse(argv);

  const { format, list } = program.opts<{ format: OutputFormat; list: boolean }>();
  if (list) {
    console.log(formatOutput(describeSettings(config.descriptors()), format));
    return;
  }

  const applied = applyCommandLine(config, program);
  logger.debug({ applied }, 'Command line applied');

  // Reject an unknown log level before anything is printed
  toPinoLevel(config.get('loglevel') ?? 'info');

  console.log(formatOutput(summarizeConfig(config, program.args[0]), format));
}

try {
  main(process.argv);
} catch (error) {
  handleCliError(error);
}
