/**
 * Logging Section
 *
 * Log destination, level and external log configuration.
 */

import { defineSetting } from '../registry.js';
import { validateString } from '../validators.js';

export const loggingSettings = [
  defineSetting({
    name: 'logfile',
    section: 'Logging',
    cli: ['--log-file'],
    meta: 'FILE',
    validator: validateString,
    default: '-',
    desc: `
      The log file to write to.

      "-" means log to stdout.
    `,
  }),
  defineSetting({
    name: 'loglevel',
    section: 'Logging',
    cli: ['--log-level'],
    meta: 'LEVEL',
    validator: validateString,
    default: 'info',
    desc: `
      The granularity of log outputs.

      Valid level names are:

      * debug
      * info
      * warning
      * error
      * critical
    `,
  }),
  defineSetting({
    name: 'logconfig',
    section: 'Logging',
    cli: ['--log-config'],
    meta: 'FILE',
    validator: validateString,
    default: undefined,
    desc: `
      The log config file to use.
    `,
  }),
] as const;
