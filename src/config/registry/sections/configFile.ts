/**
 * Config File Section
 */

import { defineSetting } from '../registry.js';
import { validateString } from '../validators.js';

export const configFileSettings = [
  defineSetting({
    name: 'config',
    section: 'Config File',
    cli: ['-c', '--config'],
    meta: 'FILE',
    validator: validateString,
    default: undefined,
    desc: `
      The path to a config file.

      Only has an effect when specified on the command line or as part of an
      application specific configuration.
    `,
  }),
] as const;
