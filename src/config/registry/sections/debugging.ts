/**
 * Debugging Section
 */

import { defineSetting } from '../registry.js';
import { validateBool } from '../validators.js';

export const debuggingSettings = [
  defineSetting({
    name: 'debug',
    section: 'Debugging',
    cli: ['--debug'],
    validator: validateBool,
    action: 'store_true',
    default: false,
    desc: `
      Turn on debugging in the server.

      This limits the number of worker processes to 1 and changes some error
      handling that's sent to clients.
    `,
  }),
  defineSetting({
    name: 'spew',
    section: 'Debugging',
    cli: ['--spew'],
    validator: validateBool,
    action: 'store_true',
    default: false,
    desc: `
      Install a trace function that spews every line executed by the server.

      This is the nuclear option.
    `,
  }),
] as const;
