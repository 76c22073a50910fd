/**
 * Server Socket Section
 *
 * Listening address and accept queue.
 */

import { defineSetting } from '../registry.js';
import { validatePosInt, validateString } from '../validators.js';

export const serverSocketSettings = [
  defineSetting({
    name: 'bind',
    section: 'Server Socket',
    cli: ['-b', '--bind'],
    meta: 'ADDRESS',
    validator: validateString,
    default: '127.0.0.1:8000',
    desc: `
      The socket to bind.

      A string of the form: 'HOST', 'HOST:PORT', 'unix:PATH'. An IP is a valid
      HOST.
    `,
  }),
  defineSetting({
    name: 'backlog',
    section: 'Server Socket',
    cli: ['--backlog'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 2048,
    desc: `
      The maximum number of pending connections.

      This refers to the number of clients that can be waiting to be served.
      Exceeding this number results in the client getting an error when
      attempting to connect. It should only affect servers under significant
      load.

      Must be a positive integer. Generally set in the 64-2048 range.
    `,
  }),
] as const;
