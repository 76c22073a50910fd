/**
 * Process Naming Section
 */

import { defineSetting } from '../registry.js';
import { validateString } from '../validators.js';

export const processNamingSettings = [
  defineSetting({
    name: 'proc_name',
    section: 'Process Naming',
    cli: ['-n', '--name'],
    meta: 'STRING',
    validator: validateString,
    default: undefined,
    desc: `
      A base to use for process naming.

      This affects things like \`ps\` and \`top\`. If you're going to be
      running more than one instance of the server you'll probably want to
      set a name to tell them apart.

      It defaults to 'gunicorn'.
    `,
  }),
  defineSetting({
    name: 'default_proc_name',
    section: 'Process Naming',
    validator: validateString,
    default: 'gunicorn',
    desc: `
      Internal setting that is adjusted for each type of application.
    `,
  }),
] as const;
