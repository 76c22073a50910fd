/**
 * Server Mechanics Section
 *
 * Preloading, daemonizing, pid file and process credentials.
 */

import { defineSetting } from '../registry.js';
import { validateBool, validateGroup, validatePosInt, validateString, validateUser } from '../validators.js';

export const serverMechanicsSettings = [
  defineSetting({
    name: 'preload_app',
    section: 'Server Mechanics',
    cli: ['--preload'],
    validator: validateBool,
    action: 'store_true',
    default: false,
    desc: `
      Load application code before the worker processes are forked.

      By preloading an application you can save some RAM resources as well as
      speed up server boot times. Although, if you defer application loading
      to each worker process, you can reload your application code easily by
      restarting workers.
    `,
  }),
  defineSetting({
    name: 'daemon',
    section: 'Server Mechanics',
    cli: ['-D', '--daemon'],
    validator: validateBool,
    action: 'store_true',
    default: false,
    desc: `
      Daemonize the server process.

      Detaches the server from the controlling terminal and enters the
      background.
    `,
  }),
  defineSetting({
    name: 'pidfile',
    section: 'Server Mechanics',
    cli: ['-p', '--pid'],
    meta: 'FILE',
    validator: validateString,
    default: undefined,
    desc: `
      A filename to use for the PID file.

      If not set, no PID file will be written.
    `,
  }),
  defineSetting<number | undefined, 'user'>({
    name: 'user',
    section: 'Server Mechanics',
    cli: ['-u', '--user'],
    meta: 'USER',
    validator: validateUser,
    default: undefined,
    desc: `
      Switch worker processes to run as this user.

      A valid user id (as an integer) or the name of a user that can be
      found in the system user database. When not set, the worker processes
      keep the effective user of the server.
    `,
  }),
  defineSetting<number | undefined, 'group'>({
    name: 'group',
    section: 'Server Mechanics',
    cli: ['-g', '--group'],
    meta: 'GROUP',
    validator: validateGroup,
    default: undefined,
    desc: `
      Switch worker processes to run as this group.

      A valid group id (as an integer) or the name of a group that can be
      found in the system group database. When not set, the worker processes
      keep the effective group of the server.
    `,
  }),
  defineSetting({
    name: 'umask',
    section: 'Server Mechanics',
    cli: ['-m', '--umask'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 0,
    desc: `
      A bit mask for the file mode on files written by the server.

      Note that this affects unix socket permissions.

      A valid value for process.umask(mask) or a string with a base prefix,
      so values like "0", "0xFF" and "0022" are read as decimal, hex and octal.
    `,
  }),
  defineSetting({
    name: 'tmp_upload_dir',
    section: 'Server Mechanics',
    meta: 'DIR',
    validator: validateString,
    default: undefined,
    desc: `
      Directory to store temporary request data as they are read.

      This path should be writable by the process permissions set for the
      workers. If not specified, a system generated temporary directory is
      used.
    `,
  }),
] as const;
