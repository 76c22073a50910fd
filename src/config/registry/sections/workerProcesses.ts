/**
 * Worker Processes Section
 *
 * Worker count, type and recycling limits.
 */

import { defineSetting } from '../registry.js';
import { validatePosInt, validateString } from '../validators.js';

export const workerProcessesSettings = [
  defineSetting({
    name: 'workers',
    section: 'Worker Processes',
    cli: ['-w', '--workers'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 1,
    desc: `
      The number of worker processes for handling requests.

      A positive integer generally in the 2-4 x $(NUM_CORES) range. You'll
      want to vary this a bit to find the best for your particular
      application's work load.
    `,
  }),
  defineSetting({
    name: 'worker_class',
    section: 'Worker Processes',
    cli: ['-k', '--worker-class'],
    meta: 'STRING',
    validator: validateString,
    default: 'sync',
    desc: `
      The type of workers to use.

      The default class (sync) should handle most 'normal' types of workloads.

      A string naming a bundled or registered worker class. The forms
      'NAME', '#NAME', 'egg:DIST#NAME' and a registered 'module.Class' path
      are accepted.
    `,
  }),
  defineSetting({
    name: 'worker_connections',
    section: 'Worker Processes',
    cli: ['--worker-connections'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 1000,
    desc: `
      The maximum number of simultaneous clients.

      This setting only affects asynchronous worker types.
    `,
  }),
  defineSetting({
    name: 'max_requests',
    section: 'Worker Processes',
    cli: ['--max-requests'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 0,
    desc: `
      The maximum number of requests a worker will process before restarting.

      Any value greater than zero will limit the number of requests a worker
      will process before automatically restarting. This is a simple method
      to help limit the damage of memory leaks.

      If this is set to zero (the default) then the automatic worker
      restarts are disabled.
    `,
  }),
  defineSetting({
    name: 'timeout',
    section: 'Worker Processes',
    cli: ['-t', '--timeout'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 30,
    desc: `
      Workers silent for more than this many seconds are killed and restarted.

      Generally set to thirty seconds. Only set this noticeably higher if
      you're sure of the repercussions for sync workers. For the non sync
      workers it just means that the worker process is still communicating and
      is not tied to the length of time required to handle a single request.
    `,
  }),
  defineSetting({
    name: 'keepalive',
    section: 'Worker Processes',
    cli: ['--keep-alive'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 2,
    desc: `
      The number of seconds to wait for requests on a Keep-Alive connection.

      Generally set in the 1-5 seconds range.
    `,
  }),
] as const;
