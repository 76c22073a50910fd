/**
 * Server Hooks Section
 *
 * Callables run by the process manager at lifecycle points. Programmatic
 * or config-file only; none has a CLI flag.
 */

import { defineSetting } from '../registry.js';
import { validateCallable } from '../validators.js';
import type {
  PostForkHook,
  PostRequestHook,
  PreExecHook,
  PreForkHook,
  PreRequestHook,
  RequestInfo,
  ServerHandle,
  WhenReadyHook,
  WorkerExitHook,
  WorkerHandle,
} from '../../hooks.js';

// Defaults keep their parameters: the arity check counts them.

export function defaultWhenReady(_server: ServerHandle): void {}

export function defaultPreFork(_server: ServerHandle, _worker: WorkerHandle): void {}

export function defaultPostFork(_server: ServerHandle, _worker: WorkerHandle): void {}

export function defaultPreExec(_server: ServerHandle): void {}

export function defaultPreRequest(worker: WorkerHandle, req: RequestInfo): void {
  worker.log.debug(`${req.method} ${req.path}`);
}

export function defaultPostRequest(_worker: WorkerHandle, _req: RequestInfo): void {}

export function defaultWorkerExit(_server: ServerHandle, _worker: WorkerHandle): void {}

export const serverHooksSettings = [
  defineSetting({
    name: 'when_ready',
    section: 'Server Hooks',
    validator: validateCallable<WhenReadyHook>(1),
    type: 'callable',
    default: defaultWhenReady,
    desc: `
      Called just after the server is started.

      The callable needs to accept a single instance variable for the server.
    `,
  }),
  defineSetting({
    name: 'pre_fork',
    section: 'Server Hooks',
    validator: validateCallable<PreForkHook>(2),
    type: 'callable',
    default: defaultPreFork,
    desc: `
      Called just before a worker is forked.

      The callable needs to accept two instance variables for the server and
      new worker.
    `,
  }),
  defineSetting({
    name: 'post_fork',
    section: 'Server Hooks',
    validator: validateCallable<PostForkHook>(2),
    type: 'callable',
    default: defaultPostFork,
    desc: `
      Called just after a worker has been forked.

      The callable needs to accept two instance variables for the server and
      new worker.
    `,
  }),
  defineSetting({
    name: 'pre_exec',
    section: 'Server Hooks',
    validator: validateCallable<PreExecHook>(1),
    type: 'callable',
    default: defaultPreExec,
    desc: `
      Called just before a new master process is forked.

      The callable needs to accept a single instance variable for the server.
    `,
  }),
  defineSetting({
    name: 'pre_request',
    section: 'Server Hooks',
    validator: validateCallable<PreRequestHook>(2),
    type: 'callable',
    default: defaultPreRequest,
    desc: `
      Called just before a worker processes the request.

      The callable needs to accept two instance variables for the worker and
      the request.
    `,
  }),
  defineSetting({
    name: 'post_request',
    section: 'Server Hooks',
    validator: validateCallable<PostRequestHook>(2),
    type: 'callable',
    default: defaultPostRequest,
    desc: `
      Called after a worker processes the request.

      The callable needs to accept two instance variables for the worker and
      the request.
    `,
  }),
  defineSetting({
    name: 'worker_exit',
    section: 'Server Hooks',
    validator: validateCallable<WorkerExitHook>(2),
    type: 'callable',
    default: defaultWorkerExit,
    desc: `
      Called just after a worker has been exited.

      The callable needs to accept two instance variables for the server and
      the just-exited worker.
    `,
  }),
] as const;
