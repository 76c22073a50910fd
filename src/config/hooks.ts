/**
 * Server hook signatures
 *
 * Hooks are invoked by the process manager at fixed lifecycle points.
 * Each hook kind has one signature; the registry checks the declared
 * parameter count when a hook is set.
 */

import type { Logger } from 'pino';

/** The master (arbiter) process */
export interface ServerHandle {
  readonly pid: number;
  readonly log: Logger;
}

export interface WorkerHandle {
  readonly pid: number;
  readonly log: Logger;
}

export interface RequestInfo {
  readonly method: string;
  readonly path: string;
}

export type WhenReadyHook = (server: ServerHandle) => void;
export type PreForkHook = (server: ServerHandle, worker: WorkerHandle) => void;
export type PostForkHook = (server: ServerHandle, worker: WorkerHandle) => void;
export type PreExecHook = (server: ServerHandle) => void;
export type PreRequestHook = (worker: WorkerHandle, req: RequestInfo) => void;
export type PostRequestHook = (worker: WorkerHandle, req: RequestInfo) => void;
export type WorkerExitHook = (server: ServerHandle, worker: WorkerHandle) => void;
