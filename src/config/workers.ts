/**
 * Worker class resolution
 *
 * Maps worker_class URIs to worker types. Supported forms:
 *   sync             bundled worker by name
 *   #sync            same, explicit entry point
 *   egg:DIST#NAME    entry point NAME registered under distribution DIST
 *   egg:DIST         DIST#sync
 *   module.Class     a dotted path registered verbatim
 */

import type { Logger } from 'pino';
import { createWorkerClassNotFoundError } from '../core/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import type { WorkerHandle } from './hooks.js';

/**
 * A worker type. `setup` runs once, before the type is handed out.
 */
export interface WorkerClass {
  new (...args: never): unknown;
  setup?(): void;
}

export type WorkerClassResolver = (uri: string) => WorkerClass;

/** Distribution that bundled workers are registered under */
export const DEFAULT_DIST = 'prefork';

/**
 * Synchronous worker: handles one request at a time.
 */
export class SyncWorker implements WorkerHandle {
  readonly pid: number = process.pid;

  constructor(readonly log: Logger = createComponentLogger('worker')) {}
}

export class WorkerCatalog {
  private readonly entries = new Map<string, WorkerClass>();

  /**
   * Register a worker type. Names containing a dot are stored as dotted
   * paths; other names become entry points of `dist`.
   */
  register(name: string, type: WorkerClass, dist: string = DEFAULT_DIST): this {
    this.entries.set(name.includes('.') ? name : `${dist}#${name}`, type);
    return this;
  }

  has(uri: string): boolean {
    return this.entries.has(this.keyFor(uri));
  }

  resolve(uri: string): WorkerClass {
    const type = this.entries.get(this.keyFor(uri));
    if (!type) {
      throw createWorkerClassNotFoundError(uri);
    }
    return type;
  }

  private keyFor(uri: string): string {
    if (uri.startsWith('egg:')) {
      const entry = uri.slice('egg:'.length);
      const hash = entry.lastIndexOf('#');
      return hash < 0 ? `${entry}#sync` : entry;
    }
    if (uri.includes('.')) {
      return uri;
    }
    const name = uri.startsWith('#') ? uri.slice(1) : uri;
    return `${DEFAULT_DIST}#${name}`;
  }
}

export function createDefaultWorkerCatalog(): WorkerCatalog {
  return new WorkerCatalog().register('sync', SyncWorker);
}

export const defaultWorkerCatalog: WorkerCatalog = createDefaultWorkerCatalog();
