/**
 * Account lookups for the user and group settings.
 */

import { readFileSync } from 'node:fs';
import { userInfo } from 'node:os';

export interface AccountDirectory {
  effectiveUid(): number;
  effectiveGid(): number;
  /** Returns undefined when no such user exists */
  lookupUser(name: string): number | undefined;
  /** Returns undefined when no such group exists */
  lookupGroup(name: string): number | undefined;
}

/**
 * Parse an /etc/passwd or /etc/group style database into name -> id.
 * Both formats keep the numeric id in the third field.
 */
export function parseAccountDatabase(content: string): Map<string, number> {
  const entries = new Map<string, number>();
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const fields = trimmed.split(':');
    const name = fields[0];
    const id = fields[2];
    if (!name || id === undefined || !/^\d+$/.test(id)) continue;
    // First entry wins, as with getpwnam/getgrnam
    if (!entries.has(name)) {
      entries.set(name, Number(id));
    }
  }
  return entries;
}

function readDatabase(path: string): Map<string, number> {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new Map();
    }
    throw error;
  }
  return parseAccountDatabase(content);
}

/**
 * Account directory backed by the local passwd and group files.
 * Files are re-read on every lookup so changes made after startup are seen.
 */
export class SystemAccountDirectory implements AccountDirectory {
  constructor(
    private readonly passwdPath = '/etc/passwd',
    private readonly groupPath = '/etc/group'
  ) {}

  effectiveUid(): number {
    return process.geteuid ? process.geteuid() : userInfo().uid;
  }

  effectiveGid(): number {
    return process.getegid ? process.getegid() : userInfo().gid;
  }

  lookupUser(name: string): number | undefined {
    return readDatabase(this.passwdPath).get(name);
  }

  lookupGroup(name: string): number | undefined {
    return readDatabase(this.groupPath).get(name);
  }
}

export const systemAccounts: AccountDirectory = new SystemAccountDirectory();
