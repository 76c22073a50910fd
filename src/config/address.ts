/**
 * Bind address parsing
 *
 * Accepted forms: 'unix:PATH', 'HOST', 'HOST:PORT', '[IPV6]' and
 * '[IPV6]:PORT'. A bare HOST gets the default port.
 */

import { createInvalidAddressError } from '../core/errors.js';

export const DEFAULT_PORT = 8000;

export type BindAddress =
  | { kind: 'unix'; path: string }
  | { kind: 'host'; host: string; port: number }
  | { kind: 'host-port'; host: string; port: number };

export function parseAddress(bind: string, defaultPort: number = DEFAULT_PORT): BindAddress {
  if (bind.startsWith('unix:')) {
    return { kind: 'unix', path: bind.slice('unix:'.length) };
  }

  let host: string;
  let rest: string;
  if (bind.startsWith('[') && bind.includes(']')) {
    const close = bind.indexOf(']');
    host = bind.slice(1, close);
    rest = bind.slice(close + 1);
  } else if (bind.includes(':')) {
    const colon = bind.indexOf(':');
    host = bind.slice(0, colon);
    rest = bind.slice(colon);
  } else {
    host = bind === '' ? '0.0.0.0' : bind;
    rest = '';
  }
  host = host.toLowerCase();

  if (!rest.startsWith(':')) {
    return { kind: 'host', host, port: defaultPort };
  }

  const port = rest.slice(1);
  if (!/^\d+$/.test(port)) {
    throw createInvalidAddressError(bind, `'${port}' is not a valid port number.`);
  }
  return { kind: 'host-port', host, port: Number(port) };
}

/**
 * Render an address back to bind syntax
 */
export function formatAddress(address: BindAddress): string {
  if (address.kind === 'unix') return `unix:${address.path}`;
  const host = address.host.includes(':') ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}
