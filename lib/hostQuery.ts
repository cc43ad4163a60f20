import { isIP } from 'net';
import { HostValidationError } from './errors';
import type { HostQuery } from './types';

const LOCAL_ALIASES = new Set(['.', 'localhost', '127.0.0.1', '::1']);

const LABEL_RE = /^(?!-)[A-Za-z0-9_-]{1,63}(?<!-)$/;

/**
 * Basic host name validation: dotted labels of letters, digits, `-` and
 * `_` (NetBIOS names carry underscores), at most 253 characters.
 */
export function isValidHostName(host: string): boolean {
  if (!host || /\s/.test(host)) return false;
  const h = host.endsWith('.') ? host.slice(0, -1) : host;
  if (h.length === 0 || h.length > 253) return false;
  return h.split('.').every((label) => LABEL_RE.test(label));
}

/**
 * Drop a trailing `\instance` qualifier: `"sql01\\prod"` -> `"sql01"`.
 */
export function stripInstance(input: string): string {
  const i = input.indexOf('\\');
  return (i === -1 ? input : input.slice(0, i)).trim();
}

export interface ParseHostQueryOptions {
  /** Name substituted for ".", "localhost" and loopback addresses. */
  localHostName?: string;
}

/**
 * Build the immutable query for one input. Throws `HostValidationError`
 * for empty or malformed input.
 */
export function parseHostQuery(input: string, opts?: ParseHostQueryOptions): HostQuery {
  if (typeof input !== 'string' || input.trim().length === 0) {
    throw new HostValidationError('EMPTY_INPUT', String(input), 'host input is empty');
  }

  let hostPart = stripInstance(input);
  if (hostPart.length === 0) {
    throw new HostValidationError('EMPTY_INPUT', input, `no host name before the instance qualifier in "${input}"`);
  }

  if (opts?.localHostName && LOCAL_ALIASES.has(hostPart.toLowerCase())) {
    hostPart = opts.localHostName;
  } else if (isIP(hostPart) === 0 && !isValidHostName(hostPart)) {
    throw new HostValidationError('INVALID_HOST', input, `"${hostPart}" is not a host name or IP address`);
  }

  return Object.freeze({ rawInput: input, hostPart });
}
