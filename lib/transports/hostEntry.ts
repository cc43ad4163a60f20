import dns from 'dns/promises';
import { isIP } from 'net';
import baseLogger from '../logger';
import { StrategyError, errorMessage } from '../errors';
import { withTimeout } from '../net/timeout';
import type { HostEntry, HostEntryResolver } from '../types';

const logger = baseLogger.child({ module: 'transport:dns' });

function firstLabel(name: string): string {
  return name.split('.')[0].toLowerCase();
}

async function reverseNames(address: string): Promise<string[]> {
  try {
    const names = await dns.reverse(address);
    return names.map((n) => n.replace(/\.$/, '')).filter((n) => n.length > 0);
  } catch (err) {
    logger.debug({ address, err: errorMessage(err) }, 'PTR lookup failed');
    return [];
  }
}

/**
 * Pick the canonical name for `host` among its PTR names. A dotted query
 * is already fully qualified; a short name prefers the PTR name sharing
 * its first label.
 */
export function pickCanonicalName(host: string, ptrNames: string[]): string {
  if (isIP(host) !== 0) return ptrNames[0] ?? '';
  if (host.includes('.')) return host.replace(/\.$/, '');
  const label = host.toLowerCase();
  return ptrNames.find((n) => firstLabel(n) === label) ?? ptrNames[0] ?? host;
}

/**
 * Host entry built from the system resolver (hosts file included) plus a
 * PTR lookup of the first address, bounded by `timeoutMs` overall.
 */
export class NodeHostEntryResolver implements HostEntryResolver {
  async getHostEntry(host: string, timeoutMs: number): Promise<HostEntry> {
    return withTimeout(this.lookup(host), timeoutMs, 'dns host entry');
  }

  private async lookup(host: string): Promise<HostEntry> {
    const addresses = isIP(host) !== 0
      ? [host]
      : (await dns.lookup(host, { all: true })).map((a) => a.address);
    if (addresses.length === 0) {
      throw new StrategyError('not-found', `no addresses for ${host}`);
    }

    const ptrNames = await reverseNames(addresses[0]);
    const hostName = pickCanonicalName(host, ptrNames);
    if (!hostName) {
      throw new StrategyError('not-found', `no PTR record for ${host}`);
    }
    return {
      hostName,
      aliases: ptrNames.filter((n) => n !== hostName),
      addresses,
    };
  }
}

export default NodeHostEntryResolver;
