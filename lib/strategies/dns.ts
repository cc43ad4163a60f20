import { isIP } from 'net';
import { StrategyError } from '../errors';
import { withTimeout } from '../net/timeout';
import type { HostEntryResolver, IdentityRecord, IdentityStrategy, StrategyContext } from '../types';

/**
 * Split a DNS host name into its leading label and the rest:
 * "web01.corp.example.com" -> { dnsHostName: "web01", domain: "corp.example.com" }.
 * A single-label name has no domain.
 */
export function splitHostName(hostName: string): { dnsHostName: string; domain?: string } {
  const fqdn = hostName.trim().replace(/\.$/, '');
  const dnsHostName = fqdn.split('.')[0];
  const domain = fqdn.startsWith(`${dnsHostName}.`) ? fqdn.slice(dnsHostName.length + 1) : '';
  return domain ? { dnsHostName, domain } : { dnsHostName };
}

/**
 * Identity from a forward DNS lookup. The queried name is reported as the
 * computer name; DNS only supplies the host label and domain.
 */
export function createDnsStrategy(resolver: HostEntryResolver, opts?: { timeoutMs?: number }): IdentityStrategy {
  return {
    name: 'dns',
    requiresInstrumentation: false,
    timeoutMs: opts?.timeoutMs,
    async lookup(hostPart: string, ctx: StrategyContext): Promise<IdentityRecord> {
      const entry = await withTimeout(resolver.getHostEntry(hostPart, ctx.timeoutMs), ctx.timeoutMs, 'dns host entry');
      const hostName = entry.hostName.trim();
      if (!hostName || isIP(hostName) !== 0) {
        throw new StrategyError('empty-result', `no host name in DNS entry for ${hostPart}`);
      }
      return Object.freeze({ name: hostPart, ...splitHostName(hostName) });
    },
  };
}

export default createDnsStrategy;
