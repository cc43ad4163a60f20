import type { HostQuery, IdentityRecord, ReachabilityResult, ResolvedHost } from './types';

function present(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * `dnsHostName.domain`, or null unless both halves are non-blank.
 * Partial joins such as ".", ".corp.local" or "web01." never come out.
 */
export function buildFqdn(dnsHostName: string | undefined, domain: string | undefined): string | null {
  if (!present(dnsHostName) || !present(domain)) return null;
  return `${dnsHostName.trim()}.${domain.trim()}`;
}

/**
 * Fold prober and resolver output into the record handed back to callers.
 * Never throws; missing data becomes null.
 */
export function normalize(query: HostQuery, reach: ReachabilityResult, id: IdentityRecord): ResolvedHost {
  return Object.freeze({
    inputName: query.rawInput,
    computerName: id.name ?? null,
    ipAddress: reach.ipAddress ?? null,
    dnsHostName: id.dnsHostName ?? null,
    domain: id.domain ?? null,
    fqdn: buildFqdn(id.dnsHostName, id.domain),
  });
}
