import { StrategyError } from '../errors';
import type { ComputerSystemRow, IdentityRecord } from '../types';

function clean(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const v = value.trim();
  return v.length > 0 ? v : undefined;
}

/**
 * Map a Win32_ComputerSystem row onto an identity record. `Caption` stands
 * in for `Name` when the provider leaves `Name` blank.
 */
export function identityFromComputerSystem(row: ComputerSystemRow): IdentityRecord {
  const name = clean(row.Name) ?? clean(row.Caption);
  const dnsHostName = clean(row.DNSHostName);
  const domain = clean(row.Domain);

  if (!name && !dnsHostName && !domain) {
    throw new StrategyError('empty-result', 'Win32_ComputerSystem returned no identity fields');
  }

  const identity: { name?: string; dnsHostName?: string; domain?: string } = {};
  if (name) identity.name = name;
  if (dnsHostName) identity.dnsHostName = dnsHostName;
  if (domain) identity.domain = domain;
  return Object.freeze(identity);
}
