import os from 'os';
import baseLogger from './logger';
import { CONFIG } from './config';
import { errorMessage } from './errors';
import { parseHostQuery } from './hostQuery';
import { probe } from './prober';
import { resolveIdentity } from './resolver';
import { normalize } from './normalizer';
import { mapLimit } from './net/pLimit';
import { incResolutions, observeResolveLatency } from './metrics';
import { createCimStrategy } from './strategies/cim';
import { createWmiStrategy } from './strategies/wmi';
import { createDnsStrategy } from './strategies/dns';
import { createSystemPinger } from './transports/ping';
import { PowerShellSessionFactory } from './transports/cimSession';
import { PowerShellWmiClient } from './transports/wmi';
import { NodeHostEntryResolver } from './transports/hostEntry';
import type { Credential, IdentityStrategy, Pinger, ResolvedHost } from './types';

const logger = baseLogger.child({ module: 'resolve' });

export interface ResolveHostOptions {
  credential?: Credential;
  /** Whether CIM/WMI queries can run here at all. */
  instrumentationAvailable?: boolean;
  pinger?: Pinger;
  strategies?: readonly IdentityStrategy[];
  pingTimeoutMs?: number;
  strategyTimeoutMs?: number;
  /** Name that ".", "localhost" and loopback inputs stand for. */
  localHostName?: string;
  signal?: AbortSignal;
}

export interface ResolveHostsOptions extends ResolveHostOptions {
  concurrency?: number;
}

export type HostResolution =
  | { ok: true; input: string; host: ResolvedHost }
  | { ok: false; input: string; error: Error };

/**
 * Strategy chain in fallback order: CIM over WSMan, CIM over DCOM, legacy
 * WMI, then DNS.
 */
export function createDefaultStrategies(): IdentityStrategy[] {
  const sessions = new PowerShellSessionFactory();
  return [
    createCimStrategy('cim-wsman', 'wsman', sessions),
    createCimStrategy('cim-dcom', 'dcom', sessions),
    createWmiStrategy(new PowerShellWmiClient()),
    createDnsStrategy(new NodeHostEntryResolver(), { timeoutMs: CONFIG.DNS_TIMEOUT_MS }),
  ];
}

type ResolvedOptions = Required<Omit<ResolveHostOptions, 'credential' | 'signal'>> &
  Pick<ResolveHostOptions, 'credential' | 'signal'>;

function withDefaults(opts?: ResolveHostOptions): ResolvedOptions {
  return {
    credential: opts?.credential,
    signal: opts?.signal,
    instrumentationAvailable: opts?.instrumentationAvailable ?? CONFIG.INSTRUMENTATION_AVAILABLE,
    pinger: opts?.pinger ?? createSystemPinger(),
    strategies: opts?.strategies ?? createDefaultStrategies(),
    pingTimeoutMs: opts?.pingTimeoutMs ?? CONFIG.PING_TIMEOUT_MS,
    strategyTimeoutMs: opts?.strategyTimeoutMs ?? CONFIG.STRATEGY_TIMEOUT_MS,
    localHostName: opts?.localHostName ?? os.hostname(),
  };
}

async function resolveWith(input: string, opts: ResolvedOptions): Promise<ResolvedHost> {
  const query = parseHostQuery(input, { localHostName: opts.localHostName });
  const started = process.hrtime.bigint();
  incResolutions();

  const reach = await probe(query.hostPart, { pinger: opts.pinger, timeoutMs: opts.pingTimeoutMs });
  const identity = await resolveIdentity(query.hostPart, {
    strategies: opts.strategies,
    instrumentationAvailable: opts.instrumentationAvailable,
    credential: opts.credential,
    timeoutMs: opts.strategyTimeoutMs,
    signal: opts.signal,
  });
  const host = normalize(query, reach, identity);

  observeResolveLatency(Number(process.hrtime.bigint() - started) / 1e9);
  logger.debug({ input, host }, 'host resolved');
  return host;
}

/**
 * Resolve the identity of one host. Transport failures only leave fields
 * null; the sole error thrown is `HostValidationError` for bad input.
 *
 * @example
 * const host = await resolveHost('sql2016\\sqlexpress');
 * // { inputName: 'sql2016\\sqlexpress', computerName: 'SQL2016', fqdn: 'sql2016.corp.local', ... }
 */
export function resolveHost(input: string, opts?: ResolveHostOptions): Promise<ResolvedHost> {
  return resolveWith(input, withDefaults(opts));
}

/**
 * Resolve many inputs with bounded concurrency. Results keep input order and
 * one input's failure is reported in its own slot only. An invalid
 * `concurrency` rejects with a `TypeError`.
 */
export async function resolveHosts(inputs: readonly string[], opts?: ResolveHostsOptions): Promise<HostResolution[]> {
  const resolved = withDefaults(opts);
  const concurrency = opts?.concurrency ?? CONFIG.CONCURRENCY.DEFAULT;

  return mapLimit(inputs, concurrency, async (input): Promise<HostResolution> => {
    try {
      return { ok: true, input, host: await resolveWith(input, resolved) };
    } catch (err) {
      logger.debug({ input, err: errorMessage(err) }, 'host resolution failed');
      return { ok: false, input, error: err instanceof Error ? err : new Error(String(err)) };
    }
  });
}

export default resolveHost;
