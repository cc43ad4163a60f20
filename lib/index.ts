export { resolveHost, resolveHosts, createDefaultStrategies } from './resolveHost';
export type { HostResolution, ResolveHostOptions, ResolveHostsOptions } from './resolveHost';
export { parseHostQuery, stripInstance, isValidHostName } from './hostQuery';
export { probe } from './prober';
export { resolveIdentity, attemptStrategy, UNKNOWN_IDENTITY } from './resolver';
export { normalize, buildFqdn } from './normalizer';
export { createCimStrategy } from './strategies/cim';
export { createWmiStrategy } from './strategies/wmi';
export { createDnsStrategy, splitHostName } from './strategies/dns';
export { SystemPinger, createSystemPinger } from './transports/ping';
export { PowerShellSessionFactory } from './transports/cimSession';
export { PowerShellWmiClient } from './transports/wmi';
export { NodeHostEntryResolver } from './transports/hostEntry';
export { HostValidationError, StrategyError, classifyStrategyError } from './errors';
export { TimeoutError, withTimeout } from './net/timeout';
export { register as metricsRegister } from './metrics';
export { CONFIG } from './config';
export type * from './types';
