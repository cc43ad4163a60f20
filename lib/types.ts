export interface Credential {
  username: string;
  password: string;
}

export interface HostQuery {
  readonly rawInput: string; // verbatim, may carry "\instance"
  readonly hostPart: string; // the only part handed to transports
}

export interface ReachabilityResult {
  readonly reached: boolean;
  readonly ipAddress?: string; // dotted IPv4
}

/**
 * Raw identity as reported by one strategy. Every field is optional: an
 * all-empty record means the identity is unknown.
 */
export interface IdentityRecord {
  readonly name?: string;
  readonly dnsHostName?: string;
  readonly domain?: string;
}

export interface ResolvedHost {
  inputName: string;
  computerName: string | null;
  ipAddress: string | null;
  dnsHostName: string | null;
  domain: string | null;
  fqdn: string | null;
}

export type StrategyName = 'cim-wsman' | 'cim-dcom' | 'wmi-legacy' | 'dns';

export type StrategyFailureReason =
  | 'timeout'
  | 'connection'
  | 'authentication'
  | 'not-found'
  | 'empty-result'
  | 'aborted'
  | 'unknown';

export type StrategyOutcome =
  | { ok: true; strategy: StrategyName; identity: IdentityRecord }
  | { ok: false; strategy: StrategyName; reason: StrategyFailureReason; message?: string };

export interface StrategyContext {
  credential?: Credential;
  timeoutMs: number;
}

/**
 * One identity-lookup transport. Implementations throw on failure; the
 * resolver turns throws into failed outcomes.
 */
export interface IdentityStrategy {
  readonly name: StrategyName;
  readonly requiresInstrumentation: boolean;
  /** Overrides the resolver-wide per-strategy timeout. */
  readonly timeoutMs?: number;
  lookup(hostPart: string, ctx: StrategyContext): Promise<IdentityRecord>;
}

// ---- collaborator capabilities consumed by the adapters ----

export interface EchoReply {
  address?: string;
}

export interface Pinger {
  echo(host: string, timeoutMs: number): Promise<EchoReply>;
}

export type ManagementProtocol = 'wsman' | 'dcom';

/** Win32_ComputerSystem fields as returned by a management query. */
export interface ComputerSystemRow {
  Name?: string | null;
  Caption?: string | null;
  DNSHostName?: string | null;
  Domain?: string | null;
}

export interface ManagementSession {
  queryComputerSystem(): Promise<ComputerSystemRow>;
  close(): Promise<void>;
}

export interface ManagementSessionOptions {
  protocol: ManagementProtocol;
  credential?: Credential;
  timeoutMs: number;
}

export interface ManagementSessionFactory {
  open(host: string, opts: ManagementSessionOptions): Promise<ManagementSession>;
}

export interface ObjectModelClient {
  queryComputerSystem(host: string, opts: { credential?: Credential; timeoutMs: number }): Promise<ComputerSystemRow>;
}

export interface HostEntry {
  hostName: string;
  aliases: string[];
  addresses: string[];
}

export interface HostEntryResolver {
  getHostEntry(host: string, timeoutMs: number): Promise<HostEntry>;
}
