import { TimeoutError } from './net/timeout';
import type { StrategyFailureReason } from './types';

export type HostValidationCode = 'EMPTY_INPUT' | 'INVALID_HOST';

/**
 * The only error a caller of `resolveHost` ever sees: the input could not
 * be turned into a host name or address.
 */
export class HostValidationError extends Error {
  readonly code: HostValidationCode;
  readonly input: string;

  constructor(code: HostValidationCode, input: string, message: string) {
    super(message);
    this.name = 'HostValidationError';
    this.code = code;
    this.input = input;
  }
}

/** Thrown by adapters when a transport answered but gave nothing usable. */
export class StrategyError extends Error {
  readonly reason: StrategyFailureReason;

  constructor(reason: StrategyFailureReason, message: string) {
    super(message);
    this.name = 'StrategyError';
    this.reason = reason;
  }
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE', 'ENOENT']);
const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA', 'ESERVFAIL', 'NXDOMAIN']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map whatever a transport threw onto a failure reason for logs and metrics.
 */
export function classifyStrategyError(err: unknown): StrategyFailureReason {
  if (err instanceof StrategyError) return err.reason;
  if (err instanceof TimeoutError) return 'timeout';

  const code = errorCode(err);
  if (code === 'ETIMEOUT' || code === 'ETIMEDOUT') return 'timeout';
  if (code && NOT_FOUND_CODES.has(code)) return 'not-found';
  if (code && CONNECTION_CODES.has(code)) return 'connection';

  const msg = errorMessage(err).toLowerCase();
  if (/access (is )?denied|unauthori[sz]ed|logon failure|authenticat/.test(msg)) return 'authentication';
  if (/rpc server is unavailable|cannot connect|winrm|connection|refused|unreachable/.test(msg)) return 'connection';
  if (/timed? ?out/.test(msg)) return 'timeout';
  return 'unknown';
}
