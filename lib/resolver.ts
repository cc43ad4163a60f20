import baseLogger from './logger';
import { CONFIG } from './config';
import { withTimeout } from './net/timeout';
import { classifyStrategyError, errorMessage } from './errors';
import { incStrategyAttempt } from './metrics';
import type {
  Credential,
  IdentityRecord,
  IdentityStrategy,
  StrategyOutcome,
} from './types';

const logger = baseLogger.child({ module: 'resolver' });

export const UNKNOWN_IDENTITY: IdentityRecord = Object.freeze({});

export interface ResolveIdentityOptions {
  /** Tried in order; the first success wins. */
  strategies: readonly IdentityStrategy[];
  /** False skips every strategy that needs CIM/WMI. */
  instrumentationAvailable: boolean;
  credential?: Credential;
  timeoutMs: number;
  /** Extra time a strategy gets past `timeoutMs` to release what it holds. */
  graceMs?: number;
  signal?: AbortSignal;
}

/**
 * Run one strategy and fold every throw into a failed outcome. Strategies
 * enforce `timeoutMs` themselves and clean up before settling; the outer
 * bound of `timeoutMs + graceMs` only catches one that never settles.
 */
export async function attemptStrategy(
  strategy: IdentityStrategy,
  hostPart: string,
  opts: Pick<ResolveIdentityOptions, 'credential' | 'timeoutMs' | 'graceMs'>,
): Promise<StrategyOutcome> {
  const timeoutMs = strategy.timeoutMs ?? opts.timeoutMs;
  const graceMs = opts.graceMs ?? CONFIG.STRATEGY_GRACE_MS;
  try {
    const identity = await withTimeout(
      strategy.lookup(hostPart, { credential: opts.credential, timeoutMs }),
      timeoutMs + graceMs,
      strategy.name,
    );
    return { ok: true, strategy: strategy.name, identity };
  } catch (err) {
    return { ok: false, strategy: strategy.name, reason: classifyStrategyError(err), message: errorMessage(err) };
  }
}

/**
 * Walk the strategy chain for `hostPart`. Each strategy runs at most once;
 * failures are logged and skipped. When nothing answers the result is the
 * empty record, which is a normal outcome.
 */
export async function resolveIdentity(hostPart: string, opts: ResolveIdentityOptions): Promise<IdentityRecord> {
  for (const strategy of opts.strategies) {
    if (strategy.requiresInstrumentation && !opts.instrumentationAvailable) {
      logger.debug({ host: hostPart, strategy: strategy.name }, 'instrumentation unavailable, skipping strategy');
      continue;
    }
    if (opts.signal?.aborted) {
      logger.debug({ host: hostPart, strategy: strategy.name }, 'resolution aborted before strategy');
      incStrategyAttempt(strategy.name, 'aborted');
      break;
    }

    const outcome = await attemptStrategy(strategy, hostPart, opts);
    if (outcome.ok) {
      incStrategyAttempt(outcome.strategy, 'success');
      logger.debug({ host: hostPart, strategy: outcome.strategy, identity: outcome.identity }, 'identity resolved');
      return outcome.identity;
    }

    incStrategyAttempt(outcome.strategy, outcome.reason);
    logger.debug(
      { host: hostPart, strategy: outcome.strategy, reason: outcome.reason, detail: outcome.message },
      'identity strategy failed, falling back',
    );
  }

  logger.debug({ host: hostPart }, 'no strategy resolved an identity');
  return UNKNOWN_IDENTITY;
}
