import baseLogger from '../logger';
import { errorMessage } from '../errors';
import { TimeoutError, withTimeout } from '../net/timeout';
import { identityFromComputerSystem } from './computerSystem';
import type {
  IdentityRecord,
  IdentityStrategy,
  ManagementProtocol,
  ManagementSession,
  ManagementSessionFactory,
  StrategyContext,
  StrategyName,
} from '../types';

const logger = baseLogger.child({ module: 'strategy:cim' });

async function closeQuietly(session: ManagementSession, host: string, protocol: ManagementProtocol): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    logger.warn({ host, protocol, err: errorMessage(err) }, 'closing management session failed');
  }
}

/**
 * Session-based instrumentation query. The lookup owns its deadline: a
 * query still running at `ctx.timeoutMs` is abandoned and the session is
 * closed before `lookup` settles.
 */
export function createCimStrategy(
  name: Extract<StrategyName, 'cim-wsman' | 'cim-dcom'>,
  protocol: ManagementProtocol,
  sessions: ManagementSessionFactory,
): IdentityStrategy {
  return {
    name,
    requiresInstrumentation: true,
    async lookup(hostPart: string, ctx: StrategyContext): Promise<IdentityRecord> {
      const deadline = Date.now() + ctx.timeoutMs;
      const opening = sessions.open(hostPart, {
        protocol,
        credential: ctx.credential,
        timeoutMs: ctx.timeoutMs,
      });

      let session: ManagementSession;
      try {
        session = await withTimeout(opening, ctx.timeoutMs, `${name} session`);
      } catch (err) {
        if (err instanceof TimeoutError) {
          // a session that shows up after we gave up is closed on arrival
          void opening.then(
            (late) => closeQuietly(late, hostPart, protocol),
            () => undefined,
          );
        }
        throw err;
      }

      try {
        const remaining = Math.max(1, deadline - Date.now());
        const row = await withTimeout(session.queryComputerSystem(), remaining, `${name} query`);
        return identityFromComputerSystem(row);
      } finally {
        await closeQuietly(session, hostPart, protocol);
      }
    },
  };
}

export default createCimStrategy;
