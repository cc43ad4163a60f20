import { withTimeout } from '../net/timeout';
import { identityFromComputerSystem } from './computerSystem';
import type { IdentityRecord, IdentityStrategy, ObjectModelClient, StrategyContext } from '../types';

/**
 * Legacy object-model query of Win32_ComputerSystem; no session to manage.
 */
export function createWmiStrategy(client: ObjectModelClient): IdentityStrategy {
  return {
    name: 'wmi-legacy',
    requiresInstrumentation: true,
    async lookup(hostPart: string, ctx: StrategyContext): Promise<IdentityRecord> {
      const row = await withTimeout(
        client.queryComputerSystem(hostPart, { credential: ctx.credential, timeoutMs: ctx.timeoutMs }),
        ctx.timeoutMs,
        'wmi-legacy query',
      );
      return identityFromComputerSystem(row);
    },
  };
}

export default createWmiStrategy;
