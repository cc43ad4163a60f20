import { isIP } from 'net';
import { withTimeout } from './net/timeout';
import { errorMessage } from './errors';
import { incProbe } from './metrics';
import baseLogger from './logger';
import type { Pinger, ReachabilityResult } from './types';

const logger = baseLogger.child({ module: 'prober' });

const UNREACHED: ReachabilityResult = Object.freeze({ reached: false });

export interface ProbeOptions {
  pinger: Pinger;
  timeoutMs: number;
}

/**
 * Send one echo request to `hostPart` and report the replying IPv4
 * address. Never throws: any failure, a reply without an IPv4 address
 * included, is an unreached result.
 */
export async function probe(hostPart: string, opts: ProbeOptions): Promise<ReachabilityResult> {
  let result: ReachabilityResult = UNREACHED;
  try {
    // the pinger gets the same budget; the outer bound covers pingers that ignore it
    const reply = await withTimeout(opts.pinger.echo(hostPart, opts.timeoutMs), opts.timeoutMs + 500, 'echo');
    if (reply.address && isIP(reply.address) === 4) {
      result = Object.freeze({ reached: true, ipAddress: reply.address });
    } else {
      logger.debug({ host: hostPart, address: reply.address }, 'echo reply carried no IPv4 address');
    }
  } catch (err) {
    logger.debug({ host: hostPart, err: errorMessage(err) }, 'echo failed');
  }

  incProbe(result.reached);
  logger.debug({ host: hostPart, reached: result.reached, ipAddress: result.ipAddress }, 'probe finished');
  return result;
}
