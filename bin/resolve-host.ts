#!/usr/bin/env node
import { resolveHosts } from '../lib/resolveHost';
import logger from '../lib/logger';
import type { Credential } from '../lib/types';

// Usage: resolve-host <name|name\instance|ip>...
// Credentials come from HOST_IDENTITY_USERNAME / HOST_IDENTITY_PASSWORD.

function credentialFromEnv(): Credential | undefined {
  const username = process.env.HOST_IDENTITY_USERNAME;
  if (!username) return undefined;
  return { username, password: process.env.HOST_IDENTITY_PASSWORD ?? '' };
}

async function main(argv: string[]): Promise<number> {
  const inputs = argv.filter((a) => a.length > 0);
  if (inputs.length === 0) {
    process.stderr.write('usage: resolve-host <host>...\n');
    return 2;
  }

  const results = await resolveHosts(inputs, { credential: credentialFromEnv() });
  let failed = 0;
  for (const r of results) {
    if (r.ok) {
      process.stdout.write(`${JSON.stringify(r.host)}\n`);
    } else {
      failed++;
      process.stderr.write(`${r.input}: ${r.error.message}\n`);
    }
  }
  return failed > 0 ? 1 : 0;
}

main(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    logger.error({ err }, 'resolve-host crashed');
    process.exitCode = 1;
  },
);
