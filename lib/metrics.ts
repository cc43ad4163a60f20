/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `host_identity_resolutions_total` (Counter)
 * - `host_identity_probe_total` (Counter, label `outcome`)
 * - `host_identity_strategy_attempts_total` (Counter, labels `strategy`, `outcome`)
 * - `host_identity_resolve_latency_seconds` (Histogram)
 *
 * Expose `register.metrics()` wherever the embedding process serves scrapes.
 */

import { Counter, Histogram, register } from 'prom-client';

export const resolutionsTotal = new Counter({
  name: 'host_identity_resolutions_total',
  help: 'Total number of host identity resolutions performed',
});

export const probeTotal = new Counter({
  name: 'host_identity_probe_total',
  help: 'Reachability probes by outcome',
  labelNames: ['outcome'] as const,
});

export const strategyAttemptsTotal = new Counter({
  name: 'host_identity_strategy_attempts_total',
  help: 'Identity strategy attempts by strategy and outcome (success or failure reason)',
  labelNames: ['strategy', 'outcome'] as const,
});

export const resolveLatency = new Histogram({
  name: 'host_identity_resolve_latency_seconds',
  help: 'Histogram of end-to-end resolution latency in seconds',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export function incResolutions(count = 1): void {
  resolutionsTotal.inc(count);
}

export function incProbe(reached: boolean): void {
  probeTotal.inc({ outcome: reached ? 'reached' : 'unreachable' });
}

export function incStrategyAttempt(strategy: string, outcome: string): void {
  strategyAttemptsTotal.inc({ strategy, outcome });
}

export function observeResolveLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  resolveLatency.observe(seconds);
}

export { register };
