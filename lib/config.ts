// Centralized runtime configuration for echo and strategy timeouts and fan-out.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  return !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase());
}

const isWindows = process.platform === 'win32';

export const CONFIG = {
  PING_TIMEOUT_MS: envInt('PING_TIMEOUT_MS', 1000),
  STRATEGY_TIMEOUT_MS: envInt('STRATEGY_TIMEOUT_MS', 15000),
  STRATEGY_GRACE_MS: envInt('STRATEGY_GRACE_MS', 5000),
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),

  CONCURRENCY: {
    DEFAULT: envInt('CONCURRENCY_DEFAULT', 10),
  },

  // CIM/WMI queries need a Windows management stack on this side
  INSTRUMENTATION_AVAILABLE: envBool('INSTRUMENTATION_AVAILABLE', isWindows),
  POWERSHELL_PATH: process.env.POWERSHELL_PATH || (isWindows ? 'powershell.exe' : 'pwsh'),

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export default CONFIG;
