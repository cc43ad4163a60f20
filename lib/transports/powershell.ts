import { execFile, spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { StrategyError } from '../errors';
import { withTimeout } from '../net/timeout';
import type { ComputerSystemRow, Credential } from '../types';

// Target and credential reach scripts through the environment, never argv.
export const ENV_TARGET = 'HOST_IDENTITY_TARGET';
export const ENV_USERNAME = 'HOST_IDENTITY_CRED_USERNAME';
export const ENV_PASSWORD = 'HOST_IDENTITY_CRED_PASSWORD';

export const END_MARKER = '<<host-identity:end>>';
export const ERR_MARKER = '<<host-identity:err>>';

const BASE_ARGS = ['-NoLogo', '-NoProfile', '-NonInteractive'];

/** Builds `$cred` (or $null) from the environment. Single line. */
export const CREDENTIAL_PRELUDE =
  `$cred = $null; if ($env:${ENV_USERNAME}) { ` +
  `$cred = New-Object System.Management.Automation.PSCredential(` +
  `$env:${ENV_USERNAME}, (ConvertTo-SecureString $env:${ENV_PASSWORD} -AsPlainText -Force)) }`;

export const COMPUTER_SYSTEM_FIELDS = 'Name, Caption, DNSHostName, Domain';

export function scriptEnv(target: string, credential?: Credential): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env, [ENV_TARGET]: target };
  delete env[ENV_USERNAME];
  delete env[ENV_PASSWORD];
  if (credential) {
    env[ENV_USERNAME] = credential.username;
    env[ENV_PASSWORD] = credential.password;
  }
  return env;
}

function optionalString(value: unknown): string | null | undefined {
  if (typeof value === 'string') return value;
  if (value === null) return null;
  return undefined;
}

/**
 * Parse `ConvertTo-Json` output of a Win32_ComputerSystem selection. An
 * array (several rows) takes its first element.
 */
export function parseComputerSystemJson(text: string): ComputerSystemRow {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new StrategyError('empty-result', 'management query printed nothing');
  }
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    throw new StrategyError('unknown', `management query printed non-JSON output: ${trimmed.slice(0, 120)}`);
  }
  const row: unknown = Array.isArray(data) ? data[0] : data;
  if (typeof row !== 'object' || row === null) {
    throw new StrategyError('empty-result', 'management query returned no rows');
  }
  const fields = new Map<string, unknown>(Object.entries(row));
  return {
    Name: optionalString(fields.get('Name')),
    Caption: optionalString(fields.get('Caption')),
    DNSHostName: optionalString(fields.get('DNSHostName')),
    Domain: optionalString(fields.get('Domain')),
  };
}

export type Frame =
  | { done: true; ok: boolean; output: string; rest: string }
  | { done: false };

/**
 * Cut one command's output off the front of the stdout buffer. A frame ends
 * with a line holding END_MARKER (success) or ERR_MARKER + message.
 */
export function takeFrame(buffer: string): Frame {
  const lines = buffer.split(/\r?\n/);
  // the last element is an incomplete line (or "")
  for (let i = 0; i < lines.length - 1; i++) {
    const line = lines[i];
    const isEnd = line.startsWith(END_MARKER);
    const isErr = line.startsWith(ERR_MARKER);
    if (!isEnd && !isErr) continue;
    const body = lines.slice(0, i).join('\n');
    const rest = lines.slice(i + 1).join('\n');
    return isEnd
      ? { done: true, ok: true, output: body, rest }
      : { done: true, ok: false, output: line.slice(ERR_MARKER.length).trim(), rest };
  }
  return { done: false };
}

export function wrapCommand(command: string): string {
  return `try { ${command}; Write-Output '${END_MARKER}' } catch { Write-Output ('${ERR_MARKER}' + $_.Exception.Message) }\n`;
}

interface PendingCommand {
  resolve(output: string): void;
  reject(err: Error): void;
}

/**
 * A long-lived PowerShell process fed one-line commands over stdin, so a
 * CIM session can outlive a single command. Commands run one at a time.
 */
export class PowerShellHost {
  private readonly child: ChildProcessWithoutNullStreams;
  private buffer = '';
  private pending: PendingCommand | null = null;
  private exited = false;

  constructor(executable: string, env: NodeJS.ProcessEnv) {
    this.child = spawn(executable, [...BASE_ARGS, '-Command', '-'], { env, windowsHide: true });
    this.child.stdout.setEncoding('utf8');
    this.child.stdout.on('data', (chunk: string) => {
      this.buffer += chunk;
      this.drain();
    });
    this.child.stderr.resume();
    this.child.on('error', (err) => this.fail(err));
    this.child.on('exit', (code) => {
      this.exited = true;
      this.fail(new StrategyError('connection', `powershell exited with code ${String(code)}`));
    });
  }

  run(command: string, timeoutMs: number): Promise<string> {
    if (this.exited) {
      return Promise.reject(new StrategyError('connection', 'powershell host is not running'));
    }
    if (this.pending) {
      return Promise.reject(new Error('powershell host is busy'));
    }
    const done = new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    this.child.stdin.write(wrapCommand(command));
    return withTimeout(done, timeoutMs, 'powershell command').finally(() => {
      this.pending = null;
    });
  }

  /** End the process; safe to call more than once. */
  dispose(): void {
    if (this.exited) return;
    this.child.stdin.end();
    this.child.kill();
  }

  private drain(): void {
    const frame = takeFrame(this.buffer);
    if (!frame.done) return;
    this.buffer = frame.rest;
    const pending = this.pending;
    this.pending = null;
    if (!pending) return;
    if (frame.ok) pending.resolve(frame.output);
    else pending.reject(new Error(frame.output || 'powershell command failed'));
  }

  private fail(err: Error): void {
    const pending = this.pending;
    this.pending = null;
    if (pending) pending.reject(err);
  }
}

/**
 * Run a whole script in a fresh PowerShell process and return its stdout.
 */
export function runPowerShell(
  executable: string,
  script: string,
  env: NodeJS.ProcessEnv,
  timeoutMs: number,
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    execFile(
      executable,
      [...BASE_ARGS, '-Command', script],
      { env, timeout: timeoutMs, windowsHide: true, maxBuffer: 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const detail = String(stderr).trim();
          reject(detail ? new Error(detail) : err);
          return;
        }
        resolve(String(stdout));
      },
    );
  });
}
