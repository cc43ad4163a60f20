import { execFile } from 'child_process';
import type { EchoReply, Pinger } from '../types';

const isWindows = process.platform === 'win32';

const IPV4 = '(\\d{1,3}(?:\\.\\d{1,3}){3})';
// "64 bytes from 10.0.0.5: icmp_seq=1" / "64 bytes from web01 (10.0.0.5): icmp_seq=1"
const UNIX_REPLY = new RegExp(`bytes from (?:[^\\s(]+ \\()?${IPV4}\\)?:`);
// "Reply from 10.0.0.5: bytes=32 time<1ms TTL=128"
const WINDOWS_REPLY = new RegExp(`Reply from ${IPV4}: bytes=`);

/**
 * Pull the replying IPv4 address out of `ping` output. Returns undefined
 * when no echo reply was printed (timeouts, "Destination host unreachable").
 */
export function parsePingReply(stdout: string): string | undefined {
  for (const line of stdout.split(/\r?\n/)) {
    const m = line.match(UNIX_REPLY) ?? line.match(WINDOWS_REPLY);
    if (m) return m[1];
  }
  return undefined;
}

export function pingArgs(host: string, timeoutMs: number, platform: NodeJS.Platform = process.platform): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-4', '-w', String(timeoutMs), host];
  }
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), host];
}

/**
 * ICMP echo through the system `ping` binary (raw sockets need privileges
 * Node does not have). `ping` exits non-zero on packet loss, so the exit
 * code only matters when nothing usable was printed.
 */
export class SystemPinger implements Pinger {
  private readonly command: string;

  constructor(command = 'ping') {
    this.command = command;
  }

  echo(host: string, timeoutMs: number): Promise<EchoReply> {
    return new Promise<EchoReply>((resolve, reject) => {
      execFile(
        this.command,
        pingArgs(host, timeoutMs),
        { timeout: timeoutMs + 1000, windowsHide: true },
        (err, stdout) => {
          const address = parsePingReply(String(stdout));
          if (address) {
            resolve({ address });
          } else if (err) {
            reject(err);
          } else {
            reject(new Error(`no echo reply from ${host}`));
          }
        },
      );
    });
  }
}

export function createSystemPinger(): Pinger {
  return new SystemPinger(isWindows ? 'ping.exe' : 'ping');
}
