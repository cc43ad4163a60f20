import baseLogger from '../logger';
import { CONFIG } from '../config';
import { errorMessage } from '../errors';
import {
  COMPUTER_SYSTEM_FIELDS,
  CREDENTIAL_PRELUDE,
  ENV_TARGET,
  PowerShellHost,
  parseComputerSystemJson,
  scriptEnv,
} from './powershell';
import type {
  ComputerSystemRow,
  ManagementProtocol,
  ManagementSession,
  ManagementSessionFactory,
  ManagementSessionOptions,
} from '../types';

const logger = baseLogger.child({ module: 'transport:cim' });

const PROTOCOL_NAMES: Record<ManagementProtocol, string> = {
  wsman: 'Wsman',
  dcom: 'Dcom',
};

export function openSessionCommand(protocol: ManagementProtocol): string {
  return (
    `${CREDENTIAL_PRELUDE}; ` +
    `$opt = New-CimSessionOption -Protocol ${PROTOCOL_NAMES[protocol]}; ` +
    `$p = @{ ComputerName = $env:${ENV_TARGET}; SessionOption = $opt; ErrorAction = 'Stop' }; ` +
    `if ($cred) { $p.Credential = $cred }; ` +
    `$s = New-CimSession @p`
  );
}

export const QUERY_COMMAND =
  `Get-CimInstance -CimSession $s -ClassName Win32_ComputerSystem -ErrorAction Stop | ` +
  `Select-Object ${COMPUTER_SYSTEM_FIELDS} | ConvertTo-Json -Compress`;

export const CLOSE_COMMAND = 'if ($s) { Remove-CimSession -CimSession $s; $s = $null }';

class PowerShellCimSession implements ManagementSession {
  private closed = false;

  constructor(
    private readonly host: PowerShellHost,
    private readonly target: string,
    private readonly timeoutMs: number,
  ) {}

  async queryComputerSystem(): Promise<ComputerSystemRow> {
    const output = await this.host.run(QUERY_COMMAND, this.timeoutMs);
    return parseComputerSystemJson(output);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.host.run(CLOSE_COMMAND, this.timeoutMs);
    } catch (err) {
      logger.debug({ host: this.target, err: errorMessage(err) }, 'Remove-CimSession failed, ending process anyway');
    } finally {
      this.host.dispose();
    }
  }
}

/**
 * Opens CIM sessions (WSMan or DCOM) inside a dedicated PowerShell process.
 * Closing the session removes it and ends the process.
 */
export class PowerShellSessionFactory implements ManagementSessionFactory {
  constructor(private readonly executable: string = CONFIG.POWERSHELL_PATH) {}

  async open(target: string, opts: ManagementSessionOptions): Promise<ManagementSession> {
    const host = new PowerShellHost(this.executable, scriptEnv(target, opts.credential));
    try {
      await host.run(openSessionCommand(opts.protocol), opts.timeoutMs);
    } catch (err) {
      host.dispose();
      throw err;
    }
    logger.debug({ host: target, protocol: opts.protocol }, 'CIM session opened');
    return new PowerShellCimSession(host, target, opts.timeoutMs);
  }
}

export default PowerShellSessionFactory;
