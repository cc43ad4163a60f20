import { CONFIG } from '../config';
import {
  COMPUTER_SYSTEM_FIELDS,
  CREDENTIAL_PRELUDE,
  ENV_TARGET,
  parseComputerSystemJson,
  runPowerShell,
  scriptEnv,
} from './powershell';
import type { ComputerSystemRow, Credential, ObjectModelClient } from '../types';

export const WMI_SCRIPT =
  `$ErrorActionPreference = 'Stop'; ${CREDENTIAL_PRELUDE}; ` +
  `$p = @{ Class = 'Win32_ComputerSystem'; ComputerName = $env:${ENV_TARGET} }; ` +
  `if ($cred) { $p.Credential = $cred }; ` +
  `Get-WmiObject @p | Select-Object ${COMPUTER_SYSTEM_FIELDS} | ConvertTo-Json -Compress`;

/**
 * Legacy `Get-WmiObject` query, one PowerShell process per call. Only
 * Windows PowerShell ships the cmdlet; elsewhere the call fails and the
 * resolver moves on.
 */
export class PowerShellWmiClient implements ObjectModelClient {
  constructor(private readonly executable: string = CONFIG.POWERSHELL_PATH) {}

  async queryComputerSystem(
    host: string,
    opts: { credential?: Credential; timeoutMs: number },
  ): Promise<ComputerSystemRow> {
    const stdout = await runPowerShell(this.executable, WMI_SCRIPT, scriptEnv(host, opts.credential), opts.timeoutMs);
    return parseComputerSystemJson(stdout);
  }
}

export default PowerShellWmiClient;
