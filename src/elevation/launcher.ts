/**
 * elevation/launcher.ts
 *
 * Starts the elevated helper behind the UAC consent prompt and waits for it
 * to exit. The launcher says nothing about whether the writes worked: that
 * is only ever read from the response file.
 */

import * as path from 'path';
import Ajv from 'ajv';
import { TimeoutError, errorMessage } from '../core/errors';
import { lastJsonLine, psQuote, runPowerShell } from '../core/powershell';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('elevation/launcher');
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export type LaunchResult =
  | { status: 'exited'; exitCode: number | null }
  | { status: 'declined'; message: string }
  | { status: 'spawn-error'; message: string }
  | { status: 'timeout' };

export interface ElevatedLauncher {
  launch(requestFile: string, responseFile: string, timeoutMs: number): Promise<LaunchResult>;
}

type RunAsReply =
  | { launched: true; exitCode: number | null }
  | { launched: false; declined: boolean; message: string };

const validateRunAsReply = ajv.compile<RunAsReply>({
  oneOf: [
    {
      type: 'object',
      properties: {
        launched: { const: true },
        exitCode: { type: ['integer', 'null'] }
      },
      required: ['launched', 'exitCode']
    },
    {
      type: 'object',
      properties: {
        launched: { const: false },
        declined: { type: 'boolean' },
        message:  { type: 'string' }
      },
      required: ['launched', 'declined', 'message']
    }
  ]
});

/** ERROR_CANCELLED: the operator dismissed the consent prompt. */
const ERROR_CANCELLED = 1223;

export function runAsScript(executable: string, args: string[]): string {
  // Start-Process joins ArgumentList with spaces, so each argument carries its own quotes
  const argList = args.map(a => psQuote(`"${a}"`)).join(', ');
  return `
$ErrorActionPreference = 'Stop'
try {
  $p = Start-Process -FilePath ${psQuote(executable)} -ArgumentList @(${argList}) -Verb RunAs -WindowStyle Hidden -PassThru -Wait
  [ordered]@{ launched = $true; exitCode = $p.ExitCode } | ConvertTo-Json -Compress
} catch {
  $e = $_.Exception
  $native = 0
  $inner = $e
  while ($null -ne $inner) {
    if ($inner -is [System.ComponentModel.Win32Exception]) { $native = $inner.NativeErrorCode; break }
    $inner = $inner.InnerException
  }
  $declined = ($native -eq ${ERROR_CANCELLED}) -or ($e.Message -match 'cancel')
  [ordered]@{ launched = $false; declined = $declined; message = $e.Message } | ConvertTo-Json -Compress
}
`;
}

export interface RunAsLauncherOptions {
  executorScript?: string;                 // defaults to executor_main beside this file
  nodePath?: string;
}

export class PowerShellRunAsLauncher implements ElevatedLauncher {
  private readonly executorScript: string;
  private readonly nodePath: string;

  constructor(options: RunAsLauncherOptions = {}) {
    this.executorScript = options.executorScript ?? path.join(__dirname, 'executor_main.js');
    this.nodePath = options.nodePath ?? process.execPath;
  }

  async launch(requestFile: string, responseFile: string, timeoutMs: number): Promise<LaunchResult> {
    const script = runAsScript(this.nodePath, [this.executorScript, requestFile, responseFile]);

    let reply: unknown;
    try {
      reply = lastJsonLine(await runPowerShell(script, timeoutMs, 'elevation.launch'), 'elevation.launch');
    } catch (e) {
      if (e instanceof TimeoutError) {
        log.warn({ timeoutMs }, 'Elevated helper did not exit in time');
        return { status: 'timeout' };
      }
      return { status: 'spawn-error', message: errorMessage(e) };
    }

    if (!validateRunAsReply(reply)) {
      return { status: 'spawn-error', message: `unexpected launcher reply: ${ajv.errorsText(validateRunAsReply.errors)}` };
    }
    if (reply.launched) {
      log.debug({ exitCode: reply.exitCode }, 'Elevated helper exited');
      return { status: 'exited', exitCode: reply.exitCode };
    }
    if (reply.declined) {
      log.info('Elevation declined at the consent prompt');
      return { status: 'declined', message: reply.message };
    }
    return { status: 'spawn-error', message: reply.message };
  }
}
