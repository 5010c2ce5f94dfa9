/**
 * core/powershell.ts
 *
 * The one PowerShell helper every Windows call goes through.
 * Scripts are passed as Base64 UTF-16LE via -EncodedCommand so no quoting
 * survives to the command line. Calls are asynchronous: only the awaiting
 * task waits, never the event loop.
 */

import { execFile } from 'child_process';
import { ExecutionError, TimeoutError } from './errors';

export const POWERSHELL_EXE = 'powershell.exe';

export function encodeCommand(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

export function powershellArgs(script: string): string[] {
  return [
    '-NoProfile',
    '-NonInteractive',
    '-ExecutionPolicy', 'Bypass',
    '-EncodedCommand', encodeCommand(script)
  ];
}

/** Single-quoted PowerShell literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function runPowerShell(script: string, timeoutMs: number, source = 'powershell'): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      POWERSHELL_EXE,
      powershellArgs(script),
      { encoding: 'utf-8', timeout: timeoutMs, windowsHide: true, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          if (error.killed) {
            reject(new TimeoutError(source, timeoutMs));
            return;
          }
          reject(new ExecutionError(source, stderr.trim() || error.message));
          return;
        }
        resolve(stdout.trim());
      }
    );
  });
}

/**
 * Every script in this project ends by printing exactly one compressed JSON
 * object. Anything before the last line (progress noise, warnings) is ignored.
 */
export function lastJsonLine(output: string, source: string): unknown {
  const lines = output.split(/\r?\n/).map(l => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    throw new ExecutionError(source, 'PowerShell produced no output');
  }
  try {
    return JSON.parse(last);
  } catch {
    throw new ExecutionError(source, 'PowerShell output is not JSON', { output: last.slice(0, 200) });
  }
}
