/**
 * store/powershell_store.ts
 *
 * RegistryStore backed by PowerShell and Microsoft.Win32.Registry.
 * Each call is one encoded script that prints exactly one JSON object;
 * the reply is validated before anything reads it.
 *
 * The whole enumeration is a single script so one refresh pass costs one
 * process, not one per value. Batched writes work the same way.
 */

import Ajv from 'ajv';
import { DEVICE_ATTRIBUTES, RawDeviceRecord, SLEEP_ATTRIBUTE } from '../core/types';
import {
  EnumerationUnavailableError,
  ExecutionError,
  RegistryWriteError,
  errorMessage,
  WriteDeniedError
} from '../core/errors';
import { lastJsonLine, psQuote, runPowerShell } from '../core/powershell';
import { scopedLogger } from '../core/logger';
import { DEVICE_PARAMETERS_KEY, DwordWrite, DwordWriteResult, RegistryStore } from './registry_store';

const log = scopedLogger('store/powershell_store');
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

// ---------------------------------------------------------------------------
// Reply shapes
// ---------------------------------------------------------------------------

type Failure = { ok: false; code: string; message: string };

type EnumerateReply = { ok: true; devices: RawDeviceRecord[] } | Failure;
type ReadReply = { ok: true; value: number | null } | Failure;
type WriteReply = { ok: boolean; code: string; message: string };
type WriteBatchReply = { ok: true; results: WriteReply[] };

const failureSchema = {
  type: 'object',
  properties: {
    ok:      { const: false },
    code:    { type: 'string' },
    message: { type: 'string' }
  },
  required: ['ok', 'code', 'message']
};

const registryValueSchema = { type: ['string', 'integer'] };

const validateEnumerateReply = ajv.compile<EnumerateReply>({
  oneOf: [
    {
      type: 'object',
      properties: {
        ok: { const: true },
        devices: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              keyPath:    { type: 'string' },
              parentPath: { type: 'string' },
              attributes: { type: 'object', additionalProperties: registryValueSchema },
              sleepValue: registryValueSchema
            },
            required: ['keyPath', 'parentPath', 'attributes']
          }
        }
      },
      required: ['ok', 'devices']
    },
    failureSchema
  ]
});

const validateReadReply = ajv.compile<ReadReply>({
  oneOf: [
    {
      type: 'object',
      properties: {
        ok:    { const: true },
        value: { type: ['integer', 'null'] }
      },
      required: ['ok', 'value']
    },
    failureSchema
  ]
});

const writeReplySchema = {
  type: 'object',
  properties: {
    ok:      { type: 'boolean' },
    code:    { type: 'string' },
    message: { type: 'string' }
  },
  required: ['ok', 'code', 'message']
};

const validateWriteReply = ajv.compile<WriteReply>(writeReplySchema);

const validateWriteBatchReply = ajv.compile<WriteBatchReply>({
  type: 'object',
  properties: {
    ok:      { const: true },
    results: { type: 'array', items: writeReplySchema }
  },
  required: ['ok', 'results']
});

// ---------------------------------------------------------------------------
// Scripts
// ---------------------------------------------------------------------------

const READ_VALUE_FN = `
function Read-Value($key, [string]$name) {
  try {
    $v = $key.GetValue($name)
    if ($v -is [int]) { return [int]$v }
    if ($v -is [string]) { return $v }
    return $null
  } catch { return $null }
}`;

export function enumerateScript(root: string): string {
  const names = DEVICE_ATTRIBUTES.map(psQuote).join(', ');
  return `
$ErrorActionPreference = 'Stop'
$rootPath = ${psQuote(root)}
$parentNames = @(${names})
${READ_VALUE_FN}
try {
  $rootKey = [Microsoft.Win32.Registry]::LocalMachine.OpenSubKey($rootPath)
} catch {
  [ordered]@{ ok = $false; code = 'denied'; message = $_.Exception.Message } | ConvertTo-Json -Compress
  return
}
if ($null -eq $rootKey) {
  [ordered]@{ ok = $false; code = 'missing'; message = 'Key not found' } | ConvertTo-Json -Compress
  return
}
$found = New-Object System.Collections.ArrayList
function Walk($key, [string]$path) {
  $names = @()
  try { $names = $key.GetSubKeyNames() } catch { return }
  foreach ($child in $names) {
    $childPath = $path + '\\' + $child
    $sub = $null
    try { $sub = $key.OpenSubKey($child) } catch { continue }
    if ($null -eq $sub) { continue }
    if ($child -ieq ${psQuote(DEVICE_PARAMETERS_KEY)}) {
      $attrs = [ordered]@{}
      foreach ($n in $parentNames) {
        $v = Read-Value $key $n
        if ($null -ne $v) { $attrs[$n] = $v }
      }
      $record = [ordered]@{ keyPath = $childPath; parentPath = $path; attributes = $attrs }
      $sleep = Read-Value $sub ${psQuote(SLEEP_ATTRIBUTE)}
      if ($null -ne $sleep) { $record['sleepValue'] = $sleep }
      [void]$found.Add($record)
    }
    Walk $sub $childPath
    $sub.Close()
  }
}
Walk $rootKey $rootPath
$rootKey.Close()
ConvertTo-Json -InputObject ([ordered]@{ ok = $true; devices = @($found) }) -Depth 6 -Compress
`;
}

export function readDwordScript(keyPath: string, name: string): string {
  return `
$ErrorActionPreference = 'Stop'
try {
  $key = [Microsoft.Win32.Registry]::LocalMachine.OpenSubKey(${psQuote(keyPath)})
  $r = [ordered]@{ ok = $true; value = $null }
  if ($null -ne $key) {
    $v = $key.GetValue(${psQuote(name)})
    $key.Close()
    if ($v -is [int]) { $r.value = [int]$v }
  }
} catch {
  $r = [ordered]@{ ok = $false; code = 'error'; message = $_.Exception.Message }
}
$r | ConvertTo-Json -Compress
`;
}

const WRITE_DWORD_FN = `
function Write-Dword([string]$path, [string]$name, [int]$value) {
  $r = [ordered]@{ ok = $false; code = ''; message = '' }
  try {
    $key = [Microsoft.Win32.Registry]::LocalMachine.OpenSubKey($path, $true)
    if ($null -eq $key) {
      $r.code = 'missing'; $r.message = 'Key not found'
    } else {
      try {
        $key.SetValue($name, $value, [Microsoft.Win32.RegistryValueKind]::DWord)
        $r.ok = $true
      } finally { $key.Close() }
    }
  } catch {
    $e = $_.Exception
    if ($e.InnerException) { $e = $e.InnerException }
    $r.message = $e.Message
    if ($e -is [System.Security.SecurityException] -or $e -is [System.UnauthorizedAccessException]) {
      $r.code = 'denied'
    } else {
      $r.code = 'error'
    }
  }
  return $r
}`;

function writeDwordCall(write: DwordWrite): string {
  return `Write-Dword ${psQuote(write.keyPath)} ${psQuote(write.name)} ${Math.trunc(write.value)}`;
}

export function writeDwordScript(keyPath: string, name: string, value: number): string {
  return `
$ErrorActionPreference = 'Stop'
${WRITE_DWORD_FN}
${writeDwordCall({ keyPath, name, value })} | ConvertTo-Json -Compress
`;
}

export function writeDwordsScript(writes: DwordWrite[]): string {
  const calls = writes.map(w => `[void]$results.Add((${writeDwordCall(w)}))`).join('\n');
  return `
$ErrorActionPreference = 'Stop'
${WRITE_DWORD_FN}
$results = New-Object System.Collections.ArrayList
${calls}
ConvertTo-Json -InputObject ([ordered]@{ ok = $true; results = @($results) }) -Depth 4 -Compress
`;
}

// Keeps each encoded command well under the Windows command-line limit
export const WRITE_CHUNK_SIZE = 20;

const DENIED_PATTERN = /access (is )?denied|not allowed|unauthorized/i;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PowerShellRegistryStore implements RegistryStore {
  constructor(private readonly timeoutMs: number) {}

  async enumerate(root: string): Promise<RawDeviceRecord[]> {
    let reply: unknown;
    try {
      reply = lastJsonLine(await runPowerShell(enumerateScript(root), this.timeoutMs, 'store.enumerate'), 'store.enumerate');
    } catch (e) {
      throw new EnumerationUnavailableError(root, errorMessage(e));
    }

    if (!validateEnumerateReply(reply)) {
      throw new EnumerationUnavailableError(root, `unexpected reply: ${ajv.errorsText(validateEnumerateReply.errors)}`);
    }
    if (!reply.ok) {
      throw new EnumerationUnavailableError(root, reply.message);
    }

    log.debug({ root, count: reply.devices.length }, 'Enumerated device parameter keys');
    return reply.devices;
  }

  async readDword(keyPath: string, name: string): Promise<number | null> {
    const reply = lastJsonLine(
      await runPowerShell(readDwordScript(keyPath, name), this.timeoutMs, 'store.readDword'),
      'store.readDword'
    );
    if (!validateReadReply(reply)) {
      throw new ExecutionError('store.readDword', `unexpected reply: ${ajv.errorsText(validateReadReply.errors)}`);
    }
    if (!reply.ok) {
      throw new ExecutionError('store.readDword', reply.message, { keyPath, name });
    }
    return reply.value;
  }

  async writeDword(keyPath: string, name: string, value: number): Promise<void> {
    let reply: unknown;
    try {
      reply = lastJsonLine(
        await runPowerShell(writeDwordScript(keyPath, name, value), this.timeoutMs, 'store.writeDword'),
        'store.writeDword'
      );
    } catch (e) {
      throw new RegistryWriteError(keyPath, errorMessage(e));
    }

    if (!validateWriteReply(reply)) {
      throw new RegistryWriteError(keyPath, `unexpected reply: ${ajv.errorsText(validateWriteReply.errors)}`);
    }
    const error = errorFromReply(keyPath, reply);
    if (error) throw error;
    log.debug({ keyPath, name, value }, 'Value written');
  }

  /** One PowerShell process per chunk of writes instead of one per write. */
  async writeDwords(writes: DwordWrite[]): Promise<DwordWriteResult[]> {
    const results: DwordWriteResult[] = [];
    for (let i = 0; i < writes.length; i += WRITE_CHUNK_SIZE) {
      results.push(...await this.writeChunk(writes.slice(i, i + WRITE_CHUNK_SIZE)));
    }
    const failed = results.filter(r => r.error !== null).length;
    log.debug({ writes: writes.length, failed }, 'Batch written');
    return results;
  }

  private async writeChunk(writes: DwordWrite[]): Promise<DwordWriteResult[]> {
    const failAllWrites = (message: string): DwordWriteResult[] =>
      writes.map(w => ({ keyPath: w.keyPath, error: new RegistryWriteError(w.keyPath, message) }));

    let reply: unknown;
    try {
      reply = lastJsonLine(
        await runPowerShell(writeDwordsScript(writes), this.timeoutMs, 'store.writeDwords'),
        'store.writeDwords'
      );
    } catch (e) {
      return failAllWrites(errorMessage(e));
    }

    if (!validateWriteBatchReply(reply)) {
      return failAllWrites(`unexpected reply: ${ajv.errorsText(validateWriteBatchReply.errors)}`);
    }
    const replies = reply.results;
    if (replies.length !== writes.length) {
      return failAllWrites(`expected ${writes.length} results, got ${replies.length}`);
    }
    return writes.map((w, i) => ({ keyPath: w.keyPath, error: errorFromReply(w.keyPath, replies[i]) }));
  }
}

function errorFromReply(keyPath: string, reply: WriteReply): WriteDeniedError | RegistryWriteError | null {
  if (reply.ok) return null;
  if (reply.code === 'denied' || DENIED_PATTERN.test(reply.message)) {
    return new WriteDeniedError(keyPath, reply.message || undefined);
  }
  return new RegistryWriteError(keyPath, reply.message || `write failed (${reply.code})`);
}
