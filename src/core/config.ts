/**
 * core/config.ts
 *
 * Builds the ServiceConfig. Precedence, lowest first:
 *   defaults → config/service.json → environment (.env via dotenv) → CLI flags
 *
 * The merged object is validated with ajv before anything uses it.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { LogLevel, ServiceConfig } from './types';
import { ValidationError, errorMessage } from './errors';

export const USB_ENUM_ROOT = 'SYSTEM\\CurrentControlSet\\Enum\\USB';

export const DEFAULT_CONFIG: ServiceConfig = {
  port: 4780,
  host: '127.0.0.1',
  logLevel: 'info',
  refreshIntervalMs: 3000,
  elevationTimeoutMs: 75000,
  powershellTimeoutMs: 20000,
  enumerationRoot: USB_ENUM_ROOT,
  tryDirectFirst: false,
  confirmElevation: false
};

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const configSchema: JSONSchemaType<ServiceConfig> = {
  type: 'object',
  properties: {
    port:                { type: 'integer', minimum: 0, maximum: 65535 },
    host:                { type: 'string', minLength: 1 },
    logLevel:            { type: 'string', enum: LOG_LEVELS },
    refreshIntervalMs:   { type: 'integer', minimum: 250 },
    elevationTimeoutMs:  { type: 'integer', minimum: 1000 },
    powershellTimeoutMs: { type: 'integer', minimum: 1000 },
    enumerationRoot:     { type: 'string', minLength: 1 },
    tryDirectFirst:      { type: 'boolean' },
    confirmElevation:    { type: 'boolean' },
    executorScript:      { type: 'string', nullable: true }
  },
  required: [
    'port', 'host', 'logLevel', 'refreshIntervalMs', 'elevationTimeoutMs',
    'powershellTimeoutMs', 'enumerationRoot', 'tryDirectFirst', 'confirmElevation'
  ],
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile(configSchema);

type ConfigOverrides = { [K in keyof ServiceConfig]?: unknown };

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ValidationError(configPath, [errorMessage(e)]);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(configPath, ['expected a JSON object']);
  }
  return parsed;
}

function numberOrRaw(raw: string): number | string {
  const n = Number(raw);
  return raw.trim() !== '' && Number.isFinite(n) ? n : raw;
}

function booleanOrRaw(raw: string): boolean | string {
  const lower = raw.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  return raw;
}

export function readEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (env.USB_SLEEP_PORT) out.port = numberOrRaw(env.USB_SLEEP_PORT);
  if (env.USB_SLEEP_HOST) out.host = env.USB_SLEEP_HOST;
  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL;
  if (env.USB_SLEEP_REFRESH_MS) out.refreshIntervalMs = numberOrRaw(env.USB_SLEEP_REFRESH_MS);
  if (env.USB_SLEEP_ELEVATION_TIMEOUT_MS) out.elevationTimeoutMs = numberOrRaw(env.USB_SLEEP_ELEVATION_TIMEOUT_MS);
  if (env.USB_SLEEP_POWERSHELL_TIMEOUT_MS) out.powershellTimeoutMs = numberOrRaw(env.USB_SLEEP_POWERSHELL_TIMEOUT_MS);
  if (env.USB_SLEEP_ENUM_ROOT) out.enumerationRoot = env.USB_SLEEP_ENUM_ROOT;
  if (env.USB_SLEEP_TRY_DIRECT_FIRST) out.tryDirectFirst = booleanOrRaw(env.USB_SLEEP_TRY_DIRECT_FIRST);
  if (env.USB_SLEEP_CONFIRM_ELEVATION) out.confirmElevation = booleanOrRaw(env.USB_SLEEP_CONFIRM_ELEVATION);
  if (env.USB_SLEEP_EXECUTOR_SCRIPT) out.executorScript = env.USB_SLEEP_EXECUTOR_SCRIPT;
  return out;
}

export function parseCli(argv: string[]): ConfigOverrides {
  const out: ConfigOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    switch (argv[i]) {
      case '--port':
        if (next !== undefined) { out.port = numberOrRaw(next); i++; }
        break;
      case '--host':
        if (next !== undefined) { out.host = next; i++; }
        break;
      case '--log-level':
        if (next !== undefined) { out.logLevel = next; i++; }
        break;
      case '--refresh-ms':
        if (next !== undefined) { out.refreshIntervalMs = numberOrRaw(next); i++; }
        break;
      case '--elevation-timeout-ms':
        if (next !== undefined) { out.elevationTimeoutMs = numberOrRaw(next); i++; }
        break;
      case '--try-direct-first':
        out.tryDirectFirst = true;
        break;
      case '--confirm-elevation':
        out.confirmElevation = true;
        break;
    }
  }

  return out;
}

// ---------------------------------------------------------------------------
// Merge + validate
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ServiceConfig {
  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config', 'service.json');

  const merged: unknown = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
    ...readEnv(options.env ?? process.env),
    ...parseCli(options.argv ?? process.argv.slice(2))
  };

  if (!validateConfig(merged)) {
    throw new ValidationError('service configuration', validateConfig.errors ?? []);
  }
  return merged;
}
