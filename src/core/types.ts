/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Registry attribute names
// ---------------------------------------------------------------------------

export const SLEEP_ATTRIBUTE = 'EnhancedPowerManagementEnabled';

/** Values read from the device instance key (the parent of Device Parameters). */
export const DEVICE_ATTRIBUTES = [
  'FriendlyName',
  'BusReportedDeviceDesc',
  'DeviceDesc',
  'Mfg',
  'Class',
  'Service'
] as const;

export type DeviceAttribute = typeof DEVICE_ATTRIBUTES[number];

export type RegistryValue = string | number;

/**
 * One `Device Parameters` key as the store found it. Attributes the store
 * could not read are simply absent.
 */
export interface RawDeviceRecord {
  keyPath: string;                         // ...\<instance>\Device Parameters, relative to HKLM
  parentPath: string;                      // ...\<instance>
  attributes: Partial<Record<DeviceAttribute, RegistryValue>>;
  sleepValue?: RegistryValue;              // EnhancedPowerManagementEnabled on keyPath
}

// ---------------------------------------------------------------------------
// Device model
// ---------------------------------------------------------------------------

export type SleepState = 'Enabled' | 'Disabled' | 'Unavailable';

/** 0 suppresses selective sleep, 1 allows it. */
export type SleepValue = 0 | 1;

export type FailureReason =
  | 'declined'
  | 'spawn-error'
  | 'no-response'
  | 'denied'
  | 'ineffective'
  | 'error'
  | 'removed';

export type WriteOutcome =
  | { status: 'None' }
  | { status: 'Pending' }
  | { status: 'Succeeded' }
  | { status: 'Failed'; reason: FailureReason; message?: string };

export interface Device {
  readonly registryPath: string;
  readonly parentPath: string;
  readonly friendlyName: string;
  readonly manufacturer: string;
  readonly deviceType: string;
  readonly sleepState: SleepState;
  readonly lastWriteOutcome: WriteOutcome;
}

/** What the UI boundary receives. Frozen, safe to hold on to. */
export type DeviceSnapshot = Readonly<Device>;

export interface DeviceDiff {
  added: DeviceSnapshot[];
  removed: string[];                       // registry paths
  changed: DeviceSnapshot[];
}

// ---------------------------------------------------------------------------
// Write operations and their outcomes
// ---------------------------------------------------------------------------

export interface WriteOp {
  registryPath: string;
  value: SleepValue;
}

export interface OpOutcome {
  registryPath: string;
  value: SleepValue;
  status: 'Succeeded' | 'Failed';
  reason?: FailureReason;
  message?: string;
}

// ---------------------------------------------------------------------------
// Service configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface ServiceConfig {
  port: number;                            // HTTP boundary
  host: string;
  logLevel: LogLevel;
  refreshIntervalMs: number;               // reconciliation cadence
  elevationTimeoutMs: number;              // bound on one elevated round-trip
  powershellTimeoutMs: number;             // bound on one unelevated PowerShell call
  enumerationRoot: string;                 // relative to HKLM
  tryDirectFirst: boolean;                 // unelevated: attempt direct writes before prompting
  confirmElevation: boolean;               // ask the front end before each consent prompt
  executorScript?: string;                 // override for the elevated entry script
}
