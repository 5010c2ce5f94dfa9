/**
 * devices/device.ts
 *
 * Pure device model: how raw registry values become a Device, and the state
 * transition rules the reconciliation loop applies. No I/O here.
 */

import {
  Device,
  DeviceDiff,
  DeviceSnapshot,
  FailureReason,
  OpOutcome,
  RegistryValue,
  SleepState,
  SleepValue,
  WriteOutcome
} from '../core/types';

export const NO_OUTCOME: WriteOutcome = Object.freeze<WriteOutcome>({ status: 'None' });
export const PENDING: WriteOutcome = Object.freeze<WriteOutcome>({ status: 'Pending' });
export const UNKNOWN_TYPE = 'Unknown';

// ---------------------------------------------------------------------------
// Value cleaning
// ---------------------------------------------------------------------------

/**
 * Registry text is often an INF indirect string:
 *     @usb.inf,%usb.devicedesc%;USB Composite Device
 * Only the part after the first ';' is meant for people.
 */
export function cleanRegistryText(value: RegistryValue | undefined): string {
  if (typeof value !== 'string') return '';
  const text = value.trim();
  if (!text) return '';

  const semi = text.indexOf(';');
  if (semi !== -1) {
    const tail = text.slice(semi + 1).trim();
    if (tail) return tail;
  }
  return text.replace(/^@+/, '').trim();
}

export function sleepStateFromValue(value: RegistryValue | undefined | null): SleepState {
  if (typeof value !== 'number' || !Number.isInteger(value)) return 'Unavailable';
  return value === 0 ? 'Disabled' : 'Enabled';
}

export function canToggle(device: Device): boolean {
  return device.sleepState !== 'Unavailable';
}

/** Flip target for a toggle: sleeping allowed → suppress it, and back. */
export function toggleTarget(device: Device): SleepValue | null {
  switch (device.sleepState) {
    case 'Enabled':  return 0;
    case 'Disabled': return 1;
    default:         return null;
  }
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export function failed(reason: FailureReason, message?: string): WriteOutcome {
  return message ? { status: 'Failed', reason, message } : { status: 'Failed', reason };
}

export function outcomeFromOp(op: OpOutcome): WriteOutcome {
  if (op.status === 'Succeeded') return { status: 'Succeeded' };
  return failed(op.reason ?? 'error', op.message);
}

export function sameOutcome(a: WriteOutcome, b: WriteOutcome): boolean {
  if (a.status !== b.status) return false;
  if (a.status === 'Failed' && b.status === 'Failed') {
    return a.reason === b.reason && a.message === b.message;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export function withOutcome(device: Device, outcome: WriteOutcome): Device {
  return { ...device, lastWriteOutcome: outcome };
}

export function snapshotOf(device: Device): DeviceSnapshot {
  return Object.freeze({ ...device, lastWriteOutcome: Object.freeze({ ...device.lastWriteOutcome }) });
}

export function sameDevice(a: Device, b: Device): boolean {
  return a.registryPath === b.registryPath
    && a.parentPath === b.parentPath
    && a.friendlyName === b.friendlyName
    && a.manufacturer === b.manufacturer
    && a.deviceType === b.deviceType
    && a.sleepState === b.sleepState
    && sameOutcome(a.lastWriteOutcome, b.lastWriteOutcome);
}

export function compareDevices(a: Device, b: Device): number {
  const byName = a.friendlyName.toLowerCase().localeCompare(b.friendlyName.toLowerCase());
  if (byName !== 0) return byName;
  return a.registryPath.toLowerCase().localeCompare(b.registryPath.toLowerCase());
}

/** Added/removed/changed between two device sets keyed by registry path. */
export function diffDevices(
  previous: ReadonlyMap<string, Device>,
  next: ReadonlyMap<string, Device>
): DeviceDiff {
  const diff: DeviceDiff = { added: [], removed: [], changed: [] };

  for (const [path, device] of next) {
    const before = previous.get(path);
    if (!before) diff.added.push(snapshotOf(device));
    else if (!sameDevice(before, device)) diff.changed.push(snapshotOf(device));
  }
  for (const path of previous.keys()) {
    if (!next.has(path)) diff.removed.push(path);
  }
  return diff;
}

export function isEmptyDiff(diff: DeviceDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}
