/**
 * devices/device_reader.ts
 *
 * Turns raw `Device Parameters` records into Devices. Read-only: nothing
 * here writes to the store, and enumerate() can be re-run at any time.
 *
 * Field priority:
 *   friendlyName  FriendlyName → BusReportedDeviceDesc → DeviceDesc → registry path
 *   deviceType    Class → Service → "Unknown"
 *   manufacturer  Mfg → ""
 */

import { Device, DeviceAttribute, RawDeviceRecord } from '../core/types';
import { AttributeMissingError, EnumerationUnavailableError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { RegistryStore } from '../store/registry_store';
import {
  NO_OUTCOME,
  UNKNOWN_TYPE,
  cleanRegistryText,
  compareDevices,
  sleepStateFromValue
} from './device';

const log = scopedLogger('devices/device_reader');

const NAME_PRIORITY: DeviceAttribute[] = ['FriendlyName', 'BusReportedDeviceDesc', 'DeviceDesc'];
const TYPE_PRIORITY: DeviceAttribute[] = ['Class', 'Service'];

function firstText(record: RawDeviceRecord, names: DeviceAttribute[]): string {
  for (const name of names) {
    const text = cleanRegistryText(record.attributes[name]);
    if (text) return text;
  }
  return '';
}

function reportMissing(record: RawDeviceRecord, attribute: string): void {
  const missing = new AttributeMissingError(record.parentPath, attribute);
  log.debug({ code: missing.code, ...missing.details }, 'Falling back');
}

export function deviceFromRecord(record: RawDeviceRecord): Device {
  let friendlyName = firstText(record, NAME_PRIORITY);
  if (!friendlyName) {
    reportMissing(record, NAME_PRIORITY.join('|'));
    friendlyName = record.keyPath;
  }

  let deviceType = firstText(record, TYPE_PRIORITY);
  if (!deviceType) {
    reportMissing(record, TYPE_PRIORITY.join('|'));
    deviceType = UNKNOWN_TYPE;
  }

  return {
    registryPath: record.keyPath,
    parentPath: record.parentPath,
    friendlyName,
    manufacturer: cleanRegistryText(record.attributes.Mfg),
    deviceType,
    sleepState: sleepStateFromValue(record.sleepValue),
    lastWriteOutcome: NO_OUTCOME
  };
}

export class DeviceRegistryReader {
  constructor(
    private readonly store: RegistryStore,
    private readonly root: string
  ) {}

  /**
   * One enumeration pass, ordered by name then path.
   * Only an inaccessible root fails the pass.
   */
  async enumerate(): Promise<Device[]> {
    let records: RawDeviceRecord[];
    try {
      records = await this.store.enumerate(this.root);
    } catch (e) {
      if (e instanceof EnumerationUnavailableError) throw e;
      throw new EnumerationUnavailableError(this.root, errorMessage(e));
    }

    const devices = records.map(deviceFromRecord).sort(compareDevices);
    log.debug({ count: devices.length }, 'Enumeration pass complete');
    return devices;
  }
}
