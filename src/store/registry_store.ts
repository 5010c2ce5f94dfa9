/**
 * store/registry_store.ts
 *
 * The only seam between this service and the hierarchical key-value store.
 * Key paths are relative to HKEY_LOCAL_MACHINE.
 */

import { RawDeviceRecord } from '../core/types';
import { RegistryWriteError, WriteDeniedError } from '../core/errors';

export const DEVICE_PARAMETERS_KEY = 'Device Parameters';

export interface DwordWrite {
  keyPath: string;
  name: string;
  value: number;
}

/** `error` is null when the write went through. */
export interface DwordWriteResult {
  keyPath: string;
  error: WriteDeniedError | RegistryWriteError | null;
}

export interface RegistryStore {
  /**
   * Every `Device Parameters` key below `root`, with the descriptive
   * attributes of its parent and the sleep attribute of the key itself.
   * Throws EnumerationUnavailableError when `root` cannot be opened.
   */
  enumerate(root: string): Promise<RawDeviceRecord[]>;

  /** Integer value, or null when the key or value is absent or not an integer. */
  readDword(keyPath: string, name: string): Promise<number | null>;

  /** Throws WriteDeniedError on ACL refusal, RegistryWriteError otherwise. */
  writeDword(keyPath: string, name: string, value: number): Promise<void>;

  /**
   * Every write attempted in order, one result each. A failed write never
   * stops the rest.
   */
  writeDwords(writes: DwordWrite[]): Promise<DwordWriteResult[]>;
}

export function parentKeyPath(keyPath: string): string {
  const idx = keyPath.lastIndexOf('\\');
  return idx === -1 ? '' : keyPath.slice(0, idx);
}
