/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what shows up in HTTP error bodies and what
 * failureFromError() maps to a per-operation failure reason.
 */

import { FailureReason, SLEEP_ATTRIBUTE } from './types';

export class UsbSleepError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Read-side errors
// ---------------------------------------------------------------------------

/** The enumeration root could not be opened, even for reading. Fatal to one pass. */
export class EnumerationUnavailableError extends UsbSleepError {
  constructor(root: string, reason: string) {
    super(
      `Cannot enumerate "${root}": ${reason}`,
      'ENUMERATION_UNAVAILABLE',
      { root, reason }
    );
  }
}

/** A single attribute could not be read. Degrades one field, never fatal. */
export class AttributeMissingError extends UsbSleepError {
  constructor(keyPath: string, attribute: string) {
    super(
      `Attribute "${attribute}" missing on "${keyPath}"`,
      'ATTRIBUTE_MISSING',
      { keyPath, attribute }
    );
  }
}

// ---------------------------------------------------------------------------
// Write-side errors
// ---------------------------------------------------------------------------

/** Access denied by the registry ACL. */
export class WriteDeniedError extends UsbSleepError {
  constructor(keyPath: string, message?: string) {
    super(message ?? `Access denied: "${keyPath}"`, 'WRITE_DENIED', { keyPath });
  }
}

/** Any other failed write. */
export class RegistryWriteError extends UsbSleepError {
  constructor(keyPath: string, message: string) {
    super(message, 'WRITE_FAILED', { keyPath });
  }
}

/** The OS accepted the write but the read-back still shows the old value. */
export class WriteIneffectiveError extends UsbSleepError {
  constructor(keyPath: string, expected: number, observed: string) {
    super(
      `Write of ${expected} to "${keyPath}" did not take effect (read back: ${observed})`,
      'WRITE_INEFFECTIVE',
      { keyPath, expected, observed }
    );
  }
}

// ---------------------------------------------------------------------------
// Elevation / UAC errors
// ---------------------------------------------------------------------------

/** The operator refused the consent prompt. */
export class ElevationDeclinedError extends UsbSleepError {
  constructor(message = 'Elevation was declined') {
    super(message, 'ELEVATION_DECLINED');
  }
}

/** The elevated helper could not be started or never reported back. */
export class ElevationUnresponsiveError extends UsbSleepError {
  readonly reason: 'spawn-error' | 'no-response';

  constructor(reason: 'spawn-error' | 'no-response', message: string) {
    super(message, 'ELEVATION_UNRESPONSIVE', { reason });
    this.reason = reason;
  }
}

/** A request or response payload crossing the privilege boundary is malformed. */
export class ProtocolError extends UsbSleepError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', details);
  }
}

// ---------------------------------------------------------------------------
// Device lookup errors
// ---------------------------------------------------------------------------

export class UnknownDeviceError extends UsbSleepError {
  constructor(registryPath: string) {
    super(`Unknown device: "${registryPath}"`, 'UNKNOWN_DEVICE', { registryPath });
  }
}

export class UnknownConsentRequestError extends UsbSleepError {
  constructor(id: string) {
    super(`No elevation request waiting with id "${id}"`, 'UNKNOWN_CONSENT_REQUEST', { id });
  }
}

/** The device has no power-management attribute, so there is nothing to toggle. */
export class DeviceUnavailableError extends UsbSleepError {
  constructor(registryPath: string) {
    super(
      `Device "${registryPath}" has no ${SLEEP_ATTRIBUTE} value`,
      'DEVICE_UNAVAILABLE',
      { registryPath }
    );
  }
}

// ---------------------------------------------------------------------------
// Execution / validation errors
// ---------------------------------------------------------------------------

/** A PowerShell or child process call failed. */
export class ExecutionError extends UsbSleepError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { source, ...details });
  }
}

/** Configuration or request body failed schema validation. */
export class ValidationError extends UsbSleepError {
  constructor(subject: string, violations: unknown[]) {
    super(
      `Validation failed for ${subject}`,
      'VALIDATION_ERROR',
      { subject, violations }
    );
  }
}

/** A bounded wait was exceeded. */
export class TimeoutError extends UsbSleepError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `"${operation}" exceeded timeout of ${timeoutMs}ms`,
      'TIMEOUT',
      { operation, timeoutMs }
    );
  }
}

// ---------------------------------------------------------------------------
// Mapping to per-operation outcomes
// ---------------------------------------------------------------------------

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function failureFromError(e: unknown): { reason: FailureReason; message: string } {
  const message = errorMessage(e);
  if (e instanceof WriteDeniedError) return { reason: 'denied', message };
  if (e instanceof WriteIneffectiveError) return { reason: 'ineffective', message };
  if (e instanceof ElevationDeclinedError) return { reason: 'declined', message };
  if (e instanceof ElevationUnresponsiveError) return { reason: e.reason, message };
  if (e instanceof TimeoutError) return { reason: 'no-response', message };
  return { reason: 'error', message };
}
