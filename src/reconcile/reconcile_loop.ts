/**
 * reconcile/reconcile_loop.ts
 *
 * The single writer of the in-memory device set. Every change to it goes
 * through commit(): enumeration passes, Pending marks, settled outcomes.
 *
 *   refresh / timer ──► scheduler ──► reconcile() ──► commit() ──► onChange
 *   toggle / apply-all ──► submit() ──► broker ──► verify (wake pass) ──► settle() ──► onOutcome
 */

import {
  Device,
  DeviceDiff,
  DeviceSnapshot,
  OpOutcome,
  SLEEP_ATTRIBUTE,
  SleepState,
  WriteOp,
  WriteOutcome
} from '../core/types';
import {
  DeviceUnavailableError,
  ExecutionError,
  UnknownDeviceError,
  UsbSleepError,
  WriteIneffectiveError,
  errorMessage
} from '../core/errors';
import { scopedLogger } from '../core/logger';
import { DeviceRegistryReader } from '../devices/device_reader';
import {
  NO_OUTCOME,
  PENDING,
  canToggle,
  compareDevices,
  diffDevices,
  isEmptyDiff,
  outcomeFromOp,
  sleepStateFromValue,
  snapshotOf,
  toggleTarget,
  withOutcome
} from '../devices/device';
import { PrivilegeBroker } from '../elevation/privilege_broker';
import { failAll } from '../elevation/strategy';
import { RegistryStore } from '../store/registry_store';
import { ReconcileScheduler } from './scheduler';

const log = scopedLogger('reconcile/reconcile_loop');

export type ChangeListener = (diff: DeviceDiff, snapshot: DeviceSnapshot[]) => void;
export type OutcomeListener = (outcomes: OpOutcome[]) => void;

export interface ReconcileLoopOptions {
  refreshIntervalMs: number;
}

type ReadBack = SleepState | 'missing';

interface Verified {
  outcomes: OpOutcome[];
  /** Sleep state each read-back saw, by registry path. */
  observed: Map<string, SleepState>;
}

interface SettledOutcome {
  outcome: WriteOutcome;
  /** Pass counter when the outcome was recorded; the next pass to start clears it. */
  pass: number;
}

export class ReconcileLoop {
  private devices = new Map<string, Device>();
  private published: DeviceSnapshot[] = [];
  private readonly outcomes = new Map<string, SettledOutcome>();
  private readonly pendingWrites = new Map<string, number>();
  private writeTail: Promise<void> = Promise.resolve();
  private passesStarted = 0;

  private readonly changeListeners: ChangeListener[] = [];
  private readonly outcomeListeners: OutcomeListener[] = [];
  private readonly scheduler: ReconcileScheduler;

  lastRefresh: Date | null = null;
  lastError: UsbSleepError | null = null;

  constructor(
    private readonly reader: DeviceRegistryReader,
    private readonly broker: PrivilegeBroker,
    private readonly store: RegistryStore,
    options: ReconcileLoopOptions
  ) {
    this.scheduler = new ReconcileScheduler(trigger => this.reconcile(trigger), options.refreshIntervalMs);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** First pass, then the timer. A failed first pass is retried by the timer. */
  async start(): Promise<void> {
    try {
      await this.scheduler.wake();
    } catch (e) {
      log.warn({ error: errorMessage(e) }, 'Initial enumeration failed, will retry on schedule');
    }
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  isRunning(): boolean {
    return this.scheduler.isRunning();
  }

  /** Resolves once every write submitted so far has settled. */
  idle(): Promise<void> {
    return this.writeTail;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async refresh(): Promise<DeviceSnapshot[]> {
    await this.scheduler.wake();
    return this.snapshot();
  }

  snapshot(): DeviceSnapshot[] {
    return [...this.published];
  }

  get(registryPath: string): DeviceSnapshot | undefined {
    const device = this.devices.get(registryPath);
    return device ? snapshotOf(device) : undefined;
  }

  onChange(listener: ChangeListener): () => void {
    return subscribe(this.changeListeners, listener);
  }

  onOutcome(listener: OutcomeListener): () => void {
    return subscribe(this.outcomeListeners, listener);
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async toggle(registryPath: string): Promise<OpOutcome> {
    const device = this.requireDevice(registryPath);
    const value = toggleTarget(device);
    if (value === null) throw new DeviceUnavailableError(registryPath);

    const [outcome] = await this.submit([{ registryPath, value }]);
    return outcome;
  }

  async setSleepDisabled(registryPath: string, disabled: boolean): Promise<OpOutcome> {
    const device = this.requireDevice(registryPath);
    if (!canToggle(device)) throw new DeviceUnavailableError(registryPath);

    const [outcome] = await this.submit([{ registryPath, value: disabled ? 0 : 1 }]);
    return outcome;
  }

  /** One batch, one elevation at most, one outcome per eligible device. */
  async disableAllSleep(): Promise<OpOutcome[]> {
    const ops = this.published
      .filter(canToggle)
      .map((d): WriteOp => ({ registryPath: d.registryPath, value: 0 }));

    if (ops.length === 0) {
      log.info('No device exposes the sleep attribute, nothing to apply');
      return [];
    }
    return this.submit(ops);
  }

  private requireDevice(registryPath: string): Device {
    const device = this.devices.get(registryPath);
    if (!device) throw new UnknownDeviceError(registryPath);
    return device;
  }

  /**
   * Pending is published before anything is queued. Batches are written and
   * verified one after another, so no batch can change a device between
   * another batch's write and its read-back.
   */
  private submit(ops: WriteOp[]): Promise<OpOutcome[]> {
    for (const op of ops) {
      this.pendingWrites.set(op.registryPath, (this.pendingWrites.get(op.registryPath) ?? 0) + 1);
    }
    this.commit(this.remerge(this.devices.values()));

    const run = this.writeTail.then(() => this.writeAndVerify(ops));
    this.writeTail = run.then(() => undefined);
    return run;
  }

  private async writeAndVerify(ops: WriteOp[]): Promise<OpOutcome[]> {
    let verified: Verified;
    try {
      verified = await this.verify(await this.broker.requestWrite(ops));
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'Write batch could not be completed');
      verified = { outcomes: failAll(ops, 'error', errorMessage(e)), observed: new Map() };
    }
    this.settle(verified);
    return verified.outcomes;
  }

  /**
   * Every completed write request is followed by a pass, failed or not: a
   * helper that timed out may still have written. A reported success only
   * counts once that read shows the requested value; if the pass fails,
   * each reported success is read directly.
   */
  private async verify(outcomes: OpOutcome[]): Promise<Verified> {
    const observed = new Map<string, SleepState>();

    let readBack: (registryPath: string) => Promise<ReadBack>;
    try {
      await this.scheduler.wake();
      readBack = async path => this.devices.get(path)?.sleepState ?? 'missing';
    } catch (e) {
      log.warn({ error: errorMessage(e) }, 'Post-write pass failed, reading written values directly');
      readBack = async path => sleepStateFromValue(await this.store.readDword(path, SLEEP_ATTRIBUTE));
    }

    const verified: OpOutcome[] = [];
    for (const outcome of outcomes) {
      if (outcome.status !== 'Succeeded') {
        verified.push(outcome);
        continue;
      }
      verified.push(await this.checkReadBack(outcome, readBack, observed));
    }
    return { outcomes: verified, observed };
  }

  private async checkReadBack(
    outcome: OpOutcome,
    readBack: (registryPath: string) => Promise<ReadBack>,
    seen: Map<string, SleepState>
  ): Promise<OpOutcome> {
    const { registryPath, value } = outcome;

    let observed: ReadBack;
    try {
      observed = await readBack(registryPath);
    } catch (e) {
      return { registryPath, value, status: 'Failed', reason: 'error', message: `Read-back failed: ${errorMessage(e)}` };
    }

    if (observed === 'missing') {
      return { registryPath, value, status: 'Failed', reason: 'removed', message: 'Device disappeared before read-back' };
    }
    seen.set(registryPath, observed);
    if (observed !== sleepStateFromValue(value)) {
      const ineffective = new WriteIneffectiveError(registryPath, value, observed);
      log.warn({ code: ineffective.code, ...ineffective.details }, ineffective.message);
      return { registryPath, value, status: 'Failed', reason: 'ineffective', message: ineffective.message };
    }
    return outcome;
  }

  /** Records outcomes and applies what the read-back saw to the device set. */
  private settle({ outcomes: verified, observed }: Verified): void {
    for (const op of verified) {
      const left = (this.pendingWrites.get(op.registryPath) ?? 1) - 1;
      if (left > 0) this.pendingWrites.set(op.registryPath, left);
      else this.pendingWrites.delete(op.registryPath);

      if (this.devices.has(op.registryPath)) {
        this.outcomes.set(op.registryPath, { outcome: outcomeFromOp(op), pass: this.passesStarted });
      }
    }

    const current = [...this.devices.values()].map((device): Device => {
      const sleepState = observed.get(device.registryPath);
      return sleepState === undefined || sleepState === device.sleepState ? device : { ...device, sleepState };
    });
    this.commit(this.remerge(current));

    const failedCount = verified.filter(o => o.status === 'Failed').length;
    log.info({ operations: verified.length, failed: failedCount }, 'Write batch settled');
    notify(this.outcomeListeners, listener => listener(verified));
  }

  // ---------------------------------------------------------------------------
  // Reconciliation
  // ---------------------------------------------------------------------------

  private async reconcile(trigger: 'timer' | 'wake'): Promise<void> {
    const pass = ++this.passesStarted;

    let fresh: Device[];
    try {
      fresh = await this.reader.enumerate();
    } catch (e) {
      const error = e instanceof UsbSleepError ? e : new ExecutionError('reconcile', errorMessage(e));
      this.lastError = error;
      log.warn({ trigger, code: error.code, error: error.message }, 'Reconciliation pass failed');
      throw error;
    }

    // A successful read-back supersedes every outcome recorded before it started
    const present = new Set(fresh.map(d => d.registryPath));
    for (const [path, settled] of this.outcomes) {
      if (!present.has(path) || settled.pass < pass) this.outcomes.delete(path);
    }

    this.lastRefresh = new Date();
    this.lastError = null;
    this.commit(this.remerge(fresh));
    log.trace({ trigger, devices: fresh.length }, 'Reconciliation pass complete');
  }

  /** Freshly read fields, plus the outcome this loop owns for each device. */
  private remerge(devices: Iterable<Device>): Map<string, Device> {
    const next = new Map<string, Device>();
    for (const device of devices) {
      next.set(device.registryPath, withOutcome(device, this.outcomeFor(device.registryPath)));
    }
    return next;
  }

  private outcomeFor(registryPath: string): WriteOutcome {
    if ((this.pendingWrites.get(registryPath) ?? 0) > 0) return PENDING;
    return this.outcomes.get(registryPath)?.outcome ?? NO_OUTCOME;
  }

  private commit(next: Map<string, Device>): void {
    const diff = diffDevices(this.devices, next);
    this.devices = next;
    this.published = [...next.values()].sort(compareDevices).map(snapshotOf);

    if (isEmptyDiff(diff)) return;
    const snapshot = this.snapshot();
    notify(this.changeListeners, listener => listener(diff, snapshot));
  }
}

function subscribe<L>(listeners: L[], listener: L): () => void {
  listeners.push(listener);
  return () => {
    const idx = listeners.indexOf(listener);
    if (idx !== -1) listeners.splice(idx, 1);
  };
}

function notify<L>(listeners: L[], call: (listener: L) => void): void {
  for (const listener of [...listeners]) {
    try {
      call(listener);
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'Listener threw');
    }
  }
}
