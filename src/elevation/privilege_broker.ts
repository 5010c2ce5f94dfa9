/**
 * elevation/privilege_broker.ts
 *
 * Entry point for every registry write the service makes.
 *
 *   requestWrite(ops)
 *     └─ FIFO queue (one batch in flight, so at most one consent prompt at a time)
 *          └─ probe privilege once for the batch
 *               ├─ elevated      → direct strategy
 *               └─ not elevated  → elevated strategy (one round-trip for the batch)
 *                                  or, with tryDirectFirst, direct first and only
 *                                  the denied operations go to the helper
 *
 * Every request resolves exactly once with one outcome per operation.
 */

import { OpOutcome, WriteOp } from '../core/types';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { PrivilegeProbe } from './privilege';
import {
  StrategyDeps,
  directStrategy,
  elevatedStrategy,
  failAll,
  selectWriteStrategy
} from './strategy';

const log = scopedLogger('elevation/privilege_broker');

export interface BrokerOptions {
  tryDirectFirst?: boolean;
}

export class PrivilegeBroker {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private readonly tryDirectFirst: boolean;

  constructor(
    private readonly probe: PrivilegeProbe,
    private readonly deps: StrategyDeps,
    options: BrokerOptions = {}
  ) {
    this.tryDirectFirst = options.tryDirectFirst ?? false;
  }

  /** Batches submitted and not yet resolved, including the one in flight. */
  pending(): number {
    return this.queued;
  }

  requestWrite(ops: WriteOp[]): Promise<OpOutcome[]> {
    if (ops.length === 0) return Promise.resolve([]);

    const batch = ops.map(op => ({ registryPath: op.registryPath, value: op.value }));
    this.queued++;

    const run = this.tail.then(() => this.runBatch(batch));
    this.tail = run.then(() => undefined, () => undefined);
    return run.finally(() => {
      this.queued--;
    });
  }

  private async runBatch(ops: WriteOp[]): Promise<OpOutcome[]> {
    try {
      const elevated = await this.isElevated();

      if (!elevated && this.tryDirectFirst) {
        return ensureOnePerOp(ops, await this.directThenElevated(ops));
      }

      const strategy = selectWriteStrategy(elevated, this.deps);
      log.info({ strategy: strategy.kind, operations: ops.length }, 'Executing write batch');
      return ensureOnePerOp(ops, await strategy.execute(ops));
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'Write batch failed unexpectedly');
      return failAll(ops, 'error', errorMessage(e));
    }
  }

  private async isElevated(): Promise<boolean> {
    try {
      return await this.probe.isElevated();
    } catch (e) {
      log.warn({ error: errorMessage(e) }, 'Privilege probe failed, assuming not elevated');
      return false;
    }
  }

  private async directThenElevated(ops: WriteOp[]): Promise<OpOutcome[]> {
    const outcomes = await directStrategy(this.deps.store).execute(ops);

    const deniedIdx = outcomes
      .map((o, i) => (o.status === 'Failed' && o.reason === 'denied' ? i : -1))
      .filter(i => i !== -1);
    if (deniedIdx.length === 0) {
      log.info({ operations: ops.length }, 'Direct writes sufficed');
      return outcomes;
    }

    const retry = deniedIdx.map(i => ops[i]);
    log.info({ denied: retry.length, operations: ops.length }, 'Escalating denied writes');
    const elevated = ensureOnePerOp(
      retry,
      await elevatedStrategy(this.deps.channel, this.deps.elevationTimeoutMs, this.deps.confirmElevation).execute(retry)
    );

    const merged = [...outcomes];
    deniedIdx.forEach((opIdx, k) => {
      merged[opIdx] = elevated[k];
    });
    return merged;
  }
}

/** Strategies promise one outcome per op; never pass on anything else. */
function ensureOnePerOp(ops: WriteOp[], outcomes: OpOutcome[]): OpOutcome[] {
  return ops.map((op, i): OpOutcome => {
    const outcome = outcomes[i];
    if (outcome && outcome.registryPath === op.registryPath) return outcome;
    return {
      registryPath: op.registryPath,
      value: op.value,
      status: 'Failed',
      reason: 'no-response',
      message: 'No outcome reported for this operation'
    };
  });
}
