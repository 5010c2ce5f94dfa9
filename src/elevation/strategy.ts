/**
 * elevation/strategy.ts
 *
 * How one batch of writes gets performed. Two strategies, one contract:
 * both take the ordered operations and return exactly one outcome per
 * operation, in the same order. Which one runs is decided once per batch
 * by selectWriteStrategy().
 */

import { FailureReason, OpOutcome, SLEEP_ATTRIBUTE, WriteOp } from '../core/types';
import {
  ElevationDeclinedError,
  ElevationUnresponsiveError,
  RegistryWriteError,
  errorMessage,
  failureFromError
} from '../core/errors';
import { scopedLogger } from '../core/logger';
import { RegistryStore } from '../store/registry_store';
import { ElevationChannel } from './channel';

const log = scopedLogger('elevation/strategy');

/** Operator-facing confirmation before the consent prompt. Resolve false to decline. */
export type ConfirmElevation = (ops: WriteOp[]) => Promise<boolean>;

export interface WriteStrategy {
  readonly kind: 'direct' | 'elevated';
  execute(ops: WriteOp[]): Promise<OpOutcome[]>;
}

export interface StrategyDeps {
  store: RegistryStore;
  channel: ElevationChannel;
  elevationTimeoutMs: number;
  confirmElevation?: ConfirmElevation;
}

export function failAll(ops: WriteOp[], reason: FailureReason, message: string): OpOutcome[] {
  return ops.map((op): OpOutcome => ({ registryPath: op.registryPath, value: op.value, status: 'Failed', reason, message }));
}

function failAllWith(ops: WriteOp[], error: Error): OpOutcome[] {
  const { reason, message } = failureFromError(error);
  log.warn({ code: reason, operations: ops.length }, message);
  return failAll(ops, reason, message);
}

// ---------------------------------------------------------------------------
// Direct: this process writes
// ---------------------------------------------------------------------------

export function directStrategy(store: RegistryStore): WriteStrategy {
  return {
    kind: 'direct',
    async execute(ops) {
      const results = await store.writeDwords(
        ops.map(op => ({ keyPath: op.registryPath, name: SLEEP_ATTRIBUTE, value: op.value }))
      );
      return ops.map((op, i): OpOutcome => {
        const error = i < results.length ? results[i].error : new RegistryWriteError(op.registryPath, 'No result for this write');
        if (error === null) return { registryPath: op.registryPath, value: op.value, status: 'Succeeded' };

        const { reason, message } = failureFromError(error);
        log.debug({ registryPath: op.registryPath, reason }, 'Direct write failed');
        return { registryPath: op.registryPath, value: op.value, status: 'Failed', reason, message };
      });
    }
  };
}

// ---------------------------------------------------------------------------
// Elevated: one round-trip to the helper for the whole batch
// ---------------------------------------------------------------------------

export function elevatedStrategy(
  channel: ElevationChannel,
  timeoutMs: number,
  confirmElevation?: ConfirmElevation
): WriteStrategy {
  return {
    kind: 'elevated',
    async execute(ops) {
      if (confirmElevation) {
        let approved: boolean;
        try {
          approved = await confirmElevation(ops);
        } catch (e) {
          log.warn({ error: errorMessage(e) }, 'Elevation confirmation failed, treating as declined');
          approved = false;
        }
        if (!approved) {
          return failAllWith(ops, new ElevationDeclinedError('Elevation declined by operator'));
        }
      }

      const trip = await channel.roundTrip(ops, timeoutMs);
      switch (trip.kind) {
        case 'report':      return trip.outcomes;
        case 'declined':    return failAllWith(ops, new ElevationDeclinedError(trip.message));
        case 'spawn-error': return failAllWith(ops, new ElevationUnresponsiveError('spawn-error', trip.message));
        case 'no-response': return failAllWith(ops, new ElevationUnresponsiveError('no-response', trip.message));
      }
    }
  };
}

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

export function selectWriteStrategy(elevated: boolean, deps: StrategyDeps): WriteStrategy {
  return elevated
    ? directStrategy(deps.store)
    : elevatedStrategy(deps.channel, deps.elevationTimeoutMs, deps.confirmElevation);
}
