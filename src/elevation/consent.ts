/**
 * elevation/consent.ts
 *
 * "Administrator privileges required" as a question the front end answers.
 * confirm() is handed to the broker as its ConfirmElevation hook; each call
 * parks a request here until an operator answers it over HTTP, or until the
 * wait runs out (counted as declined).
 */

import { randomUUID } from 'crypto';
import { WriteOp } from '../core/types';
import { UnknownConsentRequestError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ConfirmElevation } from './strategy';

const log = scopedLogger('elevation/consent');

export interface ConsentRequest {
  id: string;
  operations: WriteOp[];
  requestedAt: string;
}

export type ConsentListener = (request: ConsentRequest) => void;

interface Waiting {
  request: ConsentRequest;
  settle: (approved: boolean) => void;
}

export class ConsentGate {
  private readonly waiting = new Map<string, Waiting>();
  private readonly listeners: ConsentListener[] = [];

  constructor(private readonly timeoutMs: number) {}

  readonly confirm: ConfirmElevation = ops => new Promise<boolean>(resolve => {
    const request: ConsentRequest = {
      id: randomUUID(),
      operations: ops.map(op => ({ registryPath: op.registryPath, value: op.value })),
      requestedAt: new Date().toISOString()
    };

    const timer = setTimeout(() => {
      log.warn({ id: request.id }, 'Elevation request not answered in time, declining');
      settle(false);
    }, this.timeoutMs);

    const settle = (approved: boolean): void => {
      clearTimeout(timer);
      this.waiting.delete(request.id);
      resolve(approved);
    };

    this.waiting.set(request.id, { request, settle });
    log.info({ id: request.id, operations: ops.length }, 'Elevation request waiting for operator');

    for (const listener of [...this.listeners]) {
      try {
        listener(request);
      } catch (e) {
        log.error({ error: errorMessage(e) }, 'Consent listener threw');
      }
    }
  });

  pending(): ConsentRequest[] {
    return [...this.waiting.values()].map(w => w.request);
  }

  answer(id: string, approved: boolean): void {
    const waiting = this.waiting.get(id);
    if (!waiting) throw new UnknownConsentRequestError(id);

    log.info({ id, approved }, 'Elevation request answered');
    waiting.settle(approved);
  }

  onRequest(listener: ConsentListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  /** Declines everything still waiting. */
  close(): void {
    for (const waiting of [...this.waiting.values()]) waiting.settle(false);
  }
}
