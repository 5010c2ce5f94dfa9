/**
 * transports/sse.ts
 *
 * Server-Sent Events view of the loop. A client gets the whole snapshot on
 * connect, then only what changed:
 *
 *   event: snapshot   { devices }
 *   event: diff       { added, removed, changed }
 *   event: outcome    { outcomes }
 *   event: consent    { request }      (only with a consent gate)
 */

import { randomUUID } from 'crypto';
import express, { Request, Response } from 'express';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ReconcileLoop } from '../reconcile/reconcile_loop';
import { ConsentGate } from '../elevation/consent';

const log = scopedLogger('transports/sse');

/** Comment line that keeps idle proxies from closing the stream. */
const KEEP_ALIVE_MS = 25000;

export function pushEvent(res: Response, event: string, data: unknown): void {
  // SSE format: each message is "event: …\ndata: …\n\n"
  res.write(`event: ${event}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

export function attachEventStream(app: express.Application, loop: ReconcileLoop, consent?: ConsentGate): void {
  let connections = 0;

  app.get('/events', (req: Request, res: Response) => {
    const clientId = randomUUID();

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // nginx passthrough
    res.flushHeaders();

    pushEvent(res, 'snapshot', { devices: loop.snapshot() });
    for (const request of consent?.pending() ?? []) pushEvent(res, 'consent', { request });

    const offChange = loop.onChange(diff => pushEvent(res, 'diff', diff));
    const offOutcome = loop.onOutcome(outcomes => pushEvent(res, 'outcome', { outcomes }));
    const offConsent = consent ? consent.onRequest(request => pushEvent(res, 'consent', { request })) : () => undefined;
    const keepAlive = setInterval(() => res.write(': keep-alive\n\n'), KEEP_ALIVE_MS);

    connections++;
    log.info({ clientId, connections }, 'Event stream opened');

    let closed = false;
    const close = (): void => {
      if (closed) return;
      closed = true;
      offChange();
      offOutcome();
      offConsent();
      clearInterval(keepAlive);
      connections--;
      log.info({ clientId, connections }, 'Event stream closed');
    };

    req.on('close', close);
    req.on('error', (err: Error) => {
      log.warn({ clientId, error: errorMessage(err) }, 'Event stream error');
      close();
    });
  });
}
