/**
 * transports/http.ts
 *
 * REST surface over the reconciliation loop. Handlers only translate:
 * validate the body, call the loop, map errors to a status.
 *
 * Routes:
 *   GET  /health                 → loop status
 *   GET  /devices                → current snapshot
 *   POST /devices/refresh        → force a pass, return the snapshot
 *   POST /devices/toggle         → { registryPath }            → { outcome }
 *   POST /devices/sleep          → { registryPath, disabled }  → { outcome }
 *   POST /devices/disable-all    →                             → { outcomes }
 *   GET  /events                 → SSE stream (see sse.ts)
 *
 * With a consent gate (confirmElevation):
 *   GET  /elevation/requests     → { requests }
 *   POST /elevation/requests/:id → { approve }                 → { id, approved }
 */

import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import Ajv, { ValidateFunction } from 'ajv';
import { ServiceConfig } from '../core/types';
import {
  DeviceUnavailableError,
  EnumerationUnavailableError,
  UnknownConsentRequestError,
  UnknownDeviceError,
  UsbSleepError,
  ValidationError
} from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ReconcileLoop } from '../reconcile/reconcile_loop';
import { ConsentGate } from '../elevation/consent';
import { attachEventStream } from './sse';

const log = scopedLogger('transports/http');
const ajv = new Ajv({ allErrors: true });

interface ToggleBody {
  registryPath: string;
}

interface SleepBody {
  registryPath: string;
  disabled: boolean;
}

interface AnswerBody {
  approve: boolean;
}

const validateAnswerBody = ajv.compile<AnswerBody>({
  type: 'object',
  properties: {
    approve: { type: 'boolean' }
  },
  required: ['approve']
});

const validateToggleBody = ajv.compile<ToggleBody>({
  type: 'object',
  properties: {
    registryPath: { type: 'string', minLength: 1 }
  },
  required: ['registryPath']
});

const validateSleepBody = ajv.compile<SleepBody>({
  type: 'object',
  properties: {
    registryPath: { type: 'string', minLength: 1 },
    disabled:     { type: 'boolean' }
  },
  required: ['registryPath', 'disabled']
});

/** Headroom over the elevation bound so a slow consent prompt still gets its answer. */
const REQUEST_TIMEOUT_MARGIN_MS = 15000;

export function statusForError(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof SyntaxError) return 400;      // express.json() on a malformed body
  if (err instanceof UnknownDeviceError) return 404;
  if (err instanceof UnknownConsentRequestError) return 404;
  if (err instanceof DeviceUnavailableError) return 409;
  if (err instanceof EnumerationUnavailableError) return 503;
  return 500;
}

/** Express 4 does not forward rejected promises from handlers. */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function bodyOf<T>(req: Request, validate: ValidateFunction<T>, subject: string): T {
  const body: unknown = req.body;
  if (!validate(body)) throw new ValidationError(subject, validate.errors ?? []);
  return body;
}

export function createHttpTransport(
  loop: ReconcileLoop,
  config: Pick<ServiceConfig, 'elevationTimeoutMs'>,
  consent?: ConsentGate
): express.Application {
  const app = express();
  app.use(express.json());

  // -----------------------------------------------------------------------
  // /devices
  // -----------------------------------------------------------------------
  const devices = express.Router();
  // A write may wait for the operator's answer, then for the helper
  const waits = consent ? 2 : 1;
  const requestTimeoutMs = waits * config.elevationTimeoutMs + REQUEST_TIMEOUT_MARGIN_MS;

  devices.use((req: Request, res: Response, next: NextFunction) => {
    req.setTimeout(requestTimeoutMs);
    res.setTimeout(requestTimeoutMs, () => {
      log.warn({ path: req.path }, 'Request timeout');
      if (!res.headersSent) {
        res.status(503).json({ error: { code: 'TIMEOUT', message: 'The request took too long to complete' } });
      }
    });
    next();
  });

  devices.get('/', (_req: Request, res: Response) => {
    res.json({ devices: loop.snapshot() });
  });

  devices.post('/refresh', route(async (_req, res) => {
    res.json({ devices: await loop.refresh() });
  }));

  devices.post('/toggle', route(async (req, res) => {
    const { registryPath } = bodyOf(req, validateToggleBody, 'toggle request');
    res.json({ outcome: await loop.toggle(registryPath) });
  }));

  devices.post('/sleep', route(async (req, res) => {
    const { registryPath, disabled } = bodyOf(req, validateSleepBody, 'sleep request');
    res.json({ outcome: await loop.setSleepDisabled(registryPath, disabled) });
  }));

  devices.post('/disable-all', route(async (_req, res) => {
    res.json({ outcomes: await loop.disableAllSleep() });
  }));

  app.use('/devices', devices);

  // -----------------------------------------------------------------------
  // /elevation
  // -----------------------------------------------------------------------
  if (consent) {
    app.get('/elevation/requests', (_req: Request, res: Response) => {
      res.json({ requests: consent.pending() });
    });

    app.post('/elevation/requests/:id', route(async (req, res) => {
      const { approve } = bodyOf(req, validateAnswerBody, 'elevation answer');
      consent.answer(req.params.id, approve);
      res.json({ id: req.params.id, approved: approve });
    }));
  }

  // -----------------------------------------------------------------------
  // GET /events
  // -----------------------------------------------------------------------
  attachEventStream(app, loop, consent);

  // -----------------------------------------------------------------------
  // GET /health
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: loop.lastError ? 'degraded' : 'ok',
      devices: loop.snapshot().length,
      lastRefresh: loop.lastRefresh ? loop.lastRefresh.toISOString() : null,
      lastError: loop.lastError ? { code: loop.lastError.code, message: loop.lastError.message } : null
    });
  });

  // -----------------------------------------------------------------------
  // Error handler
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);
    const code = err instanceof UsbSleepError
      ? err.code
      : status === 400 ? 'INVALID_JSON' : 'INTERNAL_ERROR';

    if (status >= 500) {
      log.error({ error: err.message, stack: err.stack, path: req.path, method: req.method }, 'Request failed');
    } else {
      log.debug({ code, path: req.path }, err.message);
    }

    if (!res.headersSent) {
      res.status(status).json({ error: { code, message: err.message } });
    }
  });

  return app;
}
