/**
 * elevation/elevated_executor.ts
 *
 * What runs inside the elevated helper. One invocation = one request file in,
 * one response file out, then exit. Nothing is kept between invocations.
 */

import { promises as fs } from 'fs';
import { RegistryWriteError, WriteDeniedError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { RegistryStore } from '../store/registry_store';
import {
  ElevationRequest,
  ElevationResponse,
  ExecutorOutcome,
  PROTOCOL_VERSION,
  parseRequest
} from './protocol';

const log = scopedLogger('elevation/elevated_executor');

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;

/**
 * Attempt every operation, in order, as one store batch. A failed write
 * never stops the batch, and every operation gets exactly one outcome.
 */
export async function executeElevationRequest(
  request: ElevationRequest,
  store: RegistryStore
): Promise<ElevationResponse> {
  const results = await store.writeDwords(
    request.operations.map(op => ({ keyPath: op.registryPath, name: request.attribute, value: op.value }))
  );

  const outcomes = request.operations.map(({ registryPath }, i): ExecutorOutcome => {
    const error = i < results.length ? results[i].error : new RegistryWriteError(registryPath, 'No result for this write');
    if (error === null) return { registryPath, status: 'Succeeded' };
    return {
      registryPath,
      status: 'Failed',
      reason: error instanceof WriteDeniedError ? 'denied' : 'error',
      message: error.message
    };
  });

  return { version: PROTOCOL_VERSION, requestId: request.requestId, outcomes };
}

/** Write-then-rename so the service never reads a half-written report. */
async function writeResponse(responseFile: string, response: ElevationResponse): Promise<void> {
  const partial = `${responseFile}.partial`;
  await fs.writeFile(partial, JSON.stringify(response), 'utf-8');
  await fs.rename(partial, responseFile);
}

/**
 * Entry logic: `<requestFile> <responseFile>`.
 * Returns the process exit code; the caller decides when to exit.
 */
export async function runElevatedExecutor(argv: string[], store: RegistryStore): Promise<number> {
  const [requestFile, responseFile] = argv;
  if (!requestFile || !responseFile) {
    log.error({ argv }, 'Usage: executor_main <requestFile> <responseFile>');
    return EXIT_USAGE;
  }

  let request: ElevationRequest;
  try {
    request = parseRequest(await fs.readFile(requestFile, 'utf-8'));
  } catch (e) {
    // No report: the service resolves the whole batch to no-response
    log.error({ requestFile, error: errorMessage(e) }, 'Unreadable elevation request');
    return EXIT_USAGE;
  }

  const response = await executeElevationRequest(request, store);
  await writeResponse(responseFile, response);

  const failed = response.outcomes.filter(o => o.status === 'Failed').length;
  log.info({ requestId: request.requestId, operations: response.outcomes.length, failed }, 'Elevated batch done');
  return EXIT_OK;
}
