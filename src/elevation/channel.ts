/**
 * elevation/channel.ts
 *
 * One elevated round-trip over a pair of temp files:
 *   1. write request.json into a private temp directory
 *   2. launch the helper with (request.json, response.json)
 *   3. wait for it, bounded by the timeout
 *   4. read + validate response.json and pair it with the request
 * The directory is removed whatever happens.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { OpOutcome, WriteOp } from '../core/types';
import { TimeoutError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { createRequest, ElevationRequest, matchOutcomes, parseResponse } from './protocol';
import { ElevatedLauncher, LaunchResult } from './launcher';

const log = scopedLogger('elevation/channel');

export type RoundTrip =
  | { kind: 'report'; outcomes: OpOutcome[] }
  | { kind: 'declined'; message: string }
  | { kind: 'spawn-error'; message: string }
  | { kind: 'no-response'; message: string };

export interface ElevationChannel {
  roundTrip(ops: WriteOp[], timeoutMs: number): Promise<RoundTrip>;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      work,
      new Promise<T>((_, reject) => {
        timeoutHandle = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
      })
    ]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}

export class FileElevationChannel implements ElevationChannel {
  constructor(
    private readonly launcher: ElevatedLauncher,
    private readonly tmpRoot: string = os.tmpdir()
  ) {}

  async roundTrip(ops: WriteOp[], timeoutMs: number): Promise<RoundTrip> {
    const request = createRequest(ops);

    let dir: string;
    try {
      dir = await fs.mkdtemp(path.join(this.tmpRoot, 'usb-sleep-'));
    } catch (e) {
      return { kind: 'spawn-error', message: `Cannot stage elevation request: ${errorMessage(e)}` };
    }

    const requestFile = path.join(dir, 'request.json');
    const responseFile = path.join(dir, 'response.json');

    try {
      try {
        await fs.writeFile(requestFile, JSON.stringify(request), 'utf-8');
      } catch (e) {
        return { kind: 'spawn-error', message: `Cannot stage elevation request: ${errorMessage(e)}` };
      }
      log.info({ requestId: request.requestId, operations: ops.length }, 'Requesting elevated write');

      let launched: LaunchResult;
      try {
        launched = await withTimeout(
          this.launcher.launch(requestFile, responseFile, timeoutMs),
          timeoutMs,
          'elevation.roundTrip'
        );
      } catch (e) {
        if (e instanceof TimeoutError) launched = { status: 'timeout' };
        else return { kind: 'spawn-error', message: errorMessage(e) };
      }

      if (launched.status === 'declined') {
        return { kind: 'declined', message: launched.message };
      }
      if (launched.status === 'spawn-error') {
        return { kind: 'spawn-error', message: launched.message };
      }
      if (launched.status === 'timeout') {
        return { kind: 'no-response', message: `Elevated helper did not finish within ${timeoutMs}ms` };
      }
      return await this.readReport(request, responseFile, launched.exitCode);
    } finally {
      await fs.rm(dir, { recursive: true, force: true }).catch((e: unknown) => {
        log.warn({ dir, error: errorMessage(e) }, 'Could not remove elevation temp directory');
      });
    }
  }

  private async readReport(request: ElevationRequest, responseFile: string, exitCode: number | null): Promise<RoundTrip> {
    let raw: string;
    try {
      raw = await fs.readFile(responseFile, 'utf-8');
    } catch {
      log.warn({ requestId: request.requestId, exitCode }, 'Elevated helper exited without a report');
      return { kind: 'no-response', message: `Elevated helper exited (code ${exitCode ?? 'unknown'}) without a report` };
    }

    try {
      const outcomes = matchOutcomes(request, parseResponse(raw));
      log.info({ requestId: request.requestId, exitCode }, 'Elevated helper reported');
      return { kind: 'report', outcomes };
    } catch (e) {
      log.warn({ requestId: request.requestId, error: errorMessage(e) }, 'Elevated helper report rejected');
      return { kind: 'no-response', message: errorMessage(e) };
    }
  }
}
