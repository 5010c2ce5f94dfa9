/**
 * elevation/protocol.ts
 *
 * Wire format between the service and the elevated helper.
 *
 *   request   { version, requestId, attribute, operations: [{ registryPath, value }] }
 *   response  { version, requestId, outcomes:   [{ registryPath, status, reason?, message? }] }
 *
 * One outcome per operation, same order. Both directions are validated;
 * nothing is ever inferred from the helper's exit code.
 */

import { randomUUID } from 'crypto';
import Ajv from 'ajv';
import { OpOutcome, SLEEP_ATTRIBUTE, SleepValue, WriteOp } from '../core/types';
import { ProtocolError, errorMessage } from '../core/errors';

export const PROTOCOL_VERSION = 1;

export interface ElevationRequest {
  version: number;
  requestId: string;
  attribute: string;
  operations: WriteOp[];
}

export type ExecutorFailureReason = 'denied' | 'error';

export interface ExecutorOutcome {
  registryPath: string;
  status: 'Succeeded' | 'Failed';
  reason?: ExecutorFailureReason;
  message?: string;
}

export interface ElevationResponse {
  version: number;
  requestId: string;
  outcomes: ExecutorOutcome[];
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SLEEP_VALUES: SleepValue[] = [0, 1];

const requestSchema = {
  type: 'object',
  properties: {
    version:   { type: 'integer', const: PROTOCOL_VERSION },
    requestId: { type: 'string', minLength: 1 },
    attribute: { type: 'string', const: SLEEP_ATTRIBUTE },
    operations: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          registryPath: { type: 'string', minLength: 1 },
          value:        { type: 'integer', enum: SLEEP_VALUES }
        },
        required: ['registryPath', 'value'],
        additionalProperties: false
      }
    }
  },
  required: ['version', 'requestId', 'attribute', 'operations'],
  additionalProperties: false
};

const responseSchema = {
  type: 'object',
  properties: {
    version:   { type: 'integer', const: PROTOCOL_VERSION },
    requestId: { type: 'string', minLength: 1 },
    outcomes: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          registryPath: { type: 'string' },
          status:       { type: 'string', enum: ['Succeeded', 'Failed'] },
          reason:       { type: 'string', enum: ['denied', 'error'] },
          message:      { type: 'string' }
        },
        required: ['registryPath', 'status'],
        additionalProperties: false
      }
    }
  },
  required: ['version', 'requestId', 'outcomes'],
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true });
const validateRequest = ajv.compile<ElevationRequest>(requestSchema);
const validateResponse = ajv.compile<ElevationResponse>(responseSchema);

// ---------------------------------------------------------------------------
// Construction + parsing
// ---------------------------------------------------------------------------

export function createRequest(operations: WriteOp[], requestId: string = randomUUID()): ElevationRequest {
  return {
    version: PROTOCOL_VERSION,
    requestId,
    attribute: SLEEP_ATTRIBUTE,
    operations: operations.map(op => ({ registryPath: op.registryPath, value: op.value }))
  };
}

function parseJson(raw: string, what: string): unknown {
  try {
    // The helper may run under a shell that writes a BOM
    return JSON.parse(raw.replace(/^\uFEFF/, ''));
  } catch (e) {
    throw new ProtocolError(`${what} is not valid JSON: ${errorMessage(e)}`);
  }
}

export function parseRequest(raw: string): ElevationRequest {
  const data = parseJson(raw, 'Elevation request');
  if (!validateRequest(data)) {
    throw new ProtocolError('Elevation request is malformed', { errors: ajv.errorsText(validateRequest.errors) });
  }
  return data;
}

export function parseResponse(raw: string): ElevationResponse {
  const data = parseJson(raw, 'Elevation response');
  if (!validateResponse(data)) {
    throw new ProtocolError('Elevation response is malformed', { errors: ajv.errorsText(validateResponse.errors) });
  }
  return data;
}

/**
 * Pair a response with the request it answers. Operation i is answered only
 * by outcome i carrying the same registry path; anything unanswered resolves
 * to no-response.
 */
export function matchOutcomes(request: ElevationRequest, response: ElevationResponse): OpOutcome[] {
  if (response.requestId !== request.requestId) {
    throw new ProtocolError('Elevation response answers a different request', {
      expected: request.requestId,
      received: response.requestId
    });
  }

  return request.operations.map((op, i): OpOutcome => {
    const answer = response.outcomes[i];
    if (!answer || answer.registryPath !== op.registryPath) {
      return {
        registryPath: op.registryPath,
        value: op.value,
        status: 'Failed',
        reason: 'no-response',
        message: 'Elevated helper did not report this operation'
      };
    }
    if (answer.status === 'Succeeded') {
      return { registryPath: op.registryPath, value: op.value, status: 'Succeeded' };
    }
    return {
      registryPath: op.registryPath,
      value: op.value,
      status: 'Failed',
      reason: answer.reason ?? 'error',
      ...(answer.message ? { message: answer.message } : {})
    };
  });
}
