/**
 * Envelope builder functions for the terminal bridge
 */

import type { WireRecord, WireValue } from './codec.js';
import { CONTRACT_VERSION } from './contract.js';
import type { ErrorDescriptor, ErrorResponse, RequestEnvelope, SuccessResponse } from './protocol.js';
import type { RemoteErrorKind } from '../utils/errors.js';

/**
 * Error code reported for failures that are not the terminal's own
 */
export const INTERNAL_ERROR_CODE = -1;

/**
 * Error code reported when request params fail validation
 */
export const INVALID_PARAMS_CODE = -2;

/**
 * Error code reported when the circuit breaker turns a call away
 */
export const CIRCUIT_OPEN_CODE = -3;

/**
 * Creates a request envelope
 * @param id Correlation id allocated by the session
 * @param op Operation name from the contract
 * @param params Parameters, already validated against the operation's schema
 */
export function createRequest(id: number, op: string, params: WireRecord): RequestEnvelope {
  return {
    kind: 'request',
    v: CONTRACT_VERSION,
    id,
    op,
    params,
  };
}

/**
 * Creates a success response tagged with the request's correlation id
 */
export function createSuccessResponse(id: number, result: WireValue): SuccessResponse {
  return {
    kind: 'response',
    v: CONTRACT_VERSION,
    id,
    ok: true,
    result,
  };
}

/**
 * Creates an error response tagged with the request's correlation id
 */
export function createErrorResponse(id: number, error: ErrorDescriptor): ErrorResponse {
  return {
    kind: 'response',
    v: CONTRACT_VERSION,
    id,
    ok: false,
    error,
  };
}

export function createErrorDescriptor(kind: RemoteErrorKind, code: number, message: string): ErrorDescriptor {
  return { kind, code, message };
}
