/**
 * Unit tests for envelope framing and validation
 */

import { describe, it, expect } from 'vitest';
import { encode, NumericArray } from '../../../src/bridge/codec.js';
import {
  createErrorDescriptor,
  createErrorResponse,
  createRequest,
  createSuccessResponse,
  INTERNAL_ERROR_CODE,
} from '../../../src/bridge/messages.js';
import {
  decodeEnvelope,
  encodeEnvelope,
  safeDecodeEnvelope,
  validateEnvelope,
} from '../../../src/bridge/protocol.js';
import { ErrorCodes, MalformedPayloadError } from '../../../src/utils/errors.js';

describe('Protocol', () => {
  describe('message builders', () => {
    it('should build a request stamped with the contract version', () => {
      expect(createRequest(3, 'symbolInfo', { symbol: 'EURUSD' })).toEqual({
        kind: 'request',
        v: 1,
        id: 3,
        op: 'symbolInfo',
        params: { symbol: 'EURUSD' },
      });
    });

    it('should build success and error responses', () => {
      expect(createSuccessResponse(4, 42)).toEqual({ kind: 'response', v: 1, id: 4, ok: true, result: 42 });
      expect(createErrorResponse(5, createErrorDescriptor('internal', INTERNAL_ERROR_CODE, 'boom'))).toEqual({
        kind: 'response',
        v: 1,
        id: 5,
        ok: false,
        error: { kind: 'internal', code: -1, message: 'boom' },
      });
    });
  });

  describe('encodeEnvelope / decodeEnvelope', () => {
    it('should round-trip a request', () => {
      const request = createRequest(1, 'copyRatesFromPos', { symbol: 'EURUSD', timeframe: 16385, startPos: 0, count: 10 });
      expect(decodeEnvelope(encodeEnvelope(request))).toEqual(request);
    });

    it('should carry a numeric array result through a response', () => {
      const array = new NumericArray(new Float64Array([1, 2, 3, 4, 5, 6, 7, 8]), [1, 8]);
      const decoded = decodeEnvelope(encodeEnvelope(createSuccessResponse(9, array)));

      expect(decoded.kind).toBe('response');
      if (decoded.kind !== 'response' || !decoded.ok) {
        throw new Error('Expected a success response');
      }
      expect(decoded.result).toBeInstanceOf(NumericArray);
      expect(decoded.result).toEqual(array);
    });

    it('should carry a null result', () => {
      const decoded = decodeEnvelope(encodeEnvelope(createSuccessResponse(2, null)));
      expect(decoded).toEqual({ kind: 'response', v: 1, id: 2, ok: true, result: null });
    });
  });

  describe('validateEnvelope', () => {
    it('should reject a different contract version', () => {
      try {
        validateEnvelope({ kind: 'request', v: 2, id: 1, op: 'version', params: {} });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedPayloadError);
        expect(error).toHaveProperty('code', ErrorCodes.CONTRACT_MISMATCH);
        expect(error).toHaveProperty('message', 'Contract version mismatch: local 1, remote 2');
      }
    });

    it('should name the offending field', () => {
      expect(() => validateEnvelope({ kind: 'request', v: 1, id: 0, op: 'version', params: {} })).toThrow(
        /^Malformed payload: invalid envelope at 'id'/
      );
    });

    it('should reject values that are not envelopes', () => {
      expect(() => validateEnvelope('hello')).toThrow(/^Malformed payload: invalid envelope/);
      expect(() => validateEnvelope({ kind: 'notice', v: 1, id: 1 })).toThrow(MalformedPayloadError);
    });

    it('should reject a response without a result', () => {
      expect(() => validateEnvelope({ kind: 'response', v: 1, id: 1, ok: true })).toThrow(MalformedPayloadError);
    });
  });

  describe('safeDecodeEnvelope', () => {
    it('should return the envelope on success', () => {
      const result = safeDecodeEnvelope(encodeEnvelope(createRequest(1, 'version', {})));
      expect(result).toEqual({
        success: true,
        envelope: { kind: 'request', v: 1, id: 1, op: 'version', params: {} },
      });
    });

    it('should recover the id of an invalid envelope', () => {
      const result = safeDecodeEnvelope(encode({ kind: 'request', v: 1, id: 7, op: '' }));
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.id).toBe(7);
        expect(result.error).toBeInstanceOf(MalformedPayloadError);
      }
    });

    it('should report no id for an undecodable frame', () => {
      const result = safeDecodeEnvelope(new Uint8Array([1, 2, 3]));
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.id).toBeNull();
        expect(result.error.message).toBe('Malformed payload: frame of 3 bytes is shorter than its length prefix');
      }
    });

    it('should not recover a non-positive id', () => {
      const result = safeDecodeEnvelope(encode({ kind: 'request', v: 1, id: -4 }));
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.id).toBeNull();
      }
    });
  });
});
