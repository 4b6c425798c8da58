/**
 * Envelope definitions for the terminal bridge
 * Defines request/response schemas and their framing through the wire codec
 */

import { z } from 'zod';
import { decode, encode, type WireValue } from './codec.js';
import { CONTRACT_VERSION } from './contract.js';
import { MalformedPayloadError } from '../utils/errors.js';

// ============================================================================
// Envelope Kind Enum
// ============================================================================

export const EnvelopeKind = z.enum(['request', 'response']);

export type EnvelopeKind = z.infer<typeof EnvelopeKind>;

export const RemoteErrorKindSchema = z.enum(['remote', 'invalid_params', 'unknown_operation', 'internal', 'unavailable']);

// ============================================================================
// Value Schemas
// ============================================================================

/**
 * Any value the codec produced. The codec already guarantees the shape, so the
 * only thing left to reject is an absent field.
 */
const WireValueSchema = z.custom<WireValue>((value) => value !== undefined, {
  message: 'Required',
});

export const WireRecordSchema = z.record(WireValueSchema);

// ============================================================================
// Request Envelope Schema
// ============================================================================

export const RequestEnvelopeSchema = z.object({
  kind: z.literal('request'),
  v: z.number().int(),
  id: z.number().int().positive(),
  op: z.string().min(1),
  params: WireRecordSchema,
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;

// ============================================================================
// Response Envelope Schema
// ============================================================================

export const ErrorDescriptorSchema = z.object({
  kind: RemoteErrorKindSchema,
  code: z.number().int(),
  message: z.string(),
});

export type ErrorDescriptor = z.infer<typeof ErrorDescriptorSchema>;

export const SuccessResponseSchema = z.object({
  kind: z.literal('response'),
  v: z.number().int(),
  id: z.number().int().positive(),
  ok: z.literal(true),
  result: WireValueSchema,
});

export const ErrorResponseSchema = z.object({
  kind: z.literal('response'),
  v: z.number().int(),
  id: z.number().int().positive(),
  ok: z.literal(false),
  error: ErrorDescriptorSchema,
});

export const ResponseEnvelopeSchema = z.discriminatedUnion('ok', [SuccessResponseSchema, ErrorResponseSchema]);

export type SuccessResponse = z.infer<typeof SuccessResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

export const EnvelopeSchema = z.union([RequestEnvelopeSchema, ResponseEnvelopeSchema]);

export type Envelope = RequestEnvelope | ResponseEnvelope;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Result of safeDecodeEnvelope. On failure, `id` is the correlation id if one
 * could still be read out of the frame.
 */
export type SafeDecodeResult =
  | { success: true; envelope: Envelope }
  | { success: false; error: MalformedPayloadError; id: number | null };

function recoverId(value: WireValue): number | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || !('id' in value)) {
    return null;
  }
  const id = value.id;
  return typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : null;
}

function versionOf(value: WireValue): WireValue | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || !('v' in value)) {
    return undefined;
  }
  return value.v;
}

/**
 * Validates an already-decoded value against the envelope schemas
 * @throws MalformedPayloadError on a version mismatch or a schema violation
 */
export function validateEnvelope(value: WireValue): Envelope {
  const version = versionOf(value);
  if (version !== undefined && version !== CONTRACT_VERSION) {
    throw MalformedPayloadError.contractMismatch(CONTRACT_VERSION, version);
  }

  const result = EnvelopeSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw MalformedPayloadError.invalid(`invalid envelope at '${issue.path.join('.') || '(root)'}': ${issue.message}`);
  }
  return result.data;
}

/**
 * Encodes an envelope into a single frame
 */
export function encodeEnvelope(envelope: Envelope): Uint8Array {
  return encode(envelope);
}

/**
 * Decodes and validates a frame
 * @throws MalformedPayloadError if the frame is not a valid envelope
 */
export function decodeEnvelope(frame: Uint8Array): Envelope {
  return validateEnvelope(decode(frame));
}

/**
 * Safe decoding that returns a result object instead of throwing
 */
export function safeDecodeEnvelope(frame: Uint8Array): SafeDecodeResult {
  let value: WireValue;
  try {
    value = decode(frame);
  } catch (error) {
    return {
      success: false,
      error: error instanceof MalformedPayloadError ? error : MalformedPayloadError.invalid(String(error)),
      id: null,
    };
  }

  try {
    return { success: true, envelope: validateEnvelope(value) };
  } catch (error) {
    return {
      success: false,
      error: error instanceof MalformedPayloadError ? error : MalformedPayloadError.invalid(String(error)),
      id: recoverId(value),
    };
  }
}
