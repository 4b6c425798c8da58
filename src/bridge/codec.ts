/**
 * Wire codec for the terminal bridge
 *
 * A frame is laid out as:
 *
 *   [uint32 BE header length][UTF-8 JSON header][attachment bytes...]
 *
 * The JSON header holds the structured part of the value. Byte buffers and
 * numeric arrays never go through JSON: they are appended raw after the header
 * and referenced from the document by attachment index, with their dtype and
 * shape recorded in the attachment table. Values JSON cannot carry losslessly
 * (bigint, NaN, ±Infinity, -0) are written as tagged objects `{ "$": tag, ... }`.
 */

import { z } from 'zod';
import { MalformedPayloadError } from '../utils/errors.js';

// ============================================================================
// Numeric arrays
// ============================================================================

/**
 * Element types a NumericArray can carry. Raw bytes are little-endian.
 */
export const DTYPES = [
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
  'float32',
  'float64',
] as const;

export type DType = typeof DTYPES[number];

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array
  | Float32Array
  | Float64Array;

const ELEMENT_SIZE: Record<DType, number> = {
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  int64: 8,
  uint64: 8,
  float32: 4,
  float64: 8,
};

/**
 * Size in bytes of one element of the given dtype
 */
export function elementSize(dtype: DType): number {
  return ELEMENT_SIZE[dtype];
}

export function isDType(value: string): value is DType {
  return DTYPES.some((dtype) => dtype === value);
}

/**
 * Infer the dtype tag of a typed array
 */
export function dtypeOf(data: TypedArray): DType {
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof BigInt64Array) return 'int64';
  if (data instanceof BigUint64Array) return 'uint64';
  if (data instanceof Float32Array) return 'float32';
  return 'float64';
}

function createTypedArray(dtype: DType, buffer: ArrayBuffer, length: number): TypedArray {
  switch (dtype) {
    case 'int8':
      return new Int8Array(buffer, 0, length);
    case 'uint8':
      return new Uint8Array(buffer, 0, length);
    case 'int16':
      return new Int16Array(buffer, 0, length);
    case 'uint16':
      return new Uint16Array(buffer, 0, length);
    case 'int32':
      return new Int32Array(buffer, 0, length);
    case 'uint32':
      return new Uint32Array(buffer, 0, length);
    case 'int64':
      return new BigInt64Array(buffer, 0, length);
    case 'uint64':
      return new BigUint64Array(buffer, 0, length);
    case 'float32':
      return new Float32Array(buffer, 0, length);
    case 'float64':
      return new Float64Array(buffer, 0, length);
  }
}

function product(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * A typed multi-dimensional numeric buffer, stored row-major.
 *
 * Invariant: `data.length === product(shape)`, hence
 * `byteLength === product(shape) * elementSize(dtype)`.
 */
export class NumericArray {
  readonly dtype: DType;
  readonly shape: readonly number[];
  readonly data: TypedArray;

  constructor(data: TypedArray, shape: readonly number[] = [data.length]) {
    if (!shape.every((dim) => Number.isInteger(dim) && dim >= 0)) {
      throw MalformedPayloadError.invalid(`invalid shape [${shape.join(', ')}]`);
    }
    if (product(shape) !== data.length) {
      throw MalformedPayloadError.invalid(
        `shape [${shape.join(', ')}] does not match ${data.length} elements`
      );
    }
    this.dtype = dtypeOf(data);
    this.shape = [...shape];
    this.data = data;
  }

  /**
   * Rebuild an array from its raw little-endian bytes
   *
   * @throws MalformedPayloadError if the byte length does not match the shape
   */
  static fromBytes(dtype: DType, shape: readonly number[], bytes: Uint8Array): NumericArray {
    const expected = product(shape) * elementSize(dtype);
    if (bytes.byteLength !== expected) {
      throw MalformedPayloadError.invalid(
        `${dtype} array of shape [${shape.join(', ')}] needs ${expected} bytes, got ${bytes.byteLength}`
      );
    }
    // Copy into a fresh buffer so the view starts aligned at offset 0
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return new NumericArray(createTypedArray(dtype, buffer, product(shape)), shape);
  }

  get rank(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get byteLength(): number {
    return this.data.byteLength;
  }

  /**
   * Raw bytes of the array, without copying
   */
  toBytes(): Uint8Array {
    return new Uint8Array(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }

  /**
   * The elements of row `index` along the first axis
   */
  row(index: number): TypedArray {
    if (this.rank < 2) {
      throw new RangeError('row() needs an array of rank 2 or more');
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.shape[0]) {
      throw new RangeError(`Row ${index} out of range for shape [${this.shape.join(', ')}]`);
    }
    const width = product(this.shape.slice(1));
    return this.data.subarray(index * width, (index + 1) * width);
  }
}

// ============================================================================
// Wire values
// ============================================================================

/**
 * Every value the codec can carry
 */
export type WireValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | NumericArray
  | WireValue[]
  | WireRecord;

export interface WireRecord {
  [key: string]: WireValue;
}

type JsonNode = null | boolean | number | string | JsonNode[] | { [key: string]: JsonNode };

const AttachmentSchema = z.object({
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
  dtype: z.string().optional(),
  shape: z.array(z.number().int().nonnegative()).optional(),
});

type Attachment = z.infer<typeof AttachmentSchema>;

const HeaderSchema = z.object({
  root: z.unknown(),
  attachments: z.array(AttachmentSchema),
});

const TAG = '$';

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeKind(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value !== 'object' || value === null) return typeof value;
  return value.constructor?.name ?? 'object';
}

class FrameWriter {
  readonly attachments: Attachment[] = [];
  readonly chunks: Uint8Array[] = [];
  private offset = 0;

  attach(bytes: Uint8Array, dtype?: DType, shape?: readonly number[]): number {
    this.attachments.push({
      offset: this.offset,
      length: bytes.byteLength,
      ...(dtype ? { dtype, shape: [...(shape ?? [])] } : {}),
    });
    this.chunks.push(bytes);
    this.offset += bytes.byteLength;
    return this.attachments.length - 1;
  }

  write(value: unknown, path: string): JsonNode {
    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
      return value;
    }

    if (typeof value === 'number') {
      if (Number.isNaN(value)) return { [TAG]: 'float', v: 'NaN' };
      if (value === Infinity) return { [TAG]: 'float', v: 'Infinity' };
      if (value === -Infinity) return { [TAG]: 'float', v: '-Infinity' };
      if (Object.is(value, -0)) return { [TAG]: 'float', v: '-0' };
      return value;
    }

    if (typeof value === 'bigint') {
      return { [TAG]: 'bigint', v: value.toString() };
    }

    if (value instanceof NumericArray) {
      return { [TAG]: 'array', i: this.attach(value.toBytes(), value.dtype, value.shape) };
    }

    if (value instanceof Uint8Array) {
      return { [TAG]: 'bytes', i: this.attach(value) };
    }

    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => {
        if (item === undefined) {
          throw MalformedPayloadError.unsupported(`${path}[${index}]`, 'undefined');
        }
        return this.write(item, `${path}[${index}]`);
      });
    }

    if (typeof value === 'object' && isPlainRecord(value)) {
      // Absent optional fields are dropped, as JSON.stringify does
      const record: { [key: string]: JsonNode } = Object.fromEntries(
        Object.entries(value)
          .filter(([, item]) => item !== undefined)
          .map(([key, item]): [string, JsonNode] => [key, this.write(item, `${path}.${key}`)])
      );
      return Object.hasOwn(record, TAG) ? { [TAG]: 'record', v: record } : record;
    }

    throw MalformedPayloadError.unsupported(path, describeKind(value));
  }
}

/**
 * Check an arbitrary value against the set the codec carries, returning it as a
 * WireValue. Record fields holding `undefined` are dropped.
 *
 * @throws MalformedPayloadError naming the path of the first unsupported value
 */
export function toWireValue(value: unknown, path = '$'): WireValue {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof NumericArray ||
    value instanceof Uint8Array
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toWireValue(item, `${path}[${index}]`));
  }

  if (typeof value === 'object' && isPlainRecord(value)) {
    return toWireRecord(value, path);
  }

  throw MalformedPayloadError.unsupported(path, describeKind(value));
}

/**
 * toWireValue for records
 *
 * @throws MalformedPayloadError if the value is not a plain record
 */
export function toWireRecord(value: unknown, path = '$'): WireRecord {
  if (typeof value !== 'object' || value === null || !isPlainRecord(value)) {
    throw MalformedPayloadError.unsupported(path, describeKind(value));
  }
  return Object.fromEntries(
    Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .map(([key, item]): [string, WireValue] => [key, toWireValue(item, `${path}.${key}`)])
  );
}

/**
 * Encode a value into a self-describing frame
 *
 * @throws MalformedPayloadError if the value (or anything inside it) is outside the supported set
 */
export function encode(value: unknown): Uint8Array {
  if (value === undefined) {
    throw MalformedPayloadError.unsupported('$', 'undefined');
  }

  const writer = new FrameWriter();
  const root = writer.write(value, '$');
  const header = Buffer.from(JSON.stringify({ root, attachments: writer.attachments }), 'utf-8');

  const frame = Buffer.allocUnsafe(4 + header.byteLength + writer.chunks.reduce((n, c) => n + c.byteLength, 0));
  frame.writeUInt32BE(header.byteLength, 0);
  header.copy(frame, 4);

  let position = 4 + header.byteLength;
  for (const chunk of writer.chunks) {
    frame.set(chunk, position);
    position += chunk.byteLength;
  }

  return new Uint8Array(frame.buffer, frame.byteOffset, frame.byteLength);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

class FrameReader {
  constructor(
    private readonly attachments: Attachment[],
    private readonly body: Uint8Array
  ) {}

  private attachment(index: unknown, path: string): { meta: Attachment; bytes: Uint8Array } {
    if (typeof index !== 'number' || !Number.isInteger(index) || index < 0 || index >= this.attachments.length) {
      throw MalformedPayloadError.invalid(`attachment reference ${String(index)} out of range at ${path}`);
    }
    const meta = this.attachments[index];
    if (meta.offset + meta.length > this.body.byteLength) {
      throw MalformedPayloadError.invalid(`attachment ${index} runs past the end of the frame`);
    }
    return { meta, bytes: this.body.subarray(meta.offset, meta.offset + meta.length) };
  }

  private readTagged(node: Record<string, unknown>, path: string): WireValue {
    const tag = node[TAG];

    switch (tag) {
      case 'float': {
        const raw = node.v;
        if (raw === 'NaN') return NaN;
        if (raw === 'Infinity') return Infinity;
        if (raw === '-Infinity') return -Infinity;
        if (raw === '-0') return -0;
        throw MalformedPayloadError.invalid(`invalid float literal at ${path}`);
      }
      case 'bigint': {
        if (typeof node.v !== 'string' || !/^-?\d+$/.test(node.v)) {
          throw MalformedPayloadError.invalid(`invalid bigint literal at ${path}`);
        }
        return BigInt(node.v);
      }
      case 'bytes': {
        const { bytes } = this.attachment(node.i, path);
        // Copy out of the frame; a Buffer's slice() would share it
        return new Uint8Array(bytes);
      }
      case 'array': {
        const { meta, bytes } = this.attachment(node.i, path);
        if (!meta.dtype || !isDType(meta.dtype) || !meta.shape) {
          throw MalformedPayloadError.invalid(`attachment at ${path} is not a numeric array`);
        }
        return NumericArray.fromBytes(meta.dtype, meta.shape, bytes);
      }
      case 'record': {
        const inner = node.v;
        if (typeof inner !== 'object' || inner === null || Array.isArray(inner)) {
          throw MalformedPayloadError.invalid(`invalid escaped record at ${path}`);
        }
        return this.readRecord(inner, path);
      }
      default:
        throw MalformedPayloadError.invalid(`unknown tag ${JSON.stringify(tag)} at ${path}`);
    }
  }

  private readRecord(node: object, path: string): WireRecord {
    // Keys such as __proto__ stay own data properties
    return Object.fromEntries(
      Object.entries(node).map(([key, item]): [string, WireValue] => [key, this.read(item, `${path}.${key}`)])
    );
  }

  read(node: unknown, path: string): WireValue {
    if (node === null || typeof node === 'boolean' || typeof node === 'number' || typeof node === 'string') {
      return node;
    }
    if (Array.isArray(node)) {
      return node.map((item: unknown, index) => this.read(item, `${path}[${index}]`));
    }
    if (typeof node === 'object') {
      if (TAG in node) {
        return this.readTagged({ ...node }, path);
      }
      return this.readRecord(node, path);
    }
    throw MalformedPayloadError.invalid(`unexpected ${typeof node} at ${path}`);
  }
}

/**
 * Decode a frame produced by encode()
 *
 * @throws MalformedPayloadError if the frame is truncated, the header is not
 *   valid JSON, or an attachment does not match its declared shape
 */
export function decode(bytes: Uint8Array): WireValue {
  if (bytes.byteLength < 4) {
    throw MalformedPayloadError.invalid(`frame of ${bytes.byteLength} bytes is shorter than its length prefix`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const headerLength = view.getUint32(0, false);
  if (4 + headerLength > bytes.byteLength) {
    throw MalformedPayloadError.invalid(`header length ${headerLength} exceeds frame size ${bytes.byteLength}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes.subarray(4, 4 + headerLength)));
  } catch (error) {
    throw MalformedPayloadError.invalid(
      `header is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const header = HeaderSchema.safeParse(parsed);
  if (!header.success) {
    throw MalformedPayloadError.invalid(`invalid frame header: ${header.error.issues[0].message}`);
  }

  const reader = new FrameReader(header.data.attachments, bytes.subarray(4 + headerLength));
  return reader.read(header.data.root, '$');
}
