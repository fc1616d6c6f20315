/**
 * Embedding Codec
 *
 * Binary format (little-endian):
 *
 *   offset  size  field
 *   0       4     magic "SPKE"
 *   4       1     format version (1)
 *   5       1     element kind (1 float32 array, 2 float64 array, 3 number list)
 *   6       2     reserved, zero
 *   8       4     element count (uint32)
 *   12      n*w   IEEE-754 values, w = 4 for float32 and 8 otherwise
 *
 * Typed-array elements are moved through unsigned integer views of their
 * storage, never through a JS number, so decode(encode(e)) reproduces every
 * bit (NaN payloads included) along with the container type.
 */

import { CorruptPayloadError } from '../../errors.js';
import type { Embedding } from '../../types.js';

const MAGIC = Buffer.from('SPKE', 'ascii');
export const FORMAT_VERSION = 1;
export const HEADER_BYTES = 12;

export enum ElementKind {
  FLOAT32_ARRAY = 1,
  FLOAT64_ARRAY = 2,
  NUMBER_LIST = 3,
}

function widthOf(kind: ElementKind): number {
  return kind === ElementKind.FLOAT32_ARRAY ? 4 : 8;
}

function kindOf(embedding: Embedding): ElementKind {
  if (embedding instanceof Float32Array) return ElementKind.FLOAT32_ARRAY;
  if (embedding instanceof Float64Array) return ElementKind.FLOAT64_ARRAY;
  return ElementKind.NUMBER_LIST;
}

function isElementKind(value: number): value is ElementKind {
  return (
    value === ElementKind.FLOAT32_ARRAY ||
    value === ElementKind.FLOAT64_ARRAY ||
    value === ElementKind.NUMBER_LIST
  );
}

/**
 * Serialize an embedding to storage bytes.
 */
export function encodeEmbedding(embedding: Embedding): Buffer {
  const kind = kindOf(embedding);
  const width = widthOf(kind);
  const buffer = Buffer.alloc(HEADER_BYTES + embedding.length * width);

  MAGIC.copy(buffer, 0);
  buffer.writeUInt8(FORMAT_VERSION, 4);
  buffer.writeUInt8(kind, 5);
  buffer.writeUInt16LE(0, 6);
  buffer.writeUInt32LE(embedding.length, 8);

  if (embedding instanceof Float32Array) {
    const bits = new Uint32Array(embedding.buffer, embedding.byteOffset, embedding.length);
    for (let i = 0; i < bits.length; i++) {
      buffer.writeUInt32LE(bits[i], HEADER_BYTES + i * width);
    }
  } else if (embedding instanceof Float64Array) {
    const bits = new BigUint64Array(embedding.buffer, embedding.byteOffset, embedding.length);
    for (let i = 0; i < bits.length; i++) {
      buffer.writeBigUInt64LE(bits[i], HEADER_BYTES + i * width);
    }
  } else {
    for (let i = 0; i < embedding.length; i++) {
      buffer.writeDoubleLE(embedding[i], HEADER_BYTES + i * width);
    }
  }

  return buffer;
}

/**
 * Deserialize storage bytes back into an embedding.
 *
 * @throws CorruptPayloadError when the bytes are not a valid payload
 */
export function decodeEmbedding(data: Uint8Array): Embedding {
  const buffer = Buffer.isBuffer(data)
    ? data
    : Buffer.from(data.buffer, data.byteOffset, data.byteLength);

  if (buffer.length < HEADER_BYTES) {
    throw new CorruptPayloadError('payload shorter than header', {
      length: buffer.length,
    });
  }
  if (!buffer.subarray(0, 4).equals(MAGIC)) {
    throw new CorruptPayloadError('bad magic');
  }

  const version = buffer.readUInt8(4);
  if (version !== FORMAT_VERSION) {
    throw new CorruptPayloadError(`unsupported format version ${version}`, { version });
  }

  const kind = buffer.readUInt8(5);
  if (!isElementKind(kind)) {
    throw new CorruptPayloadError(`unknown element kind ${kind}`, { kind });
  }

  if (buffer.readUInt16LE(6) !== 0) {
    throw new CorruptPayloadError('reserved bytes are not zero');
  }

  const count = buffer.readUInt32LE(8);
  const width = widthOf(kind);
  const expectedLength = HEADER_BYTES + count * width;
  if (buffer.length !== expectedLength) {
    throw new CorruptPayloadError('length does not match element count', {
      count,
      expectedLength,
      length: buffer.length,
    });
  }

  if (kind === ElementKind.FLOAT32_ARRAY) {
    const bits = new Uint32Array(count);
    for (let i = 0; i < count; i++) {
      bits[i] = buffer.readUInt32LE(HEADER_BYTES + i * width);
    }
    return new Float32Array(bits.buffer);
  }

  const bits = new BigUint64Array(count);
  for (let i = 0; i < count; i++) {
    bits[i] = buffer.readBigUInt64LE(HEADER_BYTES + i * width);
  }
  const values = new Float64Array(bits.buffer);
  return kind === ElementKind.FLOAT64_ARRAY ? values : Array.from(values);
}
