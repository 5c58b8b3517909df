// Variable-length integers
//
// 7 value bits per byte, least significant group first, high bit set on every
// byte except the last. Values are encoded as raw two's complement (no zigzag),
// so negative numbers always take the full 5 / 10 bytes.

import { MalformedVarIntError, TruncatedInputError } from '../errors.js';
import type { ByteReader } from './byte-reader.js';

const SEGMENT_BITS = 0x7f;
const CONTINUE_BIT = 0x80;

/** Maximum encoded size of a 32-bit varint. */
export const MAX_VARINT_BYTES = 5;

/** Maximum encoded size of a 64-bit varlong. */
export const MAX_VARLONG_BYTES = 10;

/**
 * Result of decoding from a byte buffer.
 */
export type Decoded<T> = {
  value: T;
  bytesRead: number;
};

/**
 * Encode a signed 32-bit integer.
 */
export function encodeVarInt(value: number): Uint8Array {
  const out = new Uint8Array(MAX_VARINT_BYTES);
  let remaining = value >>> 0;
  let length = 0;

  while ((remaining & ~SEGMENT_BITS) !== 0) {
    out[length++] = (remaining & SEGMENT_BITS) | CONTINUE_BIT;
    remaining >>>= 7;
  }
  out[length++] = remaining;

  return out.slice(0, length);
}

/**
 * Number of bytes `encodeVarInt(value)` produces.
 */
export function varIntSize(value: number): number {
  let remaining = value >>> 0;
  let size = 1;
  while ((remaining & ~SEGMENT_BITS) !== 0) {
    remaining >>>= 7;
    size++;
  }
  return size;
}

/**
 * Decode a 32-bit varint starting at `offset`.
 */
export function decodeVarInt(bytes: Uint8Array, offset = 0): Decoded<number> {
  let value = 0;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const byte = bytes[offset + i];
    if (byte === undefined) {
      throw new TruncatedInputError('varint', i + 1, i);
    }
    value |= (byte & SEGMENT_BITS) << (7 * i);
    if ((byte & CONTINUE_BIT) === 0) {
      return { value: value | 0, bytesRead: i + 1 };
    }
  }

  throw new MalformedVarIntError(MAX_VARINT_BYTES);
}

/**
 * Encode a signed 64-bit integer.
 */
export function encodeVarLong(value: bigint): Uint8Array {
  const out = new Uint8Array(MAX_VARLONG_BYTES);
  let remaining = BigInt.asUintN(64, value);
  let length = 0;

  while (remaining > BigInt(SEGMENT_BITS)) {
    out[length++] = Number(remaining & BigInt(SEGMENT_BITS)) | CONTINUE_BIT;
    remaining >>= 7n;
  }
  out[length++] = Number(remaining);

  return out.slice(0, length);
}

/**
 * Decode a 64-bit varlong starting at `offset`.
 */
export function decodeVarLong(bytes: Uint8Array, offset = 0): Decoded<bigint> {
  let value = 0n;

  for (let i = 0; i < MAX_VARLONG_BYTES; i++) {
    const byte = bytes[offset + i];
    if (byte === undefined) {
      throw new TruncatedInputError('varlong', i + 1, i);
    }
    value |= BigInt(byte & SEGMENT_BITS) << BigInt(7 * i);
    if ((byte & CONTINUE_BIT) === 0) {
      return { value: BigInt.asIntN(64, value), bytesRead: i + 1 };
    }
  }

  throw new MalformedVarIntError(MAX_VARLONG_BYTES);
}

/**
 * Read a 32-bit varint from a stream.
 * Returns null only when the stream is exhausted before the first byte.
 */
export async function readVarInt(reader: ByteReader): Promise<number | null> {
  let value = 0;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const byte = await reader.readByte();
    if (byte === null) {
      if (i === 0) return null;
      throw new TruncatedInputError('varint', i + 1, i);
    }
    value |= (byte & SEGMENT_BITS) << (7 * i);
    if ((byte & CONTINUE_BIT) === 0) {
      return value | 0;
    }
  }

  throw new MalformedVarIntError(MAX_VARINT_BYTES);
}

/**
 * Read a 64-bit varlong from a stream.
 * Returns null only when the stream is exhausted before the first byte.
 */
export async function readVarLong(reader: ByteReader): Promise<bigint | null> {
  let value = 0n;

  for (let i = 0; i < MAX_VARLONG_BYTES; i++) {
    const byte = await reader.readByte();
    if (byte === null) {
      if (i === 0) return null;
      throw new TruncatedInputError('varlong', i + 1, i);
    }
    value |= BigInt(byte & SEGMENT_BITS) << BigInt(7 * i);
    if ((byte & CONTINUE_BIT) === 0) {
      return BigInt.asIntN(64, value);
    }
  }

  throw new MalformedVarIntError(MAX_VARLONG_BYTES);
}
