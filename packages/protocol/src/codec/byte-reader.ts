// Pull-based reader over an async byte source.
//
// Entry streams arrive as chunks of arbitrary size; codecs need exact-length
// reads and must tell a clean end of stream from a short read.

import { TruncatedInputError } from '../errors.js';

/**
 * Any async iterable of byte chunks (Node readables, generators, arrays).
 */
export type ByteSource = AsyncIterable<Uint8Array> | Iterable<Uint8Array>;

const EMPTY = new Uint8Array(0);

export class ByteReader {
  private readonly iterator: AsyncIterator<Uint8Array>;
  private chunk: Uint8Array = EMPTY;
  private offset = 0;
  private ended = false;
  private consumed = 0;

  constructor(source: ByteSource) {
    this.iterator = drain(source)[Symbol.asyncIterator]();
  }

  /** Total bytes handed out so far. */
  get position(): number {
    return this.consumed;
  }

  /**
   * Read up to `length` bytes. Fewer bytes are returned only at end of
   * stream; an empty result means the stream was already exhausted.
   */
  async read(length: number): Promise<Uint8Array> {
    if (length === 0) return EMPTY;

    // Allocation follows the bytes actually read, not `length`.
    const parts: Uint8Array[] = [];
    let filled = 0;

    while (filled < length) {
      if (this.offset >= this.chunk.length) {
        if (!(await this.pull())) break;
        continue;
      }
      const take = Math.min(length - filled, this.chunk.length - this.offset);
      parts.push(this.chunk.subarray(this.offset, this.offset + take));
      this.offset += take;
      filled += take;
    }

    this.consumed += filled;
    return concat(parts, filled);
  }

  /**
   * Read exactly `length` bytes or fail with TruncatedInputError.
   */
  async readExact(length: number, context: string): Promise<Uint8Array> {
    const bytes = await this.read(length);
    if (bytes.length !== length) {
      throw new TruncatedInputError(context, length, bytes.length);
    }
    return bytes;
  }

  /**
   * Read a single byte, or null at end of stream.
   */
  async readByte(): Promise<number | null> {
    const bytes = await this.read(1);
    return bytes.length === 1 ? (bytes[0] ?? null) : null;
  }

  /**
   * Discard `length` bytes, failing if the stream ends first.
   */
  async skip(length: number, context: string): Promise<void> {
    let remaining = length;
    while (remaining > 0) {
      const step = Math.min(remaining, 64 * 1024);
      await this.readExact(step, context);
      remaining -= step;
    }
  }

  /**
   * Release the underlying source without reading the rest of it.
   */
  async close(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    await this.iterator.return?.();
  }

  private async pull(): Promise<boolean> {
    if (this.ended) return false;
    const next = await this.iterator.next();
    if (next.done) {
      this.ended = true;
      return false;
    }
    this.chunk = next.value;
    this.offset = 0;
    return true;
  }
}

async function* drain(source: ByteSource): AsyncGenerator<Uint8Array> {
  yield* source;
}

function concat(parts: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
