// Shared filesystem helpers for the storage backends.

import type { FileHandle } from 'node:fs/promises';
import { StorageIOError } from '@reelcut/protocol';

/**
 * Node error code of a failed fs call, if any.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap any failure as a StorageIOError for `location`.
 */
export function toStorageError(location: string, error: unknown): StorageIOError {
  if (error instanceof StorageIOError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageIOError(location, reason, { cause: error });
}

/**
 * Write all of `chunk` at the handle's current position.
 */
export async function writeFully(handle: FileHandle, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
}

/**
 * Re-yield a byte stream, reporting read failures as StorageIOError.
 */
export async function* guardSource(
  source: AsyncIterable<Uint8Array>,
  location: string
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of source) {
      yield chunk;
    }
  } catch (error) {
    throw toStorageError(location, error);
  }
}

/**
 * Join chunks into one buffer.
 */
export function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
