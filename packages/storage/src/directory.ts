// Directory implementations of EntryReader and EntryWriter.
// Each entry is a plain file directly under the root directory.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { EntryNotFoundError, EntryOrderError, StorageIOError } from '@reelcut/protocol';
import type { EntryReader, EntrySink, EntrySource, EntryWriter } from './types.js';
import { concatChunks, errorCode, guardSource, toStorageError, writeFully } from './io.js';

// Writes are batched into blocks of this size before hitting the file
const WRITE_BUFFER_SIZE = 64 * 1024;

/**
 * Create an EntryReader over files in `root`.
 */
export function createDirectoryReader(root: string): EntryReader {
  const base = path.resolve(root);

  return {
    location: base,

    async hasEntry(name: string): Promise<boolean> {
      const filePath = resolveEntryPath(base, name);
      try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
      } catch (error) {
        if (errorCode(error) === 'ENOENT') return false;
        throw toStorageError(filePath, error);
      }
    },

    async openEntryForRead(name: string): Promise<EntrySource> {
      const filePath = resolveEntryPath(base, name);
      let handle: fs.FileHandle;
      try {
        handle = await fs.open(filePath, 'r');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          throw new EntryNotFoundError(name, { cause: error });
        }
        throw toStorageError(filePath, error);
      }
      return guardSource(handle.createReadStream(), filePath);
    },

    async close(): Promise<void> {
      // Streams own their file handles
    },
  };
}

/**
 * Create an EntryWriter that writes files into `root`, creating it if needed.
 * Several entries may be open at once.
 */
export function createDirectoryWriter(root: string): EntryWriter {
  const base = path.resolve(root);
  const open = new Set<EntrySink>();

  return {
    location: base,

    async openEntryForWrite(name: string): Promise<EntrySink> {
      const filePath = resolveEntryPath(base, name);
      let handle: fs.FileHandle;
      try {
        await fs.mkdir(base, { recursive: true });
        handle = await fs.open(filePath, 'w');
      } catch (error) {
        throw toStorageError(filePath, error);
      }

      const sink = createFileSink(name, filePath, handle, () => open.delete(sink));
      open.add(sink);
      return sink;
    },

    async close(): Promise<void> {
      for (const sink of [...open]) {
        await sink.close();
      }
    },
  };
}

function createFileSink(
  name: string,
  filePath: string,
  handle: fs.FileHandle,
  onClose: () => void
): EntrySink {
  let pending: Uint8Array[] = [];
  let pendingBytes = 0;
  let closed = false;

  async function flush(): Promise<void> {
    if (pendingBytes === 0) return;
    const block = concatChunks(pending);
    pending = [];
    pendingBytes = 0;
    try {
      await writeFully(handle, block);
    } catch (error) {
      throw toStorageError(filePath, error);
    }
  }

  return {
    async write(chunk: Uint8Array): Promise<void> {
      if (closed) {
        throw new EntryOrderError(name, 'write session already closed');
      }
      if (chunk.length === 0) return;
      pending.push(chunk);
      pendingBytes += chunk.length;
      if (pendingBytes >= WRITE_BUFFER_SIZE) {
        await flush();
      }
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      onClose();
      try {
        await flush();
      } finally {
        await handle.close();
      }
    },
  };
}

/**
 * Entry names are single path segments; anything else would escape the root.
 */
function resolveEntryPath(base: string, name: string): string {
  if (name.length === 0 || name !== path.basename(name) || name === '.' || name === '..') {
    throw new StorageIOError(base, `invalid entry name "${name}"`);
  }
  return path.join(base, name);
}
