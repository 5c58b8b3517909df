// In-memory implementations of EntryReader and EntryWriter, for tests and
// for callers that hold a container in memory.

import { EntryNotFoundError, EntryOrderError } from '@reelcut/protocol';
import type { EntryReader, EntrySink, EntrySource, EntryWriter } from './types.js';
import { concatChunks } from './io.js';

/**
 * Create an in-memory EntryReader from a Map of entry contents.
 */
export function createInMemoryReader(
  entries: Map<string, Uint8Array>,
  location = 'memory'
): EntryReader {
  return {
    location,

    async hasEntry(name: string): Promise<boolean> {
      return entries.has(name);
    },

    async openEntryForRead(name: string): Promise<EntrySource> {
      const content = entries.get(name);
      if (content === undefined) {
        throw new EntryNotFoundError(name);
      }
      return [content];
    },

    async close(): Promise<void> {},
  };
}

/**
 * Create an in-memory EntryWriter.
 * Returns the writer and the Map that receives each entry when its sink closes.
 */
export function createInMemoryWriter(location = 'memory'): {
  writer: EntryWriter;
  entries: Map<string, Uint8Array>;
} {
  const entries = new Map<string, Uint8Array>();
  const open = new Set<EntrySink>();

  const writer: EntryWriter = {
    location,

    async openEntryForWrite(name: string): Promise<EntrySink> {
      const chunks: Uint8Array[] = [];
      let closed = false;

      const sink: EntrySink = {
        async write(chunk: Uint8Array): Promise<void> {
          if (closed) {
            throw new EntryOrderError(name, 'write session already closed');
          }
          chunks.push(chunk.slice());
        },

        async close(): Promise<void> {
          if (closed) return;
          closed = true;
          open.delete(sink);
          entries.set(name, concatChunks(chunks));
        },
      };

      open.add(sink);
      return sink;
    },

    async close(): Promise<void> {
      for (const sink of [...open]) {
        await sink.close();
      }
    },
  };

  return { writer, entries };
}
