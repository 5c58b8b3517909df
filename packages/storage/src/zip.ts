// Zip archive implementations of EntryReader and EntryWriter.
//
// Archives are written entry by entry: each entry is deflated once when its
// write session closes and the central directory follows on close. Only one
// write session may be open at a time. Reading goes through the central
// directory and inflates an entry only as its stream is consumed.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { Zip, ZipPassThrough, deflateSync, type DeflateOptions } from 'fflate';
import { open as openZipFile, type Entry, type ZipFile } from 'yauzl';
import { EntryNotFoundError, EntryOrderError } from '@reelcut/protocol';
import type { EntryReader, EntrySink, EntrySource, EntryWriteOptions, EntryWriter } from './types.js';
import { concatChunks, guardSource, toStorageError, writeFully } from './io.js';

/** Default deflate level for archive entries. */
export const DEFAULT_COMPRESSION_LEVEL = 9;

// Compressed bytes allowed in flight before a write waits for the file
const HIGH_WATER_MARK = 1024 * 1024;

// Zip method id for deflate
const DEFLATE_METHOD = 8;

const DEFLATE_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

type DeflateLevel = NonNullable<DeflateOptions['level']>;

/**
 * Validate a compression level.
 * @throws RangeError outside 0-9
 */
export function toDeflateLevel(level: number): DeflateLevel {
  const match = DEFLATE_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new RangeError(`Compression level must be an integer from 0 to 9, got ${level}`);
  }
  return match;
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Open a zip archive for reading. The central directory is read eagerly;
 * entry data is read and inflated on demand.
 */
export async function openZipArchiveReader(filePath: string): Promise<EntryReader> {
  const location = path.resolve(filePath);
  const archive = await openArchive(location);

  let entries: Map<string, Entry>;
  try {
    entries = await listEntries(archive, location);
  } catch (error) {
    archive.close();
    throw error;
  }

  return {
    location,

    async hasEntry(name: string): Promise<boolean> {
      return entries.has(name);
    },

    async openEntryForRead(name: string): Promise<EntrySource> {
      const entry = entries.get(name);
      if (entry === undefined) {
        throw new EntryNotFoundError(name);
      }
      const entryLocation = `${location}:${name}`;
      const stream = await new Promise<Readable>((resolve, reject) => {
        archive.openReadStream(entry, (error, readStream) => {
          if (error || !readStream) {
            reject(toStorageError(entryLocation, error ?? 'entry could not be opened'));
            return;
          }
          resolve(readStream);
        });
      });
      return guardSource(stream, entryLocation);
    },

    async close(): Promise<void> {
      archive.close();
    },
  };
}

function openArchive(location: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    openZipFile(location, { lazyEntries: true, autoClose: false }, (error, archive) => {
      if (error || !archive) {
        reject(toStorageError(location, error ?? 'archive could not be opened'));
        return;
      }
      resolve(archive);
    });
  });
}

function listEntries(archive: ZipFile, location: string): Promise<Map<string, Entry>> {
  return new Promise((resolve, reject) => {
    const entries = new Map<string, Entry>();
    archive.on('entry', (entry: Entry) => {
      entries.set(entry.fileName, entry);
      archive.readEntry();
    });
    archive.once('end', () => resolve(entries));
    archive.once('error', (error: unknown) => reject(toStorageError(location, error)));
    archive.readEntry();
  });
}

// =============================================================================
// Writer
// =============================================================================

export type ZipArchiveWriterOptions = {
  /**
   * Deflate level for entries opened without their own (default: 9)
   */
  compressionLevel?: number;
};

/**
 * Create a zip archive at `filePath`, replacing any existing file.
 * The archive is complete only after `close()`.
 */
export async function createZipArchiveWriter(
  filePath: string,
  options: ZipArchiveWriterOptions = {}
): Promise<EntryWriter> {
  const location = path.resolve(filePath);
  const defaultLevel = toDeflateLevel(options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL);

  let handle: fs.FileHandle;
  try {
    await fs.mkdir(path.dirname(location), { recursive: true });
    handle = await fs.open(location, 'w');
  } catch (error) {
    throw toStorageError(location, error);
  }

  // Output written by fflate is queued onto one promise chain so file writes
  // stay in order; the first failure is kept and reported by the next call.
  let flushing: Promise<void> = Promise.resolve();
  let queued = 0;
  let failure: unknown = null;

  const zip = new Zip((error, data) => {
    if (error) {
      failure ??= error;
      return;
    }
    queued += data.length;
    flushing = flushing
      .then(async () => {
        if (failure === null) {
          await writeFully(handle, data);
        }
        queued -= data.length;
      })
      .catch((writeError: unknown) => {
        failure ??= writeError;
      });
  });

  async function settle(limit: number): Promise<void> {
    if (queued > limit) {
      await flushing;
    }
    if (failure !== null) {
      throw toStorageError(location, failure);
    }
  }

  let active: EntrySink | null = null;
  let activeName = '';
  let finalized = false;

  function openSink(name: string, level: DeflateLevel): EntrySink {
    const file = new BufferedZipDeflate(name, level);
    zip.add(file);

    let closed = false;
    const sink: EntrySink = {
      async write(chunk: Uint8Array): Promise<void> {
        if (closed) {
          throw new EntryOrderError(name, 'write session already closed');
        }
        file.push(chunk, false);
        await settle(HIGH_WATER_MARK);
      },

      async close(): Promise<void> {
        if (closed) return;
        closed = true;
        active = null;
        file.push(new Uint8Array(0), true);
        await settle(HIGH_WATER_MARK);
      },
    };
    return sink;
  }

  return {
    location,

    async openEntryForWrite(name: string, entryOptions: EntryWriteOptions = {}): Promise<EntrySink> {
      if (finalized) {
        throw new EntryOrderError(name, 'archive already finalized');
      }
      if (active !== null) {
        throw new EntryOrderError(name, `entry "${activeName}" is still open`);
      }

      const level =
        entryOptions.compressionLevel === undefined
          ? defaultLevel
          : toDeflateLevel(entryOptions.compressionLevel);

      const sink = openSink(name, level);
      active = sink;
      activeName = name;
      return sink;
    },

    async close(): Promise<void> {
      if (finalized) return;
      finalized = true;

      try {
        if (active !== null) {
          await active.close();
        }
        zip.end();
        await settle(0);
      } finally {
        await handle.close();
      }
    },
  };
}

/**
 * Archive entry that collects its data and deflates it in one pass on the
 * final push. CRC and size are tracked by ZipPassThrough on the raw bytes.
 */
class BufferedZipDeflate extends ZipPassThrough {
  private readonly level: DeflateLevel;
  private chunks: Uint8Array[] = [];

  constructor(filename: string, level: DeflateLevel) {
    super(filename);
    this.compression = DEFLATE_METHOD;
    this.level = level;
  }

  protected process(chunk: Uint8Array, final: boolean): void {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
    }
    if (!final) return;

    const data = concatChunks(this.chunks);
    this.chunks = [];
    this.ondata(null, deflateSync(data, { level: this.level }), true);
  }
}
