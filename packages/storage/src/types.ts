// Named-entry storage abstractions.
// The same packet and metadata logic runs against any backend that implements
// these two capabilities (directory, zip archive, in-memory).

import type { ByteSink, ByteSource } from '@reelcut/protocol';

/**
 * Byte stream of one entry, consumed once.
 */
export type EntrySource = ByteSource;

/**
 * Destination of one write session.
 */
export interface EntrySink extends ByteSink {
  /**
   * Append bytes to the entry.
   */
  write(chunk: Uint8Array): Promise<void>;

  /**
   * Finish the write session. Further writes fail.
   * Closing twice is a no-op.
   */
  close(): Promise<void>;
}

/**
 * Options for a single write session.
 */
export type EntryWriteOptions = {
  /**
   * Deflate level 0-9 for backends that compress (default: the backend's level)
   */
  compressionLevel?: number;
};

/**
 * Read capability: open named entries as byte streams.
 */
export interface EntryReader {
  /**
   * Human-readable location, used in errors and logs.
   */
  readonly location: string;

  /**
   * Check whether an entry exists.
   */
  hasEntry(name: string): Promise<boolean>;

  /**
   * Open an entry for reading.
   * @throws EntryNotFoundError if the entry does not exist
   * @throws StorageIOError on any other failure
   */
  openEntryForRead(name: string): Promise<EntrySource>;

  /**
   * Release the backend.
   */
  close(): Promise<void>;
}

/**
 * Write capability: open named entries for writing.
 *
 * Sequential containers (zip) accept one open write session at a time;
 * close each sink before opening the next entry.
 */
export interface EntryWriter {
  /**
   * Human-readable location, used in errors and logs.
   */
  readonly location: string;

  /**
   * Open an entry for writing, creating or truncating it.
   * @throws StorageIOError on failure
   * @throws EntryOrderError if the backend cannot accept another session yet
   */
  openEntryForWrite(name: string, options?: EntryWriteOptions): Promise<EntrySink>;

  /**
   * Finalize the container. Closes a write session left open.
   */
  close(): Promise<void>;
}
