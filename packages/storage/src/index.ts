// @reelcut/storage
// Named-entry storage backends for replay containers.

export type {
  EntryReader,
  EntryWriter,
  EntrySink,
  EntrySource,
  EntryWriteOptions,
} from './types.js';

export { createDirectoryReader, createDirectoryWriter } from './directory.js';
export {
  openZipArchiveReader,
  createZipArchiveWriter,
  toDeflateLevel,
  DEFAULT_COMPRESSION_LEVEL,
  type ZipArchiveWriterOptions,
} from './zip.js';
export { createInMemoryReader, createInMemoryWriter } from './memory.js';
export { openReplayReader, openReplayWriter, type ReplayWriterOptions } from './select.js';
export {
  readEntryBytes,
  readReplayMetadata,
  writeReplayMetadata,
  openRecording,
  createRecordingSink,
  METADATA_COMPRESSION_LEVEL,
} from './container.js';
