// Replay container entries on top of any storage backend.

import {
  CONTAINER_ENTRIES,
  parseSessionMetadata,
  readPacketStream,
  stringifySessionMetadata,
  type PacketStreamOptions,
  type SessionMetadata,
  type TaggedPacket,
} from '@reelcut/protocol';
import type { EntryReader, EntrySink, EntryWriteOptions, EntryWriter } from './types.js';
import { concatChunks } from './io.js';

/** Metadata is small; it is always stored at the highest level. */
export const METADATA_COMPRESSION_LEVEL = 9;

const utf8 = new TextDecoder('utf-8');
const utf8Encoder = new TextEncoder();

/**
 * Read a whole entry into memory.
 */
export async function readEntryBytes(reader: EntryReader, name: string): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of await reader.openEntryForRead(name)) {
    chunks.push(chunk);
  }
  return concatChunks(chunks);
}

/**
 * Read and validate the container's metadata entry.
 */
export async function readReplayMetadata(reader: EntryReader): Promise<SessionMetadata> {
  const bytes = await readEntryBytes(reader, CONTAINER_ENTRIES.METADATA);
  return parseSessionMetadata(utf8.decode(bytes));
}

/**
 * Write the container's metadata entry in one session.
 */
export async function writeReplayMetadata(
  writer: EntryWriter,
  metadata: SessionMetadata
): Promise<void> {
  const sink = await writer.openEntryForWrite(CONTAINER_ENTRIES.METADATA, {
    compressionLevel: METADATA_COMPRESSION_LEVEL,
  });
  try {
    await sink.write(utf8Encoder.encode(stringifySessionMetadata(metadata)));
  } finally {
    await sink.close();
  }
}

/**
 * Open the recording entry as a lazy stream of phase-tagged packets.
 */
export async function openRecording(
  reader: EntryReader,
  options: PacketStreamOptions = {}
): Promise<AsyncGenerator<TaggedPacket, void, undefined>> {
  const source = await reader.openEntryForRead(CONTAINER_ENTRIES.RECORDING);
  return readPacketStream(source, options);
}

/**
 * Open the recording entry for writing.
 */
export async function createRecordingSink(
  writer: EntryWriter,
  options: EntryWriteOptions = {}
): Promise<EntrySink> {
  return writer.openEntryForWrite(CONTAINER_ENTRIES.RECORDING, options);
}
