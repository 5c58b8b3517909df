// @reelcut/protocol
// Replay container formats: the byte-level codecs and value types shared by
// storage backends and the merge engine.

export * from './errors.js';
export * from './types/packets.js';
export * from './container/entries.js';

// Codecs
export { ByteReader, type ByteSource } from './codec/byte-reader.js';
export {
  encodeVarInt,
  decodeVarInt,
  varIntSize,
  encodeVarLong,
  decodeVarLong,
  readVarInt,
  readVarLong,
  MAX_VARINT_BYTES,
  MAX_VARLONG_BYTES,
  type Decoded,
} from './codec/varint.js';
export {
  readPacket,
  readPacketStream,
  writePacket,
  encodePacket,
  packetLength,
  PACKET_HEADER_SIZE,
  type ByteSink,
  type PacketStreamOptions,
} from './codec/packet.js';

// Phase tracking
export * from './phase/index.js';

// Filtering
export {
  PacketFilterMask,
  PacketFilterMaskBuilder,
  createPacketFilterMask,
  parsePacketId,
  FILTER_TABLE_SIZE,
  type PacketFilterMaskOptions,
} from './filter/mask.js';

// Session metadata
export {
  SessionMetadataSchema,
  createSessionMetadata,
  normalizePlayerId,
  parseSessionMetadata,
  stringifySessionMetadata,
  toSessionMetadata,
  SESSION_FILE_FORMAT,
  SESSION_FILE_FORMAT_VERSION,
  type SessionMetadata,
  type SessionMetadataDocument,
} from './metadata/session.js';

// Action-log chunks
export {
  readActionChunk,
  encodeActionChunk,
  actionKindOf,
  ACTION_CHUNK_MAGIC,
  type ActionKind,
  type ActionRecord,
  type ActionChunk,
} from './action-log/chunk.js';
