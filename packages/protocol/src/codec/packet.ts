// Packet record codec
//
// Record layout (recording.tmcpr):
//   [0..3]  time          (BIG-ENDIAN uint32)
//   [4..7]  total length  (BIG-ENDIAN uint32) = varint(id) bytes + payload bytes
//   [8..]   varint(id), then payload
//
// Records are concatenated with no separators and end at end of stream.

import { InvalidPacketError, TruncatedInputError } from '../errors.js';
import { PhaseTracker, INITIAL_RECORDING_PHASE } from '../phase/tracker.js';
import type { ConnectionPhase, Packet, TaggedPacket } from '../types/packets.js';
import { ByteReader, type ByteSource } from './byte-reader.js';
import { decodeVarInt, encodeVarInt, varIntSize } from './varint.js';

/** Size of the fixed record header: time(4) + length(4). */
export const PACKET_HEADER_SIZE = 8;

const MAX_U32 = 0xffffffff;

/**
 * Destination for encoded bytes.
 */
export type ByteSink = {
  write(chunk: Uint8Array): Promise<void>;
};

/**
 * Length field for a packet: encoded id plus payload.
 */
export function packetLength(packet: Packet): number {
  return varIntSize(packet.id) + packet.data.length;
}

/**
 * Read the next record.
 *
 * @returns The packet, or null when the stream ends cleanly before a header
 * @throws TruncatedInputError when the stream ends inside a record
 */
export async function readPacket(reader: ByteReader): Promise<Packet | null> {
  const header = await reader.read(PACKET_HEADER_SIZE);
  if (header.length === 0) {
    return null;
  }
  if (header.length < PACKET_HEADER_SIZE) {
    throw new TruncatedInputError('packet header', PACKET_HEADER_SIZE, header.length);
  }

  const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
  const time = view.getUint32(0, false);
  const length = view.getUint32(4, false);

  const body = await reader.readExact(length, 'packet payload');
  const { value: id, bytesRead } = decodeVarInt(body, 0);

  return { time, id, data: body.slice(bytesRead) };
}

/**
 * Encode a packet as one record. The length field is always recomputed.
 */
export function encodePacket(packet: Packet): Uint8Array {
  if (!Number.isInteger(packet.time) || packet.time < 0 || packet.time > MAX_U32) {
    throw new InvalidPacketError('time', packet.time);
  }
  if (!Number.isInteger(packet.id) || packet.id < -0x80000000 || packet.id > 0x7fffffff) {
    throw new InvalidPacketError('id', packet.id);
  }

  const id = encodeVarInt(packet.id);
  const length = id.length + packet.data.length;
  const out = new Uint8Array(PACKET_HEADER_SIZE + length);
  const view = new DataView(out.buffer);

  view.setUint32(0, packet.time, false);
  view.setUint32(4, length, false);
  out.set(id, PACKET_HEADER_SIZE);
  out.set(packet.data, PACKET_HEADER_SIZE + id.length);

  return out;
}

/**
 * Encode a packet and write it to a sink.
 */
export async function writePacket(packet: Packet, sink: ByteSink): Promise<void> {
  await sink.write(encodePacket(packet));
}

/**
 * Options for streaming packets out of a recording.
 */
export type PacketStreamOptions = {
  /**
   * Phase of the first packet (default: login)
   */
  initialPhase?: ConnectionPhase;
};

/**
 * Lazily read every record of a recording, tagging each with its phase.
 *
 * Single pass; abandoning the iteration releases the source without reading
 * the remainder. Framing errors propagate to the consumer.
 */
export async function* readPacketStream(
  source: ByteSource,
  options: PacketStreamOptions = {}
): AsyncGenerator<TaggedPacket, void, undefined> {
  const reader = new ByteReader(source);
  const tracker = new PhaseTracker(options.initialPhase ?? INITIAL_RECORDING_PHASE);

  try {
    while (true) {
      const packet = await readPacket(reader);
      if (!packet) return;
      yield { phase: tracker.observe(packet.id), packet };
    }
  } finally {
    await reader.close();
  }
}
