// Action-log chunk framing
//
// Chunk layout:
//   int32 (BE)   magic, always ACTION_CHUNK_MAGIC
//   varint       number of action types
//   per type:    varint byte length + UTF-8 action name
//   int32 (BE)   snapshot size, then that many snapshot bytes
//   records:     varint action index | int32 (BE) length | payload
//
// Records run until a clean end of stream.

import { MalformedRecordError, TruncatedInputError } from '../errors.js';
import { ByteReader, type ByteSource } from '../codec/byte-reader.js';
import { encodeVarInt, readVarInt } from '../codec/varint.js';

/** Magic number opening every action chunk. */
export const ACTION_CHUNK_MAGIC = -679417724;

/**
 * Known action types
 */
export type ActionKind =
  | 'next_tick'
  | 'game_packet'
  | 'configuration_packet'
  | 'create_local_player'
  | 'move_entities'
  | 'level_chunk_cached'
  | 'accurate_player_position'
  | 'unknown';

const ACTION_NAMES: Record<string, ActionKind> = {
  'flashback:action/next_tick': 'next_tick',
  'flashback:action/game_packet': 'game_packet',
  'flashback:action/configuration_packet': 'configuration_packet',
  'flashback:action/create_local_player': 'create_local_player',
  'flashback:action/move_entities': 'move_entities',
  'flashback:action/level_chunk_cached': 'level_chunk_cached',
  'flashback:action/accurate_player_position': 'accurate_player_position',
};

/**
 * Map a namespaced action name to its kind.
 */
export function actionKindOf(name: string): ActionKind {
  return ACTION_NAMES[name] ?? 'unknown';
}

/**
 * One record of an action chunk
 */
export type ActionRecord = {
  kind: ActionKind;
  /** Namespaced action name from the chunk's table */
  name: string;
  data: Uint8Array;
};

/**
 * Parsed chunk header plus a lazy record sequence
 */
export type ActionChunk = {
  actionNames: string[];
  snapshotSize: number;
  records: AsyncGenerator<ActionRecord, void, undefined>;
};

const utf8 = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

/**
 * Read an action chunk's header. Records are read lazily from `records`.
 *
 * @throws MalformedRecordError on a bad magic, name table or record frame
 * @throws TruncatedInputError when the stream ends inside the header or a record
 */
export async function readActionChunk(source: ByteSource): Promise<ActionChunk> {
  const reader = new ByteReader(source);

  const magic = await readInt32(reader, 'action chunk magic');
  if (magic !== ACTION_CHUNK_MAGIC) {
    throw new MalformedRecordError(`Invalid action chunk magic: 0x${(magic >>> 0).toString(16)}`);
  }

  const actionCount = await requireVarInt(reader, 'action count');
  if (actionCount < 0) {
    throw new MalformedRecordError(`Negative action count: ${actionCount}`);
  }

  const actionNames: string[] = [];
  for (let i = 0; i < actionCount; i++) {
    actionNames.push(await readString(reader, `action name ${i}`));
  }

  const snapshotSize = await readInt32(reader, 'snapshot size');
  if (snapshotSize < 0) {
    throw new MalformedRecordError(`Negative snapshot size: ${snapshotSize}`);
  }
  await reader.skip(snapshotSize, 'snapshot');

  return { actionNames, snapshotSize, records: readRecords(reader, actionNames) };
}

async function* readRecords(
  reader: ByteReader,
  actionNames: string[]
): AsyncGenerator<ActionRecord, void, undefined> {
  try {
    while (true) {
      const index = await readVarInt(reader);
      if (index === null) return;

      const name = actionNames[index];
      if (name === undefined) {
        throw new MalformedRecordError(
          `Action index ${index} outside the table of ${actionNames.length} actions`
        );
      }

      const length = await readInt32(reader, 'action record length');
      if (length < 0) {
        throw new MalformedRecordError(`Negative action record length: ${length}`);
      }

      const data = await reader.readExact(length, 'action record payload');
      yield { kind: actionKindOf(name), name, data };
    }
  } finally {
    await reader.close();
  }
}

/**
 * Encode an action chunk. The snapshot is written verbatim.
 */
export function encodeActionChunk(chunk: {
  actionNames: string[];
  snapshot?: Uint8Array;
  records: Array<{ index: number; data: Uint8Array }>;
}): Uint8Array {
  const parts: Uint8Array[] = [int32(ACTION_CHUNK_MAGIC), encodeVarInt(chunk.actionNames.length)];

  for (const name of chunk.actionNames) {
    const bytes = utf8Encoder.encode(name);
    parts.push(encodeVarInt(bytes.length), bytes);
  }

  const snapshot = chunk.snapshot ?? new Uint8Array(0);
  parts.push(int32(snapshot.length), snapshot);

  for (const record of chunk.records) {
    parts.push(encodeVarInt(record.index), int32(record.data.length), record.data);
  }

  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

async function readInt32(reader: ByteReader, context: string): Promise<number> {
  const bytes = await reader.readExact(4, context);
  return new DataView(bytes.buffer, bytes.byteOffset, 4).getInt32(0, false);
}

async function requireVarInt(reader: ByteReader, context: string): Promise<number> {
  const value = await readVarInt(reader);
  if (value === null) {
    throw new TruncatedInputError(context, 1, 0);
  }
  return value;
}

async function readString(reader: ByteReader, context: string): Promise<string> {
  const length = await requireVarInt(reader, context);
  if (length < 0) {
    throw new MalformedRecordError(`Negative string length for ${context}: ${length}`);
  }
  const bytes = await reader.readExact(length, context);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new MalformedRecordError(`Invalid UTF-8 in ${context}`);
  }
}

function int32(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setInt32(0, value, false);
  return out;
}
