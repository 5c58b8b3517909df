// Session metadata (metaData.json)
//
// Flat JSON document. Field names are fixed by existing archives and must not
// change; `players` is a JSON array on the wire and a Set in memory.

import { z } from 'zod';
import { MetadataFormatError } from '../errors.js';

const u32 = z.number().int().min(0).max(0xffffffff);
const u64 = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);
const i32 = z.number().int().min(-0x80000000).max(0x7fffffff);

/**
 * Wire schema of the metadata document.
 */
export const SessionMetadataSchema = z.object({
  singleplayer: z.boolean(),
  serverName: z.string(),
  customServerName: z.string(),
  duration: u64,
  date: u64,
  mcversion: z.string(),
  fileFormat: z.string(),
  fileFormatVersion: u32,
  protocol: u32,
  generator: z.string(),
  selfId: i32,
  players: z.array(z.string().uuid()),
});

/**
 * Metadata document as stored.
 */
export type SessionMetadataDocument = z.infer<typeof SessionMetadataSchema>;

/**
 * Metadata describing a whole recorded session.
 */
export type SessionMetadata = Omit<SessionMetadataDocument, 'players'> & {
  /**
   * Unique participant UUIDs, lower-cased
   */
  players: Set<string>;
};

/**
 * Format tag written on merged output.
 */
export const SESSION_FILE_FORMAT = 'MCPR';

/**
 * Format version written on merged output.
 */
export const SESSION_FILE_FORMAT_VERSION = 14;

/**
 * Metadata with every field at its empty value.
 */
export function createSessionMetadata(overrides: Partial<SessionMetadata> = {}): SessionMetadata {
  return {
    singleplayer: false,
    serverName: '',
    customServerName: '',
    duration: 0,
    date: 0,
    mcversion: '',
    fileFormat: '',
    fileFormatVersion: 0,
    protocol: 0,
    generator: '',
    selfId: -1,
    ...overrides,
    players: new Set([...(overrides.players ?? [])].map(normalizePlayerId)),
  };
}

/**
 * Canonical form of a participant UUID.
 */
export function normalizePlayerId(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * Validate a parsed JSON value against the metadata schema.
 *
 * @throws MetadataFormatError listing every schema issue
 */
export function toSessionMetadata(value: unknown): SessionMetadata {
  const result = SessionMetadataSchema.safeParse(value);
  if (!result.success) {
    throw new MetadataFormatError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      { cause: result.error }
    );
  }

  const { players, ...rest } = result.data;
  return { ...rest, players: new Set(players.map(normalizePlayerId)) };
}

/**
 * Parse a metadata document from its JSON text.
 */
export function parseSessionMetadata(text: string): SessionMetadata {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new MetadataFormatError(
      [`invalid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`],
      { cause: error }
    );
  }
  return toSessionMetadata(value);
}

/**
 * Serialize metadata to its flat JSON document.
 */
export function stringifySessionMetadata(metadata: SessionMetadata): string {
  const document: SessionMetadataDocument = {
    singleplayer: metadata.singleplayer,
    serverName: metadata.serverName,
    customServerName: metadata.customServerName,
    duration: metadata.duration,
    date: metadata.date,
    mcversion: metadata.mcversion,
    fileFormat: metadata.fileFormat,
    fileFormatVersion: metadata.fileFormatVersion,
    protocol: metadata.protocol,
    generator: metadata.generator,
    selfId: metadata.selfId,
    players: [...metadata.players],
  };
  return JSON.stringify(document);
}
