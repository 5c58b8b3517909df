// Tests for session metadata parsing and serialization

import { describe, it, expect } from 'vitest';
import {
  createSessionMetadata,
  parseSessionMetadata,
  stringifySessionMetadata,
  toSessionMetadata,
} from './session.js';
import { MetadataFormatError } from '../errors.js';

const PLAYER_A = '0b7f1c2e-1111-4a2b-8c3d-000000000001';
const PLAYER_B = '0b7f1c2e-1111-4a2b-8c3d-000000000002';

function createDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    singleplayer: false,
    serverName: 'play.example.test',
    customServerName: 'Example',
    duration: 61000,
    date: 1700000000000,
    mcversion: '1.21.1',
    fileFormat: 'MCPR',
    fileFormatVersion: 14,
    protocol: 767,
    generator: 'test-recorder',
    selfId: 42,
    players: [PLAYER_A, PLAYER_B],
    ...overrides,
  };
}

describe('parseSessionMetadata', () => {
  it('parses a complete document', () => {
    const metadata = parseSessionMetadata(JSON.stringify(createDocument()));

    expect(metadata.serverName).toBe('play.example.test');
    expect(metadata.duration).toBe(61000);
    expect(metadata.protocol).toBe(767);
    expect(metadata.selfId).toBe(42);
    expect([...metadata.players]).toEqual([PLAYER_A, PLAYER_B]);
  });

  it('collapses duplicate players regardless of case', () => {
    const metadata = parseSessionMetadata(
      JSON.stringify(createDocument({ players: [PLAYER_A, PLAYER_A.toUpperCase()] }))
    );

    expect(metadata.players.size).toBe(1);
    expect(metadata.players.has(PLAYER_A)).toBe(true);
  });

  it('ignores unknown fields', () => {
    const metadata = parseSessionMetadata(JSON.stringify(createDocument({ extra: true })));

    expect(Object.keys(metadata)).not.toContain('extra');
  });

  it('reports invalid JSON as a metadata format error', () => {
    const error = (() => {
      try {
        parseSessionMetadata('{ not json');
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(MetadataFormatError);
    expect((error as MetadataFormatError).code).toBe('METADATA_FORMAT');
  });

  it('lists every schema issue with its field path', () => {
    const document = createDocument({ duration: -5, players: ['not-a-uuid'] });
    delete document.generator;

    try {
      toSessionMetadata(document);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataFormatError);
      const issues = (error as MetadataFormatError).issues;
      expect(issues).toHaveLength(3);
      expect(issues.some((issue) => issue.startsWith('duration:'))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('generator:'))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('players.0:'))).toBe(true);
    }
  });

  it('rejects timestamps past the largest exact integer', () => {
    expect(toSessionMetadata(createDocument({ date: Number.MAX_SAFE_INTEGER })).date).toBe(
      Number.MAX_SAFE_INTEGER
    );

    try {
      toSessionMetadata(createDocument({ duration: 2 ** 53, date: 2 ** 60 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataFormatError);
      const issues = (error as MetadataFormatError).issues;
      expect(issues).toHaveLength(2);
      expect(issues[0]?.startsWith('duration:')).toBe(true);
      expect(issues[1]?.startsWith('date:')).toBe(true);
    }
  });

  it('rejects a document that is not an object', () => {
    expect(() => parseSessionMetadata('[]')).toThrow(MetadataFormatError);
  });
});

describe('stringifySessionMetadata', () => {
  it('writes the flat wire document with players as an array', () => {
    const metadata = createSessionMetadata({
      duration: 1520,
      players: new Set([PLAYER_A]),
      fileFormat: 'MCPR',
      fileFormatVersion: 14,
    });

    expect(JSON.parse(stringifySessionMetadata(metadata))).toEqual({
      singleplayer: false,
      serverName: '',
      customServerName: '',
      duration: 1520,
      date: 0,
      mcversion: '',
      fileFormat: 'MCPR',
      fileFormatVersion: 14,
      protocol: 0,
      generator: '',
      selfId: -1,
      players: [PLAYER_A],
    });
  });

  it('round-trips through parse', () => {
    const original = parseSessionMetadata(JSON.stringify(createDocument()));

    expect(parseSessionMetadata(stringifySessionMetadata(original))).toEqual(original);
  });
});

describe('createSessionMetadata', () => {
  it('uses -1 as the default self id', () => {
    const metadata = createSessionMetadata();

    expect(metadata.selfId).toBe(-1);
    expect(metadata.players.size).toBe(0);
  });
});
