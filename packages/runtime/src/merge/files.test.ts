// Tests for the file-level merge

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createPacket,
  createSessionMetadata,
  writePacket,
  type Packet,
  type SessionMetadata,
} from '@reelcut/protocol';
import {
  createInMemoryReader,
  createInMemoryWriter,
  createRecordingSink,
  createZipArchiveWriter,
  openRecording,
  openReplayReader,
  readReplayMetadata,
  writeReplayMetadata,
} from '@reelcut/storage';
import { mergeReplayFiles } from './files.js';
import { createPacketStatistics } from './statistics.js';
import { MergeError, ValidationError } from '../errors.js';

const PLAYER = '0b7f1c2e-1111-4a2b-8c3d-0000000000aa';

async function writeArchive(
  filePath: string,
  packets: Packet[],
  overrides: Partial<SessionMetadata>
): Promise<void> {
  const writer = await createZipArchiveWriter(filePath);
  const sink = await createRecordingSink(writer);
  for (const packet of packets) {
    await writePacket(packet, sink);
  }
  await sink.close();
  await writeReplayMetadata(writer, createSessionMetadata(overrides));
  await writer.close();
}

async function readTimes(location: string): Promise<Array<[number, number]>> {
  const reader = await openReplayReader(location);
  const out: Array<[number, number]> = [];
  for await (const { packet } of await openRecording(reader)) {
    out.push([packet.time, packet.id]);
  }
  await reader.close();
  return out;
}

describe('mergeReplayFiles', () => {
  let dir: string;
  let first: string;
  let second: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reelcut-merge-'));
    first = path.join(dir, 'first.mcpr');
    second = path.join(dir, 'second.mcpr');

    const packets = [
      createPacket(0, 0x02),
      createPacket(5, 0x03),
      createPacket(10, 0x2b, new Uint8Array([1])),
    ];
    await writeArchive(first, packets, { duration: 1000, players: new Set([PLAYER]) });
    await writeArchive(second, packets, { duration: 500 });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('merges archives into an archive', async () => {
    const output = path.join(dir, 'merged.mcpr');

    const result = await mergeReplayFiles({ inputs: [first, second], output, gapMs: 20 });

    expect(result.packetsWritten).toBe(4);
    expect(await readTimes(output)).toEqual([
      [0, 0x02],
      [5, 0x03],
      [10, 0x2b],
      [1030, 0x2b],
    ]);

    const reader = await openReplayReader(output);
    const metadata = await readReplayMetadata(reader);
    expect(metadata.duration).toBe(1520);
    expect(metadata.players).toEqual(new Set([PLAYER]));
    expect(metadata.generator).toBe('reelcut');
    await reader.close();
  });

  it('merges into a directory for other output paths', async () => {
    const output = path.join(dir, 'merged');

    await mergeReplayFiles({ inputs: [first, second], output, excludePackets: ['0x02'] });

    expect(await fs.readdir(output)).toEqual(
      expect.arrayContaining(['metaData.json', 'recording.tmcpr'])
    );
    expect(await readTimes(output)).toEqual([
      [5, 0x03],
      [10, 0x2b],
      [1010, 0x2b],
    ]);
  });

  it('runs without writing when there is no output', async () => {
    const stats = createPacketStatistics();

    const result = await mergeReplayFiles({ inputs: [first, second] }, { onPacket: stats.visit });

    expect(result.packetsWritten).toBe(0);
    expect(result.metadata?.duration).toBe(1500);
    expect(stats.rows()).toEqual([
      { id: 0x2b, count: 2, totalSize: 2, averageSize: 1 },
      { id: 0x03, count: 1, totalSize: 0, averageSize: 0 },
      { id: 0x02, count: 1, totalSize: 0, averageSize: 0 },
    ]);
    expect(await fs.readdir(dir)).toEqual(expect.arrayContaining(['first.mcpr', 'second.mcpr']));
    expect(await fs.readdir(dir)).toHaveLength(2);
  });

  it.each([16, 1024, 1024 * 1024])(
    'merges archives whose packets carry %i-byte zero-filled payloads',
    async (size) => {
      const zeros = path.join(dir, 'zeros.mcpr');
      const payload = new Uint8Array(size);
      await writeArchive(
        zeros,
        [createPacket(0, 0x02), createPacket(5, 0x03), createPacket(10, 0x2b, payload)],
        { duration: 100 }
      );
      const output = path.join(dir, 'merged-zeros.mcpr');

      await mergeReplayFiles({ inputs: [zeros, zeros], output });

      const reader = await openReplayReader(output);
      const packets: Packet[] = [];
      for await (const { packet } of await openRecording(reader)) {
        packets.push(packet);
      }
      await reader.close();

      expect(packets.map((packet) => [packet.time, packet.id])).toEqual([
        [0, 0x02],
        [5, 0x03],
        [10, 0x2b],
        [110, 0x2b],
      ]);
      expect(packets[3]?.data).toEqual(payload);
    }
  );

  it('closes every input even when the output cannot be finalized', async () => {
    const source = createInMemoryWriter();
    await writeReplayMetadata(source.writer, createSessionMetadata({ duration: 10 }));
    const recording = await createRecordingSink(source.writer);
    await writePacket(createPacket(0, 0x02), recording);
    await recording.close();

    const closed: string[] = [];

    const error = await mergeReplayFiles(
      { inputs: ['a.mcpr', 'b.mcpr'], output: 'out.mcpr' },
      {
        openReader: async (inputPath) => ({
          ...createInMemoryReader(source.entries, inputPath),
          close: async () => {
            closed.push(inputPath);
          },
        }),
        openWriter: async () => ({
          ...createInMemoryWriter().writer,
          close: async () => {
            throw new Error('disk full');
          },
        }),
      }
    ).catch((failure: unknown) => failure);

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ stage: 'write_metadata', inputIndex: null });
    expect(closed).toEqual(['a.mcpr', 'b.mcpr']);
  });

  it('rejects an invalid configuration', async () => {
    await expect(mergeReplayFiles({ inputs: [] })).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports an input that cannot be opened', async () => {
    const missing = path.join(dir, 'missing.mcpr');

    await expect(mergeReplayFiles({ inputs: [first, missing] })).rejects.toMatchObject({
      stage: 'read_metadata',
      inputIndex: 1,
    });
  });

  it('keeps output forwarded before a failure', async () => {
    const broken = path.join(dir, 'broken.mcpr');
    const writer = await createZipArchiveWriter(broken);
    await writer.close();
    const output = path.join(dir, 'partial.mcpr');

    const error = await mergeReplayFiles({ inputs: [first, broken], output }).catch(
      (failure: unknown) => failure
    );

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ stage: 'read_metadata', inputIndex: 1 });
    expect(await readTimes(output)).toEqual([
      [0, 0x02],
      [5, 0x03],
      [10, 0x2b],
    ]);
  });
});
