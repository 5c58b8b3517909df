// File-level merge: open backends from paths, merge, release them.

import {
  openReplayReader,
  openReplayWriter,
  type EntryReader,
  type EntryWriter,
} from '@reelcut/storage';
import { parseMergeConfig, resolveMergeOptions } from '../config.js';
import { withMergeStage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { mergeReplays, type MergeOptions, type MergeResult } from './engine.js';

export type MergeFilesOptions = Pick<MergeOptions, 'onPacket' | 'logger'> & {
  /**
   * Backend factory for inputs (default: openReplayReader)
   */
  openReader?: typeof openReplayReader;

  /**
   * Backend factory for the output (default: openReplayWriter)
   */
  openWriter?: typeof openReplayWriter;
};

/**
 * Merge the replay containers named by `config`.
 *
 * Backends are closed whether or not the merge succeeds, so output forwarded
 * before a failure stays readable. Finalizing the output container is part of
 * the `write_metadata` stage.
 *
 * @throws ValidationError for an invalid configuration
 * @throws MergeError for any failure while merging
 */
export async function mergeReplayFiles(
  config: unknown,
  options: MergeFilesOptions = {}
): Promise<MergeResult> {
  const parsed = parseMergeConfig(config);
  const logger = options.logger ?? silentLogger;
  const openReader = options.openReader ?? openReplayReader;
  const openWriter = options.openWriter ?? openReplayWriter;

  const readers: EntryReader[] = [];
  let writer: EntryWriter | null = null;
  let result: MergeResult;

  try {
    for (const [inputIndex, inputPath] of parsed.inputs.entries()) {
      readers.push(
        await withMergeStage('read_metadata', inputIndex, () => openReader(inputPath))
      );
    }

    writer = await withMergeStage('open_output', null, () =>
      openWriter(parsed.output, { compressionLevel: parsed.compressionLevel })
    );
    if (writer === null) {
      logger.info('No output configured, running without writing', { inputs: readers.length });
    }

    result = await mergeReplays(readers, writer, {
      ...resolveMergeOptions(parsed),
      onPacket: options.onPacket,
      logger,
    });
  } catch (error) {
    await releaseAfterFailure(readers, writer, logger);
    throw error;
  }

  try {
    if (writer !== null) {
      const output = writer;
      await withMergeStage('write_metadata', null, () => output.close());
    }
  } finally {
    for (const reader of readers) {
      await reader.close();
    }
  }
  return result;
}

async function releaseAfterFailure(
  readers: EntryReader[],
  writer: EntryWriter | null,
  logger: Logger
): Promise<void> {
  const backends: Array<EntryReader | EntryWriter> = writer ? [writer, ...readers] : readers;
  for (const backend of backends) {
    try {
      await backend.close();
    } catch (error) {
      logger.warn('Failed to close backend after merge failure', {
        location: backend.location,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
