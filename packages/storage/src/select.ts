// Backend selection by path.
//
// Inputs: a directory uses the directory backend, anything else is read as a
// zip archive. Outputs: an archive extension (.mcpr, .zip) writes a zip
// archive, any other path a directory, and no path at all means a dry run.

import * as fs from 'node:fs/promises';
import { isArchivePath } from '@reelcut/protocol';
import type { EntryReader, EntryWriter } from './types.js';
import { createDirectoryReader, createDirectoryWriter } from './directory.js';
import { createZipArchiveWriter, openZipArchiveReader, type ZipArchiveWriterOptions } from './zip.js';
import { toStorageError } from './io.js';

/**
 * Open a replay container for reading.
 * @throws StorageIOError if the path cannot be inspected or opened
 */
export async function openReplayReader(filePath: string): Promise<EntryReader> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(filePath)).isDirectory();
  } catch (error) {
    throw toStorageError(filePath, error);
  }
  return isDirectory ? createDirectoryReader(filePath) : openZipArchiveReader(filePath);
}

export type ReplayWriterOptions = ZipArchiveWriterOptions;

/**
 * Open a replay container for writing, or null when there is no output path.
 */
export async function openReplayWriter(
  filePath: string | undefined,
  options: ReplayWriterOptions = {}
): Promise<EntryWriter | null> {
  if (filePath === undefined) return null;
  if (isArchivePath(filePath)) {
    return createZipArchiveWriter(filePath, options);
  }
  return createDirectoryWriter(filePath);
}
