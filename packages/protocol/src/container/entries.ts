// Replay container entry names
// Defines the canonical entries of a replay container and how paths map to backends

/**
 * Entries of a replay container
 */
export const CONTAINER_ENTRIES = {
  METADATA: 'metaData.json',
  RECORDING: 'recording.tmcpr',
} as const;

export type ContainerEntryName = (typeof CONTAINER_ENTRIES)[keyof typeof CONTAINER_ENTRIES];

/**
 * File extensions that select the compressed-archive backend
 */
export const ARCHIVE_EXTENSIONS = ['.mcpr', '.zip'] as const;

/**
 * Whether a path names a compressed archive (by extension, case-insensitive)
 */
export function isArchivePath(path: string): boolean {
  const lower = path.toLowerCase();
  return ARCHIVE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}
