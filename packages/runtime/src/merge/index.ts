// Merge engine exports

export {
  mergeReplays,
  DEFAULT_RESET_PACKET_ID,
  DEFAULT_GENERATOR,
  type MergeOptions,
  type MergeResult,
  type PacketVisitor,
  type PacketVisitContext,
  type PacketVisitResult,
} from './engine.js';
export {
  createPacketStatistics,
  formatPacketId,
  type PacketStatistics,
  type PacketStatisticsRow,
} from './statistics.js';
export { mergeReplayFiles, type MergeFilesOptions } from './files.js';
