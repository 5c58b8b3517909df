// Stream merge/filter engine
//
// Concatenates recordings end to end. Each input's packets are shifted by the
// summed durations (plus gap) of the inputs before it, filtered by the mask,
// forwarded to the output recording and then to the visitor. From every input
// after the first, only `play` packets survive, minus the configured reset
// packet.

import {
  PacketFilterMask,
  createSessionMetadata,
  retimePacket,
  writePacket,
  SESSION_FILE_FORMAT,
  SESSION_FILE_FORMAT_VERSION,
  type ConnectionPhase,
  type Packet,
  type SessionMetadata,
} from '@reelcut/protocol';
import {
  createRecordingSink,
  openRecording,
  readReplayMetadata,
  writeReplayMetadata,
  type EntryReader,
  type EntrySink,
  type EntryWriter,
} from '@reelcut/storage';
import { ValidationError, withMergeStage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

/** Packet dropped from every input after the first (respawn / world reset). */
export const DEFAULT_RESET_PACKET_ID = 0x47;

/** Generator tag written on merged metadata. */
export const DEFAULT_GENERATOR = 'reelcut';

/**
 * Where the visitor is being called from.
 */
export type PacketVisitContext = {
  inputIndex: number;
  phase: ConnectionPhase;
};

/**
 * Return 'stop' to end the merge after this packet.
 */
export type PacketVisitResult = 'stop' | void;

export type PacketVisitor = (
  packet: Packet,
  context: PacketVisitContext
) => PacketVisitResult | Promise<PacketVisitResult>;

export type MergeOptions = {
  /**
   * Admission mask (default: admit everything)
   */
  mask?: PacketFilterMask;

  /**
   * Milliseconds inserted between consecutive inputs (default: 0)
   */
  gapMs?: number;

  /**
   * Packet id dropped from every input after the first; null keeps it
   * (default: 0x47)
   */
  resetPacketId?: number | null;

  /**
   * Generator tag for the merged metadata (default: "reelcut")
   */
  generator?: string;

  /**
   * Deflate level for the output recording (default: the backend's)
   */
  compressionLevel?: number;

  /**
   * Called with every admitted packet after it is written
   */
  onPacket?: PacketVisitor;

  logger?: Logger;
};

export type MergeResult = {
  /** Merged metadata, or null when the visitor stopped the merge */
  metadata: SessionMetadata | null;
  /** Inputs whose recordings were read to the end */
  inputsProcessed: number;
  packetsRead: number;
  packetsAdmitted: number;
  packetsWritten: number;
  stoppedEarly: boolean;
};

/**
 * Merge `inputs` in order into `output`. With a null output the merge is a
 * dry run: packets still reach the visitor and the merged metadata is
 * returned, but nothing is written.
 *
 * Output already written when a failure occurs is kept; the recording entry
 * is closed but the metadata entry is never written.
 *
 * @throws ValidationError when there are no inputs
 * @throws MergeError naming the failed stage and input
 */
export async function mergeReplays(
  inputs: EntryReader[],
  output: EntryWriter | null,
  options: MergeOptions = {}
): Promise<MergeResult> {
  if (inputs.length === 0) {
    throw new ValidationError('At least one input is required', { field: 'inputs' });
  }

  const mask = options.mask ?? PacketFilterMask.admitAll();
  const gapMs = options.gapMs ?? 0;
  const resetPacketId =
    options.resetPacketId === undefined ? DEFAULT_RESET_PACKET_ID : options.resetPacketId;
  const logger = options.logger ?? silentLogger;

  const result: MergeResult = {
    metadata: null,
    inputsProcessed: 0,
    packetsRead: 0,
    packetsAdmitted: 0,
    packetsWritten: 0,
    stoppedEarly: false,
  };

  let base: SessionMetadata | null = null;
  const players = new Set<string>();
  let runningOffset = 0;
  let sink: EntrySink | null = null;

  try {
    if (output !== null) {
      const writer = output;
      sink = await withMergeStage('open_output', null, () =>
        createRecordingSink(writer, { compressionLevel: options.compressionLevel })
      );
    }

    for (const [inputIndex, input] of inputs.entries()) {
      const metadata = await withMergeStage('read_metadata', inputIndex, () =>
        readReplayMetadata(input)
      );
      const packets = await withMergeStage('open_packets', inputIndex, () =>
        openRecording(input)
      );

      logger.info('Merging input', {
        inputIndex,
        location: input.location,
        duration: metadata.duration,
        offset: runningOffset,
      });

      const admittedBefore = result.packetsAdmitted;
      try {
        while (true) {
          const next = await withMergeStage('read_packets', inputIndex, () => packets.next());
          if (next.done) break;

          const { phase, packet } = next.value;
          result.packetsRead++;

          if (inputIndex > 0 && (phase !== 'play' || packet.id === resetPacketId)) continue;
          if (!mask.admits(packet.id)) continue;
          result.packetsAdmitted++;

          const retimed = retimePacket(packet, runningOffset);
          if (sink !== null) {
            const target = sink;
            await withMergeStage('write_packets', inputIndex, () => writePacket(retimed, target));
            result.packetsWritten++;
          }

          const verdict = await options.onPacket?.(retimed, { inputIndex, phase });
          if (verdict === 'stop') {
            result.stoppedEarly = true;
            break;
          }
        }
      } finally {
        await packets.return(undefined);
      }

      if (result.stoppedEarly) {
        logger.info('Merge stopped by visitor', { inputIndex, packetsRead: result.packetsRead });
        break;
      }

      base ??= metadata;
      for (const player of metadata.players) {
        players.add(player);
      }
      runningOffset += metadata.duration + gapMs;
      result.inputsProcessed++;

      logger.info('Finished input', {
        inputIndex,
        packetsAdmitted: result.packetsAdmitted - admittedBefore,
      });
    }

    if (sink !== null) {
      const target = sink;
      await withMergeStage('write_packets', null, () => target.close());
    }

    if (result.stoppedEarly || base === null) {
      return result;
    }

    const merged = createSessionMetadata({
      ...base,
      duration: runningOffset - gapMs,
      players,
      fileFormat: SESSION_FILE_FORMAT,
      fileFormatVersion: SESSION_FILE_FORMAT_VERSION,
      generator: options.generator ?? DEFAULT_GENERATOR,
    });

    if (output !== null) {
      const writer = output;
      await withMergeStage('write_metadata', null, () => writeReplayMetadata(writer, merged));
      logger.info('Wrote merged metadata', {
        location: output.location,
        duration: merged.duration,
        players: merged.players.size,
      });
    }

    result.metadata = merged;
    return result;
  } catch (error) {
    if (sink !== null) {
      await closeAfterFailure(sink, logger);
    }
    throw error;
  }
}

async function closeAfterFailure(sink: EntrySink, logger: Logger): Promise<void> {
  try {
    await sink.close();
  } catch (error) {
    logger.warn('Failed to close output recording after merge failure', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
