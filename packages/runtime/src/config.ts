// Merge configuration
//
// Validates a plain configuration object (from a CLI, a JSON file or code) and
// turns it into engine options. Packet ids may be hex strings ("0x2B") or
// integers 0-255.

import { z } from 'zod';
import { createPacketFilterMask, isReplayError, parsePacketId } from '@reelcut/protocol';
import { ValidationError } from './errors.js';
import { DEFAULT_GENERATOR, DEFAULT_RESET_PACKET_ID, type MergeOptions } from './merge/engine.js';

const PacketIdSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parsePacketId(value);
  } catch (error) {
    if (!isReplayError(error)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    return z.NEVER;
  }
});

export const MergeConfigSchema = z.object({
  inputs: z.array(z.string().min(1)).min(1, 'at least one input is required'),
  output: z.string().min(1).optional(),
  includePackets: z.array(PacketIdSchema).default([]),
  excludePackets: z.array(PacketIdSchema).default([]),
  admitUnknownPackets: z.boolean().default(true),
  compressionLevel: z.number().int().min(0).max(9).default(9),
  gapMs: z.number().int().min(0).default(0),
  resetPacketId: PacketIdSchema.nullable().default(DEFAULT_RESET_PACKET_ID),
  generator: z.string().default(DEFAULT_GENERATOR),
});

/**
 * Configuration accepted by parseMergeConfig, before defaults.
 */
export type MergeConfigInput = z.input<typeof MergeConfigSchema>;

/**
 * Validated configuration with defaults applied.
 */
export type MergeConfig = z.output<typeof MergeConfigSchema>;

/**
 * Validate a merge configuration.
 *
 * @throws ValidationError listing every issue
 */
export function parseMergeConfig(input: unknown): MergeConfig {
  const result = MergeConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid merge configuration: ${issues.join('; ')}`, {
      field: result.error.issues[0]?.path.join('.'),
      details: { issues },
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Engine options for a validated configuration.
 * Without an include list every id starts admitted; excludes apply first and
 * includes last.
 */
export function resolveMergeOptions(config: MergeConfig): MergeOptions {
  return {
    mask: createPacketFilterMask({
      include: config.includePackets,
      exclude: config.excludePackets,
      admitByDefault: config.includePackets.length === 0,
      admitUnknown: config.admitUnknownPackets,
    }),
    gapMs: config.gapMs,
    resetPacketId: config.resetPacketId,
    generator: config.generator,
    compressionLevel: config.compressionLevel,
  };
}
