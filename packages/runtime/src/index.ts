// @reelcut/runtime
// Replay merge/filter engine: configuration, logging and the merge itself.

export * from './errors.js';
export * from './logger.js';
export {
  parseMergeConfig,
  resolveMergeOptions,
  MergeConfigSchema,
  type MergeConfig,
  type MergeConfigInput,
} from './config.js';
export * from './merge/index.js';
