// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super('VALIDATION_ERROR', message, { cause: options?.cause });
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Step of a merge at which a failure happened.
 */
export type MergeStage =
  | 'read_metadata'
  | 'open_packets'
  | 'read_packets'
  | 'open_output'
  | 'write_packets'
  | 'write_metadata';

/**
 * A merge aborted. Wraps the underlying failure as `cause`.
 */
export class MergeError extends RuntimeError {
  readonly stage: MergeStage;
  /** Index of the input being processed, or null for output-only stages */
  readonly inputIndex: number | null;

  constructor(stage: MergeStage, inputIndex: number | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = inputIndex === null ? stage : `${stage} (input ${inputIndex})`;
    super('MERGE_FAILED', `Merge failed at ${where}: ${reason}`, { cause });
    this.name = 'MergeError';
    this.stage = stage;
    this.inputIndex = inputIndex;
  }
}

/**
 * Run one merge step, reporting any failure as a MergeError for `stage`.
 */
export async function withMergeStage<T>(
  stage: MergeStage,
  inputIndex: number | null,
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw error instanceof MergeError ? error : new MergeError(stage, inputIndex, error);
  }
}

/**
 * Type guard for runtime errors.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
