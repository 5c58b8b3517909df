// Replay container error types
//
// Every failure the codecs and storage backends can report. None of these are
// retried; callers decide how to surface them.

/**
 * Base class for all replay container errors.
 * Provides a stable code for programmatic handling.
 */
export class ReplayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReplayError';
    this.code = code;
  }
}

/**
 * The input ended inside a record or a varint.
 * A clean end before the first byte of a record is not an error.
 */
export class TruncatedInputError extends ReplayError {
  readonly context: string;
  readonly expected: number;
  readonly received: number;

  constructor(context: string, expected: number, received: number) {
    super(
      'TRUNCATED_INPUT',
      `Truncated ${context}: expected ${expected} bytes, got ${received}`
    );
    this.name = 'TruncatedInputError';
    this.context = context;
    this.expected = expected;
    this.received = received;
  }
}

/**
 * A varint ran past its byte budget without a terminating byte.
 */
export class MalformedVarIntError extends ReplayError {
  readonly maxBytes: number;

  constructor(maxBytes: number) {
    super('MALFORMED_VARINT', `Varint is longer than ${maxBytes} bytes`);
    this.name = 'MalformedVarIntError';
    this.maxBytes = maxBytes;
  }
}

/**
 * A named entry does not exist in a storage backend.
 */
export class EntryNotFoundError extends ReplayError {
  readonly entryName: string;

  constructor(entryName: string, options?: { cause?: unknown }) {
    super('ENTRY_NOT_FOUND', `Entry not found: ${entryName}`, options);
    this.name = 'EntryNotFoundError';
    this.entryName = entryName;
  }
}

/**
 * Underlying filesystem or archive failure.
 */
export class StorageIOError extends ReplayError {
  readonly location: string;

  constructor(location: string, reason: string, options?: { cause?: unknown }) {
    super('STORAGE_IO', `Storage failure at ${location}: ${reason}`, options);
    this.name = 'StorageIOError';
    this.location = location;
  }
}

/**
 * Write sessions on a sequential container overlapped or reused a closed sink.
 */
export class EntryOrderError extends ReplayError {
  readonly entryName: string;

  constructor(entryName: string, reason: string) {
    super('ENTRY_ORDER', `Cannot write entry "${entryName}": ${reason}`);
    this.name = 'EntryOrderError';
    this.entryName = entryName;
  }
}

/**
 * A metadata document is not valid JSON or does not match its schema.
 */
export class MetadataFormatError extends ReplayError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super('METADATA_FORMAT', `Invalid metadata: ${issues.join('; ')}`, options);
    this.name = 'MetadataFormatError';
    this.issues = issues;
  }
}

/**
 * A packet cannot be encoded (time outside the u32 range, id not an i32).
 */
export class InvalidPacketError extends ReplayError {
  readonly field: 'time' | 'id';

  constructor(field: 'time' | 'id', value: number) {
    super('INVALID_PACKET', `Packet ${field} out of range: ${value}`);
    this.name = 'InvalidPacketError';
    this.field = field;
  }
}

/**
 * A filter was given an id outside the table range.
 */
export class InvalidPacketIdError extends ReplayError {
  readonly value: string;

  constructor(value: string | number, reason: string) {
    super('INVALID_PACKET_ID', `Invalid packet id "${value}": ${reason}`);
    this.name = 'InvalidPacketIdError';
    this.value = String(value);
  }
}

/**
 * Structural failure in an action-log chunk.
 */
export class MalformedRecordError extends ReplayError {
  constructor(message: string) {
    super('MALFORMED_RECORD', message);
    this.name = 'MalformedRecordError';
  }
}

/**
 * Type guard for any replay container error.
 */
export function isReplayError(error: unknown): error is ReplayError {
  return error instanceof ReplayError;
}
