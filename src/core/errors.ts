/**
 * Byte Grid Errors
 *
 * Contract violations raised by the engine and its byte stores.
 * Recoverable conditions (denied edits, malformed pastes, failed searches)
 * are reported through return values instead.
 */

export type ByteGridErrorCode =
  | 'OUT_OF_RANGE'
  | 'CAPABILITY_DENIED'
  | 'INVALID_PATTERN'
  | 'MALFORMED_PASTE';

export class ByteGridError extends Error {
  readonly code: ByteGridErrorCode;

  constructor(code: ByteGridErrorCode, message: string) {
    super(message);
    this.name = 'ByteGridError';
    this.code = code;
  }
}

/**
 * An offset or length outside the store's valid range.
 */
export class OutOfRangeError extends ByteGridError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
    this.name = 'OutOfRangeError';
  }
}

/**
 * A write, insert or delete on a store that does not support it.
 */
export class CapabilityDeniedError extends ByteGridError {
  readonly capability: 'write' | 'insert' | 'delete';

  constructor(capability: 'write' | 'insert' | 'delete') {
    super('CAPABILITY_DENIED', `Byte store does not support ${capability}`);
    this.name = 'CapabilityDeniedError';
    this.capability = capability;
  }
}

export class InvalidPatternError extends ByteGridError {
  constructor(message: string) {
    super('INVALID_PATTERN', message);
    this.name = 'InvalidPatternError';
  }
}

export class MalformedPasteError extends ByteGridError {
  constructor(message: string) {
    super('MALFORMED_PASTE', message);
    this.name = 'MalformedPasteError';
  }
}

/**
 * Check whether a value is a byte grid error, optionally of a given code.
 */
export function isByteGridError(error: unknown, code?: ByteGridErrorCode): error is ByteGridError {
  return error instanceof ByteGridError && (code === undefined || error.code === code);
}
