/**
 * @lapcut/core — error taxonomy
 *
 * Every failure the codec can report. None of them is transient: each one
 * means the input is malformed or the caller asked for something that does
 * not exist, so callers log the context and abort the one operation.
 */

export type ErrorContext = Readonly<Record<string, string | number | boolean>>;

export type LapcutErrorCode =
  | 'MALFORMED_MARKER_FILE'
  | 'EMPTY_MARKER_SET'
  | 'LAP_INDEX_OUT_OF_RANGE'
  | 'INVALID_WINDOW'
  | 'TRUNCATED_FILE'
  | 'UNKNOWN_DATA_TYPE'
  | 'OVERLAPPING_REGIONS'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_OPTIONS';

export abstract class LapcutError extends Error {
  abstract readonly code: LapcutErrorCode;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.context = context;
  }
}

// ─── Companion file ───────────────────────────────────────────────────────────

export class MalformedMarkerFileError extends LapcutError {
  readonly code = 'MALFORMED_MARKER_FILE';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'MalformedMarkerFileError';
  }
}

export class EmptyMarkerSetError extends LapcutError {
  readonly code = 'EMPTY_MARKER_SET';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'EmptyMarkerSetError';
  }
}

// ─── Lap selection ────────────────────────────────────────────────────────────

export class LapIndexOutOfRangeError extends LapcutError {
  readonly code = 'LAP_INDEX_OUT_OF_RANGE';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'LapIndexOutOfRangeError';
  }
}

export class InvalidWindowError extends LapcutError {
  readonly code = 'INVALID_WINDOW';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'InvalidWindowError';
  }
}

// ─── Container ────────────────────────────────────────────────────────────────

/** A region (header, record, data block) ends past the last byte of the file. */
export class TruncatedFileError extends LapcutError {
  readonly code = 'TRUNCATED_FILE';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'TruncatedFileError';
  }
}

export class UnknownDataTypeError extends LapcutError {
  readonly code = 'UNKNOWN_DATA_TYPE';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'UnknownDataTypeError';
  }
}

export class OverlappingRegionsError extends LapcutError {
  readonly code = 'OVERLAPPING_REGIONS';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'OverlappingRegionsError';
  }
}

/** Wrong magic marker, or a host this codec cannot represent samples on. */
export class UnsupportedFormatError extends LapcutError {
  readonly code = 'UNSUPPORTED_FORMAT';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'UnsupportedFormatError';
  }
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export class InvalidOptionsError extends LapcutError {
  readonly code = 'INVALID_OPTIONS';

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'InvalidOptionsError';
  }
}
