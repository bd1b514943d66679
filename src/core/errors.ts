/**
 * Error classes for fatal conditions.
 *
 * Per-record problems during projection are not errors; they are reported as
 * failure values (see RecordFailureReason in ../types). Only conditions that
 * make the whole run meaningless are thrown.
 */

export type DocumentFormatErrorCode =
  | 'INVALID_ARCHIVE'
  | 'MISSING_PART'
  | 'INVALID_XML'
  | 'NOT_WORD';

/**
 * The input container or its XML payload cannot be read.
 */
export class DocumentFormatError extends Error {
  public readonly code: DocumentFormatErrorCode;

  constructor(code: DocumentFormatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentFormatError';
    this.code = code;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export type MatcherErrorCode = 'UNAVAILABLE' | 'TIMEOUT' | 'BAD_RESPONSE';

/**
 * Raised by matchers and their clients. The projector turns it into a
 * per-record failure; it never aborts a run.
 */
export class MatcherError extends Error {
  public readonly code: MatcherErrorCode;

  constructor(code: MatcherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MatcherError';
    this.code = code;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
