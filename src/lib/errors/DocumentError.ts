/**
 * Error codes for document conversion failures.
 */
export enum DocumentErrorCode {
  /** Unknown page size name or font reference */
  LOOKUP_FAILURE = 'LOOKUP_FAILURE',
  /** The font metrics could not measure a run (e.g. a missing glyph) */
  MEASUREMENT_FAILURE = 'MEASUREMENT_FAILURE',
  /** The page sink failed to open, place, close or persist */
  SINK_FAILURE = 'SINK_FAILURE',
  /** A workbook or configuration file is malformed */
  INVALID_SOURCE = 'INVALID_SOURCE',
  PASSWORD_REQUIRED = 'PASSWORD_REQUIRED',
  INCORRECT_PASSWORD = 'INCORRECT_PASSWORD'
}

/**
 * Error class for document conversion failures.
 */
export class DocumentError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'DocumentError';
  }
}

/**
 * Run an operation against a collaborator, wrapping anything it throws
 * (other than a DocumentError) in a DocumentError with the given code.
 */
export function wrapFailure<T>(code: DocumentErrorCode, message: string, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (error instanceof DocumentError) {
      throw error;
    }
    throw new DocumentError(message, code, error);
  }
}

/**
 * Format an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof DocumentError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
