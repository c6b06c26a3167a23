/**
 * DOCX Error Handling
 *
 * Centralised error class, error codes and async error-wrapping utility.
 * Every failure this package surfaces is a DocxError carrying one of the
 * codes below, so callers can branch on `code` instead of message text.
 *
 * @module docx/errors
 */

export enum DocxErrorCode {
  CONTAINER_UNREADABLE = 'CONTAINER_UNREADABLE',
  ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',
  RELATIONSHIP_PARSE_ERROR = 'RELATIONSHIP_PARSE_ERROR',
  RELATIONSHIP_NOT_FOUND = 'RELATIONSHIP_NOT_FOUND',
  FONT_LOAD_FAILURE = 'FONT_LOAD_FAILURE',
  INVALID_COLOR_FORMAT = 'INVALID_COLOR_FORMAT',
  INVALID_PATH = 'INVALID_PATH',
}

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: DocxErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

/** Narrow an unknown thrown value, optionally to one specific code. */
export function isDocxError(error: unknown, code?: DocxErrorCode): error is DocxError {
  return error instanceof DocxError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an async operation — re-throws existing DocxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    throw new DocxError(describeError(error), errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
