/**
 * ODT Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 * Every failure the codec, loader or mapper raises is an OdtError, so
 * callers can branch on `code` instead of on message text.
 *
 * @module odt/errors
 */

export class OdtError extends Error {
  constructor(
    message: string,
    public readonly code: OdtErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OdtError';
    Error.captureStackTrace?.(this, OdtError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum OdtErrorCode {
  /** Archive, staging directory or XML file unreadable / unwritable. */
  IO_ERROR = 'IO_ERROR',
  /** Malformed XML. */
  PARSE_ERROR = 'PARSE_ERROR',
  /** A write needs the office:meta container and there is none. */
  STRUCTURAL_ERROR = 'STRUCTURAL_ERROR',
  INVALID_PATH = 'INVALID_PATH',
  INVALID_ODT = 'INVALID_ODT',
  /** Archive entry whose path escapes the output directory. */
  INVALID_ENTRY = 'INVALID_ENTRY',
  READ_ONLY_FIELD = 'READ_ONLY_FIELD',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export function isOdtError(error: unknown): error is OdtError {
  return error instanceof OdtError;
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an async operation: re-throws existing OdtErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: OdtErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof OdtError) throw error;
    throw new OdtError(errorMessage(error), errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
