import { err, type Result } from 'neverthrow';

export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Wrap an unknown error with a context prefix as `err(Error)`.
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`));
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
