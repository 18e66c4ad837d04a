/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution, including batches where some objects were skipped */
  SUCCESS: 0,

  /** General error (catch-all), also used when any object in a batch failed */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Validation error (data validation failed) */
  VALIDATION_ERROR: 8,

  /** Registry, vocabulary, zero-point or environment configuration is invalid */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
