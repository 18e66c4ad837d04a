/**
 * Envelope for every `--json` response.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  data?: T | undefined;
  error?:
    | {
        code: string;
        message: string;
        /** Only when NODE_ENV is development */
        stack?: string | undefined;
      }
    | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, now: Date = new Date()): CLIResponse<T> {
  return {
    success: true,
    command,
    timestamp: now.toISOString(),
    data,
  };
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  now: Date = new Date()
): CLIResponse<never> {
  return {
    success: false,
    command,
    timestamp: now.toISOString(),
    error: {
      code,
      message: error.message,
      stack: process.env['NODE_ENV'] === 'development' ? error.stack : undefined,
    },
  };
}
