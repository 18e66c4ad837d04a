import { flushLoggers } from '@lcforge/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse } from './cli-response.js';
import { exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  CONFIG_ERROR: 'Check the registry file and the LCFORGE_* environment variables.',
  NOT_FOUND: 'Double-check the path and try again.',
};

/**
 * Print a successful result. JSON goes to stdout; text lines go to stdout as well,
 * since logs are on stderr.
 */
export function outputSuccess<T>(command: string, format: OutputFormat, data: T, lines: readonly string[]): void {
  if (format === 'json') {
    console.log(JSON.stringify(createSuccessResponse(command, data), undefined, 2));
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Report an error and exit.
 * - Text mode: message to stderr with a tip for the error code
 * - JSON mode: structured error on stdout so callers can parse it
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: OutputFormat): never {
  const code = exitCodeToErrorCode(exitCode);
  flushLoggers();

  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
  } else {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}

/**
 * True when the raw commander options carry `--json`, read before validation so that
 * validation errors are reported in the requested format.
 */
export function isJsonRequested(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}
