import { ConsoleSink, FileSink, initLogger, type LogLevel, type Sink } from '@lcforge/logger';

import type { CliEnv } from './env.js';

/**
 * Console sink on stderr, plus a JSON-lines file when LCFORGE_LOG_FILE is set.
 * A `--log-level` flag wins over LCFORGE_LOG_LEVEL.
 */
export function configureCliLogging(env: CliEnv, level?: LogLevel): void {
  const sinks: Sink[] = [new ConsoleSink({ color: env.LCFORGE_LOG_COLOR && process.stderr.isTTY })];
  if (env.LCFORGE_LOG_FILE !== undefined) {
    sinks.push(new FileSink({ path: env.LCFORGE_LOG_FILE }));
  }
  initLogger({ level: level ?? env.LCFORGE_LOG_LEVEL, sinks });
}
