import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
}

const ANSI_RESET = '\x1b[0m';
const LEVEL_STYLE: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Human-readable lines on stderr; stdout is left to command output.
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    process.stderr.write(entries.map((entry) => `${formatConsoleLine(entry, this.color)}\n`).join(''));
  }
}

/**
 * `[HH:MM:SS] LEVEL [category] message {key=value, ...}` in local time.
 */
export function formatConsoleLine(entry: LogEntry, color = false): string {
  const clock = [entry.timestamp.getHours(), entry.timestamp.getMinutes(), entry.timestamp.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_STYLE[entry.level]}${label}${ANSI_RESET}` : label;
  const fields = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';
  return `[${clock}] ${level} [${entry.category}] ${entry.msg}${fields}`;
}
