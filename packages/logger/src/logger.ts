import { toLoggableContext } from './context.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown> | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

/** A message, or a context object followed by the message. */
export type LogArgs = [msg: string] | [context: Record<string, unknown>, msg: string];

export interface Logger {
  trace(...args: LogArgs): void;
  debug(...args: LogArgs): void;
  info(...args: LogArgs): void;
  warn(...args: LogArgs): void;
  error(...args: LogArgs): void;
  /**
   * Logger for the same category that merges `bindings` into every entry's context.
   * Used to tag everything logged while one object is processed with its id.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

interface LoggerState {
  minRank: number;
  sinks: readonly Sink[];
}

// Shared by every logger, so loggers created at import time pick up a later initLogger().
const state: LoggerState = { minRank: levelRank('info'), sinks: [] };
const categories = new Map<string, Logger>();

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings: Record<string, unknown> = {}
  ) {}

  trace(...args: LogArgs): void {
    this.emit('trace', args);
  }

  debug(...args: LogArgs): void {
    this.emit('debug', args);
  }

  info(...args: LogArgs): void {
    this.emit('info', args);
  }

  warn(...args: LogArgs): void {
    this.emit('warn', args);
  }

  error(...args: LogArgs): void {
    this.emit('error', args);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, args: LogArgs): void {
    if (state.sinks.length === 0 || levelRank(level) < state.minRank) return;

    const msg = args.length === 1 ? args[0] : args[1];
    const extra = args.length === 1 ? undefined : args[0];
    const merged = extra === undefined ? this.bindings : { ...this.bindings, ...extra };
    const entry: LogEntry = { category: this.category, level, msg, timestamp: new Date() };
    if (Object.keys(merged).length > 0) {
      entry.context = toLoggableContext(merged);
    }

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  }
}

/**
 * Set the level and sinks for every logger. Until this is called nothing is written.
 */
export function initLogger(config: LoggerConfig): void {
  state.minRank = levelRank(config.level ?? 'info');
  state.sinks = [...(config.sinks ?? [])];
}

export function getLogger(category: string): Logger {
  let logger = categories.get(category);
  if (logger === undefined) {
    logger = new CategoryLogger(category);
    categories.set(category, logger);
  }
  return logger;
}

/** Write out anything the sinks still hold. Call before the process exits. */
export function flushLoggers(): void {
  state.sinks.forEach((sink) => sink.flush());
}
