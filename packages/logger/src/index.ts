export {
  flushLoggers,
  getLogger,
  initLogger,
  levelRank,
  LOG_LEVELS,
  type LogArgs,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type Sink,
} from './logger.js';
export { toLoggableContext } from './context.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, formatConsoleLine, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
