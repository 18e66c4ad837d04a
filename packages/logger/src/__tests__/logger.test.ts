/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import { toLoggableContext } from '../context.js';
import { validateLoggerEnv } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, type LogEntry, type Sink } from '../logger.js';
import { formatConsoleLine } from '../sinks/console.js';
import { FileSink } from '../sinks/file.js';

function collectingSink(): { entries: LogEntry[]; sink: Sink } {
  const entries: LogEntry[] = [];
  return {
    entries,
    sink: {
      write: (entry: LogEntry) => entries.push(entry),
      flush: () => {},
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent when no sinks are configured', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    getLogger('parser-chain').error('nothing should be written');

    expect(stderrSpy).not.toHaveBeenCalled();
    stderrSpy.mockRestore();
  });

  it('should write entries with category and message', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('object-processor').info('Parsed file');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.category).toBe('object-processor');
    expect(entries[0]?.msg).toBe('Parsed file');
    expect(entries[0]?.context).toBeUndefined();
  });

  it('should drop entries below the configured level', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('should respect a level change on loggers created before it', () => {
    const { entries, sink } = collectingSink();
    const logger = getLogger('early');

    initLogger({ level: 'debug', sinks: [sink] });
    logger.debug('now visible');

    expect(entries).toHaveLength(1);
  });

  it('should attach context objects', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').info({ file: 'photometry_source1_data1.csv', rows: 12 }, 'Parsed file');

    expect(entries[0]?.msg).toBe('Parsed file');
    expect(entries[0]?.context).toEqual({ file: 'photometry_source1_data1.csv', rows: 12 });
  });

  it('should merge child bindings into every entry', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    const child = getLogger('object-processor').child({ objectId: 'SN1994D' });
    child.info('Starting');
    child.warn({ file: 'a.txt' }, 'Unparsable file');

    expect(entries[0]?.context).toEqual({ objectId: 'SN1994D' });
    expect(entries[1]?.context).toEqual({ objectId: 'SN1994D', file: 'a.txt' });
    expect(entries[1]?.category).toBe('object-processor');
  });

  it('should serialize Error objects in context', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').error({ error: new Error('lookup failed') }, 'Metadata lookup failed');

    expect(entries[0]?.context?.['error']).toMatchObject({
      name: 'Error',
      message: 'lookup failed',
    });
  });

  it('should keep the code of coded errors', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    getLogger('test').warn({ error }, 'Read failed');

    expect(entries[0]?.context?.['error']).toMatchObject({ code: 'ENOENT', message: 'missing', name: 'Error' });
  });

  it('should replace circular references', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    const obj: Record<string, unknown> = { name: 'table' };
    obj['self'] = obj;
    getLogger('test').info({ data: obj }, 'circular');

    expect(entries[0]?.context?.['data']).toEqual({ name: 'table', self: '[Circular]' });
  });

  it('should call flush on all sinks', () => {
    const flush1 = vi.fn();
    const flush2 = vi.fn();
    initLogger({
      level: 'info',
      sinks: [
        { write: () => {}, flush: flush1 },
        { write: () => {}, flush: flush2 },
      ],
    });

    flushLoggers();

    expect(flush1).toHaveBeenCalledOnce();
    expect(flush2).toHaveBeenCalledOnce();
  });
});

describe('toLoggableContext', () => {
  it('should summarize bytes and flatten collections', () => {
    expect(
      toLoggableContext({
        bands: new Set(['bessellb', 'bessellv']),
        bytes: new Uint8Array(2880),
        rows: 12n,
        zeroPoints: new Map([['bessellb', 1250000]]),
      })
    ).toEqual({
      bands: ['bessellb', 'bessellv'],
      bytes: '<2880 bytes>',
      rows: '12',
      zeroPoints: { bessellb: 1250000 },
    });
  });

  it('should not mistake a shared reference for a cycle', () => {
    const shared = { band: 'bessellb' };

    expect(toLoggableContext({ a: shared, b: shared })).toEqual({ a: { band: 'bessellb' }, b: { band: 'bessellb' } });
  });

  it('should truncate deep nesting', () => {
    expect(toLoggableContext({ a: { b: { c: { d: { e: { f: { g: 1 } } } } } } })).toEqual({
      a: { b: { c: { d: { e: { f: '[Truncated]' } } } } },
    });
  });

  it('should write non-finite numbers as strings', () => {
    expect(toLoggableContext({ magnitude: Number.NaN, limit: Number.POSITIVE_INFINITY })).toEqual({
      limit: 'Infinity',
      magnitude: 'NaN',
    });
  });
});

class RecordingSink extends BufferedSink {
  readonly batches: LogEntry[][] = [];

  protected writeBatch(entries: readonly LogEntry[]): void {
    this.batches.push([...entries]);
  }
}

function entry(level: LogEntry['level'], msg: string): LogEntry {
  return { category: 'test', level, msg, timestamp: new Date(0) };
}

describe('BufferedSink', () => {
  it('should hand queued entries over as one batch on flush', () => {
    const sink = new RecordingSink();

    sink.write(entry('info', 'one'));
    sink.write(entry('debug', 'two'));
    sink.flush();
    sink.flush();

    expect(sink.batches.map((batch) => batch.map((item) => item.msg))).toEqual([['one', 'two']]);
  });

  it('should discard low-priority entries before warnings when full', () => {
    const sink = new RecordingSink({ maxBuffer: 2 });

    sink.write(entry('warn', 'first warning'));
    sink.write(entry('debug', 'noise'));
    sink.write(entry('error', 'failure'));
    sink.write(entry('debug', 'more noise'));
    sink.flush();

    expect(sink.batches[0]?.map((item) => `${item.level}:${item.msg}`)).toEqual([
      'warn:Discarded 2 log entries while the buffer was full',
      'warn:first warning',
      'error:failure',
    ]);
  });
});

describe('formatConsoleLine', () => {
  it('should format time, padded level, category, message and context', () => {
    const line = formatConsoleLine({
      level: 'warn',
      category: 'parser-chain',
      timestamp: new Date(2024, 0, 1, 12, 5, 9),
      msg: 'No parser matched',
      context: { file: 'x.dat', attempts: 4 },
    });

    expect(line).toBe('[12:05:09] WARN  [parser-chain] No parser matched {file="x.dat", attempts=4}');
  });

  it('should wrap the level in ANSI colour codes when enabled', () => {
    const line = formatConsoleLine(
      { level: 'error', category: 'cli', timestamp: new Date(2024, 0, 1, 0, 0, 0), msg: 'boom' },
      true
    );

    expect(line).toBe('[00:00:00] \x1b[31mERROR\x1b[0m [cli] boom');
  });
});

describe('FileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'lcforge-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should append one JSON line per entry on flush', () => {
    const file = path.join(dir, 'nested', 'run.log');
    const sink = new FileSink({ path: file });

    sink.write({
      level: 'info',
      category: 'batch',
      timestamp: new Date('2024-03-01T10:00:00.000Z'),
      msg: 'Batch complete',
      context: { emitted: 3 },
    });
    sink.flush();

    const lines = readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      timestamp: '2024-03-01T10:00:00.000Z',
      level: 'info',
      category: 'batch',
      msg: 'Batch complete',
      context: { emitted: 3 },
    });
  });
});

describe('validateLoggerEnv', () => {
  it('should default to info level with colour', () => {
    const env = validateLoggerEnv({});
    expect(env.LCFORGE_LOG_LEVEL).toBe('info');
    expect(env.LCFORGE_LOG_COLOR).toBe(true);
    expect(env.LCFORGE_LOG_FILE).toBeUndefined();
  });

  it('should accept upper-case levels', () => {
    expect(validateLoggerEnv({ LCFORGE_LOG_LEVEL: 'DEBUG' }).LCFORGE_LOG_LEVEL).toBe('debug');
  });

  it('should reject unknown levels', () => {
    expect(() => validateLoggerEnv({ LCFORGE_LOG_LEVEL: 'verbose' })).toThrow('Invalid log level');
  });
});
