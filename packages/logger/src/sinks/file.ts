import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

/**
 * Appends one JSON object per entry. Each batch is a single synchronous append,
 * so `flush()` before exit leaves a complete file.
 */
export class FileSink extends BufferedSink {
  private readonly filePath: string;

  constructor(options: FileSinkOptions) {
    super(options);
    this.filePath = options.path;
    mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    const lines = entries.map(({ category, context, level, msg, timestamp }) =>
      JSON.stringify({ timestamp: timestamp.toISOString(), level, category, msg, context })
    );
    appendFileSync(this.filePath, `${lines.join('\n')}\n`, 'utf8');
  }
}
