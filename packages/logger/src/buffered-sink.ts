import { levelRank, type LogEntry, type Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the oldest low-priority entry is discarded. Defaults to 1000. */
  maxBuffer?: number | undefined;
}

const WARN_RANK = levelRank('warn');

/**
 * Queues entries and hands them to `writeBatch` on the next turn of the event loop,
 * so per-row debug logging inside parsers does not block on I/O.
 *
 * When the queue is full, trace/debug/info entries are discarded before warnings and
 * errors; the number discarded is reported at the head of the next batch.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private discarded = 0;
  private pending = false;
  private readonly capacity: number;

  constructor(options?: BufferedSinkOptions) {
    this.capacity = Math.max(1, options?.maxBuffer ?? 1000);
  }

  protected abstract writeBatch(entries: readonly LogEntry[]): void;

  write(entry: LogEntry): void {
    if (this.queue.length >= this.capacity && !this.makeRoomFor(entry)) {
      this.discarded++;
      return;
    }
    this.queue.push(entry);

    if (!this.pending) {
      this.pending = true;
      setImmediate(() => this.flush());
    }
  }

  flush(): void {
    const batch = this.queue;
    this.queue = [];
    this.pending = false;

    if (this.discarded > 0) {
      batch.unshift({
        category: 'logger',
        level: 'warn',
        msg: `Discarded ${this.discarded} log entries while the buffer was full`,
        timestamp: new Date(),
      });
      this.discarded = 0;
    }
    if (batch.length > 0) {
      this.writeBatch(batch);
    }
  }

  /**
   * Evict one queued entry so `incoming` fits. Returns false when `incoming` itself
   * should be discarded instead.
   */
  private makeRoomFor(incoming: LogEntry): boolean {
    const lowPriority = this.queue.findIndex((queued) => levelRank(queued.level) < WARN_RANK);
    if (lowPriority >= 0) {
      this.queue.splice(lowPriority, 1);
      this.discarded++;
      return true;
    }
    if (levelRank(incoming.level) >= WARN_RANK) {
      this.queue.shift();
      this.discarded++;
      return true;
    }
    return false;
  }
}
