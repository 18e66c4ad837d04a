import type { CanonicalTable, RawFile } from '@lcforge/core';
import { toError } from '@lcforge/core';
import { getLogger, type Logger } from '@lcforge/logger';
import { Result } from 'neverthrow';

import { sanitize } from '../sanitize/sanitizer.js';

import { DelimitedTextParser } from './delimited-text-parser.js';
import { FitsTableParser } from './fits-table-parser.js';
import { NotesAndLimitsParser } from './notes-and-limits-parser.js';
import type { PhotometryParser } from './parser.js';
import { TabSeparatedParser } from './tab-separated-parser.js';

export type ParserAttemptStatus = 'not-applicable' | 'malformed' | 'empty';

export interface ParserAttempt {
  readonly parser: string;
  readonly status: ParserAttemptStatus;
  readonly reason?: string | undefined;
}

export type ParseOutcome =
  | {
      readonly status: 'parsed';
      readonly parser: string;
      readonly table: CanonicalTable;
      readonly attempts: readonly ParserAttempt[];
    }
  | {
      readonly status: 'unparsable';
      readonly attempts: readonly ParserAttempt[];
    };

export function createDefaultParsers(): PhotometryParser[] {
  return [new DelimitedTextParser(), new TabSeparatedParser(), new NotesAndLimitsParser(), new FitsTableParser()];
}

/**
 * Tries each parser in priority order; the first that yields a non-empty canonical table wins.
 * Every attempt is recorded so callers can explain why a file was not used.
 */
export class ParserChain {
  private readonly logger: Logger;

  constructor(private readonly parsers: readonly PhotometryParser[] = createDefaultParsers()) {
    this.logger = getLogger('parser-chain');
  }

  get parserNames(): string[] {
    return this.parsers.map((parser) => parser.name);
  }

  tryParse(file: RawFile): ParseOutcome {
    const attempts: ParserAttempt[] = [];

    for (const parser of this.parsers) {
      const matched = Result.fromThrowable(() => parser.matches(file), toError)();
      if (matched.isErr() || !matched.value) {
        attempts.push({
          parser: parser.name,
          reason: matched.isErr() ? matched.error.message : undefined,
          status: 'not-applicable',
        });
        continue;
      }

      const parsed = Result.fromThrowable(() => parser.parse(file), toError)().andThen((result) => result);
      if (parsed.isErr()) {
        this.logger.debug({ file: file.name, parser: parser.name, reason: parsed.error.message }, 'Parser rejected file');
        attempts.push({ parser: parser.name, reason: parsed.error.message, status: 'malformed' });
        continue;
      }

      const table = sanitize(parsed.value.table, parsed.value.aliases);
      if (table === undefined) {
        attempts.push({ parser: parser.name, reason: 'No rows with a finite time and magnitude', status: 'empty' });
        continue;
      }

      this.logger.debug({ file: file.name, parser: parser.name, rows: table.length }, 'Parsed file');
      return { attempts, parser: parser.name, status: 'parsed', table };
    }

    return { attempts, status: 'unparsable' };
  }
}
