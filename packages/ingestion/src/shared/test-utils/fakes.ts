import {
  createPassbandVocabulary,
  createRawFile,
  createTextFile,
  createZeroPointTable,
  type MetadataProvider,
  type ObjectMetadata,
  type PassbandVocabulary,
  type RawFile,
  type ZeroPointTable,
} from '@lcforge/core';
import { err, ok, type Result } from 'neverthrow';

import type { PhotometrySource } from '../../archive/photometry-source.js';
import type { LightCurveRecord, LightCurveWriter } from '../../output/light-curve-writer.js';

export function testVocabulary(): PassbandVocabulary {
  return createPassbandVocabulary({
    passbands: ['bessellb', 'bessellv', 'standard::r', 'standard::u', 'sdss::g'],
    aliases: { B: 'bessellb', V: 'bessellv', R: 'standard::r', UNKNOWN: 'standard::u', g: 'sdss::g' },
    excludedLabels: ['unfiltered'],
  })._unsafeUnwrap();
}

export function testZeroPoints(): ZeroPointTable {
  return createZeroPointTable({
    systems: {
      Vega: { bessellb: 1250000, bessellv: 847000, 'standard::r': 1100000, 'standard::u': 440000 },
      AB: { 'sdss::g': 1000000, bessellb: 1500000 },
    },
  })._unsafeUnwrap();
}

/**
 * Archive stand-in keyed by `<objectId>/<fileName>`.
 */
export class InMemoryPhotometrySource implements PhotometrySource {
  private readonly files = new Map<string, RawFile>();
  private readonly failures = new Map<string, Error>();

  addText(objectId: string, fileName: string, text: string): this {
    this.files.set(`${objectId}/${fileName}`, createTextFile(fileName, text));
    return this;
  }

  addBytes(objectId: string, fileName: string, bytes: Uint8Array): this {
    this.files.set(`${objectId}/${fileName}`, createRawFile(fileName, bytes));
    return this;
  }

  failOn(objectId: string, fileName: string, error: Error): this {
    this.failures.set(`${objectId}/${fileName}`, error);
    return this;
  }

  read(objectId: string, fileName: string): Promise<Result<RawFile | undefined, Error>> {
    const key = `${objectId}/${fileName}`;
    const failure = this.failures.get(key);
    return Promise.resolve(failure ? err(failure) : ok(this.files.get(key)));
  }
}

export class StaticMetadataProvider implements MetadataProvider {
  readonly name = 'static';
  readonly lookups: string[] = [];

  constructor(private readonly metadata: Readonly<Record<string, ObjectMetadata>>) {}

  lookup(objectId: string): Promise<Result<ObjectMetadata, Error>> {
    this.lookups.push(objectId);
    const metadata = this.metadata[objectId];
    return Promise.resolve(metadata ? ok(metadata) : err(new Error(`No metadata for ${objectId}`)));
  }
}

export class InMemoryLightCurveWriter implements LightCurveWriter {
  readonly records: LightCurveRecord[] = [];

  write(record: LightCurveRecord): Promise<Result<string, Error>> {
    this.records.push(record);
    return Promise.resolve(ok(`memory://${record.objectId}`));
  }
}
