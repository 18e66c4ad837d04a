import {
  UnrecognizedPassbandError,
  type CanonicalTable,
  type MetadataProvider,
  type PassbandVocabulary,
  type RegistryEntry,
  type ZeroPointTable,
} from '@lcforge/core';
import { getLogger, type Logger } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';

import type { PhotometrySource } from '../archive/photometry-source.js';
import { convertToFlux } from '../convert/flux-converter.js';
import { normalizePassbands, type NormalizationDiagnostics } from '../normalize/passband-normalizer.js';
import type { LightCurveWriter } from '../output/light-curve-writer.js';
import type { ParserAttempt, ParserChain } from '../parsing/parser-chain.js';

export type UnrecognizedLabelPolicy = 'drop' | 'skip-object';

export type FileReport =
  | { readonly fileName: string; readonly status: 'parsed'; readonly parser: string; readonly rows: number }
  | { readonly fileName: string; readonly status: 'unparsable'; readonly attempts: readonly ParserAttempt[] }
  | { readonly fileName: string; readonly status: 'missing' }
  | { readonly fileName: string; readonly status: 'unreadable'; readonly reason: string };

export type SkipReason = 'no-files' | 'no-usable-observations' | 'metadata-lookup';

export type ObjectOutcome =
  | {
      readonly status: 'emitted';
      readonly objectId: string;
      readonly outputPath: string;
      readonly observationCount: number;
      readonly files: readonly FileReport[];
      readonly diagnostics: NormalizationDiagnostics;
      /** Passbands whose rows were dropped for lack of a zero point in the object's system. */
      readonly bandsWithoutZeroPoint?: readonly string[] | undefined;
    }
  | {
      readonly status: 'skipped';
      readonly objectId: string;
      readonly reason: SkipReason;
      readonly files: readonly FileReport[];
      readonly diagnostics?: NormalizationDiagnostics | undefined;
      readonly detail?: string | undefined;
    };

export interface ObjectProcessorDeps {
  source: PhotometrySource;
  parserChain: ParserChain;
  vocabulary: PassbandVocabulary;
  zeroPoints: ZeroPointTable;
  metadata: MetadataProvider;
  writer: LightCurveWriter;
  survey: string;
  unrecognizedLabelPolicy?: UnrecognizedLabelPolicy | undefined;
}

/**
 * Runs one object through read → parse → normalize → convert → metadata → write.
 */
export class ObjectProcessor {
  private readonly logger: Logger;
  private readonly policy: UnrecognizedLabelPolicy;

  constructor(private readonly deps: ObjectProcessorDeps) {
    this.logger = getLogger('object-processor');
    this.policy = deps.unrecognizedLabelPolicy ?? 'drop';
  }

  async processObject(objectId: string, entry: RegistryEntry): Promise<Result<ObjectOutcome, Error>> {
    const log = this.logger.child({ objectId });
    const { files, tables } = await this.readTables(objectId, entry.files, log);

    if (tables.length === 0) {
      log.warn('No photometry files could be parsed');
      return ok({ files, objectId, reason: 'no-files', status: 'skipped' });
    }

    const { diagnostics, observations } = normalizePassbands(tables, this.deps.vocabulary);
    log.debug(
      {
        labelsBeforeMapping: diagnostics.labelsBeforeMapping,
        labelsWithoutAlias: diagnostics.labelsWithoutAlias,
      },
      'Passband labels'
    );
    if (diagnostics.unrecognizedLabels.length > 0) {
      log.warn(
        { labels: diagnostics.unrecognizedLabels, rows: diagnostics.droppedUnrecognizedRows },
        'Unrecognized passband labels'
      );
      if (this.policy === 'skip-object') {
        return err(new UnrecognizedPassbandError(diagnostics.unrecognizedLabels));
      }
    }

    if (observations.length === 0) {
      log.warn('No observations left after passband normalization');
      return ok({ diagnostics, files, objectId, reason: 'no-usable-observations', status: 'skipped' });
    }

    const converted = convertToFlux(observations, entry.magSystem, this.deps.zeroPoints);
    if (converted.bandsWithoutZeroPoint.length > 0) {
      log.warn(
        { bands: converted.bandsWithoutZeroPoint, magSystem: entry.magSystem, rows: converted.droppedRows },
        'Passbands without a zero point'
      );
    }
    if (converted.observations.length === 0) {
      return ok({
        detail: `No ${entry.magSystem} zero point for ${converted.bandsWithoutZeroPoint.join(', ')}`,
        diagnostics,
        files,
        objectId,
        reason: 'no-usable-observations',
        status: 'skipped',
      });
    }

    const metadata = await this.deps.metadata.lookup(objectId, entry);
    if (metadata.isErr()) {
      log.warn({ provider: this.deps.metadata.name, reason: metadata.error.message }, 'Metadata lookup failed');
      return ok({
        detail: metadata.error.message,
        diagnostics,
        files,
        objectId,
        reason: 'metadata-lookup',
        status: 'skipped',
      });
    }

    const written = await this.deps.writer.write({
      metadata: metadata.value,
      objectId,
      observations: converted.observations,
      survey: this.deps.survey,
    });
    if (written.isErr()) {
      return err(written.error);
    }

    log.info({ observations: converted.observations.length, outputPath: written.value }, 'Light curve written');
    return ok({
      bandsWithoutZeroPoint: converted.bandsWithoutZeroPoint,
      diagnostics,
      files,
      objectId,
      observationCount: converted.observations.length,
      outputPath: written.value,
      status: 'emitted',
    });
  }

  private async readTables(
    objectId: string,
    fileNames: readonly string[],
    log: Logger
  ): Promise<{ files: FileReport[]; tables: CanonicalTable[] }> {
    const files: FileReport[] = [];
    const tables: CanonicalTable[] = [];

    for (const fileName of fileNames) {
      const read = await this.deps.source.read(objectId, fileName);
      if (read.isErr()) {
        log.warn({ fileName, reason: read.error.message }, 'Could not read photometry file');
        files.push({ fileName, reason: read.error.message, status: 'unreadable' });
        continue;
      }
      if (read.value === undefined) {
        log.debug({ fileName }, 'Photometry file not found');
        files.push({ fileName, status: 'missing' });
        continue;
      }

      const outcome = this.deps.parserChain.tryParse(read.value);
      if (outcome.status === 'unparsable') {
        log.warn({ attempts: outcome.attempts, fileName }, 'No parser could read photometry file');
        files.push({ attempts: outcome.attempts, fileName, status: 'unparsable' });
        continue;
      }

      files.push({ fileName, parser: outcome.parser, rows: outcome.table.length, status: 'parsed' });
      tables.push(outcome.table);
    }

    return { files, tables };
  }
}
