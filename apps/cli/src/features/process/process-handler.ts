import {
  checkZeroPointCoverage,
  loadObjectRegistry,
  loadPassbandVocabulary,
  loadZeroPointTable,
  type ConfigurationError,
  type MetadataProvider,
  type ObjectRegistry,
  type PassbandVocabulary,
  type ZeroPointTable,
} from '@lcforge/core';
import {
  LocalPhotometryArchive,
  ObjectProcessor,
  ParserChain,
  runBatch,
  SnanaFileWriter,
  type BatchSummary,
} from '@lcforge/ingestion';
import { getLogger } from '@lcforge/logger';
import { IrsaDustApiClient, RegistryMetadataProvider, SimbadApiClient, SimbadMetadataProvider } from '@lcforge/metadata';
import { err, ok, type Result } from 'neverthrow';

import type { MetadataSource, ProcessHandlerParams } from './process-utils.js';

const logger = getLogger('ProcessHandler');

export interface MetadataProviderHandle {
  provider: MetadataProvider;
  close(): Promise<void>;
}

export function openMetadataProvider(source: MetadataSource, timeoutMs: number): MetadataProviderHandle {
  if (source === 'registry') {
    return { provider: new RegistryMetadataProvider(), close: () => Promise.resolve() };
  }
  const provider = new SimbadMetadataProvider(
    new SimbadApiClient({ timeout: timeoutMs }),
    new IrsaDustApiClient({ timeout: timeoutMs })
  );
  return { provider, close: () => provider.close() };
}

export interface ProcessHandlerDeps {
  loadRegistry(filePath: string): Promise<Result<ObjectRegistry, ConfigurationError>>;
  loadVocabulary(): Promise<Result<PassbandVocabulary, ConfigurationError>>;
  loadZeroPoints(): Promise<Result<ZeroPointTable, ConfigurationError>>;
  openMetadataProvider(source: MetadataSource, timeoutMs: number): MetadataProviderHandle;
}

export const defaultProcessHandlerDeps: ProcessHandlerDeps = {
  loadRegistry: (filePath) => loadObjectRegistry(filePath),
  loadVocabulary: () => loadPassbandVocabulary(),
  loadZeroPoints: () => loadZeroPointTable(),
  openMetadataProvider,
};

/**
 * Process handler - loads configuration, wires the pipeline and runs the batch.
 * Only configuration problems come back as errors; per-object trouble is in the summary.
 */
export class ProcessHandler {
  constructor(private readonly deps: ProcessHandlerDeps = defaultProcessHandlerDeps) {}

  async execute(params: ProcessHandlerParams): Promise<Result<BatchSummary, ConfigurationError>> {
    const registry = await this.deps.loadRegistry(params.registryPath);
    if (registry.isErr()) {
      return err(registry.error);
    }
    const vocabulary = await this.deps.loadVocabulary();
    if (vocabulary.isErr()) {
      return err(vocabulary.error);
    }
    const zeroPoints = await this.deps.loadZeroPoints();
    if (zeroPoints.isErr()) {
      return err(zeroPoints.error);
    }

    const magSystems = Object.values(registry.value.objects).map((entry) => entry.magSystem);
    const coverage = checkZeroPointCoverage(zeroPoints.value, vocabulary.value, magSystems);
    if (coverage.isErr()) {
      return err(coverage.error);
    }
    for (const { bandsWithoutZeroPoint, magSystem } of coverage.value) {
      if (bandsWithoutZeroPoint.length > 0) {
        logger.warn(
          { magSystem, missing: bandsWithoutZeroPoint.length },
          'Some vocabulary passbands have no zero point; their rows will be dropped'
        );
      }
    }

    logger.info(
      {
        metadata: params.metadataSource,
        objects: params.objects.length > 0 ? params.objects.length : Object.keys(registry.value.objects).length,
        outputDir: params.outputDir,
        rawDataDir: params.rawDataDir,
      },
      'Starting batch'
    );

    const metadata = this.deps.openMetadataProvider(params.metadataSource, params.timeoutMs);
    const processor = new ObjectProcessor({
      metadata: metadata.provider,
      parserChain: new ParserChain(),
      source: new LocalPhotometryArchive(params.rawDataDir),
      survey: registry.value.survey,
      unrecognizedLabelPolicy: params.unrecognizedLabelPolicy,
      vocabulary: vocabulary.value,
      writer: new SnanaFileWriter(params.outputDir),
      zeroPoints: zeroPoints.value,
    });

    try {
      const summary = await runBatch(registry.value, processor, { only: params.objects });
      logger.info({ emitted: summary.emitted, failed: summary.failed, skipped: summary.skipped }, 'Batch finished');
      return ok(summary);
    } finally {
      await metadata.close();
    }
  }
}
