// Pure helpers for the process command

import type { UnrecognizedLabelPolicy, BatchObjectResult, BatchSummary } from '@lcforge/ingestion';
import type { z } from 'zod';

import type { CliEnv } from '../shared/env.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import type { ProcessCommandOptionsSchema } from '../shared/schemas.js';

export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

export type MetadataSource = ProcessCommandOptions['metadata'];

export interface ProcessHandlerParams {
  registryPath: string;
  rawDataDir: string;
  outputDir: string;
  metadataSource: MetadataSource;
  unrecognizedLabelPolicy: UnrecognizedLabelPolicy;
  /** Empty means every object in the registry. */
  objects: string[];
  timeoutMs: number;
}

/**
 * Flags win over the environment; the environment already carries the defaults.
 */
export function buildProcessParams(objects: string[], options: ProcessCommandOptions, env: CliEnv): ProcessHandlerParams {
  return {
    registryPath: options.registry ?? env.LCFORGE_REGISTRY_PATH,
    rawDataDir: options.rawDir ?? env.LCFORGE_RAW_DATA_DIR,
    outputDir: options.outDir ?? env.LCFORGE_OUTPUT_DIR,
    metadataSource: options.metadata,
    unrecognizedLabelPolicy: options.strictBands ? 'skip-object' : 'drop',
    objects,
    timeoutMs: options.timeout ?? env.LCFORGE_HTTP_TIMEOUT_MS,
  };
}

export interface ProcessedObjectSummary {
  objectId: string;
  status: BatchObjectResult['status'];
  outputPath?: string | undefined;
  observations?: number | undefined;
  reason?: string | undefined;
  unrecognizedLabels?: string[] | undefined;
}

export interface ProcessCommandResult {
  emitted: number;
  skipped: number;
  failed: number;
  objects: ProcessedObjectSummary[];
}

export function summarizeObject(result: BatchObjectResult): ProcessedObjectSummary {
  switch (result.status) {
    case 'emitted':
      return {
        objectId: result.objectId,
        status: result.status,
        outputPath: result.outputPath,
        observations: result.observationCount,
        unrecognizedLabels: unrecognizedOrUndefined(result.diagnostics.unrecognizedLabels),
      };
    case 'skipped':
      return {
        objectId: result.objectId,
        status: result.status,
        reason: result.detail === undefined ? result.reason : `${result.reason}: ${result.detail}`,
        unrecognizedLabels: unrecognizedOrUndefined(result.diagnostics?.unrecognizedLabels ?? []),
      };
    case 'failed':
      return { objectId: result.objectId, status: result.status, reason: result.error };
  }
}

function unrecognizedOrUndefined(labels: readonly string[]): string[] | undefined {
  return labels.length > 0 ? [...labels] : undefined;
}

export function buildProcessResult(summary: BatchSummary): ProcessCommandResult {
  return {
    emitted: summary.emitted,
    skipped: summary.skipped,
    failed: summary.failed,
    objects: summary.results.map(summarizeObject),
  };
}

/**
 * One line per object, then a totals line.
 */
export function formatProcessResult(result: ProcessCommandResult): string[] {
  const lines = result.objects.map((object) => {
    switch (object.status) {
      case 'emitted':
        return `✓ ${object.objectId}: ${object.observations ?? 0} observations → ${object.outputPath ?? ''}`;
      case 'skipped':
        return `- ${object.objectId}: skipped (${object.reason ?? 'unknown'})`;
      case 'failed':
        return `✗ ${object.objectId}: failed (${object.reason ?? 'unknown'})`;
    }
  });
  lines.push('', `Emitted: ${result.emitted}, skipped: ${result.skipped}, failed: ${result.failed}`);
  return lines;
}

/**
 * Skipped objects are an expected outcome; only failures make the run unsuccessful.
 */
export function exitCodeForResult(result: ProcessCommandResult): ExitCode {
  return result.failed > 0 ? ExitCodes.GENERAL_ERROR : ExitCodes.SUCCESS;
}
