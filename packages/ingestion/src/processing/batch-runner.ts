import { getErrorMessage, type ObjectRegistry, type RegistryEntry } from '@lcforge/core';
import { getLogger } from '@lcforge/logger';
import type { Result } from 'neverthrow';

import type { ObjectOutcome } from './object-processor.js';

const logger = getLogger('batch-runner');

export type BatchObjectResult = ObjectOutcome | { readonly status: 'failed'; readonly objectId: string; readonly error: string };

export interface BatchSummary {
  readonly results: readonly BatchObjectResult[];
  readonly emitted: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface BatchOptions {
  /** Restrict the run to these object ids, in registry order. */
  only?: readonly string[] | undefined;
}

export interface ObjectHandler {
  processObject(objectId: string, entry: RegistryEntry): Promise<Result<ObjectOutcome, Error>>;
}

function selectObjects(registry: ObjectRegistry, only: readonly string[] | undefined): {
  selected: [string, RegistryEntry][];
  unknown: string[];
} {
  const entries = Object.entries(registry.objects);
  if (only === undefined || only.length === 0) {
    return { selected: entries, unknown: [] };
  }
  const wanted = new Set(only);
  return {
    selected: entries.filter(([objectId]) => wanted.has(objectId)),
    unknown: only.filter((objectId) => !Object.hasOwn(registry.objects, objectId)),
  };
}

/**
 * Process registry objects one at a time. A failure, returned or thrown, is recorded against
 * its object and the batch moves on.
 */
export async function runBatch(
  registry: ObjectRegistry,
  processor: ObjectHandler,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const { selected, unknown } = selectObjects(registry, options.only);
  const results: BatchObjectResult[] = unknown.map((objectId) => {
    logger.warn({ objectId }, 'Object is not in the registry');
    return { error: 'Object is not in the registry', objectId, status: 'failed' as const };
  });

  for (const [objectId, entry] of selected) {
    try {
      const result = await processor.processObject(objectId, entry);
      if (result.isOk()) {
        results.push(result.value);
      } else {
        logger.error({ error: result.error, objectId }, 'Object failed');
        results.push({ error: result.error.message, objectId, status: 'failed' });
      }
    } catch (error) {
      logger.error({ error, objectId }, 'Object failed unexpectedly');
      results.push({ error: getErrorMessage(error), objectId, status: 'failed' });
    }
  }

  return {
    emitted: results.filter((result) => result.status === 'emitted').length,
    failed: results.filter((result) => result.status === 'failed').length,
    results,
    skipped: results.filter((result) => result.status === 'skipped').length,
  };
}
