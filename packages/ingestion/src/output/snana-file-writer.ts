import fs from 'node:fs/promises';
import path from 'node:path';

import { wrapError } from '@lcforge/core';
import { getLogger } from '@lcforge/logger';
import { ok, type Result } from 'neverthrow';

import type { LightCurveRecord, LightCurveWriter } from './light-curve-writer.js';
import { formatSnanaLightCurve, snanaFileName } from './snana-format.js';

const logger = getLogger('snana-file-writer');

export function snanaOutputPath(outputDir: string, objectId: string): string {
  return path.join(outputDir, objectId, 'Photometry', snanaFileName(objectId));
}

/**
 * Writes `<outputDir>/<objectId>/Photometry/<objectId>.photometry.snana.dat`, replacing any previous file.
 */
export class SnanaFileWriter implements LightCurveWriter {
  constructor(private readonly outputDir: string) {}

  async write(record: LightCurveRecord): Promise<Result<string, Error>> {
    const filePath = snanaOutputPath(this.outputDir, record.objectId);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, formatSnanaLightCurve(record), 'utf8');
    } catch (error) {
      return wrapError(error, `Failed to write light curve for ${record.objectId}`);
    }
    logger.debug({ filePath, observations: record.observations.length }, 'Wrote light curve');
    return ok(filePath);
  }
}
