import fs from 'node:fs/promises';
import path from 'node:path';

import { createRawFile, wrapError, type RawFile } from '@lcforge/core';
import { ok, type Result } from 'neverthrow';

export interface PhotometrySource {
  /** Read one declared file of an object; `undefined` when it does not exist. */
  read(objectId: string, fileName: string): Promise<Result<RawFile | undefined, Error>>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Local archive laid out as `<rootDir>/<objectId>/Photometry/<fileName>`. Files are only read.
 */
export class LocalPhotometryArchive implements PhotometrySource {
  constructor(private readonly rootDir: string) {}

  filePath(objectId: string, fileName: string): string {
    return path.join(this.rootDir, objectId, 'Photometry', fileName);
  }

  async read(objectId: string, fileName: string): Promise<Result<RawFile | undefined, Error>> {
    const filePath = this.filePath(objectId, fileName);
    try {
      const bytes = await fs.readFile(filePath);
      return ok(createRawFile(fileName, bytes));
    } catch (error) {
      if (isMissingFileError(error)) {
        return ok(undefined);
      }
      return wrapError(error, `Failed to read ${filePath}`);
    }
  }
}
