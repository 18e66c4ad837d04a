import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { ConfigurationError } from '../errors/index.js';

import { getErrorMessage } from './error-utils.js';

/**
 * Read a JSON file and validate it. Every failure becomes a ConfigurationError naming the file.
 */
export async function readValidatedJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Result<T, ConfigurationError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8')) as unknown;
  } catch (error) {
    return err(new ConfigurationError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, { filePath }));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(new ConfigurationError(`Invalid ${filePath}:\n${issues.join('\n')}`, { filePath }));
  }
  return ok(parsed.data);
}
