import type { Result } from 'neverthrow';

import type { ConfigurationError } from '../errors/index.js';
import { ObjectRegistrySchema, type ObjectRegistry } from '../schemas/registry.js';
import { readValidatedJsonFile } from '../utils/json-file.js';

/**
 * Load the registry mapping each object id to its source files and magnitude system.
 */
export async function loadObjectRegistry(filePath: string): Promise<Result<ObjectRegistry, ConfigurationError>> {
  return readValidatedJsonFile(filePath, ObjectRegistrySchema);
}
