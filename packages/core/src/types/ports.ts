import type { Result } from 'neverthrow';

import type { ObjectMetadata, RegistryEntry } from '../schemas/registry.js';

/**
 * Source of position, redshift and Galactic extinction for an object.
 * Called once per object, after its photometry has been converted.
 */
export interface MetadataProvider {
  readonly name: string;
  lookup(objectId: string, entry: RegistryEntry): Promise<Result<ObjectMetadata, Error>>;
}
