import type { MetadataProvider, ObjectMetadata, RegistryEntry } from '@lcforge/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Metadata copied from the registry entry; no network access.
 */
export class RegistryMetadataProvider implements MetadataProvider {
  readonly name = 'registry';

  lookup(objectId: string, entry: RegistryEntry): Promise<Result<ObjectMetadata, Error>> {
    if (entry.metadata === undefined) {
      return Promise.resolve(err(new Error(`Registry entry for ${objectId} has no metadata`)));
    }
    return Promise.resolve(ok(entry.metadata));
  }
}
