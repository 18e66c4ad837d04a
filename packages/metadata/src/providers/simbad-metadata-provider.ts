import type { MetadataProvider, ObjectMetadata } from '@lcforge/core';
import { getLogger, type Logger } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';

import type { IrsaDustApiClient } from '../irsa-dust/irsa-dust.api-client.js';
import type { SimbadApiClient } from '../simbad/simbad.api-client.js';

/**
 * Position and redshift from SIMBAD, reddening from IRSA DUST.
 *
 * A missing redshift is written as 0. A failed reddening lookup is logged and also
 * written as 0; only a failed SIMBAD lookup fails the object.
 */
export class SimbadMetadataProvider implements MetadataProvider {
  readonly name = 'simbad';
  private readonly logger: Logger;

  constructor(
    private readonly simbad: SimbadApiClient,
    private readonly dust: IrsaDustApiClient
  ) {
    this.logger = getLogger('simbad-metadata-provider');
  }

  async lookup(objectId: string): Promise<Result<ObjectMetadata, Error>> {
    const position = await this.simbad.queryPosition(objectId);
    if (position.isErr()) {
      return err(position.error);
    }

    const { dec, ra, redshift } = position.value;
    const reddening = await this.dust.getReddening(ra, dec);
    if (reddening.isErr()) {
      this.logger.warn({ objectId, reason: reddening.error.message }, 'Reddening lookup failed, using MWEBV 0');
    }

    return ok({
      dec,
      mwebv: reddening.isOk() ? reddening.value : 0,
      ra,
      redshift: redshift ?? 0,
    });
  }

  async close(): Promise<void> {
    await Promise.all([this.simbad.close(), this.dust.close()]);
  }
}
