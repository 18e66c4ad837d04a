import { HttpClient, type HttpEffects } from '@lcforge/http';
import { getLogger } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';

import { SimbadPositionSchema, SimbadTapResponseSchema, type SimbadPosition, type SimbadTapResponse } from './simbad.schemas.js';

export const SIMBAD_TAP_URL = 'https://simbad.cds.unistra.fr/simbad/sim-tap';

const logger = getLogger('simbad');

export interface SimbadClientConfig {
  baseUrl?: string | undefined;
  timeout?: number | undefined;
}

/**
 * SIMBAD stores supernova designations with a space after the prefix ("SN 1994D").
 */
export function toSimbadIdentifier(objectId: string): string {
  const designation = /^(SN|AT)\s*(\d{4}[A-Za-z]*)$/i.exec(objectId.trim());
  if (designation?.[1] && designation[2]) {
    return `${designation[1].toUpperCase()} ${designation[2]}`;
  }
  return objectId.trim();
}

export function buildPositionQuery(identifier: string): string {
  const literal = identifier.replace(/'/g, "''");
  return [
    'SELECT TOP 1 basic.ra, basic.dec, basic.rvz_redshift',
    'FROM basic JOIN ident ON ident.oidref = basic.oid',
    `WHERE ident.id = '${literal}'`,
  ].join(' ');
}

/**
 * Pick ra, dec and rvz_redshift out of the first row by column name. `undefined` when there are no rows.
 */
export function readPositionRow(response: SimbadTapResponse): Result<SimbadPosition | undefined, Error> {
  const [row] = response.data;
  if (row === undefined) {
    return ok(undefined);
  }

  const column = (name: string) => {
    const index = response.metadata.findIndex((descriptor) => descriptor.name.toLowerCase() === name);
    return index >= 0 ? row[index] : undefined;
  };

  const parsed = SimbadPositionSchema.safeParse({
    dec: column('dec'),
    ra: column('ra'),
    redshift: column('rvz_redshift') ?? null,
  });
  if (!parsed.success) {
    return err(new Error(`Unexpected SIMBAD row: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`));
  }
  return ok(parsed.data);
}

/**
 * Position and redshift lookups against the SIMBAD TAP synchronous endpoint.
 */
export class SimbadApiClient {
  private readonly http: HttpClient;

  constructor(config: SimbadClientConfig = {}, effects?: Partial<HttpEffects>) {
    this.http = new HttpClient(
      {
        baseUrl: config.baseUrl ?? SIMBAD_TAP_URL,
        serviceName: 'SIMBAD',
        timeout: config.timeout,
      },
      effects
    );
  }

  async queryPosition(objectId: string): Promise<Result<SimbadPosition, Error>> {
    const identifier = toSimbadIdentifier(objectId);
    logger.debug({ identifier, objectId }, 'Querying SIMBAD');

    const response = await this.http.postForm(
      '/sync',
      { FORMAT: 'json', LANG: 'ADQL', QUERY: buildPositionQuery(identifier), REQUEST: 'doQuery' },
      SimbadTapResponseSchema
    );

    return response.andThen(readPositionRow).andThen((position) =>
      position === undefined ? err(new Error(`SIMBAD has no object named '${identifier}'`)) : ok(position)
    );
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
