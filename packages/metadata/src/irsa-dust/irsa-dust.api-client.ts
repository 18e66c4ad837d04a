import { wrapError } from '@lcforge/core';
import { HttpClient, type HttpEffects } from '@lcforge/http';
import { getLogger } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';
import { parseStringPromise } from 'xml2js';

import { IrsaDustResponseSchema, type IrsaDustResponse } from './irsa-dust.schemas.js';

export const IRSA_DUST_URL = 'https://irsa.ipac.caltech.edu/cgi-bin/DUST/nph-dust';

const logger = getLogger('irsa-dust');

const LEADING_NUMBER = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/;

export interface IrsaDustClientConfig {
  baseUrl?: string | undefined;
  timeout?: number | undefined;
}

/**
 * E(B-V) at the reference pixel, Schlafly & Finkbeiner (2011) recalibration, from the reddening section.
 */
export function extractReddening(response: IrsaDustResponse): Result<number, Error> {
  if (response.results.status !== undefined && response.results.status !== 'ok') {
    const detail = response.results.message ? `: ${response.results.message}` : '';
    return err(new Error(`IRSA dust service returned status '${response.results.status}'${detail}`));
  }

  const section = response.results.result.find((result) => result.desc?.includes('E(B-V)'));
  const value = section?.statistics?.refPixelValueSandF;
  if (value === undefined) {
    return err(new Error('IRSA dust response has no E(B-V) reference pixel value'));
  }

  const match = LEADING_NUMBER.exec(value.trim());
  if (!match) {
    return err(new Error(`Cannot read E(B-V) from '${value}'`));
  }
  return ok(Number(match[0]));
}

export async function parseDustXml(xml: string): Promise<Result<IrsaDustResponse, Error>> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml, { explicitArray: false, mergeAttrs: true, trim: true });
  } catch (error) {
    return wrapError(error, 'Invalid IRSA dust XML');
  }

  const parsed = IrsaDustResponseSchema.safeParse(document);
  if (!parsed.success) {
    return err(new Error(`Unexpected IRSA dust document: ${parsed.error.issues[0]?.message ?? 'unknown'}`));
  }
  return ok(parsed.data);
}

/**
 * Galactic reddening from the IRSA DUST service.
 */
export class IrsaDustApiClient {
  private readonly http: HttpClient;

  constructor(config: IrsaDustClientConfig = {}, effects?: Partial<HttpEffects>) {
    this.http = new HttpClient(
      {
        baseUrl: config.baseUrl ?? IRSA_DUST_URL,
        defaultHeaders: { Accept: 'text/xml' },
        serviceName: 'IRSA DUST',
        timeout: config.timeout,
      },
      effects
    );
  }

  async getReddening(ra: number, dec: number): Promise<Result<number, Error>> {
    logger.debug({ dec, ra }, 'Querying IRSA dust');
    const body = await this.http.getText('', { query: { locstr: `${ra} ${dec} equ j2000`, regSize: '2.0' } });
    if (body.isErr()) {
      return err(body.error);
    }

    const document = await parseDustXml(body.value);
    return document.andThen(extractReddening);
  }

  close(): Promise<void> {
    return this.http.close();
  }
}
