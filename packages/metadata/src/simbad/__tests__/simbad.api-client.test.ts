import { HttpError } from '@lcforge/http';
import { describe, expect, it, vi } from 'vitest';

import { jsonResponse, simbadRow, textResponse } from '../../shared/test-utils/responses.js';
import { buildPositionQuery, readPositionRow, SimbadApiClient, toSimbadIdentifier } from '../simbad.api-client.js';

const BASE_URL = 'https://simbad.example.org/tap';

describe('toSimbadIdentifier', () => {
  it('inserts the space SIMBAD uses after supernova prefixes', () => {
    expect(toSimbadIdentifier('SN1994D')).toBe('SN 1994D');
    expect(toSimbadIdentifier('sn2011fe')).toBe('SN 2011fe');
    expect(toSimbadIdentifier('SN 1987A')).toBe('SN 1987A');
  });

  it('leaves other names alone', () => {
    expect(toSimbadIdentifier(' M 101 ')).toBe('M 101');
  });
});

describe('buildPositionQuery', () => {
  it('selects position and redshift for one identifier', () => {
    expect(buildPositionQuery('SN 1994D')).toBe(
      "SELECT TOP 1 basic.ra, basic.dec, basic.rvz_redshift FROM basic JOIN ident ON ident.oidref = basic.oid WHERE ident.id = 'SN 1994D'"
    );
  });

  it('escapes quotes in the identifier', () => {
    expect(buildPositionQuery("O'Neil 1")).toContain("WHERE ident.id = 'O''Neil 1'");
  });
});

describe('readPositionRow', () => {
  it('reads columns by name in any order', () => {
    const response = { data: [[0.0015, 10, 20]], metadata: [{ name: 'rvz_redshift' }, { name: 'RA' }, { name: 'dec' }] };

    expect(readPositionRow(response)._unsafeUnwrap()).toEqual({ dec: 20, ra: 10, redshift: 0.0015 });
  });

  it('returns undefined for an empty result', () => {
    expect(readPositionRow({ data: [], metadata: [{ name: 'ra' }] })._unsafeUnwrap()).toBeUndefined();
  });

  it('rejects rows without a usable position', () => {
    const response = { data: [['x', 20, null]], metadata: [{ name: 'ra' }, { name: 'dec' }, { name: 'rvz_redshift' }] };

    expect(readPositionRow(response).isErr()).toBe(true);
  });
});

describe('SimbadApiClient', () => {
  it('posts an ADQL query to the sync endpoint', async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse(simbadRow(188.5, 7.7, null)));
    const client = new SimbadApiClient({ baseUrl: BASE_URL }, { fetch: mockFetch, log: vi.fn() });

    const result = await client.queryPosition('SN1994D');

    expect(result._unsafeUnwrap()).toEqual({ dec: 7.7, ra: 188.5, redshift: null });
    expect(mockFetch).toHaveBeenCalledWith(
      `${BASE_URL}/sync`,
      expect.objectContaining({
        body: expect.stringContaining('REQUEST=doQuery') as unknown,
        method: 'POST',
      })
    );
  });

  it('fails when SIMBAD does not know the object', async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse({ data: [], metadata: [] }));
    const client = new SimbadApiClient({ baseUrl: BASE_URL }, { fetch: mockFetch, log: vi.fn() });

    const result = await client.queryPosition('SN2099A');

    expect(result._unsafeUnwrapErr().message).toBe("SIMBAD has no object named 'SN 2099A'");
  });

  it('does not retry a failed request', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('unavailable', 503));
    const client = new SimbadApiClient({ baseUrl: BASE_URL }, { fetch: mockFetch, log: vi.fn() });

    const result = await client.queryPosition('SN1994D');

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(HttpError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
