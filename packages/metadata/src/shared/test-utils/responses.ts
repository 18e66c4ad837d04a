import { vi } from 'vitest';

export const DUST_XML = `<?xml version="1.0"?>
<results status="ok">
  <input>
    <locstr>188.5 7.7 equ j2000</locstr>
    <regSize>2.0 (deg)</regSize>
  </input>
  <result>
    <desc>E(B-V) Reddening</desc>
    <statistics>
      <refPixelValueSFD>  0.0229 (mag)</refPixelValueSFD>
      <refPixelValueSandF>  0.0197 (mag)</refPixelValueSandF>
    </statistics>
  </result>
  <result>
    <desc>100 Micron Emission</desc>
    <statistics>
      <refPixelValueSandF>1.5 (MJy/sr)</refPixelValueSandF>
    </statistics>
  </result>
</results>`;

export function jsonResponse(payload: unknown) {
  return { json: () => Promise.resolve(payload), ok: true, status: 200 };
}

export function textResponse(body: string, status = 200) {
  return { ok: status < 400, status, text: () => Promise.resolve(body) };
}

export function simbadRow(ra: number, dec: number, redshift: number | null) {
  return {
    data: [[ra, dec, redshift]],
    metadata: [{ name: 'ra' }, { name: 'dec' }, { name: 'rvz_redshift' }],
  };
}

/**
 * Fetch stand-in answering by URL prefix.
 */
export function routeFetch(routes: Record<string, unknown>) {
  const mockFetch = vi.fn();
  mockFetch.mockImplementation((url: string) => {
    const match = Object.entries(routes).find(([prefix]) => url.startsWith(prefix));
    return match ? Promise.resolve(match[1]) : Promise.reject(new Error(`No route for ${url}`));
  });
  return mockFetch;
}
