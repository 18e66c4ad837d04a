import { describe, expect, it, vi } from 'vitest';

import { DUST_XML, textResponse } from '../../shared/test-utils/responses.js';
import { extractReddening, IrsaDustApiClient, parseDustXml } from '../irsa-dust.api-client.js';

describe('parseDustXml and extractReddening', () => {
  it('reads the reference-pixel E(B-V) from the reddening section', async () => {
    const document = (await parseDustXml(DUST_XML))._unsafeUnwrap();

    expect(document.results.result).toHaveLength(2);
    expect(extractReddening(document)._unsafeUnwrap()).toBe(0.0197);
  });

  it('accepts a document with a single result element', async () => {
    const xml = `<results status="ok"><result><desc>E(B-V) Reddening</desc><statistics><refPixelValueSandF>0.05 (mag)</refPixelValueSandF></statistics></result></results>`;

    const document = (await parseDustXml(xml))._unsafeUnwrap();

    expect(extractReddening(document)._unsafeUnwrap()).toBe(0.05);
  });

  it('reports an error status from the service', async () => {
    const document = (await parseDustXml('<results status="error"><message>Invalid location</message></results>'))._unsafeUnwrap();

    expect(extractReddening(document)._unsafeUnwrapErr().message).toBe(
      "IRSA dust service returned status 'error': Invalid location"
    );
  });

  it('reports a missing reddening section', async () => {
    const document = (await parseDustXml('<results status="ok"><result><desc>Temperature</desc></result></results>'))._unsafeUnwrap();

    expect(extractReddening(document)._unsafeUnwrapErr().message).toBe(
      'IRSA dust response has no E(B-V) reference pixel value'
    );
  });

  it('rejects malformed XML', async () => {
    const result = await parseDustXml('<results status="ok">');

    expect(result._unsafeUnwrapErr().message).toContain('Invalid IRSA dust XML');
  });
});

describe('IrsaDustApiClient', () => {
  it('queries by J2000 position and returns E(B-V)', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse(DUST_XML));
    const client = new IrsaDustApiClient(
      { baseUrl: 'https://dust.example.org/nph-dust' },
      { fetch: mockFetch, log: vi.fn() }
    );

    const result = await client.getReddening(188.5, 7.7);

    expect(result._unsafeUnwrap()).toBe(0.0197);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://dust.example.org/nph-dust?locstr=188.5+7.7+equ+j2000&regSize=2.0',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('passes HTTP failures through', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('down', 500));
    const client = new IrsaDustApiClient({ baseUrl: 'https://dust.example.org/nph-dust' }, { fetch: mockFetch, log: vi.fn() });

    expect((await client.getReddening(1, 2)).isErr()).toBe(true);
  });
});
