import { describe, expect, it } from 'vitest';

import { BandLabelsSchema, ProcessCommandOptionsSchema } from '../schemas.js';

describe('ProcessCommandOptionsSchema', () => {
  it('defaults the metadata source to simbad', () => {
    expect(ProcessCommandOptionsSchema.parse({})).toEqual({ metadata: 'simbad' });
  });

  it('coerces the timeout from its string form', () => {
    expect(ProcessCommandOptionsSchema.parse({ timeout: '1500' }).timeout).toBe(1500);
  });

  it('rejects unknown metadata sources', () => {
    const result = ProcessCommandOptionsSchema.safeParse({ metadata: 'ned' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--metadata must be either "simbad" or "registry"');
  });

  it('rejects unknown log levels', () => {
    const result = ProcessCommandOptionsSchema.safeParse({ logLevel: 'loud' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--log-level must be one of: trace, debug, info, warn, error');
  });
});

describe('BandLabelsSchema', () => {
  it('needs at least one label', () => {
    expect(BandLabelsSchema.safeParse([]).error?.issues[0]?.message).toBe('At least one band label is required');
  });
});
