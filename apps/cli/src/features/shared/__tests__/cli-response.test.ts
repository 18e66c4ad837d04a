import { describe, expect, it } from 'vitest';

import { createErrorResponse, createSuccessResponse } from '../cli-response.js';
import { ExitCodes, exitCodeToErrorCode } from '../exit-codes.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('cli-response', () => {
  it('wraps data in a success envelope', () => {
    expect(createSuccessResponse('process', { emitted: 2 }, NOW)).toEqual({
      command: 'process',
      data: { emitted: 2 },
      success: true,
      timestamp: '2024-03-01T12:00:00.000Z',
    });
  });

  it('wraps errors with their code', () => {
    const response = createErrorResponse('process', new Error('Invalid registry'), 'CONFIG_ERROR', NOW);

    expect(response.success).toBe(false);
    expect(response.error?.code).toBe('CONFIG_ERROR');
    expect(response.error?.message).toBe('Invalid registry');
  });

  it('maps exit codes to error codes', () => {
    expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
    expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
  });
});
