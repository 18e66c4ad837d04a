/**
 * Side effects the client performs, injectable for tests.
 */
export interface HttpEffects {
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
