// Pure HTTP helpers, no side effects

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Resolve `endpoint` under `baseUrl`. An empty endpoint or "/" addresses the base URL itself;
 * undefined query values are left out.
 */
export function buildUrl(baseUrl: string, endpoint: string, query: QueryParams = {}): string {
  const base = baseUrl.replace(/\/+$/, '');
  const path = endpoint.replace(/^\/+/, '');
  const url = new URL(path === '' ? base : `${base}/${path}`);

  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

const REDACTED_PARAMS = new Set(['token', 'key', 'apikey', 'api_key', 'secret', 'password']);

/**
 * URL safe to log: credential-like query parameters are masked and long ADQL queries shortened.
 */
export function describeUrl(url: string, maxParamLength = 80): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  for (const [key, value] of [...parsed.searchParams]) {
    if (REDACTED_PARAMS.has(key.toLowerCase())) {
      parsed.searchParams.set(key, '***');
    } else if (value.length > maxParamLength) {
      parsed.searchParams.set(key, `${value.slice(0, maxParamLength)}…`);
    }
  }
  return parsed.toString();
}

export function encodeForm(form: Record<string, string>): string {
  return new URLSearchParams(form).toString();
}

/**
 * Abort errors from undici and from AbortSignal.timeout carry different names.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
