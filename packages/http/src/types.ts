import type { QueryParams } from './core/http-utils.js';

export interface HttpClientConfig {
  baseUrl: string;
  /** Used in log categories and error messages. */
  serviceName: string;
  defaultHeaders?: Record<string, string> | undefined;
  /** Milliseconds before a request is aborted. */
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  headers?: Record<string, string> | undefined;
  query?: QueryParams | undefined;
  timeout?: number | undefined;
}

/**
 * The service answered with a non-2xx status.
 */
export class HttpError extends Error {
  constructor(
    readonly serviceName: string,
    readonly statusCode: number,
    readonly responseBody: string
  ) {
    super(`${serviceName} returned HTTP ${statusCode}: ${responseBody.slice(0, 200)}`);
    this.name = 'HttpError';
  }
}

/**
 * The service answered 2xx but the body did not match the expected schema.
 */
export class ResponseValidationError extends Error {
  constructor(
    readonly serviceName: string,
    readonly endpoint: string,
    readonly issues: readonly { message: string; path: string }[],
    readonly payloadExcerpt: string
  ) {
    super(
      `Unexpected ${serviceName} response from ${endpoint}: ${issues
        .slice(0, 5)
        .map((issue) => `${issue.path || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ResponseValidationError';
  }
}
