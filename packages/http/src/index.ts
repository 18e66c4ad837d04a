export { HttpClient } from './client.js';
export { HttpError, ResponseValidationError, type HttpClientConfig, type HttpRequestOptions } from './types.js';
export { buildUrl, describeUrl, type QueryParams } from './core/http-utils.js';
export type { HttpEffects } from './core/types.js';
