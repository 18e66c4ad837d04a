export * from './errors/index.js';
export * from './types/observation.js';
export type * from './types/ports.js';
export * from './schemas/registry.js';
export * from './schemas/reference-data.js';
export * from './registry/registry-loader.js';
export * from './vocabulary/passband-vocabulary.js';
export * from './vocabulary/zero-points.js';
export { createRawFile, createTextFile } from './utils/raw-file.js';
export { getErrorMessage, isErrorWithMessage, toError, wrapError } from './utils/error-utils.js';
export { readValidatedJsonFile } from './utils/json-file.js';
