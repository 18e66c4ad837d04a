import path from 'node:path';

import type { RawFile } from '../types/observation.js';

const decoder = new TextDecoder('utf-8');

export function createRawFile(name: string, bytes: Uint8Array): RawFile {
  const copy = Uint8Array.from(bytes);
  return Object.freeze({
    name,
    extension: path.extname(name).replace(/^\./, '').toLowerCase(),
    bytes: copy,
    text: decoder.decode(copy).replace(/^\uFEFF/, ''),
  });
}

export function createTextFile(name: string, text: string): RawFile {
  return createRawFile(name, new TextEncoder().encode(text));
}
