const MAX_DEPTH = 5;

/**
 * Convert a log context into plain JSON data.
 *
 * Errors keep name, message and any `code`; byte arrays are summarized by length;
 * Sets become arrays and Maps objects; bigint becomes a string. Repeated references
 * become '[Circular]' and anything nested deeper than MAX_DEPTH becomes '[Truncated]'.
 */
export function toLoggableContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const ancestors = new WeakSet<object>();
  for (const [key, value] of Object.entries(context)) {
    result[key] = toLoggable(value, ancestors, 0);
  }
  return result;
}

function toLoggable(value: unknown, ancestors: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function' || typeof value === 'symbol') return String(value);
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (typeof value !== 'object' || value === null) return value;

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
  if (ancestors.has(value)) return '[Circular]';
  if (depth >= MAX_DEPTH) return '[Truncated]';

  ancestors.add(value);
  try {
    if (value instanceof Error) {
      const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
      return { name: value.name, message: value.message, ...(code ? { code } : {}), stack: value.stack };
    }
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => toLoggable(item, ancestors, depth + 1));
    }
    const entries = value instanceof Map ? [...value.entries()] : Object.entries(value);
    const plain: Record<string, unknown> = {};
    for (const [key, item] of entries) {
      plain[String(key)] = toLoggable(item, ancestors, depth + 1);
    }
    return plain;
  } finally {
    ancestors.delete(value);
  }
}
