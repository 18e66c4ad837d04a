const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;

/**
 * Lenient numeric coercion: numbers pass through, numeric strings are parsed,
 * everything else (including NaN) is missing.
 */
export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? undefined : value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  const infinity = INFINITY_PATTERN.exec(trimmed);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  return undefined;
}

export function isNumericToken(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

/**
 * Text form of a cell; missing and blank cells become `fallback`.
 */
export function coerceLabel(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  const text = typeof value === 'string' ? value : String(value);
  return text.trim() === '' ? fallback : text;
}
