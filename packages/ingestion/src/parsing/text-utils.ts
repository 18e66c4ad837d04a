export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function firstNonEmptyLine(text: string): string | undefined {
  return splitLines(text).find((line) => line.trim() !== '');
}

/**
 * Trim whitespace, then any run of single quotes, then any run of double quotes.
 */
export function stripQuotes(value: string): string {
  return value
    .trim()
    .replace(/^'+|'+$/g, '')
    .replace(/^"+|"+$/g, '');
}
