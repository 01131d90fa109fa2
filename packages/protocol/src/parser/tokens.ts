/**
 * Tokenizer helpers shared by the line parsers
 */

export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Parse a signed decimal integer token
 * @returns null for a missing or non-integer token
 */
export function parseInteger(token: string | undefined): number | null {
  if (token === undefined || !/^[+-]?\d+$/.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}
