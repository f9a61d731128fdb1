/**
 * Text normalization and stable keys for catalog lookups
 */

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(' ') : [];
}

/**
 * Key for an unordered drug pair. Identical for (a, b) and (b, a).
 */
export function pairKey(a: string, b: string): string {
  return sortPair(a, b).join('|');
}

export function sortPair(a: string, b: string): [string, string] {
  return a <= b ? [a, b] : [b, a];
}

/**
 * True when `phrase` occurs in `text` on word boundaries. Both sides are
 * expected to be normalized already.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!phrase) return false;
  return ` ${text} `.includes(` ${phrase} `);
}
