// src/canon/normalize.ts
// Name keys used for every canonical lookup.

/**
 * Lookup key for a name: Unicode NFC, trimmed, lowercased, inner
 * whitespace collapsed to single spaces.
 *
 * @example normalizeKey('  Baba\tYaga ') === 'baba yaga'
 */
export function normalizeKey(text: string): string {
  return text.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Display form of a surface name: NFC, trimmed, inner whitespace collapsed. */
export function cleanName(text: string): string {
  return text.normalize('NFC').trim().replace(/\s+/g, ' ');
}
