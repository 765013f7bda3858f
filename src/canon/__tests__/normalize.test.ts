import { describe, it, expect } from 'vitest';
import { cleanName, normalizeKey } from '../normalize.js';

describe('normalizeKey', () => {
  it('trims, lowercases and collapses inner whitespace', () => {
    expect(normalizeKey('  Baba\tYaga ')).toBe('baba yaga');
    expect(normalizeKey('THE   Crone')).toBe('the crone');
  });

  it('composes decomposed characters', () => {
    expect(normalizeKey('José')).toBe(normalizeKey('José'));
  });

  it('returns an empty key for blank names', () => {
    expect(normalizeKey(' \n\t ')).toBe('');
  });
});

describe('cleanName', () => {
  it('keeps case but tidies whitespace', () => {
    expect(cleanName('  Baba \n Yaga  ')).toBe('Baba Yaga');
  });
});
