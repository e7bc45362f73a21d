import { describe, it, expect } from 'vitest';
import { normalizeLanguageCode } from './language';

describe('normalizeLanguageCode', () => {
  it('should map three-letter codes to their two-letter form', () => {
    expect(normalizeLanguageCode('eng')).toBe('en');
    expect(normalizeLanguageCode('fre')).toBe('fr');
    expect(normalizeLanguageCode('ger')).toBe('de');
    expect(normalizeLanguageCode('chi')).toBe('zh');
    expect(normalizeLanguageCode('swe')).toBe('sv');
  });

  it('should fall back to the first two letters of unknown three-letter codes', () => {
    expect(normalizeLanguageCode('hun')).toBe('hu');
  });

  it('should lower-case and trim the input', () => {
    expect(normalizeLanguageCode(' EN ')).toBe('en');
    expect(normalizeLanguageCode('SPA')).toBe('es');
  });

  it('should return undefined for empty values', () => {
    expect(normalizeLanguageCode(undefined)).toBeUndefined();
    expect(normalizeLanguageCode(null)).toBeUndefined();
    expect(normalizeLanguageCode('  ')).toBeUndefined();
  });

  it('should keep two-letter codes as they are', () => {
    expect(normalizeLanguageCode('pt')).toBe('pt');
  });
});
