import { describe, it, expect } from 'vitest';

import { detectLanguage } from './language-detector.js';

describe('detectLanguage', () => {
  it('detects Arabic text', () => {
    expect(detectLanguage('تعاني المدن الساحلية من ارتفاع البحر')).toBe('ar');
  });

  it('detects Arabic from a single character in otherwise English text', () => {
    expect(detectLanguage('Mostly English text with one letter ب inside')).toBe('ar');
  });

  it('treats the Arabic question mark as Arabic', () => {
    expect(detectLanguage('؟')).toBe('ar');
  });

  it('falls back to English without Arabic characters', () => {
    expect(detectLanguage('Plain English. Ünïcödé Latin too.')).toBe('en');
    expect(detectLanguage('... !!!')).toBe('en');
  });

  it('returns English for empty and missing input', () => {
    expect(detectLanguage('')).toBe('en');
    expect(detectLanguage(null)).toBe('en');
    expect(detectLanguage(undefined)).toBe('en');
  });
});
