import type { Language } from '../types/summarization-types.js';

const ARABIC_CHAR_RE = /[؀-ۿ]/;

/**
 * Any character from the Arabic block marks the text as Arabic; everything
 * else, empty input included, is treated as English.
 */
export function detectLanguage(text: string | null | undefined): Language {
  return ARABIC_CHAR_RE.test(text ?? '') ? 'ar' : 'en';
}
