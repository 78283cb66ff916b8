/**
 * Built-in stopword sets and override merging
 */

import { readFileSync } from 'fs';
import type { Language, StopwordLookup, StopwordOverrides, StopwordSets } from '../types/summarization-types.js';

const STOPWORDS_DIR = new URL('../../data/stopwords/', import.meta.url);

function loadWordList(language: Language): string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL(`${language}.json`, STOPWORDS_DIR), 'utf-8'));
  if (!Array.isArray(raw) || !raw.every((word): word is string => typeof word === 'string')) {
    throw new Error(`Stopword list for "${language}" must be a JSON array of strings`);
  }
  return raw;
}

/**
 * Read-only word set. The backing Set is never handed out, so neither the
 * defaults nor a caller's override can change once a Summarizer holds them.
 */
export class StopwordSet implements StopwordLookup {
  readonly #words: Set<string>;

  constructor(words: Iterable<string>) {
    this.#words = new Set(words);
    Object.freeze(this);
  }

  get size(): number {
    return this.#words.size;
  }

  has(word: string): boolean {
    return this.#words.has(word);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.#words.values();
  }
}

export function toStopwordSet(words: Iterable<string>): StopwordSet {
  return new StopwordSet(words);
}

export const DEFAULT_STOPWORDS: StopwordSets = Object.freeze({
  ar: toStopwordSet(loadWordList('ar')),
  en: toStopwordSet(loadWordList('en'))
});

/**
 * Merge per-language overrides over the defaults. A language with no
 * override, or an empty one, keeps its built-in set; supplied words are
 * lowercased.
 */
export function resolveStopwords(overrides: StopwordOverrides = {}): StopwordSets {
  const pick = (language: Language): StopwordLookup => {
    const words = Array.from(overrides[language] ?? [], word => word.toLowerCase());
    return words.length === 0 ? DEFAULT_STOPWORDS[language] : toStopwordSet(words);
  };
  return Object.freeze({ ar: pick('ar'), en: pick('en') });
}
