/**
 * Text Processing Utilities for Extractive Summarization
 * Handles whitespace normalization, sentence splitting, tokenization,
 * stopword removal and term frequency weighting
 */

import { MIN_TOKEN_LENGTH } from '../shared/constants.js';
import type { FrequencyTable, StopwordLookup } from '../types/summarization-types.js';

// A boundary is whitespace after sentence-ending punctuation, or a newline run
const SENTENCE_BOUNDARY_RE = /(?<=[.!?؟…])\s+|\n+/;

// Digits, basic and extended Latin letters, and the Arabic block
const WORD_RE = /[0-9A-Za-zÀ-ÖØ-öø-ÿ؀-ۿ]+/g;

export class TextProcessor {
  /**
   * Collapse every whitespace run to a single space and trim the ends
   */
  normalizeWhitespace(text: string | null | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
  }

  /**
   * Length in code points, so a character outside the BMP counts once
   */
  charLength(text: string): number {
    return [...text].length;
  }

  /**
   * Split text into trimmed, non-empty sentences in order of appearance
   */
  splitSentences(text: string): string[] {
    return text
      .split(SENTENCE_BOUNDARY_RE)
      .map(sentence => sentence.trim())
      .filter(sentence => sentence.length > 0);
  }

  /**
   * Extract lowercase word tokens from a sentence
   */
  tokenize(text: string): string[] {
    return text.toLowerCase().match(WORD_RE) ?? [];
  }

  /**
   * Drop stopwords and tokens shorter than the minimum length
   */
  filterTokens(tokens: readonly string[], stopwords: StopwordLookup): string[] {
    return tokens.filter(token => token.length >= MIN_TOKEN_LENGTH && !stopwords.has(token));
  }

  /**
   * Count each term and divide by the highest count, so the most frequent
   * terms weigh 1. Returns an empty table for no tokens.
   */
  calculateTermFrequency(tokens: readonly string[]): FrequencyTable {
    const counts = tokens.reduce((acc, token) => {
      acc.set(token, (acc.get(token) || 0) + 1);
      return acc;
    }, new Map<string, number>());

    const maxCount = Array.from(counts.values()).reduce((max, count) => Math.max(max, count), 0);
    return new Map(
      Array.from(counts.entries(), ([term, count]) => [term, count / maxCount] as const)
    );
  }
}

export const textProcessor = new TextProcessor();
