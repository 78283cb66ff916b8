/**
 * Type definitions for extractive summarization
 */

export type Language = 'ar' | 'en';

export interface SummarizationOptions {
  maxSentences?: number;      // Upper bound on selected sentences
  ratio?: number;             // Share of all sentences to keep, in (0, 1]
  minSentenceLength?: number; // Characters a sentence needs to be ranked
}

export type ResolvedSummarizationOptions = Required<SummarizationOptions>;

export interface SummaryResult {
  summary: string;
  language: Language;
  selectedIndices: number[];
  sentencesCount: number;
}

export interface StopwordLookup extends Iterable<string> {
  readonly size: number;
  has(word: string): boolean;
}

/**
 * Read-only stopword sets keyed by language. Partial overrides are merged
 * over the built-in defaults.
 */
export type StopwordSets = Readonly<Record<Language, StopwordLookup>>;

export type StopwordOverrides = Partial<Record<Language, Iterable<string>>>;

export interface SentenceScore {
  index: number;
  score: number;
}

export type FrequencyTable = ReadonlyMap<string, number>;
