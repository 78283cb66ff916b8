/**
 * Extractive Summarization Engine
 * Ranks sentences by mean term frequency and keeps the best ones in
 * document order
 */

import type {
  FrequencyTable,
  Language,
  ResolvedSummarizationOptions,
  SentenceScore,
  StopwordOverrides,
  StopwordSets,
  SummarizationOptions,
  SummaryResult
} from '../types/summarization-types.js';
import {
  DEFAULT_MAX_SENTENCES,
  DEFAULT_MIN_SENTENCE_LENGTH,
  DEFAULT_RATIO,
  SHORT_DOCUMENT_MAX_SENTENCES,
  SHORT_DOCUMENT_MIN_CHARS
} from '../shared/constants.js';
import { textProcessor } from './text-processor.js';
import { detectLanguage } from './language-detector.js';
import { resolveStopwords } from './stopwords.js';

export class Summarizer {
  private readonly stopwords: StopwordSets;

  constructor(stopwords: StopwordOverrides = {}) {
    this.stopwords = resolveStopwords(stopwords);
  }

  /**
   * Summarize a passage by selecting a subset of its sentences
   */
  summarize(text: string | null | undefined, options: SummarizationOptions = {}): SummaryResult {
    const { maxSentences, ratio, minSentenceLength } = this.resolveOptions(options);

    const cleaned = textProcessor.normalizeWhitespace(text);
    if (!cleaned) {
      return this.emptyResult(detectLanguage(text));
    }

    const language = detectLanguage(cleaned);
    const sentences = textProcessor.splitSentences(cleaned);
    if (sentences.length === 0) {
      return this.emptyResult(language);
    }

    // Too little text to be worth cutting down
    if (sentences.length <= SHORT_DOCUMENT_MAX_SENTENCES || textProcessor.charLength(cleaned) < SHORT_DOCUMENT_MIN_CHARS) {
      return {
        summary: cleaned,
        language,
        selectedIndices: sentences.map((_, index) => index),
        sentencesCount: sentences.length
      };
    }

    const stopwords = this.stopwords[language];
    const sentenceTokens = sentences.map(sentence =>
      textProcessor.filterTokens(textProcessor.tokenize(sentence), stopwords)
    );
    const k = this.targetCount(sentences.length, maxSentences, ratio);

    const allTokens = sentenceTokens.flat();
    const selectedIndices = allTokens.length === 0
      ? this.leadingIndices(k)
      : this.selectTopSentences(
          this.scoreSentences(sentences, sentenceTokens, textProcessor.calculateTermFrequency(allTokens), minSentenceLength),
          k
        );

    return {
      summary: selectedIndices.map(index => sentences[index]).join(' ').trim(),
      language,
      selectedIndices,
      sentencesCount: sentences.length
    };
  }

  /**
   * Score every sentence long enough to rank as the mean weight of its tokens
   */
  private scoreSentences(
    sentences: string[],
    sentenceTokens: string[][],
    termFreq: FrequencyTable,
    minSentenceLength: number
  ): SentenceScore[] {
    return sentences.flatMap((sentence, index) => {
      const tokens = sentenceTokens[index];
      if (textProcessor.charLength(sentence) < minSentenceLength || tokens.length === 0) {
        return [];
      }
      const total = tokens.reduce((sum, token) => sum + (termFreq.get(token) || 0), 0);
      return [{ index, score: total / tokens.length }];
    });
  }

  /**
   * Pick the k best scores and return their indices in document order.
   * Equal scores go to the earlier sentence.
   */
  private selectTopSentences(scores: SentenceScore[], k: number): number[] {
    if (scores.length === 0) {
      return this.leadingIndices(k);
    }

    return [...scores]
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, k)
      .map(s => s.index)
      .sort((a, b) => a - b);
  }

  private targetCount(sentenceCount: number, maxSentences: number, ratio: number): number {
    const byRatio = Math.ceil(sentenceCount * ratio);
    return Math.min(sentenceCount, Math.max(1, Math.min(maxSentences, byRatio)));
  }

  private leadingIndices(k: number): number[] {
    return Array.from({ length: k }, (_, index) => index);
  }

  private emptyResult(language: Language): SummaryResult {
    return {
      summary: '',
      language,
      selectedIndices: [],
      sentencesCount: 0
    };
  }

  /**
   * Fill in defaults and clamp out-of-range values instead of rejecting them
   */
  private resolveOptions(options: SummarizationOptions): ResolvedSummarizationOptions {
    const {
      maxSentences = DEFAULT_MAX_SENTENCES,
      ratio = DEFAULT_RATIO,
      minSentenceLength = DEFAULT_MIN_SENTENCE_LENGTH
    } = options;

    return {
      maxSentences: Number.isFinite(maxSentences) ? Math.max(1, Math.trunc(maxSentences)) : DEFAULT_MAX_SENTENCES,
      ratio: Number.isFinite(ratio) ? Math.min(1, Math.max(0, ratio)) : DEFAULT_RATIO,
      minSentenceLength: Number.isFinite(minSentenceLength) ? Math.max(0, minSentenceLength) : DEFAULT_MIN_SENTENCE_LENGTH
    };
  }
}

// Export singleton instance
export const summarizer = new Summarizer();
