/**
 * Summarizer Configuration
 * Default summary options and stopword overrides, taken from the environment
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  DEFAULT_MAX_SENTENCES,
  DEFAULT_MIN_SENTENCE_LENGTH,
  DEFAULT_RATIO
} from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import type { ResolvedSummarizationOptions, StopwordOverrides } from '../types/summarization-types.js';

export interface SummarizerConfig {
  defaults: ResolvedSummarizationOptions;
  stopwords: StopwordOverrides;
  rootDir: string;
}

export const stopwordOverridesSchema = z.object({
  ar: z.array(z.string()).optional(),
  en: z.array(z.string()).optional()
}).strict();

const maxSentencesSchema = z.coerce.number().int().min(1);
const ratioSchema = z.coerce.number().gt(0).max(1);
const minSentenceLengthSchema = z.coerce.number().int().min(0);

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, schema: z.ZodNumber, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`Invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

function parseStopwords(json: string): StopwordOverrides {
  return stopwordOverridesSchema.parse(JSON.parse(json));
}

function loadStopwordOverrides(env: Env): StopwordOverrides {
  // Inline JSON takes precedence over a file
  const inline = env.SUMMARIZER_STOPWORDS;
  if (inline) {
    try {
      return parseStopwords(inline);
    } catch (error) {
      console.warn(`Ignoring invalid SUMMARIZER_STOPWORDS: ${errorMessage(error)}`);
    }
  }

  const configPath = env.SUMMARIZER_STOPWORDS_PATH;
  if (configPath) {
    try {
      return parseStopwords(readFileSync(configPath, 'utf8'));
    } catch (error) {
      console.warn(`Could not load stopwords from ${configPath}, using defaults: ${errorMessage(error)}`);
    }
  }

  return {};
}

export function loadSummarizerConfig(env: Env = process.env): SummarizerConfig {
  return {
    defaults: {
      maxSentences: readNumber(env, 'SUMMARIZER_MAX_SENTENCES', maxSentencesSchema, DEFAULT_MAX_SENTENCES),
      ratio: readNumber(env, 'SUMMARIZER_RATIO', ratioSchema, DEFAULT_RATIO),
      minSentenceLength: readNumber(env, 'SUMMARIZER_MIN_SENTENCE_LENGTH', minSentenceLengthSchema, DEFAULT_MIN_SENTENCE_LENGTH)
    },
    stopwords: loadStopwordOverrides(env),
    rootDir: path.resolve(env.SUMMARIZER_ROOT || process.cwd())
  };
}
