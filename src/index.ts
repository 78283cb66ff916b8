export { Summarizer, summarizer } from './tools/summarizer.js';
export { TextProcessor, textProcessor } from './tools/text-processor.js';
export { detectLanguage } from './tools/language-detector.js';
export { DEFAULT_STOPWORDS, StopwordSet, resolveStopwords, toStopwordSet } from './tools/stopwords.js';
export { createSummarizationTools, formatCompression } from './tools/summarization-tools.js';
export { registerTool, registerTools } from './tools/registry.js';
export type { ToolDefinition } from './tools/registry.js';
export { loadSummarizerConfig } from './config/summarizer-config.js';
export type { SummarizerConfig } from './config/summarizer-config.js';
export type {
  FrequencyTable,
  Language,
  SentenceScore,
  StopwordLookup,
  StopwordOverrides,
  StopwordSets,
  SummarizationOptions,
  SummaryResult
} from './types/summarization-types.js';
