/**
 * MCP Tool Definitions for Extractive Summarization
 * Summarize inline text or a text/Markdown file
 */

import { z } from 'zod';
import * as fs from 'fs/promises';
import * as path from 'path';
import matter from 'gray-matter';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDefinition } from './registry.js';
import { Summarizer } from './summarizer.js';
import { textProcessor } from './text-processor.js';
import type { SummarizerConfig } from '../config/summarizer-config.js';
import { errorMessage } from '../shared/errors.js';
import type { SummarizationOptions, SummaryResult } from '../types/summarization-types.js';

const optionShape = {
  maxSentences: z.number().int().min(1).optional().describe('Maximum sentences in the summary'),
  ratio: z.number().gt(0).max(1).optional().describe('Share of sentences to keep, in (0, 1]'),
  minSentenceLength: z.number().int().min(0).optional().describe('Minimum characters for a sentence to be ranked')
};

const summarizeTextInput = z.object({
  text: z.string().describe('Text to summarize'),
  ...optionShape
});

const summarizeFileInput = z.object({
  file: z.string().describe('Path of a UTF-8 text or Markdown file'),
  includeMetadata: z.boolean().default(true).describe('Include front matter title, date and tags'),
  ...optionShape
});

const frontMatterSchema = z.object({
  title: z.string().optional().catch(undefined),
  date: z.union([
    z.string(),
    z.date().transform(date => date.toISOString().slice(0, 10))
  ]).optional().catch(undefined),
  tags: z.union([
    z.array(z.string()),
    z.string().transform(tag => [tag])
  ]).optional().catch(undefined)
});

/**
 * Summary length as a share of the normalized input length
 */
export function formatCompression(text: string, summary: string): string {
  const originalLength = textProcessor.charLength(textProcessor.normalizeWhitespace(text));
  const share = originalLength === 0 ? 0 : textProcessor.charLength(summary) / originalLength;
  return `${(share * 100).toFixed(1)}%`;
}

function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

function errorResult(action: string, error: unknown): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: `Failed to ${action}: ${errorMessage(error)}`
    }],
    isError: true
  };
}

export function createSummarizationTools(
  config: SummarizerConfig,
  engine: Summarizer = new Summarizer(config.stopwords)
): ToolDefinition[] {
  const withDefaults = (options: SummarizationOptions): SummarizationOptions => ({
    maxSentences: options.maxSentences ?? config.defaults.maxSentences,
    ratio: options.ratio ?? config.defaults.ratio,
    minSentenceLength: options.minSentenceLength ?? config.defaults.minSentenceLength
  });

  const withCompression = (text: string, result: SummaryResult) => ({
    ...result,
    compression: formatCompression(text, result.summary)
  });

  return [
    {
      name: 'summarize_text',
      title: 'Summarize Text',
      description: 'Select the most representative sentences of an Arabic or English passage',
      inputSchema: summarizeTextInput.shape,
      handler: async (args: unknown): Promise<CallToolResult> => {
        try {
          const { text, ...options } = summarizeTextInput.parse(args);
          const result = engine.summarize(text, withDefaults(options));
          return jsonResult(withCompression(text, result));
        } catch (error) {
          return errorResult('summarize', error);
        }
      }
    },

    {
      name: 'summarize_file',
      title: 'Summarize File',
      description: 'Summarize the body of a text or Markdown file, skipping its front matter',
      inputSchema: summarizeFileInput.shape,
      handler: async (args: unknown): Promise<CallToolResult> => {
        try {
          const { file, includeMetadata, ...options } = summarizeFileInput.parse(args);
          const filePath = path.resolve(config.rootDir, file);
          const content = await fs.readFile(filePath, 'utf-8');
          const parsed = matter(content);

          const result = engine.summarize(parsed.content, withDefaults(options));
          const payload = { file, ...withCompression(parsed.content, result) };

          if (includeMetadata && Object.keys(parsed.data).length > 0) {
            const { title, date, tags } = frontMatterSchema.parse(parsed.data);
            Object.assign(payload, { metadata: { title, date, tags } });
          }

          return jsonResult(payload);
        } catch (error) {
          return errorResult('summarize file', error);
        }
      }
    }
  ];
}
