import { describe, it, expect, vi } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerTools } from './registry.js';
import { createSummarizationTools } from './summarization-tools.js';

describe('registerTools', () => {
  it('registers every tool with its title, description and schema', () => {
    const server = new McpServer({ name: 'test-server', version: '0.0.0' });
    const registerTool = vi.spyOn(server, 'registerTool');
    const tools = createSummarizationTools({
      defaults: { maxSentences: 3, ratio: 0.25, minSentenceLength: 30 },
      stopwords: {},
      rootDir: process.cwd()
    });

    registerTools(server, tools);

    expect(registerTool).toHaveBeenCalledTimes(2);
    expect(registerTool).toHaveBeenCalledWith(
      'summarize_text',
      {
        title: 'Summarize Text',
        description: 'Select the most representative sentences of an Arabic or English passage',
        inputSchema: tools[0].inputSchema
      },
      expect.any(Function)
    );
    expect(registerTool).toHaveBeenCalledWith(
      'summarize_file',
      expect.objectContaining({ title: 'Summarize File' }),
      expect.any(Function)
    );
  });
});
