#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools/registry.js';
import { createSummarizationTools } from './tools/summarization-tools.js';
import { loadSummarizerConfig } from './config/summarizer-config.js';
import { SERVER_NAME, SERVER_VERSION } from './shared/constants.js';

const config = loadSummarizerConfig();

const server = new McpServer({
  name: SERVER_NAME,
  version: SERVER_VERSION
}, {
  capabilities: {
    tools: {},
  },
});

const allTools = createSummarizationTools(config);

registerTools(server, allTools);

// Start the server; stdout carries the protocol, so diagnostics go to stderr
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} v${SERVER_VERSION} running...`);
  console.error(`Registered ${allTools.length} tools`);
  console.error('Summary defaults:', config.defaults);
}

main().catch((error) => {
  console.error('Server error:', error);
  process.exit(1);
});
