import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ZodRawShape } from 'zod';

export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  inputSchema: ZodRawShape;
  // Handlers parse their own arguments against inputSchema
  handler: (args: unknown) => Promise<CallToolResult>;
}

/**
 * Register a tool with the MCP server
 */
export function registerTool(server: McpServer, tool: ToolDefinition) {
  server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema,
    },
    async (args) => tool.handler(args)
  );
}

/**
 * Register multiple tools at once
 */
export function registerTools(server: McpServer, tools: ToolDefinition[]) {
  tools.forEach(tool => registerTool(server, tool));
}
