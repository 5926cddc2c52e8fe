/**
 * Docs & Drive MCP server
 * Registers the tools on a low-level MCP Server and dispatches calls to them
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { tools } from './tools/index.js';
import { toErrorMessage } from './services/errors.js';
import type { RegisteredTool, ToolContext, ToolResponse } from './tools/types.js';
import { textResponse } from './tools/types.js';
import { debug, error as logError } from './utils/logger.js';

export const SERVER_NAME = 'docs-drive-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Dispatches one tool call
 *
 * Errors a tool lets through (listing and search failures) are logged and
 * rethrown so the MCP framework reports them on its own error channel.
 *
 * @param context - Shared tool context
 * @param name - Tool name from the request
 * @param args - Raw arguments from the request
 * @param registry - Tools to dispatch to
 */
export async function callTool(
  context: ToolContext,
  name: string,
  args: unknown,
  registry: RegisteredTool[] = tools
): Promise<ToolResponse> {
  const tool = registry.find((t) => t.name === name);

  if (!tool) {
    return textResponse(`Unknown tool: ${name}`, true);
  }

  debug('Tool call', { module: 'server', tool: name });
  try {
    return await tool.run(context, args);
  } catch (err) {
    logError('Tool call failed', {
      module: 'server',
      tool: name,
      error: toErrorMessage(err),
    });
    throw err;
  }
}

/**
 * Builds the MCP server bound to a tool context
 */
export function createServer(context: ToolContext, registry: RegisteredTool[] = tools): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: registry.map(({ name, description, inputSchema }) => ({
        name,
        description,
        inputSchema,
      })),
    };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await callTool(context, request.params.name, request.params.arguments, registry);
    return {
      content: result.content,
      isError: result.isError,
    };
  });

  return server;
}
