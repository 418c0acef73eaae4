/**
 * MCP server for the docs tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { createScopedLogger } from '@docs-mcp/shared';
import { getToolDefinitions, getToolHandler, type ToolContext } from './tools/index';

export const SERVER_NAME = 'docs-mcp';
export const SERVER_VERSION = '0.1.0';

const log = createScopedLogger('server');

export function createServer(context: ToolContext): Server {
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

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = getToolHandler(name);
    if (!handler) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    log.debug(`Calling tool ${name}`);
    return handler(args ?? {}, context);
  });

  return server;
}
