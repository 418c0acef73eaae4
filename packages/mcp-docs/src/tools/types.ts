/**
 * MCP Tool Types
 *
 * Shared types for tool definitions and handlers.
 */

import type { ServerConfig } from '../config';
import type { FetchFn } from '../openai-client';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ToolResult {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
  [key: string]: unknown;
}

/** What a handler may use besides its arguments */
export interface ToolContext {
  config: ServerConfig;
  /** Overrides the HTTP client of outbound API calls */
  fetch?: FetchFn;
}

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;

export interface Tool {
  definition: ToolDefinition;
  handler: ToolHandler;
}
