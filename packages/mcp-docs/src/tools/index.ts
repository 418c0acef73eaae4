/**
 * Tools Barrel Export
 *
 * Exports all MCP tools and provides the tool registry.
 */

export * from './types';

import { docsChatTool } from './docs-chat';

import type { Tool } from './types';

export { docsChatTool, docsChat, DOCS_CHAT_REQUEST_OPTIONS, type DocsChatResult } from './docs-chat';

// All tools registry for easy iteration
export const allTools: Tool[] = [docsChatTool];

// Tool lookup map for handler dispatch
export const toolMap = new Map<string, Tool>(
  allTools.map((tool) => [tool.definition.name, tool])
);

// Get tool definitions for ListTools response
export function getToolDefinitions() {
  return allTools.map((tool) => tool.definition);
}

// Get tool handler by name
export function getToolHandler(name: string) {
  const tool = toolMap.get(name);
  return tool?.handler;
}
