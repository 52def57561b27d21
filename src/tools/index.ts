/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';

import {
  publishNoteTool,
  publishNoteHandler,
  publishAllTool,
  publishAllHandler,
} from './publish.js';
import { previewFrontmatterTool, previewFrontmatterHandler } from './preview.js';
import { renderLinkTool, renderLinkHandler } from './render-link.js';

type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

/**
 * Register all tools
 */
export function registerTools(): void {
  tools.set(publishNoteTool.name, publishNoteTool);
  handlers.set(publishNoteTool.name, publishNoteHandler);

  tools.set(publishAllTool.name, publishAllTool);
  handlers.set(publishAllTool.name, publishAllHandler);

  tools.set(previewFrontmatterTool.name, previewFrontmatterTool);
  handlers.set(previewFrontmatterTool.name, previewFrontmatterHandler);

  tools.set(renderLinkTool.name, renderLinkTool);
  handlers.set(renderLinkTool.name, renderLinkHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args);
}
