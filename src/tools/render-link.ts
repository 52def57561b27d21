/**
 * render_link - Format a single link the way published notes contain it
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { parseInternalPath, renderLink, renderMarkdownLink } from '../services/links/index.js';
import { parseLinkTarget } from '../services/notes/index.js';
import { toErrorInfo } from '../utils/errors.js';

export interface RenderLinkOutput {
  type: string;
  markup: string;
}

const renderLinkInputSchema = z.object({
  link: z.string().min(1),
  label: z.string().optional(),
  style_class: z.string().min(1).optional(),
});

export const renderLinkTool: Tool = {
  name: 'render_link',
  description: `Render one link target as it would appear in a published note.

denote:IDENTIFIER[::query] links become anchors with the link class; other links become Markdown links.
The identifier is not checked against the notes directory.`,
  inputSchema: {
    type: 'object',
    properties: {
      link: {
        type: 'string',
        description: 'Link target, e.g. denote:20240104T093000::#intro or https://example.org',
      },
      label: {
        type: 'string',
        description: 'Explicit display label',
      },
      style_class: {
        type: 'string',
        description: 'Style class (defaults to the configured link class)',
      },
    },
    required: ['link'],
  },
};

export async function renderLinkHandler(
  args: Record<string, unknown>
): Promise<ToolResult<RenderLinkOutput>> {
  const parseResult = renderLinkInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const { link, label, style_class } = parseResult.data;

  try {
    const description = parseLinkTarget(link);
    const markup = renderLink(description, label || undefined, style_class ?? getConfig().linkClass, {
      resolve: parseInternalPath,
      fallback: renderMarkdownLink,
    });
    return { success: true, data: { type: description.type, markup } };
  } catch (error) {
    return { success: false, ...toErrorInfo(error, 'RENDER_ERROR') };
  }
}
