/**
 * preview_frontmatter - Show the front-matter block a note would get
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { synthesizeFrontMatter } from '../services/frontmatter/index.js';
import { readNote } from '../services/notes/index.js';
import { toErrorInfo } from '../utils/errors.js';

export interface PreviewFrontmatterOutput {
  path: string;
  identifier: string;
  fields: string[];
  frontMatter: string;
}

const previewInputSchema = z.object({
  path: z.string().min(1),
  fields: z.array(z.string().min(1)).min(1).optional(),
  lenient: z.boolean().default(false),
});

export const previewFrontmatterTool: Tool = {
  name: 'preview_frontmatter',
  description: 'Synthesize the YAML front-matter block for a note without publishing it.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Note path relative to the notes directory',
      },
      fields: {
        type: 'array',
        items: { type: 'string' },
        description: 'Field list to use instead of the configured one (order is kept)',
      },
      lenient: {
        type: 'boolean',
        description: 'Render malformed values as "" instead of failing',
        default: false,
      },
    },
    required: ['path'],
  },
};

export async function previewFrontmatterHandler(
  args: Record<string, unknown>
): Promise<ToolResult<PreviewFrontmatterOutput>> {
  const parseResult = previewInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const { path, fields, lenient } = parseResult.data;

  try {
    const config = getConfig();
    const note = await readNote(path, config.notesDir);
    const descriptors = fields ?? [...config.frontMatterFields];

    return {
      success: true,
      data: {
        path,
        identifier: note.identifier,
        fields: descriptors,
        frontMatter: synthesizeFrontMatter(descriptors, note.environment, { lenient }),
      },
    };
  } catch (error) {
    return { success: false, ...toErrorInfo(error, 'PREVIEW_ERROR') };
  }
}
