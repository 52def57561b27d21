/**
 * publish_note / publish_all - Publish notes as Markdown with YAML front matter
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { publishAll, publishNote, type PublishFailure, type PublishOptions } from '../services/publish/index.js';
import { toErrorInfo } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * publish_note output
 */
export interface PublishNoteOutput {
  source: string;
  identifier: string;
  outputPath: string;
  frontMatter: string;
  message: string;
}

/**
 * publish_all output
 */
export interface PublishAllOutput {
  outputDir: string;
  published: Array<{ source: string; outputPath: string }>;
  failed: PublishFailure[];
  message: string;
}

const publishNoteInputSchema = z.object({
  path: z.string().min(1).describe('Note path relative to the notes directory'),
  output_dir: z.string().min(1).optional().describe('Output directory (defaults to the publish directory)'),
  lenient: z.boolean().default(false).describe('Render malformed values as "" instead of failing'),
});

const publishAllInputSchema = z.object({
  output_dir: z.string().min(1).optional().describe('Output directory (defaults to the publish directory)'),
  lenient: z.boolean().default(false).describe('Render malformed values as "" instead of failing'),
});

function validationError(error: z.ZodError): ToolResult<never> {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

function buildOptions(outputDir: string | undefined, lenient: boolean): PublishOptions {
  const options: PublishOptions = { lenient };
  if (outputDir) {
    options.outputDir = outputDir;
  }
  return options;
}

// Tool definitions
export const publishNoteTool: Tool = {
  name: 'publish_note',
  description: `Publish one note as a Markdown file with a YAML front-matter block.

Front-matter fields follow the configured field list; empty fields are omitted.
Internal denote: links become anchors carrying the configured link class.
A note whose metadata cannot be rendered fails as a whole and writes nothing.`,
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Note path relative to the notes directory',
      },
      output_dir: {
        type: 'string',
        description: 'Output directory (defaults to the publish directory)',
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

export const publishAllTool: Tool = {
  name: 'publish_all',
  description: `Publish every note in the notes directory.

Each note is published independently; failures are listed and do not stop the rest.`,
  inputSchema: {
    type: 'object',
    properties: {
      output_dir: {
        type: 'string',
        description: 'Output directory (defaults to the publish directory)',
      },
      lenient: {
        type: 'boolean',
        description: 'Render malformed values as "" instead of failing',
        default: false,
      },
    },
  },
};

// Tool handlers
export async function publishNoteHandler(
  args: Record<string, unknown>
): Promise<ToolResult<PublishNoteOutput>> {
  const parseResult = publishNoteInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const { path, output_dir, lenient } = parseResult.data;

  try {
    const result = await publishNote(getConfig(), path, buildOptions(output_dir, lenient));
    return {
      success: true,
      data: {
        source: result.source,
        identifier: result.identifier,
        outputPath: result.outputPath,
        frontMatter: result.frontMatter,
        message: `Published ${result.source} to ${result.outputPath}`,
      },
    };
  } catch (error) {
    logger.error(`Publish error: ${path}`, error);
    return { success: false, ...toErrorInfo(error, 'PUBLISH_ERROR') };
  }
}

export async function publishAllHandler(
  args: Record<string, unknown>
): Promise<ToolResult<PublishAllOutput>> {
  const parseResult = publishAllInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const { output_dir, lenient } = parseResult.data;

  try {
    const summary = await publishAll(getConfig(), buildOptions(output_dir, lenient));
    const count = summary.published.length;
    let message = `Published ${count} note${count === 1 ? '' : 's'} to ${summary.outputDir}`;
    if (summary.failed.length > 0) {
      message += ` (${summary.failed.length} failed)`;
    }

    return {
      success: true,
      data: {
        outputDir: summary.outputDir,
        published: summary.published.map((p) => ({ source: p.source, outputPath: p.outputPath })),
        failed: summary.failed,
        message,
      },
    };
  } catch (error) {
    logger.error('Publish all error', error);
    return { success: false, ...toErrorInfo(error, 'PUBLISH_ERROR') };
  }
}
