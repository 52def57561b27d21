#!/usr/bin/env node

/**
 * Note Publisher MCP Server
 *
 * Publishes structured notes as Markdown files with a YAML front-matter
 * block, rewriting internal note references into styled links.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';
import { startWatcher, stopWatcher } from './services/publish/index.js';
import { startHttpTransport, stopHttpTransport, isHttpEnabled } from './transports/index.js';

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting Note Publisher MCP Server', {
    notesDir: config.notesDir,
    outputDir: `${config.baseDir}/${config.publishDir}`,
    fields: config.frontMatterFields,
    watchEnabled: config.watchEnabled,
  });

  if (config.watchEnabled) {
    startWatcher(config);
  }

  const server = new Server(
    {
      name: 'note-publisher-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  if (isHttpEnabled()) {
    await startHttpTransport();
    logger.info('Server running with HTTP transport');
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Server connected with stdio transport');
  }
}

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  await stopWatcher();
  if (isHttpEnabled()) {
    await stopHttpTransport();
  }
  logger.info('Shutdown complete');
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
