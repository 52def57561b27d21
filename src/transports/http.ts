/**
 * HTTP/SSE transport for the MCP server
 * Alternative to stdio for web clients
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { Server as HttpServer } from 'http';
import { logger } from '../utils/logger.js';
import { handleToolCall, getToolDefinitions } from '../tools/index.js';

interface SSEClient {
  id: string;
  response: Response;
}

let clients: SSEClient[] = [];
let httpServer: HttpServer | null = null;

export interface HttpTransportConfig {
  port: number;
  corsOrigin: string;
}

const messageSchema = z.object({
  method: z.string(),
  params: z
    .object({
      name: z.string().optional(),
      arguments: z.record(z.unknown()).optional(),
    })
    .optional(),
});

/**
 * Get HTTP transport configuration from environment
 */
export function getHttpConfig(): HttpTransportConfig {
  return {
    port: parseInt(process.env.HTTP_PORT || '3000', 10),
    corsOrigin: process.env.HTTP_CORS_ORIGIN || '*',
  };
}

/**
 * Check if HTTP transport is enabled
 */
export function isHttpEnabled(): boolean {
  return process.env.HTTP_ENABLED === 'true';
}

/**
 * Send SSE message to all connected clients
 */
function broadcast(event: string, data: unknown): void {
  const message = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
  clients.forEach((client) => {
    client.response.write(message);
  });
}

/**
 * Build the express app
 */
export function createHttpApp(config: HttpTransportConfig = getHttpConfig()): express.Express {
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`HTTP ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      transport: 'http',
      clients: clients.length,
      timestamp: new Date().toISOString(),
    });
  });

  // SSE endpoint for server-to-client notifications
  app.get('/sse', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    const clientId = `client-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    res.write(`event: connected\ndata: ${JSON.stringify({ clientId })}\n\n`);

    clients.push({ id: clientId, response: res });
    logger.info(`SSE client connected: ${clientId} (total: ${clients.length})`);

    const heartbeat = setInterval(() => {
      res.write(`event: heartbeat\ndata: ${JSON.stringify({ timestamp: Date.now() })}\n\n`);
    }, 30000);

    req.on('close', () => {
      clearInterval(heartbeat);
      clients = clients.filter((c) => c.id !== clientId);
      logger.info(`SSE client disconnected: ${clientId} (total: ${clients.length})`);
    });
  });

  app.get('/tools', (_req: Request, res: Response) => {
    res.json({ tools: getToolDefinitions() });
  });

  app.post('/message', (req: Request, res: Response, next: NextFunction) => {
    const parsed = messageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid message body' });
      return;
    }

    const { method, params } = parsed.data;

    if (method === 'tools/list') {
      res.json({ result: { tools: getToolDefinitions() } });
      return;
    }

    if (method !== 'tools/call') {
      res.status(400).json({ error: `Unknown method: ${method}` });
      return;
    }

    const name = params?.name;
    if (!name) {
      res.status(400).json({ error: 'Tool name is required' });
      return;
    }

    handleToolCall(name, params?.arguments ?? {})
      .then((result) => {
        broadcast('tool_result', { name, result });
        res.json({
          result: {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            isError: !result.success,
          },
        });
      })
      .catch(next);
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('HTTP error', err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

/**
 * Create and start the HTTP server
 */
export async function startHttpTransport(): Promise<void> {
  const config = getHttpConfig();
  const app = createHttpApp(config);

  return new Promise((resolve) => {
    httpServer = app.listen(config.port, () => {
      logger.info(`HTTP transport listening on port ${config.port}`);
      resolve();
    });
  });
}

/**
 * Stop the HTTP server
 */
export async function stopHttpTransport(): Promise<void> {
  if (!httpServer) return;

  clients.forEach((client) => {
    client.response.end();
  });
  clients = [];

  const server = httpServer;
  return new Promise((resolve) => {
    server.close(() => {
      logger.info('HTTP transport stopped');
      httpServer = null;
      resolve();
    });
  });
}
