import express, { type Application } from 'express';
import type { LogseqClient } from './logseq.js';
import { createTools } from './tools.js';
import { createMcpRouter } from './routes/mcp.js';

/**
 * Create and configure the Express application
 */
export function createApp(client: LogseqClient): Application {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '2mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/mcp', createMcpRouter(createTools(client)));

  // Unknown routes
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
