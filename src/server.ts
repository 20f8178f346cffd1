import { loadConfig } from './config.js';
import { LogseqClient } from './logseq.js';
import { createApp } from './app.js';

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const config = await loadConfig();

  const client = new LogseqClient({
    apiUrl: config.apiUrl,
    apiToken: config.apiToken,
    timeoutMs: config.timeoutMs
  });

  const app = createApp(client);

  const server = app.listen(config.port, () => {
    console.log(`Logseq MCP endpoint listening on http://localhost:${config.port}/api/mcp`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err: unknown) => {
  console.error('Failed to start server:', err instanceof Error ? err.message : err);
  process.exit(1);
});
