import { mkdir } from 'node:fs/promises';
import express from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfig, type PkgCacheConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './createServer.js';

async function ensureCacheDir(config: PkgCacheConfig) {
  try {
    await mkdir(config.cacheDir, { recursive: true });
    logger.debug({ cacheDir: config.cacheDir }, 'Cache directory ensured');
  } catch (error) {
    logger.error({ err: error, cacheDir: config.cacheDir }, 'Failed to create cache directory');
    throw error;
  }
}

async function bootstrap() {
  const config = loadConfig();
  await ensureCacheDir(config);

  const server = createMcpServer(config);
  const port = Number(process.env.PKGCACHE_PORT ?? 4000);
  const host = process.env.PKGCACHE_HOST ?? '127.0.0.1';

  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVER_NAME, version: SERVER_VERSION });
  });

  // Stateless: one transport per request
  app.post('/mcp', async (req, res) => {
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        void transport.close();
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error({ err: error }, 'Error handling MCP request');
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  app.listen(port, host, () => {
    logger.info({ host, port, version: SERVER_VERSION }, 'pkgcache MCP server started');
  });
}

process.on('unhandledRejection', (reason, promise) => {
  logger.error({ reason, promise }, 'Unhandled rejection detected');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

bootstrap().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start MCP server');
  process.exit(1);
});
