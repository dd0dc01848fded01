#!/usr/bin/env node
/**
 * pkgcache MCP server, stdio mode, for local MCP clients.
 */

// Must be set before the first log line: stdout carries the protocol
process.env.PKGCACHE_TRANSPORT = 'stdio';

import { mkdir } from 'node:fs/promises';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { createMcpServer } from './createServer.js';

async function main() {
  const config = loadConfig();

  try {
    await mkdir(config.cacheDir, { recursive: true });
    logger.debug({ cacheDir: config.cacheDir }, 'Cache directory ensured');
  } catch (error) {
    logger.error({ err: error, cacheDir: config.cacheDir }, 'Failed to create cache directory');
    throw error;
  }

  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ cacheDir: config.cacheDir }, 'pkgcache MCP server started in stdio mode');
}

process.on('SIGINT', () => {
  logger.info('Received SIGINT, shutting down');
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('Received SIGTERM, shutting down');
  process.exit(0);
});

main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start MCP server');
  process.exit(1);
});
