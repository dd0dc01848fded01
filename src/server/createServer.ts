import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { createServices } from '../services/serviceFactory.js';
import { registerTools } from '../tools/index.js';
import type { PkgCacheConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

export const SERVER_NAME = 'pkgcache-mcp';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(config: PkgCacheConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const services = createServices(config, {
    onRefreshComplete: (telemetry) => {
      logger.info(
        { source: telemetry.source, version: telemetry.version, rebuilt: telemetry.rebuilt },
        'Cache refresh finished',
      );
    },
  });

  registerTools(server, { versions: services.versions, maintenance: services.maintenance });
  return server;
}
