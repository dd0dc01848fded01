import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerPackageTools, type PackageToolDependencies } from './packages.js';

export type RegisterToolsOptions = PackageToolDependencies;

export function registerTools(server: McpServer, options: RegisterToolsOptions): void {
  registerPackageTools(server, options);
}
