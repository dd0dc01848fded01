import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { NotFoundError } from '../domain/shared/errors.js';
import { SOURCE_SELECTORS, type SourceSelector } from '../domain/types/packageIndex.js';
import type { CacheMaintenanceService } from '../services/cacheMaintenanceService.js';
import type { PackageVersionService } from '../services/packageVersionService.js';
import { withErrorHandling } from '../utils/errorHandler.js';

export interface PackageToolDependencies {
  versions: Pick<
    PackageVersionService,
    'resolveWithReport' | 'lookupByPname' | 'getPackageMeta' | 'status'
  >;
  maintenance: Pick<CacheMaintenanceService, 'refresh' | 'refreshOptions'>;
}

type ToolOutput = {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: Record<string, unknown>;
};

function toolResult(output: Record<string, unknown>): ToolOutput {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
  };
}

const sourceSchema = z
  .enum(SOURCE_SELECTORS)
  .describe('Index source: system (with metadata), legacy channel, or flake');

const cacheResultSchema = {
  artifactPath: z.string(),
  markerPath: z.string(),
  version: z.string(),
  rebuilt: z.boolean(),
  packageCount: z.number().optional(),
};

export function registerPackageTools(server: McpServer, deps: PackageToolDependencies): void {
  const resolveVersions = withErrorHandling(
    'packages.resolveVersions',
    async (args: { source: SourceSelector; declarationPaths: string[] }) => {
      const report = await deps.versions.resolveWithReport(args.source, args.declarationPaths);
      return toolResult({
        source: report.source,
        indexVersion: report.indexVersion,
        declared: report.declared,
        versions: report.versions,
        dropped: report.dropped,
      });
    },
  );

  server.registerTool(
    'packages.resolveVersions',
    {
      title: 'Resolve declared package versions',
      description:
        'Collect package attributes declared in configuration files and look up the version each one has in the selected index. Unknown or ambiguous attributes are left out.',
      inputSchema: {
        source: sourceSchema,
        declarationPaths: z
          .array(z.string())
          .min(1)
          .describe('Configuration files declaring packages'),
      },
      outputSchema: {
        source: sourceSchema,
        indexVersion: z.string(),
        declared: z.number(),
        versions: z.record(z.string()),
        dropped: z.object({ missing: z.number(), ambiguous: z.number() }),
      },
    },
    async ({ source, declarationPaths }) => resolveVersions({ source, declarationPaths }),
  );

  const findByName = withErrorHandling(
    'packages.findByName',
    async (args: { source: SourceSelector; pname: string }) => {
      const rows = await deps.versions.lookupByPname(args.source, args.pname);
      return toolResult({ packages: rows, count: rows.length });
    },
  );

  server.registerTool(
    'packages.findByName',
    {
      title: 'Find packages by name',
      description: 'List every attribute whose package name (pname) matches exactly.',
      inputSchema: {
        source: sourceSchema,
        pname: z.string().min(1),
      },
      outputSchema: {
        packages: z.array(
          z.object({
            attribute: z.string(),
            pname: z.string().nullable(),
            version: z.string().nullable(),
          }),
        ),
        count: z.number(),
      },
    },
    async ({ source, pname }) => findByName({ source, pname }),
  );

  const getMeta = withErrorHandling('packages.getMeta', async (args: { attribute: string }) => {
    const meta = await deps.versions.getPackageMeta('system', args.attribute);
    if (!meta) {
      throw new NotFoundError('Package metadata', args.attribute);
    }
    return toolResult({ ...meta });
  });

  server.registerTool(
    'packages.getMeta',
    {
      title: 'Get package metadata',
      description: 'Read description, homepage, license and status flags from the system index.',
      inputSchema: { attribute: z.string().min(1) },
    },
    async ({ attribute }) => getMeta({ attribute }),
  );

  const refresh = withErrorHandling(
    'cache.refresh',
    async (args: { source: SourceSelector | 'options' }) => {
      const result =
        args.source === 'options'
          ? await deps.maintenance.refreshOptions()
          : await deps.maintenance.refresh(args.source);
      return toolResult({ ...result });
    },
  );

  server.registerTool(
    'cache.refresh',
    {
      title: 'Refresh a cache',
      description:
        'Rebuild the cache for a source if the remote channel moved to a new version. Use "options" for the options document.',
      inputSchema: {
        source: z.enum([...SOURCE_SELECTORS, 'options']),
      },
      outputSchema: cacheResultSchema,
    },
    async ({ source }) => refresh({ source }),
  );

  const status = withErrorHandling('cache.status', async (args: { source: SourceSelector }) => {
    const result = await deps.versions.status(args.source);
    return toolResult({ ...result });
  });

  server.registerTool(
    'cache.status',
    {
      title: 'Inspect a cache',
      description: 'Report the cached version marker and whether the store exists, offline.',
      inputSchema: { source: sourceSchema },
      outputSchema: {
        artifactPath: z.string(),
        markerPath: z.string(),
        markerVersion: z.string().nullable(),
        artifactExists: z.boolean(),
        refreshing: z.boolean(),
      },
    },
    async ({ source }) => status({ source }),
  );
}
