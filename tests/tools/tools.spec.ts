import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it, vi } from 'vitest';

import type { CacheRefreshResult } from '../../src/domain/cache/cacheManager.js';
import { FetchError } from '../../src/domain/fetch/errors.js';
import type { StoredPackageMeta } from '../../src/domain/query/packageStore.js';
import { registerTools } from '../../src/tools/index.js';

interface ToolResult {
  content: Array<{ type: string; text: string }>;
  structuredContent: Record<string, unknown>;
}

type Handler = (args: Record<string, unknown>) => Promise<ToolResult>;

class StubServer {
  public handlers = new Map<string, Handler>();

  registerTool(name: string, _meta: unknown, handler: Handler) {
    this.handlers.set(name, handler);
  }

  async call(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new Error(`Tool ${name} is not registered`);
    }
    return handler(args);
  }
}

const refreshed: CacheRefreshResult = {
  artifactPath: '/cache/system.db',
  markerPath: '/cache/system.ver',
  version: '23.05.1234.abcdef',
  rebuilt: true,
  packageCount: 2,
};

function createDeps() {
  const versions = {
    resolveWithReport: vi.fn(async () => ({
      source: 'system' as const,
      indexVersion: '23.05.1234.abcdef',
      declared: 2,
      versions: { pkgA: '1.0' },
      dropped: { missing: 1, ambiguous: 0 },
    })),
    lookupByPname: vi.fn(async () => [{ attribute: 'pkgA', pname: 'a', version: '1.0' }]),
    getPackageMeta: vi.fn(async (): Promise<StoredPackageMeta | null> => null),
    status: vi.fn(async () => ({
      artifactPath: '/cache/legacy.db',
      markerPath: '/cache/legacy.ver',
      markerVersion: null,
      artifactExists: false,
      refreshing: false,
    })),
  };
  const maintenance = {
    refresh: vi.fn(async () => refreshed),
    refreshOptions: vi.fn(
      async (): Promise<CacheRefreshResult> => ({
        ...refreshed,
        artifactPath: '/cache/options.json',
        markerPath: '/cache/options.ver',
        packageCount: undefined,
      }),
    ),
  };
  return { versions, maintenance };
}

function setup() {
  const server = new StubServer();
  const deps = createDeps();
  registerTools(server as unknown as McpServer, deps);
  return { server, ...deps };
}

describe('MCP tool registration', () => {
  it('registers every package and cache tool', () => {
    const { server } = setup();

    expect([...server.handlers.keys()].sort()).toEqual([
      'cache.refresh',
      'cache.status',
      'packages.findByName',
      'packages.getMeta',
      'packages.resolveVersions',
    ]);
  });

  it('packages.resolveVersions delegates to the version service', async () => {
    const { server, versions } = setup();

    const result = await server.call('packages.resolveVersions', {
      source: 'system',
      declarationPaths: ['/etc/nixos/configuration.nix'],
    });

    expect(versions.resolveWithReport).toHaveBeenCalledWith('system', [
      '/etc/nixos/configuration.nix',
    ]);
    expect(result.structuredContent).toEqual({
      source: 'system',
      indexVersion: '23.05.1234.abcdef',
      declared: 2,
      versions: { pkgA: '1.0' },
      dropped: { missing: 1, ambiguous: 0 },
    });
    expect(JSON.parse(result.content[0].text)).toEqual(result.structuredContent);
  });

  it('packages.findByName returns the matching rows with a count', async () => {
    const { server, versions } = setup();

    const result = await server.call('packages.findByName', { source: 'legacy', pname: 'a' });

    expect(versions.lookupByPname).toHaveBeenCalledWith('legacy', 'a');
    expect(result.structuredContent).toEqual({
      packages: [{ attribute: 'pkgA', pname: 'a', version: '1.0' }],
      count: 1,
    });
  });

  it('packages.getMeta reports unknown attributes as not found', async () => {
    const { server, versions } = setup();

    await expect(server.call('packages.getMeta', { attribute: 'absent' })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
      data: { code: 'NOT_FOUND' },
    });
    expect(versions.getPackageMeta).toHaveBeenCalledWith('system', 'absent');
  });

  it('cache.refresh refreshes a package source', async () => {
    const { server, maintenance } = setup();

    const result = await server.call('cache.refresh', { source: 'system' });

    expect(maintenance.refresh).toHaveBeenCalledWith('system');
    expect(result.structuredContent).toMatchObject({ rebuilt: true, packageCount: 2 });
  });

  it('cache.refresh refreshes the options document', async () => {
    const { server, maintenance } = setup();

    const result = await server.call('cache.refresh', { source: 'options' });

    expect(maintenance.refreshOptions).toHaveBeenCalledTimes(1);
    expect(maintenance.refresh).not.toHaveBeenCalled();
    expect(result.structuredContent.artifactPath).toBe('/cache/options.json');
  });

  it('cache.status reports the offline state', async () => {
    const { server } = setup();

    const result = await server.call('cache.status', { source: 'legacy' });

    expect(result.structuredContent).toEqual({
      artifactPath: '/cache/legacy.db',
      markerPath: '/cache/legacy.ver',
      markerVersion: null,
      artifactExists: false,
      refreshing: false,
    });
  });

  it('maps pipeline failures to MCP errors', async () => {
    const { server, maintenance } = setup();
    maintenance.refresh.mockRejectedValueOnce(
      new FetchError('Download failed', 'https://channels.test/p.json.br', 502),
    );

    const failure = server.call('cache.refresh', { source: 'system' });

    await expect(failure).rejects.toBeInstanceOf(McpError);
    await expect(failure).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
      data: { code: 'FETCH_ERROR', status: 502 },
    });
  });
});
