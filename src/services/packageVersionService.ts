import type { AttributeCollector } from '../domain/declarations/attributeCollector.js';
import type { CacheManager, CacheStatus } from '../domain/cache/cacheManager.js';
import { PackageStore, type PkgRow, type StoredPackageMeta } from '../domain/query/packageStore.js';
import { QueryResolver, type ResolutionResult } from '../domain/query/queryResolver.js';
import type { SourceSelector } from '../domain/types/packageIndex.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'PackageVersionService' });

export interface PackageVersionServiceDependencies {
  cacheManager: Pick<CacheManager, 'ensureFresh' | 'status'>;
  collector: Pick<AttributeCollector, 'collect'>;
  resolver?: QueryResolver;
  openStore?: (storePath: string) => PackageStore;
}

export interface VersionReport extends ResolutionResult {
  source: SourceSelector;
  indexVersion: string;
  declared: number;
}

/**
 * Query surface over the package caches: resolve declared packages to the
 * versions currently available in a source.
 */
export class PackageVersionService {
  private readonly cacheManager: PackageVersionServiceDependencies['cacheManager'];
  private readonly collector: PackageVersionServiceDependencies['collector'];
  private readonly resolver: QueryResolver;
  private readonly openStore: (storePath: string) => PackageStore;

  constructor(deps: PackageVersionServiceDependencies) {
    this.cacheManager = deps.cacheManager;
    this.collector = deps.collector;
    this.resolver = deps.resolver ?? new QueryResolver();
    this.openStore = deps.openStore ?? PackageStore.open;
  }

  async resolveVersions(
    source: SourceSelector,
    declarationPaths: readonly string[],
  ): Promise<Record<string, string>> {
    const report = await this.resolveWithReport(source, declarationPaths);
    return report.versions;
  }

  async resolveWithReport(
    source: SourceSelector,
    declarationPaths: readonly string[],
  ): Promise<VersionReport> {
    const declared = await this.collector.collect(declarationPaths);
    const cache = await this.cacheManager.ensureFresh(source);

    const result = this.withStore(cache.artifactPath, (store) =>
      this.resolver.resolve(declared, store),
    );

    logger.info(
      {
        source,
        declared: declared.size,
        resolved: Object.keys(result.versions).length,
        dropped: result.dropped,
      },
      'Resolved package versions',
    );

    return { ...result, source, indexVersion: cache.version, declared: declared.size };
  }

  async lookupByPname(source: SourceSelector, pname: string): Promise<PkgRow[]> {
    const cache = await this.cacheManager.ensureFresh(source);
    return this.withStore(cache.artifactPath, (store) => store.findByPname(pname));
  }

  async getPackageMeta(
    source: SourceSelector,
    attribute: string,
  ): Promise<StoredPackageMeta | null> {
    const cache = await this.cacheManager.ensureFresh(source);
    return this.withStore(cache.artifactPath, (store) => store.getMeta(attribute));
  }

  status(source: SourceSelector): Promise<CacheStatus> {
    return this.cacheManager.status(source);
  }

  private withStore<T>(storePath: string, run: (store: PackageStore) => T): T {
    const store = this.openStore(storePath);
    try {
      return run(store);
    } finally {
      store.close();
    }
  }
}
