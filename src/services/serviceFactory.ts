import { CacheManager } from '../domain/cache/cacheManager.js';
import { AttributeCollector } from '../domain/declarations/attributeCollector.js';
import { IndexFetcher } from '../domain/fetch/indexFetcher.js';
import { ReleaseProbe } from '../domain/source/releaseProbe.js';
import { VersionResolver } from '../domain/source/versionResolver.js';
import { createBulkLoader } from '../domain/store/bulkLoader.js';
import { StoreBuilder } from '../domain/store/storeBuilder.js';
import type { PkgCacheConfig } from '../utils/config.js';
import { CacheMaintenanceService, type CacheMaintenanceHooks } from './cacheMaintenanceService.js';
import { PackageVersionService } from './packageVersionService.js';

export interface PkgCacheServices {
  cacheManager: CacheManager;
  maintenance: CacheMaintenanceService;
  versions: PackageVersionService;
}

export function createCacheManager(config: PkgCacheConfig): CacheManager {
  return new CacheManager(config, {
    releaseProbe: new ReleaseProbe(config),
    versionResolver: new VersionResolver(config),
    fetcher: new IndexFetcher(config),
    storeBuilder: new StoreBuilder(createBulkLoader(config)),
  });
}

export function createServices(
  config: PkgCacheConfig,
  hooks: CacheMaintenanceHooks = {},
): PkgCacheServices {
  const cacheManager = createCacheManager(config);
  return {
    cacheManager,
    maintenance: new CacheMaintenanceService(cacheManager, hooks),
    versions: new PackageVersionService({
      cacheManager,
      collector: new AttributeCollector(config),
    }),
  };
}
