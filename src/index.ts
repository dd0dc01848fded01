import { createServices } from './services/serviceFactory.js';
import type { SourceSelector } from './domain/types/packageIndex.js';
import { loadConfig, type PkgCacheConfigInput } from './utils/config.js';

export * from './domain/types/packageIndex.js';
export { DomainError, ValidationError, NotFoundError } from './domain/shared/errors.js';
export { ResolveError } from './domain/source/errors.js';
export { FetchError, DecodeError } from './domain/fetch/errors.js';
export { StoreError, SubprocessError } from './domain/store/errors.js';
export { ConfigReadError } from './domain/declarations/errors.js';

export { describeSource, normalizeRelease, type IndexSource } from './domain/source/sources.js';
export { ReleaseProbe } from './domain/source/releaseProbe.js';
export { VersionResolver, versionFromLocation } from './domain/source/versionResolver.js';
export { IndexFetcher } from './domain/fetch/indexFetcher.js';
export { decodeIndexDocument, parseIndexText } from './domain/fetch/indexDocument.js';
export { StoreBuilder, type StoreBuildResult } from './domain/store/storeBuilder.js';
export {
  StatementBulkLoader,
  createBulkLoader,
  type BulkLoader,
} from './domain/store/bulkLoader.js';
export { Sqlite3CliBulkLoader } from './domain/store/sqlite3CliLoader.js';
export {
  CacheManager,
  type CacheRefreshResult,
  type CacheStatus,
} from './domain/cache/cacheManager.js';
export { AttributeCollector } from './domain/declarations/attributeCollector.js';
export { readNixArray, type ConfigurationReader } from './domain/declarations/nixArrayReader.js';
export { PackageStore, type StoredPackageMeta } from './domain/query/packageStore.js';
export { QueryResolver, type ResolutionResult } from './domain/query/queryResolver.js';
export { PackageVersionService } from './services/packageVersionService.js';
export { CacheMaintenanceService } from './services/cacheMaintenanceService.js';
export { createServices, createCacheManager } from './services/serviceFactory.js';
export { loadConfig, type PkgCacheConfig, type PkgCacheConfigInput } from './utils/config.js';

/**
 * Resolve the packages declared in `declarationPaths` against the current
 * index of `source`, refreshing the local cache first when it is stale.
 * Attributes that are unknown or ambiguous are absent from the result.
 */
export async function resolveVersions(
  source: SourceSelector,
  declarationPaths: readonly string[],
  config: Partial<PkgCacheConfigInput> = {},
): Promise<Record<string, string>> {
  const { versions } = createServices(loadConfig(config));
  return versions.resolveVersions(source, declarationPaths);
}
