import { access, mkdir, readFile, writeFile } from 'node:fs/promises';

import type { PkgCacheConfig } from '../../utils/config.js';
import { createChildLogger } from '../../utils/logger.js';
import { DecodeError } from '../fetch/errors.js';
import type { IndexFetcher } from '../fetch/indexFetcher.js';
import { describeError } from '../shared/errors.js';
import type { ReleaseProbe } from '../source/releaseProbe.js';
import { describeOptionsSource, describeSource, type IndexSource } from '../source/sources.js';
import type { VersionedLocation, VersionResolver } from '../source/versionResolver.js';
import type { StoreBuilder } from '../store/storeBuilder.js';
import type { CacheManifest, SourceSelector } from '../types/packageIndex.js';
import { artifactLock, type KeyedLock } from './artifactLock.js';
import { optionsPaths, storePaths, type ArtifactPaths } from './cacheLayout.js';

const logger = createChildLogger({ service: 'CacheManager' });

export interface CacheRefreshResult extends CacheManifest {
  rebuilt: boolean;
  /** Set when the cycle rebuilt a package store */
  packageCount?: number;
}

export interface CacheStatus {
  artifactPath: string;
  markerPath: string;
  markerVersion: string | null;
  artifactExists: boolean;
  /** A refresh of this artifact is running or queued */
  refreshing: boolean;
}

export interface CacheManagerComponents {
  releaseProbe: Pick<ReleaseProbe, 'currentRelease'>;
  versionResolver: Pick<VersionResolver, 'resolve'>;
  fetcher: Pick<IndexFetcher, 'fetchIndex' | 'fetchText'>;
  storeBuilder: Pick<StoreBuilder, 'build'>;
}

interface CacheManagerDependencies {
  readFile: (filePath: string) => Promise<string>;
  writeFile: (filePath: string, content: string) => Promise<void>;
  fileExists: (filePath: string) => Promise<boolean>;
  ensureDir: (dirPath: string) => Promise<void>;
  lock: KeyedLock;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Keeps cache artifacts in step with the remote channel. An artifact is fresh
 * when its marker holds the currently resolved remote version and the artifact
 * file exists; the marker is only written after a successful rebuild.
 */
export class CacheManager {
  private readonly deps: CacheManagerDependencies;

  constructor(
    private readonly config: Pick<PkgCacheConfig, 'cacheDir' | 'channelBase'>,
    private readonly components: CacheManagerComponents,
    deps?: Partial<CacheManagerDependencies>,
  ) {
    this.deps = {
      readFile: (filePath) => readFile(filePath, 'utf8'),
      writeFile: (filePath, content) => writeFile(filePath, content, 'utf8'),
      fileExists,
      ensureDir: async (dirPath) => {
        await mkdir(dirPath, { recursive: true });
      },
      lock: artifactLock,
      ...deps,
    };
  }

  async describe(selector: SourceSelector): Promise<IndexSource> {
    // The flake channel does not depend on the local release
    const release =
      selector === 'flake' ? '' : await this.components.releaseProbe.currentRelease();
    return describeSource(selector, release, this.config);
  }

  /**
   * Make sure the package store for `selector` is fresh, rebuilding it when
   * the remote version moved on. Returns where the store lives.
   */
  async ensureFresh(selector: SourceSelector): Promise<CacheRefreshResult> {
    await this.ensureCacheDir();
    const source = await this.describe(selector);
    const paths = storePaths(this.config.cacheDir, selector);

    return this.deps.lock.run(paths.artifactPath, () =>
      this.runCycle(selector, source, paths, async () => {
        const { fetcher, storeBuilder } = this.components;
        const document = await fetcher.fetchIndex(source.indexUrl, source.variant);
        const result = await storeBuilder.build(document, paths.artifactPath);
        return result.packageCount;
      }),
    );
  }

  /**
   * Same freshness rule for the options document of the system channel; the
   * artifact is the decompressed JSON document itself.
   */
  async ensureOptions(): Promise<CacheRefreshResult> {
    await this.ensureCacheDir();
    const release = await this.components.releaseProbe.currentRelease();
    const source = describeOptionsSource(release, this.config);
    const paths = optionsPaths(this.config.cacheDir);

    return this.deps.lock.run(paths.artifactPath, () =>
      this.runCycle('options', source, paths, async () => {
        const text = await this.components.fetcher.fetchText(source.documentUrl);
        try {
          JSON.parse(text);
        } catch (error) {
          throw new DecodeError('Options document is not valid JSON', describeError(error));
        }
        await this.deps.writeFile(paths.artifactPath, text);
        return undefined;
      }),
    );
  }

  async status(selector: SourceSelector): Promise<CacheStatus> {
    const paths = storePaths(this.config.cacheDir, selector);
    return {
      ...paths,
      markerVersion: await this.readMarker(paths.markerPath),
      artifactExists: await this.deps.fileExists(paths.artifactPath),
      refreshing: this.deps.lock.isLocked(paths.artifactPath),
    };
  }

  private async runCycle(
    name: string,
    location: VersionedLocation,
    paths: ArtifactPaths,
    rebuild: () => Promise<number | undefined>,
  ): Promise<CacheRefreshResult> {
    const previous = await this.readMarker(paths.markerPath);
    const version = await this.components.versionResolver.resolve(location);

    if (previous === version && (await this.deps.fileExists(paths.artifactPath))) {
      logger.debug({ name, version }, 'Cache is up to date');
      return { ...paths, version, rebuilt: false };
    }

    logger.info({ name, previous, version }, 'Cache is stale, rebuilding');
    const packageCount = await rebuild();

    await this.deps.writeFile(paths.markerPath, version);
    logger.info({ name, version, artifactPath: paths.artifactPath }, 'Cache rebuilt');

    return { ...paths, version, rebuilt: true, packageCount };
  }

  private async readMarker(markerPath: string): Promise<string | null> {
    try {
      return await this.deps.readFile(markerPath);
    } catch {
      return null;
    }
  }

  private async ensureCacheDir(): Promise<void> {
    try {
      await this.deps.ensureDir(this.config.cacheDir);
    } catch (error) {
      logger.warn(
        { err: error, cacheDir: this.config.cacheDir },
        'Failed to create cache directory',
      );
    }
  }
}
