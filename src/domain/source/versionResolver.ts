import type { PkgCacheConfig } from '../../utils/config.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../shared/errors.js';
import { ResolveError } from './errors.js';
import type { IndexSource } from './sources.js';

const logger = createChildLogger({ service: 'VersionResolver' });

export type VersionedLocation = Pick<IndexSource, 'versionUrl' | 'stripPrefix'>;

export interface VersionResolverDependencies {
  fetch: typeof fetch;
}

/**
 * Extract the version from the final location of a followed redirect:
 * `https://host/nixos/23.05/nixos-23.05.1234.abcdef` → `23.05.1234.abcdef`.
 */
export function versionFromLocation(location: string, stripPrefix: string): string {
  let pathname: string;
  try {
    pathname = new URL(location).pathname;
  } catch {
    throw new ResolveError('Redirect location is not a valid URL', location);
  }

  const segments = pathname.split('/').filter((segment) => segment.length > 0);
  const last = segments.at(-1);
  if (last === undefined) {
    throw new ResolveError('No path segments found in redirect location', location);
  }

  const version = last.startsWith(stripPrefix) ? last.slice(stripPrefix.length) : last;
  if (version.length === 0) {
    throw new ResolveError('Redirect location carries no version', location);
  }
  return version;
}

export class VersionResolver {
  private readonly deps: VersionResolverDependencies;

  constructor(
    private readonly config: Pick<PkgCacheConfig, 'requestTimeoutMs'>,
    deps?: Partial<VersionResolverDependencies>,
  ) {
    this.deps = {
      fetch: globalThis.fetch,
      ...deps,
    };
  }

  async resolve(source: VersionedLocation): Promise<string> {
    let response: Response;
    try {
      response = await this.deps.fetch(source.versionUrl, {
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new ResolveError(
        `Failed to reach ${source.versionUrl}: ${describeError(error)}`,
        source.versionUrl,
      );
    }

    // Only the final URL matters
    await response.body?.cancel();

    if (!response.ok) {
      throw new ResolveError(
        `Version lookup returned HTTP ${response.status}`,
        source.versionUrl,
      );
    }

    const location = response.url || source.versionUrl;
    const version = versionFromLocation(location, source.stripPrefix);
    logger.info({ versionUrl: source.versionUrl, location, version }, 'Resolved remote version');
    return version;
  }
}
