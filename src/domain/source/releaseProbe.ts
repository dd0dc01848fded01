import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { PkgCacheConfig } from '../../utils/config.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../shared/errors.js';
import { ResolveError } from './errors.js';
import { normalizeRelease } from './sources.js';

const logger = createChildLogger({ service: 'ReleaseProbe' });

export interface ReleaseProbeDependencies {
  readOsRelease: () => Promise<string>;
}

async function runNixosVersion(): Promise<string> {
  const { stdout } = await promisify(execFile)('nixos-version', [], { encoding: 'utf8' });
  return stdout;
}

/**
 * Reads the local OS release (configured, or from `nixos-version`) and
 * normalizes it into a channel name suffix.
 */
export class ReleaseProbe {
  private readonly deps: ReleaseProbeDependencies;
  private cached?: string;

  constructor(
    private readonly config: Pick<PkgCacheConfig, 'release' | 'rollingRelease'>,
    deps?: Partial<ReleaseProbeDependencies>,
  ) {
    this.deps = {
      readOsRelease: runNixosVersion,
      ...deps,
    };
  }

  async currentRelease(): Promise<string> {
    if (this.cached !== undefined) {
      return this.cached;
    }

    let raw = this.config.release;
    if (raw === undefined) {
      try {
        raw = await this.deps.readOsRelease();
      } catch (error) {
        throw new ResolveError(`Unable to read the OS release: ${describeError(error)}`);
      }
    }

    if (raw.trim().length === 0) {
      throw new ResolveError('OS release identifier is empty');
    }

    const release = normalizeRelease(raw, this.config.rollingRelease);
    logger.debug({ raw: raw.trim(), release }, 'Resolved OS release');
    this.cached = release;
    return release;
  }
}
