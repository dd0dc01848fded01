import { readFile } from 'node:fs/promises';

import type { PkgCacheConfig } from '../../utils/config.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError, ValidationError } from '../shared/errors.js';
import type { DeclaredPackageSet } from '../types/packageIndex.js';
import { ConfigReadError } from './errors.js';
import { readNixArray, type ConfigurationReader } from './nixArrayReader.js';

const logger = createChildLogger({ service: 'AttributeCollector' });

export interface AttributeCollectorDependencies {
  readFile: (filePath: string) => Promise<string>;
  readArray: ConfigurationReader;
}

/**
 * Union of the package attributes declared across several configuration
 * files. A file that cannot be read or parsed counts as declaring nothing.
 */
export class AttributeCollector {
  private readonly deps: AttributeCollectorDependencies;

  constructor(
    private readonly config: Pick<PkgCacheConfig, 'declarationKey'>,
    deps?: Partial<AttributeCollectorDependencies>,
  ) {
    this.deps = {
      readFile: (filePath) => readFile(filePath, 'utf8'),
      readArray: readNixArray,
      ...deps,
    };
  }

  async collect(paths: readonly string[]): Promise<DeclaredPackageSet> {
    if (paths.length === 0) {
      throw new ValidationError('At least one declaration source is required');
    }

    const declared: DeclaredPackageSet = new Set();
    for (const sourcePath of paths) {
      try {
        for (const attribute of await this.readSource(sourcePath)) {
          declared.add(attribute);
        }
      } catch (error) {
        if (!(error instanceof ConfigReadError)) {
          throw error;
        }
        logger.debug({ sourcePath, reason: error.message }, 'Skipping declaration source');
      }
    }

    logger.debug({ sources: paths.length, attributes: declared.size }, 'Collected declarations');
    return declared;
  }

  private async readSource(sourcePath: string): Promise<string[]> {
    let content: string;
    try {
      content = await this.deps.readFile(sourcePath);
    } catch (error) {
      throw new ConfigReadError(`Cannot read ${sourcePath}: ${describeError(error)}`, sourcePath);
    }

    try {
      return this.deps.readArray(content, this.config.declarationKey);
    } catch (error) {
      throw new ConfigReadError(`Cannot parse ${sourcePath}: ${describeError(error)}`, sourcePath);
    }
  }
}
