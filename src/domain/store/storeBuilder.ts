import { rm } from 'node:fs/promises';

import Database from 'better-sqlite3';

import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../shared/errors.js';
import type { IndexDocument } from '../types/packageIndex.js';
import type { BulkLoader } from './bulkLoader.js';
import { StoreError } from './errors.js';
import { initializeIndexSchema, META_TABLE, pkgsTableFor } from './schema.js';
import { transformDocument } from './rowTransform.js';

const logger = createChildLogger({ service: 'StoreBuilder' });

export interface StoreBuildResult {
  storePath: string;
  packageCount: number;
  metaCount: number;
}

interface StoreBuilderDependencies {
  openDatabase: (storePath: string) => Database.Database;
  removeFile: (storePath: string) => Promise<void>;
}

/**
 * Rebuilds a package store from scratch: drop the old file, create the
 * schema, then bulk-load `pkgs` and (for the extended variant) `meta`.
 */
export class StoreBuilder {
  private readonly deps: StoreBuilderDependencies;

  constructor(
    private readonly loader: BulkLoader,
    deps?: Partial<StoreBuilderDependencies>,
  ) {
    this.deps = {
      openDatabase: (storePath) => new Database(storePath),
      removeFile: (storePath) => rm(storePath, { force: true }),
      ...deps,
    };
  }

  async build(document: IndexDocument, storePath: string): Promise<StoreBuildResult> {
    logger.info(
      {
        storePath,
        variant: document.variant,
        packages: document.packages.size,
        loader: this.loader.kind,
      },
      'Rebuilding package store',
    );

    try {
      await this.deps.removeFile(storePath);
    } catch (error) {
      throw new StoreError(`Failed to remove previous store: ${describeError(error)}`, storePath);
    }

    this.createSchema(document, storePath);

    const rows = transformDocument(document);

    await this.loader.load(storePath, pkgsTableFor(document.variant), rows.pkgs);
    logger.debug({ storePath, rows: rows.pkgs.length }, 'Loaded pkgs table');

    if (rows.meta) {
      await this.loader.load(storePath, META_TABLE, rows.meta);
      logger.debug({ storePath, rows: rows.meta.length }, 'Loaded meta table');
    }

    return {
      storePath,
      packageCount: rows.pkgs.length,
      metaCount: rows.meta?.length ?? 0,
    };
  }

  private createSchema(document: IndexDocument, storePath: string): void {
    let db: Database.Database;
    try {
      db = this.deps.openDatabase(storePath);
    } catch (error) {
      throw new StoreError(`Failed to create store: ${describeError(error)}`, storePath);
    }

    try {
      initializeIndexSchema(db, document.variant);
    } catch (error) {
      throw new StoreError(`Failed to create store schema: ${describeError(error)}`, storePath);
    } finally {
      db.close();
    }
  }
}
