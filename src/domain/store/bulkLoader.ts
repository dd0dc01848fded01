import Database from 'better-sqlite3';

import type { BulkLoaderKind, PkgCacheConfig } from '../../utils/config.js';
import { describeError } from '../shared/errors.js';
import { StoreError } from './errors.js';
import type { TableRow, TableSpec } from './schema.js';
import { Sqlite3CliBulkLoader } from './sqlite3CliLoader.js';

/**
 * Loads many rows into one table of an existing store in a single batch.
 */
export interface BulkLoader {
  readonly kind: BulkLoaderKind;
  load(dbPath: string, table: TableSpec, rows: readonly TableRow[]): Promise<void>;
}

/**
 * In-process loader: one transaction around a prepared INSERT.
 */
export class StatementBulkLoader implements BulkLoader {
  readonly kind = 'statement' as const;

  async load(dbPath: string, table: TableSpec, rows: readonly TableRow[]): Promise<void> {
    let db: Database.Database;
    try {
      db = new Database(dbPath, { fileMustExist: true });
    } catch (error) {
      throw new StoreError(`Failed to open store for loading: ${describeError(error)}`, dbPath);
    }

    try {
      const columns = table.columns.map((column) => `"${column}"`).join(', ');
      const placeholders = table.columns.map(() => '?').join(', ');
      const insert = db.prepare(
        `INSERT INTO "${table.name}" (${columns}) VALUES (${placeholders})`,
      );
      const insertAll = db.transaction((batch: readonly TableRow[]) => {
        for (const row of batch) {
          insert.run(...row);
        }
      });
      insertAll(rows);
    } catch (error) {
      throw new StoreError(
        `Bulk load into ${table.name} failed: ${describeError(error)}`,
        dbPath,
      );
    } finally {
      db.close();
    }
  }
}

export function createBulkLoader(
  config: Pick<PkgCacheConfig, 'bulkLoader' | 'sqlite3Bin'>,
): BulkLoader {
  switch (config.bulkLoader) {
    case 'statement':
      return new StatementBulkLoader();
    case 'sqlite3':
      return new Sqlite3CliBulkLoader({ binary: config.sqlite3Bin });
  }
}
