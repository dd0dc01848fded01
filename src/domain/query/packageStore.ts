import Database from 'better-sqlite3';
import { z } from 'zod';

import { describeError } from '../shared/errors.js';
import { StoreError } from '../store/errors.js';

const PkgRowSchema = z.object({
  attribute: z.string(),
  pname: z.string().nullable(),
  version: z.string().nullable(),
});

// JSON columns have NUMERIC affinity, so a serialized number comes back as one
const JsonColumnSchema = z.union([z.string(), z.number()]).nullable();

const MetaRowSchema = z.object({
  attribute: z.string(),
  broken: z.coerce.number(),
  insecure: z.coerce.number(),
  unsupported: z.coerce.number(),
  unfree: z.coerce.number(),
  description: z.string().nullable(),
  longdescription: z.string().nullable(),
  homepage: z.string().nullable(),
  maintainers: JsonColumnSchema,
  position: z.string().nullable(),
  license: JsonColumnSchema,
  platforms: JsonColumnSchema,
});

export type PkgRow = z.infer<typeof PkgRowSchema>;

export interface StoredPackageMeta {
  attribute: string;
  broken: boolean;
  insecure: boolean;
  unsupported: boolean;
  unfree: boolean;
  description: string;
  longdescription: string;
  homepage: string;
  maintainers: unknown;
  position: string;
  license: unknown;
  platforms: unknown;
}

function parseJsonColumn(value: string | number | null): unknown {
  if (value === null || value === '') {
    return null;
  }
  if (typeof value === 'number') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Read-only handle on a built package store.
 */
export class PackageStore {
  private constructor(
    private readonly db: Database.Database,
    readonly storePath: string,
  ) {}

  static open(storePath: string): PackageStore {
    try {
      return new PackageStore(
        new Database(storePath, { readonly: true, fileMustExist: true }),
        storePath,
      );
    } catch (error) {
      throw new StoreError(`Failed to open store: ${describeError(error)}`, storePath);
    }
  }

  findByAttribute(attribute: string): PkgRow[] {
    return this.select(
      'SELECT attribute, pname, version FROM pkgs WHERE attribute = ?',
      attribute,
    );
  }

  findByPname(pname: string): PkgRow[] {
    return this.select(
      'SELECT attribute, pname, version FROM pkgs WHERE pname = ? ORDER BY attribute',
      pname,
    );
  }

  hasMeta(): boolean {
    return this.query(
      () =>
        this.db
          .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'meta'")
          .get() !== undefined,
    );
  }

  getMeta(attribute: string): StoredPackageMeta | null {
    if (!this.hasMeta()) {
      return null;
    }
    const raw = this.query(() =>
      this.db.prepare('SELECT * FROM meta WHERE attribute = ?').get(attribute),
    );
    if (raw === undefined) {
      return null;
    }
    const row = this.query(() => MetaRowSchema.parse(raw));
    return {
      attribute: row.attribute,
      broken: row.broken === 1,
      insecure: row.insecure === 1,
      unsupported: row.unsupported === 1,
      unfree: row.unfree === 1,
      description: row.description ?? '',
      longdescription: row.longdescription ?? '',
      homepage: row.homepage ?? '',
      maintainers: parseJsonColumn(row.maintainers),
      position: row.position ?? '',
      license: parseJsonColumn(row.license),
      platforms: parseJsonColumn(row.platforms),
    };
  }

  close(): void {
    this.db.close();
  }

  private select(sql: string, value: string): PkgRow[] {
    return this.query(() => PkgRowSchema.array().parse(this.db.prepare(sql).all(value)));
  }

  private query<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new StoreError(`Query failed: ${describeError(error)}`, this.storePath);
    }
  }
}
