import type Database from 'better-sqlite3';

import type { IndexVariant } from '../types/packageIndex.js';

export type CellValue = string | number;
export type TableRow = readonly CellValue[];

export interface TableSpec {
  name: string;
  /** Column order of the CREATE TABLE statement; rows follow it */
  columns: readonly string[];
}

export const PLAIN_PKGS_TABLE: TableSpec = {
  name: 'pkgs',
  columns: ['attribute', 'pname', 'version'],
};

export const EXTENDED_PKGS_TABLE: TableSpec = {
  name: 'pkgs',
  columns: ['attribute', 'system', 'pname', 'version'],
};

export const META_TABLE: TableSpec = {
  name: 'meta',
  columns: [
    'attribute',
    'broken',
    'insecure',
    'unsupported',
    'unfree',
    'description',
    'longdescription',
    'homepage',
    'maintainers',
    'position',
    'license',
    'platforms',
  ],
};

const PLAIN_SCHEMA = `
  CREATE TABLE "pkgs" (
    "attribute" TEXT NOT NULL UNIQUE,
    "pname" TEXT,
    "version" TEXT,
    PRIMARY KEY("attribute")
  );
  CREATE UNIQUE INDEX "attributes" ON "pkgs" ("attribute");
  CREATE INDEX "pnames" ON "pkgs" ("pname");
`;

const EXTENDED_SCHEMA = `
  CREATE TABLE "pkgs" (
    "attribute" TEXT NOT NULL UNIQUE,
    "system" TEXT,
    "pname" TEXT,
    "version" TEXT,
    PRIMARY KEY("attribute")
  );
  CREATE TABLE "meta" (
    "attribute" TEXT NOT NULL UNIQUE,
    "broken" INTEGER,
    "insecure" INTEGER,
    "unsupported" INTEGER,
    "unfree" INTEGER,
    "description" TEXT,
    "longdescription" TEXT,
    "homepage" TEXT,
    "maintainers" JSON,
    "position" TEXT,
    "license" JSON,
    "platforms" JSON,
    FOREIGN KEY("attribute") REFERENCES "pkgs"("attribute"),
    PRIMARY KEY("attribute")
  );
  CREATE UNIQUE INDEX "attributes" ON "pkgs" ("attribute");
  CREATE UNIQUE INDEX "metaattributes" ON "meta" ("attribute");
  CREATE INDEX "pnames" ON "pkgs" ("pname");
`;

export function initializeIndexSchema(db: Database.Database, variant: IndexVariant): void {
  db.exec(variant === 'extended' ? EXTENDED_SCHEMA : PLAIN_SCHEMA);
}

export function pkgsTableFor(variant: IndexVariant): TableSpec {
  return variant === 'extended' ? EXTENDED_PKGS_TABLE : PLAIN_PKGS_TABLE;
}
