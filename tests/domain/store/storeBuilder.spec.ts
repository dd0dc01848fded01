import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StatementBulkLoader, type BulkLoader } from '../../../src/domain/store/bulkLoader.js';
import { StoreError } from '../../../src/domain/store/errors.js';
import { PLAIN_PKGS_TABLE } from '../../../src/domain/store/schema.js';
import { StoreBuilder } from '../../../src/domain/store/storeBuilder.js';
import { extendedDocument, extendedPackage, plainDocument } from '../../helpers/indexDocuments.js';

function selectAll(storePath: string, sql: string): unknown[] {
  const db = new Database(storePath, { readonly: true });
  try {
    return db.prepare(sql).all();
  } finally {
    db.close();
  }
}

describe('StoreBuilder', () => {
  let tempDir: string;
  let storePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'pkgcache-store-'));
    storePath = path.join(tempDir, 'legacy.db');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('builds a plain store with one row per attribute', async () => {
    const builder = new StoreBuilder(new StatementBulkLoader());

    const result = await builder.build(
      plainDocument({ pkgA: ['a', '1.0'], pkgB: ['b', '2.0'] }),
      storePath,
    );

    expect(result).toEqual({ storePath, packageCount: 2, metaCount: 0 });
    expect(selectAll(storePath, 'SELECT * FROM pkgs ORDER BY attribute')).toEqual([
      { attribute: 'pkgA', pname: 'a', version: '1.0' },
      { attribute: 'pkgB', pname: 'b', version: '2.0' },
    ]);
    expect(
      selectAll(storePath, "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"),
    ).toEqual([{ name: 'pkgs' }]);
  });

  it('creates the lookup indexes', async () => {
    const builder = new StoreBuilder(new StatementBulkLoader());

    await builder.build(plainDocument({ pkgA: ['a', '1.0'] }), storePath);

    expect(
      selectAll(
        storePath,
        "SELECT name FROM sqlite_master WHERE type = 'index' " +
          "AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ),
    ).toEqual([{ name: 'attributes' }, { name: 'pnames' }]);
  });

  it('builds pkgs and meta tables for the extended variant', async () => {
    const builder = new StoreBuilder(new StatementBulkLoader());

    const result = await builder.build(
      extendedDocument({
        hello: extendedPackage('hello', '2.12', {
          broken: true,
          description: 'greeter',
          homepage: { kind: 'list', values: ['https://hello.test', 'https://alt.test'] },
          license: { spdxId: 'GPL-3.0-or-later' },
        }),
      }),
      storePath,
    );

    expect(result.metaCount).toBe(1);
    expect(selectAll(storePath, 'SELECT * FROM pkgs')).toEqual([
      { attribute: 'hello', system: 'x86_64-linux', pname: 'hello', version: '2.12' },
    ]);
    expect(selectAll(storePath, 'SELECT * FROM meta')).toEqual([
      {
        attribute: 'hello',
        broken: 1,
        insecure: 0,
        unsupported: 0,
        unfree: 0,
        description: 'greeter',
        longdescription: '',
        homepage: 'https://hello.test',
        maintainers: '',
        position: '',
        license: '{"spdxId":"GPL-3.0-or-later"}',
        platforms: '',
      },
    ]);
  });

  it('replaces the previous store instead of appending to it', async () => {
    const builder = new StoreBuilder(new StatementBulkLoader());

    await builder.build(plainDocument({ pkgA: ['a', '1.0'], pkgB: ['b', '2.0'] }), storePath);
    await builder.build(plainDocument({ pkgC: ['c', '3.0'] }), storePath);

    expect(selectAll(storePath, 'SELECT attribute FROM pkgs')).toEqual([{ attribute: 'pkgC' }]);
  });

  it('replaces a file that is not a store', async () => {
    await writeFile(storePath, 'not a database');
    const builder = new StoreBuilder(new StatementBulkLoader());

    await builder.build(plainDocument({ pkgA: ['a', '1.0'] }), storePath);

    expect(selectAll(storePath, 'SELECT attribute FROM pkgs')).toEqual([{ attribute: 'pkgA' }]);
  });

  it('loads pkgs before meta through the configured loader', async () => {
    const load = vi.fn<BulkLoader['load']>(async () => undefined);
    const builder = new StoreBuilder({ kind: 'sqlite3', load });

    await builder.build(extendedDocument({ jq: extendedPackage('jq', '1.7') }), storePath);

    expect(load.mock.calls.map(([, table]) => table.name)).toEqual(['pkgs', 'meta']);
    expect(load.mock.calls[0][2]).toEqual([['jq', 'x86_64-linux', 'jq', '1.7']]);
  });

  it('propagates loader failures', async () => {
    const load = vi.fn<BulkLoader['load']>(async () =>
      Promise.reject(new StoreError('Bulk load into pkgs failed', storePath)),
    );
    const builder = new StoreBuilder({ kind: 'statement', load });

    await expect(
      builder.build(plainDocument({ pkgA: ['a', '1.0'] }), storePath),
    ).rejects.toThrow('Bulk load into pkgs failed');
  });

  it('fails with StoreError when the store cannot be created', async () => {
    const builder = new StoreBuilder(new StatementBulkLoader());

    await expect(
      builder.build(plainDocument({}), path.join(tempDir, 'missing', 'legacy.db')),
    ).rejects.toThrow(StoreError);
  });
});

describe('StatementBulkLoader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'pkgcache-loader-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('refuses to create a store that does not exist', async () => {
    const loader = new StatementBulkLoader();

    await expect(
      loader.load(path.join(tempDir, 'absent.db'), PLAIN_PKGS_TABLE, [['pkgA', 'a', '1.0']]),
    ).rejects.toThrow(StoreError);
  });

  it('rolls back the whole batch when a row is rejected', async () => {
    const storePath = path.join(tempDir, 'legacy.db');
    await new StoreBuilder(new StatementBulkLoader()).build(plainDocument({}), storePath);
    const loader = new StatementBulkLoader();

    await expect(
      loader.load(storePath, PLAIN_PKGS_TABLE, [
        ['pkgA', 'a', '1.0'],
        ['pkgA', 'a', '1.1'],
      ]),
    ).rejects.toThrow('Bulk load into pkgs failed');
    expect(selectAll(storePath, 'SELECT * FROM pkgs')).toEqual([]);
  });
});
