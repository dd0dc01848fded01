import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { decodeIndexDocument } from '../../../src/domain/fetch/indexDocument.js';
import { PackageStore } from '../../../src/domain/query/packageStore.js';
import type { BulkLoader } from '../../../src/domain/store/bulkLoader.js';
import { StatementBulkLoader } from '../../../src/domain/store/bulkLoader.js';
import { StoreError } from '../../../src/domain/store/errors.js';
import { Sqlite3CliBulkLoader } from '../../../src/domain/store/sqlite3CliLoader.js';
import { StoreBuilder } from '../../../src/domain/store/storeBuilder.js';
import type { IndexDocument } from '../../../src/domain/types/packageIndex.js';
import { extendedDocument, extendedPackage, plainDocument } from '../../helpers/indexDocuments.js';
import { hasSqlite3 } from '../../helpers/sqlite3.js';

describe('PackageStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'pkgcache-query-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function openBuilt(document: IndexDocument): Promise<PackageStore> {
    const storePath = path.join(tempDir, `${document.variant}.db`);
    await new StoreBuilder(new StatementBulkLoader()).build(document, storePath);
    return PackageStore.open(storePath);
  }

  it('finds a package by attribute', async () => {
    const store = await openBuilt(plainDocument({ pkgA: ['a', '1.0'], pkgB: ['b', '2.0'] }));

    try {
      expect(store.findByAttribute('pkgA')).toEqual([
        { attribute: 'pkgA', pname: 'a', version: '1.0' },
      ]);
      expect(store.findByAttribute('pkgC')).toEqual([]);
    } finally {
      store.close();
    }
  });

  it('lists every attribute sharing a pname in attribute order', async () => {
    const store = await openBuilt(
      plainDocument({
        python312: ['python3', '3.12.1'],
        python311: ['python3', '3.11.7'],
        ruby: ['ruby', '3.3.0'],
      }),
    );

    try {
      expect(store.findByPname('python3')).toEqual([
        { attribute: 'python311', pname: 'python3', version: '3.11.7' },
        { attribute: 'python312', pname: 'python3', version: '3.12.1' },
      ]);
    } finally {
      store.close();
    }
  });

  it('reads metadata back with flags and JSON columns decoded', async () => {
    const store = await openBuilt(
      extendedDocument({
        hello: extendedPackage('hello', '2.12', {
          unfree: true,
          description: 'greeter',
          maintainers: [{ name: 'Alice' }],
          license: 3,
          homepage: { kind: 'single', value: 'https://hello.test' },
        }),
      }),
    );

    try {
      expect(store.hasMeta()).toBe(true);
      expect(store.getMeta('hello')).toEqual({
        attribute: 'hello',
        broken: false,
        insecure: false,
        unsupported: false,
        unfree: true,
        description: 'greeter',
        longdescription: '',
        homepage: 'https://hello.test',
        maintainers: [{ name: 'Alice' }],
        position: '',
        license: 3,
        platforms: null,
      });
      expect(store.getMeta('absent')).toBeNull();
    } finally {
      store.close();
    }
  });

  it('has no metadata for a plain store', async () => {
    const store = await openBuilt(plainDocument({ pkgA: ['a', '1.0'] }));

    try {
      expect(store.hasMeta()).toBe(false);
      expect(store.getMeta('pkgA')).toBeNull();
    } finally {
      store.close();
    }
  });

  it('fails with StoreError when the store does not exist', () => {
    expect(() => PackageStore.open(path.join(tempDir, 'absent.db'))).toThrow(StoreError);
  });

  it('wraps a metadata row that does not decode in StoreError', () => {
    const storePath = path.join(tempDir, 'odd.db');
    const db = new Database(storePath);
    try {
      db.exec('CREATE TABLE meta (attribute TEXT PRIMARY KEY, broken INTEGER)');
      db.prepare('INSERT INTO meta VALUES (?, ?)').run('hello', 'abc');
    } finally {
      db.close();
    }

    const store = PackageStore.open(storePath);
    try {
      expect(store.hasMeta()).toBe(true);
      expect(() => store.getMeta('hello')).toThrow(StoreError);
      expect(() => store.getMeta('hello')).toThrow(/^Query failed: /);
    } finally {
      store.close();
    }
  });

  it('wraps a failing metadata lookup in StoreError', async () => {
    const store = await openBuilt(plainDocument({ pkgA: ['a', '1.0'] }));
    store.close();

    expect(() => store.hasMeta()).toThrow(StoreError);
    expect(() => store.getMeta('pkgA')).toThrow(StoreError);
  });
});

const loaders: Array<{ name: string; create: () => BulkLoader }> = [
  { name: 'statement', create: () => new StatementBulkLoader() },
];
if (hasSqlite3) {
  loaders.push({ name: 'sqlite3', create: () => new Sqlite3CliBulkLoader() });
}

describe.each(loaders)('PackageStore round trip through the $name loader', ({ create }) => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'pkgcache-roundtrip-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  const meta = {
    broken: true,
    insecure: true,
    unsupported: true,
    unfree: true,
    description: 'a, "quoted"\nmulti\r\nline',
    longdescription: 'Prints a greeting.\n\nIt has, "commas" too.',
    homepage: 'https://hello.test/docs?a=1,b=2',
    maintainers: [{ name: 'Alice, "Al"', email: 'alice@example.test' }],
    position: 'pkgs/by-name/he/hello/package.nix:34',
    license: 5,
    platforms: ['x86_64-linux', 'aarch64-darwin'],
  };

  it('returns every column of a fully populated record unchanged', async () => {
    const document = decodeIndexDocument(
      {
        version: 2,
        packages: { hello: { pname: 'hello', version: '2.12.1', system: 'x86_64-linux', meta } },
      },
      'extended',
    );
    const storePath = path.join(tempDir, 'extended.db');
    await new StoreBuilder(create()).build(document, storePath);

    const store = PackageStore.open(storePath);
    try {
      expect(store.findByAttribute('hello')).toEqual([
        { attribute: 'hello', pname: 'hello', version: '2.12.1' },
      ]);
      expect(store.getMeta('hello')).toEqual({ attribute: 'hello', ...meta });
    } finally {
      store.close();
    }
  });

  it('decodes an object license and defaults an absent meta record', async () => {
    const license = { spdxId: 'MIT', fullName: 'MIT License, "Expat"', free: true };
    const document = decodeIndexDocument(
      {
        hello: { pname: 'hello', version: '2.12.1', system: 'x86_64-linux', meta: { license } },
        bare: { pname: 'bare', version: '0.1', system: 'aarch64-linux' },
      },
      'extended',
    );
    const storePath = path.join(tempDir, 'extended.db');
    await new StoreBuilder(create()).build(document, storePath);

    const store = PackageStore.open(storePath);
    try {
      expect(store.getMeta('hello')?.license).toEqual(license);
      expect(store.getMeta('bare')).toEqual({
        attribute: 'bare',
        broken: false,
        insecure: false,
        unsupported: false,
        unfree: false,
        description: '',
        longdescription: '',
        homepage: '',
        maintainers: null,
        position: '',
        license: null,
        platforms: null,
      });
    } finally {
      store.close();
    }
  });
});
