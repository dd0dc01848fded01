/**
 * In-memory model of a remote package index and of the cache artifacts
 * built from it.
 */

export type IndexVariant = 'extended' | 'plain';

export const SOURCE_SELECTORS = ['system', 'legacy', 'flake'] as const;

export type SourceSelector = (typeof SOURCE_SELECTORS)[number];

/**
 * A homepage as published upstream: either one URL or a list of them.
 */
export type Homepage = { kind: 'single'; value: string } | { kind: 'list'; values: string[] };

/**
 * Descriptive metadata of the extended index. The four flags are always
 * present after decoding: an absent upstream flag decodes to `false`.
 */
export interface PackageMeta {
  broken: boolean;
  insecure: boolean;
  unsupported: boolean;
  unfree: boolean;
  description?: string;
  longdescription?: string;
  homepage?: Homepage;
  maintainers?: unknown;
  license?: unknown;
  platforms?: unknown;
  position?: string;
}

export interface PlainPackage {
  pname: string;
  version: string;
}

export interface ExtendedPackage extends PlainPackage {
  system: string;
  meta: PackageMeta;
}

export type PlainIndexDocument = {
  variant: 'plain';
  packages: Map<string, PlainPackage>;
};

export type ExtendedIndexDocument = {
  variant: 'extended';
  packages: Map<string, ExtendedPackage>;
};

export type IndexDocument = PlainIndexDocument | ExtendedIndexDocument;

/**
 * Where a cache artifact and its version marker live, and which version the
 * artifact was built from.
 */
export interface CacheManifest {
  artifactPath: string;
  markerPath: string;
  version: string;
}

export type DeclaredPackageSet = Set<string>;
