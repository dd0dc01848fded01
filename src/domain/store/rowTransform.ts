import type {
  ExtendedPackage,
  Homepage,
  IndexDocument,
  PackageMeta,
} from '../types/packageIndex.js';
import type { TableRow } from './schema.js';

export function flagToInteger(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

export function resolveHomepage(homepage: Homepage | undefined): string {
  if (!homepage) {
    return '';
  }
  return homepage.kind === 'single' ? homepage.value : (homepage.values[0] ?? '');
}

/**
 * Serialize an opaque JSON value for a JSON column. Absent values and values
 * that cannot be serialized become empty text.
 */
export function serializeJsonColumn(value: unknown): string {
  if (value === undefined) {
    return '';
  }
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return '';
  }
}

export function metaRow(attribute: string, meta: PackageMeta): TableRow {
  return [
    attribute,
    flagToInteger(meta.broken),
    flagToInteger(meta.insecure),
    flagToInteger(meta.unsupported),
    flagToInteger(meta.unfree),
    meta.description ?? '',
    meta.longdescription ?? '',
    resolveHomepage(meta.homepage),
    serializeJsonColumn(meta.maintainers),
    meta.position ?? '',
    serializeJsonColumn(meta.license),
    serializeJsonColumn(meta.platforms),
  ];
}

function extendedPkgRow(attribute: string, pkg: ExtendedPackage): TableRow {
  return [attribute, pkg.system, pkg.pname, pkg.version];
}

export interface TransformedRows {
  pkgs: TableRow[];
  meta: TableRow[] | null;
}

/**
 * Turn a decoded document into rows in the column order of the store schema.
 */
export function transformDocument(document: IndexDocument): TransformedRows {
  if (document.variant === 'plain') {
    const pkgs: TableRow[] = [];
    for (const [attribute, pkg] of document.packages) {
      pkgs.push([attribute, pkg.pname, pkg.version]);
    }
    return { pkgs, meta: null };
  }

  const pkgs: TableRow[] = [];
  const meta: TableRow[] = [];
  for (const [attribute, pkg] of document.packages) {
    pkgs.push(extendedPkgRow(attribute, pkg));
    meta.push(metaRow(attribute, pkg.meta));
  }
  return { pkgs, meta };
}
