import { createChildLogger } from '../../utils/logger.js';
import type { DeclaredPackageSet } from '../types/packageIndex.js';
import type { PackageStore } from './packageStore.js';

const logger = createChildLogger({ service: 'QueryResolver' });

export interface ResolutionResult {
  versions: Record<string, string>;
  /** Identifiers left out of `versions`; callers treat them as unresolved */
  dropped: {
    missing: number;
    ambiguous: number;
  };
}

/**
 * Point-resolve every declared attribute. An attribute resolves only when
 * exactly one row matches; unknown and ambiguous attributes are dropped.
 */
export class QueryResolver {
  resolve(
    declared: DeclaredPackageSet,
    store: Pick<PackageStore, 'findByAttribute'>,
  ): ResolutionResult {
    const resolved = new Map<string, string>();
    let missing = 0;
    let ambiguous = 0;

    for (const attribute of declared) {
      const rows = store.findByAttribute(attribute);
      if (rows.length === 1) {
        resolved.set(attribute, rows[0].version ?? '');
      } else if (rows.length === 0) {
        missing += 1;
      } else {
        ambiguous += 1;
      }
    }

    logger.debug(
      { declared: declared.size, resolved: resolved.size, missing, ambiguous },
      'Resolved declared packages',
    );
    // own properties, so __proto__ is a key like any other
    return { versions: Object.fromEntries(resolved), dropped: { missing, ambiguous } };
  }
}
