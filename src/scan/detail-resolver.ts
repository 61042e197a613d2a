/**
 * Attaches reference metadata to matched imports.
 */

import type { CategoryStore } from "../reference/category-store.js";
import { DETAIL_KINDS, type DetailKind } from "../reference/types.js";

export interface SuspectImport {
  name: string;
  description?: string;
  library?: string;
  documentation?: string;
}

/** Detail selection as accepted from callers; "all" stands for every kind. */
export type DetailRequest = DetailKind | "all";

export function expandDetailKinds(requested: Iterable<DetailRequest>): Set<DetailKind> {
  const kinds = new Set<DetailKind>();
  for (const kind of requested) {
    if (kind === "all") {
      DETAIL_KINDS.forEach((k) => kinds.add(k));
    } else {
      kinds.add(kind);
    }
  }
  return kinds;
}

/**
 * Build suspect records for per-category match lists.
 *
 * Only requested fields are copied, and only when the store has a value for
 * that (category, name) pair; a missing entry or field leaves the field off.
 * With nothing requested the store is not consulted at all.
 */
export function resolveDetails(
  store: CategoryStore,
  matches: readonly string[][],
  kinds: ReadonlySet<DetailKind>,
): SuspectImport[][] {
  if (kinds.size === 0) {
    return matches.map((names) => names.map((name) => ({ name })));
  }

  return matches.map((names, categoryIndex) =>
    names.map((name) => {
      const suspect: SuspectImport = { name };
      const entry = store.getApi(categoryIndex, name);
      if (!entry) return suspect;
      for (const kind of kinds) {
        const value = entry[kind];
        if (value !== undefined) suspect[kind] = value;
      }
      return suspect;
    }),
  );
}
