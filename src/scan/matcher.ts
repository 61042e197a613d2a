import type { ApiCategory } from "../reference/types.js";

/**
 * Intersect a sample's imports with each category's known APIs.
 *
 * Returns one list per category, parallel to `categories`. Comparison is
 * exact and case-sensitive; names are compared as the PE reader reports
 * them. Within a category, matches follow the category's stored order.
 * A name may match several categories and is reported under each.
 */
export function matchImports(
  categories: readonly ApiCategory[],
  imports: Iterable<string>,
): string[][] {
  const importSet = imports instanceof Set ? imports : new Set(imports);
  return categories.map((category) =>
    category.apis.filter((api) => importSet.has(api.name)).map((api) => api.name),
  );
}
