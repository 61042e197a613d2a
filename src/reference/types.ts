/**
 * Reference data model: behavioral API categories and per-API metadata.
 */

/** Bumped whenever the persisted layout changes; older files are refetched. */
export const MANIFEST_VERSION = 2;

/** One known API name and the metadata the reference source publishes for it. */
export interface ApiEntry {
  name: string;
  /** Summary of what the API does */
  description?: string;
  /** DLL that exports the API */
  library?: string;
  /** Link to the vendor documentation page */
  documentation?: string;
}

/** A behavioral grouping (e.g. "Injection") and the APIs that belong to it. */
export interface ApiCategory {
  header: string;
  apis: ApiEntry[];
}

/**
 * A full snapshot of the reference data.
 *
 * Category order is significant: match results are correlated back to
 * categories by index.
 */
export interface CacheManifest {
  version: number;
  /** ISO-8601 timestamp of the fetch that produced this snapshot */
  fetchedAt: string;
  /** Base URL the snapshot was scraped from */
  source: string;
  categories: ApiCategory[];
}

export type DetailKind = "description" | "library" | "documentation";

export const DETAIL_KINDS: readonly DetailKind[] = ["description", "library", "documentation"];
