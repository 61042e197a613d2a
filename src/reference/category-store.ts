import type { ApiCategory, ApiEntry, CacheManifest } from "./types.js";

export interface ApiLocation {
  categoryIndex: number;
  header: string;
  entry: ApiEntry;
}

/**
 * Read-only view over a loaded manifest.
 *
 * Built once per invocation; indexes each category's entries by name so
 * matching and detail lookups do not rescan the lists.
 */
export class CategoryStore {
  private readonly manifest: CacheManifest;
  private readonly byCategory: Array<Map<string, ApiEntry>>;

  constructor(manifest: CacheManifest) {
    this.manifest = manifest;
    this.byCategory = manifest.categories.map(
      (category) => new Map(category.apis.map((api) => [api.name, api])),
    );
  }

  /** Category headers in store order. */
  get headers(): string[] {
    return this.manifest.categories.map((c) => c.header);
  }

  get categories(): readonly ApiCategory[] {
    return this.manifest.categories;
  }

  get fetchedAt(): string {
    return this.manifest.fetchedAt;
  }

  get source(): string {
    return this.manifest.source;
  }

  /** Total (category, name) pairs. */
  get apiCount(): number {
    return this.byCategory.reduce((sum, m) => sum + m.size, 0);
  }

  /** Entry for `name` within one category, if the store knows it there. */
  getApi(categoryIndex: number, name: string): ApiEntry | undefined {
    return this.byCategory[categoryIndex]?.get(name);
  }

  /** Every category that lists `name`, in store order. */
  locate(name: string): ApiLocation[] {
    const found: ApiLocation[] = [];
    this.byCategory.forEach((entries, categoryIndex) => {
      const entry = entries.get(name);
      if (entry) {
        found.push({ categoryIndex, header: this.manifest.categories[categoryIndex].header, entry });
      }
    });
    return found;
  }

  toManifest(): CacheManifest {
    return this.manifest;
  }
}
