/**
 * Process-wide holder for the loaded reference store.
 *
 * The first tool call loads the store through the cache manager; later calls
 * reuse it. A refresh swaps in a whole new store; loaded stores are never
 * modified. A failed load is not remembered, so the next call retries.
 */

import type { CacheManager, LoadResult } from "../cache/cache-manager.js";

export class ReferenceData {
  private current: Promise<LoadResult> | undefined;

  constructor(private readonly manager: CacheManager) {}

  get cacheFile(): string | undefined {
    return this.manager.cacheFile;
  }

  /**
   * The loaded store, loading it from cache (or network) on first use.
   * Load warnings go to the call that triggered the load; calls that reuse
   * the store get none.
   */
  get(): Promise<LoadResult> {
    if (!this.current) {
      this.current = this.track(this.manager.load(false));
      return this.current;
    }
    return this.current.then((loaded) => ({ ...loaded, warnings: [] }));
  }

  /** Force a refetch and make the result current. */
  refresh(): Promise<LoadResult> {
    this.current = this.track(this.manager.load(true));
    return this.current;
  }

  private track(load: Promise<LoadResult>): Promise<LoadResult> {
    const tracked: Promise<LoadResult> = load.catch((err: unknown) => {
      if (this.current === tracked) {
        this.current = undefined;
      }
      throw err;
    });
    return tracked;
  }
}
