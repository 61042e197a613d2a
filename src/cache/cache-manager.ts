/**
 * Cache manager: decides which reference manifest an invocation uses.
 *
 * Offline first. A valid persisted store is used as-is unless a refresh is
 * requested; a refresh that fails falls back to that store. Writes go to a
 * temp file that is then renamed over the canonical one, so readers never
 * see a half-written store.
 *
 * There is no inter-process lock: two processes refreshing at once race on
 * the rename and the last writer wins.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { CacheError, FetchError, ParseError, PEScanError } from "../errors/pescan-error.js";
import { toPEScanError } from "../errors/error-mapper.js";
import { CategoryStore } from "../reference/category-store.js";
import { decodeManifest, encodeManifest } from "../reference/manifest.js";
import type { CacheManifest } from "../reference/types.js";
import type { SourceFetcher } from "../fetcher/source-fetcher.js";

/**
 * How the returned store was obtained:
 * - `cache`: read from disk, no network
 * - `refreshed`: fetched and persisted
 * - `stale`: refresh failed, fell back to the persisted store
 * - `unpersisted`: fetched, but could not be (or is not configured to be) saved
 */
export type StoreSource = "cache" | "refreshed" | "stale" | "unpersisted";

export interface LoadResult {
  store: CategoryStore;
  source: StoreSource;
  /** Problems met during this load; empty when nothing went wrong */
  warnings: string[];
  cacheFile: string | undefined;
}

function unavailableRemediation(cause: PEScanError): string {
  if (cause instanceof ParseError) {
    return "The reference pages no longer have the expected layout. Point --source-url at a compatible copy, " +
      "or pass --cache-file with a reference cache built earlier";
  }
  if (cause instanceof FetchError) {
    return "There is no cached reference data yet. Run again with network access to the reference source to build it";
  }
  return "Run again with network access to build the reference cache";
}

export interface CacheManagerOptions {
  /** Canonical cache file; undefined disables persistence */
  cacheFile: string | undefined;
  fetcher: SourceFetcher;
}

export class CacheManager {
  readonly cacheFile: string | undefined;
  private readonly fetcher: SourceFetcher;

  constructor(options: CacheManagerOptions) {
    this.cacheFile = options.cacheFile;
    this.fetcher = options.fetcher;
  }

  async load(forceRefresh = false): Promise<LoadResult> {
    const warnings: string[] = [];
    const warn = (message: string) => {
      warnings.push(message);
      console.error(`WARNING: ${message}`);
    };
    const result = (manifest: CacheManifest, source: StoreSource): LoadResult => ({
      store: new CategoryStore(manifest),
      source,
      warnings,
      cacheFile: this.cacheFile,
    });

    const persisted = this.readPersisted(warn);
    if (persisted && !forceRefresh) {
      return result(persisted, "cache");
    }

    let manifest: CacheManifest;
    try {
      manifest = await this.fetcher.fetchManifest();
    } catch (err) {
      const cause = toPEScanError(err);
      if (persisted) {
        warn(`Could not refresh API reference data (${cause.message}); using cached data from ${persisted.fetchedAt}`);
        return result(persisted, "stale");
      }
      throw new PEScanError(
        `No API reference data available: ${cause.message}`,
        "REFERENCE_DATA_UNAVAILABLE",
        "cache",
        unavailableRemediation(cause),
      );
    }

    if (!this.cacheFile) {
      warn("Could not find a cache directory for this user; reference data will not be cached");
      return result(manifest, "unpersisted");
    }

    try {
      this.persist(manifest);
    } catch (err) {
      warn(toPEScanError(err).message);
      return result(manifest, "unpersisted");
    }

    return result(manifest, "refreshed");
  }

  /**
   * Read the persisted manifest. Missing, corrupt and version-mismatched
   * files all come back as undefined; the latter two are reported.
   */
  readPersisted(warn: (message: string) => void = () => {}): CacheManifest | undefined {
    if (!this.cacheFile || !existsSync(this.cacheFile)) {
      return undefined;
    }

    try {
      return decodeManifest(readFileSync(this.cacheFile, "utf-8"));
    } catch (err) {
      const mapped = err instanceof CacheError
        ? err
        : new CacheError(`Could not read reference cache: ${toPEScanError(err).message}`, "CACHE_CORRUPT");
      warn(`${mapped.message}; it will be rebuilt`);
      return undefined;
    }
  }

  /** Atomically replace the cache file with `manifest`. */
  persist(manifest: CacheManifest): void {
    if (!this.cacheFile) {
      throw new CacheError("No cache file configured", "CACHE_WRITE_FAILED");
    }

    const tempPath = `${this.cacheFile}.tmp.${process.pid}`;
    try {
      mkdirSync(dirname(this.cacheFile), { recursive: true });
      writeFileSync(tempPath, encodeManifest(manifest), "utf-8");
      renameSync(tempPath, this.cacheFile);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw new CacheError(
        `Failed to write reference cache ${this.cacheFile}: ${toPEScanError(err).message}`,
        "CACHE_WRITE_FAILED",
        "Check that the cache directory is writable, or set PESCAN_CACHE_DIR",
      );
    }
  }
}
