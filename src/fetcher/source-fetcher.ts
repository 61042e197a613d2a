/**
 * Source fetcher: scrapes the malapi.io reference tables into a manifest.
 *
 * One index request, then one request per distinct API name for its detail
 * page, issued with bounded concurrency. Nothing here touches the disk;
 * persistence belongs to the cache manager.
 */

import { FetchError, PEScanError } from "../errors/pescan-error.js";
import { toPEScanError } from "../errors/error-mapper.js";
import { MANIFEST_VERSION, type ApiCategory, type ApiEntry, type CacheManifest } from "../reference/types.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { PACKAGE_NAME, PACKAGE_VERSION } from "../version.js";
import { parseDetailPage, parseIndexPage, type ApiDetails } from "./malapi-parser.js";

export const DEFAULT_SOURCE_URL = "https://malapi.io";
export const DEFAULT_FETCH_THREADS = 4;
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

/** malapi.io answers 406 for APIs it lists but has no detail page for. */
const NO_DETAILS_STATUS = 406;

export interface SourceFetcher {
  fetchManifest(): Promise<CacheManifest>;
}

export interface MalApiFetcherOptions {
  sourceUrl?: string;
  /** Maximum detail-page requests in flight */
  threads?: number;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

export class MalApiFetcher implements SourceFetcher {
  private readonly sourceUrl: string;
  private readonly threads: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MalApiFetcherOptions = {}) {
    this.sourceUrl = (options.sourceUrl ?? DEFAULT_SOURCE_URL).replace(/\/+$/, "");
    this.threads = Math.max(1, options.threads ?? DEFAULT_FETCH_THREADS);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchManifest(): Promise<CacheManifest> {
    const index = parseIndexPage(await this.getText(`${this.sourceUrl}/`));

    // The same name can sit in several categories; its page is fetched once
    const pending = new Map<string, Promise<ApiDetails>>();
    const detailsFor = (name: string) => {
      let request = pending.get(name);
      if (!request) {
        request = this.fetchDetails(name);
        pending.set(name, request);
      }
      return request;
    };

    const categories: ApiCategory[] = [];
    for (const [i, header] of index.headers.entries()) {
      const names = index.columns[i];
      console.error(`Fetching details for ${names.length} APIs in "${header}"`);
      const apis = await runWithConcurrency(names, this.threads, async (name): Promise<ApiEntry> => ({
        name,
        ...(await detailsFor(name)),
      }));
      categories.push({ header, apis });
    }

    return {
      version: MANIFEST_VERSION,
      fetchedAt: new Date().toISOString(),
      source: this.sourceUrl,
      categories,
    };
  }

  private async fetchDetails(name: string): Promise<ApiDetails> {
    const url = `${this.sourceUrl}/winapi/${encodeURIComponent(name)}`;
    const res = await this.request(url);
    if (res.status === NO_DETAILS_STATUS) {
      console.error(`WARNING: No detail page for ${name}; keeping it without metadata`);
      await this.discardBody(res);
      return {};
    }
    await this.ensureOk(res, url);
    return parseDetailPage(await this.readBody(res, url), name);
  }

  private async getText(url: string): Promise<string> {
    const res = await this.request(url);
    await this.ensureOk(res, url);
    return this.readBody(res, url);
  }

  private async request(url: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers: { "User-Agent": `${PACKAGE_NAME}/${PACKAGE_VERSION}` },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw asFetchError(err, url);
    }
  }

  private async readBody(res: Response, url: string): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw asFetchError(err, url);
    }
  }

  // An unread body keeps its connection out of the pool
  private async discardBody(res: Response): Promise<void> {
    await res.body?.cancel();
  }

  private async ensureOk(res: Response, url: string): Promise<void> {
    if (!res.ok) {
      await this.discardBody(res);
      throw new FetchError(
        `GET ${url} returned HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`,
        "HTTP_STATUS",
        res.status,
      );
    }
  }
}

/** Anything thrown by the transport is a FetchError, whatever its shape. */
function asFetchError(err: unknown, url: string): PEScanError {
  const mapped = toPEScanError(err);
  if (mapped instanceof FetchError) {
    return mapped;
  }
  return new FetchError(`GET ${url} failed: ${mapped.message}`);
}
