/**
 * JSON envelope returned by every MCP tool.
 *
 * `data` is the tool's own result. `metadata` carries the call timing and,
 * for tools that read the API reference, where that data came from: a
 * `stale` reference means a refresh failed and the cached copy answered.
 */

import type { LoadResult, StoreSource } from "./cache/cache-manager.js";
import { PEScanError, type ErrorCategory } from "./errors/pescan-error.js";

export interface ReferenceProvenance {
  source: StoreSource;
  stale: boolean;
  fetched_at: string;
  source_url: string;
  category_count: number;
  api_count: number;
  cache_file?: string;
}

export interface EnvelopeMetadata {
  elapsed_ms: number;
  reference?: ReferenceProvenance;
  warnings?: string[];
}

export interface ToolEnvelope {
  success: boolean;
  tool: string;
  data: Record<string, unknown>;
  error?: string;
  error_code?: string;
  error_category?: ErrorCategory;
  remediation?: string;
  metadata: EnvelopeMetadata;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

// Scan reports over large import tables are sent without indentation
const COMPACT_THRESHOLD = 50 * 1024;

export function referenceProvenance(loaded: LoadResult): ReferenceProvenance {
  const { store } = loaded;
  return {
    source: loaded.source,
    stale: loaded.source === "stale",
    fetched_at: store.fetchedAt,
    source_url: store.source,
    category_count: store.categories.length,
    api_count: store.apiCount,
    ...(loaded.cacheFile ? { cache_file: loaded.cacheFile } : {}),
  };
}

function buildMetadata(startTime: number, loaded?: LoadResult): EnvelopeMetadata {
  const metadata: EnvelopeMetadata = { elapsed_ms: Date.now() - startTime };
  if (loaded) {
    metadata.reference = referenceProvenance(loaded);
    if (loaded.warnings.length > 0) {
      metadata.warnings = loaded.warnings;
    }
  }
  return metadata;
}

/**
 * Build a success envelope. Pass the reference load the tool answered from
 * to report its provenance and any warnings raised while loading it.
 */
export function formatResponse(
  tool: string,
  data: Record<string, unknown>,
  startTime: number,
  loaded?: LoadResult,
): ToolResult {
  const envelope: ToolEnvelope = {
    success: true,
    tool,
    data,
    metadata: buildMetadata(startTime, loaded),
  };
  const compact = JSON.stringify(envelope);
  const text = compact.length > COMPACT_THRESHOLD ? compact : JSON.stringify(envelope, null, 2);
  return { content: [{ type: "text", text }] };
}

/** Build an error envelope with `isError: true`; a PEScanError adds its code, category and remediation. */
export function formatError(
  tool: string,
  error: string | PEScanError,
  startTime: number,
): ToolResult & { isError: true } {
  const envelope: ToolEnvelope = {
    success: false,
    tool,
    data: {},
    error: typeof error === "string" ? error : error.message,
    metadata: buildMetadata(startTime),
  };

  if (error instanceof PEScanError) {
    envelope.error_code = error.code;
    envelope.error_category = error.category;
    if (error.remediation) {
      envelope.remediation = error.remediation;
    }
  }

  return {
    content: [{ type: "text", text: JSON.stringify(envelope, null, 2) }],
    isError: true,
  };
}
