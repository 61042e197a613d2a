/**
 * Encoding and validation of the persisted reference manifest.
 *
 * The on-disk form is compact JSON tagged with a format name and version.
 * Anything that does not validate is reported as a CacheError so the cache
 * manager can treat the file as absent.
 */

import { z } from "zod";
import { CacheError } from "../errors/pescan-error.js";
import { MANIFEST_VERSION, type CacheManifest } from "./types.js";

const FORMAT_TAG = "pescan-reference";

const apiEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  library: z.string().optional(),
  documentation: z.string().optional(),
});

const apiCategorySchema = z.object({
  header: z.string().min(1),
  apis: z.array(apiEntrySchema).refine(
    (apis) => new Set(apis.map((a) => a.name)).size === apis.length,
    { message: "API names must be unique within a category" },
  ),
});

const persistedSchema = z.object({
  format: z.literal(FORMAT_TAG),
  version: z.number().int(),
  fetchedAt: z.string(),
  source: z.string(),
  categories: z.array(apiCategorySchema).refine(
    (cats) => new Set(cats.map((c) => c.header)).size === cats.length,
    { message: "Category headers must be unique" },
  ),
});

export function encodeManifest(manifest: CacheManifest): string {
  return JSON.stringify({ format: FORMAT_TAG, ...manifest });
}

/**
 * Decode a persisted manifest.
 *
 * @throws CacheError `CACHE_CORRUPT` for unreadable or invalid content,
 *   `CACHE_VERSION_MISMATCH` for a file written by another format version
 */
export function decodeManifest(raw: string): CacheManifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CacheError(
      `Reference cache is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      "CACHE_CORRUPT",
    );
  }

  // Check the version before the full schema so a layout change reads as a mismatch
  const header = z.object({ format: z.literal(FORMAT_TAG), version: z.number() }).safeParse(json);
  if (header.success && header.data.version !== MANIFEST_VERSION) {
    throw new CacheError(
      `Reference cache version ${header.data.version} does not match expected version ${MANIFEST_VERSION}`,
      "CACHE_VERSION_MISMATCH",
    );
  }

  const parsed = persistedSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CacheError(
      `Reference cache failed validation${where}: ${issue?.message ?? "unknown issue"}`,
      "CACHE_CORRUPT",
    );
  }

  const { format: _format, ...manifest } = parsed.data;
  return manifest;
}
