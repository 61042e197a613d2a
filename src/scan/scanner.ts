/**
 * Scan pipeline: sample bytes -> import names -> per-category suspects.
 */

import { readFileSync } from "node:fs";
import { PEScanError } from "../errors/pescan-error.js";
import { toPEScanError } from "../errors/error-mapper.js";
import { readImportNames } from "../pe/import-reader.js";
import type { CategoryStore } from "../reference/category-store.js";
import type { DetailKind } from "../reference/types.js";
import { matchImports } from "./matcher.js";
import { resolveDetails, type SuspectImport } from "./detail-resolver.js";

export interface ScanReport {
  /** Category headers in store order */
  headers: string[];
  /** Suspects per category, parallel to `headers` */
  suspects: SuspectImport[][];
  /** Distinct imported names in the sample */
  importCount: number;
}

export function scanImports(
  store: CategoryStore,
  imports: Iterable<string>,
  kinds: ReadonlySet<DetailKind>,
): ScanReport {
  const importSet = new Set(imports);
  const matches = matchImports(store.categories, importSet);
  return {
    headers: store.headers,
    suspects: resolveDetails(store, matches, kinds),
    importCount: importSet.size,
  };
}

/** True when running inside the published container image. */
export function isContainerized(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.PESCAN_DOCKER === "true";
}

/**
 * Read a sample from disk and return its imported names.
 *
 * @throws PEScanError `SAMPLE_UNREADABLE` when the file cannot be read
 * @throws ParseError `NOT_PE` when it is not a PE image
 */
export function readSampleImports(path: string, env: NodeJS.ProcessEnv = process.env): string[] {
  let image: Buffer;
  try {
    image = readFileSync(path);
  } catch (err) {
    throw new PEScanError(
      `Could not read sample ${path}: ${toPEScanError(err).message}`,
      "SAMPLE_UNREADABLE",
      "not_found",
      isContainerized(env)
        ? "The sample must be inside the container: mount its directory, e.g. docker run -v \"$PWD:/samples\" pescan /samples/<file>"
        : "Check that the path exists and is readable",
    );
  }
  return readImportNames(image);
}
