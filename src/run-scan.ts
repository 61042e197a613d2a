/**
 * CLI scan and update commands.
 *
 * Output goes through `write` (stdout in the CLI); progress and warnings go
 * to stderr.
 */

import { writeFileSync } from "node:fs";
import { PEScanError } from "./errors/pescan-error.js";
import { toPEScanError } from "./errors/error-mapper.js";
import { renderReport, writeReportCsvFiles, type OutputFormat } from "./output/index.js";
import { expandDetailKinds, type DetailRequest } from "./scan/detail-resolver.js";
import { readSampleImports, scanImports } from "./scan/scanner.js";
import type { ReferenceData } from "./state/reference-data.js";

export interface ScanCommandOptions {
  file: string;
  update: boolean;
  details: DetailRequest[];
  format: OutputFormat;
  output?: string;
  width: number;
}

export async function runScan(
  options: ScanCommandOptions,
  reference: ReferenceData,
  write: (text: string) => void,
): Promise<void> {
  // A file that is not a PE should fail before any network access
  const imports = readSampleImports(options.file);
  const { store } = options.update ? await reference.refresh() : await reference.get();

  const kinds = expandDetailKinds(options.details);
  const report = scanImports(store, imports, kinds);

  if (options.format === "csv" && options.output !== undefined) {
    const written = writeReportCsvFiles(report, options.output, kinds);
    console.error(`Wrote ${written.length} CSV file(s) to ${options.output}`);
    return;
  }

  const text = renderReport(report, options.format, { kinds, width: options.width });
  if (options.output === undefined) {
    write(text);
    return;
  }

  try {
    writeFileSync(options.output, text);
  } catch (err) {
    throw new PEScanError(
      `Could not write ${options.output}: ${toPEScanError(err).message}`,
      "OUTPUT_FAILED",
      "io",
      "Check that the output directory exists and is writable",
    );
  }
}

/** Refresh the reference cache and summarize the result on stderr. */
export async function runUpdate(reference: ReferenceData): Promise<void> {
  const { store, source } = await reference.refresh();
  const where = reference.cacheFile ?? "memory only";
  const status = source === "stale" ? "kept cached data from" : "fetched";
  console.error(
    `Reference data ${status} ${store.fetchedAt}: ${store.apiCount} APIs in ${store.headers.length} categories (${where})`,
  );
}
