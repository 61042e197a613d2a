/**
 * Output renderers for scan reports.
 *
 * Every format shows only categories with at least one suspect, keyed by
 * category header, in category order.
 */

import { stringify as toYaml } from "yaml";
import { stringify as toToml } from "smol-toml";
import { DETAIL_KINDS, type DetailKind } from "../reference/types.js";
import type { SuspectImport } from "../scan/detail-resolver.js";
import type { ScanReport } from "../scan/scanner.js";
import { renderTable } from "./table.js";
import { toCsv, writeCsvFiles } from "./csv.js";

export const OUTPUT_FORMATS = ["txt", "json", "yaml", "toml", "csv"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_TABLE_WIDTH = 80;

export interface RenderOptions {
  /** Detail columns to show, beyond the name */
  kinds: ReadonlySet<DetailKind>;
  /** Approximate maximum table width for txt output */
  width?: number;
}

/** Non-empty categories as header -> suspects. */
export function toCategoryMap(report: ScanReport): Record<string, SuspectImport[]> {
  const map: Record<string, SuspectImport[]> = {};
  report.headers.forEach((header, i) => {
    if (report.suspects[i].length > 0) {
      map[header] = report.suspects[i];
    }
  });
  return map;
}

function columnsFor(kinds: ReadonlySet<DetailKind>): Array<"name" | DetailKind> {
  return ["name", ...DETAIL_KINDS.filter((k) => kinds.has(k))];
}

function tablesFor(report: ScanReport, kinds: ReadonlySet<DetailKind>) {
  const columns = columnsFor(kinds);
  return Object.entries(toCategoryMap(report)).map(([header, suspects]) => ({
    header,
    columns,
    rows: suspects.map((s) => columns.map((c) => s[c] ?? "")),
  }));
}

export function renderReport(report: ScanReport, format: OutputFormat, options: RenderOptions): string {
  switch (format) {
    case "json":
      return JSON.stringify(toCategoryMap(report), null, 2) + "\n";
    case "yaml":
      return toYaml(toCategoryMap(report));
    case "toml":
      return toToml(toCategoryMap(report)) + "\n";
    case "csv":
      return tablesFor(report, options.kinds)
        .map(({ header, columns, rows }) => `${header}:\n${toCsv(columns, rows)}\n`)
        .join("");
    case "txt": {
      const tables = tablesFor(report, options.kinds);
      if (tables.length === 0) {
        return "No suspicious imports found.\n";
      }
      const width = options.width ?? DEFAULT_TABLE_WIDTH;
      return tables
        .map(({ header, columns, rows }) => `${header}:\n${renderTable(columns, rows, width)}\n`)
        .join("\n");
    }
  }
}

/** CSV with an output directory: one file per category. Returns the paths written. */
export function writeReportCsvFiles(report: ScanReport, dir: string, kinds: ReadonlySet<DetailKind>): string[] {
  return writeCsvFiles(
    dir,
    tablesFor(report, kinds).map(({ header, columns, rows }) => ({ header, csv: toCsv(columns, rows) })),
  );
}
