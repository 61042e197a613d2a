import { statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { PEScanError } from "../errors/pescan-error.js";
import { toPEScanError } from "../errors/error-mapper.js";

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(columns: string[], rows: string[][]): string {
  return [columns, ...rows].map((row) => row.map(escapeField).join(",")).join("\n") + "\n";
}

/** Category headers may contain characters that are not valid in file names. */
export function csvFileName(header: string): string {
  return `${header.replace(/[\\/:*?"<>|\x00-\x1f]/g, "_")}.csv`;
}

/**
 * Write one CSV file per category into `dir`.
 * Files are created exclusively; an existing file is an error.
 */
export function writeCsvFiles(dir: string, tables: Array<{ header: string; csv: string }>): string[] {
  let isDir = false;
  try {
    isDir = statSync(dir).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new PEScanError(
      `CSV output path must be an existing directory: ${dir}`,
      "INVALID_ARGUMENT",
      "validation",
      "Pass a directory with --output when using --format csv",
    );
  }

  const written: string[] = [];
  for (const { header, csv } of tables) {
    const path = join(dir, csvFileName(header));
    try {
      writeFileSync(path, csv, { flag: "wx" });
    } catch (err) {
      throw new PEScanError(
        `Could not create ${path}: ${toPEScanError(err).message}`,
        "OUTPUT_FAILED",
        "io",
        "Remove existing CSV files or choose another output directory",
      );
    }
    written.push(path);
  }
  return written;
}
