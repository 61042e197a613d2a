import type { HandlerDeps } from "./types.js";
import type { ScanImportsArgs } from "../schemas/tools.js";
import { resolveSamplePath } from "../security/paths.js";
import { readSampleImports, scanImports } from "../scan/scanner.js";
import { expandDetailKinds } from "../scan/detail-resolver.js";
import { formatResponse, formatError } from "../response.js";
import { PEScanError } from "../errors/pescan-error.js";
import { toPEScanError } from "../errors/error-mapper.js";

export async function handleScanImports(
  deps: HandlerDeps,
  args: ScanImportsArgs,
) {
  const startTime = Date.now();
  try {
    const { reference, config } = deps;

    const resolved = resolveSamplePath(args.file, config.samplesDir, !config.noSandbox);
    if ("error" in resolved) {
      return formatError("scan_imports", new PEScanError(
        resolved.error,
        "INVALID_PATH",
        "validation",
        "Use a relative path within the samples directory",
      ), startTime);
    }

    // Read the sample first: a non-PE file should not cost a refresh
    const imports = readSampleImports(resolved.path);
    const loaded = args.refresh ? await reference.refresh() : await reference.get();
    const report = scanImports(loaded.store, imports, expandDetailKinds(args.details ?? []));

    const categories = report.headers
      .map((header, i) => ({ header, suspects: report.suspects[i] }))
      .filter((c) => c.suspects.length > 0);

    return formatResponse("scan_imports", {
      file: args.file,
      import_count: report.importCount,
      suspect_count: categories.reduce((n, c) => n + c.suspects.length, 0),
      categories,
    }, startTime, loaded);
  } catch (error) {
    return formatError("scan_imports", toPEScanError(error), startTime);
  }
}
