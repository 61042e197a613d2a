#!/usr/bin/env node

import { HELP_TEXT, parseArgs, type CliOptions } from "./cli-args.js";
import { PEScanError } from "./errors/pescan-error.js";
import { toPEScanError } from "./errors/error-mapper.js";
import { createReferenceData, startServer } from "./index.js";
import { runScan, runUpdate } from "./run-scan.js";
import { PACKAGE_NAME, PACKAGE_VERSION } from "./version.js";

async function run(options: CliOptions): Promise<void> {
  switch (options.command) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(`${PACKAGE_NAME} v${PACKAGE_VERSION}`);
      return;
    case "serve":
      await startServer(options.server);
      return;
    case "update":
      await runUpdate(createReferenceData(options.server));
      return;
    case "scan":
      if (options.file === undefined) {
        throw new PEScanError("No sample given", "INVALID_ARGUMENT", "validation");
      }
      await runScan(
        { ...options, file: options.file },
        createReferenceData(options.server),
        (text) => process.stdout.write(text),
      );
  }
}

function fail(error: unknown): never {
  const err = toPEScanError(error);
  console.error(`Error: ${err.message}`);
  if (err.remediation) {
    console.error(`  ${err.remediation}`);
  }
  process.exit(1);
}

try {
  run(parseArgs(process.argv.slice(2))).catch(fail);
} catch (error) {
  fail(error);
}
