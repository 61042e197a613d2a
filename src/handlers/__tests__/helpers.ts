import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { HandlerDeps } from "../types.js";
import { CacheManager } from "../../cache/cache-manager.js";
import { FetchError } from "../../errors/pescan-error.js";
import { ReferenceData } from "../../state/reference-data.js";
import type { CacheManifest } from "../../reference/types.js";
import { buildPe, type PeImport } from "../../pe/__tests__/pe-builder.js";
import { sampleManifest } from "../../__tests__/fixtures.js";

export interface TestDepsOptions {
  /** Pre-populate the reference cache (default true) */
  cached?: boolean;
  noSandbox?: boolean;
}

/**
 * Handler deps over a temp samples directory and cache file. The fetcher
 * fails unless a test queues a manifest on `fetchManifest`.
 */
export function createTestDeps(options: TestDepsOptions = {}) {
  const dir = mkdtempSync(join(tmpdir(), "pescan-handlers-"));
  const samplesDir = join(dir, "samples");
  const cacheFile = join(dir, "cache", "data.json");
  mkdirSync(samplesDir);

  const fetchManifest = vi.fn(async (): Promise<CacheManifest> => {
    throw new FetchError("Could not resolve host: malapi.test");
  });
  const manager = new CacheManager({ cacheFile, fetcher: { fetchManifest } });
  if (options.cached ?? true) {
    manager.persist(sampleManifest());
  }

  const deps: HandlerDeps = {
    reference: new ReferenceData(manager),
    config: { samplesDir, noSandbox: options.noSandbox ?? true },
  };

  return {
    deps,
    dir,
    samplesDir,
    cacheFile,
    fetchManifest,
    addSample(name: string, imports: PeImport[]): string {
      const path = join(samplesDir, name);
      writeFileSync(path, buildPe(imports));
      return path;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function parseEnvelope(result: { content: Array<{ type: string; text: string }> }) {
  return JSON.parse(result.content[0].text);
}
