/**
 * Integration tests for the MCP tools as wired in createServer().
 *
 * Uses InMemoryTransport to invoke tools through the MCP protocol, with a
 * temp reference cache and a fetcher that never touches the network.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { InvalidTokenError } from "@modelcontextprotocol/sdk/server/auth/errors.js";
import { createServer, createTokenVerifier } from "../index.js";
import type { ToolEnvelope } from "../response.js";
import { createTestDeps } from "../handlers/__tests__/helpers.js";
import { sampleManifest } from "./fixtures.js";

// ---------------------------------------------------------------------------
// Setup: create MCP server + in-memory client per test
// ---------------------------------------------------------------------------

let ctx: ReturnType<typeof createTestDeps>;
let client: Client;
let closeTransports: () => Promise<void>;

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  ctx = createTestDeps();

  const server = createServer({ samplesDir: ctx.samplesDir, noSandbox: true }, ctx.deps.reference);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);

  closeTransports = async () => {
    await clientTransport.close();
    await serverTransport.close();
  };
});

afterEach(async () => {
  await closeTransports();
  ctx.cleanup();
  vi.restoreAllMocks();
});

// Helper to call a tool and return the parsed envelope + raw isError
async function callTool(name: string, args: Record<string, unknown> = {}): Promise<{ envelope: ToolEnvelope; isError: boolean }> {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = result.content;
  if (!Array.isArray(content) || content[0]?.type !== "text") {
    throw new Error(`${name} returned no text content`);
  }
  const envelope: ToolEnvelope = JSON.parse(content[0].text);
  return { envelope, isError: result.isError === true };
}

// Invalid arguments surface as a protocol error or an error result, depending on SDK version
async function rejected(name: string, args: Record<string, unknown>): Promise<boolean> {
  return client.callTool({ name, arguments: args }).then((r) => r.isError === true, () => true);
}

describe("tool registration", () => {
  it("exposes the four tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["list_categories", "lookup_api", "scan_imports", "update_api_cache"]);
  });

  it("serves the category table as a resource", async () => {
    const { contents } = await client.readResource({ uri: "pescan://categories" });
    const first = contents[0];
    expect(first.uri).toBe("pescan://categories");
    expect("text" in first && typeof first.text === "string" ? JSON.parse(first.text) : undefined).toEqual([
      { header: "Injection", apis: ["CreateRemoteThread", "VirtualAllocEx", "WriteProcessMemory"] },
      { header: "Anti-Debugging", apis: ["IsDebuggerPresent", "CheckRemoteDebuggerPresent"] },
      { header: "Evasion", apis: ["VirtualAllocEx", "Sleep"] },
    ]);
  });
});

// =========================================================================
// scan_imports
// =========================================================================

describe("scan_imports", () => {
  it("scans a sample with all details", async () => {
    ctx.addSample("tool.exe", [{ dll: "KERNEL32.dll", functions: ["IsDebuggerPresent", "ExitProcess"] }]);

    const { envelope, isError } = await callTool("scan_imports", { file: "tool.exe", details: ["all"] });

    expect(isError).toBe(false);
    expect(envelope.success).toBe(true);
    expect(envelope.tool).toBe("scan_imports");
    expect(envelope.data.categories).toEqual([
      {
        header: "Anti-Debugging",
        suspects: [{
          name: "IsDebuggerPresent",
          description: "Checks for a user-mode debugger",
          library: "kernel32.dll",
          documentation: "https://docs.test/isdebuggerpresent",
        }],
      },
    ]);
  });

  it("rejects an unknown detail kind at the schema", async () => {
    ctx.addSample("tool.exe", [{ dll: "KERNEL32.dll", functions: ["Sleep"] }]);
    expect(await rejected("scan_imports", { file: "tool.exe", details: ["everything"] })).toBe(true);
  });

  it("returns an error envelope for a missing sample", async () => {
    const { envelope, isError } = await callTool("scan_imports", { file: "nope.exe" });
    expect(isError).toBe(true);
    expect(envelope.error_code).toBe("SAMPLE_UNREADABLE");
  });
});

// =========================================================================
// update_api_cache
// =========================================================================

describe("update_api_cache", () => {
  it("replaces the reference data for later calls", async () => {
    ctx.fetchManifest.mockResolvedValueOnce(sampleManifest({
      fetchedAt: "2026-03-01T00:00:00.000Z",
      categories: [{ header: "Ransomware", apis: [{ name: "CryptEncrypt" }] }],
    }));

    const { envelope } = await callTool("update_api_cache");
    expect(envelope.data).toEqual({ refreshed: true, persisted: true });
    expect(envelope.metadata.reference).toMatchObject({
      source: "refreshed",
      fetched_at: "2026-03-01T00:00:00.000Z",
      api_count: 1,
    });

    const listed = await callTool("list_categories");
    expect(listed.envelope.data.categories).toEqual([{ header: "Ransomware", api_count: 1 }]);
  });

  it("keeps the cached data when the fetch fails", async () => {
    const { envelope, isError } = await callTool("update_api_cache");

    expect(isError).toBe(false);
    expect(envelope.data).toEqual({ refreshed: false, persisted: false });
    expect(envelope.metadata.reference).toMatchObject({ source: "stale", stale: true });
    expect(envelope.metadata.warnings).toEqual([
      "Could not refresh API reference data (Could not resolve host: malapi.test); using cached data from 2026-01-02T03:04:05.000Z",
    ]);
  });
});

// =========================================================================
// lookup_api / list_categories
// =========================================================================

describe("lookup_api", () => {
  it("finds an API in its categories", async () => {
    const { envelope } = await callTool("lookup_api", { name: "Sleep", details: ["library"] });
    expect(envelope.data).toEqual({
      name: "Sleep",
      found: true,
      categories: [{ category: "Evasion", library: "kernel32.dll" }],
    });
  });

  it("rejects an empty name at the schema", async () => {
    expect(await rejected("lookup_api", { name: "" })).toBe(true);
  });
});

describe("list_categories", () => {
  it("reports provenance alongside the headers", async () => {
    const { envelope } = await callTool("list_categories");
    expect(envelope.metadata.reference).toMatchObject({ source: "cache", stale: false, cache_file: ctx.cacheFile });
  });
});

// =========================================================================
// HTTP bearer auth
// =========================================================================

describe("createTokenVerifier", () => {
  it("accepts the configured token", async () => {
    const info = await createTokenVerifier("test-secret").verifyAccessToken("test-secret");
    expect(info.token).toBe("test-secret");
    expect(info.clientId).toBe("pescan-client");
    expect(info.expiresAt).toBeGreaterThan(Math.floor(Date.now() / 1000));
  });

  it("rejects other tokens, including prefixes", async () => {
    const verifier = createTokenVerifier("test-secret");
    await expect(verifier.verifyAccessToken("wrong-secret")).rejects.toThrow("Invalid token");
    await expect(verifier.verifyAccessToken("test-secre")).rejects.toThrow("Invalid token");
    await expect(verifier.verifyAccessToken("wrong-secret")).rejects.toBeInstanceOf(InvalidTokenError);
  });
});
