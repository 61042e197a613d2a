import { describe, it, expect } from "vitest";
import { parseArgs } from "../cli-args.js";
import { PEScanError } from "../errors/pescan-error.js";

function parseError(argv: string[]): PEScanError {
  try {
    parseArgs(argv, {});
  } catch (err) {
    if (err instanceof PEScanError) return err;
    throw err;
  }
  throw new Error("expected parseArgs to throw");
}

describe("parseArgs", () => {
  it("defaults to a txt scan of one file", () => {
    const options = parseArgs(["sample.exe"], {});
    expect(options).toMatchObject({
      command: "scan",
      file: "sample.exe",
      update: false,
      details: [],
      format: "txt",
      width: 80,
    });
    expect(options.output).toBeUndefined();
    expect(options.server.threads).toBe(4);
  });

  it("reads detail flags, long and short", () => {
    expect(parseArgs(["-i", "--library", "-d", "a.exe"], {}).details).toEqual(["description", "library", "documentation"]);
    expect(parseArgs(["--description", "a.exe"], {}).details).toEqual(["description"]);
    expect(parseArgs(["-A", "a.exe"], {}).details).toEqual(["all"]);
  });

  it("expands combined short flags", () => {
    const options = parseArgs(["-uil", "a.exe"], {});
    expect(options.update).toBe(true);
    expect(options.details).toEqual(["description", "library"]);
  });

  it("accepts --flag=value and --flag value", () => {
    const options = parseArgs(["--format=json", "--output", "out.json", "-t", "8", "--width=120", "a.exe"], {});
    expect(options.format).toBe("json");
    expect(options.output).toBe("out.json");
    expect(options.server.threads).toBe(8);
    expect(options.width).toBe(120);
  });

  it("passes reference settings through to the server config", () => {
    const options = parseArgs(
      ["--cache-file", "/tmp/ref.json", "--source-url=https://mirror.test", "--timeout", "10", "a.exe"],
      {},
    );
    expect(options.server).toMatchObject({
      cacheFile: "/tmp/ref.json",
      sourceUrl: "https://mirror.test",
      timeout: 10,
    });
  });

  it("runs an update without a file", () => {
    expect(parseArgs(["--update"], {}).command).toBe("update");
  });

  it("starts the server with --serve", () => {
    const options = parseArgs(
      ["--serve", "--transport=http", "--http-port", "8080", "--samples-dir", "/srv/samples", "--sandbox"],
      {},
    );
    expect(options.command).toBe("serve");
    expect(options.server).toMatchObject({
      transport: "http",
      httpPort: 8080,
      samplesDir: "/srv/samples",
      noSandbox: false,
    });
  });

  it("reads the HTTP token from MCP_TOKEN unless given", () => {
    expect(parseArgs(["--serve"], { MCP_TOKEN: "test-secret" }).server.httpToken).toBe("test-secret");
    expect(parseArgs(["--serve", "--http-token=flag-secret"], { MCP_TOKEN: "test-secret" }).server.httpToken)
      .toBe("flag-secret");
  });

  it("recognizes help and version", () => {
    expect(parseArgs(["-h"], {}).command).toBe("help");
    expect(parseArgs(["--version"], {}).command).toBe("version");
  });

  it("rejects an unknown format", () => {
    const err = parseError(["--format", "xml", "a.exe"]);
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.message).toBe('Unknown output format "xml"');
    expect(err.remediation).toBe("Use one of: txt, json, yaml, toml, csv");
  });

  it("rejects bad numbers", () => {
    expect(parseError(["--threads", "0", "a.exe"]).message).toBe('--threads expects a positive integer, got "0"');
    expect(parseError(["-w", "wide", "a.exe"]).message).toBe('-w expects a positive integer, got "wide"');
  });

  it("rejects a flag missing its value", () => {
    expect(parseError(["a.exe", "--output"]).message).toBe("--output expects a value");
  });

  it("rejects unknown options", () => {
    expect(parseError(["--verbose", "a.exe"]).message).toBe("Unknown option --verbose");
  });

  it("requires exactly one sample", () => {
    expect(parseError([]).message).toBe("No sample given");
    expect(parseError(["a.exe", "b.exe"]).message).toBe("Expected one sample path, got 2: a.exe b.exe");
  });
});
