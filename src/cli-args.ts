import { PEScanError } from "./errors/pescan-error.js";
import { DEFAULT_FETCH_THREADS } from "./fetcher/source-fetcher.js";
import { DEFAULT_TABLE_WIDTH, OUTPUT_FORMATS, type OutputFormat } from "./output/index.js";
import type { DetailRequest } from "./scan/detail-resolver.js";
import type { ServerConfig } from "./index.js";

export type CliCommand = "scan" | "update" | "serve" | "help" | "version";

export interface CliOptions {
  command: CliCommand;
  /** Sample to scan (scan command) */
  file?: string;
  /** Refetch the reference data before scanning */
  update: boolean;
  details: DetailRequest[];
  format: OutputFormat;
  /** Output file, or directory for csv */
  output?: string;
  width: number;
  /** Reference and server settings; also used by the scan command */
  server: ServerConfig;
}

// Single-letter flags that take no value and may be combined (-ild)
const SHORT_FLAGS = new Set(["u", "i", "l", "d", "A", "h", "v"]);

function invalid(message: string, remediation = "Run with --help for usage"): PEScanError {
  return new PEScanError(message, "INVALID_ARGUMENT", "validation", remediation);
}

function positiveInt(flag: string, value: string | undefined): number {
  const n = value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw invalid(`${flag} expects a positive integer, got ${value === undefined ? "nothing" : `"${value}"`}`);
  }
  return n;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/** Split "-ild" into "-i", "-l", "-d". */
function expandShortFlags(args: string[]): string[] {
  return args.flatMap((arg) =>
    /^-[A-Za-z]{2,}$/.test(arg) && [...arg.slice(1)].every((c) => SHORT_FLAGS.has(c))
      ? [...arg.slice(1)].map((c) => `-${c}`)
      : [arg],
  );
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws PEScanError `INVALID_ARGUMENT` for unknown flags, bad values,
 * or a missing sample path
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const args = expandShortFlags(argv);
  const options: CliOptions = {
    command: "scan",
    update: false,
    details: [],
    format: "txt",
    width: DEFAULT_TABLE_WIDTH,
    server: {
      samplesDir: process.cwd(),
      noSandbox: true,
      threads: DEFAULT_FETCH_THREADS,
    },
  };
  const positional: string[] = [];
  let serve = false;

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let value: string | undefined = args[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    // Only skip the next arg if the value came from it (not '=' syntax)
    const takeValue = (): string => {
      if (value === undefined) {
        throw invalid(`${arg} expects a value`);
      }
      if (!usedEqualsSyntax) i++;
      return value;
    };

    switch (arg) {
      case "-u":
      case "--update":
        options.update = true;
        break;
      case "-i":
      case "--info":
      case "--description":
        options.details.push("description");
        break;
      case "-l":
      case "--library":
        options.details.push("library");
        break;
      case "-d":
      case "--documentation":
        options.details.push("documentation");
        break;
      case "-A":
      case "--all":
        options.details.push("all");
        break;
      case "-t":
      case "--threads":
        options.server.threads = positiveInt(arg, takeValue());
        break;
      case "-w":
      case "--width":
        options.width = positiveInt(arg, takeValue());
        break;
      case "-f":
      case "--format": {
        const format = takeValue();
        if (!isOutputFormat(format)) {
          throw invalid(`Unknown output format "${format}"`, `Use one of: ${OUTPUT_FORMATS.join(", ")}`);
        }
        options.format = format;
        break;
      }
      case "-o":
      case "--output":
        options.output = takeValue();
        break;
      case "--cache-file":
        options.server.cacheFile = takeValue();
        break;
      case "--source-url":
        options.server.sourceUrl = takeValue();
        break;
      case "--timeout":
        options.server.timeout = positiveInt(arg, takeValue());
        break;
      case "--serve":
        serve = true;
        break;
      case "--samples-dir":
        options.server.samplesDir = takeValue();
        break;
      case "--sandbox":
        options.server.noSandbox = false;
        break;
      case "--transport": {
        const transport = takeValue();
        if (transport !== "stdio" && transport !== "http") {
          throw invalid(`Unknown transport "${transport}"`, "Use stdio or http");
        }
        options.server.transport = transport;
        break;
      }
      case "--http-port":
        options.server.httpPort = positiveInt(arg, takeValue());
        break;
      case "--http-host":
        options.server.httpHost = takeValue();
        break;
      case "--http-token":
        options.server.httpToken = takeValue();
        break;
      case "--help":
      case "-h":
        return { ...options, command: "help" };
      case "--version":
      case "-v":
        return { ...options, command: "version" };
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw invalid(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  // Read token from env var if not set via CLI
  if (!options.server.httpToken && env.MCP_TOKEN) {
    options.server.httpToken = env.MCP_TOKEN;
  }

  if (positional.length > 1) {
    throw invalid(`Expected one sample path, got ${positional.length}: ${positional.join(" ")}`);
  }
  options.file = positional[0];

  if (serve) {
    options.command = "serve";
  } else if (options.file === undefined) {
    if (!options.update) {
      throw invalid("No sample given", "Pass the path of a PE file to scan, --update to refresh the cache, or --serve");
    }
    options.command = "update";
  }

  return options;
}

export const HELP_TEXT = `
pescan - flag suspicious Windows API imports in PE files

USAGE:
  pescan-mcp [OPTIONS] <FILE>      Scan a PE sample
  pescan-mcp --update              Refresh the API reference cache
  pescan-mcp --serve [OPTIONS]     Run as an MCP server

SCAN OPTIONS:
  -u, --update                Refetch the reference data from malapi.io first
  -i, --info                  Show each API's description (alias: --description)
  -l, --library               Show the DLL that exports each API
  -d, --documentation         Show each API's documentation link
  -A, --all                   Show all of the above
  -f, --format <fmt>          Output format: txt, json, yaml, toml, csv (default: txt)
  -o, --output <path>         Write to a file (a directory for csv: one file per category)
  -w, --width <cols>          Table width for txt output (default: ${DEFAULT_TABLE_WIDTH})
  -t, --threads <n>           Parallel requests during a refresh (default: ${DEFAULT_FETCH_THREADS})
  --timeout <seconds>         Per-request timeout during a refresh (default: 30)
  --cache-file <path>         Reference cache file (default: per-user cache, or $PESCAN_CACHE_DIR)
  --source-url <url>          Reference source (default: https://malapi.io)

SERVER OPTIONS:
  --serve                     Start the MCP server instead of scanning
  --samples-dir <path>        Directory that relative sample paths resolve against (default: cwd)
  --sandbox                   Only accept relative sample paths inside --samples-dir
  --transport <mode>          Transport: stdio (default) or http
  --http-port <port>          HTTP port (default: 3000)
  --http-host <host>          HTTP bind address (default: 127.0.0.1)
  --http-token <token>        Bearer token for HTTP auth (also reads MCP_TOKEN env var)

  -h, --help                  Show this help message
  -v, --version               Show version

EXAMPLES:
  pescan-mcp -A sample.exe
  pescan-mcp -il --format json --output report.json sample.exe
  pescan-mcp --format csv --output ./report sample.exe
  pescan-mcp --serve --transport=http --http-token=SECRET
`;
