/**
 * Structured error types for pescan.
 *
 * Every error carries a machine-readable code, a category, and an optional
 * remediation hint. The subclasses let the cache layer tell a transport
 * failure apart from a schema failure without parsing messages.
 */

export type ErrorCategory =
  | "validation"
  | "network"
  | "parse"
  | "cache"
  | "not_found"
  | "io"
  | "internal";

export class PEScanError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    remediation?: string,
  ) {
    super(message);
    this.name = "PEScanError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}

/** Transport-level failure talking to the reference source. */
export class FetchError extends PEScanError {
  /** HTTP status, when the server answered at all. */
  readonly status?: number;

  constructor(message: string, code = "FETCH_FAILED", status?: number) {
    super(
      message,
      code,
      "network",
      "Check network access to the reference source, or run without --update to use the cached data",
    );
    this.name = "FetchError";
    this.status = status;
  }
}

/** A document (remote page or sample) did not have the expected structure. */
export class ParseError extends PEScanError {
  constructor(message: string, code = "SOURCE_SCHEMA_CHANGED", remediation?: string) {
    super(message, code, "parse", remediation);
    this.name = "ParseError";
  }
}

/** The persisted reference store is unusable or could not be written. */
export class CacheError extends PEScanError {
  constructor(message: string, code = "CACHE_CORRUPT", remediation?: string) {
    super(message, code, "cache", remediation);
    this.name = "CacheError";
  }
}
