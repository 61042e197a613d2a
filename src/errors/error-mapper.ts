/**
 * Maps raw/unknown errors into structured PEScanError instances.
 *
 * Catch blocks can call `toPEScanError(err)` to get a typed error
 * with code, category, and remediation hint.
 */

import { FetchError, PEScanError } from "./pescan-error.js";

function errorCode(raw: unknown): string | undefined {
  if (typeof raw !== "object" || raw === null || !("code" in raw)) return undefined;
  return typeof raw.code === "string" ? raw.code : undefined;
}

export function toPEScanError(raw: unknown): PEScanError {
  if (raw instanceof PEScanError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);
  // fetch() wraps socket errors: the errno lives on `cause`
  const code = errorCode(raw) ?? (raw instanceof Error ? errorCode(raw.cause) : undefined);

  if (raw instanceof Error && (raw.name === "TimeoutError" || raw.name === "AbortError")) {
    return new FetchError(`Request timed out: ${msg}`, "FETCH_TIMEOUT");
  }

  if (code === "ENOTFOUND" || code === "EAI_AGAIN") {
    return new FetchError(`Could not resolve host: ${msg}`);
  }

  if (code === "ECONNREFUSED" || code === "ECONNRESET") {
    return new FetchError(`Connection failed: ${msg}`);
  }

  if (code === "ENOENT") {
    return new PEScanError(msg, "NOT_FOUND", "not_found", "Check that the path exists");
  }

  if (code === "EACCES" || code === "EPERM") {
    return new PEScanError(msg, "PERMISSION_DENIED", "io", "Check file permissions");
  }

  if (/timeout/i.test(msg)) {
    return new FetchError(msg, "FETCH_TIMEOUT");
  }

  return new PEScanError(msg, "UNKNOWN_ERROR", "internal");
}
