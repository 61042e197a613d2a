/**
 * Sample path handling for MCP tools.
 *
 * Sandboxing is opt-in (--sandbox). It keeps an assistant working inside the
 * samples directory; it is a workflow guard, not a security boundary.
 */

import { isAbsolute, normalize, resolve } from "node:path";

/**
 * Validate that a path is safe (within allowed directories)
 * @param path - The path to validate (relative to baseDir)
 * @param baseDir - The base directory that the path should be contained within
 */
export function isPathSafe(path: string, baseDir: string): boolean {
  // Empty string resolves to baseDir itself
  if (path === "") return false;

  // Null bytes truncate paths in C-based functions
  if (path.includes("\0")) return false;

  if (isAbsolute(path)) return false;

  // Check before normalization, then again after ("foo/../..")
  if (path.includes("..")) return false;

  if (path.startsWith("~")) return false;

  const normalizedPath = normalize(path);
  if (normalizedPath.includes("..") || normalizedPath.startsWith("..")) return false;

  const resolvedPath = resolve(baseDir, normalizedPath);
  const normalizedBase = resolve(baseDir);

  return resolvedPath.startsWith(normalizedBase + "/") || resolvedPath === normalizedBase;
}

/**
 * Resolve a sample path given to a tool.
 *
 * Relative paths are taken from `samplesDir`. Absolute paths are used as
 * given unless sandboxing is on, in which case they are rejected.
 */
export function resolveSamplePath(
  file: string,
  samplesDir: string,
  sandbox: boolean,
): { path: string } | { error: string } {
  if (sandbox) {
    if (!isPathSafe(file, samplesDir)) {
      return { error: "Invalid file path" };
    }
    return { path: resolve(samplesDir, normalize(file)) };
  }
  return { path: isAbsolute(file) ? file : resolve(samplesDir, file) };
}
