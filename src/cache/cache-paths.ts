import { homedir } from "node:os";
import { join } from "node:path";

export const CACHE_FILE_NAME = "data.json";
const APP_DIR = "pescan";

/**
 * Resolve the per-user cache file location.
 *
 * `PESCAN_CACHE_DIR` wins; otherwise the platform cache directory is used.
 * Returns undefined when no home directory can be determined, in which case
 * reference data is fetched on every run and never persisted.
 */
export function defaultCacheFile(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = safeHomedir(),
): string | undefined {
  if (env.PESCAN_CACHE_DIR) {
    return join(env.PESCAN_CACHE_DIR, CACHE_FILE_NAME);
  }

  let base: string | undefined;
  switch (platform) {
    case "win32":
      base = env.LOCALAPPDATA;
      break;
    case "darwin":
      base = home ? join(home, "Library", "Caches") : undefined;
      break;
    default:
      base = env.XDG_CACHE_HOME || (home ? join(home, ".cache") : undefined);
  }

  return base ? join(base, APP_DIR, CACHE_FILE_NAME) : undefined;
}

function safeHomedir(): string {
  try {
    return homedir();
  } catch {
    // os.homedir() throws when the user has no passwd entry (e.g. arbitrary container UIDs)
    return "";
  }
}
