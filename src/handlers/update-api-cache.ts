import type { HandlerDeps } from "./types.js";
import { formatResponse, formatError } from "../response.js";
import { toPEScanError } from "../errors/error-mapper.js";

export async function handleUpdateApiCache(deps: HandlerDeps) {
  const startTime = Date.now();
  try {
    const loaded = await deps.reference.refresh();
    return formatResponse("update_api_cache", {
      // A stale result means the fetch failed and the old copy is still in use
      refreshed: loaded.source !== "stale",
      persisted: loaded.source === "refreshed",
    }, startTime, loaded);
  } catch (error) {
    return formatError("update_api_cache", toPEScanError(error), startTime);
  }
}
