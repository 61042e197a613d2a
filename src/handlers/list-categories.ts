import type { HandlerDeps } from "./types.js";
import { formatResponse, formatError } from "../response.js";
import { toPEScanError } from "../errors/error-mapper.js";

export async function handleListCategories(deps: HandlerDeps) {
  const startTime = Date.now();
  try {
    const loaded = await deps.reference.get();
    return formatResponse("list_categories", {
      categories: loaded.store.categories.map((c) => ({
        header: c.header,
        api_count: c.apis.length,
      })),
    }, startTime, loaded);
  } catch (error) {
    return formatError("list_categories", toPEScanError(error), startTime);
  }
}
