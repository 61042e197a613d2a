import type { HandlerDeps } from "./types.js";
import type { LookupApiArgs } from "../schemas/tools.js";
import { expandDetailKinds } from "../scan/detail-resolver.js";
import { formatResponse, formatError } from "../response.js";
import { toPEScanError } from "../errors/error-mapper.js";

export async function handleLookupApi(
  deps: HandlerDeps,
  args: LookupApiArgs,
) {
  const startTime = Date.now();
  try {
    const loaded = await deps.reference.get();
    const kinds = expandDetailKinds(args.details ?? ["all"]);

    const categories = loaded.store.locate(args.name).map(({ header, entry }) => {
      const match: Record<string, string> = { category: header };
      for (const kind of kinds) {
        const value = entry[kind];
        if (value !== undefined) match[kind] = value;
      }
      return match;
    });

    return formatResponse("lookup_api", {
      name: args.name,
      found: categories.length > 0,
      categories,
    }, startTime, loaded);
  } catch (error) {
    return formatError("lookup_api", toPEScanError(error), startTime);
  }
}
