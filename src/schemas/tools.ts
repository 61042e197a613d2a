import { z } from "zod";

const detailKind = z.enum(["description", "library", "documentation", "all"]);
type DetailKindArg = z.infer<typeof detailKind>;

const detailsField = (fallback: DetailKindArg[], what: string) => z
  .array(detailKind)
  .optional()
  .default(fallback)
  .describe(
    `Metadata to attach to ${what}: 'description' (what the API does), ` +
    `'library' (exporting DLL), 'documentation' (reference URL), or 'all'. ` +
    `Default: ${fallback.length > 0 ? fallback.join(", ") : "none"}`,
  );

export const scanImportsSchema = z.object({
  file: z.string().describe("PE sample path relative to the samples directory, or an absolute path"),
  details: detailsField([], "each suspect import"),
  refresh: z.boolean().optional().default(false).describe(
    "Refetch the API reference data before scanning (falls back to the cached copy if the fetch fails)",
  ),
});
export type ScanImportsArgs = z.input<typeof scanImportsSchema>;

export const updateApiCacheSchema = z.object({});
export type UpdateApiCacheArgs = z.infer<typeof updateApiCacheSchema>;

export const lookupApiSchema = z.object({
  name: z.string().min(1).describe("Exact, case-sensitive API name (e.g., 'CreateRemoteThread')"),
  details: detailsField(["all"], "each match"),
});
export type LookupApiArgs = z.input<typeof lookupApiSchema>;

export const listCategoriesSchema = z.object({});
export type ListCategoriesArgs = z.infer<typeof listCategoriesSchema>;
