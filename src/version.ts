import { createRequire } from "node:module";

const _require = createRequire(import.meta.url);

// package.json sits one level above both src/ and dist/
export const { name: PACKAGE_NAME, version: PACKAGE_VERSION } =
  _require("../package.json") as { name: string; version: string };
