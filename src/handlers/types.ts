import type { ReferenceData } from "../state/reference-data.js";

export interface HandlerConfig {
  samplesDir: string;
  noSandbox: boolean;
}

export interface HandlerDeps {
  reference: ReferenceData;
  config: HandlerConfig;
}
