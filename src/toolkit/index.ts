// biome-ignore lint/performance/noBarrelFile: Public API entry point for the toolkit factory
export {
  DEFAULT_MAX_JSON_BYTES,
  DEFAULT_MAX_TOTAL_BYTES,
  type IngestionConfig,
  type IngestionConfigInput,
  ingestionConfigSchema,
  resolveIngestionConfig,
} from "./config";
export { createToolkit } from "./toolkit";
export type { IngestOverrides, Toolkit, ToolkitOptions } from "./types";
