// biome-ignore lint/performance/noBarrelFile: Public API entry point for utilities
export { createDiagnosticsLog } from "./diagnostics-log";
export { type HandleFailureParams, handleFailure } from "./handle-failure";
export {
  Err,
  type ErrResult,
  Ok,
  type OkResult,
  type Result,
  safeTry,
} from "./result";
export { slugify } from "./slugify";
