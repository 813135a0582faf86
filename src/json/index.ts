// biome-ignore lint/performance/noBarrelFile: Public API entry point for JSON decoding and responses
export {
  type DecodeJsonOptions,
  decodeJson,
  decodeJsonBytes,
  findUnknownKey,
} from "./decode-json";
export {
  errorEnvelope,
  type ResponseEnvelope,
  successEnvelope,
  writeError,
  writeJson,
} from "./respond-json";
export { MAX_DEPTH, type ScannedValue, scanValue } from "./scan-json";
