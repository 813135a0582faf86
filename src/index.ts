// Failures: the tagged union every operation reports, with messages and HTTP statuses
export {
  type DecodeFailure,
  describeError,
  type FailureKind,
  type FailureOf,
  failureMessage,
  failureStatus,
  failures,
  IngestError,
} from "./errors";
// HTTP helpers: attachment downloads and outbound JSON notifications
export { type DownloadOptions, serveDownload } from "./http/download";
export {
  type JsonTransport,
  type PushJsonOptions,
  type PushJsonReply,
  pushJsonToRemote,
} from "./http/push-json";
// Strict JSON decoding and the JSON responder
export {
  type DecodeJsonOptions,
  decodeJson,
  decodeJsonBytes,
  errorEnvelope,
  type ResponseEnvelope,
  successEnvelope,
  writeError,
  writeJson,
} from "./json";
// Logging: structured pino records with nanoid ids
export {
  createLog,
  createLogger,
  type IntakeLogger,
  type Log,
  type LoggerConfig,
  type LogMode,
} from "./logging";
// REST interface over the upload ingestor
export { createIntakeRestApp } from "./rest/rest";
export type { CreateIntakeRestAppParams, RestConfig } from "./rest/types";
// Toolkit factory: binds every operation to one resolved configuration
export {
  createToolkit,
  DEFAULT_MAX_JSON_BYTES,
  DEFAULT_MAX_TOTAL_BYTES,
  type IngestionConfig,
  type IngestionConfigInput,
  type IngestOverrides,
  ingestionConfigSchema,
  resolveIngestionConfig,
  type Toolkit,
  type ToolkitOptions,
} from "./toolkit";
// Upload ingestion: streamed multipart parts sniffed and written to disk
export {
  ensureDir,
  type IngestOptions,
  ingestOneUpload,
  ingestUploads,
  isAllowedType,
  randomIdentifier,
  sniffContentType,
  type UploadedFileRecord,
  type UploadRejection,
} from "./uploads";
// Utilities
export {
  createDiagnosticsLog,
  Err,
  type ErrResult,
  handleFailure,
  Ok,
  type OkResult,
  type Result,
  safeTry,
  slugify,
} from "./utils";
