// biome-ignore lint/performance/noBarrelFile: Public API entry point for upload ingestion
export { ensureDir } from "./ensure-dir";
export { ingestOneUpload, ingestUploads, storedNameFor } from "./ingest-uploads";
export {
  IDENTIFIER_ALPHABET,
  randomIdentifier,
  STORED_NAME_LENGTH,
} from "./random-identifier";
export {
  isAllowedType,
  mimeEssence,
  OCTET_STREAM,
  SNIFF_LENGTH,
  sniffContentType,
} from "./sniff-content-type";
export type {
  IngestOptions,
  UploadedFileRecord,
  UploadRejection,
} from "./types";
