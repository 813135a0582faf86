import type { DecodeFailure } from "@/errors/failures";

/** One accepted file part, written to disk */
export interface UploadedFileRecord {
  /** Name declared by the client. Never used to build a path when renaming */
  readonly originalName: string;
  /** Name on disk: the original name, or a random identifier plus the original extension */
  readonly storedName: string;
  /** Bytes actually written */
  readonly byteSize: number;
}

export interface IngestOptions {
  destinationDir: string;
  /** Store under a generated name instead of the client's (default: true) */
  rename?: boolean;
  /** Hard ceiling on the whole request body */
  maxTotalBytes: number;
  /** Sniffed MIME types to accept; empty accepts everything */
  allowedTypes: readonly string[];
}

/**
 * Failure of an ingestion call. `records` lists the files written before the
 * failure; cleaning them up is the caller's decision.
 */
export interface UploadRejection {
  failure: DecodeFailure;
  records: readonly UploadedFileRecord[];
}
