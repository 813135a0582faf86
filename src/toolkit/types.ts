import type { Context, Next } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { z } from "zod";
import type { DecodeFailure } from "@/errors/failures";
import type { DownloadOptions } from "@/http/download";
import type { PushJsonOptions, PushJsonReply } from "@/http/push-json";
import type { IntakeLogger } from "@/logging/create-log";
import type { IngestOptions, UploadedFileRecord, UploadRejection } from "@/uploads/types";
import type { Result } from "@/utils/result";
import type { IngestionConfig, IngestionConfigInput } from "./config";

export interface ToolkitOptions {
  config?: IngestionConfigInput;
  logger?: IntakeLogger;
  /** Log every accepted upload and decoded body */
  diagnostics?: boolean;
}

/** Per-call overrides of the configured upload settings */
export type IngestOverrides = Partial<
  Pick<IngestOptions, "rename" | "maxTotalBytes" | "allowedTypes">
>;

export interface Toolkit {
  readonly config: IngestionConfig;
  ingest: (
    request: Request,
    destinationDir: string,
    overrides?: IngestOverrides
  ) => Promise<Result<UploadedFileRecord[], UploadRejection>>;
  ingestOne: (
    request: Request,
    destinationDir: string,
    overrides?: IngestOverrides
  ) => Promise<Result<UploadedFileRecord, UploadRejection>>;
  decodeJson: <S extends z.ZodType>(
    request: Request,
    schema: S
  ) => Promise<Result<z.output<S>, DecodeFailure>>;
  writeJson: (
    c: Context,
    status: ContentfulStatusCode,
    value: unknown,
    headers?: Record<string, string>
  ) => Result<Response, DecodeFailure>;
  writeError: (
    c: Context,
    err: DecodeFailure | Error,
    status?: ContentfulStatusCode
  ) => Response;
  randomString: (length: number) => string;
  ensureDir: (path: string) => Promise<Result<void, DecodeFailure>>;
  slugify: (text: string) => Result<string, string>;
  serveDownload: (
    c: Context,
    next: Next,
    options: DownloadOptions
  ) => Promise<Response | void>;
  pushJson: (
    uri: string,
    value: unknown,
    options?: PushJsonOptions
  ) => Promise<Result<PushJsonReply, string>>;
}
