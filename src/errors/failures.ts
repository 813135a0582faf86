import type { ContentfulStatusCode } from "hono/utils/http-status";

/**
 * Every way an ingestion call can fail. One variant per kind, discriminated on `kind`.
 * A decode attempt yields either a fully populated value or exactly one of these.
 */
export type DecodeFailure =
  | { kind: "PayloadTooLarge"; limit: number; subject: "upload" | "body" }
  | { kind: "MalformedUpload"; reason: string }
  | { kind: "UnsupportedFileType"; fileName: string; detectedType: string }
  | { kind: "NoFileProvided" }
  | { kind: "IOFailure"; reason: string }
  | { kind: "SyntaxError"; offset: number }
  | { kind: "TruncatedJSON" }
  | { kind: "TypeMismatch"; field?: string; offset: number }
  | { kind: "EmptyBody" }
  | { kind: "UnknownField"; field: string }
  | { kind: "MultipleJSONValues" }
  | { kind: "UnclassifiedDecodeError"; reason: string }
  | { kind: "UnencodableValue"; reason: string };

export type FailureKind = DecodeFailure["kind"];

export type FailureOf<K extends FailureKind> = Extract<DecodeFailure, { kind: K }>;

// --- Constructors ---

export const failures = {
  payloadTooLarge: (
    limit: number,
    subject: "upload" | "body"
  ): FailureOf<"PayloadTooLarge"> => ({
    kind: "PayloadTooLarge",
    limit,
    subject,
  }),
  malformedUpload: (reason: string): FailureOf<"MalformedUpload"> => ({
    kind: "MalformedUpload",
    reason,
  }),
  unsupportedFileType: (
    fileName: string,
    detectedType: string
  ): FailureOf<"UnsupportedFileType"> => ({
    kind: "UnsupportedFileType",
    fileName,
    detectedType,
  }),
  noFileProvided: (): FailureOf<"NoFileProvided"> => ({
    kind: "NoFileProvided",
  }),
  ioFailure: (reason: string): FailureOf<"IOFailure"> => ({
    kind: "IOFailure",
    reason,
  }),
  syntaxError: (offset: number): FailureOf<"SyntaxError"> => ({
    kind: "SyntaxError",
    offset,
  }),
  truncatedJson: (): FailureOf<"TruncatedJSON"> => ({ kind: "TruncatedJSON" }),
  typeMismatch: (
    offset: number,
    field?: string
  ): FailureOf<"TypeMismatch"> =>
    field ? { kind: "TypeMismatch", field, offset } : { kind: "TypeMismatch", offset },
  emptyBody: (): FailureOf<"EmptyBody"> => ({ kind: "EmptyBody" }),
  unknownField: (field: string): FailureOf<"UnknownField"> => ({
    kind: "UnknownField",
    field,
  }),
  multipleJsonValues: (): FailureOf<"MultipleJSONValues"> => ({
    kind: "MultipleJSONValues",
  }),
  unclassified: (reason: string): FailureOf<"UnclassifiedDecodeError"> => ({
    kind: "UnclassifiedDecodeError",
    reason,
  }),
  unencodableValue: (reason: string): FailureOf<"UnencodableValue"> => ({
    kind: "UnencodableValue",
    reason,
  }),
};

// --- Rendering ---

/** Human-readable text for a failure, safe to show to API callers */
export function failureMessage(failure: DecodeFailure): string {
  switch (failure.kind) {
    case "PayloadTooLarge":
      return failure.subject === "upload"
        ? `the uploaded file is too big (limit is ${failure.limit} bytes)`
        : `body must not be larger than ${failure.limit} bytes`;
    case "MalformedUpload":
      return `the request body is not valid multipart form data: ${failure.reason}`;
    case "UnsupportedFileType":
      return "the uploaded file type is not permitted";
    case "NoFileProvided":
      return "no file was uploaded";
    case "IOFailure":
      return "the server could not store the data";
    case "SyntaxError":
      return `body contains badly-formed JSON (at character ${failure.offset})`;
    case "TruncatedJSON":
      return "body contains badly-formed JSON";
    case "TypeMismatch":
      return failure.field
        ? `body contains incorrect JSON type for field "${failure.field}"`
        : `body contains incorrect JSON type (at character ${failure.offset})`;
    case "EmptyBody":
      return "body must not be empty";
    case "UnknownField":
      return `body contains unknown key "${failure.field}"`;
    case "MultipleJSONValues":
      return "body must have only a single JSON value";
    case "UnclassifiedDecodeError":
      return `error decoding JSON: ${failure.reason}`;
    case "UnencodableValue":
      return `response value could not be encoded as JSON: ${failure.reason}`;
    default:
      return assertNever(failure);
  }
}

const FAILURE_STATUS: Record<FailureKind, ContentfulStatusCode> = {
  PayloadTooLarge: 413,
  MalformedUpload: 400,
  UnsupportedFileType: 415,
  NoFileProvided: 400,
  IOFailure: 500,
  SyntaxError: 400,
  TruncatedJSON: 400,
  TypeMismatch: 400,
  EmptyBody: 400,
  UnknownField: 400,
  MultipleJSONValues: 400,
  UnclassifiedDecodeError: 400,
  UnencodableValue: 500,
};

/** HTTP status a failure should be rendered with */
export function failureStatus(failure: DecodeFailure): ContentfulStatusCode {
  return FAILURE_STATUS[failure.kind];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled failure: ${JSON.stringify(value)}`);
}

// --- Throwable carrier ---

/**
 * Carries a DecodeFailure through stream plumbing that can only signal by throwing.
 * Converted back into an Err at every public boundary.
 */
export class IngestError extends Error {
  readonly failure: DecodeFailure;

  constructor(failure: DecodeFailure) {
    super(failureMessage(failure));
    this.name = "IngestError";
    this.failure = failure;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Unwraps an IngestError, or classifies any other thrown value with `fallback`.
 */
export function toFailure(
  error: unknown,
  fallback: (reason: string) => DecodeFailure
): DecodeFailure {
  if (error instanceof IngestError) {
    return error.failure;
  }
  return fallback(describeError(error));
}
