import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  type DecodeFailure,
  describeError,
  failureMessage,
  failures,
} from "@/errors/failures";
import { Err, Ok, type Result } from "@/utils/result";

/** Uniform JSON shape for every response this toolkit writes */
export type ResponseEnvelope =
  | { error: false; message: string; data?: unknown }
  | { error: true; message: string };

export function successEnvelope(
  message: string,
  data?: unknown
): ResponseEnvelope {
  return data === undefined
    ? { error: false, message }
    : { error: false, message, data };
}

export function errorEnvelope(message: string): ResponseEnvelope {
  return { error: true, message };
}

function encode(value: unknown): Result<string, DecodeFailure> {
  try {
    const text = JSON.stringify(value);
    if (text === undefined) {
      return Err(failures.unencodableValue(`${typeof value} has no JSON form`));
    }
    return Ok(text);
  } catch (error) {
    return Err(failures.unencodableValue(describeError(error)));
  }
}

/**
 * Serialises `value` and writes it with `status`.
 * Content-Type is set first so a caller-supplied header of the same name replaces it.
 * Nothing is written when the value cannot be encoded.
 */
export function writeJson(
  c: Context,
  status: ContentfulStatusCode,
  value: unknown,
  headers?: Record<string, string>
): Result<Response, DecodeFailure> {
  const encoded = encode(value);
  if (encoded.isErr) {
    return encoded;
  }

  c.header("Content-Type", "application/json");
  for (const [name, headerValue] of Object.entries(headers ?? {})) {
    c.header(name, headerValue);
  }
  c.status(status);
  return Ok(c.body(encoded.value));
}

/**
 * Writes `{ error: true, message }`. A DecodeFailure is rendered with its
 * fixed text; any other error contributes only its message.
 */
export function writeError(
  c: Context,
  err: DecodeFailure | Error,
  status: ContentfulStatusCode = 400
): Response {
  const message = err instanceof Error ? err.message : failureMessage(err);
  const written = writeJson(c, status, errorEnvelope(message));
  if (written.isErr) {
    // An envelope of two strings always encodes
    return c.text(message, status);
  }
  return written.value;
}
