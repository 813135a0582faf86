import { describeError } from "@/errors/failures";
import { Err, Ok, type Result, safeTry } from "@/utils/result";

/** Anything shaped like `fetch` for a single POST */
export type JsonTransport = (
  url: string,
  init: RequestInit
) => Promise<Response>;

export interface PushJsonOptions {
  /** Defaults to the global fetch */
  transport?: JsonTransport;
  headers?: Record<string, string>;
}

export interface PushJsonReply {
  /** Downstream status code, whatever its class */
  status: number;
  body: string;
}

/**
 * POSTs `value` as JSON to `uri`.
 * A non-2xx reply is still Ok; only encoding and transport errors are Err.
 *
 * @example
 * ```typescript
 * const reply = await pushJsonToRemote("https://hooks.example.test/upload", {
 *   storedName: record.storedName,
 * });
 * if (reply.isOk && reply.value.status === 202) {
 *   // accepted downstream
 * }
 * ```
 */
export async function pushJsonToRemote(
  uri: string,
  value: unknown,
  options: PushJsonOptions = {}
): Promise<Result<PushJsonReply, string>> {
  const transport = options.transport ?? fetch;

  const encoded = await safeTry(() => JSON.stringify(value));
  if (encoded.isErr) {
    return Err(`could not encode JSON: ${describeError(encoded.error)}`);
  }
  if (encoded.value === undefined) {
    return Err("could not encode JSON: value has no JSON form");
  }
  const body = encoded.value;

  const sent = await safeTry(async () => {
    const response = await transport(uri, {
      method: "POST",
      headers: { ...options.headers, "Content-Type": "application/json" },
      body,
    });
    return { status: response.status, body: await response.text() };
  });
  if (sent.isErr) {
    return Err(`request to ${uri} failed: ${describeError(sent.error)}`);
  }

  return Ok(sent.value);
}
