import { failures, IngestError } from "@/errors/failures";

type Subject = "upload" | "body";

/**
 * True when the request declares a Content-Length above `maxBytes`.
 * Only an early exit: the body is still counted while it is read.
 */
export function declaresTooLarge(request: Request, maxBytes: number): boolean {
  const declared = Number(request.headers.get("content-length"));
  return Number.isFinite(declared) && declared > maxBytes;
}

/**
 * Yields the body's chunks, throwing an IngestError(PayloadTooLarge) as soon as
 * more than `maxBytes` have been read. A null body yields nothing.
 */
export async function* readBodyChunks(
  body: ReadableStream<Uint8Array> | null,
  maxBytes: number,
  subject: Subject
): AsyncGenerator<Uint8Array, void, undefined> {
  if (!body) {
    return;
  }

  const reader = body.getReader();
  let total = 0;
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      total += value.byteLength;
      if (total > maxBytes) {
        throw new IngestError(failures.payloadTooLarge(maxBytes, subject));
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
  }
}

/** Reads a whole body into memory, bounded by `maxBytes` */
export async function readBodyBytes(
  body: ReadableStream<Uint8Array> | null,
  maxBytes: number,
  subject: Subject
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let size = 0;
  for await (const chunk of readBodyChunks(body, maxBytes, subject)) {
    chunks.push(chunk);
    size += chunk.byteLength;
  }

  const bytes = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}
