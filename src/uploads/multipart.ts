import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import busboy from "busboy";
import {
  type DecodeFailure,
  describeError,
  failures,
  IngestError,
  toFailure,
} from "@/errors/failures";
import { readBodyChunks } from "@/utils/read-body";
import { Err, Ok, type Result } from "@/utils/result";

/** One file part of a multipart body, as the parser yields it */
export interface FilePart {
  fieldName: string;
  fileName: string;
  /** Client-declared type, informational only */
  declaredType: string;
  stream: Readable;
}

export interface MultipartReader {
  /** File parts in body order; the next part is parsed only after the current one is consumed */
  parts: AsyncGenerator<FilePart, void, undefined>;
  /** Stops reading the body; pending parts are dropped */
  abort: () => void;
  /** Resolves once the body has been fully parsed or has failed */
  settled: Promise<void>;
  /** The failure that ended parsing, if any (never the one caused by abort) */
  failure: () => DecodeFailure | null;
}

class AbortedRead extends Error {
  constructor() {
    super("multipart read aborted");
    this.name = "AbortedRead";
  }
}

/** busboy throws synchronously on a missing or non-multipart content type */
function createParser(request: Request): Result<busboy.Busboy, DecodeFailure> {
  try {
    return Ok(
      busboy({
        headers: { "content-type": request.headers.get("content-type") ?? "" },
      })
    );
  } catch (error) {
    return Err(failures.malformedUpload(describeError(error)));
  }
}

/**
 * Opens a streaming multipart reader over a request body.
 * The body is counted against `maxBytes` as it flows into busboy, so nothing is
 * buffered beyond the parser's and the consumer's stream buffers.
 */
export function openMultipart(
  request: Request,
  maxBytes: number
): Result<MultipartReader, DecodeFailure> {
  const created = createParser(request);
  if (created.isErr) {
    return created;
  }
  const parser = created.value;

  const source = Readable.from(
    readBodyChunks(request.body, maxBytes, "upload"),
    { objectMode: false }
  );

  const queue: FilePart[] = [];
  let closed = false;
  let streamFailure: DecodeFailure | null = null;
  let wake: (() => void) | null = null;

  const notify = () => {
    const resume = wake;
    wake = null;
    resume?.();
  };

  // busboy destroys the part being parsed with the error that ended the body
  const onPartError = (error: Error) => {
    if (!(error instanceof AbortedRead)) {
      streamFailure ??= toFailure(error, failures.malformedUpload);
    }
  };

  parser.on("file", (fieldName, stream, info) => {
    stream.on("error", onPartError);
    // A part without a file name is a plain form field
    if (!info.filename) {
      stream.resume();
      return;
    }
    queue.push({
      fieldName,
      fileName: info.filename,
      declaredType: info.mimeType,
      stream,
    });
    notify();
  });

  parser.on("close", () => {
    closed = true;
    notify();
  });

  const settled = pipeline(source, parser).then(
    () => {
      closed = true;
      notify();
    },
    (error: unknown) => {
      if (!(error instanceof AbortedRead)) {
        streamFailure = toFailure(error, failures.malformedUpload);
      }
      closed = true;
      notify();
    }
  );

  async function* parts(): AsyncGenerator<FilePart, void, undefined> {
    while (true) {
      const part = queue.shift();
      if (part) {
        yield part;
        // Drain whatever the consumer left unread so the parser can move on
        part.stream.resume();
        continue;
      }
      if (streamFailure) {
        throw new IngestError(streamFailure);
      }
      if (closed) {
        break;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }

    await settled;
    if (streamFailure) {
      throw new IngestError(streamFailure);
    }
  }

  return Ok({
    parts: parts(),
    abort: () => {
      for (const pending of queue.splice(0)) {
        pending.stream.destroy();
      }
      if (!closed) {
        parser.destroy(new AbortedRead());
      }
    },
    settled,
    failure: () => streamFailure,
  });
}
