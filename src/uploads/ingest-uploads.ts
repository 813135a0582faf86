/**
 * Streaming multipart ingestion: bound the body, parse parts in order, sniff
 * each file, check it against the allow-list, then copy it to disk.
 * The first failure ends the call; files already written stay on disk.
 */

import { createWriteStream } from "node:fs";
import { extname, join } from "node:path";
import { pipeline } from "node:stream/promises";
import { type DecodeFailure, failures, toFailure } from "@/errors/failures";
import { declaresTooLarge } from "@/utils/read-body";
import { Err, Ok, type Result, safeTry } from "@/utils/result";
import { ensureDir } from "./ensure-dir";
import { type FilePart, type MultipartReader, openMultipart } from "./multipart";
import { randomIdentifier, STORED_NAME_LENGTH } from "./random-identifier";
import {
  isAllowedType,
  SNIFF_LENGTH,
  sniffContentType,
} from "./sniff-content-type";
import type {
  IngestOptions,
  UploadedFileRecord,
  UploadRejection,
} from "./types";

// --- Part helpers ---

interface Prefix {
  chunks: Buffer[];
  /** The part ended within the prefix */
  done: boolean;
}

/** Pulls chunks until at least `size` bytes are buffered or the part ends */
async function readPrefix(
  iterator: AsyncIterator<Buffer>,
  size: number
): Promise<Prefix> {
  const chunks: Buffer[] = [];
  let length = 0;
  while (length < size) {
    const next = await iterator.next();
    if (next.done) {
      return { chunks, done: true };
    }
    chunks.push(next.value);
    length += next.value.length;
  }
  return { chunks, done: false };
}

/** Name the part is stored under inside the destination directory */
export function storedNameFor(originalName: string, rename: boolean): string {
  if (!rename) {
    return originalName;
  }
  return `${randomIdentifier(STORED_NAME_LENGTH)}${extname(originalName)}`;
}

/**
 * Sniffs, validates and writes a single file part.
 * The sniffed prefix is replayed ahead of the rest of the part, so the file on
 * disk starts at byte zero.
 */
async function storePart(
  part: FilePart,
  options: IngestOptions
): Promise<Result<UploadedFileRecord, DecodeFailure>> {
  const iterator: AsyncIterator<Buffer> = part.stream[Symbol.asyncIterator]();

  const prefixResult = await safeTry(() => readPrefix(iterator, SNIFF_LENGTH));
  if (prefixResult.isErr) {
    return Err(toFailure(prefixResult.error, failures.malformedUpload));
  }
  const prefix = prefixResult.value;

  const detectedType = sniffContentType(Buffer.concat(prefix.chunks));
  if (!isAllowedType(detectedType, options.allowedTypes)) {
    return Err(failures.unsupportedFileType(part.fileName, detectedType));
  }

  const storedName = storedNameFor(part.fileName, options.rename ?? true);
  let byteSize = 0;

  async function* replay(): AsyncGenerator<Buffer, void, undefined> {
    for (const chunk of prefix.chunks) {
      byteSize += chunk.length;
      yield chunk;
    }
    if (prefix.done) {
      return;
    }
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      byteSize += next.value.length;
      yield next.value;
    }
  }

  const written = await safeTry(() =>
    pipeline(replay(), createWriteStream(join(options.destinationDir, storedName)))
  );
  if (written.isErr) {
    return Err(toFailure(written.error, failures.ioFailure));
  }

  return Ok({ originalName: part.fileName, storedName, byteSize });
}

/**
 * Stops the reader and reports the failure that ended the call. A failure of
 * the body stream itself (size ceiling, truncation) wins over the symptom the
 * part copy saw.
 */
async function stopWith(
  reader: MultipartReader,
  failure: DecodeFailure
): Promise<DecodeFailure> {
  reader.abort();
  await reader.settled;
  return reader.failure() ?? failure;
}

// --- Entry points ---

async function ingest(
  request: Request,
  options: IngestOptions,
  limit: number
): Promise<Result<UploadedFileRecord[], UploadRejection>> {
  const records: UploadedFileRecord[] = [];
  const reject = (failure: DecodeFailure) => Err({ failure, records });

  if (declaresTooLarge(request, options.maxTotalBytes)) {
    return reject(failures.payloadTooLarge(options.maxTotalBytes, "upload"));
  }

  const dirResult = await ensureDir(options.destinationDir);
  if (dirResult.isErr) {
    return reject(dirResult.error);
  }

  const opened = openMultipart(request, options.maxTotalBytes);
  if (opened.isErr) {
    return reject(opened.error);
  }
  const reader = opened.value;

  const looped = await safeTry(async () => {
    for await (const part of reader.parts) {
      const stored = await storePart(part, options);
      if (stored.isErr) {
        return stopWith(reader, stored.error);
      }
      records.push(stored.value);
      if (records.length >= limit) {
        reader.abort();
        await reader.settled;
        return null;
      }
    }
    return null;
  });

  if (looped.isErr) {
    return reject(toFailure(looped.error, failures.malformedUpload));
  }
  if (looped.value) {
    return reject(looped.value);
  }
  return Ok(records);
}

/**
 * Ingests every file part of a multipart request into `destinationDir`.
 *
 * @returns The records of all stored files, or the first failure together
 * with the records written before it
 */
export function ingestUploads(
  request: Request,
  options: IngestOptions
): Promise<Result<UploadedFileRecord[], UploadRejection>> {
  return ingest(request, options, Number.POSITIVE_INFINITY);
}

/**
 * Ingests only the first file part; any further parts are left unread.
 * Fails with NoFileProvided when the request carries no file.
 */
export async function ingestOneUpload(
  request: Request,
  options: IngestOptions
): Promise<Result<UploadedFileRecord, UploadRejection>> {
  const result = await ingest(request, options, 1);
  if (result.isErr) {
    return result;
  }
  const [record] = result.value;
  if (!record) {
    return Err({ failure: failures.noFileProvided(), records: [] });
  }
  return Ok(record);
}
