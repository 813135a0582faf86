import { mkdir } from "node:fs/promises";
import { type DecodeFailure, describeError, failures } from "@/errors/failures";
import { Err, Ok, type Result, safeTry } from "@/utils/result";

/**
 * Creates `path` and any missing parents. Succeeds without effect when the
 * directory already exists; fails with IOFailure when something else is in the way.
 */
export async function ensureDir(
  path: string
): Promise<Result<void, DecodeFailure>> {
  const result = await safeTry(() => mkdir(path, { recursive: true }));
  if (result.isErr) {
    return Err(failures.ioFailure(describeError(result.error)));
  }
  return Ok(undefined);
}
