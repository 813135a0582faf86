import { type DecodeFailure, failureMessage } from "@/errors/failures";
import type { IntakeLogger } from "@/logging/create-log";
import { Err, type ErrResult } from "./result";

export interface HandleFailureParams {
  failure: DecodeFailure;
  logger?: IntakeLogger;
  atFunction?: string;
}

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

/**
 * Logs a failure at error level (when a logger is available) and returns it
 * as an Err, so call sites can `return handleFailure(...)`.
 */
export function handleFailure(
  params: HandleFailureParams
): ErrResult<DecodeFailure> {
  if (params.logger) {
    params.logger.error({
      atFunction: params.atFunction ?? inferCallerName(),
      message: failureMessage(params.failure),
      data: params.failure,
    });
  }
  return Err(params.failure);
}
