import type { IntakeLogger } from "@/logging/create-log";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: IntakeLogger;
}

/**
 * Creates a diagnostics log function for toolkit internals.
 * Writes through the structured logger when one is given, falls back to
 * console.log, and does nothing when diagnostics are off.
 *
 * @param prefix - Component identifier e.g. "Uploads", "REST", "Toolkit"
 * @param params - Diagnostics flag and optional structured logger
 * @returns A log function: (message, data?) => void
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  if (!params.diagnostics) {
    // biome-ignore lint/suspicious/noEmptyBlockStatements: intentional no-op when diagnostics disabled
    return () => {};
  }

  const { logger } = params;

  return (message: string, data?: unknown) => {
    if (logger) {
      logger.info({ atFunction: prefix, message: `[${prefix}] ${message}`, data });
    } else {
      console.log(`[${prefix}] ${message}`, data ?? "");
    }
  };
}
