import { serveDownload } from "@/http/download";
import { pushJsonToRemote } from "@/http/push-json";
import { decodeJson } from "@/json/decode-json";
import { writeError, writeJson } from "@/json/respond-json";
import { ensureDir } from "@/uploads/ensure-dir";
import { ingestOneUpload, ingestUploads } from "@/uploads/ingest-uploads";
import { randomIdentifier } from "@/uploads/random-identifier";
import type { IngestOptions } from "@/uploads/types";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import { handleFailure } from "@/utils/handle-failure";
import { slugify } from "@/utils/slugify";
import { resolveIngestionConfig } from "./config";
import type { IngestOverrides, Toolkit, ToolkitOptions } from "./types";

/**
 * Binds every ingestion operation to one resolved configuration.
 *
 * Failures are still returned as values; when a logger is given they are also
 * logged at error level, and with `diagnostics` every success is logged too.
 *
 * @throws {Error} If the configuration does not validate
 */
export function createToolkit(options: ToolkitOptions = {}): Toolkit {
  const resolved = resolveIngestionConfig(options.config ?? {});
  if (resolved.isErr) {
    throw new Error(`createToolkit: invalid configuration\n${resolved.error}`);
  }
  const config = resolved.value;
  const { logger } = options;

  const log = createDiagnosticsLog("Toolkit", {
    diagnostics: options.diagnostics,
    logger,
  });

  const ingestOptions = (
    destinationDir: string,
    overrides: IngestOverrides = {}
  ): IngestOptions => ({
    destinationDir,
    rename: overrides.rename ?? config.rename,
    maxTotalBytes: overrides.maxTotalBytes ?? config.maxTotalBytes,
    allowedTypes: overrides.allowedTypes ?? config.allowedTypes,
  });

  return {
    config,

    ingest: async (request, destinationDir, overrides) => {
      const result = await ingestUploads(
        request,
        ingestOptions(destinationDir, overrides)
      );
      if (result.isErr) {
        handleFailure({
          failure: result.error.failure,
          logger,
          atFunction: "Toolkit.ingest",
        });
        return result;
      }
      log(`stored ${result.value.length} file(s) in ${destinationDir}`);
      return result;
    },

    ingestOne: async (request, destinationDir, overrides) => {
      const result = await ingestOneUpload(
        request,
        ingestOptions(destinationDir, overrides)
      );
      if (result.isErr) {
        handleFailure({
          failure: result.error.failure,
          logger,
          atFunction: "Toolkit.ingestOne",
        });
        return result;
      }
      log(`stored ${result.value.storedName} in ${destinationDir}`);
      return result;
    },

    decodeJson: async (request, schema) => {
      const result = await decodeJson(request, schema, {
        maxBytes: config.maxJsonBytes,
        allowUnknownFields: config.allowUnknownJsonFields,
      });
      if (result.isErr) {
        return handleFailure({
          failure: result.error,
          logger,
          atFunction: "Toolkit.decodeJson",
        });
      }
      log("decoded JSON body");
      return result;
    },

    writeJson: (c, status, value, headers) => {
      const result = writeJson(c, status, value, headers);
      if (result.isErr) {
        return handleFailure({
          failure: result.error,
          logger,
          atFunction: "Toolkit.writeJson",
        });
      }
      return result;
    },

    writeError,
    randomString: randomIdentifier,
    ensureDir,
    slugify,
    serveDownload,
    pushJson: pushJsonToRemote,
  };
}
