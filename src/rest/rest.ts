import { Hono } from "hono";
import { failureStatus } from "@/errors/failures";
import { errorEnvelope, successEnvelope } from "@/json/respond-json";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import type { CreateIntakeRestAppParams } from "./types";

/**
 * Creates a Hono app exposing the upload ingestor over HTTP:
 *
 * - POST {baseUrl}/uploads: store every file part
 * - POST {baseUrl}/uploads/one: store the first file part only
 * - GET {baseUrl}/files/:storedName: download a stored file (`?name=` sets the saved name)
 *
 * Every response body is a ResponseEnvelope.
 */
export function createIntakeRestApp(params: CreateIntakeRestAppParams): Hono {
  const { toolkit, uploadDir, baseUrl } = params;
  const app = new Hono();

  const log = createDiagnosticsLog("REST", {
    diagnostics: params.diagnostics,
    logger: params.logger,
  });

  const uploadsPath = `${baseUrl}/uploads`;
  const filesPath = `${baseUrl}/files`;

  app.post(uploadsPath, async (c) => {
    const result = await toolkit.ingest(c.req.raw, uploadDir);
    if (result.isErr) {
      const { failure } = result.error;
      log(`upload rejected: ${failure.kind}`, result.error.records);
      return toolkit.writeError(c, failure, failureStatus(failure));
    }

    const written = toolkit.writeJson(
      c,
      201,
      successEnvelope(`stored ${result.value.length} file(s)`, {
        files: result.value,
      })
    );
    return written.isOk ? written.value : toolkit.writeError(c, written.error, 500);
  });

  app.post(`${uploadsPath}/one`, async (c) => {
    const result = await toolkit.ingestOne(c.req.raw, uploadDir);
    if (result.isErr) {
      const { failure } = result.error;
      log(`upload rejected: ${failure.kind}`);
      return toolkit.writeError(c, failure, failureStatus(failure));
    }

    const written = toolkit.writeJson(
      c,
      201,
      successEnvelope("stored 1 file(s)", { file: result.value })
    );
    return written.isOk ? written.value : toolkit.writeError(c, written.error, 500);
  });

  app.get(`${filesPath}/:storedName`, (c, next) => {
    const storedName = c.req.param("storedName");
    return toolkit.serveDownload(c, next, {
      directory: uploadDir,
      fileName: storedName,
      displayName: c.req.query("name") ?? storedName,
    });
  });

  // 404 handler
  app.notFound((c) =>
    c.json(
      errorEnvelope(
        `Route not found. Use POST ${uploadsPath} or GET ${filesPath}/:storedName.`
      ),
      404
    )
  );

  log(`REST interface ready at ${uploadsPath}`);

  return app;
}
