import { serveStatic } from "@hono/node-server/serve-static";
import type { Context, Next } from "hono";

export interface DownloadOptions {
  /** Directory the file lives in, resolved like serveStatic's `root` */
  directory: string;
  /** Name of the file inside `directory` */
  fileName: string;
  /** Name the browser offers when saving */
  displayName: string;
}

// Quotes and line breaks would end the header value early
const UNSAFE_DISPLAY_CHARS = /["\r\n]/g;
const PATH_SEPARATOR = /[/\\]/;

/** A bare name inside the directory, never a path out of it */
function isPlainFileName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !PATH_SEPARATOR.test(name);
}

/**
 * Sends a stored file as an attachment under `displayName`.
 * Byte transfer, Content-Length and type come from serveStatic. A missing
 * file, or a name that is not a bare file name, falls through to `next`.
 */
export async function serveDownload(
  c: Context,
  next: Next,
  options: DownloadOptions
): Promise<Response | void> {
  if (!isPlainFileName(options.fileName)) {
    return next();
  }
  const displayName = options.displayName.replace(UNSAFE_DISPLAY_CHARS, "");

  return serveStatic({
    root: options.directory,
    path: options.fileName,
    // Only a found file is an attachment; a 404 stays a plain response
    onFound: (_path, found) => {
      found.header(
        "Content-Disposition",
        `attachment; filename="${displayName}"`
      );
    },
  })(c, next);
}
