import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import type { IntakeLogger } from "@/logging/create-log";
import { createToolkit } from "../toolkit";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "toolkit-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

const makeLogger = () => ({
  info: vi.fn<IntakeLogger["info"]>(() => "info-id"),
  warn: vi.fn<IntakeLogger["warn"]>(() => "warn-id"),
  error: vi.fn<IntakeLogger["error"]>(() => "error-id"),
});

function jsonRequest(body: string): Request {
  return new Request("http://localhost/json", { method: "POST", body });
}

function uploadRequest(...files: File[]): Request {
  const form = new FormData();
  for (const file of files) {
    form.append("file", file);
  }
  return new Request("http://localhost/upload", { method: "POST", body: form });
}

describe("createToolkit", () => {
  it("should throw on invalid configuration", () => {
    expect(() => createToolkit({ config: { maxJsonBytes: 0 } })).toThrow(
      "createToolkit: invalid configuration"
    );
  });

  it("should expose the resolved configuration", () => {
    const toolkit = createToolkit({ config: { rename: false } });

    expect(toolkit.config.rename).toBe(false);
    expect(toolkit.config.maxJsonBytes).toBe(1024 * 1024);
  });

  it("should apply configured upload settings with per-call overrides", async () => {
    const toolkit = createToolkit({ config: { rename: false } });

    const stored = await toolkit.ingest(
      uploadRequest(new File(["hello"], "hello.txt")),
      root
    );
    expect(stored.value).toEqual([
      { originalName: "hello.txt", storedName: "hello.txt", byteSize: 5 },
    ]);
    expect(await readFile(join(root, "hello.txt"), "utf-8")).toBe("hello");

    const rejected = await toolkit.ingestOne(
      uploadRequest(new File(["hello"], "again.txt")),
      root,
      { allowedTypes: ["image/png"] }
    );
    expect(rejected.error?.failure.kind).toBe("UnsupportedFileType");
  });

  it("should log rejected uploads at error level", async () => {
    const logger = makeLogger();
    const toolkit = createToolkit({
      config: { allowedTypes: ["image/png"] },
      logger,
    });

    await toolkit.ingest(uploadRequest(new File(["text"], "a.txt")), root);

    expect(logger.error).toHaveBeenCalledWith({
      atFunction: "Toolkit.ingest",
      message: "the uploaded file type is not permitted",
      data: {
        kind: "UnsupportedFileType",
        fileName: "a.txt",
        detectedType: "text/plain; charset=utf-8",
      },
    });
  });

  it("should decode JSON with the configured limits", async () => {
    const toolkit = createToolkit({ config: { allowUnknownJsonFields: true } });
    const schema = z.object({ name: z.string() });

    const decoded = await toolkit.decodeJson(
      jsonRequest('{"name":"Ada","role":"admin"}'),
      schema
    );
    expect(decoded.value).toEqual({ name: "Ada" });

    const small = createToolkit({ config: { maxJsonBytes: 4 } });
    const tooLarge = await small.decodeJson(jsonRequest('{"name":"Ada"}'), schema);
    expect(tooLarge.error).toEqual({
      kind: "PayloadTooLarge",
      limit: 4,
      subject: "body",
    });
  });

  it("should log values the responder cannot encode", async () => {
    const logger = makeLogger();
    const toolkit = createToolkit({ logger });
    const app = new Hono();
    app.get("/", (c) => {
      const written = toolkit.writeJson(c, 200, { id: 1n });
      return written.isOk
        ? written.value
        : toolkit.writeError(c, written.error, 500);
    });

    const res = await app.request("/");

    expect(res.status).toBe(500);
    expect(logger.error.mock.calls[0]?.[0].atFunction).toBe("Toolkit.writeJson");
  });

  it("should expose the helper operations", async () => {
    const toolkit = createToolkit();

    expect(toolkit.randomString(12)).toHaveLength(12);
    expect(toolkit.slugify("Quarterly Report").value).toBe("quarterly-report");
    expect((await toolkit.ensureDir(join(root, "x", "y"))).isOk).toBe(true);

    const transport = vi.fn(async () => new Response("ok", { status: 200 }));
    const pushed = await toolkit.pushJson("http://hooks.test/x", { a: 1 }, {
      transport,
    });
    expect(pushed.value).toEqual({ status: 200, body: "ok" });
  });
});
