import { describe, expect, it, vi } from "vitest";
import { failures } from "@/errors/failures";
import type { IntakeLogger } from "@/logging/create-log";
import { createDiagnosticsLog } from "../diagnostics-log";
import { handleFailure } from "../handle-failure";

const makeLogger = () => {
  const logger = {
    info: vi.fn<IntakeLogger["info"]>(() => "info-id"),
    warn: vi.fn<IntakeLogger["warn"]>(() => "warn-id"),
    error: vi.fn<IntakeLogger["error"]>(() => "error-id"),
  };
  return logger;
};

describe("handleFailure", () => {
  it("should log the failure at error level and return it as Err", () => {
    const logger = makeLogger();
    const failure = failures.ioFailure("disk full");

    const result = handleFailure({ failure, logger, atFunction: "saveFile" });

    expect(result.isErr).toBe(true);
    expect(result.error).toBe(failure);
    expect(logger.error).toHaveBeenCalledWith({
      atFunction: "saveFile",
      message: "the server could not store the data",
      data: failure,
    });
  });

  it("should infer the caller name when none is given", () => {
    const logger = makeLogger();

    function decodeProfile() {
      return handleFailure({ failure: failures.emptyBody(), logger });
    }
    decodeProfile();

    expect(logger.error.mock.calls[0]?.[0].atFunction).toBe("decodeProfile");
  });

  it("should return Err without a logger", () => {
    const result = handleFailure({ failure: failures.emptyBody() });

    expect(result.error).toEqual({ kind: "EmptyBody" });
  });
});

describe("createDiagnosticsLog", () => {
  it("should do nothing when diagnostics are off", () => {
    const logger = makeLogger();
    const log = createDiagnosticsLog("Uploads", { diagnostics: false, logger });

    log("ignored");

    expect(logger.info).not.toHaveBeenCalled();
  });

  it("should prefix messages and write through the logger", () => {
    const logger = makeLogger();
    const log = createDiagnosticsLog("Uploads", { diagnostics: true, logger });

    log("stored", { count: 2 });

    expect(logger.info).toHaveBeenCalledWith({
      atFunction: "Uploads",
      message: "[Uploads] stored",
      data: { count: 2 },
    });
  });

  it("should fall back to console.log without a logger", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createDiagnosticsLog("REST", { diagnostics: true });

    log("ready");

    expect(spy).toHaveBeenCalledWith("[REST] ready", "");
    spy.mockRestore();
  });
});
