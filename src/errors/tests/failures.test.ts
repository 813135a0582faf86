import { describe, expect, it } from "vitest";
import {
  failureMessage,
  failures,
  failureStatus,
  IngestError,
  toFailure,
} from "../failures";

describe("failureMessage", () => {
  it("should name the upload limit for an oversized multipart body", () => {
    expect(failureMessage(failures.payloadTooLarge(2048, "upload"))).toBe(
      "the uploaded file is too big (limit is 2048 bytes)"
    );
  });

  it("should name the body limit for an oversized JSON body", () => {
    expect(failureMessage(failures.payloadTooLarge(1024, "body"))).toBe(
      "body must not be larger than 1024 bytes"
    );
  });

  it("should include the offset of a syntax error", () => {
    expect(failureMessage(failures.syntaxError(9))).toBe(
      "body contains badly-formed JSON (at character 9)"
    );
  });

  it("should prefer the field name for a type mismatch", () => {
    expect(failureMessage(failures.typeMismatch(9, "foo"))).toBe(
      'body contains incorrect JSON type for field "foo"'
    );
    expect(failureMessage(failures.typeMismatch(4))).toBe(
      "body contains incorrect JSON type (at character 4)"
    );
  });

  it("should quote the unknown key", () => {
    expect(failureMessage(failures.unknownField("fooo"))).toBe(
      'body contains unknown key "fooo"'
    );
  });

  it("should render the fixed texts", () => {
    expect(failureMessage(failures.emptyBody())).toBe("body must not be empty");
    expect(failureMessage(failures.truncatedJson())).toBe(
      "body contains badly-formed JSON"
    );
    expect(failureMessage(failures.multipleJsonValues())).toBe(
      "body must have only a single JSON value"
    );
    expect(failureMessage(failures.noFileProvided())).toBe("no file was uploaded");
    expect(
      failureMessage(failures.ioFailure("EACCES: permission denied, mkdir '/srv/data'"))
    ).toBe("the server could not store the data");
    expect(
      failureMessage(failures.unsupportedFileType("a.exe", "application/octet-stream"))
    ).toBe("the uploaded file type is not permitted");
  });
});

describe("failureStatus", () => {
  it("should map each family to its HTTP status", () => {
    expect(failureStatus(failures.payloadTooLarge(1, "upload"))).toBe(413);
    expect(failureStatus(failures.unsupportedFileType("a", "b"))).toBe(415);
    expect(failureStatus(failures.ioFailure("disk full"))).toBe(500);
    expect(failureStatus(failures.unencodableValue("cycle"))).toBe(500);
    expect(failureStatus(failures.emptyBody())).toBe(400);
    expect(failureStatus(failures.malformedUpload("no boundary"))).toBe(400);
  });
});

describe("toFailure", () => {
  it("should unwrap an IngestError", () => {
    const failure = failures.truncatedJson();
    expect(toFailure(new IngestError(failure), failures.unclassified)).toBe(
      failure
    );
  });

  it("should classify other errors with the fallback", () => {
    expect(toFailure(new Error("EACCES"), failures.ioFailure)).toEqual({
      kind: "IOFailure",
      reason: "EACCES",
    });
    expect(toFailure("plain", failures.unclassified)).toEqual({
      kind: "UnclassifiedDecodeError",
      reason: "plain",
    });
  });

  it("should carry the failure message on the thrown error", () => {
    const error = new IngestError(failures.emptyBody());
    expect(error.message).toBe("body must not be empty");
    expect(error.name).toBe("IngestError");
  });
});
