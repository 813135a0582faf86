import { describe, expect, it } from "vitest";
import type { DecodeFailure } from "@/errors/failures";
import { IngestError } from "@/errors/failures";
import { scanValue } from "../scan-json";

const text = (value: string) => new TextEncoder().encode(value);

function failureOf(input: string): DecodeFailure | null {
  try {
    scanValue(text(input));
    return null;
  } catch (error) {
    if (error instanceof IngestError) {
      return error.failure;
    }
    throw error;
  }
}

describe("scanValue - values", () => {
  it("should parse nested values and decode escapes", () => {
    const scanned = scanValue(text('{"a":[1,{"b":null}],"c":"x\\u0041"}'));

    expect(scanned.value).toEqual({ a: [1, { b: null }], c: "xA" });
    expect(scanned.end).toBe(34);
  });

  it("should record the end offset of every value by path", () => {
    const scanned = scanValue(text('{"a":[1,{"b":null}],"c":"x\\u0041"}'));

    expect(Object.fromEntries(scanned.offsets)).toEqual({
      "a.0": 7,
      "a.1.b": 17,
      "a.1": 18,
      a: 19,
      c: 33,
      "": 34,
    });
  });

  it("should stop after the first value", () => {
    const scanned = scanValue(text("1 2"));

    expect(scanned.value).toBe(1);
    expect(scanned.end).toBe(1);
  });

  it("should parse numbers with fraction and exponent", () => {
    expect(scanValue(text("-0.5e+2")).value).toBe(-50);
    expect(scanValue(text("true")).value).toBe(true);
  });

  it("should keep a __proto__ key as plain data", () => {
    const { value } = scanValue(text('{"__proto__": 1}'));

    expect(Object.keys(value ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
  });
});

describe("scanValue - failures", () => {
  it("should report the 1-based offset of the offending byte", () => {
    expect(failureOf('{"foo": }')).toEqual({ kind: "SyntaxError", offset: 9 });
    expect(failureOf('{"a" 1}')).toEqual({ kind: "SyntaxError", offset: 6 });
    expect(failureOf("[1,]")).toEqual({ kind: "SyntaxError", offset: 4 });
    expect(failureOf("nulx")).toEqual({ kind: "SyntaxError", offset: 4 });
    expect(failureOf("1.x")).toEqual({ kind: "SyntaxError", offset: 3 });
  });

  it("should reject raw control characters and unknown escapes in strings", () => {
    expect(failureOf('"a\nb"')).toEqual({ kind: "SyntaxError", offset: 3 });
    expect(failureOf('"\\q"')).toEqual({ kind: "SyntaxError", offset: 3 });
  });

  it("should report truncation when the input ends early", () => {
    expect(failureOf('{"foo": "ba')).toEqual({ kind: "TruncatedJSON" });
    expect(failureOf('{"foo": 1')).toEqual({ kind: "TruncatedJSON" });
    expect(failureOf("tru")).toEqual({ kind: "TruncatedJSON" });
    expect(failureOf("-")).toEqual({ kind: "TruncatedJSON" });
  });
});
