import { describe, expect, it } from "vitest";
import {
  IDENTIFIER_ALPHABET,
  randomIdentifier,
  STORED_NAME_LENGTH,
} from "../random-identifier";

const ALLOWED = /^[a-zA-Z0-9_+]*$/;

describe("randomIdentifier", () => {
  it("should use a 64 symbol alphabet", () => {
    expect(IDENTIFIER_ALPHABET).toHaveLength(64);
    expect(new Set(IDENTIFIER_ALPHABET).size).toBe(64);
  });

  it("should return exactly the requested length", () => {
    expect(randomIdentifier(STORED_NAME_LENGTH)).toHaveLength(25);
    expect(randomIdentifier(1)).toHaveLength(1);
    expect(randomIdentifier(100)).toHaveLength(100);
  });

  it("should only draw from the alphabet", () => {
    for (let i = 0; i < 50; i++) {
      expect(randomIdentifier(40)).toMatch(ALLOWED);
    }
  });

  it("should return an empty string for zero", () => {
    expect(randomIdentifier(0)).toBe("");
  });

  it("should not repeat across calls", () => {
    const seen = new Set(
      Array.from({ length: 200 }, () => randomIdentifier(STORED_NAME_LENGTH))
    );
    expect(seen.size).toBe(200);
  });

  it("should reject negative and fractional lengths", () => {
    expect(() => randomIdentifier(-1)).toThrow(RangeError);
    expect(() => randomIdentifier(2.5)).toThrow(RangeError);
  });
});
