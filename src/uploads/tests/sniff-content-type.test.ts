import { describe, expect, it } from "vitest";
import {
  isAllowedType,
  mimeEssence,
  OCTET_STREAM,
  sniffContentType,
} from "../sniff-content-type";

const bytes = (...values: number[]) => Uint8Array.from(values);
const text = (value: string) => new TextEncoder().encode(value);

describe("sniffContentType", () => {
  it("should detect common image signatures", () => {
    expect(
      sniffContentType(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00))
    ).toBe("image/png");
    expect(sniffContentType(bytes(0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10))).toBe(
      "image/jpeg"
    );
    expect(sniffContentType(text("GIF89a\x01\x00"))).toBe("image/gif");
    expect(sniffContentType(text("RIFF\x10\x00\x00\x00WEBPVP8 "))).toBe(
      "image/webp"
    );
  });

  it("should detect documents", () => {
    expect(sniffContentType(text("%PDF-1.7\n"))).toBe("application/pdf");
    expect(sniffContentType(text("  <?xml version=\"1.0\"?>"))).toBe(
      "text/xml; charset=utf-8"
    );
  });

  it("should detect html tags case-insensitively after whitespace", () => {
    expect(sniffContentType(text("\n  <html><body>hi</body></html>"))).toBe(
      "text/html; charset=utf-8"
    );
    expect(sniffContentType(text("<!doctype html>"))).toBe(
      "text/html; charset=utf-8"
    );
  });

  it("should detect an mp4 brand in the ftyp box", () => {
    const box = new Uint8Array(24);
    box.set([0x00, 0x00, 0x00, 0x18]);
    box.set(text("ftypisom"), 4);
    box.set([0x00, 0x00, 0x02, 0x00], 12);
    box.set(text("isommp41"), 16);

    expect(sniffContentType(box)).toBe("video/mp4");
  });

  it("should fall back to plain text without binary bytes", () => {
    expect(sniffContentType(text("hello world\n"))).toBe(
      "text/plain; charset=utf-8"
    );
    expect(sniffContentType(new Uint8Array(0))).toBe(
      "text/plain; charset=utf-8"
    );
  });

  it("should fall back to octet-stream for unknown binary data", () => {
    expect(sniffContentType(bytes(0x00, 0x01, 0x02, 0x03))).toBe(OCTET_STREAM);
  });

  it("should only look at the first 512 bytes", () => {
    const data = new Uint8Array(600).fill(0x61);
    data[550] = 0x00;

    expect(sniffContentType(data)).toBe("text/plain; charset=utf-8");
  });
});

describe("mimeEssence", () => {
  it("should drop parameters and lower-case the type", () => {
    expect(mimeEssence("Text/HTML; charset=utf-8")).toBe("text/html");
    expect(mimeEssence("image/png")).toBe("image/png");
  });
});

describe("isAllowedType", () => {
  it("should accept everything when the list is empty", () => {
    expect(isAllowedType(OCTET_STREAM, [])).toBe(true);
  });

  it("should reject a type missing from a non-empty list", () => {
    expect(isAllowedType("image/png", ["image/jpeg", "image/gif"])).toBe(false);
  });

  it("should match the full type or its essence case-insensitively", () => {
    expect(isAllowedType("image/png", ["IMAGE/PNG"])).toBe(true);
    expect(isAllowedType("text/plain; charset=utf-8", ["text/plain"])).toBe(true);
    expect(
      isAllowedType("text/plain; charset=utf-8", ["Text/Plain; charset=UTF-8"])
    ).toBe(true);
  });
});
