/**
 * Content-type sniffing over the first bytes of a file.
 * Follows the WHATWG MIME Sniffing signature table: the declared
 * Content-Type of a multipart part is never consulted.
 */

/** Number of leading bytes the sniffer looks at */
export const SNIFF_LENGTH = 512;

export const OCTET_STREAM = "application/octet-stream";
const PLAIN_TEXT = "text/plain; charset=utf-8";
const HTML = "text/html; charset=utf-8";

type Signature =
  | { type: "html"; tag: string }
  | {
      type: "masked";
      mime: string;
      pattern: string;
      mask?: string;
      skipWhitespace?: boolean;
    }
  | { type: "mp4" };

// Patterns are written as latin1 strings: one char per byte.
const HTML_TAGS = [
  "<!DOCTYPE HTML",
  "<HTML",
  "<HEAD",
  "<SCRIPT",
  "<IFRAME",
  "<H1",
  "<DIV",
  "<FONT",
  "<TABLE",
  "<A",
  "<STYLE",
  "<TITLE",
  "<B",
  "<BODY",
  "<BR",
  "<P",
  "<!--",
];

const RIFF_MASK = "\xFF\xFF\xFF\xFF\x00\x00\x00\x00\xFF\xFF\xFF\xFF";

const SIGNATURES: Signature[] = [
  ...HTML_TAGS.map((tag): Signature => ({ type: "html", tag })),
  {
    type: "masked",
    mime: "text/xml; charset=utf-8",
    pattern: "<?xml",
    skipWhitespace: true,
  },
  { type: "masked", mime: "application/pdf", pattern: "%PDF-" },
  { type: "masked", mime: "application/postscript", pattern: "%!PS-Adobe-" },

  // Byte order marks
  {
    type: "masked",
    mime: "text/plain; charset=utf-16be",
    pattern: "\xFE\xFF\x00\x00",
    mask: "\xFF\xFF\x00\x00",
  },
  {
    type: "masked",
    mime: "text/plain; charset=utf-16le",
    pattern: "\xFF\xFE\x00\x00",
    mask: "\xFF\xFF\x00\x00",
  },
  {
    type: "masked",
    mime: PLAIN_TEXT,
    pattern: "\xEF\xBB\xBF\x00",
    mask: "\xFF\xFF\xFF\x00",
  },

  // Images
  { type: "masked", mime: "image/x-icon", pattern: "\x00\x00\x01\x00" },
  { type: "masked", mime: "image/x-icon", pattern: "\x00\x00\x02\x00" },
  { type: "masked", mime: "image/bmp", pattern: "BM" },
  { type: "masked", mime: "image/gif", pattern: "GIF87a" },
  { type: "masked", mime: "image/gif", pattern: "GIF89a" },
  {
    type: "masked",
    mime: "image/webp",
    pattern: "RIFF\x00\x00\x00\x00WEBPVP",
    mask: `${RIFF_MASK}\xFF\xFF`,
  },
  { type: "masked", mime: "image/png", pattern: "\x89PNG\x0D\x0A\x1A\x0A" },
  { type: "masked", mime: "image/jpeg", pattern: "\xFF\xD8\xFF" },

  // Audio and video
  {
    type: "masked",
    mime: "audio/aiff",
    pattern: "FORM\x00\x00\x00\x00AIFF",
    mask: RIFF_MASK,
  },
  { type: "masked", mime: "audio/mpeg", pattern: "ID3" },
  { type: "masked", mime: "application/ogg", pattern: "OggS\x00" },
  { type: "masked", mime: "audio/midi", pattern: "MThd\x00\x00\x00\x06" },
  {
    type: "masked",
    mime: "video/avi",
    pattern: "RIFF\x00\x00\x00\x00AVI ",
    mask: RIFF_MASK,
  },
  {
    type: "masked",
    mime: "audio/wave",
    pattern: "RIFF\x00\x00\x00\x00WAVE",
    mask: RIFF_MASK,
  },
  { type: "mp4" },
  { type: "masked", mime: "video/webm", pattern: "\x1A\x45\xDF\xA3" },

  // Fonts
  { type: "masked", mime: "font/ttf", pattern: "\x00\x01\x00\x00" },
  { type: "masked", mime: "font/otf", pattern: "OTTO" },
  { type: "masked", mime: "font/collection", pattern: "ttcf" },
  { type: "masked", mime: "font/woff", pattern: "wOFF" },
  { type: "masked", mime: "font/woff2", pattern: "wOF2" },

  // Archives
  { type: "masked", mime: "application/x-gzip", pattern: "\x1F\x8B\x08" },
  { type: "masked", mime: "application/zip", pattern: "PK\x03\x04" },
  {
    type: "masked",
    mime: "application/x-rar-compressed",
    pattern: "Rar!\x1A\x07\x00",
  },
  {
    type: "masked",
    mime: "application/x-rar-compressed",
    pattern: "Rar!\x1A\x07\x01\x00",
  },
  { type: "masked", mime: "application/wasm", pattern: "\x00asm" },
];

// --- Matchers ---

function isWhitespace(byte: number): boolean {
  return (
    byte === 0x09 ||
    byte === 0x0a ||
    byte === 0x0c ||
    byte === 0x0d ||
    byte === 0x20
  );
}

/** Bytes that mark content as binary rather than text */
function isBinary(byte: number): boolean {
  return (
    byte <= 0x08 ||
    byte === 0x0b ||
    (byte >= 0x0e && byte <= 0x1a) ||
    (byte >= 0x1c && byte <= 0x1f)
  );
}

function firstNonWhitespace(data: Uint8Array): number {
  let index = 0;
  while (index < data.length && isWhitespace(data[index] ?? 0)) {
    index++;
  }
  return index;
}

function matchHtml(data: Uint8Array, tag: string): boolean {
  const start = firstNonWhitespace(data);
  if (data.length - start < tag.length + 1) {
    return false;
  }
  for (let i = 0; i < tag.length; i++) {
    const expected = tag.charCodeAt(i);
    let actual = data[start + i] ?? 0;
    // Letters in the tag are upper case; fold the input to match
    if (expected >= 0x41 && expected <= 0x5a) {
      actual &= 0xdf;
    }
    if (actual !== expected) {
      return false;
    }
  }
  const terminator = data[start + tag.length];
  return terminator === 0x20 || terminator === 0x3e;
}

function matchMasked(
  data: Uint8Array,
  pattern: string,
  mask: string | undefined,
  skipWhitespace: boolean
): boolean {
  const start = skipWhitespace ? firstNonWhitespace(data) : 0;
  if (data.length - start < pattern.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    const maskByte = mask ? mask.charCodeAt(i) : 0xff;
    if (((data[start + i] ?? 0) & maskByte) !== pattern.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}

/** ISO base media file whose `ftyp` box lists an mp4 brand */
function matchMp4(data: Uint8Array): boolean {
  if (data.length < 12) {
    return false;
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const boxSize = view.getUint32(0);
  if (data.length < boxSize || boxSize % 4 !== 0) {
    return false;
  }
  if (!matchMasked(data.subarray(4), "ftyp", undefined, false)) {
    return false;
  }
  for (let start = 8; start < boxSize; start += 4) {
    if (start === 12) {
      // minor version, not a brand
      continue;
    }
    if (matchMasked(data.subarray(start), "mp4", undefined, false)) {
      return true;
    }
  }
  return false;
}

function matches(data: Uint8Array, signature: Signature): string | null {
  switch (signature.type) {
    case "html":
      return matchHtml(data, signature.tag) ? HTML : null;
    case "mp4":
      return matchMp4(data) ? "video/mp4" : null;
    default:
      return matchMasked(
        data,
        signature.pattern,
        signature.mask,
        signature.skipWhitespace ?? false
      )
        ? signature.mime
        : null;
  }
}

/**
 * Classifies content by its leading bytes. Only the first {@link SNIFF_LENGTH}
 * bytes are considered. Always returns a MIME type: text without binary bytes
 * is `text/plain; charset=utf-8`, anything unrecognised is `application/octet-stream`.
 */
export function sniffContentType(prefix: Uint8Array): string {
  const data = prefix.subarray(0, SNIFF_LENGTH);

  for (const signature of SIGNATURES) {
    const mime = matches(data, signature);
    if (mime) {
      return mime;
    }
  }

  return data.some(isBinary) ? OCTET_STREAM : PLAIN_TEXT;
}

/** `text/plain; charset=utf-8` → `text/plain` */
export function mimeEssence(mime: string): string {
  return (mime.split(";")[0] ?? "").trim().toLowerCase();
}

/**
 * Allow-list check. An empty list permits everything; otherwise the sniffed
 * type must equal an entry case-insensitively, either in full or by essence.
 */
export function isAllowedType(
  detected: string,
  allowedTypes: readonly string[]
): boolean {
  if (allowedTypes.length === 0) {
    return true;
  }
  const full = detected.toLowerCase();
  const essence = mimeEssence(detected);
  return allowedTypes.some((allowed) => {
    const candidate = allowed.trim().toLowerCase();
    return candidate === full || candidate === essence;
  });
}
