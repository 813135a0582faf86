/**
 * Byte-level JSON scanner. Parses one value from the start of a buffer and
 * reports where it stopped, so callers can tell trailing data, truncation and
 * malformed input apart, and locate every value by its field path.
 *
 * Offsets are 1-based byte positions: a SyntaxError offset points at the
 * offending byte, a value's offset at its last byte.
 */

import { type DecodeFailure, failures, IngestError } from "@/errors/failures";

/** Nesting deeper than this is refused rather than risking the call stack */
export const MAX_DEPTH = 10_000;

export interface ScannedValue {
  value: unknown;
  /** Index just past the value */
  end: number;
  /** End offset of each value, keyed by dotted field path ("" is the root) */
  offsets: Map<string, number>;
}

const decoder = new TextDecoder("utf-8");

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;
const COLON = 0x3a;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const MINUS = 0x2d;

const ESCAPES: Record<number, string> = {
  0x22: '"',
  0x5c: "\\",
  0x2f: "/",
  0x62: "\b",
  0x66: "\f",
  0x6e: "\n",
  0x72: "\r",
  0x74: "\t",
};

function isDigit(byte: number | undefined): boolean {
  return byte !== undefined && byte >= 0x30 && byte <= 0x39;
}

function hexValue(byte: number | undefined): number {
  if (byte === undefined) {
    return -1;
  }
  if (byte >= 0x30 && byte <= 0x39) {
    return byte - 0x30;
  }
  const lower = byte | 0x20;
  if (lower >= 0x61 && lower <= 0x66) {
    return lower - 0x61 + 10;
  }
  return -1;
}

export function skipWhitespace(bytes: Uint8Array, start: number): number {
  let pos = start;
  while (pos < bytes.length) {
    const byte = bytes[pos];
    if (byte !== 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d) {
      break;
    }
    pos++;
  }
  return pos;
}

/**
 * Scans a single JSON value starting at `start` (leading whitespace allowed).
 *
 * @throws {IngestError} SyntaxError, TruncatedJSON or UnclassifiedDecodeError
 */
export function scanValue(bytes: Uint8Array, start = 0): ScannedValue {
  const offsets = new Map<string, number>();
  // Field path of the value being read, shared down the recursion
  const path: string[] = [];
  let pos = start;

  const fail = (failure: DecodeFailure): never => {
    throw new IngestError(failure);
  };

  /** Truncated when the input ran out, malformed otherwise */
  const unexpected = (): never =>
    pos >= bytes.length
      ? fail(failures.truncatedJson())
      : fail(failures.syntaxError(pos + 1));

  const expectLiteral = (text: string, value: unknown): unknown => {
    for (let i = 0; i < text.length; i++) {
      if (bytes[pos] !== text.charCodeAt(i)) {
        unexpected();
      }
      pos++;
    }
    return value;
  };

  const digits = () => {
    if (!isDigit(bytes[pos])) {
      unexpected();
    }
    while (isDigit(bytes[pos])) {
      pos++;
    }
  };

  const readNumber = (): number => {
    const begin = pos;
    if (bytes[pos] === MINUS) {
      pos++;
    }
    if (bytes[pos] === 0x30) {
      pos++;
    } else {
      digits();
    }
    if (bytes[pos] === 0x2e) {
      pos++;
      digits();
    }
    if (bytes[pos] === 0x65 || bytes[pos] === 0x45) {
      pos++;
      if (bytes[pos] === 0x2b || bytes[pos] === MINUS) {
        pos++;
      }
      digits();
    }
    return Number(decoder.decode(bytes.subarray(begin, pos)));
  };

  const readHex4 = (): number => {
    let code = 0;
    for (let i = 0; i < 4; i++) {
      const digit = hexValue(bytes[pos]);
      if (digit < 0) {
        unexpected();
      }
      code = code * 16 + digit;
      pos++;
    }
    return code;
  };

  const readString = (): string => {
    // Opening quote
    pos++;
    let result = "";
    let segmentStart = pos;

    while (true) {
      const byte = bytes[pos];
      if (byte === undefined) {
        return fail(failures.truncatedJson());
      }
      if (byte === QUOTE) {
        result += decoder.decode(bytes.subarray(segmentStart, pos));
        pos++;
        return result;
      }
      if (byte < 0x20) {
        return fail(failures.syntaxError(pos + 1));
      }
      if (byte !== BACKSLASH) {
        pos++;
        continue;
      }

      result += decoder.decode(bytes.subarray(segmentStart, pos));
      pos++;
      const escape = bytes[pos];
      if (escape === undefined) {
        return fail(failures.truncatedJson());
      }
      if (escape === 0x75) {
        pos++;
        result += String.fromCharCode(readHex4());
      } else {
        const replacement = ESCAPES[escape];
        if (replacement === undefined) {
          return fail(failures.syntaxError(pos + 1));
        }
        result += replacement;
        pos++;
      }
      segmentStart = pos;
    }
  };

  const readObject = (depth: number): Record<string, unknown> => {
    pos++;
    const object: Record<string, unknown> = {};
    pos = skipWhitespace(bytes, pos);
    if (bytes[pos] === CLOSE_BRACE) {
      pos++;
      return object;
    }

    while (true) {
      pos = skipWhitespace(bytes, pos);
      if (bytes[pos] !== QUOTE) {
        unexpected();
      }
      const key = readString();
      pos = skipWhitespace(bytes, pos);
      if (bytes[pos] !== COLON) {
        unexpected();
      }
      pos++;
      // defineProperty keeps a "__proto__" key an ordinary field
      path.push(key);
      Object.defineProperty(object, key, {
        value: readValue(depth + 1),
        enumerable: true,
        writable: true,
        configurable: true,
      });
      path.pop();
      pos = skipWhitespace(bytes, pos);
      if (bytes[pos] === COMMA) {
        pos++;
        continue;
      }
      if (bytes[pos] === CLOSE_BRACE) {
        pos++;
        return object;
      }
      unexpected();
    }
  };

  const readArray = (depth: number): unknown[] => {
    pos++;
    const items: unknown[] = [];
    pos = skipWhitespace(bytes, pos);
    if (bytes[pos] === CLOSE_BRACKET) {
      pos++;
      return items;
    }

    while (true) {
      path.push(String(items.length));
      items.push(readValue(depth + 1));
      path.pop();
      pos = skipWhitespace(bytes, pos);
      if (bytes[pos] === COMMA) {
        pos++;
        continue;
      }
      if (bytes[pos] === CLOSE_BRACKET) {
        pos++;
        return items;
      }
      unexpected();
    }
  };

  function readValue(depth: number): unknown {
    if (depth > MAX_DEPTH) {
      fail(failures.unclassified(`exceeded max nesting depth of ${MAX_DEPTH}`));
    }
    pos = skipWhitespace(bytes, pos);
    const byte = bytes[pos];

    let value: unknown;
    if (byte === OPEN_BRACE) {
      value = readObject(depth);
    } else if (byte === OPEN_BRACKET) {
      value = readArray(depth);
    } else if (byte === QUOTE) {
      value = readString();
    } else if (byte === 0x74) {
      value = expectLiteral("true", true);
    } else if (byte === 0x66) {
      value = expectLiteral("false", false);
    } else if (byte === 0x6e) {
      value = expectLiteral("null", null);
    } else if (byte === MINUS || isDigit(byte)) {
      value = readNumber();
    } else {
      unexpected();
    }

    offsets.set(path.join("."), pos);
    return value;
  }

  const value = readValue(0);
  return { value, end: pos, offsets };
}
