/**
 * Strict JSON body decoding. Accepts exactly one JSON document within the
 * size bound that matches the target zod schema, and classifies every other
 * input into a single DecodeFailure.
 */

import { z } from "zod";
import {
  type DecodeFailure,
  failures,
  toFailure,
} from "@/errors/failures";
import { declaresTooLarge, readBodyBytes } from "@/utils/read-body";
import { Err, Ok, type Result, safeTry } from "@/utils/result";
import { type ScannedValue, scanValue, skipWhitespace } from "./scan-json";

export interface DecodeJsonOptions {
  /** Largest body accepted, in bytes */
  maxBytes: number;
  /** Drop keys the schema does not declare instead of failing */
  allowUnknownFields: boolean;
}

type SchemaIssue = z.ZodError["issues"][number];

/** Issue codes meaning "the value at this path has the wrong shape" */
const TYPE_ISSUES = new Set<string>([
  "invalid_type",
  "invalid_value",
  "invalid_union",
]);

// --- Unknown key detection ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Finds the schema under wrappers that do not change which keys are accepted */
function unwrapSchema(schema: unknown): unknown {
  let current = schema;
  while (true) {
    if (
      current instanceof z.ZodOptional ||
      current instanceof z.ZodNullable ||
      current instanceof z.ZodDefault ||
      current instanceof z.ZodPrefault ||
      current instanceof z.ZodNonOptional ||
      current instanceof z.ZodCatch ||
      current instanceof z.ZodReadonly
    ) {
      current = current.def.innerType;
    } else if (current instanceof z.ZodPipe) {
      // The input side is what the JSON has to match
      current = current.in;
    } else if (current instanceof z.ZodLazy) {
      current = current.def.getter();
    } else {
      return current;
    }
  }
}

/** Flattens intersections into the list of schemas that all apply to one value */
function expandSchema(schema: unknown, into: unknown[]): unknown[] {
  const inner = unwrapSchema(schema);
  if (inner instanceof z.ZodIntersection) {
    expandSchema(inner.def.left, into);
    expandSchema(inner.def.right, into);
  } else {
    into.push(inner);
  }
  return into;
}

/**
 * A key is unknown under a union only when no option the value matches
 * accepts it; options that fail to parse are tried only when none match.
 */
function walkUnion(
  union: z.ZodUnion | z.ZodDiscriminatedUnion,
  others: unknown[],
  value: unknown
): string | null {
  const options: readonly z.core.$ZodType[] = union.options;
  const matching = options.filter(
    (option) => z.safeParse(option, value).success
  );
  const candidates = matching.length > 0 ? matching : options;

  let first: string | null = null;
  for (const option of candidates) {
    const found = walk([...others, option], value);
    if (!found) {
      return null;
    }
    first ??= found;
  }
  return first;
}

/** Walks a value against every schema that applies to it at once */
function walk(schemas: readonly unknown[], value: unknown): string | null {
  const expanded = schemas.flatMap((schema) => expandSchema(schema, []));

  const isUnion = (schema: unknown) =>
    schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion;
  const unionAt = expanded.findIndex(isUnion);
  const union = expanded[unionAt];
  if (union instanceof z.ZodUnion || union instanceof z.ZodDiscriminatedUnion) {
    const others = expanded.filter((_, index) => index !== unionAt);
    return walkUnion(union, others, value);
  }

  if (isRecord(value)) {
    const objects = expanded.filter((schema) => schema instanceof z.ZodObject);
    const records = expanded.filter((schema) => schema instanceof z.ZodRecord);
    if (objects.length > 0 || records.length > 0) {
      for (const [key, child] of Object.entries(value)) {
        const declared: unknown[] = records.map((record) => record.valueType);
        for (const object of objects) {
          const shape: Record<string, unknown> = object.shape;
          if (Object.hasOwn(shape, key)) {
            declared.push(shape[key]);
          }
        }
        if (declared.length === 0) {
          return key;
        }
        const nested = walk(declared, child);
        if (nested) {
          return nested;
        }
      }
    }
  }

  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      const elements: unknown[] = [];
      for (const schema of expanded) {
        if (schema instanceof z.ZodArray) {
          elements.push(schema.element);
        } else if (schema instanceof z.ZodTuple) {
          const positional = schema.def.items[index] ?? schema.def.rest;
          if (positional) {
            elements.push(positional);
          }
        }
      }
      const nested = walk(elements, item);
      if (nested) {
        return nested;
      }
    }
  }

  return null;
}

/**
 * Walks the value alongside the schema and returns the first key no object
 * schema declares. Looks through wrappers, pipes, lazy schemas,
 * intersections, unions, records, tuples and arrays.
 */
export function findUnknownKey(schema: unknown, value: unknown): string | null {
  return walk([schema], value);
}

// --- Classification ---

function scan(bytes: Uint8Array, start: number): Result<ScannedValue, DecodeFailure> {
  try {
    return Ok(scanValue(bytes, start));
  } catch (error) {
    return Err(toFailure(error, failures.unclassified));
  }
}

/**
 * Maps schema issues and unknown keys onto a single failure, in order:
 * type mismatch on a present value, unknown field, missing field, anything
 * else. A path the scanner never saw belongs to a missing field.
 */
function classifyShape(
  issues: readonly SchemaIssue[],
  unknownKey: string | null,
  scanned: ScannedValue
): DecodeFailure {
  const typeIssues = issues
    .filter((issue) => TYPE_ISSUES.has(issue.code))
    .map((issue) => issue.path.map(String).join("."));

  const present = typeIssues.find((field) => scanned.offsets.has(field));
  if (present !== undefined) {
    const offset = scanned.offsets.get(present) ?? scanned.end;
    return failures.typeMismatch(offset, present || undefined);
  }

  if (unknownKey) {
    return failures.unknownField(unknownKey);
  }

  const missing = typeIssues[0];
  if (missing !== undefined) {
    return failures.unclassified(`missing required field "${missing}"`);
  }

  for (const issue of issues) {
    const key = issue.code === "unrecognized_keys" ? issue.keys[0] : undefined;
    if (key) {
      return failures.unknownField(key);
    }
  }

  return failures.unclassified(issues[0]?.message ?? "invalid body");
}

/**
 * Decodes an in-memory body. Exposed for callers that already hold the bytes;
 * {@link decodeJson} is the request-level entry point.
 */
export function decodeJsonBytes<S extends z.ZodType>(
  bytes: Uint8Array,
  schema: S,
  options: Pick<DecodeJsonOptions, "allowUnknownFields">
): Result<z.output<S>, DecodeFailure> {
  const start = skipWhitespace(bytes, 0);
  if (start >= bytes.length) {
    return Err(failures.emptyBody());
  }

  const scanned = scan(bytes, start);
  if (scanned.isErr) {
    return scanned;
  }

  const parsed = schema.safeParse(scanned.value.value);
  const unknownKey = options.allowUnknownFields
    ? null
    : findUnknownKey(schema, scanned.value.value);

  if (!parsed.success || unknownKey) {
    return Err(
      classifyShape(parsed.error?.issues ?? [], unknownKey, scanned.value)
    );
  }

  // Exactly one document per body
  if (skipWhitespace(bytes, scanned.value.end) < bytes.length) {
    return Err(failures.multipleJsonValues());
  }

  return Ok(parsed.data);
}

/**
 * Reads the request body (at most `maxBytes`, whatever Content-Length claims)
 * and decodes it into the schema's output type.
 *
 * @example
 * ```typescript
 * const body = await decodeJson(c.req.raw, z.object({ name: z.string() }), {
 *   maxBytes: 1024 * 1024,
 *   allowUnknownFields: false,
 * });
 * if (body.isErr) {
 *   return writeError(c, body.error, failureStatus(body.error));
 * }
 * ```
 */
export async function decodeJson<S extends z.ZodType>(
  request: Request,
  schema: S,
  options: DecodeJsonOptions
): Promise<Result<z.output<S>, DecodeFailure>> {
  if (declaresTooLarge(request, options.maxBytes)) {
    return Err(failures.payloadTooLarge(options.maxBytes, "body"));
  }

  const read = await safeTry(() =>
    readBodyBytes(request.body, options.maxBytes, "body")
  );
  if (read.isErr) {
    return Err(toFailure(read.error, failures.unclassified));
  }

  return decodeJsonBytes(read.value, schema, options);
}
