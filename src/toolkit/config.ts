import { prettifyError, z } from "zod";
import { Err, Ok, type Result } from "@/utils/result";

/** Ceiling on a whole multipart body: 1 GiB */
export const DEFAULT_MAX_TOTAL_BYTES = 1024 ** 3;

/** Ceiling on a JSON body: 1 MiB */
export const DEFAULT_MAX_JSON_BYTES = 1024 * 1024;

export const ingestionConfigSchema = z.object({
  maxTotalBytes: z.number().int().positive().default(DEFAULT_MAX_TOTAL_BYTES),
  allowedTypes: z.array(z.string().min(1)).default([]),
  maxJsonBytes: z.number().int().positive().default(DEFAULT_MAX_JSON_BYTES),
  allowUnknownJsonFields: z.boolean().default(false),
  rename: z.boolean().default(true),
});

/** Fully resolved settings, every default filled in */
export type IngestionConfig = z.output<typeof ingestionConfigSchema>;

/** What callers pass; every field is optional */
export type IngestionConfigInput = z.input<typeof ingestionConfigSchema>;

export function resolveIngestionConfig(
  input: unknown = {}
): Result<IngestionConfig, string> {
  const parsed = ingestionConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(prettifyError(parsed.error));
  }
  return Ok(parsed.data);
}
