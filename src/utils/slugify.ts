import { Err, Ok, type Result } from "./result";

const NON_SLUG_RUN = /[^a-z\d]+/g;
const EDGE_DASHES = /^-+|-+$/g;

/**
 * Lower-cases `text` and joins its ASCII letters and digits with single dashes.
 *
 * @example
 * slugify("Hello, World!") // Ok("hello-world")
 */
export function slugify(text: string): Result<string, string> {
  if (text === "") {
    return Err("empty string not permitted");
  }

  const slug = text
    .toLowerCase()
    .replace(NON_SLUG_RUN, "-")
    .replace(EDGE_DASHES, "");
  if (slug.length === 0) {
    return Err("after removing special characters, slug is empty");
  }
  return Ok(slug);
}
