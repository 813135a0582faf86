import { customAlphabet } from "nanoid";

/** 64 symbols, so nanoid's byte mask maps every random byte onto the alphabet uniformly */
export const IDENTIFIER_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789_+";

/** Length of the generated part of a renamed upload */
export const STORED_NAME_LENGTH = 25;

const generate = customAlphabet(IDENTIFIER_ALPHABET, STORED_NAME_LENGTH);

/**
 * Generates a random identifier of exactly `length` characters drawn from
 * {@link IDENTIFIER_ALPHABET}, using the platform's cryptographic RNG.
 *
 * @throws {RangeError} When length is negative or not an integer
 */
export function randomIdentifier(length: number): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(
      `randomIdentifier: length must be a non-negative integer, got ${length}`
    );
  }
  if (length === 0) {
    return "";
  }
  return generate(length);
}
