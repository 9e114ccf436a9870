import { customAlphabet } from "nanoid";

export const CODE_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const DEFAULT_CODE_LENGTH = 6;

const nanoid = customAlphabet(CODE_ALPHABET, DEFAULT_CODE_LENGTH);

/**
 * Random short code over the 62-character alphanumeric alphabet.
 * Not unique by construction: the store rejects collisions.
 */
export function generateCode(length: number = DEFAULT_CODE_LENGTH): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Invalid code length: ${length}`);
  }
  return nanoid(length);
}
