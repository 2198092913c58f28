import { customAlphabet } from "nanoid";

/**
 * ID generation utilities.
 *
 * Node ids are 25 lowercase alphanumeric characters:
 * - `c` prefix
 * - 8 base-36 characters of milliseconds since the epoch
 * - 4 base-36 characters of a per-process counter
 * - 12 random characters
 *
 * Ids generated by one process sort in creation order, which gives
 * listings a stable default order.
 */

const RANDOM_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz";
const TIMESTAMP_LENGTH = 8;
const COUNTER_LENGTH = 4;
const RANDOM_LENGTH = 12;
const COUNTER_MODULUS = 36 ** COUNTER_LENGTH;

const randomPart = customAlphabet(RANDOM_ALPHABET, RANDOM_LENGTH);

let lastTimestamp = 0;
let counter = 0;

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;

/**
 * Generates a new unique node ID.
 */
export function generateId(): string {
  const now = Date.now();
  if (now === lastTimestamp) {
    counter = (counter + 1) % COUNTER_MODULUS;
  } else {
    lastTimestamp = now;
    counter = 0;
  }

  const timestamp = now.toString(36).padStart(TIMESTAMP_LENGTH, "0");
  const sequence = counter.toString(36).padStart(COUNTER_LENGTH, "0");
  return `c${timestamp}${sequence}${randomPart()}`;
}

const ID_PATTERN = /^c[0-9a-z]{24}$/;

/**
 * Checks whether a string has the shape of a generated node ID.
 */
export function isGeneratedId(value: string): boolean {
  return ID_PATTERN.test(value);
}
