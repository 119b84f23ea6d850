/**
 * ULID generator for launch log event ids.
 *
 * 26 characters of Crockford Base32: a 48-bit millisecond timestamp
 * (10 chars) followed by 80 random bits (16 chars). Ids sort by creation
 * time at millisecond resolution; within one millisecond order is random.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32 alphabet: no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;

/** Encode `value` as exactly `length` Base32 characters, left-padded with '0'. */
function encodeBase32(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

/**
 * @param now - Millisecond timestamp to encode; defaults to Date.now()
 * @example
 * ulid(); // '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  const random = BigInt('0x' + randomBytes(10).toString('hex'));
  return encodeBase32(BigInt(now), TIME_LENGTH) + encodeBase32(random, RANDOM_LENGTH);
}
