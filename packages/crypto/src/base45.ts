/**
 * Base45 encoding/decoding (RFC 9285)
 * Used for the QR transport of health certificates
 */

import { BASE45_ALPHABET, DecodeError } from '@dccscan/kernel';

const DECODE_TABLE: ReadonlyMap<string, number> = new Map(
  Array.from(BASE45_ALPHABET, (char, index) => [char, index])
);

function symbol(value: number): string {
  return BASE45_ALPHABET.charAt(value);
}

/**
 * Encode bytes to Base45
 */
export function base45Encode(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    const n = (bytes[i] ?? 0) * 256 + (bytes[i + 1] ?? 0);
    out += symbol(n % 45) + symbol(Math.floor(n / 45) % 45) + symbol(Math.floor(n / 2025));
  }
  if (bytes.length % 2 === 1) {
    const n = bytes[bytes.length - 1] ?? 0;
    out += symbol(n % 45) + symbol(Math.floor(n / 45));
  }
  return out;
}

/**
 * Decode Base45 to bytes
 *
 * Three characters give two bytes (high byte first), a trailing pair
 * gives one byte.
 */
export function base45Decode(input: string): Uint8Array {
  if (input.length % 3 === 1) {
    throw new DecodeError(
      'E_BASE45_LENGTH',
      `Base45 input of length ${input.length} leaves a single dangling character`,
      { length: input.length }
    );
  }

  const values = Array.from(input, (char, position) => {
    const value = DECODE_TABLE.get(char);
    if (value === undefined) {
      throw new DecodeError(
        'E_BASE45_ALPHABET',
        `Invalid Base45 character ${JSON.stringify(char)} at position ${position}`,
        { position }
      );
    }
    return value;
  });

  const out = new Uint8Array(Math.floor(values.length / 3) * 2 + (values.length % 3 === 2 ? 1 : 0));
  let o = 0;
  for (let i = 0; i < values.length; i += 3) {
    const [c = 0, d = 0, e] = values.slice(i, i + 3);
    const n = c + d * 45 + (e ?? 0) * 2025;
    if (e === undefined) {
      if (n > 0xff) {
        throw new DecodeError(
          'E_BASE45_OVERFLOW',
          `Base45 pair at position ${i} encodes ${n}, above the single-byte maximum 255`,
          { position: i, value: n }
        );
      }
      out[o++] = n;
    } else {
      if (n > 0xffff) {
        throw new DecodeError(
          'E_BASE45_OVERFLOW',
          `Base45 triplet at position ${i} encodes ${n}, above the two-byte maximum 65535`,
          { position: i, value: n }
        );
      }
      out[o++] = n >> 8;
      out[o++] = n & 0xff;
    }
  }
  return out;
}
