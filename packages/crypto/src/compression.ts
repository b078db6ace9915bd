/**
 * zlib (RFC 1950) wrapper detection, inflate and deflate
 */

import { deflateSync, inflateSync } from 'node:zlib';
import { DecompressError, LIMITS } from '@dccscan/kernel';

export interface DecompressOptions {
  /** Upper bound on inflated size in bytes (default 64 KiB) */
  maxInflatedBytes?: number;
}

/**
 * Whether `bytes` starts with a zlib header
 *
 * CM must be 8 (deflate), CINFO at most 7 and the header check bits
 * must make CMF*256 + FLG a multiple of 31. Most encoders emit 0x78 xx.
 */
export function isZlibStream(bytes: Uint8Array): boolean {
  if (bytes.length < 2) return false;
  const cmf = bytes[0] ?? 0;
  const flg = bytes[1] ?? 0;
  return (cmf & 0x0f) === 8 && cmf >> 4 <= 7 && (cmf * 256 + flg) % 31 === 0;
}

/**
 * Inflate a zlib stream; input without a zlib header is returned as is
 *
 * The Adler-32 trailer is checked by zlib.
 */
export function decompress(bytes: Uint8Array, options: DecompressOptions = {}): Uint8Array {
  if (!isZlibStream(bytes)) {
    return bytes;
  }
  const maxOutputLength = options.maxInflatedBytes ?? LIMITS.maxInflatedBytes;
  try {
    return new Uint8Array(inflateSync(bytes, { maxOutputLength }));
  } catch (err) {
    if (err instanceof RangeError) {
      throw new DecompressError(
        'E_DECOMPRESS_LIMIT',
        `Compressed payload inflates past ${maxOutputLength} bytes`,
        { maxInflatedBytes: maxOutputLength }
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecompressError('E_DECOMPRESS_FAILED', `Corrupt zlib stream: ${reason}`, {
      reason,
    });
  }
}

/**
 * Deflate with a zlib header (level 9, as HCERT issuers do)
 */
export function compress(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(deflateSync(bytes, { level: 9 }));
}
