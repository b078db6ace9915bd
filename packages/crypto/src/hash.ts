/**
 * Hash and key identifier utilities
 */

import { createHash, X509Certificate } from 'node:crypto';
import { LIMITS } from '@dccscan/kernel';

/**
 * SHA-256 digest (32 bytes)
 */
export function sha256(data: Uint8Array | string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(data).digest());
}

/**
 * Convert hex string to Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  // Validate: must be even length and contain only hex characters
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Invalid hex string');
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * DCC key identifier of a signing certificate
 *
 * The first 8 bytes of the SHA-256 of the certificate DER encoding.
 * Accepts a PEM string or raw DER bytes.
 */
export function keyIdFromCertificate(certificate: string | Uint8Array): Uint8Array {
  const der = typeof certificate === 'string' ? new X509Certificate(certificate).raw : certificate;
  return sha256(der).slice(0, LIMITS.keyIdLength);
}
