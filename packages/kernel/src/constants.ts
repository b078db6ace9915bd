/**
 * dccscan constants
 *
 * Wire-level identifiers for the HCERT (EU Digital COVID Certificate)
 * transport: QR prefix, CWT claim keys, COSE header labels and algorithms.
 */

/**
 * QR transport prefix settings
 */
export const PREFIX = {
  /** Prefix accepted by the decoder (HCERT v1) */
  current: 'HC1:' as const,
  /** Shape of any scheme marker: two letters, a version digit, a colon */
  pattern: /^[A-Z]{2}[0-9]:/,
  length: 4,
} as const;

/**
 * Base45 alphabet (RFC 9285)
 */
export const BASE45_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:' as const;

/**
 * CWT claim keys used by HCERT payloads (RFC 8392 + HCERT claim -260)
 */
export const CWT_CLAIMS = {
  issuer: 1,
  subject: 2,
  audience: 3,
  expiresAt: 4,
  notBefore: 5,
  issuedAt: 6,
  hcert: -260,
} as const;

/**
 * Key of the EU DCC v1 structure inside the hcert claim
 */
export const HCERT_DCC_V1 = 1;

/**
 * COSE constants (RFC 9052)
 */
export const COSE = {
  /** CBOR tag for COSE_Sign1 */
  sign1Tag: 18,
  /** Context string for the Sig_structure of COSE_Sign1 */
  sign1Context: 'Signature1' as const,
  headers: {
    algorithm: 1,
    contentType: 3,
    keyId: 4,
  },
} as const;

/**
 * COSE algorithm identifiers accepted by the signature check
 */
export const COSE_ALGORITHMS = {
  ES256: -7,
  EdDSA: -8,
  ES384: -35,
  ES512: -36,
  PS256: -37,
} as const;

export type CoseAlgorithmName = keyof typeof COSE_ALGORITHMS;

const ALGORITHM_NAMES: readonly CoseAlgorithmName[] = ['ES256', 'EdDSA', 'ES384', 'ES512', 'PS256'];

/**
 * Look up the name of a COSE algorithm identifier
 */
export function coseAlgorithmName(id: number): CoseAlgorithmName | undefined {
  return ALGORITHM_NAMES.find((name) => COSE_ALGORITHMS[name] === id);
}

/**
 * Decoder limits
 */
export const LIMITS = {
  /** Maximum nesting depth of a decoded CBOR tree */
  maxDepth: 32,
  /** Maximum size of an inflated envelope in bytes (64 KiB) */
  maxInflatedBytes: 65536,
  /** Length of a DCC key identifier (first bytes of the certificate SHA-256) */
  keyIdLength: 8,
} as const;
