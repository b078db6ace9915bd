/**
 * COSE_Sign1 signature verification
 *
 * Checks a signature against a key the caller already trusts. Finding
 * and trusting that key (trust lists, CSCA chains) is out of scope.
 */

import {
  KeyObject,
  X509Certificate,
  constants,
  createPublicKey,
  verify as nodeVerify,
} from 'node:crypto';
import * as ed25519 from '@noble/ed25519';
import {
  coseAlgorithmName,
  type CoseAlgorithmName,
  type SignatureErrorCode,
} from '@dccscan/kernel';
import { sigStructure, type CoseSign1 } from './cose.js';
import { bytesToHex } from './hash.js';

/**
 * Public key accepted by `verifyCoseSign1`
 *
 * - `KeyObject` (public, or private to derive the public half)
 * - PEM string: SPKI public key or X.509 certificate
 * - `Uint8Array`: raw 32-byte Ed25519 key for EdDSA, SPKI DER otherwise
 */
export type VerificationKey = KeyObject | string | Uint8Array;

export type CoseVerifyResult =
  | {
      valid: true;
      algorithm: CoseAlgorithmName;
      /** Key identifier from the envelope headers, hex encoded */
      kid?: string;
    }
  | {
      valid: false;
      code: SignatureErrorCode;
      message: string;
      kid?: string;
    };

export interface CoseVerifyOptions {
  /** External additional authenticated data (empty for HCERT) */
  externalAad?: Uint8Array;
}

const KEY_TYPES: Record<CoseAlgorithmName, readonly string[]> = {
  ES256: ['ec'],
  ES384: ['ec'],
  ES512: ['ec'],
  PS256: ['rsa', 'rsa-pss'],
  EdDSA: ['ed25519'],
};

const DIGESTS: Record<Exclude<CoseAlgorithmName, 'EdDSA'>, string> = {
  ES256: 'sha256',
  ES384: 'sha384',
  ES512: 'sha512',
  PS256: 'sha256',
};

function failure(code: SignatureErrorCode, message: string, kid?: string): CoseVerifyResult {
  return { valid: false, code, message, kid };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolve a VerificationKey to a Node public KeyObject
 */
export function toPublicKey(key: VerificationKey): KeyObject {
  if (key instanceof KeyObject) {
    return key.type === 'public' ? key : createPublicKey(key);
  }
  if (typeof key === 'string') {
    return key.includes('BEGIN CERTIFICATE')
      ? new X509Certificate(key).publicKey
      : createPublicKey(key);
  }
  if (key.length === 32) {
    return createPublicKey({
      key: { kty: 'OKP', crv: 'Ed25519', x: Buffer.from(key).toString('base64url') },
      format: 'jwk',
    });
  }
  return createPublicKey({ key: Buffer.from(key), format: 'der', type: 'spki' });
}

function checkWithNode(
  algorithm: CoseAlgorithmName,
  data: Uint8Array,
  signature: Uint8Array,
  key: KeyObject
): boolean {
  switch (algorithm) {
    case 'EdDSA':
      return nodeVerify(null, data, key, signature);
    case 'PS256':
      return nodeVerify(
        DIGESTS.PS256,
        data,
        { key, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: 32 },
        signature
      );
    default:
      return nodeVerify(DIGESTS[algorithm], data, { key, dsaEncoding: 'ieee-p1363' }, signature);
  }
}

/**
 * Verify the signature of a parsed COSE_Sign1 envelope
 *
 * Never throws for a bad signature or key; the result says why it failed.
 */
export async function verifyCoseSign1(
  envelope: CoseSign1,
  key: VerificationKey,
  options: CoseVerifyOptions = {}
): Promise<CoseVerifyResult> {
  const kid = envelope.keyId ? bytesToHex(envelope.keyId) : undefined;
  const algorithm =
    envelope.algorithm === undefined ? undefined : coseAlgorithmName(envelope.algorithm);

  if (!algorithm) {
    return failure(
      'E_UNSUPPORTED_ALGORITHM',
      `Unsupported COSE algorithm: ${envelope.algorithm ?? 'none'}`,
      kid
    );
  }

  const data = sigStructure(envelope, options.externalAad);

  // Raw Ed25519 keys go through @noble/ed25519
  if (algorithm === 'EdDSA' && key instanceof Uint8Array && key.length === 32) {
    let valid: boolean;
    try {
      valid = await ed25519.verifyAsync(envelope.signature, data, key);
    } catch (err) {
      return failure('E_INVALID_SIGNATURE', `Malformed EdDSA signature: ${errorMessage(err)}`, kid);
    }
    return valid
      ? { valid: true, algorithm, kid }
      : failure('E_INVALID_SIGNATURE', 'EdDSA signature does not match', kid);
  }

  let publicKey: KeyObject;
  try {
    publicKey = toPublicKey(key);
  } catch (err) {
    return failure('E_INVALID_KEY', `Unreadable verification key: ${errorMessage(err)}`, kid);
  }

  const keyType = publicKey.asymmetricKeyType ?? 'unknown';
  if (!KEY_TYPES[algorithm].includes(keyType)) {
    return failure(
      'E_INVALID_KEY',
      `${algorithm} needs a ${KEY_TYPES[algorithm].join(' or ')} key, got ${keyType}`,
      kid
    );
  }

  let valid: boolean;
  try {
    valid = checkWithNode(algorithm, data, envelope.signature, publicKey);
  } catch (err) {
    return failure('E_INVALID_SIGNATURE', `Malformed ${algorithm} signature: ${errorMessage(err)}`, kid);
  }

  return valid
    ? { valid: true, algorithm, kid }
    : failure('E_INVALID_SIGNATURE', `${algorithm} signature does not match`, kid);
}
