/**
 * Crypto test kit
 *
 * Key generation and COSE_Sign1 signing for TEST FIXTURES ONLY.
 * Not exported from the main entry point.
 *
 * Import path: @dccscan/crypto/testkit
 */

import { constants, generateKeyPairSync, sign as nodeSign, type KeyObject } from 'node:crypto';
import * as ed25519 from '@noble/ed25519';
import { COSE, COSE_ALGORITHMS, type CoseAlgorithmName } from '@dccscan/kernel';
import { bytes, encode, int, map, tagged, array, type TypedValue } from '@dccscan/cbor';
import { sigStructure } from './cose.js';

export type NodeAlgorithm = Exclude<CoseAlgorithmName, 'EdDSA'>;

/**
 * Signing key for fixtures
 *
 * EdDSA keys are raw 32-byte keys (@noble/ed25519); the others are
 * Node KeyObjects.
 */
export type TestSigningKey =
  | { algorithm: 'EdDSA'; privateKey: Uint8Array; publicKey: Uint8Array }
  | { algorithm: NodeAlgorithm; privateKey: KeyObject; publicKey: KeyObject };

const CURVES: Record<Exclude<NodeAlgorithm, 'PS256'>, string> = {
  ES256: 'P-256',
  ES384: 'P-384',
  ES512: 'P-521',
};

const DIGESTS: Record<NodeAlgorithm, string> = {
  ES256: 'sha256',
  ES384: 'sha384',
  ES512: 'sha512',
  PS256: 'sha256',
};

/**
 * Generate a random signing key for the given COSE algorithm
 */
export async function generateTestKey(
  algorithm: CoseAlgorithmName = 'ES256'
): Promise<TestSigningKey> {
  if (algorithm === 'EdDSA') {
    const privateKey = ed25519.utils.randomPrivateKey();
    const publicKey = await ed25519.getPublicKeyAsync(privateKey);
    return { algorithm, privateKey, publicKey };
  }
  if (algorithm === 'PS256') {
    const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
    return { algorithm, privateKey, publicKey };
  }
  const { privateKey, publicKey } = generateKeyPairSync('ec', { namedCurve: CURVES[algorithm] });
  return { algorithm, privateKey, publicKey };
}

/**
 * Ed25519 key from a deterministic 32-byte seed
 *
 * Seeded keys are predictable. Use only for reproducible fixtures.
 */
export async function ed25519KeyFromSeed(seed: Uint8Array): Promise<TestSigningKey> {
  if (seed.length !== 32) {
    throw new RangeError('Ed25519 seed must be 32 bytes');
  }
  const publicKey = await ed25519.getPublicKeyAsync(seed);
  return { algorithm: 'EdDSA', privateKey: seed, publicKey };
}

export interface SignOptions {
  /** Key identifier written to the protected header (label 4) */
  kid?: Uint8Array;
  /** Wrap the envelope in tag 18 (default true) */
  tagged?: boolean;
  /** Entries for the unprotected header */
  unprotected?: Array<[TypedValue, TypedValue]>;
}

async function signBytes(key: TestSigningKey, data: Uint8Array): Promise<Uint8Array> {
  if (key.algorithm === 'EdDSA') {
    return ed25519.signAsync(data, key.privateKey);
  }
  const signature =
    key.algorithm === 'PS256'
      ? nodeSign(DIGESTS.PS256, data, {
          key: key.privateKey,
          padding: constants.RSA_PKCS1_PSS_PADDING,
          saltLength: 32,
        })
      : nodeSign(DIGESTS[key.algorithm], data, { key: key.privateKey, dsaEncoding: 'ieee-p1363' });
  return new Uint8Array(signature);
}

/**
 * Build a signed COSE_Sign1 envelope around `payload`
 */
export async function signCoseSign1(
  payload: Uint8Array,
  key: TestSigningKey,
  options: SignOptions = {}
): Promise<Uint8Array> {
  const headers: Array<[TypedValue, TypedValue]> = [];
  if (options.kid) {
    headers.push([int(COSE.headers.keyId), bytes(options.kid)]);
  }
  headers.push([int(COSE.headers.algorithm), int(COSE_ALGORITHMS[key.algorithm])]);
  const protectedHeader = encode(map(headers));

  const signature = await signBytes(key, sigStructure({ protectedHeader, payload }));

  const envelope = array(
    bytes(protectedHeader),
    map(options.unprotected ?? []),
    bytes(payload),
    bytes(signature)
  );
  return encode(options.tagged === false ? envelope : tagged(COSE.sign1Tag, envelope));
}
