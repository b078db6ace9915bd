/**
 * Certificate signature check against a caller-supplied key
 *
 * Finding the key (trust lists, CSCA chains) is not part of this.
 */

import { isDccError, type CoseAlgorithmName, type ErrorCode } from '@dccscan/kernel';
import { verifyCoseSign1, type VerificationKey } from '@dccscan/crypto';
import { decodeCertificate, type DecodeOptions, type DecodedCertificate } from './decode.js';

/**
 * Result of successful verification
 */
export interface VerifyCertificateSuccess {
  valid: true;
  algorithm: CoseAlgorithmName;
  /** Key ID from the envelope headers, hex encoded */
  kid?: string;
  certificate: DecodedCertificate;
}

/**
 * Result of failed verification
 *
 * `code` is a kernel error code: a decode failure (E_MISSING_PREFIX,
 * E_DECOMPRESS_FAILED, ...) or a signature failure (E_INVALID_SIGNATURE,
 * ...). E_INTERNAL marks an unexpected error.
 */
export interface VerifyCertificateFailure {
  valid: false;
  code: ErrorCode | 'E_INTERNAL';
  message: string;
  kid?: string;
}

export type VerifyCertificateResult = VerifyCertificateSuccess | VerifyCertificateFailure;

/**
 * Decode a QR payload and check its signature
 *
 * Never throws: decode and signature failures come back as results.
 *
 * @example
 * ```typescript
 * const result = await verifyCertificate(token, signerCertificatePem);
 * if (result.valid) {
 *   console.log('Signed with', result.algorithm, 'key', result.kid);
 * } else {
 *   console.error('Verification failed:', result.code, result.message);
 * }
 * ```
 */
export async function verifyCertificate(
  token: string,
  key: VerificationKey,
  options: DecodeOptions = {}
): Promise<VerifyCertificateResult> {
  let certificate: DecodedCertificate;
  try {
    certificate = decodeCertificate(token, options);
  } catch (err) {
    if (isDccError(err)) {
      return { valid: false, code: err.code, message: err.message };
    }
    return {
      valid: false,
      code: 'E_INTERNAL',
      message: err instanceof Error ? err.message : String(err),
    };
  }

  const result = await verifyCoseSign1(certificate.envelope, key);
  options.logger?.debug(
    { stage: 'signature', valid: result.valid, kid: result.kid },
    result.valid ? 'signature verified' : result.message
  );

  return result.valid ? { ...result, certificate } : result;
}
