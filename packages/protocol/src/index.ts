/**
 * dccscan protocol
 * Decode and verify EU Digital COVID Certificate QR payloads
 *
 * @packageDocumentation
 */

export { stripPrefix } from './prefix.js';
export { decodeCertificate, type DecodeOptions, type DecodedCertificate } from './decode.js';
export {
  verifyCertificate,
  type VerifyCertificateFailure,
  type VerifyCertificateResult,
  type VerifyCertificateSuccess,
} from './verify.js';
