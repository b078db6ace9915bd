/**
 * dccscan kernel
 * Normative constants and errors shared by every dccscan package
 *
 * @packageDocumentation
 */

export type { ErrorDefinition, Stage } from './types.js';

export {
  PREFIX,
  BASE45_ALPHABET,
  CWT_CLAIMS,
  HCERT_DCC_V1,
  COSE,
  COSE_ALGORITHMS,
  LIMITS,
  coseAlgorithmName,
  type CoseAlgorithmName,
} from './constants.js';

export {
  ERROR_CODES,
  ERRORS,
  getError,
  isRecoverable,
  isDccError,
  DccError,
  FormatError,
  DecodeError,
  DecompressError,
  EnvelopeError,
  SchemaError,
  type ErrorCode,
  type FormatErrorCode,
  type DecodeErrorCode,
  type DecompressErrorCode,
  type EnvelopeErrorCode,
  type SchemaErrorCode,
  type SignatureErrorCode,
} from './errors.js';
