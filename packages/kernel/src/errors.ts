/**
 * dccscan error codes and typed errors
 *
 * Stages up to and including CBOR decoding fail fast with one of the
 * error classes below. Field mapping reports SchemaError values per field
 * instead of throwing them.
 */

import type { ErrorDefinition, Stage } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_MISSING_PREFIX: 'E_MISSING_PREFIX',
  E_UNSUPPORTED_VERSION: 'E_UNSUPPORTED_VERSION',
  E_BASE45_ALPHABET: 'E_BASE45_ALPHABET',
  E_BASE45_LENGTH: 'E_BASE45_LENGTH',
  E_BASE45_OVERFLOW: 'E_BASE45_OVERFLOW',
  E_DECOMPRESS_FAILED: 'E_DECOMPRESS_FAILED',
  E_DECOMPRESS_LIMIT: 'E_DECOMPRESS_LIMIT',
  E_ENVELOPE_TAG: 'E_ENVELOPE_TAG',
  E_ENVELOPE_SHAPE: 'E_ENVELOPE_SHAPE',
  E_ENVELOPE_HEADER: 'E_ENVELOPE_HEADER',
  E_CBOR_TRUNCATED: 'E_CBOR_TRUNCATED',
  E_CBOR_UNSUPPORTED: 'E_CBOR_UNSUPPORTED',
  E_CBOR_UNEXPECTED_BREAK: 'E_CBOR_UNEXPECTED_BREAK',
  E_CBOR_INVALID_CHUNK: 'E_CBOR_INVALID_CHUNK',
  E_CBOR_INVALID_UTF8: 'E_CBOR_INVALID_UTF8',
  E_CBOR_INVALID_DATE: 'E_CBOR_INVALID_DATE',
  E_CBOR_DEPTH: 'E_CBOR_DEPTH',
  E_CBOR_TRAILING_BYTES: 'E_CBOR_TRAILING_BYTES',
  E_FIELD_MISSING: 'E_FIELD_MISSING',
  E_FIELD_TYPE: 'E_FIELD_TYPE',
  E_FIELD_FORMAT: 'E_FIELD_FORMAT',
  E_UNSUPPORTED_ALGORITHM: 'E_UNSUPPORTED_ALGORITHM',
  E_INVALID_KEY: 'E_INVALID_KEY',
  E_INVALID_SIGNATURE: 'E_INVALID_SIGNATURE',
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

function def(
  code: ErrorCode,
  stage: Stage,
  title: string,
  description: string,
  recoverable = false
): ErrorDefinition {
  return { code, title, description, stage, recoverable };
}

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_MISSING_PREFIX: def(
    'E_MISSING_PREFIX',
    'prefix',
    'Missing Prefix',
    'Payload does not start with a scheme marker such as HC1:'
  ),
  E_UNSUPPORTED_VERSION: def(
    'E_UNSUPPORTED_VERSION',
    'prefix',
    'Unsupported Version',
    'Payload carries a scheme marker other than HC1:'
  ),
  E_BASE45_ALPHABET: def(
    'E_BASE45_ALPHABET',
    'base45',
    'Invalid Base45 Character',
    'Payload contains a character outside the Base45 alphabet'
  ),
  E_BASE45_LENGTH: def(
    'E_BASE45_LENGTH',
    'base45',
    'Invalid Base45 Length',
    'A single Base45 character remains after the last full group'
  ),
  E_BASE45_OVERFLOW: def(
    'E_BASE45_OVERFLOW',
    'base45',
    'Base45 Group Overflow',
    'A Base45 group encodes a value larger than its byte width allows'
  ),
  E_DECOMPRESS_FAILED: def(
    'E_DECOMPRESS_FAILED',
    'decompress',
    'Corrupt Compressed Stream',
    'The zlib stream is malformed or its checksum does not match'
  ),
  E_DECOMPRESS_LIMIT: def(
    'E_DECOMPRESS_LIMIT',
    'decompress',
    'Inflated Size Limit',
    'The zlib stream inflates past the configured size limit'
  ),
  E_ENVELOPE_TAG: def(
    'E_ENVELOPE_TAG',
    'envelope',
    'Unexpected Envelope Tag',
    'The envelope is tagged with something other than COSE_Sign1'
  ),
  E_ENVELOPE_SHAPE: def(
    'E_ENVELOPE_SHAPE',
    'envelope',
    'Invalid Envelope Shape',
    'The envelope is not an array of four correctly typed elements'
  ),
  E_ENVELOPE_HEADER: def(
    'E_ENVELOPE_HEADER',
    'envelope',
    'Invalid Envelope Header',
    'The protected header does not decode to a map'
  ),
  E_CBOR_TRUNCATED: def(
    'E_CBOR_TRUNCATED',
    'cbor',
    'Truncated CBOR',
    'A declared length or argument runs past the end of the input'
  ),
  E_CBOR_UNSUPPORTED: def(
    'E_CBOR_UNSUPPORTED',
    'cbor',
    'Unsupported CBOR Item',
    'The header byte combines a major type and additional info that is not allowed'
  ),
  E_CBOR_UNEXPECTED_BREAK: def(
    'E_CBOR_UNEXPECTED_BREAK',
    'cbor',
    'Unexpected Break',
    'A break marker appears outside an indefinite-length item'
  ),
  E_CBOR_INVALID_CHUNK: def(
    'E_CBOR_INVALID_CHUNK',
    'cbor',
    'Invalid String Chunk',
    'An indefinite-length string contains a chunk of another type'
  ),
  E_CBOR_INVALID_UTF8: def(
    'E_CBOR_INVALID_UTF8',
    'cbor',
    'Invalid UTF-8',
    'A text string is not valid UTF-8'
  ),
  E_CBOR_INVALID_DATE: def(
    'E_CBOR_INVALID_DATE',
    'cbor',
    'Invalid Date',
    'A tag 0 or tag 1 item does not wrap a valid date or epoch'
  ),
  E_CBOR_DEPTH: def(
    'E_CBOR_DEPTH',
    'cbor',
    'Nesting Too Deep',
    'The item nests deeper than the configured limit'
  ),
  E_CBOR_TRAILING_BYTES: def(
    'E_CBOR_TRAILING_BYTES',
    'cbor',
    'Trailing Bytes',
    'Bytes remain after the top-level item'
  ),
  E_FIELD_MISSING: def(
    'E_FIELD_MISSING',
    'schema',
    'Missing Field',
    'An expected certificate field is absent',
    true
  ),
  E_FIELD_TYPE: def(
    'E_FIELD_TYPE',
    'schema',
    'Wrong Field Type',
    'A certificate field holds a value of an unexpected type',
    true
  ),
  E_FIELD_FORMAT: def(
    'E_FIELD_FORMAT',
    'schema',
    'Malformed Field',
    'A certificate field does not match its expected format',
    true
  ),
  E_UNSUPPORTED_ALGORITHM: def(
    'E_UNSUPPORTED_ALGORITHM',
    'signature',
    'Unsupported Algorithm',
    'The envelope names no COSE algorithm, or one that cannot be verified'
  ),
  E_INVALID_KEY: def(
    'E_INVALID_KEY',
    'signature',
    'Invalid Key',
    'The verification key is unreadable or does not suit the algorithm'
  ),
  E_INVALID_SIGNATURE: def(
    'E_INVALID_SIGNATURE',
    'signature',
    'Invalid Signature',
    'The signature is malformed or does not match the signed content'
  ),
};

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if an error only degrades a single field
 */
export function isRecoverable(code: string): boolean {
  return getError(code)?.recoverable ?? false;
}

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_CODES, code);
}

/**
 * Base class for every error raised by the decode pipeline
 *
 * Use `err.code` to branch on the failure without parsing messages.
 */
export class DccError extends Error {
  readonly code: ErrorCode;
  readonly stage: Stage;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DccError';
    this.code = code;
    this.stage = ERRORS[code].stage;
    this.details = details;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FormatErrorCode = 'E_MISSING_PREFIX' | 'E_UNSUPPORTED_VERSION';

/**
 * Bad or unsupported scheme prefix
 */
export class FormatError extends DccError {
  constructor(code: FormatErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FormatError';
  }
}

export type DecodeErrorCode =
  | 'E_BASE45_ALPHABET'
  | 'E_BASE45_LENGTH'
  | 'E_BASE45_OVERFLOW'
  | 'E_CBOR_TRUNCATED'
  | 'E_CBOR_UNSUPPORTED'
  | 'E_CBOR_UNEXPECTED_BREAK'
  | 'E_CBOR_INVALID_CHUNK'
  | 'E_CBOR_INVALID_UTF8'
  | 'E_CBOR_INVALID_DATE'
  | 'E_CBOR_DEPTH'
  | 'E_CBOR_TRAILING_BYTES';

/**
 * Base45 or CBOR decode failure
 */
export class DecodeError extends DccError {
  constructor(code: DecodeErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DecodeError';
  }
}

export type DecompressErrorCode = 'E_DECOMPRESS_FAILED' | 'E_DECOMPRESS_LIMIT';

/**
 * Corrupt or oversized zlib stream
 */
export class DecompressError extends DccError {
  constructor(code: DecompressErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DecompressError';
  }
}

export type EnvelopeErrorCode = 'E_ENVELOPE_TAG' | 'E_ENVELOPE_SHAPE' | 'E_ENVELOPE_HEADER';

/**
 * COSE_Sign1 envelope with the wrong shape
 */
export class EnvelopeError extends DccError {
  constructor(code: EnvelopeErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'EnvelopeError';
  }
}

export type SchemaErrorCode = 'E_FIELD_MISSING' | 'E_FIELD_TYPE' | 'E_FIELD_FORMAT';

/**
 * Missing or mismatched certificate field
 *
 * Recoverable: the field mapper records these instead of throwing.
 * `pointer` is a JSON Pointer into the CWT claims, e.g. `/-260/1/nam/fn`.
 */
export class SchemaError extends DccError {
  readonly pointer: string;

  constructor(code: SchemaErrorCode, pointer: string, message: string) {
    super(code, message, { pointer });
    this.name = 'SchemaError';
    this.pointer = pointer;
  }
}

/**
 * Signature check failures
 *
 * Reported in verification results, never thrown.
 */
export type SignatureErrorCode = 'E_UNSUPPORTED_ALGORITHM' | 'E_INVALID_KEY' | 'E_INVALID_SIGNATURE';

/**
 * Structural check for DccError
 * Works across module boundaries where instanceof may not (duplicate packages)
 */
export function isDccError(err: unknown): err is DccError {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    typeof err.code === 'string' &&
    isErrorCode(err.code) &&
    'stage' in err &&
    typeof err.stage === 'string' &&
    'message' in err &&
    typeof err.message === 'string'
  );
}
