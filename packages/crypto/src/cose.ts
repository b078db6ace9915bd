/**
 * COSE_Sign1 envelope (RFC 9052 §4.2)
 *
 * The envelope is a four-element CBOR array, optionally wrapped in tag 18:
 *
 *   [ protected: bstr, unprotected: map, payload: bstr, signature: bstr ]
 *
 * Elements are decoded one at a time, so each one can be checked before
 * the next is read.
 */

import { COSE, DecodeError, EnvelopeError, LIMITS } from '@dccscan/kernel';
import {
  MAJOR,
  asBytes,
  asInteger,
  isKind,
  decode,
  decodeFirst,
  decodeHeader,
  encode,
  mapGet,
  type CborMap,
  type TypedValue,
  type TypedValueOf,
} from '@dccscan/cbor';

/**
 * Parsed COSE_Sign1 structure
 */
export interface CoseSign1 {
  /** Whether the envelope carried tag 18 */
  tagged: boolean;
  /** Serialized protected header, exactly as signed */
  protectedHeader: Uint8Array;
  /** Decoded protected header */
  protectedHeaderMap: CborMap;
  unprotectedHeader: CborMap;
  payload: Uint8Array;
  signature: Uint8Array;
  /** COSE algorithm identifier (label 1), if present */
  algorithm?: number;
  /** Key identifier (label 4), if present */
  keyId?: Uint8Array;
}

export interface ParseEnvelopeOptions {
  /** Maximum CBOR nesting depth (default 32) */
  maxDepth?: number;
}

const ELEMENTS = ['protected header', 'unprotected header', 'payload', 'signature'] as const;

function shapeError(message: string, details?: Record<string, unknown>): EnvelopeError {
  return new EnvelopeError('E_ENVELOPE_SHAPE', `Invalid COSE_Sign1 envelope: ${message}`, details);
}

/**
 * Parse COSE_Sign1 bytes
 *
 * Signature verification is separate, see `verifyCoseSign1`.
 */
export function parseCoseSign1(bytes: Uint8Array, options: ParseEnvelopeOptions = {}): CoseSign1 {
  const maxDepth = options.maxDepth ?? LIMITS.maxDepth;
  let offset = 0;
  let tagged = false;

  let head = decodeHeader(bytes, offset);
  if (head.major === MAJOR.tag) {
    if (head.argument === null) {
      throw new DecodeError(
        'E_CBOR_UNSUPPORTED',
        `CBOR item at offset ${offset}: major type 6 cannot be indefinite`,
        { offset }
      );
    }
    if (head.argument !== BigInt(COSE.sign1Tag)) {
      throw new EnvelopeError(
        'E_ENVELOPE_TAG',
        `Envelope tagged ${head.argument}, expected COSE_Sign1 tag ${COSE.sign1Tag}`,
        { tag: head.argument.toString() }
      );
    }
    tagged = true;
    offset += head.length;
    head = decodeHeader(bytes, offset);
  }

  if (head.major !== MAJOR.array) {
    throw shapeError(`expected an array, found major type ${head.major}`, { major: head.major });
  }
  if (head.argument !== null && head.argument !== BigInt(ELEMENTS.length)) {
    throw shapeError(`expected 4 elements, found ${head.argument}`, {
      count: Number(head.argument),
    });
  }
  offset += head.length;

  const elements: TypedValue[] = [];
  const indefinite = head.argument === null;
  while (indefinite ? bytes[offset] !== 0xff : elements.length < ELEMENTS.length) {
    if (elements.length === ELEMENTS.length) {
      throw shapeError('more than 4 elements', { count: elements.length + 1 });
    }
    // the envelope array itself uses one level of the depth budget
    const { value, consumed } = decodeFirst(bytes, offset, { maxDepth: maxDepth - 1 });
    elements.push(value);
    offset += consumed;
  }
  if (indefinite) {
    offset += 1;
  }

  if (offset !== bytes.length) {
    throw new DecodeError(
      'E_CBOR_TRAILING_BYTES',
      `${bytes.length - offset} trailing bytes after COSE_Sign1 envelope`,
      { offset }
    );
  }

  if (elements.length !== ELEMENTS.length) {
    throw shapeError(`expected 4 elements, found ${elements.length}`, { count: elements.length });
  }
  const [protectedValue, unprotectedValue, payloadValue, signatureValue] = elements;

  const protectedHeader = expectKind(protectedValue, 'bytes', 0);
  const unprotectedHeader = expectKind(unprotectedValue, 'map', 1);
  const payload = expectKind(payloadValue, 'bytes', 2);
  const signature = expectKind(signatureValue, 'bytes', 3);

  const protectedHeaderMap = decodeProtectedHeader(protectedHeader.value, maxDepth);

  const header = (label: number): TypedValue | undefined =>
    mapGet(protectedHeaderMap, label) ?? mapGet(unprotectedHeader, label);

  const algorithm = asInteger(header(COSE.headers.algorithm));

  return {
    tagged,
    protectedHeader: protectedHeader.value,
    protectedHeaderMap,
    unprotectedHeader,
    payload: payload.value,
    signature: signature.value,
    algorithm: algorithm === undefined ? undefined : Number(algorithm),
    keyId: asBytes(header(COSE.headers.keyId)),
  };
}

function expectKind<K extends 'bytes' | 'map'>(
  value: TypedValue | undefined,
  kind: K,
  index: number
): TypedValueOf<K> {
  const name = ELEMENTS[index] ?? `element ${index}`;
  if (value === undefined) {
    throw shapeError(`missing ${name}`, { element: index });
  }
  if (!isKind(value, kind)) {
    const expected = kind === 'bytes' ? 'byte string' : 'map';
    throw shapeError(`${name} must be a ${expected}, found ${value.kind}`, {
      element: index,
      kind: value.kind,
    });
  }
  return value;
}

function decodeProtectedHeader(bytes: Uint8Array, maxDepth: number): CborMap {
  if (bytes.length === 0) {
    return { kind: 'map', entries: [] };
  }
  const value = decode(bytes, { maxDepth });
  if (value.kind !== 'map') {
    throw new EnvelopeError(
      'E_ENVELOPE_HEADER',
      `Protected header must decode to a map, found ${value.kind}`,
      { kind: value.kind }
    );
  }
  return value;
}

/**
 * Sig_structure for COSE_Sign1: ["Signature1", protected, external_aad, payload]
 */
export function sigStructure(
  envelope: Pick<CoseSign1, 'protectedHeader' | 'payload'>,
  externalAad: Uint8Array = new Uint8Array(0)
): Uint8Array {
  return encode({
    kind: 'array',
    items: [
      { kind: 'text', value: COSE.sign1Context },
      { kind: 'bytes', value: envelope.protectedHeader },
      { kind: 'bytes', value: externalAad },
      { kind: 'bytes', value: envelope.payload },
    ],
  });
}
