/**
 * Tests for COSE_Sign1 envelope parsing
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { DecodeError, EnvelopeError } from '@dccscan/kernel';
import { array, bytes, encode, int, map, tagged, text } from '@dccscan/cbor';
import { parseCoseSign1, sigStructure } from '../src/cose.js';
import { hexToBytes } from '../src/hash.js';
import { generateTestKey, signCoseSign1, type TestSigningKey } from '../src/testkit.js';

function envelopeError(fn: () => unknown): EnvelopeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EnvelopeError) return err;
    throw err;
  }
  throw new Error('expected an EnvelopeError');
}

const payload = encode(map([[int(1), text('XX')]]));
const kid = hexToBytes('0102030405060708');

describe('parseCoseSign1', () => {
  let key: TestSigningKey;

  beforeAll(async () => {
    key = await generateTestKey('ES256');
  });

  it('parses a tagged envelope', async () => {
    const envelope = parseCoseSign1(await signCoseSign1(payload, key, { kid }));

    expect(envelope.tagged).toBe(true);
    expect(envelope.algorithm).toBe(-7);
    expect(envelope.keyId).toEqual(kid);
    expect(envelope.payload).toEqual(payload);
    expect(envelope.signature).toHaveLength(64);
    expect(envelope.unprotectedHeader).toEqual({ kind: 'map', entries: [] });
  });

  it('keeps the protected header bytes exactly as signed', async () => {
    const envelope = parseCoseSign1(await signCoseSign1(payload, key, { kid }));
    expect(envelope.protectedHeader).toEqual(hexToBytes('a204480102030405060708' + '0126'));
    expect(envelope.protectedHeaderMap.entries).toHaveLength(2);
  });

  it('accepts an untagged envelope', async () => {
    const envelope = parseCoseSign1(await signCoseSign1(payload, key, { tagged: false }));
    expect(envelope.tagged).toBe(false);
    expect(envelope.keyId).toBeUndefined();
  });

  it('reads headers from the unprotected map when absent from the protected one', () => {
    const raw = encode(
      array(
        bytes(new Uint8Array(0)),
        map([
          [int(1), int(-8)],
          [int(4), bytes(kid)],
        ]),
        bytes(payload),
        bytes(new Uint8Array(64))
      )
    );
    const envelope = parseCoseSign1(raw);
    expect(envelope.protectedHeaderMap).toEqual({ kind: 'map', entries: [] });
    expect(envelope.algorithm).toBe(-8);
    expect(envelope.keyId).toEqual(kid);
  });

  it('accepts an indefinite-length envelope array', () => {
    const envelope = parseCoseSign1(new Uint8Array([0x9f, 0x40, 0xa0, 0x41, 0x07, 0x40, 0xff]));
    expect(envelope.payload).toEqual(new Uint8Array([0x07]));
    expect(envelope.signature).toEqual(new Uint8Array(0));
    expect(envelope.algorithm).toBeUndefined();
  });

  it('rejects a tag other than COSE_Sign1', () => {
    const raw = encode(tagged(98, array(bytes(new Uint8Array(0)), map([]), bytes(payload))));
    const err = envelopeError(() => parseCoseSign1(raw));
    expect(err.code).toBe('E_ENVELOPE_TAG');
    expect(err.stage).toBe('envelope');
    expect(err.details).toEqual({ tag: '98' });
  });

  it('rejects an array with the wrong number of elements', () => {
    const raw = encode(array(bytes(new Uint8Array(0)), map([]), bytes(payload)));
    const err = envelopeError(() => parseCoseSign1(raw));
    expect(err.code).toBe('E_ENVELOPE_SHAPE');
    expect(err.details).toEqual({ count: 3 });
  });

  it('rejects a non-array envelope', () => {
    const err = envelopeError(() => parseCoseSign1(encode(map([]))));
    expect(err.code).toBe('E_ENVELOPE_SHAPE');
    expect(err.details).toEqual({ major: 5 });
  });

  it('names the element of the wrong kind', () => {
    const raw = encode(
      array(bytes(new Uint8Array(0)), bytes(new Uint8Array(0)), bytes(payload), bytes(new Uint8Array(0)))
    );
    const err = envelopeError(() => parseCoseSign1(raw));
    expect(err.code).toBe('E_ENVELOPE_SHAPE');
    expect(err.message).toBe(
      'Invalid COSE_Sign1 envelope: unprotected header must be a map, found bytes'
    );
    expect(err.details).toEqual({ element: 1, kind: 'bytes' });
  });

  it('rejects a protected header that is not a map', () => {
    const raw = encode(
      array(bytes(encode(array(int(1)))), map([]), bytes(payload), bytes(new Uint8Array(0)))
    );
    const err = envelopeError(() => parseCoseSign1(raw));
    expect(err.code).toBe('E_ENVELOPE_HEADER');
    expect(err.details).toEqual({ kind: 'array' });
  });

  it('treats an indefinite-length tag as unsupported CBOR', () => {
    try {
      parseCoseSign1(new Uint8Array([0xdf, 0x84]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toHaveProperty('code', 'E_CBOR_UNSUPPORTED');
      expect(err).toHaveProperty('details', { offset: 0 });
    }
  });

  it('propagates CBOR errors from a truncated envelope', async () => {
    const raw = await signCoseSign1(payload, key);
    expect(() => parseCoseSign1(raw.slice(0, raw.length - 1))).toThrow(DecodeError);
  });

  it('rejects bytes after the envelope', async () => {
    const raw = await signCoseSign1(payload, key);
    const padded = new Uint8Array(raw.length + 1);
    padded.set(raw);
    try {
      parseCoseSign1(padded);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toHaveProperty('code', 'E_CBOR_TRAILING_BYTES');
    }
  });
});

describe('sigStructure', () => {
  it('encodes ["Signature1", protected, external_aad, payload]', () => {
    const structure = sigStructure({
      protectedHeader: hexToBytes('a10126'),
      payload: new Uint8Array([0x01]),
    });
    expect(structure).toEqual(hexToBytes('846a5369676e61747572653143a10126404101'));
  });

  it('includes external AAD when given', () => {
    const structure = sigStructure(
      { protectedHeader: new Uint8Array(0), payload: new Uint8Array(0) },
      new Uint8Array([0xaa])
    );
    expect(structure).toEqual(hexToBytes('846a5369676e61747572653140' + '41aa' + '40'));
  });
});
