/**
 * Tests for the CBOR encoder and TypedValue builders
 */

import { describe, it, expect } from 'vitest';
import { decode } from '../src/decoder.js';
import { encode } from '../src/encoder.js';
import { array, epochDate, fromJS, int, map, tagged, text, bytes, type JsValue } from '../src/builders.js';
import type { TypedValue } from '../src/types.js';

function hex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex');
}

describe('encode', () => {
  it('uses the shortest integer form', () => {
    expect(hex(encode(int(0)))).toBe('00');
    expect(hex(encode(int(23)))).toBe('17');
    expect(hex(encode(int(24)))).toBe('1818');
    expect(hex(encode(int(1000)))).toBe('1903e8');
    expect(hex(encode(int(1623661200)))).toBe('1a60c71a90');
    expect(hex(encode(int(1000000000000)))).toBe('1b000000e8d4a51000');
  });

  it('encodes negative integers', () => {
    expect(hex(encode(int(-1)))).toBe('20');
    expect(hex(encode(int(-260)))).toBe('390103');
  });

  it('encodes strings and containers', () => {
    expect(hex(encode(text('IE')))).toBe('624945');
    expect(hex(encode(bytes(new Uint8Array([1, 2]))))).toBe('420102');
    expect(hex(encode(map([[int(1), text('IE')]])))).toBe('a101624945');
    expect(hex(encode(tagged(18, array())))).toBe('d280');
  });

  it('encodes simple values and floats', () => {
    expect(hex(encode({ kind: 'boolean', value: true }))).toBe('f5');
    expect(hex(encode({ kind: 'null' }))).toBe('f6');
    expect(hex(encode({ kind: 'simple', value: 16 }))).toBe('f0');
    expect(hex(encode({ kind: 'simple', value: 255 }))).toBe('f8ff');
    expect(hex(encode({ kind: 'float', value: 100000, precision: 32 }))).toBe('fa47c35000');
    expect(hex(encode({ kind: 'float', value: 1.1, precision: 64 }))).toBe('fb3ff199999999999a');
  });

  it('refuses simple values that have no encoding of their own', () => {
    expect(hex(encode({ kind: 'simple', value: 19 }))).toBe('f3');
    expect(hex(encode({ kind: 'simple', value: 32 }))).toBe('f820');
    for (const value of [20, 23, 24, 31, 256, -1]) {
      expect(() => encode({ kind: 'simple', value })).toThrow(RangeError);
    }
  });

  it('decodes every simple value it encodes', () => {
    for (const value of [0, 19, 32, 255]) {
      expect(decode(encode({ kind: 'simple', value }))).toEqual({ kind: 'simple', value });
    }
  });

  it('grows its buffer for large items', () => {
    const payload = new Uint8Array(1000).fill(7);
    const encoded = encode(bytes(payload));
    expect(encoded.length).toBe(1003);
    expect(hex(encoded.subarray(0, 3))).toBe('5903e8');
  });
});

describe('round trips', () => {
  const cases: Array<[string, TypedValue]> = [
    ['empty map', map([])],
    ['nested array of three integers', array(array(int(1), int(2), int(3)))],
    ['tagged epoch date', epochDate(1623661200)],
    ['text-keyed map', map([[text('dn'), int(1)], [text('sd'), int(2)]])],
    ['negative map key', map([[int(-260), map([[int(1), map([])]])]])],
  ];

  for (const [name, value] of cases) {
    it(`reproduces ${name}`, () => {
      expect(decode(encode(value))).toEqual(value);
    });
  }

  it('re-encodes an indefinite text string of two chunks as one definite string', () => {
    const wire = new Uint8Array([0x7f, 0x62, 0x48, 0x43, 0x61, 0x31, 0xff]);
    const value = decode(wire);
    expect(value).toEqual(text('HC1'));
    expect(hex(encode(value))).toBe('63484331');
    expect(decode(encode(value))).toEqual(value);
  });
});

describe('fromJS', () => {
  it('maps plain data onto typed values', () => {
    expect(fromJS({ fn: 'Bloggs', dn: 1 })).toEqual(
      map([
        [text('fn'), text('Bloggs')],
        [text('dn'), int(1)],
      ])
    );
  });

  it('keeps Map key types', () => {
    expect(fromJS(new Map<JsValue, JsValue>([[1, 'IE'], [-260, null]]))).toEqual(
      map([
        [int(1), text('IE')],
        [int(-260), { kind: 'null' }],
      ])
    );
  });

  it('maps non-integral numbers to floats and dates to tag 1', () => {
    expect(fromJS(1.5)).toEqual({ kind: 'float', value: 1.5, precision: 64 });
    expect(fromJS(new Date('2021-06-14T09:00:00Z'))).toEqual(epochDate(1623661200));
  });

  it('rejects unsafe integers in int()', () => {
    expect(() => int(2 ** 60)).toThrow(RangeError);
  });
});
