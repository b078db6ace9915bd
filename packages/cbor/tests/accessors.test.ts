/**
 * Tests for variant-checked accessors and diagnostic notation
 */

import { describe, it, expect } from 'vitest';
import {
  asArray,
  asBytes,
  asDate,
  asInteger,
  asMap,
  asNumber,
  asText,
  getPath,
  isKind,
  mapGet,
} from '../src/accessors.js';
import { array, epochDate, fromJS, int, map, tagged, text, type JsValue } from '../src/builders.js';
import { decode } from '../src/decoder.js';
import { diagnose } from '../src/diagnostic.js';

const claims = fromJS(
  new Map<JsValue, JsValue>([
    [1, 'IE'],
    [4, 1623661200],
    [-260, new Map<JsValue, JsValue>([[1, { nam: { fn: 'Bloggs' }, v: [{ dn: 1 }] }]])],
  ])
);

describe('accessors', () => {
  it('narrows by kind', () => {
    expect(isKind(int(1), 'integer')).toBe(true);
    expect(isKind(int(1), 'text')).toBe(false);
    expect(isKind(undefined, 'text')).toBe(false);
  });

  it('returns undefined for other variants instead of coercing', () => {
    expect(asText(int(1))).toBeUndefined();
    expect(asInteger(text('1'))).toBeUndefined();
    expect(asMap(array())).toBeUndefined();
    expect(asArray(map([]))).toBeUndefined();
    expect(asBytes(text('x'))).toBeUndefined();
    expect(asDate(int(0))).toBeUndefined();
  });

  it('converts integers and finite floats to numbers', () => {
    expect(asNumber(int(2))).toBe(2);
    expect(asNumber({ kind: 'float', value: 1.0, precision: 16 })).toBe(1);
    expect(asNumber({ kind: 'float', value: NaN, precision: 16 })).toBeUndefined();
    expect(asNumber(int(2n ** 60n))).toBeUndefined();
    expect(asDate(epochDate(0))).toEqual(new Date(0));
  });

  it('looks up integer and text keys', () => {
    const root = asMap(claims);
    expect(asText(mapGet(root, 1))).toBe('IE');
    expect(asInteger(mapGet(root, 4))).toBe(1623661200n);
    expect(mapGet(root, '1')).toBeUndefined();
    expect(mapGet(undefined, 1)).toBeUndefined();
  });

  it('follows paths through maps and arrays', () => {
    expect(asText(getPath(claims, [-260, 1, 'nam', 'fn']))).toBe('Bloggs');
    expect(asNumber(getPath(claims, [-260, 1, 'v', 0, 'dn']))).toBe(1);
    expect(getPath(claims, [-260, 1, 'v', 3])).toBeUndefined();
    expect(getPath(claims, [1, 'x'])).toBeUndefined();
  });
});

describe('diagnose', () => {
  it('renders a COSE protected header', () => {
    const header = decode(Buffer.from('a20448065178b6cf2835c80126', 'hex'));
    expect(diagnose(header)).toBe("{4: h'065178b6cf2835c8', 1: -7}");
  });

  it('renders tags, dates and simple values', () => {
    expect(diagnose(tagged(18, array(int(1), text('a'))))).toBe('18([1, "a"])');
    expect(diagnose(epochDate(1623661200))).toBe('1(1623661200)');
    expect(diagnose(fromJS([true, null, undefined]))).toBe('[true, null, undefined]');
    expect(diagnose({ kind: 'simple', value: 16 })).toBe('simple(16)');
  });

  it('renders floats with a fractional part', () => {
    expect(diagnose({ kind: 'float', value: 1, precision: 16 })).toBe('1.0');
    expect(diagnose({ kind: 'float', value: 1.5, precision: 64 })).toBe('1.5');
    expect(diagnose({ kind: 'float', value: -Infinity, precision: 16 })).toBe('-Infinity');
    expect(diagnose({ kind: 'float', value: NaN, precision: 16 })).toBe('NaN');
  });
});
