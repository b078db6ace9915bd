/**
 * TypedValue constructors
 */

import type {
  CborArray,
  CborBytes,
  CborDate,
  CborInteger,
  CborMap,
  CborTagged,
  CborText,
  TypedValue,
} from './types.js';

/**
 * Plain JavaScript data accepted by `fromJS`
 *
 * Objects become text-keyed maps; `Map` instances keep their key types.
 */
export type JsValue =
  | number
  | bigint
  | string
  | boolean
  | null
  | undefined
  | Uint8Array
  | Date
  | JsValue[]
  | Map<JsValue, JsValue>
  | { [key: string]: JsValue };

export function int(value: number | bigint): CborInteger {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`);
  }
  return { kind: 'integer', value: BigInt(value) };
}

export function text(value: string): CborText {
  return { kind: 'text', value };
}

export function bytes(value: Uint8Array): CborBytes {
  return { kind: 'bytes', value };
}

export function array(...items: TypedValue[]): CborArray {
  return { kind: 'array', items };
}

export function map(entries: Array<[TypedValue, TypedValue]>): CborMap {
  return { kind: 'map', entries };
}

export function tagged(tag: number, value: TypedValue): CborTagged {
  return { kind: 'tagged', tag, value };
}

/**
 * Tag 1 date from epoch seconds
 */
export function epochDate(seconds: number): CborDate {
  const source: TypedValue = Number.isInteger(seconds)
    ? int(seconds)
    : { kind: 'float', value: seconds, precision: 64 };
  return { kind: 'date', tag: 1, value: new Date(seconds * 1000), source };
}

/**
 * Build a TypedValue tree from plain data
 *
 * Integral numbers become integers, other numbers 64-bit floats and
 * Dates tag 1 epoch dates.
 */
export function fromJS(value: JsValue): TypedValue {
  if (value === null) return { kind: 'null' };
  if (value === undefined) return { kind: 'undefined' };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (typeof value === 'string') return text(value);
  if (typeof value === 'bigint') return int(value);
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? int(value) : { kind: 'float', value, precision: 64 };
  }
  if (value instanceof Uint8Array) return bytes(value);
  if (value instanceof Date) return epochDate(value.getTime() / 1000);
  if (Array.isArray(value)) return array(...value.map(fromJS));
  if (value instanceof Map) {
    return map(Array.from(value, ([k, v]): [TypedValue, TypedValue] => [fromJS(k), fromJS(v)]));
  }
  return map(Object.entries(value).map(([k, v]): [TypedValue, TypedValue] => [text(k), fromJS(v)]));
}
