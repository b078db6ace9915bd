/**
 * Typed CBOR value model
 *
 * Every decoded item is a node of the `TypedValue` union. Callers narrow on
 * `kind` (or use the accessors in ./accessors) instead of duck-typing
 * decoded values.
 */

export interface CborInteger {
  kind: 'integer';
  value: bigint;
}

export interface CborBytes {
  kind: 'bytes';
  value: Uint8Array;
}

export interface CborText {
  kind: 'text';
  value: string;
}

export interface CborArray {
  kind: 'array';
  items: TypedValue[];
}

/**
 * Map entries keep wire order; duplicate keys are preserved
 */
export interface CborMap {
  kind: 'map';
  entries: Array<[TypedValue, TypedValue]>;
}

/**
 * Tag 0 (RFC 3339 text) or tag 1 (epoch seconds) materialised as a Date
 */
export interface CborDate {
  kind: 'date';
  tag: 0 | 1;
  value: Date;
  /** The wrapped item as it appeared on the wire */
  source: TypedValue;
}

/**
 * Any other tag
 */
export interface CborTagged {
  kind: 'tagged';
  tag: number;
  value: TypedValue;
}

export interface CborFloat {
  kind: 'float';
  value: number;
  /** Wire width in bits */
  precision: 16 | 32 | 64;
}

export interface CborBoolean {
  kind: 'boolean';
  value: boolean;
}

export interface CborNull {
  kind: 'null';
}

export interface CborUndefined {
  kind: 'undefined';
}

/**
 * Unassigned simple value (major type 7)
 */
export interface CborSimple {
  kind: 'simple';
  value: number;
}

export type TypedValue =
  | CborInteger
  | CborBytes
  | CborText
  | CborArray
  | CborMap
  | CborDate
  | CborTagged
  | CborFloat
  | CborBoolean
  | CborNull
  | CborUndefined
  | CborSimple;

export type TypedValueKind = TypedValue['kind'];

/**
 * Narrow a TypedValue to one variant
 */
export type TypedValueOf<K extends TypedValueKind> = Extract<TypedValue, { kind: K }>;

/**
 * CBOR major types (RFC 8949 §3.1)
 */
export const MAJOR = {
  unsigned: 0,
  negative: 1,
  bytes: 2,
  text: 3,
  array: 4,
  map: 5,
  tag: 6,
  simple: 7,
} as const;

/**
 * Additional-info values with special meaning
 */
export const INFO = {
  uint8: 24,
  uint16: 25,
  uint32: 26,
  uint64: 27,
  indefinite: 31,
} as const;

export const BREAK_BYTE = 0xff;
