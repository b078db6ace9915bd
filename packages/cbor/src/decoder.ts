/**
 * CBOR decoder (RFC 8949)
 *
 * Decodes one self-describing item into a `TypedValue` tree. Decoding is
 * incremental: `decodeFirst` reports how many bytes the item used, so a
 * caller can walk a buffer holding several items of unknown length.
 *
 * Nesting is bounded by `maxDepth`; indefinite-length items cannot recurse
 * past it.
 */

import { DecodeError, LIMITS, type DecodeErrorCode } from '@dccscan/kernel';
import { BREAK_BYTE, INFO, MAJOR, type CborMap, type TypedValue } from './types.js';

export interface DecodeOptions {
  /** Maximum nesting depth (default 32) */
  maxDepth?: number;
}

export interface DecodeResult {
  value: TypedValue;
  /** Bytes used by the item, counted from the start offset */
  consumed: number;
}

const BREAK: unique symbol = Symbol('break');
type Break = typeof BREAK;

const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode the first item in `bytes`, starting at `offset`
 *
 * Bytes after the item are left alone; `consumed` says where it ended.
 */
export function decodeFirst(
  bytes: Uint8Array,
  offset = 0,
  options: DecodeOptions = {}
): DecodeResult {
  const reader = new Reader(bytes, offset, options.maxDepth ?? LIMITS.maxDepth);
  const value = reader.readItem(0);
  return { value, consumed: reader.position - offset };
}

/**
 * Decode a buffer holding exactly one item
 */
export function decode(bytes: Uint8Array, options: DecodeOptions = {}): TypedValue {
  const { value, consumed } = decodeFirst(bytes, 0, options);
  if (consumed !== bytes.length) {
    throw new DecodeError(
      'E_CBOR_TRAILING_BYTES',
      `${bytes.length - consumed} trailing bytes after CBOR item at offset ${consumed}`,
      { offset: consumed }
    );
  }
  return value;
}

export interface ItemHeader {
  major: number;
  /** Length, count, tag number or value; null for indefinite-length items */
  argument: bigint | null;
  /** Bytes used by the header itself */
  length: number;
}

/**
 * Read only the header of the item at `offset`
 *
 * Lets a caller check the shape of a container before decoding its
 * elements one by one with `decodeFirst`.
 */
export function decodeHeader(bytes: Uint8Array, offset = 0): ItemHeader {
  const reader = new Reader(bytes, offset, LIMITS.maxDepth);
  const { major, argument } = reader.readHeader();
  return { major, argument, length: reader.position - offset };
}

class Reader {
  private pos: number;
  private readonly view: DataView;

  constructor(
    private readonly bytes: Uint8Array,
    offset: number,
    private readonly maxDepth: number
  ) {
    if (!Number.isInteger(offset) || offset < 0 || offset > bytes.length) {
      throw new RangeError(`offset ${offset} is outside the buffer`);
    }
    this.pos = offset;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  readHeader(): { major: number; argument: bigint | null } {
    const start = this.pos;
    const initial = this.readUint8();
    const major = initial >> 5;
    const info = initial & 0x1f;
    if (info === INFO.indefinite) {
      return { major, argument: null };
    }
    if (info > INFO.uint64) {
      throw this.fail('E_CBOR_UNSUPPORTED', `reserved additional info ${info}`, start);
    }
    return { major, argument: this.readArgument(info) };
  }

  readItem(depth: number): TypedValue {
    const start = this.pos;
    const item = this.readItemOrBreak(depth);
    if (item === BREAK) {
      throw this.fail('E_CBOR_UNEXPECTED_BREAK', 'break marker outside an indefinite-length item', start);
    }
    return item;
  }

  private readItemOrBreak(depth: number): TypedValue | Break {
    const start = this.pos;
    const initial = this.readUint8();
    if (depth > this.maxDepth && initial !== BREAK_BYTE) {
      throw this.fail('E_CBOR_DEPTH', `nesting exceeds depth limit ${this.maxDepth}`, start);
    }

    const major = initial >> 5;
    const info = initial & 0x1f;

    if (info === INFO.indefinite) {
      return this.readIndefinite(major, depth, start);
    }
    if (info > INFO.uint64) {
      throw this.fail('E_CBOR_UNSUPPORTED', `reserved additional info ${info}`, start);
    }
    if (major === MAJOR.simple) {
      return this.readSimple(info, start);
    }

    const arg = this.readArgument(info);

    switch (major) {
      case MAJOR.unsigned:
        return { kind: 'integer', value: arg };
      case MAJOR.negative:
        return { kind: 'integer', value: -1n - arg };
      case MAJOR.bytes:
        return { kind: 'bytes', value: this.readBytes(this.toLength(arg, start)) };
      case MAJOR.text:
        return { kind: 'text', value: this.readText(this.toLength(arg, start), start) };
      case MAJOR.array: {
        const count = this.toCount(arg, 1, start);
        const items: TypedValue[] = [];
        for (let i = 0; i < count; i++) {
          items.push(this.readItem(depth + 1));
        }
        return { kind: 'array', items };
      }
      case MAJOR.map: {
        const count = this.toCount(arg, 2, start);
        const entries: CborMap['entries'] = [];
        for (let i = 0; i < count; i++) {
          const key = this.readItem(depth + 1);
          entries.push([key, this.readItem(depth + 1)]);
        }
        return { kind: 'map', entries };
      }
      default:
        return this.readTag(arg, depth, start);
    }
  }

  private readIndefinite(major: number, depth: number, start: number): TypedValue | Break {
    switch (major) {
      case MAJOR.bytes:
        return { kind: 'bytes', value: concat(this.readChunks(major)) };
      case MAJOR.text:
        return {
          kind: 'text',
          value: this.readChunks(major)
            .map((chunk) => this.decodeUtf8(chunk, start))
            .join(''),
        };
      case MAJOR.array: {
        const items: TypedValue[] = [];
        for (;;) {
          const item = this.readItemOrBreak(depth + 1);
          if (item === BREAK) break;
          items.push(item);
        }
        return { kind: 'array', items };
      }
      case MAJOR.map: {
        const entries: CborMap['entries'] = [];
        for (;;) {
          const key = this.readItemOrBreak(depth + 1);
          if (key === BREAK) break;
          entries.push([key, this.readItem(depth + 1)]);
        }
        return { kind: 'map', entries };
      }
      case MAJOR.simple:
        return BREAK;
      default:
        throw this.fail('E_CBOR_UNSUPPORTED', `major type ${major} cannot be indefinite`, start);
    }
  }

  /**
   * Read definite-length chunks of an indefinite string up to the break
   */
  private readChunks(major: number): Uint8Array[] {
    const chunks: Uint8Array[] = [];
    for (;;) {
      const start = this.pos;
      const initial = this.readUint8();
      if (initial === BREAK_BYTE) {
        return chunks;
      }
      const info = initial & 0x1f;
      if (initial >> 5 !== major || info === INFO.indefinite) {
        throw this.fail(
          'E_CBOR_INVALID_CHUNK',
          `indefinite string chunk must be a definite string of major type ${major}`,
          start
        );
      }
      if (info > INFO.uint64) {
        throw this.fail('E_CBOR_UNSUPPORTED', `reserved additional info ${info}`, start);
      }
      chunks.push(this.readBytes(this.toLength(this.readArgument(info), start)));
    }
  }

  private readSimple(info: number, start: number): TypedValue {
    switch (info) {
      case 20:
        return { kind: 'boolean', value: false };
      case 21:
        return { kind: 'boolean', value: true };
      case 22:
        return { kind: 'null' };
      case 23:
        return { kind: 'undefined' };
      case INFO.uint8: {
        const value = this.readUint8();
        if (value < 32) {
          throw this.fail('E_CBOR_UNSUPPORTED', `simple value ${value} must use the short form`, start);
        }
        return { kind: 'simple', value };
      }
      case INFO.uint16: {
        this.need(2, start);
        const value = decodeHalf(this.view.getUint16(this.pos));
        this.pos += 2;
        return { kind: 'float', value, precision: 16 };
      }
      case INFO.uint32: {
        this.need(4, start);
        const value = this.view.getFloat32(this.pos);
        this.pos += 4;
        return { kind: 'float', value, precision: 32 };
      }
      case INFO.uint64: {
        this.need(8, start);
        const value = this.view.getFloat64(this.pos);
        this.pos += 8;
        return { kind: 'float', value, precision: 64 };
      }
      default:
        return { kind: 'simple', value: info };
    }
  }

  private readTag(arg: bigint, depth: number, start: number): TypedValue {
    if (arg > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw this.fail('E_CBOR_UNSUPPORTED', `tag number ${arg} is too large`, start);
    }
    const tag = Number(arg);
    const inner = this.readItem(depth + 1);

    if (tag === 0) {
      if (inner.kind !== 'text' || !RFC3339.test(inner.value)) {
        throw this.fail('E_CBOR_INVALID_DATE', 'tag 0 must wrap an RFC 3339 date/time string', start);
      }
      return { kind: 'date', tag: 0, value: this.toDate(Date.parse(inner.value), start), source: inner };
    }
    if (tag === 1) {
      let seconds: number;
      if (inner.kind === 'integer') {
        seconds = Number(inner.value);
      } else if (inner.kind === 'float') {
        seconds = inner.value;
      } else {
        throw this.fail('E_CBOR_INVALID_DATE', 'tag 1 must wrap an integer or float epoch', start);
      }
      return { kind: 'date', tag: 1, value: this.toDate(seconds * 1000, start), source: inner };
    }
    return { kind: 'tagged', tag, value: inner };
  }

  private toDate(millis: number, start: number): Date {
    const date = new Date(millis);
    if (Number.isNaN(date.getTime())) {
      throw this.fail('E_CBOR_INVALID_DATE', 'date is out of range', start);
    }
    return date;
  }

  private readArgument(info: number): bigint {
    if (info < INFO.uint8) {
      return BigInt(info);
    }
    const start = this.pos - 1;
    let value: bigint;
    switch (info) {
      case INFO.uint8:
        this.need(1, start);
        value = BigInt(this.view.getUint8(this.pos));
        this.pos += 1;
        break;
      case INFO.uint16:
        this.need(2, start);
        value = BigInt(this.view.getUint16(this.pos));
        this.pos += 2;
        break;
      case INFO.uint32:
        this.need(4, start);
        value = BigInt(this.view.getUint32(this.pos));
        this.pos += 4;
        break;
      default:
        this.need(8, start);
        value = this.view.getBigUint64(this.pos);
        this.pos += 8;
    }
    return value;
  }

  /**
   * Declared byte length, checked against what is left
   */
  private toLength(arg: bigint, start: number): number {
    const remaining = this.bytes.length - this.pos;
    if (arg > BigInt(remaining)) {
      throw this.fail(
        'E_CBOR_TRUNCATED',
        `declared length ${arg} exceeds the ${remaining} bytes remaining`,
        start
      );
    }
    return Number(arg);
  }

  /**
   * Declared element count; each element needs at least `minBytes`
   */
  private toCount(arg: bigint, minBytes: number, start: number): number {
    const remaining = this.bytes.length - this.pos;
    if (arg * BigInt(minBytes) > BigInt(remaining)) {
      throw this.fail(
        'E_CBOR_TRUNCATED',
        `declared ${arg} elements but only ${remaining} bytes remain`,
        start
      );
    }
    return Number(arg);
  }

  private readUint8(): number {
    this.need(1, this.pos);
    const value = this.view.getUint8(this.pos);
    this.pos += 1;
    return value;
  }

  private readBytes(length: number): Uint8Array {
    const out = this.bytes.slice(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  private readText(length: number, start: number): string {
    return this.decodeUtf8(this.readBytes(length), start);
  }

  private decodeUtf8(chunk: Uint8Array, start: number): string {
    try {
      return utf8.decode(chunk);
    } catch (err) {
      throw this.fail('E_CBOR_INVALID_UTF8', `text string is not valid UTF-8: ${String(err)}`, start);
    }
  }

  private need(count: number, start: number): void {
    if (this.pos + count > this.bytes.length) {
      throw this.fail(
        'E_CBOR_TRUNCATED',
        `needs ${count} more bytes at offset ${this.pos}, input ends at ${this.bytes.length}`,
        start
      );
    }
  }

  private fail(code: DecodeErrorCode, message: string, offset: number): DecodeError {
    return new DecodeError(code, `CBOR item at offset ${offset}: ${message}`, { offset });
  }
}

function concat(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * IEEE 754 half precision to number (RFC 8949 Appendix D)
 */
export function decodeHalf(half: number): number {
  const exponent = (half >> 10) & 0x1f;
  const mantissa = half & 0x3ff;
  const sign = half & 0x8000 ? -1 : 1;
  if (exponent === 0) {
    return sign * mantissa * 2 ** -24;
  }
  if (exponent === 31) {
    return mantissa === 0 ? sign * Infinity : NaN;
  }
  return sign * (1 + mantissa / 1024) * 2 ** (exponent - 15);
}
