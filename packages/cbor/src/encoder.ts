/**
 * CBOR encoder
 *
 * Writes definite-length items with the shortest argument encoding.
 * Used to build fixtures and COSE Sig_structures.
 */

import { MAJOR, type TypedValue } from './types.js';

const textEncoder = new TextEncoder();

class Writer {
  private buf = new Uint8Array(256);
  private view = new DataView(this.buf.buffer);
  private pos = 0;

  private grow(n: number): void {
    if (this.pos + n <= this.buf.length) return;
    let capacity = this.buf.length;
    while (capacity < this.pos + n) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf);
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  byte(value: number): void {
    this.grow(1);
    this.buf[this.pos++] = value;
  }

  bytes(value: Uint8Array): void {
    this.grow(value.length);
    this.buf.set(value, this.pos);
    this.pos += value.length;
  }

  header(major: number, arg: number | bigint): void {
    const v = typeof arg === 'bigint' ? arg : BigInt(arg);
    const base = major << 5;
    if (v < 0n) {
      throw new RangeError(`CBOR argument must be non-negative, got ${v}`);
    }
    if (v <= 23n) {
      this.byte(base | Number(v));
    } else if (v <= 0xffn) {
      this.byte(base | 24);
      this.byte(Number(v));
    } else if (v <= 0xffffn) {
      this.byte(base | 25);
      this.grow(2);
      this.view.setUint16(this.pos, Number(v));
      this.pos += 2;
    } else if (v <= 0xffffffffn) {
      this.byte(base | 26);
      this.grow(4);
      this.view.setUint32(this.pos, Number(v));
      this.pos += 4;
    } else if (v <= 0xffffffffffffffffn) {
      this.byte(base | 27);
      this.grow(8);
      this.view.setBigUint64(this.pos, v);
      this.pos += 8;
    } else {
      throw new RangeError(`CBOR argument ${v} does not fit in 64 bits`);
    }
  }

  float(value: number, precision: 16 | 32 | 64): void {
    if (precision === 32) {
      this.byte(0xfa);
      this.grow(4);
      this.view.setFloat32(this.pos, value);
      this.pos += 4;
    } else {
      // half precision is widened: DataView has no setFloat16 on Node 20
      this.byte(0xfb);
      this.grow(8);
      this.view.setFloat64(this.pos, value);
      this.pos += 8;
    }
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }
}

function write(w: Writer, value: TypedValue): void {
  switch (value.kind) {
    case 'integer':
      if (value.value >= 0n) {
        w.header(MAJOR.unsigned, value.value);
      } else {
        w.header(MAJOR.negative, -1n - value.value);
      }
      return;
    case 'bytes':
      w.header(MAJOR.bytes, value.value.length);
      w.bytes(value.value);
      return;
    case 'text': {
      const encoded = textEncoder.encode(value.value);
      w.header(MAJOR.text, encoded.length);
      w.bytes(encoded);
      return;
    }
    case 'array':
      w.header(MAJOR.array, value.items.length);
      for (const item of value.items) write(w, item);
      return;
    case 'map':
      w.header(MAJOR.map, value.entries.length);
      for (const [k, v] of value.entries) {
        write(w, k);
        write(w, v);
      }
      return;
    case 'date':
      w.header(MAJOR.tag, value.tag);
      write(w, value.source);
      return;
    case 'tagged':
      w.header(MAJOR.tag, value.tag);
      write(w, value.value);
      return;
    case 'float':
      w.float(value.value, value.precision);
      return;
    case 'boolean':
      w.byte(value.value ? 0xf5 : 0xf4);
      return;
    case 'null':
      w.byte(0xf6);
      return;
    case 'undefined':
      w.byte(0xf7);
      return;
    case 'simple':
      // 20-23 are booleans, null and undefined; 24-31 have no valid encoding
      if (!Number.isInteger(value.value) || value.value < 0 || value.value > 255) {
        throw new RangeError(`simple value ${value.value} is out of range`);
      }
      if (value.value >= 20 && value.value < 32) {
        throw new RangeError(`simple value ${value.value} has no encoding of its own`);
      }
      if (value.value < 20) {
        w.byte(0xe0 | value.value);
      } else {
        w.byte(0xf8);
        w.byte(value.value);
      }
      return;
  }
}

/**
 * Encode a TypedValue tree to CBOR bytes
 */
export function encode(value: TypedValue): Uint8Array {
  const w = new Writer();
  write(w, value);
  return w.finish();
}
