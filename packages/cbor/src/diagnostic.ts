/**
 * CBOR diagnostic notation (RFC 8949 §8)
 *
 * Single-line rendering used by `dcc decode --raw`.
 */

import type { TypedValue } from './types.js';

function hex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

function float(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (Object.is(value, -0)) return '-0.0';
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function diagnose(value: TypedValue): string {
  switch (value.kind) {
    case 'integer':
      return value.value.toString();
    case 'bytes':
      return `h'${hex(value.value)}'`;
    case 'text':
      return JSON.stringify(value.value);
    case 'array':
      return `[${value.items.map(diagnose).join(', ')}]`;
    case 'map':
      return `{${value.entries.map(([k, v]) => `${diagnose(k)}: ${diagnose(v)}`).join(', ')}}`;
    case 'date':
      return `${value.tag}(${diagnose(value.source)})`;
    case 'tagged':
      return `${value.tag}(${diagnose(value.value)})`;
    case 'float':
      return float(value.value);
    case 'boolean':
      return String(value.value);
    case 'null':
      return 'null';
    case 'undefined':
      return 'undefined';
    case 'simple':
      return `simple(${value.value})`;
  }
}
