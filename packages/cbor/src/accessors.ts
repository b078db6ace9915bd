/**
 * Variant-checked access to TypedValue trees
 *
 * Each accessor returns `undefined` when the node is of another kind,
 * never a coerced value.
 */

import type {
  CborMap,
  TypedValue,
  TypedValueKind,
  TypedValueOf,
} from './types.js';

export function isKind<K extends TypedValueKind>(
  value: TypedValue | undefined,
  kind: K
): value is TypedValueOf<K> {
  return value !== undefined && value.kind === kind;
}

export function asMap(value: TypedValue | undefined): CborMap | undefined {
  return isKind(value, 'map') ? value : undefined;
}

export function asArray(value: TypedValue | undefined): TypedValue[] | undefined {
  return isKind(value, 'array') ? value.items : undefined;
}

export function asText(value: TypedValue | undefined): string | undefined {
  return isKind(value, 'text') ? value.value : undefined;
}

export function asBytes(value: TypedValue | undefined): Uint8Array | undefined {
  return isKind(value, 'bytes') ? value.value : undefined;
}

export function asInteger(value: TypedValue | undefined): bigint | undefined {
  return isKind(value, 'integer') ? value.value : undefined;
}

/**
 * Integer within the safe range, or a finite float
 */
export function asNumber(value: TypedValue | undefined): number | undefined {
  if (isKind(value, 'integer')) {
    const n = Number(value.value);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  if (isKind(value, 'float') && Number.isFinite(value.value)) {
    return value.value;
  }
  return undefined;
}

export function asDate(value: TypedValue | undefined): Date | undefined {
  return isKind(value, 'date') ? value.value : undefined;
}

/**
 * Whether a map key equals an integer or text key
 */
export function keyEquals(key: TypedValue, wanted: number | bigint | string): boolean {
  if (typeof wanted === 'string') {
    return key.kind === 'text' && key.value === wanted;
  }
  return key.kind === 'integer' && key.value === BigInt(wanted);
}

/**
 * First value stored under `key`
 */
export function mapGet(
  value: CborMap | undefined,
  key: number | bigint | string
): TypedValue | undefined {
  return value?.entries.find(([k]) => keyEquals(k, key))?.[1];
}

/**
 * Follow a path of keys (maps) and indices (arrays)
 */
export function getPath(
  value: TypedValue | undefined,
  path: ReadonlyArray<number | string>
): TypedValue | undefined {
  let node = value;
  for (const step of path) {
    if (isKind(node, 'map')) {
      node = mapGet(node, step);
    } else if (isKind(node, 'array') && typeof step === 'number') {
      node = node.items[step];
    } else {
      return undefined;
    }
  }
  return node;
}
