import { EvaluationError } from './errors.js';
import { INT64_MAX, INT64_MIN } from './lexer.js';
import { Uint64, classifyValue, formatKind, isPlainObject } from './value-kind.js';

/**
 * Runtime helpers shared by the interpreter and the standard library.
 *
 * Values keep their native JS shape: bigint is int, Uint64 is uint, number
 * is double, plain objects and Maps are maps.
 */

export type MapValue = Record<string, unknown> | Map<unknown, unknown>;

export function isMapValue(value: unknown): value is MapValue {
  return isPlainObject(value) || value instanceof Map;
}

export function kindName(value: unknown): string {
  return formatKind(classifyValue(value));
}

export function checkedInt(value: bigint): bigint {
  if (value > INT64_MAX || value < INT64_MIN) {
    throw new EvaluationError('integer overflow');
  }
  return value;
}

export function checkedUint(value: bigint): Uint64 {
  if (value < 0n || value > Uint64.MAX) {
    throw new EvaluationError('unsigned integer overflow');
  }
  return new Uint64(value);
}

/** Numeric view of int, uint and double values; `null` for anything else. */
export function numericValue(value: unknown): bigint | number | null {
  if (typeof value === 'bigint' || typeof value === 'number') return value;
  if (value instanceof Uint64) return value.value;
  return null;
}

/** Iteration order of a map's keys. */
export function mapKeys(map: MapValue): unknown[] {
  return map instanceof Map ? [...map.keys()] : Object.keys(map);
}

export function mapLookup(map: MapValue, key: unknown): { found: true; value: unknown } | { found: false } {
  if (map instanceof Map) {
    if (map.has(key)) return { found: true, value: map.get(key) };
    for (const [candidate, value] of map) {
      if (valuesEqual(candidate, key)) return { found: true, value };
    }
    return { found: false };
  }
  if (typeof key === 'string' && Object.prototype.hasOwnProperty.call(map, key)) {
    return { found: true, value: map[key] };
  }
  return { found: false };
}

function compareNumbers(a: bigint | number, b: bigint | number): number {
  if (typeof a === 'number' && Number.isNaN(a)) return Number.NaN;
  if (typeof b === 'number' && Number.isNaN(b)) return Number.NaN;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * Equality across kinds: numbers compare by value whatever their kind,
 * containers compare element-wise, values of different kinds are unequal.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === undefined || a === null) return b === undefined || b === null;

  const na = numericValue(a);
  const nb = numericValue(b);
  if (na !== null || nb !== null) {
    return na !== null && nb !== null && compareNumbers(na, nb) === 0;
  }

  if (a instanceof Uint8Array && b instanceof Uint8Array) return bytesEqual(a, b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item: unknown, i) => valuesEqual(item, b[i]));
  }

  if (isMapValue(a) && isMapValue(b)) {
    const keys = mapKeys(a);
    if (keys.length !== mapKeys(b).length) return false;
    return keys.every((key) => {
      const left = mapLookup(a, key);
      const right = mapLookup(b, key);
      return left.found && right.found && valuesEqual(left.value, right.value);
    });
  }

  return false;
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

/** Orders strings by Unicode code point rather than UTF-16 code unit. */
export function compareStrings(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
    i += x > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

/**
 * Ordering for `<`, `<=`, `>`, `>=`. Returns NaN when a double NaN takes part.
 * Throws when the two values have no common ordering.
 */
export function compareValues(a: unknown, b: unknown, op: string): number {
  const na = numericValue(a);
  const nb = numericValue(b);
  if (na !== null && nb !== null) return compareNumbers(na, nb);

  if (typeof a === 'string' && typeof b === 'string') return compareStrings(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Uint8Array && b instanceof Uint8Array) return compareBytes(a, b);
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime());

  throw new EvaluationError(`no matching overload for '${op}' applied to (${kindName(a)}, ${kindName(b)})`);
}

/** Number of elements, entries, code points or bytes. */
export function sizeOf(value: unknown): bigint {
  if (typeof value === 'string') return BigInt([...value].length);
  if (value instanceof Uint8Array) return BigInt(value.length);
  if (Array.isArray(value)) return BigInt(value.length);
  if (isMapValue(value)) return BigInt(mapKeys(value).length);
  throw new EvaluationError(`no matching overload for 'size' applied to (${kindName(value)})`);
}
