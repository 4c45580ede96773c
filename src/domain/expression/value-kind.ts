/**
 * Symbolic type tags for the expression type system.
 *
 * A ValueKind is both the declared type of a variable and the static type
 * the checker infers for every sub-expression. `object` is the extension
 * case for host-provided values that fit no other tag.
 */
export type ValueKind =
  | { readonly tag: 'bool' }
  | { readonly tag: 'string' }
  | { readonly tag: 'int' }
  | { readonly tag: 'uint' }
  | { readonly tag: 'double' }
  | { readonly tag: 'bytes' }
  | { readonly tag: 'timestamp' }
  | { readonly tag: 'null' }
  | { readonly tag: 'dyn' }
  | { readonly tag: 'map'; readonly key: ValueKind; readonly value: ValueKind }
  | { readonly tag: 'list'; readonly elem: ValueKind }
  | { readonly tag: 'object'; readonly name: string };

export type ValueKindTag = ValueKind['tag'];

export const Kinds = {
  Bool: { tag: 'bool' },
  String: { tag: 'string' },
  Int: { tag: 'int' },
  Uint: { tag: 'uint' },
  Double: { tag: 'double' },
  Bytes: { tag: 'bytes' },
  Timestamp: { tag: 'timestamp' },
  Null: { tag: 'null' },
  Dyn: { tag: 'dyn' },
  map(key: ValueKind, value: ValueKind): ValueKind {
    return { tag: 'map', key, value };
  },
  list(elem: ValueKind): ValueKind {
    return { tag: 'list', elem };
  },
  object(name: string): ValueKind {
    return { tag: 'object', name };
  },
} as const satisfies Record<string, ValueKind | ((...args: never[]) => ValueKind)>;

/** Name used for protocol message values, which the checker treats as dyn. */
export const MESSAGE_OBJECT_NAME = 'dyn';

/**
 * Unsigned 64-bit integer value.
 *
 * JavaScript has a single bigint type, so uint values are boxed to keep
 * them apart from int at run time.
 */
export class Uint64 {
  static readonly MAX = (1n << 64n) - 1n;

  readonly value: bigint;

  constructor(value: bigint | number) {
    const v = typeof value === 'number' ? BigInt(Math.trunc(value)) : value;
    if (v < 0n || v > Uint64.MAX) {
      throw new RangeError(`uint out of range: ${v}`);
    }
    this.value = v;
  }

  toString(): string {
    return `${this.value}u`;
  }
}

/** Plain object literal or JSON-decoded object (not a class instance). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Values decoded by protobufjs and similar libraries carry their descriptor in `$type`. */
function isProtocolMessage(value: object): boolean {
  return '$type' in value && typeof Reflect.get(value, '$type') === 'object';
}

function structuralTypeName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor === 'function' && ctor.name !== '') return ctor.name;
  return Object.prototype.toString.call(value).slice(8, -1);
}

/**
 * Maps a runtime value to its ValueKind.
 *
 * Rules are applied in priority order; the first match wins.
 */
export function classifyValue(value: unknown): ValueKind {
  switch (typeof value) {
    case 'boolean': return Kinds.Bool;
    case 'string': return Kinds.String;
    case 'bigint': return Kinds.Int;
    case 'number': return Kinds.Double;
    case 'undefined': return Kinds.Null;
    case 'function': return Kinds.object(value.name === '' ? 'Function' : value.name);
    case 'symbol': return Kinds.object('Symbol');
    default: break;
  }

  if (value === null || typeof value !== 'object') return Kinds.Null;
  if (value instanceof Uint64) return Kinds.Uint;
  if (value instanceof Uint8Array) return Kinds.Bytes;
  if (value instanceof Date && !Number.isNaN(value.getTime())) return Kinds.Timestamp;
  if (isPlainObject(value) || value instanceof Map) return Kinds.map(Kinds.String, Kinds.Dyn);
  if (Array.isArray(value)) return Kinds.list(Kinds.Dyn);
  if (isProtocolMessage(value)) return Kinds.object(MESSAGE_OBJECT_NAME);

  return Kinds.object(structuralTypeName(value));
}

/** Human-readable form, e.g. `map(string, dyn)`. */
export function formatKind(kind: ValueKind): string {
  switch (kind.tag) {
    case 'map': return `map(${formatKind(kind.key)}, ${formatKind(kind.value)})`;
    case 'list': return `list(${formatKind(kind.elem)})`;
    case 'object': return kind.name;
    default: return kind.tag;
  }
}

/** True for dyn and for message objects, whose shape is only known at run time. */
export function isDynamic(kind: ValueKind): boolean {
  return kind.tag === 'dyn' || (kind.tag === 'object' && kind.name === MESSAGE_OBJECT_NAME);
}

export function isNumeric(kind: ValueKind): boolean {
  return kind.tag === 'int' || kind.tag === 'uint' || kind.tag === 'double';
}

export function kindsEqual(a: ValueKind, b: ValueKind): boolean {
  if (a.tag !== b.tag) return false;
  switch (a.tag) {
    case 'map':
      return b.tag === 'map' && kindsEqual(a.key, b.key) && kindsEqual(a.value, b.value);
    case 'list':
      return b.tag === 'list' && kindsEqual(a.elem, b.elem);
    case 'object':
      return b.tag === 'object' && a.name === b.name;
    default:
      return true;
  }
}

/**
 * Whether a value of kind `actual` may be used where `expected` is declared.
 * Dynamic kinds are assignable in both directions; containers compare
 * their parameters with the same rule.
 */
export function isAssignable(expected: ValueKind, actual: ValueKind): boolean {
  if (isDynamic(expected) || isDynamic(actual)) return true;
  if (expected.tag === 'map' && actual.tag === 'map') {
    return isAssignable(expected.key, actual.key) && isAssignable(expected.value, actual.value);
  }
  if (expected.tag === 'list' && actual.tag === 'list') {
    return isAssignable(expected.elem, actual.elem);
  }
  return kindsEqual(expected, actual);
}

/**
 * Least common kind of two branches: the kind itself when they agree,
 * dyn otherwise.
 */
export function joinKinds(a: ValueKind, b: ValueKind): ValueKind {
  if (kindsEqual(a, b)) return a;
  if (a.tag === 'null') return b;
  if (b.tag === 'null') return a;
  return Kinds.Dyn;
}
