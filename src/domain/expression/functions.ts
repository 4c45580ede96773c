import { EvaluationError } from './errors.js';
import { INT64_MAX, INT64_MIN } from './lexer.js';
import { Kinds, Uint64, type ValueKind } from './value-kind.js';
import { checkedUint, kindName, sizeOf } from './values.js';

/**
 * One signature of a function.
 *
 * For receiver-style overloads (`x.startsWith(y)`) the receiver is the
 * first entry of `params`.
 */
export interface Overload {
  readonly id: string;
  readonly params: readonly ValueKind[];
  readonly result: ValueKind;
  readonly receiver: boolean;
  readonly impl: (args: readonly unknown[]) => unknown;
}

export interface FunctionDecl {
  readonly name: string;
  readonly overloads: readonly Overload[];
}

export function overload(
  id: string,
  params: readonly ValueKind[],
  result: ValueKind,
  impl: (args: readonly unknown[]) => unknown,
  receiver = false,
): Overload {
  return { id, params, result, impl, receiver };
}

/** Merges overload lists of same-named declarations, keeping declaration order. */
export function mergeDeclarations(decls: readonly FunctionDecl[]): Map<string, FunctionDecl> {
  const merged = new Map<string, FunctionDecl>();
  for (const decl of decls) {
    const existing = merged.get(decl.name);
    merged.set(decl.name, {
      name: decl.name,
      overloads: existing === undefined ? decl.overloads : [...existing.overloads, ...decl.overloads],
    });
  }
  return merged;
}

// ── argument accessors ──────────────────────────────────────
// The checker has already matched the overload, so a wrong type here is a
// dyn value that slipped through; report it as an evaluation failure.

function arg(args: readonly unknown[], index: number): unknown {
  return args[index];
}

function str(args: readonly unknown[], index: number, fn: string): string {
  const value = arg(args, index);
  if (typeof value !== 'string') throw noOverload(fn, args);
  return value;
}

function noOverload(fn: string, args: readonly unknown[]): EvaluationError {
  return new EvaluationError(`no matching overload for '${fn}' applied to (${args.map(kindName).join(', ')})`);
}

// ── conversions ─────────────────────────────────────────────

const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

function toInt(value: unknown): bigint {
  if (typeof value === 'bigint') return value;
  if (value instanceof Uint64) {
    if (value.value > INT64_MAX) throw new EvaluationError('integer overflow');
    return value.value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new EvaluationError('integer overflow');
    const truncated = BigInt(Math.trunc(value));
    if (truncated > INT64_MAX || truncated < INT64_MIN) throw new EvaluationError('integer overflow');
    return truncated;
  }
  if (typeof value === 'string') {
    if (!/^[+-]?\d+$/.test(value.trim())) throw new EvaluationError(`cannot convert "${value}" to int`);
    const parsed = BigInt(value.trim());
    if (parsed > INT64_MAX || parsed < INT64_MIN) throw new EvaluationError('integer overflow');
    return parsed;
  }
  if (value instanceof Date) return BigInt(Math.floor(value.getTime() / 1000));
  throw noOverload('int', [value]);
}

function toUint(value: unknown): Uint64 {
  if (value instanceof Uint64) return value;
  if (typeof value === 'bigint') return checkedUint(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new EvaluationError('unsigned integer overflow');
    return checkedUint(BigInt(Math.trunc(value)));
  }
  if (typeof value === 'string') {
    if (!/^\+?\d+$/.test(value.trim())) throw new EvaluationError(`cannot convert "${value}" to uint`);
    return checkedUint(BigInt(value.trim()));
  }
  throw noOverload('uint', [value]);
}

function toDouble(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Uint64) return Number(value.value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
    if (Number.isNaN(parsed) && !/^[+-]?NaN$/.test(trimmed)) {
      throw new EvaluationError(`cannot convert "${value}" to double`);
    }
    return parsed;
  }
  throw noOverload('double', [value]);
}

function toStringValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'bigint' || typeof value === 'number') return String(value);
  if (value instanceof Uint64) return value.value.toString();
  if (value instanceof Uint8Array) return new TextDecoder('utf-8', { fatal: false }).decode(value);
  if (value instanceof Date) return value.toISOString();
  throw noOverload('string', [value]);
}

const TRUE_STRINGS = new Set(['1', 't', 'true', 'TRUE', 'True']);
const FALSE_STRINGS = new Set(['0', 'f', 'false', 'FALSE', 'False']);

function toBool(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    if (TRUE_STRINGS.has(value)) return true;
    if (FALSE_STRINGS.has(value)) return false;
    throw new EvaluationError(`cannot convert "${value}" to bool`);
  }
  throw noOverload('bool', [value]);
}

function toTimestamp(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string') {
    const date = new Date(value);
    if (!RFC3339.test(value) || Number.isNaN(date.getTime())) {
      throw new EvaluationError(`cannot parse "${value}" as a timestamp`);
    }
    return date;
  }
  if (typeof value === 'bigint') return new Date(Number(value) * 1000);
  throw noOverload('timestamp', [value]);
}

function compileRegex(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'u');
  } catch (err: unknown) {
    throw new EvaluationError(`invalid regular expression: ${pattern}`, { pattern }, { cause: err });
  }
}

const { Bool, String: Str, Int, Uint, Double, Bytes, Timestamp, Dyn } = Kinds;
const ListDyn = Kinds.list(Dyn);
const MapDyn = Kinds.map(Dyn, Dyn);

/** Functions every environment declares. */
export function standardLibrary(): FunctionDecl[] {
  const size = (args: readonly unknown[]): bigint => sizeOf(arg(args, 0));
  const sizeKinds: ValueKind[] = [Str, Bytes, ListDyn, MapDyn];

  return [
    {
      name: 'size',
      overloads: [
        ...sizeKinds.map((kind) => overload(`size_${kind.tag}`, [kind], Int, size)),
        ...sizeKinds.map((kind) => overload(`${kind.tag}_size`, [kind], Int, size, true)),
      ],
    },
    {
      name: 'contains',
      overloads: [overload('string_contains_string', [Str, Str], Bool,
        (args) => str(args, 0, 'contains').includes(str(args, 1, 'contains')), true)],
    },
    {
      name: 'startsWith',
      overloads: [overload('string_starts_with_string', [Str, Str], Bool,
        (args) => str(args, 0, 'startsWith').startsWith(str(args, 1, 'startsWith')), true)],
    },
    {
      name: 'endsWith',
      overloads: [overload('string_ends_with_string', [Str, Str], Bool,
        (args) => str(args, 0, 'endsWith').endsWith(str(args, 1, 'endsWith')), true)],
    },
    {
      name: 'matches',
      overloads: [
        overload('string_matches_string', [Str, Str], Bool,
          (args) => compileRegex(str(args, 1, 'matches')).test(str(args, 0, 'matches')), true),
        overload('matches_string_string', [Str, Str], Bool,
          (args) => compileRegex(str(args, 1, 'matches')).test(str(args, 0, 'matches'))),
      ],
    },
    {
      name: 'int',
      overloads: [Int, Uint, Double, Str, Timestamp].map((kind) =>
        overload(`${kind.tag}_to_int`, [kind], Int, (args) => toInt(arg(args, 0)))),
    },
    {
      name: 'uint',
      overloads: [Uint, Int, Double, Str].map((kind) =>
        overload(`${kind.tag}_to_uint`, [kind], Uint, (args) => toUint(arg(args, 0)))),
    },
    {
      name: 'double',
      overloads: [Double, Int, Uint, Str].map((kind) =>
        overload(`${kind.tag}_to_double`, [kind], Double, (args) => toDouble(arg(args, 0)))),
    },
    {
      name: 'string',
      overloads: [Str, Bool, Int, Uint, Double, Bytes, Timestamp].map((kind) =>
        overload(`${kind.tag}_to_string`, [kind], Str, (args) => toStringValue(arg(args, 0)))),
    },
    {
      name: 'bytes',
      overloads: [
        overload('bytes_to_bytes', [Bytes], Bytes, (args) => arg(args, 0)),
        overload('string_to_bytes', [Str], Bytes, (args) => new TextEncoder().encode(str(args, 0, 'bytes'))),
      ],
    },
    {
      name: 'bool',
      overloads: [Bool, Str].map((kind) =>
        overload(`${kind.tag}_to_bool`, [kind], Bool, (args) => toBool(arg(args, 0)))),
    },
    {
      name: 'timestamp',
      overloads: [Timestamp, Str, Int].map((kind) =>
        overload(`${kind.tag}_to_timestamp`, [kind], Timestamp, (args) => toTimestamp(arg(args, 0)))),
    },
    {
      name: 'dyn',
      overloads: [overload('to_dyn', [Dyn], Dyn, (args) => arg(args, 0))],
    },
  ];
}
