import { overload, type FunctionDecl } from './functions.js';
import { lookupPath, type LookupResult } from './path.js';
import { Kinds } from './value-kind.js';

/**
 * Lazily decoded view of the raw document text.
 *
 * The accessors close over the raw text rather than the top-level
 * bindings, so they reach nested fields and keys that never became
 * variables. The text is decoded at most once per environment.
 */
export function createDocumentQuery(raw: string): (path: string) => LookupResult {
  let decoded: { ok: true; root: unknown } | { ok: false } | undefined;

  return (path: string): LookupResult => {
    if (decoded === undefined) {
      try {
        decoded = { ok: true, root: JSON.parse(raw) };
      } catch {
        // an undecodable document has no reachable paths
        decoded = { ok: false };
      }
    }
    if (!decoded.ok) return { found: false };
    return lookupPath(decoded.root, path);
  };
}

function pathArg(args: readonly unknown[]): string | null {
  const [path] = args;
  return typeof path === 'string' ? path : null;
}

/**
 * `exists(path)` and the three `safe(path, default)` overloads.
 *
 * None of them raise for a missing field, a value of another kind or a
 * malformed path; `safe` answers with its default instead.
 */
export function safeAccessors(raw: string): FunctionDecl[] {
  const query = createDocumentQuery(raw);

  const find = (args: readonly unknown[]): LookupResult => {
    const path = pathArg(args);
    return path === null ? { found: false } : query(path);
  };

  const safeOf = (matches: (value: unknown) => boolean) =>
    (args: readonly unknown[]): unknown => {
      const result = find(args);
      return result.found && matches(result.value) ? result.value : args[1];
    };

  return [
    {
      name: 'exists',
      overloads: [
        overload('string_exists_bool', [Kinds.String], Kinds.Bool, (args) => find(args).found),
      ],
    },
    {
      name: 'safe',
      overloads: [
        overload('safe_string', [Kinds.String, Kinds.String], Kinds.String,
          safeOf((value) => typeof value === 'string')),
        overload('safe_double', [Kinds.String, Kinds.Double], Kinds.Double,
          safeOf((value) => typeof value === 'number')),
        overload('safe_bool', [Kinds.String, Kinds.Bool], Kinds.Bool,
          safeOf((value) => typeof value === 'boolean')),
      ],
    },
  ];
}
