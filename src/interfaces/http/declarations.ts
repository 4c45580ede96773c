import {
  Uint64,
  type ExpressionError,
  type ValueKind,
  type VariableDeclaration,
} from '../../domain/expression/index.js';
import type { DeclarationInput } from '../../application/index.js';

/**
 * Converts a JSON value to the runtime shape its declared kind needs:
 * integers to bigint, uint to Uint64, RFC 3339 strings to Date,
 * base64 strings to bytes. Values that don't convert are passed through
 * and rejected by the environment builder.
 */
export function fromJson(kind: ValueKind, value: unknown): unknown {
  switch (kind.tag) {
    case 'int':
      if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
      if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
      return value;
    case 'uint':
      if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return new Uint64(value);
      if (typeof value === 'string' && /^\d+$/.test(value) && BigInt(value) <= Uint64.MAX) return new Uint64(BigInt(value));
      return value;
    case 'timestamp': {
      if (typeof value !== 'string') return value;
      const date = new Date(value);
      return Number.isNaN(date.getTime()) ? value : date;
    }
    case 'bytes':
      return typeof value === 'string' ? new Uint8Array(Buffer.from(value, 'base64')) : value;
    case 'list':
      return Array.isArray(value) ? value.map((item: unknown) => fromJson(kind.elem, item)) : value;
    case 'map':
      if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, fromJson(kind.value, v)]));
    default:
      return value;
  }
}

export function toVariableDeclarations(inputs: readonly DeclarationInput[]): VariableDeclaration[] {
  return inputs.map((input) =>
    input.value === undefined
      ? { name: input.name, kind: input.kind }
      : { name: input.name, kind: input.kind, value: fromJson(input.kind, input.value) },
  );
}

/** Document as JSON text; objects are serialised, null and absence pass through. */
export function documentText(data: string | Record<string, unknown> | null | undefined): string | null | undefined {
  if (data === null || data === undefined || typeof data === 'string') return data;
  return JSON.stringify(data);
}

/** Response body for a pipeline failure. */
export function errorBody(error: ExpressionError): Record<string, unknown> {
  const body: Record<string, unknown> = { error: error.message, code: error.code };
  const issues = error.context['issues'];
  if (issues !== undefined) body['issues'] = issues;
  return body;
}
