import {
  ExpressionError,
  NilInputError,
  Program,
  buildEnvironment,
  check,
  evaluateProgram,
  requireBoolean,
  type VariableDeclaration,
} from '../domain/expression/index.js';
import type { ProgramCache } from './program-cache.js';

/**
 * Outcome of one evaluation.
 *
 * `ok === false` carries the error of the stage that failed; the caller
 * decides whether it means "rule inapplicable to this event" or
 * "surface to an operator".
 */
export type Verdict =
  | { readonly ok: true; readonly matched: boolean }
  | { readonly ok: false; readonly error: ExpressionError };

export interface EvaluateOptions {
  /** Host-provided variables; they replace same-named document keys. */
  readonly declarations?: readonly VariableDeclaration[];
  /** Reuses checked expressions across documents with the same variable signature. */
  readonly cache?: ProgramCache;
}

/**
 * Evaluates a boolean rule expression against a JSON document.
 *
 * Pipeline: decode → build environment → compile → evaluate → validate.
 * The first failing stage ends the run; nothing is retried. Errors other
 * than ExpressionError are bugs and propagate.
 */
export function evaluateExpression(
  data: string | null | undefined,
  expression: string,
  options: EvaluateOptions = {},
): Verdict {
  try {
    return { ok: true, matched: evaluateOrThrow(data, expression, options) };
  } catch (err: unknown) {
    if (err instanceof ExpressionError) return { ok: false, error: err };
    throw err;
  }
}

/** Same pipeline as evaluateExpression, throwing the stage error instead. */
export function evaluateOrThrow(
  data: string | null | undefined,
  expression: string,
  options: EvaluateOptions = {},
): boolean {
  if (data === null || data === undefined) throw new NilInputError();

  const env = buildEnvironment(data, options.declarations);
  const { cache } = options;

  let checked = cache?.get(expression, env.signature());
  if (checked === undefined) {
    checked = check(expression, env);
    cache?.set(expression, env.signature(), checked);
  }

  const program = new Program(checked, env);
  const result = evaluateProgram(program, env.activation());
  return requireBoolean(result, expression);
}
