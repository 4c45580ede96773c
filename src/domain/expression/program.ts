import { checkExpression, type CheckedExpression } from './checker.js';
import type { Activation, Environment } from './environment.js';
import {
  CompileError,
  EvaluationError,
  ExpressionError,
  NonBooleanResultError,
  issueAt,
} from './errors.js';
import { Interpreter } from './interpreter.js';
import { parse } from './parser.js';
import { classifyValue, formatKind } from './value-kind.js';

/**
 * A checked expression paired with the environment it was compiled against.
 */
export class Program {
  constructor(
    readonly checked: CheckedExpression,
    readonly environment: Environment,
  ) {}

  get expression(): string {
    return this.checked.source;
  }
}

/**
 * Parses and type-checks `expression` against `env`.
 * Throws CompileError listing every issue found.
 */
export function check(expression: string, env: Environment): CheckedExpression {
  const parsed = parse(expression);
  if (!parsed.ok) throw new CompileError(expression, parsed.issues);

  let result: ReturnType<typeof checkExpression>;
  try {
    result = checkExpression(expression, parsed.expr, env);
  } catch (err: unknown) {
    if (err instanceof RangeError) {
      throw new CompileError(expression, [issueAt(expression, 0, 'expression nesting exceeds limit')]);
    }
    throw err;
  }
  if (!result.ok) throw new CompileError(expression, result.issues);
  return result.checked;
}

export function compile(expression: string, env: Environment): Program {
  return new Program(check(expression, env), env);
}

/**
 * Runs a program. Throws EvaluationError for any failure during execution,
 * including an activation that belongs to another environment.
 */
export function evaluateProgram(program: Program, activation: Activation): unknown {
  if (activation.environment !== program.environment) {
    throw new EvaluationError('activation does not belong to the environment the program was compiled against', {
      expression: program.expression,
    });
  }

  try {
    return new Interpreter(program.checked, program.environment, activation).run();
  } catch (err: unknown) {
    if (err instanceof EvaluationError) {
      throw new EvaluationError(`failed to evaluate program: ${err.message}`, {
        ...err.context,
        expression: program.expression,
      }, { cause: err });
    }
    if (err instanceof ExpressionError) throw err;
    // RangeError from deep recursion and the like
    throw new EvaluationError('failed to evaluate program', { expression: program.expression }, { cause: err });
  }
}

/** The result must be a bool; anything else is a NonBooleanResultError. */
export function requireBoolean(value: unknown, expression: string): boolean {
  if (typeof value === 'boolean') return value;
  const kind = formatKind(classifyValue(value));
  throw new NonBooleanResultError(`output type is not boolean: ${kind}`, { expression, kind });
}
