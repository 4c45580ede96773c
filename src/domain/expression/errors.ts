/**
 * Error taxonomy of the evaluation pipeline.
 *
 * Every stage throws one of these; `context` carries structured details
 * (expression text, issue list) for whoever logs or reports the failure.
 */

export type ExpressionErrorCode =
  | 'NIL_INPUT'
  | 'PAYLOAD_PARSE'
  | 'ENVIRONMENT_BUILD'
  | 'COMPILE'
  | 'EVALUATION'
  | 'NON_BOOLEAN_RESULT';

/** A single compile-time problem with its position in the expression text. */
export interface Issue {
  readonly message: string;
  readonly offset: number;
  readonly line: number; // 1-based
  readonly column: number; // 1-based
}

export abstract class ExpressionError extends Error {
  abstract readonly code: ExpressionErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

export class NilInputError extends ExpressionError {
  readonly code = 'NIL_INPUT';

  constructor() {
    super('data is nil');
  }
}

export class PayloadParseError extends ExpressionError {
  readonly code = 'PAYLOAD_PARSE';
}

export class EnvironmentBuildError extends ExpressionError {
  readonly code = 'ENVIRONMENT_BUILD';
}

export class CompileError extends ExpressionError {
  readonly code = 'COMPILE';
  readonly issues: readonly Issue[];

  constructor(expression: string, issues: readonly Issue[]) {
    super(
      `failed to compile expression: ${issues.map(formatIssue).join('; ')}`,
      { expression, issues },
    );
    this.issues = issues;
  }
}

export class EvaluationError extends ExpressionError {
  readonly code = 'EVALUATION';
}

export class NonBooleanResultError extends ExpressionError {
  readonly code = 'NON_BOOLEAN_RESULT';
}

export function formatIssue(issue: Issue): string {
  return `${issue.line}:${issue.column}: ${issue.message}`;
}

/** Converts a 0-based offset into a 1-based line/column pair. */
export function issueAt(source: string, offset: number, message: string): Issue {
  let line = 1;
  let column = 1;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { message, offset, line, column };
}
