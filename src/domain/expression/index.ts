export type { Expr, LiteralValue } from './ast.js';
export type { CheckedExpression, CheckResult } from './checker.js';
export { checkExpression } from './checker.js';
export type { VariableBinding, VariableDeclaration } from './environment.js';
export { Activation, Environment, buildEnvironment, parseDocument } from './environment.js';
export type { ExpressionErrorCode, Issue } from './errors.js';
export {
  CompileError,
  EnvironmentBuildError,
  EvaluationError,
  ExpressionError,
  NilInputError,
  NonBooleanResultError,
  PayloadParseError,
  formatIssue,
} from './errors.js';
export type { FunctionDecl, Overload } from './functions.js';
export { parse, isValidIdentifier } from './parser.js';
export type { LookupResult, PathSegment } from './path.js';
export { lookupPath, parsePath } from './path.js';
export { Program, check, compile, evaluateProgram, requireBoolean } from './program.js';
export { createDocumentQuery, safeAccessors } from './safe-accessors.js';
export type { ValueKind, ValueKindTag } from './value-kind.js';
export {
  Kinds,
  Uint64,
  classifyValue,
  formatKind,
  isAssignable,
  kindsEqual,
} from './value-kind.js';
