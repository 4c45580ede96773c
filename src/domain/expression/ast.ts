import type { Uint64 } from './value-kind.js';

export type LiteralValue = boolean | string | bigint | number | Uint64 | Uint8Array | null;

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type RelationOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in';
export type BinaryOp = ArithmeticOp | RelationOp;
export type LogicalOp = '&&' | '||';
export type UnaryOp = '!' | '-';
export type ComprehensionMacro = 'all' | 'exists' | 'exists_one' | 'filter' | 'map';

interface NodeBase {
  /** Unique within one parsed expression; keys the checker's annotations. */
  readonly id: number;
  /** 0-based offset of the node's first token. */
  readonly offset: number;
}

export type Expr =
  | LiteralExpr
  | IdentExpr
  | SelectExpr
  | IndexExpr
  | CallExpr
  | UnaryExpr
  | BinaryExpr
  | LogicalExpr
  | ConditionalExpr
  | ListExpr
  | MapExpr
  | ComprehensionExpr;

export interface LiteralExpr extends NodeBase {
  readonly type: 'literal';
  readonly value: LiteralValue;
}

export interface IdentExpr extends NodeBase {
  readonly type: 'ident';
  readonly name: string;
}

/** `operand.field`, or `has(operand.field)` when `test` is set. */
export interface SelectExpr extends NodeBase {
  readonly type: 'select';
  readonly operand: Expr;
  readonly field: string;
  readonly test: boolean;
}

export interface IndexExpr extends NodeBase {
  readonly type: 'index';
  readonly operand: Expr;
  readonly index: Expr;
}

/** Global call `fn(args)` or receiver call `target.fn(args)`. */
export interface CallExpr extends NodeBase {
  readonly type: 'call';
  readonly fn: string;
  readonly target: Expr | null;
  readonly args: readonly Expr[];
}

export interface UnaryExpr extends NodeBase {
  readonly type: 'unary';
  readonly op: UnaryOp;
  readonly operand: Expr;
}

export interface BinaryExpr extends NodeBase {
  readonly type: 'binary';
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface LogicalExpr extends NodeBase {
  readonly type: 'logical';
  readonly op: LogicalOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface ConditionalExpr extends NodeBase {
  readonly type: 'conditional';
  readonly condition: Expr;
  readonly then: Expr;
  readonly otherwise: Expr;
}

export interface ListExpr extends NodeBase {
  readonly type: 'list';
  readonly elements: readonly Expr[];
}

export interface MapEntry {
  readonly key: Expr;
  readonly value: Expr;
}

export interface MapExpr extends NodeBase {
  readonly type: 'map';
  readonly entries: readonly MapEntry[];
}

/** `range.macro(variable, body)` */
export interface ComprehensionExpr extends NodeBase {
  readonly type: 'comprehension';
  readonly macro: ComprehensionMacro;
  readonly range: Expr;
  readonly variable: string;
  readonly body: Expr;
}
