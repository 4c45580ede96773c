import type {
  BinaryExpr,
  CallExpr,
  ComprehensionExpr,
  Expr,
  IndexExpr,
  SelectExpr,
} from './ast.js';
import { issueAt, type Issue } from './errors.js';
import type { Environment } from './environment.js';
import type { Overload } from './functions.js';
import {
  Kinds,
  classifyValue,
  formatKind,
  isAssignable,
  isDynamic,
  isNumeric,
  joinKinds,
  kindsEqual,
  type ValueKind,
} from './value-kind.js';

/** Type annotations produced by a successful check. */
export interface CheckedExpression {
  readonly source: string;
  readonly expr: Expr;
  readonly resultKind: ValueKind;
  /** Node id → kind of the sub-expression. */
  readonly kinds: ReadonlyMap<number, ValueKind>;
  /** Call node id → ids of the overloads that matched its argument kinds. */
  readonly overloads: ReadonlyMap<number, readonly string[]>;
}

export type CheckResult =
  | { readonly ok: true; readonly checked: CheckedExpression }
  | { readonly ok: false; readonly issues: readonly Issue[] };

const ORDERED_TAGS: ReadonlySet<string> = new Set(['string', 'bytes', 'bool', 'timestamp']);
const MAP_KEY_TAGS: ReadonlySet<string> = new Set(['string', 'int', 'uint', 'bool', 'dyn']);

const describeArgs = (kinds: readonly ValueKind[]): string => `(${kinds.map(formatKind).join(', ')})`;

/**
 * Resolves every identifier and call against `env` and infers a kind for
 * every node. All problems are collected; checking continues past an
 * error with the offending node typed as dyn.
 */
export function checkExpression(source: string, expr: Expr, env: Environment): CheckResult {
  const issues: Issue[] = [];
  const kinds = new Map<number, ValueKind>();
  const overloads = new Map<number, readonly string[]>();
  const scopes: Map<string, ValueKind>[] = [];

  const report = (node: Expr, message: string): ValueKind => {
    issues.push(issueAt(source, node.offset, message));
    return Kinds.Dyn;
  };

  function visit(node: Expr): ValueKind {
    const kind = infer(node);
    kinds.set(node.id, kind);
    return kind;
  }

  function infer(node: Expr): ValueKind {
    switch (node.type) {
      case 'literal':
        return classifyValue(node.value);
      case 'ident':
        return identifier(node.name, node);
      case 'select':
        return select(node);
      case 'index':
        return index(node);
      case 'call':
        return call(node);
      case 'unary': {
        const operand = visit(node.operand);
        if (node.op === '!') {
          if (isAssignable(Kinds.Bool, operand)) return Kinds.Bool;
        } else if (isDynamic(operand) || operand.tag === 'int' || operand.tag === 'double') {
          return operand;
        }
        return report(node, `no matching overload for '${node.op}' applied to ${describeArgs([operand])}`);
      }
      case 'binary':
        return binary(node);
      case 'logical': {
        const left = visit(node.left);
        const right = visit(node.right);
        if (isAssignable(Kinds.Bool, left) && isAssignable(Kinds.Bool, right)) return Kinds.Bool;
        return report(node, `no matching overload for '${node.op}' applied to ${describeArgs([left, right])}`);
      }
      case 'conditional': {
        const condition = visit(node.condition);
        const then = visit(node.then);
        const otherwise = visit(node.otherwise);
        if (!isAssignable(Kinds.Bool, condition)) {
          report(node.condition, `conditional requires a bool condition, got ${formatKind(condition)}`);
        }
        return joinKinds(then, otherwise);
      }
      case 'list': {
        let elem: ValueKind | null = null;
        for (const element of node.elements) {
          const kind = visit(element);
          elem = elem === null ? kind : joinKinds(elem, kind);
        }
        return Kinds.list(elem ?? Kinds.Dyn);
      }
      case 'map': {
        let key: ValueKind | null = null;
        let value: ValueKind | null = null;
        for (const entry of node.entries) {
          const k = visit(entry.key);
          const v = visit(entry.value);
          if (!MAP_KEY_TAGS.has(k.tag)) report(entry.key, `unsupported map key kind ${formatKind(k)}`);
          key = key === null ? k : joinKinds(key, k);
          value = value === null ? v : joinKinds(value, v);
        }
        return Kinds.map(key ?? Kinds.Dyn, value ?? Kinds.Dyn);
      }
      case 'comprehension':
        return comprehension(node);
    }
  }

  function identifier(name: string, node: Expr): ValueKind {
    for (let i = scopes.length - 1; i >= 0; i--) {
      const kind = scopes[i]?.get(name);
      if (kind !== undefined) return kind;
    }
    const binding = env.variables.get(name);
    if (binding !== undefined) return binding.kind;
    return report(node, `undeclared reference to '${name}'`);
  }

  function select(node: SelectExpr): ValueKind {
    const operand = visit(node.operand);
    const result = fieldKind(operand);
    if (result === null) {
      return report(node, `kind ${formatKind(operand)} does not support field selection`);
    }
    return node.test ? Kinds.Bool : result;
  }

  function fieldKind(operand: ValueKind): ValueKind | null {
    if (isDynamic(operand) || operand.tag === 'object') return Kinds.Dyn;
    if (operand.tag === 'map' && isAssignable(Kinds.String, operand.key)) return operand.value;
    return null;
  }

  function index(node: IndexExpr): ValueKind {
    const operand = visit(node.operand);
    const key = visit(node.index);

    if (isDynamic(operand)) return Kinds.Dyn;
    if (operand.tag === 'list') {
      if (isDynamic(key) || key.tag === 'int' || key.tag === 'uint') return operand.elem;
    } else if (operand.tag === 'map') {
      if (isAssignable(operand.key, key) || (isNumeric(operand.key) && isNumeric(key))) return operand.value;
    }
    return report(node, `no matching overload for '[]' applied to ${describeArgs([operand, key])}`);
  }

  function call(node: CallExpr): ValueKind {
    const argKinds: ValueKind[] = [];
    if (node.target !== null) argKinds.push(visit(node.target));
    for (const a of node.args) argKinds.push(visit(a));

    const decl = env.functions.get(node.fn);
    if (decl === undefined) {
      return report(node, `undeclared reference to '${node.fn}'`);
    }

    const receiver = node.target !== null;
    const candidates = decl.overloads.filter((o) => matches(o, receiver, argKinds));
    if (candidates.length === 0) {
      const style = receiver ? 'receiver ' : '';
      return report(node, `found no matching ${style}overload for '${node.fn}' applied to ${describeArgs(argKinds)}`);
    }

    overloads.set(node.id, candidates.map((o) => o.id));
    return candidates.map((o) => o.result).reduce(joinKinds);
  }

  function binary(node: BinaryExpr): ValueKind {
    const left = visit(node.left);
    const right = visit(node.right);
    const result = binaryKind(node.op, left, right);
    if (result === null) {
      return report(node, `no matching overload for '${node.op}' applied to ${describeArgs([left, right])}`);
    }
    return result;
  }

  function comprehension(node: ComprehensionExpr): ValueKind {
    const range = visit(node.range);
    let variable: ValueKind;
    if (isDynamic(range)) {
      variable = Kinds.Dyn;
    } else if (range.tag === 'list') {
      variable = range.elem;
    } else if (range.tag === 'map') {
      variable = range.key;
    } else {
      report(node.range, `${node.macro}() cannot iterate over ${formatKind(range)}`);
      variable = Kinds.Dyn;
    }

    scopes.push(new Map([[node.variable, variable]]));
    const body = visit(node.body);
    scopes.pop();

    if (node.macro === 'map') return Kinds.list(body);
    if (!isAssignable(Kinds.Bool, body)) {
      report(node.body, `${node.macro}() requires a bool predicate, got ${formatKind(body)}`);
    }
    if (node.macro === 'filter') return Kinds.list(variable);
    return Kinds.Bool;
  }

  const resultKind = visit(expr);
  if (issues.length > 0) return { ok: false, issues };
  return { ok: true, checked: { source, expr, resultKind, kinds, overloads } };
}

function matches(o: Overload, receiver: boolean, args: readonly ValueKind[]): boolean {
  return o.receiver === receiver
    && o.params.length === args.length
    && o.params.every((param, i) => {
      const actual = args[i];
      return actual !== undefined && isAssignable(param, actual);
    });
}

/** Result kind of a binary operator, or `null` when the operands don't fit. */
export function binaryKind(op: BinaryExpr['op'], left: ValueKind, right: ValueKind): ValueKind | null {
  const dynamic = isDynamic(left) || isDynamic(right);

  switch (op) {
    case '==':
    case '!=':
      if (dynamic || left.tag === 'null' || right.tag === 'null') return Kinds.Bool;
      if (isNumeric(left) && isNumeric(right)) return Kinds.Bool;
      return isAssignable(left, right) ? Kinds.Bool : null;

    case '<':
    case '<=':
    case '>':
    case '>=':
      if (isNumeric(left) && isNumeric(right)) return Kinds.Bool;
      if (dynamic) return orderable(isDynamic(left) ? right : left) ? Kinds.Bool : null;
      return left.tag === right.tag && ORDERED_TAGS.has(left.tag) ? Kinds.Bool : null;

    case 'in':
      if (isDynamic(right)) return Kinds.Bool;
      if (right.tag === 'list') {
        return isAssignable(right.elem, left) || (isNumeric(right.elem) && isNumeric(left)) ? Kinds.Bool : null;
      }
      if (right.tag === 'map') {
        return isAssignable(right.key, left) || (isNumeric(right.key) && isNumeric(left)) ? Kinds.Bool : null;
      }
      return null;

    case '+':
      if (dynamic) return addable(isDynamic(left) ? right : left) ? Kinds.Dyn : null;
      if (left.tag === 'list' && right.tag === 'list') return Kinds.list(joinKinds(left.elem, right.elem));
      if (!kindsEqual(left, right)) return null;
      return isNumeric(left) || left.tag === 'string' || left.tag === 'bytes' ? left : null;

    case '-':
    case '*':
    case '/':
    case '%': {
      const allowed = (k: ValueKind): boolean => isDynamic(k) || (isNumeric(k) && !(op === '%' && k.tag === 'double'));
      if (!allowed(left) || !allowed(right)) return null;
      if (dynamic) return isDynamic(left) ? right : left;
      return kindsEqual(left, right) ? left : null;
    }
  }
}

function orderable(kind: ValueKind): boolean {
  return isDynamic(kind) || isNumeric(kind) || ORDERED_TAGS.has(kind.tag);
}

function addable(kind: ValueKind): boolean {
  return isDynamic(kind) || isNumeric(kind) || kind.tag === 'string' || kind.tag === 'bytes' || kind.tag === 'list';
}
