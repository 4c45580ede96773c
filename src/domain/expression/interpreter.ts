import type { BinaryExpr, CallExpr, ComprehensionExpr, Expr, LogicalExpr } from './ast.js';
import type { CheckedExpression } from './checker.js';
import type { Activation, Environment } from './environment.js';
import { EvaluationError } from './errors.js';
import type { Overload } from './functions.js';
import { Uint64, classifyValue, isAssignable } from './value-kind.js';
import {
  checkedInt,
  checkedUint,
  compareValues,
  isMapValue,
  kindName,
  mapKeys,
  mapLookup,
  numericValue,
  valuesEqual,
} from './values.js';

type Scope = ReadonlyMap<string, unknown>;

/**
 * Tree-walking evaluator over a checked expression.
 *
 * Kinds were settled by the checker; the run-time checks here only fire
 * for dyn values.
 */
export class Interpreter {
  private readonly scopes: Scope[] = [];

  constructor(
    private readonly checked: CheckedExpression,
    private readonly environment: Environment,
    private readonly activation: Activation,
  ) {}

  run(): unknown {
    return this.eval(this.checked.expr);
  }

  private eval(node: Expr): unknown {
    switch (node.type) {
      case 'literal':
        return node.value;
      case 'ident':
        return this.resolve(node.name);
      case 'select':
        return this.select(this.eval(node.operand), node.field, node.test);
      case 'index':
        return this.index(this.eval(node.operand), this.eval(node.index));
      case 'call':
        return this.call(node);
      case 'unary':
        return this.unary(node.op, this.eval(node.operand));
      case 'binary':
        return this.binary(node);
      case 'logical':
        return this.logical(node);
      case 'conditional': {
        const condition = this.eval(node.condition);
        if (typeof condition !== 'boolean') {
          throw new EvaluationError(`conditional requires a bool condition, got ${kindName(condition)}`);
        }
        return condition ? this.eval(node.then) : this.eval(node.otherwise);
      }
      case 'list':
        return node.elements.map((element) => this.eval(element));
      case 'map': {
        const map = new Map<unknown, unknown>();
        for (const entry of node.entries) {
          const key = this.eval(entry.key);
          if (mapLookup(map, key).found) {
            throw new EvaluationError(`duplicate map key: ${String(key)}`);
          }
          map.set(key, this.eval(entry.value));
        }
        return map;
      }
      case 'comprehension':
        return this.comprehension(node);
    }
  }

  private resolve(name: string): unknown {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope?.has(name)) return scope.get(name);
    }
    const binding = this.activation.resolve(name);
    if (binding === undefined || !binding.bound) {
      throw new EvaluationError(`no such attribute: ${name}`);
    }
    return binding.value;
  }

  private select(operand: unknown, field: string, test: boolean): unknown {
    if (isMapValue(operand)) {
      const result = mapLookup(operand, field);
      if (test) return result.found;
      if (!result.found) throw new EvaluationError(`no such key: ${field}`);
      return result.value;
    }

    if (typeof operand === 'object' && operand !== null && !Array.isArray(operand)) {
      const present = Object.hasOwn(operand, field);
      if (test) return present;
      if (!present) throw new EvaluationError(`no such field: ${field}`);
      return Reflect.get(operand, field);
    }

    throw new EvaluationError(`kind ${kindName(operand)} does not support field selection`);
  }

  private index(operand: unknown, key: unknown): unknown {
    if (Array.isArray(operand)) {
      const n = numericValue(key);
      const i = typeof n === 'number' && Number.isInteger(n) ? n : typeof n === 'bigint' ? Number(n) : null;
      if (i === null) throw new EvaluationError(`invalid list index: ${kindName(key)}`);
      if (i < 0 || i >= operand.length) {
        throw new EvaluationError(`index out of range: ${i}`);
      }
      return operand[i];
    }

    if (isMapValue(operand)) {
      const result = mapLookup(operand, key);
      if (!result.found) throw new EvaluationError(`no such key: ${String(key)}`);
      return result.value;
    }

    throw new EvaluationError(`no matching overload for '[]' applied to (${kindName(operand)}, ${kindName(key)})`);
  }

  private call(node: CallExpr): unknown {
    const args: unknown[] = [];
    if (node.target !== null) args.push(this.eval(node.target));
    for (const a of node.args) args.push(this.eval(a));

    const ids = this.checked.overloads.get(node.id) ?? [];
    const candidates = ids
      .map((id) => this.environment.findOverload(id))
      .filter((o): o is Overload => o !== undefined);

    const chosen = candidates.length === 1
      ? candidates[0]
      : candidates.find((o) => o.params.every((param, i) => isAssignable(param, classifyValue(args[i]))));

    if (chosen === undefined) {
      throw new EvaluationError(
        `no matching overload for '${node.fn}' applied to (${args.map(kindName).join(', ')})`,
      );
    }

    try {
      return chosen.impl(args);
    } catch (err: unknown) {
      if (err instanceof EvaluationError) throw err;
      throw new EvaluationError(`function '${node.fn}' failed`, { overload: chosen.id }, { cause: err });
    }
  }

  private unary(op: '!' | '-', value: unknown): unknown {
    if (op === '!') {
      if (typeof value !== 'boolean') throw new EvaluationError(`no matching overload for '!' applied to (${kindName(value)})`);
      return !value;
    }
    if (typeof value === 'bigint') return checkedInt(-value);
    if (typeof value === 'number') return -value;
    throw new EvaluationError(`no matching overload for '-' applied to (${kindName(value)})`);
  }

  private binary(node: BinaryExpr): unknown {
    const left = this.eval(node.left);
    const right = this.eval(node.right);

    switch (node.op) {
      case '==': return valuesEqual(left, right);
      case '!=': return !valuesEqual(left, right);
      case '<': return compareValues(left, right, node.op) < 0;
      case '<=': return compareValues(left, right, node.op) <= 0;
      case '>': return compareValues(left, right, node.op) > 0;
      case '>=': return compareValues(left, right, node.op) >= 0;
      case 'in': return contains(right, left);
      default: return arithmetic(node.op, left, right);
    }
  }

  /**
   * `&&` and `||` are commutative over errors: `false && <error>` is false
   * and `true || <error>` is true, whichever side the error is on.
   */
  private logical(node: LogicalExpr): boolean {
    const absorbing = node.op === '||';
    let failure: EvaluationError | null = null;

    for (const side of [node.left, node.right]) {
      try {
        const value = this.eval(side);
        if (typeof value !== 'boolean') {
          throw new EvaluationError(`no matching overload for '${node.op}' applied to (${kindName(value)})`);
        }
        if (value === absorbing) return absorbing;
      } catch (err: unknown) {
        if (!(err instanceof EvaluationError)) throw err;
        failure ??= err;
      }
    }

    if (failure !== null) throw failure;
    return !absorbing;
  }

  private comprehension(node: ComprehensionExpr): unknown {
    const range = this.eval(node.range);
    let items: unknown[];
    if (Array.isArray(range)) {
      items = range;
    } else if (isMapValue(range)) {
      items = mapKeys(range);
    } else {
      throw new EvaluationError(`${node.macro}() cannot iterate over ${kindName(range)}`);
    }

    const predicate = (item: unknown): boolean => {
      const value = this.withScope(node.variable, item, node.body);
      if (typeof value !== 'boolean') {
        throw new EvaluationError(`${node.macro}() requires a bool predicate, got ${kindName(value)}`);
      }
      return value;
    };

    switch (node.macro) {
      case 'map':
        return items.map((item) => this.withScope(node.variable, item, node.body));
      case 'filter':
        return items.filter(predicate);
      case 'exists_one':
        return items.filter(predicate).length === 1;
      case 'all':
      case 'exists': {
        // same error absorption as && (all) and || (exists)
        const absorbing = node.macro === 'exists';
        let failure: EvaluationError | null = null;
        for (const item of items) {
          try {
            if (predicate(item) === absorbing) return absorbing;
          } catch (err: unknown) {
            if (!(err instanceof EvaluationError)) throw err;
            failure ??= err;
          }
        }
        if (failure !== null) throw failure;
        return !absorbing;
      }
    }
  }

  private withScope(name: string, value: unknown, body: Expr): unknown {
    this.scopes.push(new Map([[name, value]]));
    try {
      return this.eval(body);
    } finally {
      this.scopes.pop();
    }
  }
}

function contains(container: unknown, item: unknown): boolean {
  if (Array.isArray(container)) return container.some((element: unknown) => valuesEqual(element, item));
  if (isMapValue(container)) return mapLookup(container, item).found;
  throw new EvaluationError(`no matching overload for 'in' applied to (${kindName(item)}, ${kindName(container)})`);
}

function arithmetic(op: '+' | '-' | '*' | '/' | '%', left: unknown, right: unknown): unknown {
  if (typeof left === 'bigint' && typeof right === 'bigint') {
    if ((op === '/' || op === '%') && right === 0n) {
      throw new EvaluationError(op === '/' ? 'division by zero' : 'modulus by zero');
    }
    return checkedInt(integerOp(op, left, right));
  }

  if (left instanceof Uint64 && right instanceof Uint64) {
    if ((op === '/' || op === '%') && right.value === 0n) {
      throw new EvaluationError(op === '/' ? 'division by zero' : 'modulus by zero');
    }
    return checkedUint(integerOp(op, left.value, right.value));
  }

  if (typeof left === 'number' && typeof right === 'number' && op !== '%') {
    switch (op) {
      case '+': return left + right;
      case '-': return left - right;
      case '*': return left * right;
      case '/': return left / right;
    }
  }

  if (op === '+') {
    if (typeof left === 'string' && typeof right === 'string') return left + right;
    if (left instanceof Uint8Array && right instanceof Uint8Array) {
      const joined = new Uint8Array(left.length + right.length);
      joined.set(left);
      joined.set(right, left.length);
      return joined;
    }
    if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
  }

  throw new EvaluationError(`no matching overload for '${op}' applied to (${kindName(left)}, ${kindName(right)})`);
}

function integerOp(op: '+' | '-' | '*' | '/' | '%', a: bigint, b: bigint): bigint {
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/': return a / b;
    case '%': return a % b;
  }
}
