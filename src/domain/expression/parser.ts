import type {
  ArithmeticOp,
  ComprehensionMacro,
  Expr,
  MapEntry,
  RelationOp,
} from './ast.js';
import { issueAt, type Issue } from './errors.js';
import { INT64_MAX, SyntaxFailure, tokenize, type Token } from './lexer.js';

/** Words that can never name a variable or field. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'true', 'false', 'null', 'in',
  'as', 'break', 'const', 'continue', 'else', 'for', 'function', 'if',
  'import', 'let', 'loop', 'package', 'namespace', 'return', 'var', 'void', 'while',
]);

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Whether `name` can be referenced as a plain identifier in an expression. */
export function isValidIdentifier(name: string): boolean {
  return IDENT_RE.test(name) && !RESERVED_WORDS.has(name);
}

const COMPREHENSION_MACROS: ReadonlySet<string> = new Set<ComprehensionMacro>([
  'all', 'exists', 'exists_one', 'filter', 'map',
]);

const RELATION_OPS: ReadonlySet<string> = new Set<RelationOp>(['==', '!=', '<', '<=', '>', '>=']);

/** Nesting deeper than this is rejected before it can exhaust the call stack. */
const MAX_DEPTH = 200;

export type ParseResult =
  | { readonly ok: true; readonly expr: Expr; readonly nodeCount: number }
  | { readonly ok: false; readonly issues: readonly Issue[] };

/**
 * Parses expression text into an AST.
 *
 * Recursive descent, one function per precedence level:
 * conditional → or → and → relation → addition → multiplication → unary → member → primary.
 * `has()` and the list macros are expanded here.
 */
export function parse(source: string): ParseResult {
  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (err: unknown) {
    if (err instanceof SyntaxFailure) {
      return { ok: false, issues: [issueAt(source, err.offset, err.message)] };
    }
    throw err;
  }

  let pos = 0;
  let nextId = 1;
  let depth = 0;

  const id = (): number => nextId++;

  function peek(): Token {
    return tokens[pos] ?? tokens[tokens.length - 1] ?? { type: 'eof', offset: source.length };
  }

  function consume(): Token {
    const t = peek();
    if (t.type !== 'eof') pos++;
    return t;
  }

  function isPunct(value: string): boolean {
    const t = peek();
    return t.type === 'punct' && t.value === value;
  }

  function expect(value: string): Token {
    if (!isPunct(value)) {
      throw new SyntaxFailure(`expected '${value}' but found ${describe(peek())}`, peek().offset);
    }
    return consume();
  }

  function enter(offset: number): void {
    depth++;
    if (depth > MAX_DEPTH) throw new SyntaxFailure('expression nesting exceeds limit', offset);
  }

  function parseConditional(): Expr {
    const start = peek().offset;
    enter(start);
    const condition = parseOr();
    let result = condition;
    if (isPunct('?')) {
      consume();
      const then = parseOr();
      expect(':');
      const otherwise = parseConditional();
      result = { type: 'conditional', id: id(), offset: start, condition, then, otherwise };
    }
    depth--;
    return result;
  }

  // Operator loops build left-nested trees: every iteration is one more
  // level the checker and interpreter recurse through.

  function parseOr(): Expr {
    let left = parseAnd();
    let nested = 0;
    while (isPunct('||')) {
      enter(consume().offset);
      nested++;
      left = { type: 'logical', id: id(), offset: left.offset, op: '||', left, right: parseAnd() };
    }
    depth -= nested;
    return left;
  }

  function parseAnd(): Expr {
    let left = parseRelation();
    let nested = 0;
    while (isPunct('&&')) {
      enter(consume().offset);
      nested++;
      left = { type: 'logical', id: id(), offset: left.offset, op: '&&', left, right: parseRelation() };
    }
    depth -= nested;
    return left;
  }

  function parseRelation(): Expr {
    let left = parseAddition();
    let nested = 0;
    while (true) {
      const t = peek();
      let op: RelationOp;
      if (t.type === 'punct' && RELATION_OPS.has(t.value)) {
        op = relationOp(t.value);
      } else if (t.type === 'ident' && t.value === 'in') {
        op = 'in';
      } else {
        depth -= nested;
        return left;
      }
      enter(consume().offset);
      nested++;
      left = { type: 'binary', id: id(), offset: left.offset, op, left, right: parseAddition() };
    }
  }

  function parseAddition(): Expr {
    let left = parseMultiplication();
    let nested = 0;
    while (isPunct('+') || isPunct('-')) {
      const t = consume();
      enter(t.offset);
      nested++;
      left = { type: 'binary', id: id(), offset: left.offset, op: arithmeticOp(t), left, right: parseMultiplication() };
    }
    depth -= nested;
    return left;
  }

  function parseMultiplication(): Expr {
    let left = parseUnary();
    let nested = 0;
    while (isPunct('*') || isPunct('/') || isPunct('%')) {
      const t = consume();
      enter(t.offset);
      nested++;
      left = { type: 'binary', id: id(), offset: left.offset, op: arithmeticOp(t), left, right: parseUnary() };
    }
    depth -= nested;
    return left;
  }

  function parseUnary(): Expr {
    const t = peek();
    if (isPunct('!')) {
      consume();
      enter(t.offset);
      const operand = parseUnary();
      depth--;
      return { type: 'unary', id: id(), offset: t.offset, op: '!', operand };
    }
    if (isPunct('-')) {
      consume();
      const next = peek();
      // fold `-<int literal>` so INT64_MIN can be written
      if (next.type === 'int' && !isMemberStart(tokens[pos + 1])) {
        consume();
        return parseMemberChain({ type: 'literal', id: id(), offset: t.offset, value: -next.value });
      }
      enter(t.offset);
      const operand = parseUnary();
      depth--;
      return { type: 'unary', id: id(), offset: t.offset, op: '-', operand };
    }
    return parseMember();
  }

  function parseMember(): Expr {
    return parseMemberChain(parsePrimary());
  }

  function parseMemberChain(start: Expr): Expr {
    let expr = start;
    let nested = 0;
    while (true) {
      if (isPunct('.')) {
        enter(consume().offset);
        nested++;
        const name = consume();
        if (name.type !== 'ident') {
          throw new SyntaxFailure(`expected field name but found ${describe(name)}`, name.offset);
        }
        if (isPunct('(')) {
          consume();
          const args = parseArgs(')');
          expr = receiverCall(expr, name.value, args);
        } else {
          expr = { type: 'select', id: id(), offset: expr.offset, operand: expr, field: name.value, test: false };
        }
        continue;
      }
      if (isPunct('[')) {
        enter(consume().offset);
        nested++;
        const index = parseConditional();
        expect(']');
        expr = { type: 'index', id: id(), offset: expr.offset, operand: expr, index };
        continue;
      }
      depth -= nested;
      return expr;
    }
  }

  function parsePrimary(): Expr {
    const t = consume();
    switch (t.type) {
      case 'int':
        if (t.value > INT64_MAX) throw new SyntaxFailure('int literal out of range', t.offset);
        return { type: 'literal', id: id(), offset: t.offset, value: t.value };
      case 'uint':
      case 'double':
      case 'string':
      case 'bytes':
        return { type: 'literal', id: id(), offset: t.offset, value: t.value };
      case 'ident':
        return parseIdentifier(t.value, t.offset);
      case 'punct':
        if (t.value === '(') {
          const inner = parseConditional();
          expect(')');
          return inner;
        }
        if (t.value === '[') {
          const elements = parseArgs(']');
          return { type: 'list', id: id(), offset: t.offset, elements };
        }
        if (t.value === '{') {
          return { type: 'map', id: id(), offset: t.offset, entries: parseEntries() };
        }
        throw new SyntaxFailure(`unexpected '${t.value}'`, t.offset);
      case 'eof':
        throw new SyntaxFailure('unexpected end of input', t.offset);
    }
  }

  function parseIdentifier(name: string, offset: number): Expr {
    switch (name) {
      case 'true': return { type: 'literal', id: id(), offset, value: true };
      case 'false': return { type: 'literal', id: id(), offset, value: false };
      case 'null': return { type: 'literal', id: id(), offset, value: null };
      default: break;
    }
    if (RESERVED_WORDS.has(name)) {
      throw new SyntaxFailure(`reserved word '${name}' cannot be used as an identifier`, offset);
    }
    if (isPunct('(')) {
      consume();
      const args = parseArgs(')');
      if (name === 'has') return hasMacro(args, offset);
      return { type: 'call', id: id(), offset, fn: name, target: null, args };
    }
    return { type: 'ident', id: id(), offset, name };
  }

  function parseArgs(close: ')' | ']'): Expr[] {
    const args: Expr[] = [];
    while (!isPunct(close)) {
      args.push(parseConditional());
      if (!isPunct(',')) break;
      consume();
    }
    expect(close);
    return args;
  }

  function parseEntries(): MapEntry[] {
    const entries: MapEntry[] = [];
    while (!isPunct('}')) {
      const key = parseConditional();
      expect(':');
      const value = parseConditional();
      entries.push({ key, value });
      if (!isPunct(',')) break;
      consume();
    }
    expect('}');
    return entries;
  }

  function hasMacro(args: Expr[], offset: number): Expr {
    const [arg] = args;
    if (args.length !== 1 || arg === undefined || arg.type !== 'select') {
      throw new SyntaxFailure('has() requires a single field selection argument', offset);
    }
    return { ...arg, id: id(), offset, test: true };
  }

  function receiverCall(target: Expr, fn: string, args: Expr[]): Expr {
    const [variable, body] = args;
    if (COMPREHENSION_MACROS.has(fn) && args.length === 2 && variable !== undefined && body !== undefined) {
      if (variable.type !== 'ident') {
        throw new SyntaxFailure(`${fn}() requires a variable name as its first argument`, variable.offset);
      }
      return {
        type: 'comprehension',
        id: id(),
        offset: target.offset,
        macro: comprehensionMacro(fn),
        range: target,
        variable: variable.name,
        body,
      };
    }
    return { type: 'call', id: id(), offset: target.offset, fn, target, args };
  }

  try {
    const expr = parseConditional();
    const rest = peek();
    if (rest.type !== 'eof') {
      throw new SyntaxFailure(`unexpected ${describe(rest)} after end of expression`, rest.offset);
    }
    return { ok: true, expr, nodeCount: nextId - 1 };
  } catch (err: unknown) {
    if (err instanceof SyntaxFailure) {
      return { ok: false, issues: [issueAt(source, err.offset, err.message)] };
    }
    throw err;
  }
}

function isMemberStart(t: Token | undefined): boolean {
  return t !== undefined && t.type === 'punct' && (t.value === '.' || t.value === '[');
}

function describe(t: Token): string {
  switch (t.type) {
    case 'eof': return 'end of input';
    case 'punct': return `'${t.value}'`;
    case 'ident': return `'${t.value}'`;
    default: return `${t.type} literal`;
  }
}

const RELATION_OP_LIST = ['==', '!=', '<', '<=', '>', '>='] as const;
const ARITHMETIC_OP_LIST = ['+', '-', '*', '/', '%'] as const;
const MACRO_LIST = ['all', 'exists', 'exists_one', 'filter', 'map'] as const;

function relationOp(value: string): RelationOp {
  const op = RELATION_OP_LIST.find((candidate) => candidate === value);
  if (op === undefined) throw new SyntaxFailure(`unknown operator '${value}'`, 0);
  return op;
}

function arithmeticOp(t: Token): ArithmeticOp {
  const op = t.type === 'punct' ? ARITHMETIC_OP_LIST.find((candidate) => candidate === t.value) : undefined;
  if (op === undefined) {
    throw new SyntaxFailure(`expected arithmetic operator but found ${describe(t)}`, t.offset);
  }
  return op;
}

function comprehensionMacro(fn: string): ComprehensionMacro {
  const macro = MACRO_LIST.find((candidate) => candidate === fn);
  if (macro === undefined) throw new SyntaxFailure(`unknown macro '${fn}'`, 0);
  return macro;
}
