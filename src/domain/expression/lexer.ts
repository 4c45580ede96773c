import { Uint64 } from './value-kind.js';

export type Token =
  | { readonly type: 'int'; readonly value: bigint; readonly offset: number }
  | { readonly type: 'uint'; readonly value: Uint64; readonly offset: number }
  | { readonly type: 'double'; readonly value: number; readonly offset: number }
  | { readonly type: 'string'; readonly value: string; readonly offset: number }
  | { readonly type: 'bytes'; readonly value: Uint8Array; readonly offset: number }
  | { readonly type: 'ident'; readonly value: string; readonly offset: number }
  | { readonly type: 'punct'; readonly value: string; readonly offset: number }
  | { readonly type: 'eof'; readonly offset: number };

/** Thrown by the lexer and parser at the first syntax error. */
export class SyntaxFailure extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
    this.name = 'SyntaxFailure';
  }
}

/** Longest first, so `<=` is matched before `<`. */
const PUNCTUATORS = [
  '==', '!=', '<=', '>=', '&&', '||',
  '<', '>', '+', '-', '*', '/', '%', '!', '?', ':',
  '.', ',', '(', ')', '[', ']', '{', '}',
];

export const INT64_MAX = (1n << 63n) - 1n;
export const INT64_MIN = -(1n << 63n);

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  '`': '`',
  '?': '?',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';
const isIdentStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isIdentPart = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const peek = (ahead = 0): string => input.charAt(pos + ahead);

  while (pos < input.length) {
    const ch = peek();

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    // line comment
    if (ch === '/' && peek(1) === '/') {
      while (pos < input.length && peek() !== '\n') pos++;
      continue;
    }

    const start = pos;

    if (isDigit(ch) || (ch === '.' && isDigit(peek(1)))) {
      tokens.push(readNumber());
      continue;
    }

    if (isIdentStart(ch)) {
      const prefix = readPrefix();
      if (prefix !== null) {
        tokens.push(readQuoted(start, prefix.raw, prefix.bytes));
        continue;
      }
      while (pos < input.length && isIdentPart(peek())) pos++;
      tokens.push({ type: 'ident', value: input.slice(start, pos), offset: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      tokens.push(readQuoted(start, false, false));
      continue;
    }

    const punct = PUNCTUATORS.find((p) => input.startsWith(p, pos));
    if (punct === undefined) {
      throw new SyntaxFailure(`unexpected character '${ch}'`, pos);
    }
    pos += punct.length;
    tokens.push({ type: 'punct', value: punct, offset: start });
  }

  tokens.push({ type: 'eof', offset: input.length });
  return tokens;

  /** Detects `r"`, `b"`, `rb"`, `br"` string prefixes (either case) and consumes them. */
  function readPrefix(): { raw: boolean; bytes: boolean } | null {
    const match = /^([rRbB]{1,2})(?=["'])/.exec(input.slice(pos, pos + 3));
    if (match === null) return null;
    const letters = (match[1] ?? '').toLowerCase();
    if (letters.length === 2 && letters[0] === letters[1]) return null;
    pos += letters.length;
    return { raw: letters.includes('r'), bytes: letters.includes('b') };
  }

  function readNumber(): Token {
    const start = pos;

    if (peek() === '0' && (peek(1) === 'x' || peek(1) === 'X')) {
      pos += 2;
      const digitsStart = pos;
      while (/[0-9a-fA-F]/.test(peek())) pos++;
      if (pos === digitsStart) throw new SyntaxFailure('malformed hex literal', start);
      const value = BigInt(input.slice(start, pos));
      return integerToken(value, start);
    }

    while (isDigit(peek())) pos++;
    let isDouble = false;

    if (peek() === '.' && isDigit(peek(1))) {
      isDouble = true;
      pos++;
      while (isDigit(peek())) pos++;
    }

    if (peek() === 'e' || peek() === 'E') {
      const save = pos;
      pos++;
      if (peek() === '+' || peek() === '-') pos++;
      if (!isDigit(peek())) {
        pos = save;
      } else {
        isDouble = true;
        while (isDigit(peek())) pos++;
      }
    }

    const text = input.slice(start, pos);
    if (isDouble) {
      return { type: 'double', value: Number(text), offset: start };
    }
    return integerToken(BigInt(text), start);
  }

  function integerToken(value: bigint, start: number): Token {
    if (peek() === 'u' || peek() === 'U') {
      pos++;
      if (value > Uint64.MAX) throw new SyntaxFailure('uint literal out of range', start);
      return { type: 'uint', value: new Uint64(value), offset: start };
    }
    // INT64_MAX + 1 is accepted here so that unary minus can fold it into INT64_MIN
    if (value > INT64_MAX + 1n) throw new SyntaxFailure('int literal out of range', start);
    return { type: 'int', value, offset: start };
  }

  function readQuoted(start: number, raw: boolean, bytes: boolean): Token {
    const quote = peek();
    pos++;
    let text = '';

    while (true) {
      if (pos >= input.length || peek() === '\n') {
        throw new SyntaxFailure('unterminated string literal', start);
      }
      const ch = peek();
      if (ch === quote) {
        pos++;
        break;
      }
      if (ch === '\\' && !raw) {
        text += readEscape();
        continue;
      }
      text += ch;
      pos++;
    }

    if (bytes) {
      return { type: 'bytes', value: new TextEncoder().encode(text), offset: start };
    }
    return { type: 'string', value: text, offset: start };
  }

  function readEscape(): string {
    const start = pos;
    const kind = peek(1);
    const simple = SIMPLE_ESCAPES[kind];
    if (simple !== undefined) {
      pos += 2;
      return simple;
    }

    const width = kind === 'x' ? 2 : kind === 'u' ? 4 : kind === 'U' ? 8 : 0;
    if (width > 0) {
      const hex = input.slice(pos + 2, pos + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
        throw new SyntaxFailure('malformed escape sequence', start);
      }
      const code = Number.parseInt(hex, 16);
      if (code > 0x10ffff) throw new SyntaxFailure('escape sequence out of range', start);
      pos += 2 + width;
      return String.fromCodePoint(code);
    }

    const octal = input.slice(pos + 1, pos + 4);
    if (/^[0-3][0-7]{2}$/.test(octal)) {
      pos += 4;
      return String.fromCharCode(Number.parseInt(octal, 8));
    }

    throw new SyntaxFailure(`invalid escape sequence '\\${kind}'`, start);
  }
}
