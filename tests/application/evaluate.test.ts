import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { evaluateExpression, evaluateOrThrow } from '../../src/application/evaluate.js';
import { ProgramCache } from '../../src/application/program-cache.js';
import {
  CompileError,
  EnvironmentBuildError,
  NilInputError,
  Kinds,
  type ExpressionErrorCode,
} from '../../src/domain/expression/index.js';
import type { Verdict } from '../../src/application/evaluate.js';

function errorCode(verdict: Verdict): ExpressionErrorCode | null {
  return verdict.ok ? null : verdict.error.code;
}

describe('evaluateExpression', () => {
  it('matches on top-level keys and safe() defaults', () => {
    const verdict = evaluateExpression(
      '{"user":"alice","age":30}',
      'age > 18 && safe("role","guest") == "guest"',
    );
    expect(verdict).toEqual({ ok: true, matched: true });
  });

  it('answers exists() from the raw document', () => {
    expect(evaluateExpression('{"a":{"b":1}}', 'exists("a.b") && !exists("a.c")'))
      .toEqual({ ok: true, matched: true });
  });

  it('falls back to the safe() default on a kind mismatch', () => {
    expect(evaluateExpression('{"score":"notanumber"}', 'safe("score", 0.0) == 0.0'))
      .toEqual({ ok: true, matched: true });
  });

  it('reaches keys that are not identifiers through exists()', () => {
    expect(evaluateExpression('{"user-agent":"curl/8.0"}', 'exists("user-agent")'))
      .toEqual({ ok: true, matched: true });
  });

  it('returns false verdicts as matches of false', () => {
    expect(evaluateExpression('{"age":12}', 'age > 18')).toEqual({ ok: true, matched: false });
  });

  it.each([null, undefined])('reports nil input for %s regardless of the expression', (data) => {
    expect(errorCode(evaluateExpression(data, 'true'))).toBe('NIL_INPUT');
    expect(errorCode(evaluateExpression(data, 'this is ( not valid'))).toBe('NIL_INPUT');
  });

  it('reports undecodable documents', () => {
    const verdict = evaluateExpression('{oops', 'true');
    expect(errorCode(verdict)).toBe('PAYLOAD_PARSE');
    expect(verdict.ok ? '' : verdict.error.message).toBe('cannot unmarshal data');
  });

  it('reports undeclared identifiers at compile time, never at evaluation', () => {
    const verdict = evaluateExpression('{"a":1}', 'b == 1');
    expect(errorCode(verdict)).toBe('COMPILE');
    expect(verdict.ok ? '' : verdict.error.message)
      .toBe("failed to compile expression: 1:1: undeclared reference to 'b'");
  });

  it('reports non-boolean results', () => {
    const verdict = evaluateExpression('{"a":1}', '1 + 2');
    expect(errorCode(verdict)).toBe('NON_BOOLEAN_RESULT');
    expect(verdict.ok ? '' : verdict.error.message).toBe('output type is not boolean: int');
  });

  it('reports evaluation failures', () => {
    const verdict = evaluateExpression('{"geo":{}}', 'geo.country == "NL"');
    expect(errorCode(verdict)).toBe('EVALUATION');
    expect(verdict.ok ? '' : verdict.error.message).toBe('failed to evaluate program: no such key: country');
  });

  it('reports an unbound declaration as an evaluation failure', () => {
    const verdict = evaluateExpression('{}', 'tenant == "acme"', {
      declarations: [{ name: 'tenant', kind: Kinds.String }],
    });
    expect(errorCode(verdict)).toBe('EVALUATION');
  });

  it('reports invalid declarations', () => {
    const verdict = evaluateExpression('{}', 'true', {
      declarations: [{ name: 'limit', kind: Kinds.Int, value: 'ten' }],
    });
    expect(errorCode(verdict)).toBe('ENVIRONMENT_BUILD');
  });

  it('reports an over-long operator chain as a compile error', () => {
    const verdict = evaluateExpression('{"a":false}', Array(20000).fill('a').join(' || '));
    expect(errorCode(verdict)).toBe('COMPILE');
    expect(verdict.ok ? '' : verdict.error.message)
      .toBe('failed to compile expression: 1:998: expression nesting exceeds limit');
  });

  it('reports deeply nested parentheses as a compile error', () => {
    const verdict = evaluateExpression('{"a":true}', `${'('.repeat(5000)}a${')'.repeat(5000)}`);
    expect(errorCode(verdict)).toBe('COMPILE');
  });

  it('evaluates a long chain below the nesting limit', () => {
    const expression = [...Array(150).fill('a'), 'b'].join(' || ');
    expect(evaluateExpression('{"a":false,"b":true}', expression)).toEqual({ ok: true, matched: true });
  });

  it('orders strings outside the basic plane by code point', () => {
    expect(evaluateExpression('{"a":"\uff5e","b":"\ud83d\ude00"}', 'a < b')).toEqual({ ok: true, matched: true });
  });

  it('evaluates against host declarations', () => {
    const verdict = evaluateExpression('{"attempts":7}', 'attempts > threshold', {
      declarations: [{ name: 'threshold', kind: Kinds.Int, value: 5n }],
    });
    expect(verdict).toEqual({ ok: true, matched: true });
  });
});

describe('evaluateOrThrow', () => {
  it('returns the boolean result', () => {
    expect(evaluateOrThrow('{"x":true}', 'x')).toBe(true);
  });

  it('throws the stage error', () => {
    expect(() => evaluateOrThrow(null, 'true')).toThrow(NilInputError);
    expect(() => evaluateOrThrow('{}', 'x')).toThrow(CompileError);
    expect(() => evaluateOrThrow('{}', 'true', {
      declarations: [{ name: 'in', kind: Kinds.Bool, value: true }],
    })).toThrow(EnvironmentBuildError);
  });
});

describe('evaluateExpression with a cache', () => {
  it('reuses a checked expression for documents with the same signature', () => {
    const cache = new ProgramCache(10);
    expect(evaluateExpression('{"age":30}', 'age > 18', { cache })).toEqual({ ok: true, matched: true });
    expect(evaluateExpression('{"age":12}', 'age > 18', { cache })).toEqual({ ok: true, matched: false });
    expect(cache.size).toBe(1);
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(1);
  });

  it('checks again when the document kinds change', () => {
    const cache = new ProgramCache(10);
    evaluateExpression('{"age":30}', 'age > 18', { cache });
    const verdict = evaluateExpression('{"age":"thirty"}', 'age > 18', { cache });
    expect(errorCode(verdict)).toBe('COMPILE');
    expect(cache.size).toBe(1);
    expect(cache.misses).toBe(2);
  });

  it('binds cached expressions to the current document', () => {
    const cache = new ProgramCache(10);
    evaluateExpression('{"a":{"b":1}}', 'exists("a.b")', { cache });
    expect(evaluateExpression('{"a":{"c":1}}', 'exists("a.b")', { cache })).toEqual({ ok: true, matched: false });
    expect(cache.hits).toBe(1);
  });
});

// ============================================
// Property: agreement with a reference evaluator
// ============================================

type Comparison = '==' | '!=' | '<' | '<=' | '>' | '>=';
type Join = '&&' | '||';

const comparisonArbitrary = fc.constantFrom<Comparison>('==', '!=', '<', '<=', '>', '>=');
const joinArbitrary = fc.constantFrom<Join>('&&', '||');

/** Mixes printable ASCII with characters on and beyond the basic plane. */
const textArbitrary = fc.oneof(
  fc.string({ maxLength: 8 }),
  fc.array(fc.constantFrom('a', 'Z', '"', '\\', '\u00e9', '\uff5e', '\u{1f600}', '\u{10348}'), { maxLength: 6 })
    .map((chars) => chars.join('')),
);

const caseArbitrary = fc.record({
  s: textArbitrary,
  literal: textArbitrary,
  n: fc.integer({ min: -1000, max: 1000 }),
  m: fc.integer({ min: -1000, max: 1000 }),
  b: fc.boolean(),
  negate: fc.boolean(),
  stringOp: comparisonArbitrary,
  numberOp: comparisonArbitrary,
  first: joinArbitrary,
  second: joinArbitrary,
});

function codePointOrder(a: string, b: string): number {
  const x = Array.from(a, (c) => c.codePointAt(0) ?? 0);
  const y = Array.from(b, (c) => c.codePointAt(0) ?? 0);
  for (let i = 0; i < Math.min(x.length, y.length); i++) {
    const left = x[i] ?? 0;
    const right = y[i] ?? 0;
    if (left !== right) return left < right ? -1 : 1;
  }
  return Math.sign(x.length - y.length);
}

function holds(op: Comparison, order: number): boolean {
  switch (op) {
    case '==': return order === 0;
    case '!=': return order !== 0;
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

/** && binds tighter than ||. */
function combine(terms: [boolean, boolean, boolean], first: Join, second: Join): boolean {
  const [t1, t2, t3] = terms;
  if (first === '&&') return second === '&&' ? t1 && t2 && t3 : (t1 && t2) || t3;
  return second === '&&' ? t1 || (t2 && t3) : t1 || t2 || t3;
}

describe('evaluateExpression against a reference evaluator', () => {
  it('agrees on comparisons over top-level keys', () => {
    fc.assert(
      fc.property(caseArbitrary, (c) => {
        const data = JSON.stringify({ s: c.s, n: c.n, b: c.b });
        const expression = [
          `s ${c.stringOp} ${JSON.stringify(c.literal)}`,
          c.first,
          `n ${c.numberOp} ${c.m}`,
          c.second,
          c.negate ? '!b' : 'b',
        ].join(' ');

        const expected = combine(
          [
            holds(c.stringOp, codePointOrder(c.s, c.literal)),
            holds(c.numberOp, Math.sign(c.n - c.m)),
            c.negate ? !c.b : c.b,
          ],
          c.first,
          c.second,
        );

        expect(evaluateExpression(data, expression)).toEqual({ ok: true, matched: expected });
      }),
    );
  });
});
