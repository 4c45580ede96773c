import { describe, it, expect } from 'vitest';
import { buildEnvironment } from '../../src/domain/expression/environment.js';
import { EvaluationError } from '../../src/domain/expression/errors.js';
import { compile, evaluateProgram } from '../../src/domain/expression/program.js';
import { Kinds, Uint64 } from '../../src/domain/expression/value-kind.js';

const DOC = JSON.stringify({
  user: 'alice',
  age: 30,
  tags: ['admin', 'dev'],
  geo: { country: 'NL', city: 'Utrecht' },
  ratio: 0.5,
  when: '2026-02-18T12:00:00Z',
});

class Device {
  constructor(readonly id: string) {}
}

function run(expression: string, raw: string = DOC): unknown {
  const env = buildEnvironment(raw);
  return evaluateProgram(compile(expression, env), env.activation());
}

function runError(expression: string, raw: string = DOC): string {
  try {
    run(expression, raw);
  } catch (err: unknown) {
    if (err instanceof EvaluationError) return err.message;
    throw err;
  }
  throw new Error('expected an evaluation error');
}

describe('Interpreter', () => {
  describe('arithmetic', () => {
    it('computes int arithmetic with truncating division', () => {
      expect(run('7 / 2')).toBe(3n);
      expect(run('-7 % 3')).toBe(-1n);
      expect(run('2 * 3 + 1')).toBe(7n);
    });

    it('computes double arithmetic', () => {
      expect(run('ratio * 2.0')).toBe(1);
      expect(run('age / 4.0')).toBe(7.5);
    });

    it('computes uint arithmetic', () => {
      expect(run('3u + 4u')).toEqual(new Uint64(7n));
    });

    it('raises on int overflow', () => {
      expect(runError('9223372036854775807 + 1')).toBe('failed to evaluate program: integer overflow');
    });

    it('raises on division and modulus by zero', () => {
      expect(runError('1 / 0')).toBe('failed to evaluate program: division by zero');
      expect(runError('1 % 0')).toBe('failed to evaluate program: modulus by zero');
    });

    it('concatenates strings and lists', () => {
      expect(run('user + "!"')).toBe('alice!');
      expect(run('[1] + [2]')).toEqual([1n, 2n]);
    });
  });

  describe('comparison', () => {
    it('compares int and double by value', () => {
      expect(run('age == 30')).toBe(true);
      expect(run('age > 18')).toBe(true);
      expect(run('ratio < 1')).toBe(true);
    });

    it('orders strings lexically', () => {
      expect(run('user < "bob"')).toBe(true);
    });

    it('orders strings by code point beyond the basic plane', () => {
      // U+FF5E sorts before U+1F600, though its UTF-16 unit is above the surrogate 0xD83D
      const raw = JSON.stringify({ a: '\uff5e', b: '\u{1f600}' });
      expect(run('a < b', raw)).toBe(true);
      expect(run('b > a', raw)).toBe(true);
      expect(run('"a\u{1f600}" < "a\uff5e"')).toBe(false);
    });

    it('treats NaN as unordered', () => {
      expect(run('double("NaN") < 1.0')).toBe(false);
      expect(run('double("NaN") == double("NaN")')).toBe(false);
    });

    it('compares containers element-wise', () => {
      expect(run('tags == ["admin", "dev"]')).toBe(true);
      expect(run('geo == {"country": "NL", "city": "Utrecht"}')).toBe(true);
    });
  });

  describe('membership and selection', () => {
    it('checks list and map membership', () => {
      expect(run('"dev" in tags')).toBe(true);
      expect(run('"country" in geo')).toBe(true);
      expect(run('"region" in geo')).toBe(false);
    });

    it('selects and indexes', () => {
      expect(run('geo.country')).toBe('NL');
      expect(run('geo["city"]')).toBe('Utrecht');
      expect(run('tags[1]')).toBe('dev');
    });

    it('tests field presence with has()', () => {
      expect(run('has(geo.country)')).toBe(true);
      expect(run('has(geo.region)')).toBe(false);
    });

    it('selects only own fields of host objects', () => {
      const env = buildEnvironment('{}', [{ name: 'device', kind: Kinds.object('Device'), value: new Device('d-1') }]);
      const evaluate = (expression: string): unknown => evaluateProgram(compile(expression, env), env.activation());

      expect(evaluate('device.id == "d-1"')).toBe(true);
      expect(evaluate('has(device.constructor)')).toBe(false);
      expect(() => evaluate('device.toString == "x"')).toThrow('failed to evaluate program: no such field: toString');
    });

    it('raises for missing keys and bad indexes', () => {
      expect(runError('geo.region == "x"')).toBe('failed to evaluate program: no such key: region');
      expect(runError('tags[5] == "x"')).toBe('failed to evaluate program: index out of range: 5');
    });
  });

  describe('logical operators', () => {
    it('absorbs errors on either side', () => {
      expect(run('geo.region == "x" || true')).toBe(true);
      expect(run('false && geo.region == "x"')).toBe(false);
      expect(run('geo.region == "x" && false')).toBe(false);
    });

    it('propagates an error that is not absorbed', () => {
      expect(runError('geo.region == "x" || false')).toBe('failed to evaluate program: no such key: region');
    });
  });

  describe('comprehensions', () => {
    it('evaluates all, exists and exists_one', () => {
      expect(run('tags.all(t, size(t) > 2)')).toBe(true);
      expect(run('tags.exists(t, t == "dev")')).toBe(true);
      expect(run('tags.exists_one(t, t.startsWith("d"))')).toBe(true);
      expect(run('[].all(t, false)')).toBe(true);
    });

    it('maps and filters', () => {
      expect(run('[1, 2, 3].map(x, x * 2)')).toEqual([2n, 4n, 6n]);
      expect(run('[1, 2, 3].filter(x, x > 1)')).toEqual([2n, 3n]);
    });

    it('iterates map keys', () => {
      expect(run('geo.exists(k, k == "city")')).toBe(true);
    });
  });

  describe('functions', () => {
    it('measures size in code points', () => {
      expect(run('size("héllo")')).toBe(5n);
      expect(run('"ab".size()')).toBe(2n);
      expect(run('size(tags)')).toBe(2n);
    });

    it('matches regular expressions', () => {
      expect(run('user.matches("^a.*e$")')).toBe(true);
      expect(run('matches(user, "^b")')).toBe(false);
    });

    it('reports an invalid regular expression', () => {
      expect(runError('user.matches("(")')).toBe('failed to evaluate program: invalid regular expression: (');
    });

    it('converts between kinds', () => {
      expect(run('int("42")')).toBe(42n);
      expect(run('int(ratio * 5.0)')).toBe(2n);
      expect(run('string(12)')).toBe('12');
      expect(run('bool("true")')).toBe(true);
      expect(run('timestamp(when) > timestamp("2026-01-01T00:00:00Z")')).toBe(true);
    });

    it('dispatches dyn arguments at run time', () => {
      expect(run('size(geo.country)')).toBe(2n);
      expect(run('int(dyn(age))')).toBe(30n);
    });

    it('raises on failed conversions', () => {
      expect(runError('int("forty")')).toBe('failed to evaluate program: cannot convert "forty" to int');
    });
  });

  it('evaluates conditionals lazily', () => {
    expect(run('age > 18 ? "adult" : geo.region')).toBe('adult');
  });

  it('rejects duplicate keys in map literals', () => {
    expect(runError('{"a": 1, "a": 2}.size() == 1')).toBe('failed to evaluate program: duplicate map key: a');
  });
});
