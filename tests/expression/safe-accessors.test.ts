import { describe, it, expect } from 'vitest';
import { createDocumentQuery, safeAccessors } from '../../src/domain/expression/safe-accessors.js';
import type { FunctionDecl } from '../../src/domain/expression/functions.js';

const RAW = JSON.stringify({
  'user-agent': 'curl/8.0',
  geo: { country: 'NL', score: 0.9, vpn: false },
  hops: [{ ip: '10.0.0.1' }],
});

function impl(decls: FunctionDecl[], id: string): (args: readonly unknown[]) => unknown {
  for (const decl of decls) {
    const found = decl.overloads.find((o) => o.id === id);
    if (found !== undefined) return found.impl;
  }
  throw new Error(`overload ${id} not declared`);
}

describe('createDocumentQuery', () => {
  it('reads paths from the raw text', () => {
    const query = createDocumentQuery(RAW);
    expect(query('geo.country')).toEqual({ found: true, value: 'NL' });
    expect(query('hops[0].ip')).toEqual({ found: true, value: '10.0.0.1' });
  });

  it('finds nothing in an undecodable document', () => {
    const query = createDocumentQuery('{not json');
    expect(query('a')).toEqual({ found: false });
  });
});

describe('safeAccessors', () => {
  const decls = safeAccessors(RAW);

  it('declares exists and the three safe variants', () => {
    expect(decls.map((d) => [d.name, d.overloads.map((o) => o.id)])).toEqual([
      ['exists', ['string_exists_bool']],
      ['safe', ['safe_string', 'safe_double', 'safe_bool']],
    ]);
  });

  it('exists() reaches keys that are not identifiers', () => {
    const exists = impl(decls, 'string_exists_bool');
    expect(exists(['user-agent'])).toBe(true);
    expect(exists(['geo.region'])).toBe(false);
    expect(exists(['geo..country'])).toBe(false);
  });

  it('safe() returns the value when present with the default kind', () => {
    expect(impl(decls, 'safe_string')(['geo.country', 'unknown'])).toBe('NL');
    expect(impl(decls, 'safe_double')(['geo.score', 0])).toBe(0.9);
    expect(impl(decls, 'safe_bool')(['geo.vpn', true])).toBe(false);
  });

  it('safe() returns the default for absent paths and other kinds', () => {
    expect(impl(decls, 'safe_string')(['geo.region', 'unknown'])).toBe('unknown');
    expect(impl(decls, 'safe_double')(['geo.country', -1])).toBe(-1);
    expect(impl(decls, 'safe_bool')(['hops', true])).toBe(true);
    expect(impl(decls, 'safe_string')(['geo[', 'bad'])).toBe('bad');
  });
});
