import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/server.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../../src/infrastructure/config/engine-config.js';

const CONFIG: EngineConfig = {
  server: { ...DEFAULT_CONFIG.server },
  engine: { program_cache_size: 100, disabled_rules: ['muted'] },
};

describe('HTTP routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildServer(CONFIG, { logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /api/v1/health', () => {
    it('reports status and cache counters', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok', cache: { size: 0, hits: 0, misses: 0 } });
    });
  });

  describe('POST /api/v1/evaluate', () => {
    it('evaluates against a JSON text document', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: {
          expression: 'age > 18 && safe("role", "guest") == "guest"',
          data: '{"user":"alice","age":30}',
        },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ matched: true });
    });

    it('accepts an object document', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { expression: 'exists("a.b") && !exists("a.c")', data: { a: { b: 1 } } },
      });
      expect(res.json()).toEqual({ matched: true });
    });

    it('converts declared values to their kinds', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: {
          expression: 'attempts > limit && seen < timestamp("2026-03-01T00:00:00Z")',
          data: { attempts: 9 },
          declarations: [
            { name: 'limit', kind: { tag: 'int' }, value: 5 },
            { name: 'seen', kind: { tag: 'timestamp' }, value: '2026-02-18T12:00:00Z' },
          ],
        },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ matched: true });
    });

    it('returns 422 with the issues of a compile error', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { expression: 'nope == 1', data: '{}' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        error: "failed to compile expression: 1:1: undeclared reference to 'nope'",
        code: 'COMPILE',
        issues: [{ message: "undeclared reference to 'nope'", offset: 0, line: 1, column: 1 }],
      });
    });

    it('returns 422 for nil data', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { expression: 'true', data: null },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({ error: 'data is nil', code: 'NIL_INPUT' });
    });

    it('returns 422 for a non-boolean result', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { expression: '"x"', data: '{}' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({ error: 'output type is not boolean: string', code: 'NON_BOOLEAN_RESULT' });
    });

    it('returns 422 for an operator chain past the nesting limit', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { expression: Array(2000).fill('a').join(' || '), data: '{"a":false}' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        error: 'failed to compile expression: 1:998: expression nesting exceeds limit',
        code: 'COMPILE',
        issues: [{ message: 'expression nesting exceeds limit', offset: 997, line: 1, column: 998 }],
      });
    });

    it('returns 400 for an invalid body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/evaluate',
        payload: { data: '{}' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'Validation failed' });
    });
  });

  describe('POST /api/v1/check', () => {
    it('reports the result kind of a valid expression', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/check',
        payload: { expression: 'user.startsWith("a")', sample: { user: 'alice' } },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ valid: true, result_kind: 'bool' });
    });

    it('checks against an empty document by default', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/check',
        payload: { expression: 'size("abc")' },
      });
      expect(res.json()).toEqual({ valid: true, result_kind: 'int' });
    });

    it('reports every issue of an invalid expression', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/check',
        payload: { expression: 'a && b' },
      });
      expect(res.statusCode).toBe(422);
      const body: unknown = res.json();
      expect(body).toMatchObject({ valid: false, code: 'COMPILE' });
      expect(body).toHaveProperty('issues', [
        { message: "undeclared reference to 'a'", offset: 0, line: 1, column: 1 },
        { message: "undeclared reference to 'b'", offset: 5, line: 1, column: 6 },
      ]);
    });
  });

  describe('POST /api/v1/match', () => {
    const rules = [
      { id: 'login', name: 'Login', severity: 'low', expression: 'action == "login"' },
      { id: 'broken', name: 'Broken', severity: 'high', expression: 'missing' },
      { id: 'muted', name: 'Muted', severity: 'critical', expression: 'true' },
      { id: 'quiet', name: 'Quiet', severity: 'medium', expression: 'false' },
    ];

    it('evaluates every rule that is not disabled', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/match',
        payload: { event_id: 'evt-1', data: { action: 'login' }, rules },
      });
      expect(res.statusCode).toBe(200);

      const body: unknown = res.json();
      expect(body).toMatchObject({
        event_id: 'evt-1',
        results: [
          { triggered: true, rule_id: 'login' },
          {
            triggered: false,
            rule_id: 'broken',
            error: { code: 'COMPILE', error: "failed to compile expression: 1:1: undeclared reference to 'missing'" },
          },
          { triggered: false, rule_id: 'quiet' },
        ],
        anomalies: [{ rule_id: 'login', event_id: 'evt-1', severity: 'low', message: 'Rule "Login" matched: action == "login"' }],
      });
    });

    it('isolates a rule whose expression is too deep', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/match',
        payload: {
          event_id: 'evt-5',
          data: { action: 'login' },
          rules: [
            { id: 'deep', name: 'Deep', severity: 'high', expression: Array(2000).fill('a').join(' || ') },
            rules[0],
          ],
        },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        event_id: 'evt-5',
        results: [
          { triggered: false, rule_id: 'deep', error: { code: 'COMPILE' } },
          { triggered: true, rule_id: 'login' },
        ],
      });
    });

    it('rejects a request without data', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/match',
        payload: { event_id: 'evt-2', rules },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'data is required' });
    });

    it('rejects a request without rules', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/match',
        payload: { event_id: 'evt-3', data: {}, rules: [] },
      });
      expect(res.statusCode).toBe(400);
    });

    it('fills the program cache across requests', async () => {
      const payload = { event_id: 'evt-4', data: { action: 'login' }, rules: [rules[0]] };
      await app.inject({ method: 'POST', url: '/api/v1/match', payload });
      await app.inject({ method: 'POST', url: '/api/v1/match', payload });

      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.json()).toEqual({ status: 'ok', cache: { size: 1, hits: 1, misses: 1 } });
    });
  });
});
