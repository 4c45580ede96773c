import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  buildEnvironment,
  check,
  formatKind,
  ExpressionError,
} from '../../domain/expression/index.js';
import {
  evaluateExpression,
  evaluateRequestSchema,
  checkRequestSchema,
} from '../../application/index.js';
import { documentText, errorBody, toVariableDeclarations } from './declarations.js';

/**
 * Expression evaluation routes.
 *
 * POST /api/v1/evaluate  evaluate an expression against one document
 * POST /api/v1/check     compile only; reports every issue
 */
async function evaluateRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/evaluate ────────────────────────────────
  fastify.post(
    '/api/v1/evaluate',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = evaluateRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const verdict = evaluateExpression(
        documentText(parsed.data.data),
        parsed.data.expression,
        {
          declarations: toVariableDeclarations(parsed.data.declarations),
          cache: fastify.engine.cache,
        },
      );

      if (!verdict.ok) {
        request.log.info(
          { code: verdict.error.code, context: verdict.error.context },
          'Expression evaluation failed',
        );
        return reply.status(422).send(errorBody(verdict.error));
      }

      return reply.status(200).send({ matched: verdict.matched });
    },
  );

  // ── POST /api/v1/check ───────────────────────────────────
  fastify.post(
    '/api/v1/check',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = checkRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const sample = documentText(parsed.data.sample) ?? '{}';

      try {
        const env = buildEnvironment(sample, toVariableDeclarations(parsed.data.declarations));
        const checked = check(parsed.data.expression, env);
        return reply.status(200).send({ valid: true, result_kind: formatKind(checked.resultKind) });
      } catch (err: unknown) {
        if (err instanceof ExpressionError) {
          return reply.status(422).send({ valid: false, ...errorBody(err) });
        }
        throw err;
      }
    },
  );
}

export default fp(evaluateRoutes, {
  name: 'evaluate-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
