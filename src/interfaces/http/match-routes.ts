import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { evaluateEvent, matchRequestSchema } from '../../application/index.js';
import type { DetectionEvent, ExpressionRule, RuleResult } from '../../domain/index.js';
import { documentText, errorBody, toVariableDeclarations } from './declarations.js';

/** RuleResult without the Error instance, which does not serialise. */
function serialiseResult(result: RuleResult): Record<string, unknown> {
  if (result.triggered) return { ...result };
  if (result.error === undefined) return { triggered: false, rule_id: result.rule_id };
  return { triggered: false, rule_id: result.rule_id, error: errorBody(result.error) };
}

/**
 * Rule matching route.
 *
 * POST /api/v1/match  run a set of rules against one event
 *
 * Rules travel with the request; nothing is stored.
 */
async function matchRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/match',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = matchRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const data = documentText(parsed.data.data);
      if (data === null || data === undefined) {
        return reply.status(400).send({ error: 'data is required' });
      }

      const event: DetectionEvent = {
        event_id: parsed.data.event_id,
        data,
        declarations: toVariableDeclarations(parsed.data.declarations),
      };
      const rules: ExpressionRule[] = parsed.data.rules;

      const { results, anomalies } = evaluateEvent(event, rules, {
        log: request.log,
        config: fastify.engine.config,
        cache: fastify.engine.cache,
      });

      return reply.status(200).send({
        event_id: event.event_id,
        results: results.map(serialiseResult),
        anomalies,
      });
    },
  );
}

export default fp(matchRoutes, {
  name: 'match-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
