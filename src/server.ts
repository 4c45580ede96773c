import Fastify, { type FastifyInstance } from 'fastify';

import { enginePlugin, type EngineConfig } from './infrastructure/index.js';
import {
  evaluateRoutes,
  matchRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  /** Turns request logging off; tests pass false. */
  readonly logger?: boolean;
}

/**
 * Builds the Fastify instance without listening.
 *
 * Order:
 * 1) Engine plugin (cache + disabled rules)
 * 2) HTTP routes
 */
export async function buildServer(
  config: EngineConfig,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.server.log_level },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(enginePlugin, { engine: config.engine });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(evaluateRoutes);
  await fastify.register(matchRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
