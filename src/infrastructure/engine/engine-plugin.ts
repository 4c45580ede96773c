import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { ProgramCache, StaticConfigProvider } from '../../application/index.js';
import type { EngineConfigProvider } from '../../application/index.js';
import type { EngineConfig } from '../config/index.js';

/** Shared evaluation dependencies for the HTTP routes. */
export interface EngineServices {
  readonly config: EngineConfigProvider;
  /** Absent when `program_cache_size` is 0. */
  readonly cache: ProgramCache | undefined;
}

export interface EnginePluginOptions {
  readonly engine: EngineConfig['engine'];
}

/**
 * Fastify plugin that owns the engine's process-wide state.
 *
 * Decorates `fastify.engine` with the config provider and the
 * checked-expression cache.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  const { program_cache_size, disabled_rules } = opts.engine;

  const services: EngineServices = {
    config: new StaticConfigProvider(disabled_rules),
    cache: program_cache_size > 0 ? new ProgramCache(program_cache_size) : undefined,
  };

  fastify.decorate('engine', services);

  fastify.addHook('onClose', async () => {
    services.cache?.clear();
  });

  fastify.log.info(
    { program_cache_size, disabled_rules: disabled_rules.length },
    'Expression engine ready',
  );
}

export default fp(enginePlugin, {
  name: 'engine',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.engine` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    engine: EngineServices;
  }
}
