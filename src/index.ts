import { loadEngineConfig, applyEnvOverrides } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Config comes from ENGINE_CONFIG (or config/engine.yaml), then HOST,
 * PORT and LOG_LEVEL from the environment.
 */
async function main(): Promise<void> {

  const config = applyEnvOverrides(loadEngineConfig(process.env['ENGINE_CONFIG']));

  const fastify = await buildServer(config);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
