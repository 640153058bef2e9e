import { pino } from 'pino';
import { IngestPipeline } from './application/index.js';
import { loadServiceConfig, createSink } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Configuration (fatal when invalid)
 * 2) Sink + pipeline; the sink is opened before the worker starts
 * 3) HTTP server
 * 4) Signal handlers: close the server, which drains the pipeline
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadServiceConfig();

  const log = pino({ level: config.logLevel });

  log.info({ config }, 'Starting collectd relay');

  // --------------------------------------------------
  // Pipeline
  // --------------------------------------------------

  const sink = createSink(config.output, log);

  const pipeline = new IngestPipeline(sink, log.child({ component: 'batch-assembler' }), {
    batchSize: config.batchSize,
    flushIntervalMs: config.flushIntervalMs,
  });

  await pipeline.start();

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = await buildServer({
    pipeline,
    logger: { level: config.logLevel },
  });

  // --------------------------------------------------
  // Graceful shutdown: close server → final flush → sink closed
  // --------------------------------------------------

  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info({ signal }, 'Shutting down gracefully...');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start collectd relay',
    err,
  );

  process.exit(1);

});
