import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { IngestPipeline } from '../../application/index.js';

export interface PipelinePluginOptions {
  pipeline: IngestPipeline;
}

/**
 * Fastify plugin that exposes the ingest pipeline to routes.
 *
 * - The pipeline is built and started by the caller, then passed in.
 * - Decorates `fastify.pipeline`.
 * - On close, shuts it down: channel closed, final flush, sink closed.
 */
async function pipelinePlugin(
  fastify: FastifyInstance,
  opts: PipelinePluginOptions,
): Promise<void> {
  const { pipeline } = opts;

  fastify.decorate('pipeline', pipeline);

  fastify.addHook('onClose', async () => {
    await pipeline.shutdown();
    fastify.log.info('Ingest pipeline drained');
  });
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: IngestPipeline;
  }
}
