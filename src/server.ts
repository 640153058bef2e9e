import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { IngestPipeline } from './application/index.js';
import { pipelinePlugin } from './infrastructure/index.js';
import { ingestRoutes, healthRoutes } from './interfaces/http/index.js';

export interface BuildServerOptions {
  pipeline: IngestPipeline;
  logger?: FastifyServerOptions['logger'];
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Pipeline plugin (decorator + onClose drain)
 * 2) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  await fastify.register(pipelinePlugin, { pipeline: options.pipeline });

  await fastify.register(ingestRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
