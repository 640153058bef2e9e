import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { parseSubmissionBody, normalizeSubmissions } from '../../application/index.js';
import { ParseError, QueueClosedError } from '../../domain/index.js';
import type { RawSubmission } from '../../domain/index.js';

/**
 * Registers the collectd ingestion routes.
 *
 * POST /          — collectd write_http target
 * POST /collectd  — same handler
 *
 * Bodies are read as text whatever their content type and parsed by the
 * normalizer, which owns the single-or-array decision.
 */
async function ingestRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * Parse → normalize → enqueue → 200 "OK\n".
   *
   * Never waits on the sink: enqueueing only appends to the channel.
   */
  const ingest = async (request: FastifyRequest, reply: FastifyReply) => {
    const body = typeof request.body === 'string' ? request.body : '';

    let submissions: RawSubmission[];
    try {
      submissions = parseSubmissionBody(body);
    } catch (err: unknown) {
      if (err instanceof ParseError) {
        request.log.warn({ err, issues: err.issues.length }, 'Rejected submission body');
        return reply.status(400).type('text/plain').send('Bad Request\n');
      }
      throw err;
    }

    let count: number;
    try {
      count = fastify.pipeline.submit(normalizeSubmissions(submissions));
    } catch (err: unknown) {
      if (err instanceof QueueClosedError) {
        request.log.warn({ err }, 'Failed to enqueue metrics; batch worker is gone');
        return reply.status(500).type('text/plain').send('Internal Server Error\n');
      }
      throw err;
    }

    request.log.debug({ submissions: submissions.length, records: count }, 'Metrics enqueued');

    return reply.status(200).type('text/plain').send('OK\n');
  };

  fastify.post('/', ingest);
  fastify.post('/collectd', ingest);
}

export default fp(ingestRoutes, {
  name: 'ingest-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
