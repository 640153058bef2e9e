import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/server.js';
import { IngestPipeline } from '../../src/application/ingest-pipeline.js';
import { normalizeSubmissions } from '../../src/application/normalizer.js';
import type { BatchAssemblerOptions } from '../../src/application/batch-assembler.js';
import { DiskSink } from '../../src/infrastructure/sinks/disk-sink.js';
import type { RawSubmission, Sink } from '../../src/domain/index.js';
import { FailingSink, RecordingSink, silentLogger } from '../helpers.js';

let app: FastifyInstance | null = null;

async function setup(
  sink: Sink,
  options: BatchAssemblerOptions = { batchSize: 1000, flushIntervalMs: 60_000 },
) {
  const pipeline = new IngestPipeline(sink, silentLogger(), options);
  await pipeline.start();
  const server = await buildServer({ pipeline });
  app = server;
  return { app: server, pipeline };
}

function post(server: FastifyInstance, url: string, payload: string) {
  return server.inject({
    method: 'POST',
    url,
    headers: { 'content-type': 'application/json' },
    payload,
  });
}

/** Closes the server, which drains the pipeline into the sink. */
async function closeApp(): Promise<void> {
  const server = app;
  app = null;
  await server?.close();
}

afterEach(async () => {
  await closeApp();
});

// ── POST / and /collectd ─────────────────────────────────

describe('POST / and /collectd', () => {
  it('accepts a single submission with 200 "OK\\n"', async () => {
    const sink = new RecordingSink();
    const { app: server } = await setup(sink);

    const res = await post(server, '/', '{"host":"h1","plugin":"load","value":0.42}');

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('OK\n');
    expect(res.headers['content-type']).toMatch(/^text\/plain/);

    await closeApp();
    expect(sink.batches.flat()).toEqual([{
      time: null,
      host: 'h1',
      plugin: 'load',
      plugin_instance: null,
      type: null,
      type_instance: null,
      value: 0.42,
    }]);
  });

  it('accepts an array on /collectd and expands values', async () => {
    const sink = new RecordingSink();
    const { app: server } = await setup(sink);

    const res = await post(
      server,
      '/collectd',
      '[{"host":"h1","values":[1,2,3]},{"host":"h2"},{"host":"h3","value":4}]',
    );

    expect(res.statusCode).toBe(200);
    await closeApp();
    expect(sink.values()).toEqual([1, 2, 3, 4]);
  });

  it('reads the body whatever the content type', async () => {
    const sink = new RecordingSink();
    const { app: server } = await setup(sink);

    const res = await server.inject({
      method: 'POST',
      url: '/',
      headers: { 'content-type': 'text/plain' },
      payload: '{"value":1}',
    });

    expect(res.statusCode).toBe(200);
    await closeApp();
    expect(sink.values()).toEqual([1]);
  });

  it('returns 200 for an empty array without enqueuing anything', async () => {
    const sink = new RecordingSink();
    const { app: server, pipeline } = await setup(sink);

    const res = await post(server, '/', '[]');

    expect(res.statusCode).toBe(200);
    expect(pipeline.status().pending).toBe(0);
  });

  it('returns 400 for malformed JSON and enqueues nothing', async () => {
    const sink = new RecordingSink();
    const { app: server } = await setup(sink);

    const res = await post(server, '/', '{"host":"h1","values":[1,2');

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe('Bad Request\n');
    await closeApp();
    expect(sink.batches).toEqual([]);
  });

  it('returns 400 when a known field has the wrong type', async () => {
    const { app: server } = await setup(new RecordingSink());

    const res = await post(server, '/collectd', '[{"value":1},{"plugin":["cpu"]}]');

    expect(res.statusCode).toBe(400);
  });

  it('returns 400 for an empty body', async () => {
    const { app: server } = await setup(new RecordingSink());

    const res = await server.inject({ method: 'POST', url: '/' });

    expect(res.statusCode).toBe(400);
  });

  it('returns 500 for every request once the batch worker is gone', async () => {
    const sink = new FailingSink(new Error('EIO'));
    const { app: server, pipeline } = await setup(sink, { batchSize: 1, flushIntervalMs: 60_000 });

    const first = await post(server, '/', '{"value":1}');
    expect(first.statusCode).toBe(200);

    await vi.waitFor(() => expect(pipeline.workerFailure).not.toBeNull());

    const second = await post(server, '/', '{"value":2}');
    const third = await post(server, '/collectd', '{"value":3}');
    expect(second.statusCode).toBe(500);
    expect(second.body).toBe('Internal Server Error\n');
    expect(third.statusCode).toBe(500);
  });

  it('still answers 200 for a body with no values after the worker is gone', async () => {
    const sink = new FailingSink(new Error('EIO'));
    const { app: server, pipeline } = await setup(sink, { batchSize: 1, flushIntervalMs: 60_000 });
    await post(server, '/', '{"value":1}');
    await vi.waitFor(() => expect(pipeline.workerFailure).not.toBeNull());

    const res = await post(server, '/', '{"host":"h1"}');

    expect(res.statusCode).toBe(200);
  });
});

// ── GET /health ──────────────────────────────────────────

describe('GET /health', () => {
  it('reports ok while the worker runs', async () => {
    const { app: server } = await setup(new RecordingSink());

    const res = await server.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      worker: 'buffering',
      pending: 0,
      buffered: 0,
      flushedBatches: 0,
      flushedRecords: 0,
      sink: 'disk',
    });
  });

  it('reports degraded with 503 after a sink failure', async () => {
    const { app: server, pipeline } = await setup(new FailingSink(new Error('EIO')), {
      batchSize: 1,
      flushIntervalMs: 60_000,
    });
    await post(server, '/', '{"value":1}');
    await vi.waitFor(() => expect(pipeline.workerFailure).not.toBeNull());

    const res = await server.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ status: 'degraded', worker: 'shutdown' });
  });
});

// ── concurrent producers ─────────────────────────────────

function requestBody(i: number): RawSubmission[] {
  const host = `req-${i}`;
  const submissions: RawSubmission[] = [];
  for (let j = 0; j <= i % 3; j++) {
    submissions.push({
      host,
      plugin: `p${j}`,
      values: Array.from({ length: (i + j) % 5 }, (_, k) => k),
    });
  }
  submissions.push({ host, plugin: 'scalar', value: i });
  submissions.push({ host, plugin: 'empty' });
  return submissions;
}

describe('concurrent producers', () => {
  it('loses and duplicates nothing, and keeps each request in order', async () => {
    const sink = new RecordingSink();
    const { app: server } = await setup(sink, { batchSize: 7, flushIntervalMs: 20 });
    const bodies = Array.from({ length: 40 }, (_, i) => requestBody(i));

    const responses = await Promise.all(
      bodies.map((body, i) => post(server, i % 2 === 0 ? '/' : '/collectd', JSON.stringify(body))),
    );
    await closeApp();

    expect(responses.every((res) => res.statusCode === 200)).toBe(true);

    const expected = bodies.map((body) => [...normalizeSubmissions(body)]);
    const flushed = sink.batches.flat();
    expect(flushed).toHaveLength(expected.reduce((sum, records) => sum + records.length, 0));

    bodies.forEach((_, i) => {
      expect(flushed.filter((r) => r.host === `req-${i}`)).toEqual(expected[i]);
    });
  });

  it('writes exactly the expected number of lines to disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'collectd-relay-e2e-'));
    const path = join(dir, 'collectd.out');
    try {
      const { app: server } = await setup(new DiskSink(path, silentLogger()), {
        batchSize: 5,
        flushIntervalMs: 20,
      });
      const bodies = Array.from({ length: 25 }, (_, i) => requestBody(i));

      await Promise.all(bodies.map((body) => post(server, '/', JSON.stringify(body))));
      await closeApp();

      const expected = bodies.reduce((sum, body) => sum + [...normalizeSubmissions(body)].length, 0);
      const lines = readFileSync(path, 'utf-8').split('\n').filter((line) => line !== '');
      expect(lines).toHaveLength(expected);
      for (const line of lines) {
        expect(Object.keys(JSON.parse(line) as object)).toEqual([
          'time', 'host', 'plugin', 'plugin_instance', 'type', 'type_instance', 'value',
        ]);
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
