import type { FastifyInstance } from 'fastify';
import { render } from '../../pipeline/reporter.js';
import type { RouteOpts } from '../types.js';
import { parseLimit } from '../types.js';

export async function registerRunRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const store = opts.orchestrator.runs;

  fastify.get<{ Querystring: { limit?: string; offset?: string } }>('/v1/runs', async (req) => {
    const limit = parseLimit(req.query.limit, 50, 200);
    const offset = parseLimit(req.query.offset, 0, Number.MAX_SAFE_INTEGER);
    return { runs: store.list(limit, offset), limit, offset };
  });

  fastify.get<{ Params: { id: string } }>('/v1/runs/:id', async (req, reply) => {
    const run = store.get(req.params.id);
    if (!run) return reply.status(404).send({ error: 'Run not found' });
    return { ...run, downstream: store.downstreamOf(run.run_id).map((r) => r.run_id) };
  });

  fastify.get<{ Params: { id: string } }>('/v1/runs/:id/report', async (req, reply) => {
    const run = store.get(req.params.id);
    if (!run) return reply.status(404).send({ error: 'Run not found' });
    if (run.status === 'pending') return reply.status(409).send({ error: 'Run still in progress' });
    return reply.type('text/markdown; charset=utf-8').send(render(run));
  });
}
