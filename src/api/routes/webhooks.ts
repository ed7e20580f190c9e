import type { FastifyInstance } from 'fastify';
import { errorMessage } from '../../shared/errors.js';
import { generateId } from '../../shared/ids.js';
import { logger } from '../../shared/logger.js';
import { verifySignature } from '../../shared/redact.js';
import { parseGitHubEvent } from '../github-events.js';
import type { RouteOpts } from '../types.js';

function header(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function registerWebhookRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  // Own scope: the raw body is needed to check the signature
  await fastify.register(async (scope) => {
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
      done(null, body);
    });

    scope.post<{ Body: string }>('/v1/webhooks/github', async (req, reply) => {
      const raw = typeof req.body === 'string' ? req.body : '';

      if (opts.webhookSecret !== null) {
        const signature = header(req.headers['x-hub-signature-256']);
        if (!verifySignature(raw, opts.webhookSecret, signature)) {
          logger.warn('Webhook signature mismatch', { delivery: header(req.headers['x-github-delivery']) });
          return reply.status(401).send({ error: 'Invalid signature' });
        }
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw);
      } catch {
        return reply.status(400).send({ error: 'Body is not valid JSON' });
      }

      const outcome = parseGitHubEvent(header(req.headers['x-github-event']), payload);
      switch (outcome.kind) {
        case 'ping':
          return reply.status(200).send({ ok: true });
        case 'invalid':
          return reply.status(400).send({ error: outcome.reason });
        case 'ignored':
          return reply.status(202).send({ ignored: outcome.reason });
        case 'trigger':
          break;
      }

      const { trigger } = outcome;
      const project = opts.config.project;
      const sameRepo =
        trigger.repository.owner.toLowerCase() === project.owner.toLowerCase() &&
        trigger.repository.name.toLowerCase() === project.repository.toLowerCase();
      if (!sameRepo) {
        return reply.status(202).send({ ignored: `repository ${trigger.repository.owner}/${trigger.repository.name} not configured` });
      }

      const runId = generateId();
      void opts.orchestrator
        .runPipeline(opts.orchestrator.ci, trigger, runId)
        .catch((err: unknown) => {
          logger.error('CI run could not start', { run_id: runId, error: errorMessage(err) });
        });

      return reply.status(202).send({
        run_id: runId,
        pipeline_id: opts.orchestrator.ci.id,
        ref_name: trigger.ref_name,
        commit_id: trigger.commit_id,
        status: 'pending',
      });
    });
  });
}
