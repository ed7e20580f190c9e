import Fastify from 'fastify';
import { createCollaborators } from '../collaborators/index.js';
import { ReleaseOrchestrator } from '../pipeline/orchestrator.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { readShiplineConfig, resolveWebhookSecret } from '../workspace/config.js';
import { getShiplinePaths } from '../workspace/paths.js';
import { registerDoctorRoutes } from './routes/doctor.js';
import { registerRunRoutes } from './routes/runs.js';
import { registerWebhookRoutes } from './routes/webhooks.js';
import type { RouteOpts } from './types.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
}

/** Build the HTTP surface around an existing orchestrator. */
export async function createApp(routeOpts: RouteOpts) {
  const fastify = Fastify({
    logger: false,
    trustProxy: false,
    bodyLimit: 5 * 1024 * 1024,
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
  });

  fastify.get('/v1/health', async () => ({ status: 'ok' }));

  await registerRunRoutes(fastify, routeOpts);
  await registerWebhookRoutes(fastify, routeOpts);
  await registerDoctorRoutes(fastify, routeOpts);

  return fastify;
}

export async function createServer(opts: ServerOptions = {}) {
  const cwd = opts.cwd ?? process.cwd();
  const config = readShiplineConfig(getShiplinePaths(cwd).config);
  const host = opts.host ?? process.env['SHIPLINE_API_HOST'] ?? config.server.host;
  const port = opts.port ?? Number.parseInt(process.env['SHIPLINE_API_PORT'] ?? String(config.server.port), 10);

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  const webhookSecret = resolveWebhookSecret(config);
  if (!isLoopback && webhookSecret === null) {
    logger.warn('Non-loopback bind without a webhook secret; deliveries are not authenticated.', { host });
  }

  const orchestrator = new ReleaseOrchestrator({
    config,
    collaborators: createCollaborators(config, process.env, cwd),
    cwd,
  });
  const fastify = await createApp({ orchestrator, config, webhookSecret, cwd });
  return { fastify, orchestrator, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('Shipline API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
