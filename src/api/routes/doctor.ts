import type { FastifyInstance } from 'fastify';
import { runDoctorChecks } from '../../runtime/doctor.js';
import type { RouteOpts } from '../types.js';

export async function registerDoctorRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/doctor', async () => runDoctorChecks(opts.cwd ?? process.cwd()));
}
