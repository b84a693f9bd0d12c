import type { FastifyInstance } from 'fastify';

export default async function healthRoutes(fastify: FastifyInstance) {
  fastify.get('/', async () => ({ ok: true }));

  // Database health check
  fastify.get('/db', async () => {
    const ping = fastify.deps.pingDb;
    if (!ping) return { ok: false, error: 'Database not configured' };
    return ping();
  });
}
