import { FastifyInstance } from 'fastify';
import { APP_NAME, APP_VERSION } from '../../shared/constants';
import { getDb } from '../database/connection';

export async function healthRoutes(server: FastifyInstance) {
  server.get('/health', async () => {
    return {
      status: 'ok',
      name: APP_NAME,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    };
  });

  server.get('/health/db', async (request, reply) => {
    try {
      await getDb().raw('SELECT 1');
      return { status: 'ok', database: 'connected' };
    } catch (error) {
      request.log.warn({ err: error }, 'Database health check failed');
      return reply.code(503).send({ status: 'error', database: 'disconnected' });
    }
  });
}
