import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { dashboardService } from '../services/dashboard.service';

export async function dashboardRoutes(server: FastifyInstance) {
  server.get('/dashboard', { preHandler: [authenticate] }, async () => {
    return { success: true, data: await dashboardService.summary() };
  });

  server.get('/dashboard/companies-by-type', { preHandler: [authenticate] }, async () => {
    return { success: true, data: await dashboardService.companiesByType() };
  });
}
