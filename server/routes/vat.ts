import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { vatService } from '../services/vat.service';

export async function vatRoutes(server: FastifyInstance) {
  server.get('/vat/declaration', { preHandler: [authenticate] }, async (request) => {
    const declaration = await vatService.declaration(request.query);
    return { success: true, data: declaration };
  });

  server.get('/vat-rates', { preHandler: [authenticate] }, async () => {
    const rates = await vatService.listVatRates();
    return { success: true, data: rates };
  });

  server.post('/vat-rates', { preHandler: [authenticate] }, async (request, reply) => {
    const rate = await vatService.createVatRate(request.body);
    return reply.code(201).send({ success: true, data: rate });
  });
}
