import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId } from '../schemas/common';
import { customerService } from '../services/customer.service';

export async function customerRoutes(server: FastifyInstance) {
  server.get('/customers', { preHandler: [authenticate] }, async () => {
    const customers = await customerService.listCustomers();
    return { success: true, data: customers, total: customers.length };
  });

  server.get('/customers/:id', { preHandler: [authenticate] }, async (request) => {
    const customer = await customerService.getCustomer(parseId(request.params));
    return { success: true, data: customer };
  });

  server.post('/customers', { preHandler: [authenticate] }, async (request, reply) => {
    const customer = await customerService.createCustomer(request.body);
    return reply.code(201).send({ success: true, data: customer });
  });

  server.put('/customers/:id', { preHandler: [authenticate] }, async (request) => {
    const customer = await customerService.updateCustomer(parseId(request.params), request.body);
    return { success: true, data: customer };
  });
}
