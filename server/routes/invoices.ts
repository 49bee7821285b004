import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId } from '../schemas/common';
import { invoiceService } from '../services/invoice.service';

export async function invoiceRoutes(server: FastifyInstance) {
  server.get('/invoices', { preHandler: [authenticate] }, async () => {
    const invoices = await invoiceService.listInvoices();
    return { success: true, data: invoices, total: invoices.length };
  });

  server.get('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const invoice = await invoiceService.getInvoice(parseId(request.params));
    return { success: true, data: invoice };
  });

  server.post('/invoices', { preHandler: [authenticate] }, async (request, reply) => {
    const invoice = await invoiceService.createInvoice(request.body);
    const kind = invoice.is_quote ? 'Quote' : 'Invoice';
    return reply.code(201).send({ success: true, data: invoice, message: `${kind} ${invoice.number} created` });
  });

  server.delete('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    await invoiceService.deleteInvoice(parseId(request.params));
    return { success: true, message: 'Invoice deleted' };
  });
}
