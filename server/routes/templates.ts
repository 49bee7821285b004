import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId } from '../schemas/common';
import { docTemplateService } from '../services/doc-template.service';

export async function templateRoutes(server: FastifyInstance) {
  server.get('/templates', { preHandler: [authenticate] }, async () => {
    const templates = await docTemplateService.listTemplates();
    return { success: true, data: templates };
  });

  server.post('/templates', { preHandler: [authenticate] }, async (request, reply) => {
    const template = await docTemplateService.createTemplate(request.body);
    return reply.code(201).send({ success: true, data: template });
  });

  server.get('/templates/:id', { preHandler: [authenticate] }, async (request) => {
    const template = await docTemplateService.getTemplate(parseId(request.params));
    return { success: true, data: template };
  });

  server.put('/templates/:id', { preHandler: [authenticate] }, async (request) => {
    const template = await docTemplateService.updateTemplate(parseId(request.params), request.body);
    return { success: true, data: template };
  });

  server.delete('/templates/:id', { preHandler: [authenticate] }, async (request) => {
    await docTemplateService.deleteTemplate(parseId(request.params));
    return { success: true, message: 'Template deleted' };
  });

  server.get('/templates/:id/render', { preHandler: [authenticate] }, async (request) => {
    const rendered = await docTemplateService.renderTemplate(parseId(request.params), request.query);
    return { success: true, data: rendered };
  });
}
