import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId, parseInput } from '../schemas/common';
import { CessionListQuerySchema } from '../schemas/cabinet.schema';
import { cabinetService } from '../services/cabinet.service';
import { cessionService } from '../services/cession.service';
import { societeService } from '../services/societe.service';

export async function cabinetRoutes(server: FastifyInstance) {
  // ──────── Cabinets ────────

  server.get('/cabinets', { preHandler: [authenticate] }, async () => {
    const cabinets = await cabinetService.listCabinets();
    return { success: true, data: cabinets };
  });

  server.post('/cabinets', { preHandler: [authenticate] }, async (request, reply) => {
    const cabinet = await cabinetService.createCabinet(request.body);
    return reply.code(201).send({ success: true, data: cabinet });
  });

  server.delete('/cabinets/:id', { preHandler: [authenticate] }, async (request) => {
    await cabinetService.deleteCabinet(parseId(request.params));
    return { success: true, message: 'Cabinet deleted' };
  });

  // ──────── Sociétés ────────

  server.get('/societes', { preHandler: [authenticate] }, async () => {
    const societes = await societeService.listSocietes();
    return { success: true, data: societes, total: societes.length };
  });

  server.post('/societes', { preHandler: [authenticate] }, async (request, reply) => {
    const societe = await societeService.createSociete(request.body);
    return reply.code(201).send({ success: true, data: societe });
  });

  server.get('/societes/export', { preHandler: [authenticate] }, async () => {
    const rows = await societeService.exportRows();
    return { success: true, data: rows };
  });

  server.get('/societes/:id', { preHandler: [authenticate] }, async (request) => {
    const societe = await societeService.getSociete(parseId(request.params));
    return { success: true, data: societe };
  });

  server.post('/societes/:id/associates', { preHandler: [authenticate] }, async (request, reply) => {
    const associate = await societeService.addAssociate(parseId(request.params), request.body);
    return reply.code(201).send({ success: true, data: associate });
  });

  // ──────── Cessions ────────

  server.get('/cessions', { preHandler: [authenticate] }, async (request) => {
    const { societe_id } = parseInput(CessionListQuerySchema, request.query);
    const cessions = await cessionService.listCessions(societe_id);
    return { success: true, data: cessions };
  });

  server.post('/cessions', { preHandler: [authenticate] }, async (request, reply) => {
    const result = await cessionService.createCession(request.body);
    return reply.code(201).send({ success: true, data: result });
  });
}
