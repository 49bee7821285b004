import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId, parseInput } from '../schemas/common';
import { EntryListQuerySchema } from '../schemas/ledger.schema';
import { journalService } from '../services/journal.service';
import { ledgerService } from '../services/ledger.service';
import { sequenceService } from '../services/sequence.service';

export async function journalRoutes(server: FastifyInstance) {
  // ──────── Journals ────────

  server.get('/journals', { preHandler: [authenticate] }, async () => {
    const journals = await journalService.listJournals();
    return { success: true, data: journals };
  });

  server.post('/journals', { preHandler: [authenticate] }, async (request, reply) => {
    const journal = await journalService.createJournal(request.body);
    return reply.code(201).send({ success: true, data: journal });
  });

  server.post('/journals/init-defaults', { preHandler: [authenticate] }, async () => {
    const result = await journalService.initDefaults();
    return { success: true, data: result };
  });

  server.get('/journals/:id', { preHandler: [authenticate] }, async (request) => {
    const journal = await journalService.getJournal(parseId(request.params));
    return { success: true, data: journal };
  });

  server.get('/journals/:id/export', { preHandler: [authenticate] }, async (request) => {
    const rows = await ledgerService.exportJournal(parseId(request.params));
    return { success: true, data: rows };
  });

  // ──────── Entries ────────

  server.get('/journals/:id/entries', { preHandler: [authenticate] }, async (request) => {
    const range = parseInput(EntryListQuerySchema, request.query);
    const entries = await ledgerService.listEntries(parseId(request.params), range);
    return { success: true, data: entries, total: entries.length };
  });

  server.post('/journals/:id/entries', { preHandler: [authenticate] }, async (request, reply) => {
    const entry = await ledgerService.createEntry(parseId(request.params), request.body);
    return reply.code(201).send({ success: true, data: entry, message: `Entry ${entry.reference} created` });
  });

  server.get('/entries/:id', { preHandler: [authenticate] }, async (request) => {
    const entry = await ledgerService.getEntry(parseId(request.params));
    return { success: true, data: entry };
  });

  server.post('/entries/:id/validate', { preHandler: [authenticate] }, async (request) => {
    const entry = await ledgerService.validateEntry(parseId(request.params));
    return { success: true, data: entry };
  });

  server.delete('/entries/:id', { preHandler: [authenticate] }, async (request) => {
    await ledgerService.deleteEntry(parseId(request.params));
    return { success: true, message: 'Entry deleted' };
  });

  // ──────── Sequences ────────

  server.get('/sequences', { preHandler: [authenticate] }, async () => {
    const scopes = await sequenceService.listScopes();
    return { success: true, data: scopes };
  });
}
