import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { parseId, parseInput } from '../schemas/common';
import { AccountImportSchema, AccountListQuerySchema } from '../schemas/ledger.schema';
import { chartOfAccountsService } from '../services/chart-of-accounts.service';

export async function accountRoutes(server: FastifyInstance) {
  server.get('/accounts', { preHandler: [authenticate] }, async (request) => {
    const { class_code } = parseInput(AccountListQuerySchema, request.query);
    const accounts = await chartOfAccountsService.listAccounts(class_code);
    return { success: true, data: accounts, total: accounts.length };
  });

  server.post('/accounts', { preHandler: [authenticate] }, async (request, reply) => {
    const account = await chartOfAccountsService.createAccount(request.body);
    return reply.code(201).send({ success: true, data: account });
  });

  server.post('/accounts/seed-pcm', { preHandler: [authenticate] }, async () => {
    const result = await chartOfAccountsService.seedPcm();
    return {
      success: true,
      data: result,
      message: result.skipped ? 'Chart of accounts already loaded' : `${result.created} accounts created`,
    };
  });

  server.post('/accounts/import', { preHandler: [authenticate] }, async (request) => {
    const { rows } = parseInput(AccountImportSchema, request.body);
    const result = await chartOfAccountsService.importAccounts(rows);
    return { success: true, data: result };
  });

  server.get('/accounts/:id', { preHandler: [authenticate] }, async (request) => {
    const account = await chartOfAccountsService.getAccount(parseId(request.params));
    return { success: true, data: account };
  });

  server.put('/accounts/:id', { preHandler: [authenticate] }, async (request) => {
    const account = await chartOfAccountsService.updateAccount(parseId(request.params), request.body);
    return { success: true, data: account };
  });

  server.delete('/accounts/:id', { preHandler: [authenticate] }, async (request) => {
    await chartOfAccountsService.deleteAccount(parseId(request.params));
    return { success: true, message: 'Account deleted' };
  });
}
