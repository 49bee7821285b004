import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { DateRangeQuerySchema, parseInput } from '../schemas/common';
import { LedgerQuerySchema } from '../schemas/ledger.schema';
import { reportsService } from '../services/reports.service';

export async function reportRoutes(server: FastifyInstance) {
  server.get('/reports/trial-balance', { preHandler: [authenticate] }, async (request) => {
    const range = parseInput(DateRangeQuerySchema, request.query);
    return { success: true, data: await reportsService.trialBalance(range) };
  });

  server.get('/reports/ledger', { preHandler: [authenticate] }, async (request) => {
    const { account_code, ...range } = parseInput(LedgerQuerySchema, request.query);
    return { success: true, data: await reportsService.generalLedger(range, account_code) };
  });

  server.get('/reports/balance-sheet', { preHandler: [authenticate] }, async (request) => {
    const range = parseInput(DateRangeQuerySchema, request.query);
    return { success: true, data: await reportsService.balanceSheet(range) };
  });

  server.get('/reports/income-statement', { preHandler: [authenticate] }, async (request) => {
    const range = parseInput(DateRangeQuerySchema, request.query);
    return { success: true, data: await reportsService.incomeStatement(range) };
  });
}
