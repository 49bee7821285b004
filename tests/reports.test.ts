/**
 * Ledger reports over validated entries: trial balance, general ledger,
 * balance sheet and income statement.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { cleanAllData } from './setup';
import { AccountMap, createJournal, createTestAccounts, postEntry, resetCounters } from './helpers/factory';
import { assertTrialBalanceBalanced } from './helpers/assertions';

import {
  balanceSheet,
  generalLedger,
  incomeStatement,
  sumLines,
  trialBalance,
} from '../server/services/reports.service';
import { normalizeRange } from '../server/database/values';

let accounts: AccountMap;

beforeAll(async () => {
  await cleanAllData();
  resetCounters();
  accounts = await createTestAccounts();
  const od = await createJournal({ code: 'OD', name: 'Opérations diverses', type: 'general' });

  // OD-2024-0001: capital contribution
  await postEntry(od, '2024-01-10', [
    [accounts['5141'], 10000, 0],
    [accounts['1111'], 0, 10000],
  ]);
  // OD-2024-0002: purchase on credit
  await postEntry(od, '2024-02-15', [
    [accounts['6111'], 2000, 0],
    [accounts['4411'], 0, 2000],
  ]);
  // OD-2024-0003: sale on credit, dated on the quarter end
  await postEntry(od, '2024-03-31', [
    [accounts['3421'], 5000, 0],
    [accounts['7111'], 0, 5000],
  ]);
  // OD-2024-0004: draft, never reported
  await postEntry(
    od,
    '2024-03-31',
    [
      [accounts['5141'], 999, 0],
      [accounts['7111'], 0, 999],
    ],
    { validate: false },
  );
  // OD-2024-0005: customer payment
  await postEntry(od, '2024-04-01', [
    [accounts['5141'], 5000, 0],
    [accounts['3421'], 0, 5000],
  ]);
});

describe('Reports', () => {
  // ── Trial balance ────────────────────────────────────────────────

  describe('trialBalance', () => {
    it('should total each account with validated lines', async () => {
      const tb = await assertTrialBalanceBalanced();

      expect(tb.rows.map((r) => [r.code, r.debit, r.credit, r.balance])).toEqual([
        ['1111', 0, 10000, -10000],
        ['3421', 5000, 5000, 0],
        ['4411', 0, 2000, -2000],
        ['5141', 15000, 0, 15000],
        ['6111', 2000, 0, 2000],
        ['7111', 0, 5000, -5000],
      ]);
      expect(tb.totals).toEqual({ debit: 22000, credit: 22000 });
    });

    it('should equal the sum of per-account line totals', async () => {
      const tb = await trialBalance();
      const sums = await sumLines({ range: normalizeRange() });

      expect(tb.rows.map((r) => [r.code, Math.round(r.debit * 100), Math.round(r.credit * 100)])).toEqual(
        sums.map((s) => [s.code, s.debit_cents, s.credit_cents]),
      );
    });

    it('should include an entry dated exactly on the end date', async () => {
      const tb = await assertTrialBalanceBalanced({ end: '2024-03-31' });

      expect(tb.end).toBe('2024-03-31');
      expect(tb.rows.find((r) => r.code === '7111')?.credit).toBe(5000);
      expect(tb.totals).toEqual({ debit: 17000, credit: 17000 });
    });

    it('should include an entry dated exactly on the start date', async () => {
      const tb = await trialBalance({ start: '2024-04-01', end: '2024-04-01' });

      expect(tb.rows.map((r) => [r.code, r.debit, r.credit])).toEqual([
        ['3421', 0, 5000],
        ['5141', 5000, 0],
      ]);
    });

    it('should never count unvalidated entries', async () => {
      const tb = await trialBalance({ start: '2024-03-31', end: '2024-03-31' });

      expect(tb.rows.map((r) => [r.code, r.debit, r.credit])).toEqual([
        ['3421', 5000, 0],
        ['7111', 0, 5000],
      ]);
    });

    it('should reject a malformed date', async () => {
      await expect(trialBalance({ start: '2024-13-01' })).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  // ── General ledger ───────────────────────────────────────────────

  describe('generalLedger', () => {
    it('should list postings with a running balance', async () => {
      const ledger = await generalLedger({}, '5141');

      expect(ledger.accounts).toHaveLength(1);
      const [bank] = ledger.accounts;
      expect(bank.postings.map((p) => [p.date, p.reference, p.journal_code, p.debit, p.running_balance])).toEqual([
        ['2024-01-10', 'OD-2024-0001', 'OD', 10000, 10000],
        ['2024-04-01', 'OD-2024-0005', 'OD', 5000, 15000],
      ]);
      expect(bank.total_debit).toBe(15000);
      expect(bank.balance).toBe(15000);
    });

    it('should bring a settled account back to zero', async () => {
      const [clients] = (await generalLedger({}, '3421')).accounts;
      expect(clients.postings.map((p) => p.running_balance)).toEqual([5000, 0]);
      expect(clients.balance).toBe(0);
    });

    it('should list every account, including those without postings', async () => {
      const ledger = await generalLedger({ end: '2024-02-29' });

      expect(ledger.accounts.map((a) => [a.code, a.postings.length])).toEqual([
        ['1111', 1],
        ['3421', 0],
        ['4411', 1],
        ['4455', 0],
        ['5141', 1],
        ['6111', 1],
        ['7111', 0],
      ]);
    });

    it('should reject an unknown account code', async () => {
      await expect(generalLedger({}, '9999')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Account not found: 9999',
      });
    });
  });

  // ── Balance sheet & income statement ─────────────────────────────

  describe('balanceSheet', () => {
    it('should net asset classes and read class 4 credits as positive', async () => {
      expect(await balanceSheet()).toEqual({
        start: null,
        end: null,
        assets: 5000,
        liabilities_and_equity: 2000,
      });
    });
  });

  describe('incomeStatement', () => {
    it('should compute revenue, expenses and result', async () => {
      expect(await incomeStatement()).toEqual({
        start: null,
        end: null,
        revenue: 5000,
        expenses: 2000,
        result: 3000,
      });
    });

    it('should report a loss before any sale', async () => {
      const statement = await incomeStatement({ start: '2024-01-01', end: '2024-02-29' });
      expect([statement.revenue, statement.expenses, statement.result]).toEqual([0, 2000, -2000]);
    });
  });
});
