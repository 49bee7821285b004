/**
 * Double-entry posting: balance check, line normalization, validation
 * and deletion rules.
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import { Journal } from '../shared/types';
import { getTestDb, cleanAllData } from './setup';
import { AccountMap, createJournal, createTestAccounts, postEntry, resetCounters } from './helpers/factory';
import { assertEntryBalanced } from './helpers/assertions';

import { checkEntryBalance, ledgerService } from '../server/services/ledger.service';
import { sequenceService } from '../server/services/sequence.service';
import { UnbalancedEntryError } from '../server/errors';

let accounts: AccountMap;
let journal: Journal;

async function counter(): Promise<number> {
  const scope = await sequenceService.getScope(journal.sequence_scope);
  return scope?.next_number ?? 0;
}

async function rowCount(table: string): Promise<number> {
  const rows: { id: number }[] = await getTestDb()(table).select('id');
  return rows.length;
}

beforeAll(async () => {
  await cleanAllData();
  resetCounters();
  accounts = await createTestAccounts();
  journal = await createJournal({ code: 'ACH', name: 'Journal des achats', type: 'purchases', prefix: 'ACH-' });
});

describe('Ledger entries', () => {
  // ── Balance check ────────────────────────────────────────────────

  describe('checkEntryBalance', () => {
    it('should accept a balanced line set and return the totals', () => {
      const checked = checkEntryBalance([
        { account_id: 1, label: null, debit: 120.1, credit: 0 },
        { account_id: 2, label: null, debit: 0, credit: 100 },
        { account_id: 3, label: null, debit: 0, credit: 20.1 },
      ]);
      expect(checked.total_debit).toBe(120.1);
      expect(checked.total_credit).toBe(120.1);
      expect(checked.lines).toHaveLength(3);
    });

    it('should reject a one-cent difference', () => {
      expect(() =>
        checkEntryBalance([
          { account_id: 1, label: null, debit: '100.00', credit: null },
          { account_id: 2, label: null, debit: null, credit: '99.99' },
        ]),
      ).toThrow(UnbalancedEntryError);

      expect(() => checkEntryBalance([{ account_id: 1, label: null, debit: 100, credit: 0 }], { strict: true })).toThrow(
        'Entry needs at least two lines',
      );
    });

    it('should read comma decimals and spaced thousands', () => {
      const checked = checkEntryBalance([
        { account_id: 1, label: null, debit: '1 250,50', credit: '' },
        { account_id: 2, label: null, debit: '', credit: '1250.5' },
      ]);
      expect(checked.lines.map((l) => l.debit)).toEqual([1250.5, 0]);
      expect(checked.total_credit).toBe(1250.5);
    });

    it('should drop lines with zero debit and zero credit', () => {
      const checked = checkEntryBalance([
        { account_id: 1, label: null, debit: 50, credit: 0 },
        { account_id: 2, label: null, debit: 0, credit: 0 },
        { account_id: 3, label: null, debit: 0, credit: 50 },
      ]);
      expect(checked.lines.map((l) => l.account_id)).toEqual([1, 3]);
    });

    it('should reject an entry whose lines are all zero', () => {
      expect(() => checkEntryBalance([{ account_id: 1, label: null, debit: 0, credit: 0 }])).toThrow(
        'Entry has no line with a non-zero amount',
      );
    });

    it('should reject negative and malformed amounts as invalid input', () => {
      expect(() =>
        checkEntryBalance([
          { account_id: 1, label: null, debit: -10, credit: 0 },
          { account_id: 2, label: null, debit: 0, credit: -10 },
        ]),
      ).toThrow('Line 1: amounts cannot be negative');

      expect(() => checkEntryBalance([{ account_id: 1, label: null, debit: '12abc', credit: 0 }])).toThrow(
        'lines[0].debit is not a valid number: "12abc"',
      );
    });

    it('should accept the largest amount the column holds and reject one cent more', () => {
      const checked = checkEntryBalance([
        { account_id: 1, label: null, debit: '999 999 999 999,99', credit: 0 },
        { account_id: 2, label: null, debit: 0, credit: 999999999999.99 },
      ]);
      expect(checked.total_debit).toBe(999999999999.99);

      expect(() => checkEntryBalance([{ account_id: 1, label: null, debit: 0, credit: 1e12 }])).toThrow(
        'lines[0].credit exceeds 12 integer digits: "1000000000000"',
      );
    });

    it('should tolerate single-line and two-sided entries unless strict', () => {
      const legacy = checkEntryBalance([{ account_id: 1, label: null, debit: 50, credit: 50 }]);
      expect(legacy.lines).toHaveLength(1);

      expect(() =>
        checkEntryBalance([{ account_id: 1, label: null, debit: 50, credit: 50 }], { strict: true }),
      ).toThrow('Line 1: a line cannot carry both a debit and a credit');

      expect(() =>
        checkEntryBalance(
          [
            { account_id: 1, label: null, debit: 0, credit: 0 },
            { account_id: 2, label: null, debit: 10, credit: 10 },
          ],
          { strict: true },
        ),
      ).toThrow('Line 2: a line cannot carry both a debit and a credit');

      expect(() =>
        checkEntryBalance([{ account_id: 1, label: null, debit: 10, credit: 10 }, { account_id: 2, label: null, debit: 0, credit: 0 }], {
          strict: false,
        }),
      ).not.toThrow();
    });
  });

  // ── Create ───────────────────────────────────────────────────────

  describe('createEntry', () => {
    it('should post a balanced entry with a journal reference', async () => {
      const entry = await postEntry(
        journal,
        '2024-03-15',
        [
          [accounts['6111'], 1000, 0],
          [accounts['4411'], 0, 1000],
        ],
        { validate: false, description: 'Achat marchandises' },
      );

      expect(entry.reference).toBe('ACH-2024-0001');
      expect(entry.entry_date).toBe('2024-03-15');
      expect(entry.validated).toBe(false);
      expect(entry.description).toBe('Achat marchandises');
      expect(entry.lines.map((l) => [l.account_code, l.debit, l.credit])).toEqual([
        ['6111', 1000, 0],
        ['4411', 0, 1000],
      ]);
      await assertEntryBalanced(entry.id);
    });

    it('should persist nothing and consume no reference for an unbalanced entry', async () => {
      const entriesBefore = await rowCount('entries');
      const linesBefore = await rowCount('entry_lines');
      const counterBefore = await counter();

      await expect(
        ledgerService.createEntry(journal.id, {
          entry_date: '2024-03-16',
          lines: [
            { account_id: accounts['6111'].id, debit: 100 },
            { account_id: accounts['4411'].id, credit: 90 },
          ],
        }),
      ).rejects.toMatchObject({ code: 'UNBALANCED_ENTRY', details: { total_debit: 100, total_credit: 90 } });

      expect(await rowCount('entries')).toBe(entriesBefore);
      expect(await rowCount('entry_lines')).toBe(linesBefore);
      expect(await counter()).toBe(counterBefore);
    });

    it('should reject amounts too large for the amount column before numbering', async () => {
      const counterBefore = await counter();

      await expect(
        ledgerService.createEntry(journal.id, {
          entry_date: '2024-03-16',
          lines: [
            { account_id: accounts['6111'].id, debit: '900719925474099.93' },
            { account_id: accounts['4411'].id, credit: '900719925474099.92' },
          ],
        }),
      ).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'lines[0].debit exceeds 12 integer digits: "900719925474099.93"',
        details: { field: 'lines[0].debit' },
      });

      expect(await counter()).toBe(counterBefore);
    });

    it('should reject a strict entry with a two-sided line', async () => {
      await expect(
        ledgerService.createEntry(journal.id, {
          entry_date: '2024-03-16',
          strict: true,
          lines: [
            { account_id: accounts['6111'].id, debit: 100, credit: 100 },
            { account_id: accounts['4411'].id, debit: 10, credit: 10 },
          ],
        }),
      ).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('should reject an unknown account before numbering', async () => {
      const counterBefore = await counter();

      await expect(
        ledgerService.createEntry(journal.id, {
          entry_date: '2024-03-16',
          lines: [
            { account_id: accounts['6111'].id, debit: 10 },
            { account_id: 99999, credit: 10 },
          ],
        }),
      ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Account not found: 99999 (line 2)' });

      expect(await counter()).toBe(counterBefore);
    });

    it('should reject an unknown journal', async () => {
      await expect(
        ledgerService.createEntry(99999, {
          lines: [
            { account_id: accounts['6111'].id, debit: 10 },
            { account_id: accounts['4411'].id, credit: 10 },
          ],
        }),
      ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Journal not found: 99999' });
    });

    it('should reject an impossible calendar date', async () => {
      await expect(
        ledgerService.createEntry(journal.id, {
          entry_date: '2024-02-30',
          lines: [
            { account_id: accounts['6111'].id, debit: 10 },
            { account_id: accounts['4411'].id, credit: 10 },
          ],
        }),
      ).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  // ── Validate / delete ────────────────────────────────────────────

  describe('validate and delete', () => {
    it('should validate an entry idempotently', async () => {
      const entry = await postEntry(
        journal,
        '2024-04-01',
        [
          [accounts['6111'], 10, 0],
          [accounts['5141'], 0, 10],
        ],
        { validate: false },
      );

      const first = await ledgerService.validateEntry(entry.id);
      const second = await ledgerService.validateEntry(entry.id);
      expect(first.validated).toBe(true);
      expect(second.validated).toBe(true);
    });

    it('should refuse to delete a validated entry', async () => {
      const entry = await postEntry(journal, '2024-04-02', [
        [accounts['6111'], 20, 0],
        [accounts['5141'], 0, 20],
      ]);

      await expect(ledgerService.deleteEntry(entry.id)).rejects.toMatchObject({
        code: 'ENTRY_VALIDATED',
        details: { reference: entry.reference },
      });
      expect((await ledgerService.getEntry(entry.id)).lines).toHaveLength(2);
    });

    it('should keep an entry validated after the draft check', async () => {
      const entry = await postEntry(journal, '2024-04-02', [
        [accounts['6111'], 25, 0],
        [accounts['5141'], 0, 25],
      ]);
      const spy = vi
        .spyOn(ledgerService, 'getEntry')
        .mockResolvedValueOnce({ ...entry, validated: false });

      try {
        await expect(ledgerService.deleteEntry(entry.id)).rejects.toMatchObject({ code: 'ENTRY_VALIDATED' });
      } finally {
        spy.mockRestore();
      }

      const kept = await ledgerService.getEntry(entry.id);
      expect(kept.validated).toBe(true);
      expect(kept.lines).toHaveLength(2);
    });

    it('should delete a draft entry with its lines and never reissue its reference', async () => {
      const draft = await postEntry(
        journal,
        '2024-04-03',
        [
          [accounts['6111'], 30, 0],
          [accounts['5141'], 0, 30],
        ],
        { validate: false },
      );
      await ledgerService.deleteEntry(draft.id);

      await expect(ledgerService.getEntry(draft.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
      const orphanLines: { id: number }[] = await getTestDb()('entry_lines').where({ entry_id: draft.id });
      expect(orphanLines).toHaveLength(0);

      const next = await postEntry(
        journal,
        '2024-04-03',
        [
          [accounts['6111'], 30, 0],
          [accounts['5141'], 0, 30],
        ],
        { validate: false },
      );
      expect(next.reference).not.toBe(draft.reference);
      expect(Number(next.reference.slice(-4))).toBe(Number(draft.reference.slice(-4)) + 1);
    });
  });

  // ── List / export ────────────────────────────────────────────────

  describe('listEntries and exportJournal', () => {
    it('should list entries of a journal within an inclusive date range', async () => {
      const od = await createJournal({ code: 'OD', name: 'Opérations diverses', type: 'general' });
      await postEntry(od, '2024-05-01', [
        [accounts['5141'], 5, 0],
        [accounts['1111'], 0, 5],
      ]);
      await postEntry(od, '2024-05-31', [
        [accounts['5141'], 7, 0],
        [accounts['1111'], 0, 7],
      ]);
      await postEntry(od, '2024-06-01', [
        [accounts['5141'], 9, 0],
        [accounts['1111'], 0, 9],
      ]);

      const may = await ledgerService.listEntries(od.id, { start: '2024-05-01', end: '2024-05-31' });
      expect(may.map((e) => e.reference)).toEqual(['OD-2024-0001', 'OD-2024-0002']);
      expect(may[1].total_debit).toBe(7);
    });

    it('should export one row per line, falling back to the entry description', async () => {
      const cash = await createJournal({ code: 'TRS', name: 'Trésorerie', type: 'cash', prefix: 'BQ-' });
      await ledgerService.createEntry(cash.id, {
        entry_date: '2024-07-10',
        description: 'Apport en capital',
        lines: [
          { account_id: accounts['5141'].id, label: 'Virement reçu', debit: '5000' },
          { account_id: accounts['1111'].id, credit: '5000' },
        ],
      });

      const rows = await ledgerService.exportJournal(cash.id);
      expect(rows).toEqual([
        {
          reference: 'BQ-2024-0001',
          date: '2024-07-10',
          account_code: '5141',
          account_name: 'Banques',
          label: 'Virement reçu',
          debit: 5000,
          credit: 0,
        },
        {
          reference: 'BQ-2024-0001',
          date: '2024-07-10',
          account_code: '1111',
          account_name: 'Capital social',
          label: 'Apport en capital',
          debit: 0,
          credit: 5000,
        },
      ]);
    });
  });
});
