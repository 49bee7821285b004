/**
 * Chart of accounts: PCM seed, bulk import, CRUD rules and the default
 * journals.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { cleanAllData } from './setup';
import { createJournal, postEntry, resetCounters } from './helpers/factory';

import { chartOfAccountsService } from '../server/services/chart-of-accounts.service';
import { journalService } from '../server/services/journal.service';
import { vatService } from '../server/services/vat.service';

beforeAll(async () => {
  await cleanAllData();
  resetCounters();
});

describe('Chart of accounts', () => {
  describe('seedPcm', () => {
    it('should load the bundled PCM into an empty table', async () => {
      const result = await chartOfAccountsService.seedPcm();
      expect(result).toEqual({ created: 97, skipped: false });

      const bank = await chartOfAccountsService.getAccountByCode('5141');
      expect(bank.class_code).toBe('5');
      expect(bank.type).toBe('asset');
    });

    it('should not load twice', async () => {
      expect(await chartOfAccountsService.seedPcm()).toEqual({ created: 0, skipped: true });
      expect(await chartOfAccountsService.listAccounts()).toHaveLength(97);
    });

    it('should filter by class', async () => {
      const treasury = await chartOfAccountsService.listAccounts('5');
      expect(treasury).toHaveLength(6);
      expect(treasury.every((a) => a.class_code === '5')).toBe(true);
    });
  });

  describe('importAccounts', () => {
    it('should create new codes and skip existing ones', async () => {
      const result = await chartOfAccountsService.importAccounts([
        { code: '1111', name: 'Capital social', class: '1', type: 'equity' },
        { code: '61251', name: 'Fournitures de bureau', class: 6, type: 'expense' },
      ]);

      expect(result).toEqual({ created: 1, skipped: 1 });
      expect((await chartOfAccountsService.getAccountByCode('61251')).class_code).toBe('6');
    });

    it('should reject the whole import when a row is invalid', async () => {
      await expect(
        chartOfAccountsService.importAccounts([
          { code: '61252', name: 'Petit outillage', class: '6', type: 'expense' },
          { code: '99999', name: 'Hors plan', class: '9', type: 'expense' },
        ]),
      ).rejects.toMatchObject({ code: 'INVALID_INPUT', details: { row: 2 } });

      await expect(chartOfAccountsService.getAccountByCode('61252')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  describe('createAccount / updateAccount / deleteAccount', () => {
    it('should reject a duplicate code', async () => {
      await expect(
        chartOfAccountsService.createAccount({ code: '1111', name: 'Doublon', class_code: '1', type: 'equity' }),
      ).rejects.toMatchObject({ code: 'DUPLICATE_KEY', message: 'Account with code "1111" already exists' });
    });

    it('should rename an account', async () => {
      const account = await chartOfAccountsService.getAccountByCode('61251');
      const updated = await chartOfAccountsService.updateAccount(account.id, { name: 'Fournitures' });
      expect(updated.name).toBe('Fournitures');
      expect(updated.code).toBe('61251');
    });

    it('should refuse to delete an account used by entry lines', async () => {
      const bank = await chartOfAccountsService.getAccountByCode('5141');
      const capital = await chartOfAccountsService.getAccountByCode('1111');
      const journal = await createJournal();
      await postEntry(journal, '2024-01-02', [
        [bank, 100, 0],
        [capital, 0, 100],
      ]);

      await expect(chartOfAccountsService.deleteAccount(bank.id)).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'Account 5141 is used by entry lines and cannot be deleted',
      });
    });

    it('should delete an unused account', async () => {
      const account = await chartOfAccountsService.getAccountByCode('61251');
      await chartOfAccountsService.deleteAccount(account.id);
      await expect(chartOfAccountsService.getAccount(account.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  describe('default journals', () => {
    it('should create the four default journals and VAT rates once', async () => {
      expect(await journalService.initDefaults()).toEqual({ created: 4 });
      expect(await journalService.initDefaults()).toEqual({ created: 0 });

      const journals = await journalService.listJournals();
      expect(journals.filter((j) => ['ACH', 'OD', 'TRS', 'VTE'].includes(j.code)).map((j) => [j.code, j.prefix])).toEqual([
        ['ACH', 'ACH-'],
        ['OD', 'OD-'],
        ['TRS', 'TRS-'],
        ['VTE', 'VTE-'],
      ]);
      expect((await vatService.listVatRates()).map((r) => r.code)).toEqual(['TVA20', 'EXO']);
    });

    it('should reject a duplicate journal code', async () => {
      await expect(
        journalService.createJournal({ code: 'ach', name: 'Achats bis', type: 'purchases' }),
      ).rejects.toMatchObject({ code: 'DUPLICATE_KEY', message: 'Journal with code "ACH" already exists' });
    });
  });
});
