// =============================================================
// File: server/services/chart-of-accounts.service.ts
// Module: General ledger — chart of accounts
// Description: Moroccan PCM accounts.
//   - Flat list keyed by code; class = first digit (1..8)
//   - Bundled PCM seed loaded once into an empty table
//   - Bulk import of {code, name, class, type} rows
//   - Accounts referenced by entry lines cannot be deleted
// =============================================================

import { Account } from '../../shared/types';
import pcmAccounts from '../database/data/pcm_ma.json';
import { AccountRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { NotFoundError, ValidationError } from '../errors';
import {
  AccountImportRowSchema,
  AccountInput,
  AccountInputSchema,
  UpdateAccountInput,
  UpdateAccountSchema,
} from '../schemas/ledger.schema';
import { parseInput } from '../schemas/common';
import { BaseService, Executor } from './base.service';

const UNIQUE_CODE = { entity: 'Account', field: 'code' };

export interface ImportResult {
  created: number;
  skipped: number;
}

export interface SeedResult {
  created: number;
  skipped: boolean;
}

function mapAccount(row: AccountRow): Account {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    class_code: row.class_code,
    type: row.type,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class ChartOfAccountsService extends BaseService<AccountRow> {
  constructor() {
    super('accounts');
  }

  // ──────── LIST / GET ────────

  async listAccounts(classCode?: string): Promise<Account[]> {
    const query = this.db('accounts').orderBy('code', 'asc');
    if (classCode) query.where({ class_code: classCode });
    const rows: AccountRow[] = await query;
    return rows.map(mapAccount);
  }

  async getAccount(id: number, executor: Executor = this.db): Promise<Account> {
    const row = await this.findRow(id, executor);
    if (!row) throw new NotFoundError('Account', id);
    return mapAccount(row);
  }

  async getAccountByCode(code: string): Promise<Account> {
    const row: AccountRow | undefined = await this.db('accounts').where({ code }).first();
    if (!row) throw new NotFoundError('Account', code);
    return mapAccount(row);
  }

  // ──────── CREATE / UPDATE / DELETE ────────

  async createAccount(input: unknown): Promise<Account> {
    const data: AccountInput = parseInput(AccountInputSchema, input);
    const row = await this.insertRow(data, UNIQUE_CODE);
    return mapAccount(row);
  }

  async updateAccount(id: number, input: unknown): Promise<Account> {
    const data: UpdateAccountInput = parseInput(UpdateAccountSchema, input);
    await this.getAccount(id);

    const changes: Record<string, unknown> = {};
    if (data.name !== undefined) changes.name = data.name;
    if (data.type !== undefined) changes.type = data.type;

    const row = await this.updateRow(id, changes);
    if (!row) throw new NotFoundError('Account', id);
    return mapAccount(row);
  }

  async deleteAccount(id: number): Promise<void> {
    const account = await this.getAccount(id);

    const usage = await this.countRows({ account_id: id }, 'entry_lines');
    if (usage > 0) {
      throw new ValidationError(`Account ${account.code} is used by entry lines and cannot be deleted`, {
        account_id: id,
      });
    }

    await this.deleteRow(id);
  }

  // ──────── SEED PCM ────────
  // Loads the bundled chart only into an empty table.

  async seedPcm(): Promise<SeedResult> {
    if ((await this.countRows()) > 0) {
      return { created: 0, skipped: true };
    }

    const { created } = await this.importAccounts(pcmAccounts);
    return { created, skipped: false };
  }

  // ──────── IMPORT ────────

  async importAccounts(rows: unknown[]): Promise<ImportResult> {
    const parsed = rows.map((row, index) => {
      const result = AccountImportRowSchema.safeParse(row);
      if (!result.success) {
        const reason = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ValidationError(`Account row ${index + 1} is invalid: ${reason}`, { row: index + 1 });
      }
      return result.data;
    });

    return await this.db.transaction(async (trx) => {
      const codes = parsed.map((r) => r.code);
      const known: Pick<AccountRow, 'code'>[] = await trx('accounts').whereIn('code', codes).select('code');
      const seen = new Set(known.map((r) => r.code));

      let created = 0;
      for (const row of parsed) {
        if (seen.has(row.code)) continue;
        await trx('accounts').insert(row);
        seen.add(row.code);
        created++;
      }

      return { created, skipped: parsed.length - created };
    });
  }
}

export const chartOfAccountsService = new ChartOfAccountsService();
