// =============================================================
// File: server/services/journal.service.ts
// Module: General ledger — journals
// Description: Journals (ACH, VTE, TRS, OD, ...). Each journal
//   owns the sequence scope "journal:<CODE>" that numbers its
//   entries; the scope is created with the journal.
// =============================================================

import { Knex } from 'knex';
import { DEFAULT_JOURNALS, DEFAULT_VAT_RATES } from '../../shared/constants';
import { Journal } from '../../shared/types';
import { JournalRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { DuplicateKeyError, NotFoundError, isUniqueViolation } from '../errors';
import { parseInput } from '../schemas/common';
import { JournalInput, JournalInputSchema } from '../schemas/ledger.schema';
import { BaseService, Executor } from './base.service';
import { journalScope, sequenceService } from './sequence.service';

function mapJournal(row: JournalRow): Journal {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    type: row.type,
    sequence_scope: row.sequence_scope,
    prefix: row.prefix,
    next_number: Number(row.next_number),
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

function journalQuery(executor: Executor) {
  return executor('journals as j')
    .join('sequence_scopes as s', 's.scope', 'j.sequence_scope')
    .select('j.*', 's.prefix', 's.next_number');
}

/**
 * Creates the default journals and VAT rates that are missing.
 * Returns the number of journals created.
 */
export async function seedDefaultJournals(db: Knex): Promise<number> {
  return await db.transaction(async (trx) => {
    let created = 0;

    for (const journal of DEFAULT_JOURNALS) {
      const exists = await trx('journals').where({ code: journal.code }).first();
      if (exists) continue;

      const scope = journalScope(journal.code);
      await sequenceService.ensureScope(scope, journal.prefix, trx);
      await trx('journals').insert({
        code: journal.code,
        name: journal.name,
        type: journal.type,
        sequence_scope: scope,
      });
      created++;
    }

    for (const rate of DEFAULT_VAT_RATES) {
      await trx('vat_rates').insert(rate).onConflict('code').ignore();
    }

    return created;
  });
}

class JournalService extends BaseService<JournalRow> {
  constructor() {
    super('journals');
  }

  async listJournals(): Promise<Journal[]> {
    const rows: JournalRow[] = await journalQuery(this.db).orderBy('j.code', 'asc');
    return rows.map(mapJournal);
  }

  async getJournal(id: number, executor: Executor = this.db): Promise<Journal> {
    const row: JournalRow | undefined = await journalQuery(executor).where('j.id', id).first();
    if (!row) throw new NotFoundError('Journal', id);
    return mapJournal(row);
  }

  // ──────── CREATE ────────
  // Journal and its sequence scope are committed together.

  async createJournal(input: unknown): Promise<Journal> {
    const data: JournalInput = parseInput(JournalInputSchema, input);
    const scope = journalScope(data.code);
    const prefix = data.prefix ?? `${data.code}-`;

    try {
      return await this.db.transaction(async (trx) => {
        await sequenceService.ensureScope(scope, prefix, trx);
        const [row]: JournalRow[] = await trx('journals')
          .insert({ code: data.code, name: data.name, type: data.type, sequence_scope: scope })
          .returning('*');
        return await this.getJournal(row.id, trx);
      });
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateKeyError('Journal', 'code', data.code);
      throw error;
    }
  }

  async initDefaults(): Promise<{ created: number }> {
    const created = await seedDefaultJournals(this.db);
    return { created };
  }
}

export const journalService = new JournalService();
