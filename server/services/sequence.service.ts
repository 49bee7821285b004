// =============================================================
// File: server/services/sequence.service.ts
// Module: General ledger — document numbering
// Description: One counter per scope, shared by journals
//   (scope "journal:<CODE>") and invoicing ("invoice", "quote").
//   References read {prefix}{year}-{number:04}.
//
//   The counter is bumped with a single UPDATE inside the
//   caller's transaction. The UPDATE holds the row lock until
//   commit, so two creators in the same scope are serialized and
//   never read the same number. A rolled-back document gives its
//   number back; a deleted one does not.
// =============================================================

import { Knex } from 'knex';
import { SequenceScope } from '../../shared/types';
import { SequenceScopeRow } from '../database/rows';
import { toIsoDate, toTimestamp, todayIso } from '../database/values';
import { NotFoundError, ValidationError } from '../errors';
import { BaseService, Executor } from './base.service';

export function formatReference(prefix: string, year: number, number: number): string {
  return `${prefix}${year}-${String(number).padStart(4, '0')}`;
}

export function journalScope(journalCode: string): string {
  return `journal:${journalCode}`;
}

function yearOf(date: string): number {
  const year = parseInt(date.slice(0, 4), 10);
  if (!Number.isInteger(year)) throw new ValidationError(`Cannot read a year from "${date}"`);
  return year;
}

function mapScope(row: SequenceScopeRow): SequenceScope {
  return {
    id: row.id,
    scope: row.scope,
    prefix: row.prefix,
    next_number: Number(row.next_number),
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class SequenceService extends BaseService<SequenceScopeRow> {
  constructor() {
    super('sequence_scopes');
  }

  async getScope(scope: string, executor: Executor = this.db): Promise<SequenceScope | null> {
    const row: SequenceScopeRow | undefined = await executor('sequence_scopes').where({ scope }).first();
    return row ? mapScope(row) : null;
  }

  async listScopes(): Promise<SequenceScope[]> {
    const rows: SequenceScopeRow[] = await this.db('sequence_scopes').orderBy('scope');
    return rows.map(mapScope);
  }

  // ──────── ENSURE SCOPE ────────
  // Insert-or-ignore: an existing scope keeps its prefix and counter.

  async ensureScope(scope: string, prefix: string, executor: Executor = this.db): Promise<SequenceScope> {
    await executor('sequence_scopes')
      .insert({ scope, prefix, next_number: 1 })
      .onConflict('scope')
      .ignore();

    const existing = await this.getScope(scope, executor);
    if (!existing) throw new NotFoundError('Sequence scope', scope);
    return existing;
  }

  // ──────── NEXT REFERENCE ────────

  async nextReference(scope: string, date?: string, trx?: Knex.Transaction): Promise<string> {
    if (trx) return this.issue(trx, scope, date);
    return await this.db.transaction((inner) => this.issue(inner, scope, date));
  }

  private async issue(trx: Knex.Transaction, scope: string, date?: string): Promise<string> {
    const updated = await trx('sequence_scopes')
      .where({ scope })
      .update({ next_number: trx.raw('next_number + 1'), updated_at: trx.fn.now() });

    if (updated === 0) throw new NotFoundError('Sequence scope', scope);

    const row: SequenceScopeRow | undefined = await trx('sequence_scopes').where({ scope }).first();
    if (!row) throw new NotFoundError('Sequence scope', scope);

    const issued = Number(row.next_number) - 1;
    const when = date ? toIsoDate(date) : todayIso();
    return formatReference(row.prefix, yearOf(when), issued);
  }
}

export const sequenceService = new SequenceService();
