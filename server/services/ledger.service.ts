// =============================================================
// File: server/services/ledger.service.ts
// Module: General ledger — entries
// Description: Double-entry engine.
//   - Σdebit must equal Σcredit (to the cent) before anything
//     is written; a rejected entry consumes no reference
//   - Lines with zero debit and zero credit are dropped
//   - Legacy tolerance by default: single-line entries and
//     lines carrying both sides are accepted. Strict mode
//     (LEDGER_STRICT_LINES or `strict: true`) rejects both
//   - Entry + lines committed in one transaction, referenced
//     from the journal's sequence scope
//   - Validated entries feed the reports and can't be deleted
// =============================================================

import { getConfig } from '../config';
import { Entry, EntryLine, EntryWithLines, JournalExportRow } from '../../shared/types';
import { AccountRow, EntryLineRow, EntryRow, PostingRow } from '../database/rows';
import {
  fromCents,
  normalizeRange,
  parseAmount,
  parseIsoDate,
  parseNum,
  round2,
  toCents,
  toIsoDate,
  toTimestamp,
  todayIso,
} from '../database/values';
import { EntryValidatedError, NotFoundError, UnbalancedEntryError, ValidationError } from '../errors';
import { parseInput } from '../schemas/common';
import { EntryInput, EntryInputSchema, EntryLineInput } from '../schemas/ledger.schema';
import { BaseService, Executor } from './base.service';
import { journalService } from './journal.service';
import { sequenceService } from './sequence.service';

// ────────────────────────────────────────────────────────────
// Balance check
// ────────────────────────────────────────────────────────────

export interface LineDraft {
  account_id: number;
  label: string | null;
  debit: number;
  credit: number;
}

export interface CheckedEntry {
  lines: LineDraft[];
  total_debit: number;
  total_credit: number;
}

export interface BalanceOptions {
  strict?: boolean;
}

/**
 * Parses the amounts of `lines`, drops the all-zero ones and checks that
 * the entry balances. Throws INVALID_INPUT for malformed or negative
 * amounts and UNBALANCED_ENTRY with both totals otherwise.
 */
export function checkEntryBalance(lines: EntryLineInput[], options: BalanceOptions = {}): CheckedEntry {
  const kept: LineDraft[] = [];
  let debitCents = 0;
  let creditCents = 0;

  lines.forEach((line, index) => {
    const debit = parseAmount(line.debit, `lines[${index}].debit`);
    const credit = parseAmount(line.credit, `lines[${index}].credit`);

    if (debit < 0 || credit < 0) {
      throw new ValidationError(`Line ${index + 1}: amounts cannot be negative`, { line: index + 1 });
    }
    if (debit === 0 && credit === 0) return;
    if (options.strict && debit !== 0 && credit !== 0) {
      throw new ValidationError(`Line ${index + 1}: a line cannot carry both a debit and a credit`, {
        line: index + 1,
      });
    }

    kept.push({ account_id: line.account_id, label: line.label ?? null, debit, credit });
    debitCents += toCents(debit);
    creditCents += toCents(credit);
  });

  if (kept.length === 0) {
    throw new ValidationError('Entry has no line with a non-zero amount');
  }
  if (options.strict && kept.length < 2) {
    throw new ValidationError('Entry needs at least two lines');
  }
  if (debitCents !== creditCents) {
    throw new UnbalancedEntryError(fromCents(debitCents), fromCents(creditCents));
  }

  return { lines: kept, total_debit: fromCents(debitCents), total_credit: fromCents(creditCents) };
}

// ────────────────────────────────────────────────────────────
// Mapping
// ────────────────────────────────────────────────────────────

function mapEntry(row: EntryRow): Entry {
  return {
    id: row.id,
    journal_id: row.journal_id,
    entry_date: toIsoDate(row.entry_date),
    reference: row.reference,
    description: row.description,
    document_ref: row.document_ref,
    validated: row.validated,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

function mapLine(row: EntryLineRow): EntryLine {
  return {
    id: row.id,
    entry_id: row.entry_id,
    account_id: row.account_id,
    account_code: row.account_code,
    account_name: row.account_name,
    label: row.label,
    debit: round2(parseNum(row.debit)),
    credit: round2(parseNum(row.credit)),
  };
}

function withLines(entry: Entry, lines: EntryLine[]): EntryWithLines {
  const debitCents = lines.reduce((sum, l) => sum + toCents(l.debit), 0);
  const creditCents = lines.reduce((sum, l) => sum + toCents(l.credit), 0);
  return {
    ...entry,
    lines,
    total_debit: fromCents(debitCents),
    total_credit: fromCents(creditCents),
    is_balanced: debitCents === creditCents,
  };
}

function linesQuery(executor: Executor) {
  return executor('entry_lines as l')
    .join('accounts as a', 'a.id', 'l.account_id')
    .select('l.*', 'a.code as account_code', 'a.name as account_name')
    .orderBy('l.id', 'asc');
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class LedgerService extends BaseService<EntryRow> {
  constructor() {
    super('entries');
  }

  // ──────── CREATE ENTRY ────────

  async createEntry(journalId: number, input: unknown): Promise<EntryWithLines> {
    const data: EntryInput = parseInput(EntryInputSchema, input);
    const entryDate = data.entry_date ? parseIsoDate(data.entry_date, 'entry_date') : todayIso();
    const strict = data.strict ?? getConfig().LEDGER_STRICT_LINES;

    const checked = checkEntryBalance(data.lines, { strict });
    const journal = await journalService.getJournal(journalId);

    const accountIds = [...new Set(checked.lines.map((l) => l.account_id))];
    const accounts: Pick<AccountRow, 'id'>[] = await this.db('accounts').whereIn('id', accountIds).select('id');
    const known = new Set(accounts.map((a) => a.id));
    checked.lines.forEach((line, index) => {
      if (!known.has(line.account_id)) {
        throw new NotFoundError('Account', `${line.account_id} (line ${index + 1})`);
      }
    });

    return await this.db.transaction(async (trx) => {
      const reference = await sequenceService.nextReference(journal.sequence_scope, entryDate, trx);

      const [entry]: EntryRow[] = await trx('entries')
        .insert({
          journal_id: journal.id,
          entry_date: entryDate,
          reference,
          description: data.description,
          document_ref: data.document_ref,
          validated: false,
        })
        .returning('*');

      await trx('entry_lines').insert(
        checked.lines.map((line) => ({
          entry_id: entry.id,
          account_id: line.account_id,
          label: line.label,
          debit: line.debit,
          credit: line.credit,
        })),
      );

      return await this.getEntry(entry.id, trx);
    });
  }

  // ──────── READ ────────

  async getEntry(id: number, executor: Executor = this.db): Promise<EntryWithLines> {
    const row = await this.findRow(id, executor);
    if (!row) throw new NotFoundError('Entry', id);

    const lines: EntryLineRow[] = await linesQuery(executor).where('l.entry_id', id);
    return withLines(mapEntry(row), lines.map(mapLine));
  }

  async listEntries(journalId: number, range: { start?: string; end?: string } = {}): Promise<EntryWithLines[]> {
    const { start, end } = normalizeRange(range);
    await journalService.getJournal(journalId);

    const query = this.db('entries').where({ journal_id: journalId });
    if (start) query.where('entry_date', '>=', start);
    if (end) query.where('entry_date', '<=', end);
    const rows: EntryRow[] = await query.orderBy('entry_date', 'asc').orderBy('reference', 'asc');
    if (rows.length === 0) return [];

    const lineRows: EntryLineRow[] = await linesQuery(this.db).whereIn(
      'l.entry_id',
      rows.map((r) => r.id),
    );
    const byEntry = new Map<number, EntryLine[]>();
    for (const line of lineRows) {
      const list = byEntry.get(line.entry_id) ?? [];
      list.push(mapLine(line));
      byEntry.set(line.entry_id, list);
    }

    return rows.map((row) => withLines(mapEntry(row), byEntry.get(row.id) ?? []));
  }

  // ──────── VALIDATE / DELETE ────────

  async validateEntry(id: number): Promise<EntryWithLines> {
    const entry = await this.getEntry(id);
    if (!entry.validated) {
      await this.updateRow(id, { validated: true });
    }
    return await this.getEntry(id);
  }

  // The reference of a deleted entry is never issued again.
  async deleteEntry(id: number): Promise<void> {
    const entry = await this.getEntry(id);
    if (entry.validated) throw new EntryValidatedError(entry.reference);

    await this.db.transaction(async (trx) => {
      await trx('entry_lines').where({ entry_id: id }).del();
      // validated in the meantime: the rollback restores the lines
      const deleted = await trx('entries').where({ id, validated: false }).del();
      if (deleted === 0) throw new EntryValidatedError(entry.reference);
    });
  }

  // ──────── EXPORT ────────

  async exportJournal(journalId: number): Promise<JournalExportRow[]> {
    await journalService.getJournal(journalId);

    const rows: (PostingRow & { account_name: string; description: string | null })[] = await this.db(
      'entry_lines as l',
    )
      .join('entries as e', 'e.id', 'l.entry_id')
      .join('accounts as a', 'a.id', 'l.account_id')
      .join('journals as j', 'j.id', 'e.journal_id')
      .where('e.journal_id', journalId)
      .select(
        'e.id as entry_id',
        'e.entry_date',
        'e.reference',
        'e.description',
        'j.code as journal_code',
        'a.code as account_code',
        'a.name as account_name',
        'l.label',
        'l.debit',
        'l.credit',
      )
      .orderBy('e.entry_date', 'asc')
      .orderBy('e.reference', 'asc')
      .orderBy('l.id', 'asc');

    return rows.map((row) => ({
      reference: row.reference,
      date: toIsoDate(row.entry_date),
      account_code: row.account_code,
      account_name: row.account_name,
      label: row.label ?? row.description ?? '',
      debit: round2(parseNum(row.debit)),
      credit: round2(parseNum(row.credit)),
    }));
  }
}

export const ledgerService = new LedgerService();
