// =============================================================
// File: server/services/reports.service.ts
// Module: General ledger — reports
// Description: Trial balance, general ledger, balance sheet and
//   income statement. Every report reads the same line set:
//   lines of validated entries dated within an inclusive
//   [start, end] range, narrowed by an account predicate.
//
//   Balance sheet and income statement use the simplified class
//   mapping in REPORT_CLASS_MAPPING; they are not a full PCM
//   classification.
// =============================================================

import { Knex } from 'knex';
import { REPORT_CLASS_MAPPING } from '../../shared/constants';
import {
  BalanceSheet,
  DateRange,
  GeneralLedger,
  IncomeStatement,
  LedgerAccount,
  LedgerPosting,
  TrialBalance,
  TrialBalanceRow,
} from '../../shared/types';
import { getDb } from '../database/connection';
import { AccountRow, AccountSumRow, PostingRow } from '../database/rows';
import { NormalizedRange, fromCents, normalizeRange, parseNum, toCents, toIsoDate } from '../database/values';
import { NotFoundError } from '../errors';

// ────────────────────────────────────────────────────────────
// Line set primitive
// ────────────────────────────────────────────────────────────

export interface LineFilter {
  range: NormalizedRange;
  classCodes?: readonly string[];
  accountIds?: readonly number[];
}

export interface AccountTotals {
  account_id: number;
  code: string;
  name: string;
  class_code: string;
  debit_cents: number;
  credit_cents: number;
}

function validatedLines(db: Knex, filter: LineFilter): Knex.QueryBuilder {
  const query = db('entry_lines as l')
    .join('entries as e', 'e.id', 'l.entry_id')
    .join('accounts as a', 'a.id', 'l.account_id')
    .where('e.validated', true);

  if (filter.range.start) query.where('e.entry_date', '>=', filter.range.start);
  if (filter.range.end) query.where('e.entry_date', '<=', filter.range.end);
  if (filter.classCodes) query.whereIn('a.class_code', [...filter.classCodes]);
  if (filter.accountIds) query.whereIn('a.id', [...filter.accountIds]);
  return query;
}

/**
 * Σdebit and Σcredit per account over the filtered line set, ordered by
 * account code. Amounts are integer cents.
 */
export async function sumLines(filter: LineFilter, db: Knex = getDb()): Promise<AccountTotals[]> {
  const rows: AccountSumRow[] = await validatedLines(db, filter)
    .groupBy('a.id', 'a.code', 'a.name', 'a.class_code')
    .select(
      'a.id as account_id',
      'a.code',
      'a.name',
      'a.class_code',
      db.raw('COALESCE(SUM(l.debit), 0) as total_debit'),
      db.raw('COALESCE(SUM(l.credit), 0) as total_credit'),
    )
    .orderBy('a.code', 'asc');

  return rows.map((row) => ({
    account_id: row.account_id,
    code: row.code,
    name: row.name,
    class_code: row.class_code,
    debit_cents: toCents(parseNum(row.total_debit)),
    credit_cents: toCents(parseNum(row.total_credit)),
  }));
}

/** Σ(debit − credit) in cents over every account in `totals`. */
function netDebitCents(totals: AccountTotals[]): number {
  return totals.reduce((sum, t) => sum + t.debit_cents - t.credit_cents, 0);
}

// ────────────────────────────────────────────────────────────
// Reports
// ────────────────────────────────────────────────────────────

export async function trialBalance(range: DateRange = {}): Promise<TrialBalance> {
  const bounds = normalizeRange(range);
  const totals = await sumLines({ range: bounds });

  const rows: TrialBalanceRow[] = totals.map((t) => ({
    code: t.code,
    name: t.name,
    class_code: t.class_code,
    debit: fromCents(t.debit_cents),
    credit: fromCents(t.credit_cents),
    balance: fromCents(t.debit_cents - t.credit_cents),
  }));

  // Grand totals add up the row values
  return {
    start: bounds.start,
    end: bounds.end,
    rows,
    totals: {
      debit: fromCents(rows.reduce((sum, r) => sum + toCents(r.debit), 0)),
      credit: fromCents(rows.reduce((sum, r) => sum + toCents(r.credit), 0)),
    },
  };
}

export async function generalLedger(range: DateRange = {}, accountCode?: string): Promise<GeneralLedger> {
  const bounds = normalizeRange(range);
  const db = getDb();

  const accountQuery = db('accounts').orderBy('code', 'asc');
  if (accountCode) accountQuery.where({ code: accountCode });
  const accounts: AccountRow[] = await accountQuery;
  if (accountCode && accounts.length === 0) throw new NotFoundError('Account', accountCode);

  const postingRows: PostingRow[] = await validatedLines(db, {
    range: bounds,
    accountIds: accounts.map((a) => a.id),
  })
    .join('journals as j', 'j.id', 'e.journal_id')
    .select(
      'e.id as entry_id',
      'e.entry_date',
      'e.reference',
      'j.code as journal_code',
      'a.code as account_code',
      'l.label',
      'l.debit',
      'l.credit',
    )
    .orderBy('e.entry_date', 'asc')
    .orderBy('e.reference', 'asc')
    .orderBy('l.id', 'asc');

  const byCode = new Map<string, PostingRow[]>();
  for (const row of postingRows) {
    const list = byCode.get(row.account_code) ?? [];
    list.push(row);
    byCode.set(row.account_code, list);
  }

  const ledgerAccounts: LedgerAccount[] = accounts.map((account) => {
    let debitCents = 0;
    let creditCents = 0;
    const postings: LedgerPosting[] = (byCode.get(account.code) ?? []).map((row) => {
      const debit = toCents(parseNum(row.debit));
      const credit = toCents(parseNum(row.credit));
      debitCents += debit;
      creditCents += credit;
      return {
        entry_id: row.entry_id,
        date: toIsoDate(row.entry_date),
        reference: row.reference,
        journal_code: row.journal_code,
        label: row.label ?? '',
        debit: fromCents(debit),
        credit: fromCents(credit),
        running_balance: fromCents(debitCents - creditCents),
      };
    });

    return {
      code: account.code,
      name: account.name,
      postings,
      total_debit: fromCents(debitCents),
      total_credit: fromCents(creditCents),
      balance: fromCents(debitCents - creditCents),
    };
  });

  return { start: bounds.start, end: bounds.end, accounts: ledgerAccounts };
}

export async function balanceSheet(range: DateRange = {}): Promise<BalanceSheet> {
  const bounds = normalizeRange(range);
  const assets = await sumLines({ range: bounds, classCodes: REPORT_CLASS_MAPPING.ASSETS });
  const liabilities = await sumLines({ range: bounds, classCodes: REPORT_CLASS_MAPPING.LIABILITIES_AND_EQUITY });

  return {
    start: bounds.start,
    end: bounds.end,
    assets: fromCents(netDebitCents(assets)),
    // Credit balances of class 4 read as positive
    liabilities_and_equity: fromCents(-netDebitCents(liabilities)),
  };
}

export async function incomeStatement(range: DateRange = {}): Promise<IncomeStatement> {
  const bounds = normalizeRange(range);
  const revenueLines = await sumLines({ range: bounds, classCodes: REPORT_CLASS_MAPPING.REVENUE });
  const expenseLines = await sumLines({ range: bounds, classCodes: REPORT_CLASS_MAPPING.EXPENSES });

  const revenue = -netDebitCents(revenueLines);
  const expenses = netDebitCents(expenseLines);

  return {
    start: bounds.start,
    end: bounds.end,
    revenue: fromCents(revenue),
    expenses: fromCents(expenses),
    result: fromCents(revenue - expenses),
  };
}

export const reportsService = {
  sumLines,
  trialBalance,
  generalLedger,
  balanceSheet,
  incomeStatement,
};
