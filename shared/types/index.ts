import {
  ACCOUNT_CLASSES,
  ACCOUNT_TYPES,
  JOURNAL_TYPES,
  VAT_FREQUENCIES,
} from '../constants';

// ============================================================
// Base types used by all entities
// ============================================================

export interface BaseEntity {
  id: number;
  created_at: string;
  updated_at: string;
}

export interface DateRange {
  start?: string;
  end?: string;
}

export type AccountType = (typeof ACCOUNT_TYPES)[number];
export type AccountClass = (typeof ACCOUNT_CLASSES)[number];
export type JournalType = (typeof JOURNAL_TYPES)[number];
export type VatFrequency = (typeof VAT_FREQUENCIES)[number];

// ============================================================
// Ledger
// ============================================================

export interface Account extends BaseEntity {
  code: string;
  name: string;
  class_code: string;
  type: string;
}

export interface SequenceScope extends BaseEntity {
  scope: string;
  prefix: string;
  next_number: number;
}

export interface Journal extends BaseEntity {
  code: string;
  name: string;
  type: string;
  sequence_scope: string;
  prefix: string;
  next_number: number;
}

export interface EntryLine {
  id: number;
  entry_id: number;
  account_id: number;
  account_code: string;
  account_name: string;
  label: string | null;
  debit: number;
  credit: number;
}

export interface Entry extends BaseEntity {
  journal_id: number;
  entry_date: string;
  reference: string;
  description: string | null;
  document_ref: string | null;
  validated: boolean;
}

export interface EntryWithLines extends Entry {
  lines: EntryLine[];
  total_debit: number;
  total_credit: number;
  is_balanced: boolean;
}

export interface JournalExportRow {
  reference: string;
  date: string;
  account_code: string;
  account_name: string;
  label: string;
  debit: number;
  credit: number;
}

// ============================================================
// Reports
// ============================================================

export interface TrialBalanceRow {
  code: string;
  name: string;
  class_code: string;
  debit: number;
  credit: number;
  balance: number;
}

export interface TrialBalance {
  start: string | null;
  end: string | null;
  rows: TrialBalanceRow[];
  totals: { debit: number; credit: number };
}

export interface LedgerPosting {
  entry_id: number;
  date: string;
  reference: string;
  journal_code: string;
  label: string;
  debit: number;
  credit: number;
  running_balance: number;
}

export interface LedgerAccount {
  code: string;
  name: string;
  postings: LedgerPosting[];
  total_debit: number;
  total_credit: number;
  balance: number;
}

export interface GeneralLedger {
  start: string | null;
  end: string | null;
  accounts: LedgerAccount[];
}

export interface BalanceSheet {
  start: string | null;
  end: string | null;
  assets: number;
  liabilities_and_equity: number;
}

export interface IncomeStatement {
  start: string | null;
  end: string | null;
  revenue: number;
  expenses: number;
  result: number;
}

// ============================================================
// Invoicing & VAT
// ============================================================

export interface VatRate extends BaseEntity {
  code: string;
  label: string;
  rate: number;
}

export interface Customer extends BaseEntity {
  name: string;
  vat_id: string | null;
  address: string | null;
}

export interface InvoiceItem {
  id: number;
  invoice_id: number;
  description: string;
  quantity: number;
  unit_price: number;
  vat_rate_id: number | null;
  vat_rate: number;
  total_ht: number;
  tva_amount: number;
}

export interface Invoice extends BaseEntity {
  number: string;
  invoice_date: string;
  customer_id: number;
  customer_name: string;
  is_quote: boolean;
  prefix: string;
  total_ht: number;
  total_tva: number;
  total_ttc: number;
}

export interface InvoiceWithItems extends Invoice {
  items: InvoiceItem[];
}

export interface VatDeclarationRow {
  date: string;
  invoice_number: string;
  description: string;
  quantity: number;
  unit_price: number;
  total_ht: number;
  tva_amount: number;
}

export interface VatDeclaration {
  period: string;
  frequency: VatFrequency;
  start: string;
  end: string;
  total_ht: number;
  total_tva: number;
  rows: VatDeclarationRow[];
}

// ============================================================
// Cabinet
// ============================================================

export interface User {
  id: number;
  email: string;
  role: string;
  created_at: string;
}

export interface Cabinet extends BaseEntity {
  name: string;
}

export interface Societe extends BaseEntity {
  name: string;
  type_juridique: string | null;
  capital: number | null;
  gerant: string | null;
  rc: string | null;
  cabinet_id: number | null;
}

export interface Associate {
  id?: number;
  societe_id?: number;
  name: string;
  address: string | null;
  parts_count: number;
}

export interface DistributionRow {
  name: string;
  address: string | null;
  parts_count: number;
  percent: number;
}

export interface SocieteDetail extends Societe {
  cabinet_name: string | null;
  associates: Associate[];
  total_parts: number;
  distribution: DistributionRow[];
}

export interface Cession extends BaseEntity {
  societe_id: number;
  societe_name?: string;
  cession_date: string;
  cedant: string;
  cedant_address: string | null;
  cessionnaire: string;
  cessionnaire_address: string | null;
  parts_count: number;
  price: number | null;
  payment_mode: string | null;
  conditions: string | null;
}

export interface DocTemplate extends BaseEntity {
  title: string;
  type: string;
  content: string;
}

export interface RenderedTemplate {
  title: string;
  type: string;
  filename: string;
  content: string;
}

// ============================================================
// API envelopes
// ============================================================

export interface ApiSuccess<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ApiFailure {
  success: false;
  error: string;
  code: string;
  details?: Record<string, unknown>;
}
