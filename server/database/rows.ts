// Raw row shapes as the drivers return them. Services map these to the
// shared API types.

import type { DbNumeric } from './values';

type DbDate = string | Date;

interface Timestamps {
  created_at: DbDate;
  updated_at: DbDate;
}

export interface AccountRow extends Timestamps {
  id: number;
  code: string;
  name: string;
  class_code: string;
  type: string;
}

export interface SequenceScopeRow extends Timestamps {
  id: number;
  scope: string;
  prefix: string;
  next_number: number;
}

export interface JournalRow extends Timestamps {
  id: number;
  code: string;
  name: string;
  type: string;
  sequence_scope: string;
  prefix: string;
  next_number: number;
}

export interface EntryRow extends Timestamps {
  id: number;
  journal_id: number;
  entry_date: DbDate;
  reference: string;
  description: string | null;
  document_ref: string | null;
  validated: boolean;
}

export interface EntryLineRow {
  id: number;
  entry_id: number;
  account_id: number;
  account_code: string;
  account_name: string;
  label: string | null;
  debit: DbNumeric;
  credit: DbNumeric;
}

export interface PostingRow {
  entry_id: number;
  entry_date: DbDate;
  reference: string;
  journal_code: string;
  account_code: string;
  label: string | null;
  debit: DbNumeric;
  credit: DbNumeric;
}

export interface SumRow {
  total_debit: DbNumeric;
  total_credit: DbNumeric;
}

export interface AccountSumRow extends SumRow {
  account_id: number;
  code: string;
  name: string;
  class_code: string;
}

export interface VatRateRow extends Timestamps {
  id: number;
  code: string;
  label: string;
  rate: DbNumeric;
}

export interface CustomerRow extends Timestamps {
  id: number;
  name: string;
  vat_id: string | null;
  address: string | null;
}

export interface InvoiceRow extends Timestamps {
  id: number;
  number: string;
  invoice_date: DbDate;
  customer_id: number;
  customer_name: string;
  is_quote: boolean;
  prefix: string;
}

export interface InvoiceItemRow {
  id: number;
  invoice_id: number;
  description: string;
  quantity: DbNumeric;
  unit_price: DbNumeric;
  vat_rate_id: number | null;
  rate: DbNumeric;
}

export interface VatItemRow extends InvoiceItemRow {
  invoice_date: DbDate;
  number: string;
}

export interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  role: string;
  created_at: DbDate;
}

export interface CabinetRow extends Timestamps {
  id: number;
  name: string;
}

export interface SocieteRow extends Timestamps {
  id: number;
  name: string;
  type_juridique: string | null;
  capital: DbNumeric;
  gerant: string | null;
  rc: string | null;
  cabinet_id: number | null;
  cabinet_name?: string | null;
}

export interface AssociateRow extends Timestamps {
  id: number;
  societe_id: number;
  name: string;
  address: string | null;
  parts_count: number;
}

export interface CessionRow extends Timestamps {
  id: number;
  societe_id: number;
  societe_name?: string;
  cession_date: DbDate;
  cedant: string;
  cedant_address: string | null;
  cessionnaire: string;
  cessionnaire_address: string | null;
  parts_count: number;
  price: DbNumeric;
  payment_mode: string | null;
  conditions: string | null;
}

export interface DocTemplateRow extends Timestamps {
  id: number;
  title: string;
  type: string;
  content: string;
}

export interface CountRow {
  count: number | string;
}
