// =============================================================
// File: server/services/vat.service.ts
// Module: Invoicing — VAT
// Description: VAT rates and the periodic VAT declaration.
//   The declaration is computed from invoice items (quotes
//   excluded) dated within the period, not from ledger entries.
// =============================================================

import { VatDeclaration, VatDeclarationRow, VatFrequency, VatRate } from '../../shared/types';
import { VatItemRow, VatRateRow } from '../database/rows';
import { fromCents, parseNum, toCents, toIsoDate, toTimestamp, todayIso } from '../database/values';
import { ValidationError } from '../errors';
import { parseInput } from '../schemas/common';
import { VatDeclarationQuerySchema, VatRateInput, VatRateInputSchema } from '../schemas/invoicing.schema';
import { BaseService } from './base.service';
import { itemAmounts } from './invoice.service';

export interface PeriodBounds {
  start: string;
  end: string;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Inclusive bounds of a 'YYYY-MM' period. Quarterly widens the month to
 * its calendar quarter.
 */
export function periodBounds(period: string, frequency: VatFrequency): PeriodBounds {
  const match = /^(\d{4})-(\d{2})$/.exec(period);
  const year = match ? Number(match[1]) : NaN;
  const month = match ? Number(match[2]) : NaN;
  if (!match || month < 1 || month > 12) {
    throw new ValidationError(`period must be formatted YYYY-MM, got "${period}"`, { field: 'period' });
  }

  const startMonth = frequency === 'quarterly' ? Math.floor((month - 1) / 3) * 3 + 1 : month;
  const endMonth = frequency === 'quarterly' ? startMonth + 2 : month;

  return {
    start: `${year}-${pad2(startMonth)}-01`,
    end: `${year}-${pad2(endMonth)}-${pad2(daysInMonth(year, endMonth))}`,
  };
}

function mapVatRate(row: VatRateRow): VatRate {
  return {
    id: row.id,
    code: row.code,
    label: row.label,
    rate: parseNum(row.rate),
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class VatService extends BaseService<VatRateRow> {
  constructor() {
    super('vat_rates');
  }

  // ──────── RATES ────────

  async listVatRates(): Promise<VatRate[]> {
    const rows: VatRateRow[] = await this.db('vat_rates').orderBy('rate', 'desc').orderBy('code', 'asc');
    return rows.map(mapVatRate);
  }

  async createVatRate(input: unknown): Promise<VatRate> {
    const data: VatRateInput = parseInput(VatRateInputSchema, input);
    const row = await this.insertRow(data, { entity: 'VAT rate', field: 'code' });
    return mapVatRate(row);
  }

  // ──────── DECLARATION ────────

  async declaration(query: unknown = {}): Promise<VatDeclaration> {
    const params = parseInput(VatDeclarationQuerySchema, query);
    const period = params.period ?? todayIso().slice(0, 7);
    const { start, end } = periodBounds(period, params.frequency);

    const items: VatItemRow[] = await this.db('invoice_items as it')
      .join('invoices as i', 'i.id', 'it.invoice_id')
      .leftJoin('vat_rates as v', 'v.id', 'it.vat_rate_id')
      .where('i.is_quote', false)
      .where('i.invoice_date', '>=', start)
      .where('i.invoice_date', '<=', end)
      .select('it.*', 'v.rate', 'i.invoice_date', 'i.number')
      .orderBy('i.invoice_date', 'asc')
      .orderBy('i.number', 'asc')
      .orderBy('it.id', 'asc');

    let htCents = 0;
    let tvaCents = 0;
    const rows: VatDeclarationRow[] = items.map((item) => {
      const quantity = parseNum(item.quantity);
      const unitPrice = parseNum(item.unit_price);
      const amounts = itemAmounts(quantity, unitPrice, parseNum(item.rate));
      htCents += toCents(amounts.total_ht);
      tvaCents += toCents(amounts.tva_amount);
      return {
        date: toIsoDate(item.invoice_date),
        invoice_number: item.number,
        description: item.description,
        quantity,
        unit_price: unitPrice,
        ...amounts,
      };
    });

    return {
      period,
      frequency: params.frequency,
      start,
      end,
      total_ht: fromCents(htCents),
      total_tva: fromCents(tvaCents),
      rows,
    };
  }
}

export const vatService = new VatService();
