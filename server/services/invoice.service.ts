// =============================================================
// File: server/services/invoice.service.ts
// Module: Invoicing — invoices & quotes
// Description:
//   - Invoices number from scope "invoice" (INV-), quotes from
//     scope "quote" (DEV-), with the invoice date's year
//   - Items without a description are skipped
//   - Totals are derived on read, never stored:
//       total_ht = round(qty × unit_price, 2)
//       tva      = round(total_ht × rate, 2)
//       ttc      = ht + tva
//   - Header + items committed in one transaction
// =============================================================

import { DOCUMENT_PREFIXES, SEQUENCE_SCOPES } from '../../shared/constants';
import { Invoice, InvoiceItem, InvoiceWithItems } from '../../shared/types';
import { InvoiceItemRow, InvoiceRow, VatRateRow } from '../database/rows';
import {
  fromCents,
  parseAmount,
  parseIsoDate,
  parseNum,
  parseQuantity,
  round2,
  toCents,
  toIsoDate,
  toTimestamp,
  todayIso,
} from '../database/values';
import { NotFoundError, ValidationError } from '../errors';
import { parseInput } from '../schemas/common';
import { InvoiceInput, InvoiceInputSchema } from '../schemas/invoicing.schema';
import { BaseService, Executor } from './base.service';
import { customerService } from './customer.service';
import { sequenceService } from './sequence.service';

// ────────────────────────────────────────────────────────────
// Item arithmetic
// ────────────────────────────────────────────────────────────

export interface ItemAmounts {
  total_ht: number;
  tva_amount: number;
}

export function itemAmounts(quantity: number, unitPrice: number, rate: number): ItemAmounts {
  const totalHt = round2(quantity * unitPrice);
  return { total_ht: totalHt, tva_amount: round2(totalHt * rate) };
}

function mapItem(row: InvoiceItemRow): InvoiceItem {
  const quantity = parseNum(row.quantity);
  const unitPrice = parseNum(row.unit_price);
  const rate = parseNum(row.rate);
  return {
    id: row.id,
    invoice_id: row.invoice_id,
    description: row.description,
    quantity,
    unit_price: unitPrice,
    vat_rate_id: row.vat_rate_id,
    vat_rate: rate,
    ...itemAmounts(quantity, unitPrice, rate),
  };
}

function mapInvoice(row: InvoiceRow, items: InvoiceItem[]): InvoiceWithItems {
  const htCents = items.reduce((sum, i) => sum + toCents(i.total_ht), 0);
  const tvaCents = items.reduce((sum, i) => sum + toCents(i.tva_amount), 0);
  return {
    id: row.id,
    number: row.number,
    invoice_date: toIsoDate(row.invoice_date),
    customer_id: row.customer_id,
    customer_name: row.customer_name,
    is_quote: row.is_quote,
    prefix: row.prefix,
    total_ht: fromCents(htCents),
    total_tva: fromCents(tvaCents),
    total_ttc: fromCents(htCents + tvaCents),
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
    items,
  };
}

function invoiceQuery(executor: Executor) {
  return executor('invoices as i')
    .join('customers as c', 'c.id', 'i.customer_id')
    .select('i.*', 'c.name as customer_name');
}

function itemQuery(executor: Executor) {
  return executor('invoice_items as it')
    .leftJoin('vat_rates as v', 'v.id', 'it.vat_rate_id')
    .select('it.*', 'v.rate')
    .orderBy('it.id', 'asc');
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class InvoiceService extends BaseService<InvoiceRow> {
  constructor() {
    super('invoices');
  }

  // ──────── CREATE ────────

  async createInvoice(input: unknown): Promise<InvoiceWithItems> {
    const data: InvoiceInput = parseInput(InvoiceInputSchema, input);
    const invoiceDate = data.invoice_date ? parseIsoDate(data.invoice_date, 'invoice_date') : todayIso();

    const items = data.items
      .map((item, index) => ({ item, index }))
      .filter(({ item }) => item.description !== null)
      .map(({ item, index }) => {
        const quantity = parseQuantity(item.quantity, `items[${index}].quantity`);
        const unitPrice = parseAmount(item.unit_price, `items[${index}].unit_price`);
        if (quantity < 0 || unitPrice < 0) {
          throw new ValidationError(`Item ${index + 1}: quantity and unit price cannot be negative`, {
            item: index + 1,
          });
        }
        return {
          description: item.description ?? '',
          quantity,
          unit_price: unitPrice,
          vat_rate_id: item.vat_rate_id ?? null,
        };
      });

    await customerService.getCustomer(data.customer_id);

    const rateIds = [...new Set(items.flatMap((i) => (i.vat_rate_id === null ? [] : [i.vat_rate_id])))];
    if (rateIds.length > 0) {
      const rates: Pick<VatRateRow, 'id'>[] = await this.db('vat_rates').whereIn('id', rateIds).select('id');
      const known = new Set(rates.map((r) => r.id));
      const missing = rateIds.find((id) => !known.has(id));
      if (missing !== undefined) throw new NotFoundError('VAT rate', missing);
    }

    const scope = data.is_quote ? SEQUENCE_SCOPES.QUOTE : SEQUENCE_SCOPES.INVOICE;
    const prefix = DOCUMENT_PREFIXES[scope];

    return await this.db.transaction(async (trx) => {
      await sequenceService.ensureScope(scope, prefix, trx);
      const number = await sequenceService.nextReference(scope, invoiceDate, trx);

      const [invoice]: InvoiceRow[] = await trx('invoices')
        .insert({
          number,
          invoice_date: invoiceDate,
          customer_id: data.customer_id,
          is_quote: data.is_quote,
          prefix,
        })
        .returning('*');

      if (items.length > 0) {
        await trx('invoice_items').insert(items.map((item) => ({ ...item, invoice_id: invoice.id })));
      }

      return await this.getInvoice(invoice.id, trx);
    });
  }

  // ──────── READ ────────

  async getInvoice(id: number, executor: Executor = this.db): Promise<InvoiceWithItems> {
    const row: InvoiceRow | undefined = await invoiceQuery(executor).where('i.id', id).first();
    if (!row) throw new NotFoundError('Invoice', id);

    const items: InvoiceItemRow[] = await itemQuery(executor).where('it.invoice_id', id);
    return mapInvoice(row, items.map(mapItem));
  }

  // Newest first; each invoice carries its totals
  async listInvoices(): Promise<Invoice[]> {
    const rows: InvoiceRow[] = await invoiceQuery(this.db)
      .orderBy('i.invoice_date', 'desc')
      .orderBy('i.number', 'desc');
    if (rows.length === 0) return [];

    const itemRows: InvoiceItemRow[] = await itemQuery(this.db).whereIn(
      'it.invoice_id',
      rows.map((r) => r.id),
    );
    const byInvoice = new Map<number, InvoiceItem[]>();
    for (const row of itemRows) {
      const list = byInvoice.get(row.invoice_id) ?? [];
      list.push(mapItem(row));
      byInvoice.set(row.invoice_id, list);
    }

    return rows.map((row) => {
      const { items: _items, ...invoice } = mapInvoice(row, byInvoice.get(row.id) ?? []);
      return invoice;
    });
  }

  // ──────── DELETE ────────
  // The number of a deleted invoice is never issued again.

  async deleteInvoice(id: number): Promise<void> {
    await this.getInvoice(id);
    await this.db.transaction(async (trx) => {
      await trx('invoice_items').where({ invoice_id: id }).del();
      await this.deleteRow(id, trx);
    });
  }
}

export const invoiceService = new InvoiceService();
