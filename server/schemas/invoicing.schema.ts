import { z } from 'zod';
import { VAT_FREQUENCIES } from '../../shared/constants';
import { AmountInput, IsoDateSchema, OptionalText, RequiredText } from './common';

// ──────── Customers ────────

export const CustomerInputSchema = z.object({
  name: RequiredText,
  vat_id: OptionalText,
  address: OptionalText,
});

export type CustomerInput = z.infer<typeof CustomerInputSchema>;

export const UpdateCustomerSchema = CustomerInputSchema.partial();

export type UpdateCustomerInput = z.infer<typeof UpdateCustomerSchema>;

// ──────── VAT ────────

export const VatRateInputSchema = z.object({
  code: z.string().trim().min(1, 'is required').max(20).transform((v) => v.toUpperCase()),
  label: RequiredText,
  rate: z.coerce.number().min(0).max(1),
});

export type VatRateInput = z.infer<typeof VatRateInputSchema>;

export const VatDeclarationQuerySchema = z.object({
  period: z
    .string()
    .trim()
    .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'must be formatted YYYY-MM')
    .optional(),
  frequency: z.enum(VAT_FREQUENCIES).default('monthly'),
});

// ──────── Invoices ────────

export const InvoiceItemInputSchema = z.object({
  description: OptionalText,
  quantity: AmountInput,
  unit_price: AmountInput,
  vat_rate_id: z.coerce.number().int().positive().optional().nullable(),
});

export type InvoiceItemInput = z.infer<typeof InvoiceItemInputSchema>;

export const InvoiceInputSchema = z.object({
  invoice_date: IsoDateSchema.optional(),
  customer_id: z.coerce.number().int().positive(),
  is_quote: z.boolean().default(false),
  items: z.array(InvoiceItemInputSchema).default([]),
});

export type InvoiceInput = z.infer<typeof InvoiceInputSchema>;
