/**
 * Request schemas for the chart of accounts, journals, entries and
 * reports. Each schema has a derived input type used by the services.
 */

import { z } from 'zod';
import { ACCOUNT_CLASSES, ACCOUNT_TYPES, JOURNAL_TYPES } from '../../shared/constants';
import { AmountInput, DateRangeQuerySchema, IsoDateSchema, OptionalText, RequiredText } from './common';

// =============================================================================
// Accounts
// =============================================================================

export const AccountInputSchema = z.object({
  code: z.coerce.string().trim().min(1, 'is required').max(20),
  name: RequiredText,
  class_code: z.coerce.string().trim().pipe(z.enum(ACCOUNT_CLASSES)),
  type: z.string().trim().pipe(z.enum(ACCOUNT_TYPES)),
});

export type AccountInput = z.infer<typeof AccountInputSchema>;

export const UpdateAccountSchema = z.object({
  name: RequiredText.optional(),
  type: z.string().trim().pipe(z.enum(ACCOUNT_TYPES)).optional(),
});

export type UpdateAccountInput = z.infer<typeof UpdateAccountSchema>;

// Import rows follow the PCM file layout: `class`, not `class_code`
export const AccountImportRowSchema = z
  .object({
    code: z.coerce.string().trim().min(1, 'is required').max(20),
    name: RequiredText,
    class: z.coerce.string().trim().pipe(z.enum(ACCOUNT_CLASSES)),
    type: z.string().trim().pipe(z.enum(ACCOUNT_TYPES)),
  })
  .transform(({ class: classCode, ...rest }) => ({ ...rest, class_code: classCode }));

export const AccountImportSchema = z.object({
  rows: z.array(z.unknown()).min(1, 'at least one row is required'),
});

export const AccountListQuerySchema = z.object({
  class_code: z.enum(ACCOUNT_CLASSES).optional(),
});

// =============================================================================
// Journals & entries
// =============================================================================

export const JournalInputSchema = z.object({
  code: z.string().trim().min(1, 'is required').max(10).transform((v) => v.toUpperCase()),
  name: RequiredText,
  type: z.enum(JOURNAL_TYPES),
  prefix: z.string().trim().min(1).max(20).optional(),
});

export type JournalInput = z.infer<typeof JournalInputSchema>;

export const EntryLineInputSchema = z.object({
  account_id: z.coerce.number().int().positive(),
  label: OptionalText,
  debit: AmountInput,
  credit: AmountInput,
});

export type EntryLineInput = z.infer<typeof EntryLineInputSchema>;

export const EntryInputSchema = z.object({
  entry_date: IsoDateSchema.optional(),
  description: OptionalText,
  document_ref: OptionalText,
  lines: z.array(EntryLineInputSchema).min(1, 'at least one line is required'),
  strict: z.boolean().optional(),
});

export type EntryInput = z.infer<typeof EntryInputSchema>;

export const EntryListQuerySchema = DateRangeQuerySchema;

// =============================================================================
// Reports
// =============================================================================

export const LedgerQuerySchema = DateRangeQuerySchema.extend({
  account_code: z.string().trim().min(1).optional(),
});
