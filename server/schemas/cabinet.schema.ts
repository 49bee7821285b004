import { z } from 'zod';
import { AmountInput, IsoDateSchema, OptionalText, RequiredText } from './common';

export const LoginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1, 'is required'),
});

export const ChangePasswordSchema = z.object({
  current_password: z.string().min(1, 'is required'),
  new_password: z.string().min(8, 'must be at least 8 characters'),
});

export const CabinetInputSchema = z.object({
  name: RequiredText,
});

export const SocieteInputSchema = z.object({
  name: RequiredText,
  type_juridique: OptionalText,
  capital: AmountInput,
  gerant: OptionalText,
  rc: OptionalText,
  cabinet_id: z.coerce.number().int().positive().optional().nullable(),
});

export type SocieteInput = z.infer<typeof SocieteInputSchema>;

export const AssociateInputSchema = z.object({
  name: RequiredText,
  address: OptionalText,
  parts_count: z.coerce.number().int().min(0).default(0),
});

export type AssociateInput = z.infer<typeof AssociateInputSchema>;

export const CessionInputSchema = z.object({
  societe_id: z.coerce.number().int().positive(),
  cession_date: IsoDateSchema.optional(),
  cedant: RequiredText,
  cedant_address: OptionalText,
  cessionnaire: RequiredText,
  cessionnaire_address: OptionalText,
  parts_count: z.coerce.number().int().positive(),
  price: AmountInput,
  payment_mode: OptionalText,
  conditions: OptionalText,
  strict: z.boolean().optional(),
});

export type CessionInput = z.infer<typeof CessionInputSchema>;

export const CessionListQuerySchema = z.object({
  societe_id: z.coerce.number().int().positive().optional(),
});

export const TemplateInputSchema = z.object({
  title: RequiredText,
  type: RequiredText,
  content: RequiredText,
});

export type TemplateInput = z.infer<typeof TemplateInputSchema>;

// Blank fields keep the stored value
export const UpdateTemplateSchema = z.object({
  title: OptionalText,
  type: OptionalText,
  content: OptionalText,
});

export const RenderQuerySchema = z.object({
  societe_id: z.coerce.number().int().positive().optional(),
  date: z.string().trim().optional(),
});
