import { z, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors';

export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const IsoDateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be formatted YYYY-MM-DD');

export const DateRangeQuerySchema = z.object({
  start: IsoDateSchema.optional(),
  end: IsoDateSchema.optional(),
});

// Form fields arrive as strings; blank means absent
export const OptionalText = z
  .string()
  .trim()
  .optional()
  .nullable()
  .transform((v) => (v ? v : null));

export const RequiredText = z.string().trim().min(1, 'is required');

export const AmountInput = z.union([z.number(), z.string()]).optional().nullable();

/**
 * Parses `value` with `schema`; failures become INVALID_INPUT with the
 * zod issue list in `details.issues`.
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    throw new ValidationError(`Invalid input: ${summary}`, { issues });
  }
  return result.data;
}

export function parseId(params: unknown): number {
  return parseInput(IdParamSchema, params).id;
}
