/**
 * Domain errors.
 *
 * Every error a service raises on purpose carries a stable `code` and
 * the HTTP status the error handler answers with.
 */

export type ErrorCode =
  | 'UNBALANCED_ENTRY'
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'DUPLICATE_KEY'
  | 'ENTRY_VALIDATED'
  | 'INSUFFICIENT_PARTS'
  | 'UNAUTHORIZED';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class UnbalancedEntryError extends AppError {
  constructor(totalDebit: number, totalCredit: number) {
    super(
      'UNBALANCED_ENTRY',
      400,
      `Entry is not balanced: debit ${totalDebit.toFixed(2)} ≠ credit ${totalCredit.toFixed(2)}`,
      { total_debit: totalDebit, total_credit: totalCredit },
    );
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, key: string | number) {
    super('NOT_FOUND', 404, `${entity} not found: ${key}`, { entity, key });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', 400, message, details);
  }
}

export class DuplicateKeyError extends AppError {
  constructor(entity: string, field: string, value: string) {
    super('DUPLICATE_KEY', 409, `${entity} with ${field} "${value}" already exists`, { entity, field, value });
  }
}

export class EntryValidatedError extends AppError {
  constructor(reference: string) {
    super('ENTRY_VALIDATED', 409, `Entry ${reference} is validated and can no longer be deleted`, { reference });
  }
}

export class InsufficientPartsError extends AppError {
  constructor(cedant: string, held: number, requested: number) {
    super(
      'INSUFFICIENT_PARTS',
      422,
      `${cedant} holds ${held} parts, cannot transfer ${requested}`,
      { cedant, held, requested },
    );
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', 401, message);
  }
}

/**
 * True for a unique-constraint violation (SQLSTATE 23505).
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  if (code === '23505') return true;
  return /duplicate key value/i.test(error.message);
}
