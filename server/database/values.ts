// Normalizes column values before they leave a service: node-postgres
// hands back NUMERIC and COUNT as strings, the in-memory engine as numbers.

import { ValidationError } from '../errors';

export type DbNumeric = number | string | null | undefined;

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function parseNum(val: DbNumeric): number {
  if (val === null || val === undefined) return 0;
  const n = typeof val === 'number' ? val : parseFloat(val);
  return Number.isFinite(n) ? n : 0;
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  // no negative zero
  return cents === 0 ? 0 : cents / 100;
}

export function toNullableNum(val: DbNumeric): number | null {
  return val === null || val === undefined ? null : parseNum(val);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** `YYYY-MM-DD` from a DATE column, whatever the driver handed back. */
export function toIsoDate(val: string | Date): string {
  if (val instanceof Date) {
    // DATE values arrive as UTC midnight
    const y = val.getUTCFullYear();
    const m = String(val.getUTCMonth() + 1).padStart(2, '0');
    const d = String(val.getUTCDate()).padStart(2, '0');
    return `${y}-${m}-${d}`;
  }
  return val.slice(0, 10);
}

/** Validates a `YYYY-MM-DD` calendar date and returns it unchanged. */
export function parseIsoDate(value: string, field = 'date'): string {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ValidationError(`${field} must be a date formatted YYYY-MM-DD, got "${value}"`, { field });
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.getUTCFullYear() !== Number(y) || date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    throw new ValidationError(`${field} is not a valid calendar date: "${value}"`, { field });
  }
  return value;
}

export function toTimestamp(val: string | Date): string {
  return val instanceof Date ? val.toISOString() : val;
}

export function todayIso(): string {
  return toIsoDate(new Date());
}

function parseDecimal(
  value: string | number | null | undefined,
  field: string,
  decimals: number,
  integerDigits: number,
): number {
  const factor = 10 ** decimals;
  const fit = (n: number) => {
    const rounded = Math.round(n * factor) / factor;
    if (Math.abs(rounded) >= 10 ** integerDigits) {
      throw new ValidationError(`${field} exceeds ${integerDigits} integer digits: "${value}"`, { field });
    }
    return rounded;
  };

  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ValidationError(`${field} is not a number`, { field });
    return fit(value);
  }
  const text = value.replace(/\s/g, '').replace(',', '.');
  if (text === '') return 0;
  if (!/^-?\d+(\.\d+)?$/.test(text)) {
    throw new ValidationError(`${field} is not a valid number: "${value}"`, { field });
  }
  return fit(parseFloat(text));
}

/**
 * Parses a money amount typed by a user: accepts "1 250,50", "1250.5"
 * or a number, rounds to 2 decimals. Blank means zero. The integer part
 * must fit the column: 12 digits for DECIMAL(14,2).
 */
export function parseAmount(
  value: string | number | null | undefined,
  field = 'amount',
  integerDigits = 12,
): number {
  return parseDecimal(value, field, 2, integerDigits);
}

/** Same input rules as parseAmount, kept to 3 decimals (DECIMAL(12,3)). */
export function parseQuantity(
  value: string | number | null | undefined,
  field = 'quantity',
  integerDigits = 9,
): number {
  return parseDecimal(value, field, 3, integerDigits);
}

export interface NormalizedRange {
  start: string | null;
  end: string | null;
}

/** Validates both ends of an inclusive date range; absent ends stay null. */
export function normalizeRange(range: { start?: string; end?: string } = {}): NormalizedRange {
  return {
    start: range.start ? parseIsoDate(range.start, 'start') : null,
    end: range.end ? parseIsoDate(range.end, 'end') : null,
  };
}
