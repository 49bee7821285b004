/**
 * Global test setup — points the app at an in-memory pg-mem database,
 * creates the schema and provides cleanup utilities.
 *
 * Services use the singleton Knex instance from getDb(). Config is read
 * lazily, so overriding process.env here (before the first query) is
 * enough to route every service to the test database. Each test file
 * gets its own module registry and therefore its own database.
 */

import type { Knex } from 'knex';
import { afterAll, beforeAll } from 'vitest';
import { resetConfig } from '../server/config';
import { closeDb, getDb, initializeDb } from '../server/database/connection';

process.env.NODE_ENV = 'test';
process.env.DB_CLIENT = 'pg-mem';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';
process.env.JWT_SECRET = 'test-secret';
process.env.LEDGER_STRICT_LINES = 'false';
process.env.CESSION_STRICT = 'false';
resetConfig();

export function getTestDb(): Knex {
  return getDb();
}

// ── Tables (children before parents) ────────────────────────────────

const ALL_TABLES = [
  'entry_lines',
  'entries',
  'journals',
  'sequence_scopes',
  'accounts',
  'invoice_items',
  'invoices',
  'customers',
  'vat_rates',
  'cessions',
  'associates',
  'societes',
  'cabinets',
  'doc_templates',
  'users',
];

// ── Global Setup ────────────────────────────────────────────────────

beforeAll(async () => {
  await initializeDb();
});

afterAll(async () => {
  await closeDb();
});

// ── Helpers ─────────────────────────────────────────────────────────

/**
 * Delete every row, leaving only the schema.
 */
export async function cleanAllData() {
  const db = getTestDb();
  for (const table of ALL_TABLES) {
    await db(table).del();
  }
}
