// =============================================================
// File: server/database/migrations/001_ledger.ts
// Module: General ledger
// Description: Creates 5 tables:
//              accounts, sequence_scopes, journals,
//              entries, entry_lines.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // accounts
  // Moroccan chart of accounts (PCM). class_code is the first
  // digit of the account number.
  // ============================================================
  await knex.schema.createTable('accounts', (t) => {
    t.increments('id').primary();
    t.string('code', 20).notNullable().unique();
    t.string('name', 255).notNullable();
    t.string('class_code', 1).notNullable();
    t.string('type', 20).notNullable();
    t.timestamps(true, true);

    t.index(['class_code'], 'idx_accounts_class');
  });

  // ============================================================
  // sequence_scopes
  // One counter per document scope (journal:<code>, invoice,
  // quote). next_number is the number the next document gets.
  // ============================================================
  await knex.schema.createTable('sequence_scopes', (t) => {
    t.increments('id').primary();
    t.string('scope', 50).notNullable().unique();
    t.string('prefix', 20).notNullable();
    t.integer('next_number').notNullable().defaultTo(1);
    t.timestamps(true, true);
  });

  // ============================================================
  // journals
  // ============================================================
  await knex.schema.createTable('journals', (t) => {
    t.increments('id').primary();
    t.string('code', 10).notNullable().unique();
    t.string('name', 255).notNullable();
    t.string('type', 20).notNullable();
    t.string('sequence_scope', 50).notNullable().references('scope').inTable('sequence_scopes');
    t.timestamps(true, true);
  });

  // ============================================================
  // entries
  // Balanced at creation time only; reports read validated ones.
  // ============================================================
  await knex.schema.createTable('entries', (t) => {
    t.increments('id').primary();
    t.integer('journal_id').unsigned().notNullable().references('id').inTable('journals');
    t.date('entry_date').notNullable();
    t.string('reference', 50).notNullable();
    t.string('description', 255);
    t.string('document_ref', 100);
    t.boolean('validated').notNullable().defaultTo(false);
    t.timestamps(true, true);

    t.index(['journal_id'], 'idx_entries_journal');
    t.index(['entry_date'], 'idx_entries_date');
    t.index(['reference'], 'idx_entries_reference');
    t.index(['validated'], 'idx_entries_validated');
  });

  // ============================================================
  // entry_lines
  // ============================================================
  await knex.schema.createTable('entry_lines', (t) => {
    t.increments('id').primary();
    t.integer('entry_id').unsigned().notNullable().references('id').inTable('entries').onDelete('CASCADE');
    t.integer('account_id').unsigned().notNullable().references('id').inTable('accounts');
    t.string('label', 255);
    t.decimal('debit', 14, 2).notNullable().defaultTo(0);
    t.decimal('credit', 14, 2).notNullable().defaultTo(0);
    t.timestamps(true, true);

    t.index(['entry_id'], 'idx_entry_lines_entry');
    t.index(['account_id'], 'idx_entry_lines_account');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('entry_lines');
  await knex.schema.dropTableIfExists('entries');
  await knex.schema.dropTableIfExists('journals');
  await knex.schema.dropTableIfExists('sequence_scopes');
  await knex.schema.dropTableIfExists('accounts');
}
