// =============================================================
// File: server/database/migrations/002_invoicing.ts
// Module: Invoicing & VAT
// Description: Creates vat_rates, customers, invoices,
//              invoice_items. Totals are derived, never stored.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('vat_rates', (t) => {
    t.increments('id').primary();
    t.string('code', 20).notNullable().unique();
    t.string('label', 100).notNullable();
    t.decimal('rate', 5, 4).notNullable();
    t.timestamps(true, true);
  });

  await knex.schema.createTable('customers', (t) => {
    t.increments('id').primary();
    t.string('name', 255).notNullable();
    t.string('vat_id', 50); // ICE / IF
    t.string('address', 255);
    t.timestamps(true, true);
  });

  await knex.schema.createTable('invoices', (t) => {
    t.increments('id').primary();
    t.string('number', 50).notNullable().unique();
    t.date('invoice_date').notNullable();
    t.integer('customer_id').unsigned().notNullable().references('id').inTable('customers');
    t.boolean('is_quote').notNullable().defaultTo(false);
    t.string('prefix', 10).notNullable().defaultTo('INV-');
    t.timestamps(true, true);

    t.index(['invoice_date'], 'idx_invoices_date');
  });

  await knex.schema.createTable('invoice_items', (t) => {
    t.increments('id').primary();
    t.integer('invoice_id').unsigned().notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.string('description', 255).notNullable();
    t.decimal('quantity', 12, 3).notNullable().defaultTo(1);
    t.decimal('unit_price', 14, 2).notNullable().defaultTo(0);
    t.integer('vat_rate_id').unsigned().references('id').inTable('vat_rates');
    t.timestamps(true, true);

    t.index(['invoice_id'], 'idx_invoice_items_invoice');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('invoice_items');
  await knex.schema.dropTableIfExists('invoices');
  await knex.schema.dropTableIfExists('customers');
  await knex.schema.dropTableIfExists('vat_rates');
}
