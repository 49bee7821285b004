// =============================================================
// File: server/database/migrations/003_cabinet.ts
// Module: Cabinet (accounting firm back office)
// Description: Creates users, cabinets, societes, associates,
//              cessions, doc_templates.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (t) => {
    t.increments('id').primary();
    t.string('email', 255).notNullable().unique();
    t.string('password_hash', 255).notNullable();
    t.string('role', 50).notNullable().defaultTo('admin');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('cabinets', (t) => {
    t.increments('id').primary();
    t.string('name', 255).notNullable().unique();
    t.timestamps(true, true);
  });

  await knex.schema.createTable('societes', (t) => {
    t.increments('id').primary();
    t.string('name', 255).notNullable();
    t.string('type_juridique', 50);
    t.decimal('capital', 15, 2);
    t.string('gerant', 255);
    t.string('rc', 255);
    t.integer('cabinet_id').unsigned().references('id').inTable('cabinets');
    t.timestamps(true, true);

    t.index(['name'], 'idx_societes_name');
  });

  // ============================================================
  // associates
  // Current ownership snapshot; cessions keep the history.
  // ============================================================
  await knex.schema.createTable('associates', (t) => {
    t.increments('id').primary();
    t.integer('societe_id').unsigned().notNullable().references('id').inTable('societes').onDelete('CASCADE');
    t.string('name', 255).notNullable();
    t.string('address', 255);
    t.integer('parts_count').notNullable().defaultTo(0);
    t.timestamps(true, true);

    t.index(['societe_id'], 'idx_associates_societe');
  });

  await knex.schema.createTable('cessions', (t) => {
    t.increments('id').primary();
    t.integer('societe_id').unsigned().notNullable().references('id').inTable('societes').onDelete('CASCADE');
    t.date('cession_date').notNullable();
    t.string('cedant', 255).notNullable();
    t.string('cedant_address', 255);
    t.string('cessionnaire', 255).notNullable();
    t.string('cessionnaire_address', 255);
    t.integer('parts_count').notNullable();
    t.decimal('price', 15, 2);
    t.string('payment_mode', 100);
    t.text('conditions');
    t.timestamps(true, true);

    t.index(['societe_id'], 'idx_cessions_societe');
  });

  await knex.schema.createTable('doc_templates', (t) => {
    t.increments('id').primary();
    t.string('title', 255).notNullable();
    t.string('type', 50).notNullable();
    t.text('content').notNullable();
    t.timestamps(true, true);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('doc_templates');
  await knex.schema.dropTableIfExists('cessions');
  await knex.schema.dropTableIfExists('associates');
  await knex.schema.dropTableIfExists('societes');
  await knex.schema.dropTableIfExists('cabinets');
  await knex.schema.dropTableIfExists('users');
}
