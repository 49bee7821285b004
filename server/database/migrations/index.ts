import type { Knex } from 'knex';
import * as ledger from './001_ledger';
import * as invoicing from './002_invoicing';
import * as cabinet from './003_cabinet';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Listed in code so the migrator never has to load .ts files from disk
const MIGRATIONS: NamedMigration[] = [
  { name: '001_ledger', migration: ledger },
  { name: '002_invoicing', migration: invoicing },
  { name: '003_cabinet', migration: cabinet },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return MIGRATIONS;
  },
  getMigrationName(migration) {
    return migration.name;
  },
  async getMigration(migration) {
    return migration.migration;
  },
};
