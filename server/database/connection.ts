import { knex, Knex } from 'knex';
import pg from 'pg';
import { newDb } from 'pg-mem';
import { getConfig } from '../config';
import { getLogger } from '../logger';
import { buildKnexConfig } from './knexfile';
import { migrationSource } from './migrations';

const PG_DATE_OID = 1082;

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | null = null;
let memorySchemaReady = false;

function createMemoryDb(config: Knex.Config): Knex {
  const instance: Knex = newDb({ noAstCoverageCheck: true }).adapters.createKnex(0, config);
  return instance;
}

export function getDb(): Knex {
  if (!db) {
    const config = getConfig();
    db = config.DB_CLIENT === 'pg-mem' ? createMemoryDb(buildKnexConfig(config)) : knex(buildKnexConfig(config));
  }
  return db;
}

// An in-memory database starts empty every time: no migration history to keep
async function createSchema(database: Knex): Promise<void> {
  for (const spec of await migrationSource.getMigrations([])) {
    const migration = await migrationSource.getMigration(spec);
    await migration.up(database);
  }
}

export async function initializeDb(): Promise<void> {
  const log = getLogger('db');
  const database = getDb();
  const client = getConfig().DB_CLIENT;

  try {
    await database.raw('SELECT 1');
    log.info({ client }, 'Connected to database');
  } catch (error) {
    log.error({ err: error, client }, 'Failed to connect to database');
    throw error;
  }

  if (client === 'pg-mem') {
    if (!memorySchemaReady) {
      await createSchema(database);
      memorySchemaReady = true;
    }
    return;
  }

  const [batch, applied] = await database.migrate.latest();
  if (applied.length > 0) {
    log.info({ batch, applied }, 'Migrations applied');
  }
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    memorySchemaReady = false;
    getLogger('db').info('Connection closed');
  }
}
