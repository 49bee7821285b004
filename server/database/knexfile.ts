import type { Knex } from 'knex';
import { AppConfig, getConfig } from '../config';
import { migrationSource } from './migrations';

export function buildKnexConfig(config: AppConfig = getConfig()): Knex.Config {
  const migrations: Knex.MigratorConfig = {
    migrationSource,
    tableName: 'knex_migrations',
  };

  if (config.DB_CLIENT === 'pg-mem') {
    // pg-mem supplies the driver; one connection keeps transactions serialized
    return {
      pool: { min: 1, max: 1 },
      migrations,
    };
  }

  return {
    client: 'pg',
    connection: {
      host: config.DB_HOST,
      port: config.DB_PORT,
      database: config.DB_NAME,
      user: config.DB_USER,
      password: config.DB_PASSWORD,
    },
    pool: {
      min: config.DB_POOL_MIN,
      max: config.DB_POOL_MAX,
    },
    migrations,
  };
}

export default buildKnexConfig;
