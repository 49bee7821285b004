// =============================================================
// File: server/database/migrate.ts
// Description: Migration CLI.
//   node dist/server/database/migrate.js latest|rollback|seed
// =============================================================

import { getLogger } from '../logger';
import { closeDb, getDb } from './connection';
import { seed } from './seeds/001_default_data';

const COMMANDS = ['latest', 'rollback', 'seed'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function run(command: Command): Promise<void> {
  const log = getLogger('migrate');
  const db = getDb();

  switch (command) {
    case 'latest': {
      const [batch, applied] = await db.migrate.latest();
      log.info({ batch, applied }, applied.length ? 'Migrations applied' : 'Already up to date');
      break;
    }
    case 'rollback': {
      const [batch, reverted] = await db.migrate.rollback();
      log.info({ batch, reverted }, reverted.length ? 'Migrations rolled back' : 'Nothing to roll back');
      break;
    }
    case 'seed':
      await db.migrate.latest();
      await seed(db);
      break;
  }
}

const command = process.argv[2];

if (!isCommand(command)) {
  getLogger('migrate').error({ command }, `Usage: migrate <${COMMANDS.join('|')}>`);
  process.exitCode = 1;
} else {
  run(command)
    .catch((error: unknown) => {
      getLogger('migrate').error({ err: error }, 'Migration command failed');
      process.exitCode = 1;
    })
    .finally(() => closeDb());
}
