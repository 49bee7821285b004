import { Knex } from 'knex';
import { USER_ROLES } from '../../../shared/constants';
import { getConfig } from '../../config';
import { getLogger } from '../../logger';
import { authService } from '../../services/auth.service';
import { chartOfAccountsService } from '../../services/chart-of-accounts.service';
import { seedDefaultJournals } from '../../services/journal.service';

/**
 * Default data for a fresh database:
 *   1. Moroccan chart of accounts (PCM)
 *   2. Journals ACH/VTE/TRS/OD with their sequences, VAT rates
 *   3. The admin user from ADMIN_EMAIL / ADMIN_PASSWORD
 *
 * Every step skips what already exists, so the seed can be re-run.
 *
 * Usage: npm run db:seed
 */
export async function seed(knex: Knex): Promise<void> {
  const log = getLogger('seed');
  const config = getConfig();

  // ============================================================
  // 1. Chart of accounts
  // ============================================================
  const pcm = await chartOfAccountsService.seedPcm();
  log.info(pcm, pcm.skipped ? 'Chart of accounts already present' : 'Chart of accounts loaded');

  // ============================================================
  // 2. Journals & VAT rates
  // ============================================================
  const journals = await seedDefaultJournals(knex);
  log.info({ created: journals }, 'Default journals ensured');

  // ============================================================
  // 3. Admin user
  // ============================================================
  const email = config.ADMIN_EMAIL.toLowerCase();
  const existing = await knex('users').where({ email }).first();
  if (existing) {
    log.info({ email }, 'Admin user already exists');
    return;
  }

  await authService.createUser(email, config.ADMIN_PASSWORD, USER_ROLES.ADMIN, knex);
  log.info({ email }, 'Admin user created');
}
