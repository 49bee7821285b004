/**
 * Environment configuration: defaults, coercion and engine rules.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../server/config';

describe('Config', () => {
  it('should apply defaults and coerce durations to seconds', () => {
    const config = loadConfig({ JWT_EXPIRES_IN: '90m', API_PORT: '4000' });

    expect(config.DB_CLIENT).toBe('pg');
    expect(config.API_PORT).toBe(4000);
    expect(config.JWT_EXPIRES_IN).toBe(5400);
    expect(config.LEDGER_STRICT_LINES).toBe(false);
  });

  it('should run the in-memory engine under NODE_ENV=test only', () => {
    expect(loadConfig({ NODE_ENV: 'test', DB_CLIENT: 'pg-mem' }).DB_CLIENT).toBe('pg-mem');

    expect(() => loadConfig({ NODE_ENV: 'production', DB_CLIENT: 'pg-mem' })).toThrow(
      'Invalid configuration: DB_CLIENT: pg-mem is an in-memory engine and only runs with NODE_ENV=test',
    );
    expect(() => loadConfig({ DB_CLIENT: 'pg-mem' })).toThrow('only runs with NODE_ENV=test');
  });

  it('should reject an unknown database client', () => {
    expect(() => loadConfig({ DB_CLIENT: 'better-sqlite3' })).toThrow(/^Invalid configuration: DB_CLIENT: /);
  });
});
