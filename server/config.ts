// =============================================================
// File: server/config.ts
// Description: Environment configuration. Loads .env once and
//              validates process.env into a typed AppConfig.
// =============================================================

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_API_PORT, DEFAULT_DB_PORT } from '../shared/constants';

dotenv.config();

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

// '24h' -> 86400; a bare number is already seconds
function durationToSeconds(value: string): number {
  const unit = value.slice(-1);
  const factor = DURATION_UNITS[unit];
  return factor ? parseInt(value.slice(0, -1), 10) * factor : parseInt(value, 10);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_API_PORT),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanFlag,

  DB_CLIENT: z.enum(['pg', 'pg-mem']).default('pg'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_DB_PORT),
  DB_NAME: z.string().default('compta_cabinet'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),

  JWT_SECRET: z.string().min(1).default('dev-secret-change-in-production'),
  JWT_EXPIRES_IN: z
    .string()
    .regex(/^\d+[smhd]?$/, 'must be a duration such as 3600, 90m, 24h or 7d')
    .default('24h')
    .transform(durationToSeconds),

  COMPANY_NAME: z.string().default('Cabinet Comptable'),
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  ADMIN_PASSWORD: z.string().min(8).default('change-me-now'),

  LEDGER_STRICT_LINES: booleanFlag,
  CESSION_STRICT: booleanFlag,
}).refine((env) => env.DB_CLIENT !== 'pg-mem' || env.NODE_ENV === 'test', {
  // nothing survives a restart
  message: 'pg-mem is an in-memory engine and only runs with NODE_ENV=test',
  path: ['DB_CLIENT'],
});

export type AppConfig = z.infer<typeof ConfigSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${keys.join('; ')}`);
  }
  return result.data;
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

// Tests change process.env between files
export function resetConfig(): void {
  cached = null;
}
