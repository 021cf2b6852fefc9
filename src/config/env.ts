/**
 * @file src/config/env.ts
 * Single source of truth for all environment-derived configuration.
 * Validates at import time. If a variable is malformed, the process exits
 * before doing anything else.
 */

import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';

loadDotenv();

const envSchema = z.object({
  // ── Node ────────────────────────────────────────────────────────────────────
  NODE_API_URL: z
    .string()
    .url('NODE_API_URL must be a valid URL')
    .default('http://127.0.0.1:3413'),

  NODE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // ── Storage ─────────────────────────────────────────────────────────────────
  WALLET_DB_PATH: z.string().min(1).default('./data/wallet.db'),

  AUDIT_DB_PATH: z.string().min(1).default('./logs/audit.db'),

  // ── Key Management ──────────────────────────────────────────────────────────
  WALLET_PASSWORD: z.string().min(8, 'WALLET_PASSWORD must be at least 8 characters').optional(),

  // ── Wallet policy ───────────────────────────────────────────────────────────
  MIN_CONFIRMATIONS: z.coerce.number().int().min(1, 'MIN_CONFIRMATIONS must be at least 1').default(10),

  COINBASE_MATURITY: z.coerce.number().int().nonnegative().default(1440),

  LOCK_TTL_MS: z.coerce.number().int().positive().default(86_400_000),

  SESSION_TTL_MS: z.coerce.number().int().positive().default(1_800_000),

  // ── Logging ─────────────────────────────────────────────────────────────────
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),

  // ── Runtime ─────────────────────────────────────────────────────────────────
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),

  // Lowers the scrypt cost so tests run quickly. Rejected in production.
  TEST_KDF_N: z.coerce.number().int().positive().optional(),
});

function parseEnv(): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    // Logger isn't initialised yet
    process.stderr.write(
      `\n[slate-wallet] Environment validation failed:\n${issues}\n\n` +
        `  Copy .env.example to .env and fix the values above.\n\n`,
    );
    process.exit(1);
  }

  const env = result.data;

  if (env.NODE_ENV === 'production' && env.TEST_KDF_N !== undefined) {
    process.stderr.write('[slate-wallet] TEST_KDF_N is not allowed in production.\n');
    process.exit(1);
  }

  return env;
}

export const env = parseEnv();

export type Env = z.infer<typeof envSchema>;
