/**
 * @file src/cli/context.ts
 *
 * Shared plumbing for CLI commands: password resolution, opening the
 * manager for one invocation, and slate/transaction files.
 *
 * Password resolution order (highest priority first):
 *   1. --password flag
 *   2. WALLET_PASSWORD env var
 *   3. Interactive prompt (TTY only)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { env } from '../config/env.js';
import { createLogger } from '../logger/logger.js';
import { HttpNodeClient } from '../node/client.js';
import { withWalletManager, type WalletManager, type WalletManagerConfig } from '../manager/wallet-manager.js';
import { AuthenticationError } from '../wallet/types.js';
import { errorAndExit, promptPassword } from './output.js';

export async function resolvePassword(flagPassword?: string, promptMsg = 'Wallet password: '): Promise<string> {
  if (flagPassword) return flagPassword;
  if (env.WALLET_PASSWORD) return env.WALLET_PASSWORD;

  if (!process.stdin.isTTY) {
    errorAndExit(
      'No password provided. Set --password, WALLET_PASSWORD env var, or run interactively.',
    );
  }

  return promptPassword(promptMsg);
}

export function managerConfig(): WalletManagerConfig {
  return {
    walletDbPath: env.WALLET_DB_PATH,
    auditDbPath: env.AUDIT_DB_PATH,
    minConfirmations: env.MIN_CONFIRMATIONS,
    coinbaseMaturity: env.COINBASE_MATURITY,
    lockTtlMs: env.LOCK_TTL_MS,
    sessionTtlMs: env.SESSION_TTL_MS,
  };
}

/** Opens the manager for one command; closes it however the command ends. */
export function withManager<T>(fn: (manager: WalletManager) => Promise<T>): Promise<T> {
  // Warnings only: the CLI prints its own results
  const logger = createLogger({
    level: env.LOG_LEVEL === 'info' ? 'warn' : env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development' && process.stdout.isTTY === true,
  });
  const node = new HttpNodeClient(env.NODE_API_URL, env.NODE_TIMEOUT_MS);
  return withWalletManager(managerConfig(), node, logger, fn);
}

/** Logs in, runs `fn` with the token, and logs out again. */
export function withSession<T>(
  username: string,
  password: string,
  fn: (manager: WalletManager, token: string) => Promise<T>,
): Promise<T> {
  return withManager(async (manager) => {
    const token = await manager.login(username, password);
    if (token === null) {
      throw new AuthenticationError();
    }
    try {
      return await fn(manager, token);
    } finally {
      manager.logout(token);
    }
  });
}

// ── Files ─────────────────────────────────────────────────────────────────────

export function readJsonFile(file: string): unknown {
  const full = path.resolve(file);
  if (!fs.existsSync(full)) {
    errorAndExit(`File not found: ${full}`);
  }
  try {
    return JSON.parse(fs.readFileSync(full, 'utf8')) as unknown;
  } catch (err) {
    errorAndExit(`${full} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function writeTextFile(file: string, contents: string): string {
  const full = path.resolve(file);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, `${contents}\n`, { encoding: 'utf8', mode: 0o600 });
  return full;
}
