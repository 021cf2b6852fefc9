/**
 * @file src/cli/commands/wallet.ts
 *
 * Wallet subcommand group:
 *
 *   slatew wallet create  --user <name> [--password <pass>]
 *   slatew wallet restore --user <name> --words "<24 words>" [--password <pass>]
 *   slatew wallet summary --user <name> [--min-confirmations <n>] [--refresh]
 *   slatew wallet outputs --user <name>
 *   slatew wallet log     --user <name> [--last <n>]
 *
 * SECURITY: The recovery phrase is printed once by `create` and never
 * written anywhere else.
 */

import { Command } from 'commander';
import { env } from '../../config/env.js';
import { AuditDb } from '../../logger/audit.js';
import { formatAmount } from '../../utils.js';
import { resolvePassword, withManager, withSession } from '../context.js';
import {
  header, success, info, warn, kv, errorAndExit, fatalError,
  spinner, table, printLine, summaryPairs, formatAuditRows,
} from '../output.js';

// ── wallet create ─────────────────────────────────────────────────────────────

const createCmd = new Command('create')
  .description('Create a new wallet and print its recovery phrase')
  .requiredOption('--user <name>', 'Username for the new wallet')
  .option('--password <pass>', 'Encryption password (min 8 chars)')
  .action(async (opts: { user: string; password?: string }) => {
    const password = await resolvePassword(opts.password, 'New wallet password (min 8 chars): ');
    if (password.length < 8) {
      errorAndExit('Password must be at least 8 characters.');
    }

    header(`Creating wallet: ${opts.user}`);
    const spin = spinner('Generating seed and encrypting it…');

    try {
      const created = await withManager(async (manager) => {
        const result = await manager.initializeNewWallet(opts.user, password);
        if (result) manager.logout(result.token);
        return result;
      });
      spin.stop();

      if (!created) {
        errorAndExit(`Wallet "${opts.user}" already exists. Choose a different username.`);
      }

      success('Wallet created');
      printLine('');
      kv([
        ['User', opts.user],
        ['Database', env.WALLET_DB_PATH],
        ['Encryption', 'AES-256-GCM / scrypt'],
      ]);
      printLine('');
      warn('Write down this recovery phrase. It is shown only once:');
      printLine('');
      printLine(`  ${created.words}`);
      printLine('');
    } catch (err) {
      spin.stop();
      fatalError(err, 'create');
    }
  });

// ── wallet restore ────────────────────────────────────────────────────────────

const restoreCmd = new Command('restore')
  .description('Recreate a wallet from its 24-word recovery phrase')
  .requiredOption('--user <name>', 'Username for the restored wallet')
  .requiredOption('--words <phrase>', 'Recovery phrase, quoted')
  .option('--password <pass>', 'New encryption password (min 8 chars)')
  .action(async (opts: { user: string; words: string; password?: string }) => {
    const password = await resolvePassword(opts.password, 'New wallet password (min 8 chars): ');

    header(`Restoring wallet: ${opts.user}`);
    try {
      const restored = await withManager(async (manager) => {
        const token = await manager.restoreWallet(opts.user, opts.words, password);
        if (token === null) return false;
        manager.logout(token);
        return true;
      });
      if (!restored) {
        errorAndExit(`Wallet "${opts.user}" already exists. Choose a different username.`);
      }
      success('Wallet restored');
      info(`Run "slatew wallet summary --user ${opts.user} --refresh" to find its outputs on chain.`);
      printLine('');
    } catch (err) {
      fatalError(err, 'restore');
    }
  });

// ── wallet summary ────────────────────────────────────────────────────────────

const summaryCmd = new Command('summary')
  .description('Show balances by spendability')
  .requiredOption('--user <name>', 'Wallet username')
  .option('--password <pass>', 'Decryption password')
  .option('--min-confirmations <n>', 'Confirmations before an output is spendable')
  .option('--refresh', 'Reconcile outputs with the node first')
  .action(async (opts: { user: string; password?: string; minConfirmations?: string; refresh?: boolean }) => {
    const minConf = opts.minConfirmations === undefined ? undefined : Number(opts.minConfirmations);
    if (minConf !== undefined && (!Number.isInteger(minConf) || minConf < 1)) {
      errorAndExit('--min-confirmations must be a positive integer.');
    }
    const password = await resolvePassword(opts.password);

    header(`Summary: ${opts.user}`);
    const spin = spinner('Reading wallet and chain height…');
    try {
      const summary = await withSession(opts.user, password, async (manager, token) => {
        if (opts.refresh) await manager.refreshOutputs(token);
        return manager.getWalletSummary(token, minConf);
      });
      spin.stop();
      kv(summaryPairs(summary));
      printLine('');
    } catch (err) {
      spin.stop();
      fatalError(err, 'summary');
    }
  });

// ── wallet outputs ────────────────────────────────────────────────────────────

const outputsCmd = new Command('outputs')
  .description('List owned outputs')
  .requiredOption('--user <name>', 'Wallet username')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; password?: string }) => {
    const password = await resolvePassword(opts.password);
    try {
      const outputs = await withSession(opts.user, password, (manager, token) => manager.listOutputs(token));
      header(`Outputs: ${opts.user}`);
      table(
        ['Commitment', 'Amount', 'Status', 'Features', 'Height', 'Key path'],
        outputs.map((o) => [
          `${o.commitment.slice(0, 16)}…`,
          formatAmount(o.amount),
          o.status,
          o.features,
          o.blockHeight === null ? '-' : String(o.blockHeight),
          o.keyPath,
        ]),
      );
      printLine('');
    } catch (err) {
      fatalError(err, 'outputs');
    }
  });

// ── wallet log ────────────────────────────────────────────────────────────────

const logCmd = new Command('log')
  .description('Show recent audit events for a wallet')
  .requiredOption('--user <name>', 'Wallet username')
  .option('--last <n>', 'Number of events to show', '20')
  .action((opts: { user: string; last: string }) => {
    const limit = Number(opts.last);
    if (!Number.isInteger(limit) || limit < 1) {
      errorAndExit('--last must be a positive integer.');
    }

    let audit: AuditDb | undefined;
    try {
      audit = new AuditDb(env.AUDIT_DB_PATH);
      header(`Audit log: ${opts.user}`);
      formatAuditRows(audit.query({ username: opts.user, limit }));
      printLine('');
    } catch (err) {
      fatalError(err, 'log');
    } finally {
      audit?.close();
    }
  });

// ── wallet command group ──────────────────────────────────────────────────────

export const walletCommand = new Command('wallet')
  .description('Create, restore and inspect wallets')
  .addCommand(createCmd)
  .addCommand(restoreCmd)
  .addCommand(summaryCmd)
  .addCommand(outputsCmd)
  .addCommand(logCmd);
