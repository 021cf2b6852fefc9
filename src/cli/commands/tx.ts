/**
 * @file src/cli/commands/tx.ts
 *
 * Transaction subcommand group. Slates travel between the two parties as
 * JSON files; how they get there is up to the users.
 *
 *   slatew tx send     --user alice --amount 1.5 --out slate.json [--fee-base <units>] [--message <text>] [--strategy smallest|all]
 *   slatew tx receive  --user bob   --in slate.json --out response.json [--message <text>]
 *   slatew tx finalize --user alice --in response.json --out tx.json [--post]
 *   slatew tx post     --user alice --in tx.json
 *   slatew tx cancel   --user alice --slate <id>
 *   slatew tx list     --user alice
 */

import { Command } from 'commander';
import { parseSlate, parseTransaction, serializeSlate, serializeTransaction } from '../../slate/codec.js';
import { transactionId } from '../../slate/transaction.js';
import { formatAmount, parseAmount } from '../../utils.js';
import type { SelectionStrategy } from '../../wallet/types.js';
import { readJsonFile, resolvePassword, withSession, writeTextFile } from '../context.js';
import {
  header, success, info, warn, kv, errorAndExit, fatalError,
  spinner, table, printLine, formatCoins,
} from '../output.js';

const DEFAULT_FEE_BASE = '1000000';

function parseStrategy(value: string): SelectionStrategy {
  if (value !== 'smallest' && value !== 'all') {
    errorAndExit('--strategy must be "smallest" or "all".');
  }
  return value;
}

function parseCoins(value: string): bigint {
  try {
    return parseAmount(value);
  } catch (err) {
    fatalError(err, '--amount');
  }
}

function parseUnits(value: string, flag: string): bigint {
  if (!/^\d+$/.test(value)) {
    errorAndExit(`${flag} must be a whole number of base units.`);
  }
  return BigInt(value);
}

// ── tx send ───────────────────────────────────────────────────────────────────

const sendCmd = new Command('send')
  .description('Build a send slate and write it to a file for the receiver')
  .requiredOption('--user <name>', 'Sending wallet')
  .requiredOption('--amount <coins>', 'Amount in coins, e.g. 1.5')
  .requiredOption('--out <file>', 'Where to write the slate')
  .option('--fee-base <units>', 'Fee base rate in base units', DEFAULT_FEE_BASE)
  .option('--message <text>', 'Message for the receiver, signed by the sender')
  .option('--strategy <name>', 'Coin selection: smallest | all', 'smallest')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: {
    user: string; amount: string; out: string; feeBase: string;
    message?: string; strategy: string; password?: string;
  }) => {
    const amount = parseCoins(opts.amount);
    const feeBase = parseUnits(opts.feeBase, '--fee-base');
    const strategy = parseStrategy(opts.strategy);
    const password = await resolvePassword(opts.password);

    header(`Send: ${opts.user}`);
    const spin = spinner('Selecting coins and building slate…');
    try {
      const slate = await withSession(opts.user, password, (manager, token) =>
        manager.send(token, amount, feeBase, opts.message, strategy),
      );
      spin.stop();
      const file = writeTextFile(opts.out, serializeSlate(slate));

      success('Slate created. Inputs are locked until it is finalized or cancelled.');
      kv([
        ['Slate', slate.id],
        ['Amount', formatCoins(slate.amount)],
        ['Fee', formatCoins(slate.fee)],
        ['Inputs', String(slate.tx.inputs.length)],
        ['File', file],
      ]);
      printLine('');
      info('Send this file to the receiver.');
      printLine('');
    } catch (err) {
      spin.stop();
      fatalError(err, 'send');
    }
  });

// ── tx receive ────────────────────────────────────────────────────────────────

const receiveCmd = new Command('receive')
  .description('Add this wallet\'s output and signature to a send slate')
  .requiredOption('--user <name>', 'Receiving wallet')
  .requiredOption('--in <file>', 'Slate from the sender')
  .requiredOption('--out <file>', 'Where to write the response slate')
  .option('--message <text>', 'Message for the sender')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; in: string; out: string; message?: string; password?: string }) => {
    const password = await resolvePassword(opts.password);
    try {
      const slate = parseSlate(readJsonFile(opts.in));
      const sender = slate.participants[0];

      header(`Receive: ${opts.user}`);
      kv([
        ['Slate', slate.id],
        ['Amount', formatCoins(slate.amount)],
        ['Message', sender?.message ?? '-'],
      ]);
      printLine('');

      const accepted = await withSession(opts.user, password, (manager, token) =>
        manager.receive(token, slate, opts.message),
      );
      if (!accepted) {
        errorAndExit('Slate refused: it was already received, reuses a nonce, or does not add up.');
      }

      const file = writeTextFile(opts.out, serializeSlate(slate));
      success(`Slate accepted. Return ${file} to the sender.`);
      printLine('');
    } catch (err) {
      fatalError(err, 'receive');
    }
  });

// ── tx finalize ───────────────────────────────────────────────────────────────

const finalizeCmd = new Command('finalize')
  .description('Finalize a slate returned by the receiver into a transaction')
  .requiredOption('--user <name>', 'Sending wallet')
  .requiredOption('--in <file>', 'Response slate from the receiver')
  .requiredOption('--out <file>', 'Where to write the transaction')
  .option('--post', 'Push the transaction to the node after finalizing')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; in: string; out: string; post?: boolean; password?: string }) => {
    const password = await resolvePassword(opts.password);
    try {
      const slate = parseSlate(readJsonFile(opts.in));
      header(`Finalize: ${opts.user}`);

      const tx = await withSession(opts.user, password, async (manager, token) => {
        const finalized = await manager.finalize(token, slate);
        if (opts.post) await manager.postTransaction(token, finalized);
        return finalized;
      });

      const file = writeTextFile(opts.out, serializeTransaction(tx));
      success(opts.post ? 'Transaction finalized and posted.' : 'Transaction finalized.');
      kv([
        ['Transaction', transactionId(tx)],
        ['Fee', formatCoins(tx.kernel.fee)],
        ['File', file],
      ]);
      printLine('');
    } catch (err) {
      fatalError(err, 'finalize');
    }
  });

// ── tx post ───────────────────────────────────────────────────────────────────

const postCmd = new Command('post')
  .description('Push a finalized transaction to the node')
  .requiredOption('--user <name>', 'Wallet that finalized it')
  .requiredOption('--in <file>', 'Transaction file')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; in: string; password?: string }) => {
    const password = await resolvePassword(opts.password);
    const spin = spinner('Posting transaction…');
    try {
      const tx = parseTransaction(readJsonFile(opts.in));
      const txId = await withSession(opts.user, password, (manager, token) => manager.postTransaction(token, tx));
      spin.stop();
      success(`Posted ${txId}`);
      printLine('');
    } catch (err) {
      spin.stop();
      fatalError(err, 'post');
    }
  });

// ── tx cancel ─────────────────────────────────────────────────────────────────

const cancelCmd = new Command('cancel')
  .description('Cancel a slate and release its locked coins')
  .requiredOption('--user <name>', 'Wallet username')
  .requiredOption('--slate <id>', 'Slate id')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; slate: string; password?: string }) => {
    const password = await resolvePassword(opts.password);
    try {
      const released = await withSession(opts.user, password, (manager, token) => manager.cancel(token, opts.slate));
      if (released) {
        success(`Slate ${opts.slate} cancelled.`);
      } else {
        warn(`Slate ${opts.slate} has nothing left to cancel.`);
      }
      printLine('');
    } catch (err) {
      fatalError(err, 'cancel');
    }
  });

// ── tx list ───────────────────────────────────────────────────────────────────

const listCmd = new Command('list')
  .description('List this wallet\'s slates')
  .requiredOption('--user <name>', 'Wallet username')
  .option('--password <pass>', 'Decryption password')
  .action(async (opts: { user: string; password?: string }) => {
    const password = await resolvePassword(opts.password);
    try {
      const entries = await withSession(opts.user, password, (manager, token) => manager.listTransactions(token));
      header(`Transactions: ${opts.user}`);
      table(
        ['Slate', 'Direction', 'Status', 'Amount', 'Fee', 'Created'],
        entries.map((e) => [
          e.slateId,
          e.direction,
          e.status,
          formatAmount(e.amount),
          formatAmount(e.fee),
          new Date(e.createdAt).toLocaleString(),
        ]),
      );
      printLine('');
    } catch (err) {
      fatalError(err, 'list');
    }
  });

// ── tx command group ──────────────────────────────────────────────────────────

export const txCommand = new Command('tx')
  .description('Send, receive and finalize transactions')
  .addCommand(sendCmd)
  .addCommand(receiveCmd)
  .addCommand(finalizeCmd)
  .addCommand(postCmd)
  .addCommand(cancelCmd)
  .addCommand(listCmd);
