/**
 * @file src/cli/output.ts
 *
 * Typed output helpers for all CLI commands.
 * Keeps presentation logic out of command files.
 *
 * Rules:
 *  - Never import WalletManager; helpers take plain values
 *  - All stdout is human-readable; stderr is used for errors
 *  - Exit codes: 0 success, 1 user error, 2 internal/unexpected error
 */

import * as readline from 'node:readline';
import { WalletError } from '../wallet/types.js';
import { formatAmount } from '../utils.js';
import type { AuditRow } from '../logger/audit.js';
import type { WalletSummary } from '../wallet/types.js';

// ── Colours (ANSI, disabled when not a TTY or CI=true) ───────────────────────

const NO_COLOR = !process.stdout.isTTY || process.env['CI'] === 'true' || process.env['NO_COLOR'];

const c = {
  bold:   (s: string): string => NO_COLOR ? s : `\x1b[1m${s}\x1b[0m`,
  green:  (s: string): string => NO_COLOR ? s : `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string): string => NO_COLOR ? s : `\x1b[33m${s}\x1b[0m`,
  red:    (s: string): string => NO_COLOR ? s : `\x1b[31m${s}\x1b[0m`,
  cyan:   (s: string): string => NO_COLOR ? s : `\x1b[36m${s}\x1b[0m`,
  dim:    (s: string): string => NO_COLOR ? s : `\x1b[2m${s}\x1b[0m`,
};

// ── Section headers ───────────────────────────────────────────────────────────

export function header(title: string): void {
  const line = '─'.repeat(Math.min(title.length + 4, 60));
  process.stdout.write(`\n${c.bold(line)}\n  ${c.bold(title)}\n${c.bold(line)}\n\n`);
}

// ── Status lines ──────────────────────────────────────────────────────────────

export function success(msg: string): void {
  process.stdout.write(`${c.green('✓')} ${msg}\n`);
}

export function warn(msg: string): void {
  process.stdout.write(`${c.yellow('⚠')} ${msg}\n`);
}

export function info(msg: string): void {
  process.stdout.write(`  ${c.dim('·')} ${msg}\n`);
}

export function printLine(msg: string): void {
  process.stdout.write(`${msg}\n`);
}

// ── Error output ─────────────────────────────────────────────────────────────

export function errorAndExit(msg: string, code = 1): never {
  process.stderr.write(`\n${c.red('✗ Error:')} ${msg}\n\n`);
  process.exit(code);
}

/**
 * Reports a failed command. Wallet errors are the user's to fix (exit 1);
 * anything else is unexpected (exit 2).
 */
export function fatalError(err: unknown, context?: string): never {
  const msg = err instanceof Error ? err.message : String(err);
  const codeStr = err instanceof WalletError ? ` [${err.code}]` : '';
  const ctx = context ? `${context}: ` : '';
  process.stderr.write(`\n${c.red('✗')} ${ctx}${msg}${codeStr}\n\n`);
  process.exit(err instanceof WalletError ? 1 : 2);
}

// ── Key-value pairs ───────────────────────────────────────────────────────────

export function kv(pairs: Array<[string, string]>): void {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, val] of pairs) {
    process.stdout.write(`  ${c.dim(key.padEnd(maxKey, ' '))}  ${val}\n`);
  }
}

// ── Tables ────────────────────────────────────────────────────────────────────

export function table(
  headers: string[],
  rows: string[][],
  opts: { maxWidth?: number } = {},
): void {
  if (rows.length === 0) {
    process.stdout.write(`  ${c.dim('(no rows)')}\n`);
    return;
  }

  const maxWidth = opts.maxWidth ?? 120;
  const colWidths = headers.map((h, i) =>
    Math.min(
      maxWidth / headers.length,
      Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)),
    ),
  );

  const headerLine = headers
    .map((h, i) => c.bold(h.padEnd(colWidths[i] ?? 0)))
    .join('  ');

  const separator = colWidths.map((w) => '─'.repeat(w)).join('  ');

  process.stdout.write(`  ${headerLine}\n`);
  process.stdout.write(`  ${c.dim(separator)}\n`);

  for (const row of rows) {
    const line = row.map((cell, i) => {
      const w   = colWidths[i] ?? 0;
      const str = (cell ?? '').slice(0, w);
      return str.padEnd(w);
    }).join('  ');
    process.stdout.write(`  ${line}\n`);
  }
}

// ── Amount formatting ─────────────────────────────────────────────────────────

export function formatCoins(units: bigint): string {
  return `${c.cyan(formatAmount(units))}  ${c.dim(`(${units.toLocaleString()} units)`)}`;
}

export function summaryPairs(summary: WalletSummary): Array<[string, string]> {
  return [
    ['Chain height', String(summary.lastConfirmedHeight)],
    ['Confirmations', String(summary.minimumConfirmations)],
    ['Total', formatCoins(summary.total)],
    ['Spendable', formatCoins(summary.spendable)],
    ['Awaiting', formatCoins(summary.awaitingConfirmation)],
    ['Immature', formatCoins(summary.immature)],
    ['Locked', formatCoins(summary.locked)],
  ];
}

// ── Spinner (for long async ops) ──────────────────────────────────────────────

const SPIN_CHARS = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface Spinner {
  stop(finalMsg?: string): void;
}

export function spinner(msg: string): Spinner {
  if (!process.stdout.isTTY) {
    process.stdout.write(`  ${msg}...\n`);
    return { stop: (m) => { if (m) process.stdout.write(`  ${m}\n`); } };
  }

  let i = 0;
  const timer = setInterval(() => {
    const char = SPIN_CHARS[i % SPIN_CHARS.length] ?? '';
    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);
    process.stdout.write(`  ${c.cyan(char)} ${msg}`);
    i++;
  }, 80);

  return {
    stop(finalMsg?: string): void {
      clearInterval(timer);
      readline.clearLine(process.stdout, 0);
      readline.cursorTo(process.stdout, 0);
      if (finalMsg) process.stdout.write(`  ${finalMsg}\n`);
    },
  };
}

// ── Password prompt ───────────────────────────────────────────────────────────

export function promptPassword(prompt = 'Wallet password: '): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input:  process.stdin,
      output: process.stdout,
    });

    // Hide input
    const muted = rl as unknown as { _writeToOutput: (s: string) => void };
    muted._writeToOutput = (s: string) => {
      if (s.charCodeAt(0) === 13) { // carriage return: show newline
        process.stdout.write('\n');
      }
      // suppress all other characters (hidden input)
    };

    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

// ── Audit row formatter ───────────────────────────────────────────────────────

export function formatAuditRows(rows: AuditRow[]): void {
  if (rows.length === 0) {
    process.stdout.write(`  ${c.dim('No audit events found.')}\n`);
    return;
  }

  for (const row of rows) {
    const ts     = new Date(row.ts).toLocaleString();
    const slate  = row.slate_id ? `  ${c.dim('slate:')} ${row.slate_id.slice(0, 8)}…` : '';
    const amount = row.amount ? `  ${formatAmount(BigInt(row.amount))}` : '';
    const status = row.status
      ? ` ${row.status === 'rejected' || row.status === 'failed' ? c.yellow(row.status) : c.green(row.status)}`
      : '';

    process.stdout.write(
      `  ${c.dim(ts)}  ${c.bold(row.event.padEnd(18))}${status}${amount}${slate}\n`,
    );

    const details = parseDetails(row.details_json);
    const interesting = ['txId', 'fee', 'error', 'chainHeight']
      .filter((k) => k in details)
      .map((k) => `${k}=${String(details[k])}`)
      .join('  ');
    if (interesting) {
      process.stdout.write(`    ${c.dim(interesting)}\n`);
    }
  }
}

function parseDetails(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}
