#!/usr/bin/env node
/**
 * @file src/cli/index.ts
 *
 * slatew CLI entry point.
 *
 * Usage:
 *   slatew wallet create  --user alice
 *   slatew wallet summary --user alice [--refresh]
 *   slatew tx send        --user alice --amount 1.5 --out slate.json
 *   slatew tx receive     --user bob   --in slate.json --out response.json
 *   slatew tx finalize    --user alice --in response.json --out tx.json --post
 *
 * Run with:
 *   npx tsx src/cli/index.ts <command>
 *   # or after build:
 *   node dist/cli/index.js <command>
 */

import { Command } from 'commander';
import { walletCommand } from './commands/wallet.js';
import { txCommand } from './commands/tx.js';

const program = new Command()
  .name('slatew')
  .description('Interactive confidential-transaction wallet')
  .version('0.1.0', '-v, --version', 'Print version number')
  .helpOption('-h, --help', 'Show help')
  .showHelpAfterError(true)
  .configureOutput({
    outputError: (str, write) => write(`\n\x1b[31m✗\x1b[0m ${str.trim()}\n\n`),
  });

program.addCommand(walletCommand);
program.addCommand(txCommand);

// Catch unhandled top-level errors (e.g. missing subcommand)
program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`\n\x1b[31m✗ Fatal:\x1b[0m ${msg}\n\n`);
  process.exit(2);
});
