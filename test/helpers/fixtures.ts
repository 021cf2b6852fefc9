/**
 * Shared test fixtures: an in-process node, wallet funding, and loggers.
 * Nothing here touches the network or the filesystem.
 */

import { Writable } from 'node:stream';
import { commit, encodePoint } from '../../src/crypto/primitives.js';
import { deriveBlind, keyPathFor } from '../../src/crypto/keychain.js';
import { encryptWalletSeed, generateWalletSeed } from '../../src/keychain/seed-vault.js';
import { createLogger, type Logger } from '../../src/logger/logger.js';
import type { ChainOutput, NodeClient } from '../../src/node/types.js';
import type { Transaction } from '../../src/slate/types.js';
import type { WalletStorage } from '../../src/wallet/storage.js';
import type { OutputData, OutputFeatures } from '../../src/wallet/types.js';

export const TEST_PASSPHRASE = 'test-passphrase';

/** Chain stand-in. Holds the unspent set and the pushed transactions. */
export class FakeNode implements NodeClient {
  height = 100;
  readonly utxos = new Map<string, ChainOutput>();
  readonly posted: Transaction[] = [];
  failNext: Error | null = null;

  async getChainHeight(): Promise<number> {
    this.maybeFail();
    return this.height;
  }

  async getOutputs(commitments: readonly string[]): Promise<Map<string, ChainOutput>> {
    this.maybeFail();
    const found = new Map<string, ChainOutput>();
    for (const c of commitments) {
      const o = this.utxos.get(c);
      if (o) found.set(c, o);
    }
    return found;
  }

  async postTransaction(tx: Transaction): Promise<void> {
    this.maybeFail();
    this.posted.push(tx);
  }

  /** Applies a transaction to the unspent set at the current height. */
  mine(tx: Transaction): void {
    for (const input of tx.inputs) this.utxos.delete(input.commitment);
    for (const output of tx.outputs) {
      this.utxos.set(output.commitment, {
        commitment: output.commitment,
        height: this.height,
        features: output.features,
      });
    }
  }

  private maybeFail(): void {
    if (this.failNext) {
      const err = this.failNext;
      this.failNext = null;
      throw err;
    }
  }
}

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/** A trace-level logger whose lines are collected into `lines`. */
export function capturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      lines.push(chunk.toString());
      cb();
    },
  });
  return { logger: createLogger({ level: 'trace', destination }), lines };
}

/** Registers a wallet row and returns its seed. */
export async function createTestWallet(storage: WalletStorage, username: string): Promise<Buffer> {
  const seed = generateWalletSeed();
  await storage.createWallet(username, encryptWalletSeed(seed, TEST_PASSPHRASE));
  return seed;
}

export interface FundOptions {
  blockHeight?: number;
  features?: OutputFeatures;
  node?: FakeNode;
}

/** Gives the wallet confirmed outputs of the given amounts, as a miner would. */
export async function fundWallet(
  storage: WalletStorage,
  username: string,
  seed: Uint8Array,
  amounts: readonly bigint[],
  opts: FundOptions = {},
): Promise<OutputData[]> {
  const blockHeight = opts.blockHeight ?? 50;
  const features = opts.features ?? 'plain';
  const outputs: OutputData[] = [];

  for (const amount of amounts) {
    const keyPath = keyPathFor(await storage.reserveKeyIndex(username));
    const commitment = encodePoint(commit(deriveBlind(seed, keyPath), amount));
    outputs.push({
      keyPath,
      commitment,
      amount,
      status: 'unspent',
      features,
      blockHeight,
      slateId: null,
      lockedAt: null,
    });
    opts.node?.utxos.set(commitment, { commitment, height: blockHeight, features });
  }

  await storage.commit(username, { upsertOutputs: outputs });
  return outputs;
}
