/**
 * @file src/wallet/ledger.ts
 *
 * OutputLedger: one user's owned-output set and slate log.
 *
 * Every session of a user shares the same ledger instance, so the mutex
 * below serialises "select + lock" across all of them. The mutex is held
 * only around the read-decide-commit sequences that need it, never for the
 * lifetime of a slate.
 */

import { commit, encodePoint } from '../crypto/primitives.js';
import { deriveBlind, keyPathFor } from '../crypto/keychain.js';
import { Mutex } from './lock.js';
import { classifyOutput, type MaturityPolicy } from './summary.js';
import type { WalletStorage } from './storage.js';
import type { NodeClient } from '../node/types.js';
import type { Logger } from '../logger/logger.js';
import {
  InvalidSlateError,
  type OutputData,
  type TxDirection,
  type TxLogEntry,
  type WalletChanges,
  type WalletCoin,
} from './types.js';

export interface LedgerOptions {
  /** Age after which a pending sent slate releases its locked inputs. */
  lockTtlMs: number;
  now?: () => number;
}

export interface RefreshResult {
  chainHeight: number;
  updatedOutputs: number;
  removedOutputs: number;
  confirmedSlates: string[];
  /** Pending sends released because their locks outlived the TTL. */
  expiredSlates: string[];
}

export class OutputLedger {
  private readonly mutex = new Mutex();
  private readonly now: () => number;

  constructor(
    readonly username: string,
    private readonly storage: WalletStorage,
    private readonly logger: Logger,
    private readonly options: LedgerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Runs `fn` with this wallet's coin set locked against other writers. */
  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  timestamp(): number {
    return this.now();
  }

  // ── Reads ───────────────────────────────────────────────────────────────────

  /**
   * Every output that is not spent and whose commitment re-derives from the
   * seed. Outputs that fail the check are skipped, never spent.
   */
  async getAllAvailableCoins(seed: Uint8Array): Promise<WalletCoin[]> {
    const outputs = await this.storage.listOutputs(this.username);
    const coins: WalletCoin[] = [];

    for (const output of outputs) {
      if (output.status === 'spent') continue;
      const blind = deriveBlind(seed, output.keyPath);
      if (encodePoint(commit(blind, output.amount)) !== output.commitment) {
        this.logger.warn(
          { commitment: output.commitment, keyPath: output.keyPath },
          'Output does not re-derive from this seed; skipping',
        );
        continue;
      }
      coins.push({ output, blind });
    }

    return coins;
  }

  async getSpendableCoins(
    seed: Uint8Array,
    chainHeight: number,
    minConfirmations: number,
    maturity: MaturityPolicy,
  ): Promise<WalletCoin[]> {
    const coins = await this.getAllAvailableCoins(seed);
    return coins.filter(
      (c) => classifyOutput(c.output, chainHeight, minConfirmations, maturity) === 'spendable',
    );
  }

  listOutputs(): Promise<OutputData[]> {
    return this.storage.listOutputs(this.username);
  }

  listTxLog(): Promise<TxLogEntry[]> {
    return this.storage.listTxLog(this.username);
  }

  getTxLogEntry(slateId: string, direction: TxDirection): Promise<TxLogEntry | null> {
    return this.storage.getTxLogEntry(this.username, slateId, direction);
  }

  hasSeenNonce(nonce: string): Promise<boolean> {
    return this.storage.hasSeenNonce(this.username, nonce);
  }

  // ── Writes ──────────────────────────────────────────────────────────────────

  async nextKeyPath(): Promise<string> {
    return keyPathFor(await this.storage.reserveKeyIndex(this.username));
  }

  commit(changes: WalletChanges): Promise<void> {
    return this.storage.commit(this.username, changes);
  }

  /**
   * Undoes a pending slate's local effects: its locked inputs return to
   * unspent, its unconfirmed outputs are dropped and the log entry is closed.
   * Returns false when there was nothing left to release.
   *
   * A finalized send is never released. Its transaction may already be on
   * chain, and only refreshFromChain may settle its inputs.
   *
   * Callers must hold the lock.
   *
   * @throws InvalidSlateError when the slate was finalized by this wallet.
   */
  async releaseSlate(slateId: string, status: 'cancelled' | 'expired'): Promise<boolean> {
    const [sent, received] = await Promise.all([
      this.storage.getTxLogEntry(this.username, slateId, 'sent'),
      this.storage.getTxLogEntry(this.username, slateId, 'received'),
    ]);
    if (sent?.status === 'finalized') {
      throw new InvalidSlateError(`Slate ${slateId} is already finalized and cannot be cancelled.`);
    }

    const entries = [sent, received].filter((e): e is TxLogEntry => e !== null && e.status === 'pending');

    if (entries.length === 0) return false;

    const outputs = await this.storage.listOutputs(this.username);
    const changes: Required<Pick<WalletChanges, 'upsertOutputs' | 'removeOutputs' | 'upsertTxLog'>> = {
      upsertOutputs: [],
      removeOutputs: [],
      upsertTxLog: [],
    };

    for (const entry of entries) {
      const inputs = new Set(entry.inputCommitments);
      const created = new Set(entry.outputCommitments);

      for (const o of outputs) {
        if (inputs.has(o.commitment) && o.status === 'locked') {
          changes.upsertOutputs.push({ ...o, status: 'unspent', slateId: null, lockedAt: null });
        } else if (created.has(o.commitment) && o.status === 'unconfirmed') {
          changes.removeOutputs.push(o.commitment);
        }
      }
      changes.upsertTxLog.push({ ...entry, status });
    }

    await this.storage.commit(this.username, changes);
    this.logger.info(
      { slateId, status, released: changes.upsertOutputs.length, dropped: changes.removeOutputs.length },
      'Slate released',
    );
    return true;
  }

  /**
   * Releases every pending sent slate older than the lock TTL, so an
   * abandoned negotiation cannot hold coins forever.
   *
   * Callers must hold the lock.
   */
  async expireStaleLocks(): Promise<string[]> {
    const cutoff = this.now() - this.options.lockTtlMs;
    const stale = (await this.storage.listTxLog(this.username)).filter(
      (e) => e.direction === 'sent' && e.status === 'pending' && e.createdAt <= cutoff,
    );

    const expired: string[] = [];
    for (const entry of stale) {
      if (await this.releaseSlate(entry.slateId, 'expired')) {
        expired.push(entry.slateId);
      }
    }
    return expired;
  }

  /** expireStaleLocks() under the wallet lock. */
  releaseExpiredLocks(): Promise<string[]> {
    return this.withLock(() => this.expireStaleLocks());
  }

  /**
   * Reconciles local state with the chain: outputs that appeared get their
   * height and become spendable (or immature), spent inputs whose
   * transaction confirmed are dropped, and slate log entries whose outputs
   * are all on chain become confirmed. Stale locks are released first.
   */
  refreshFromChain(node: NodeClient, maturity: MaturityPolicy): Promise<RefreshResult> {
    return this.withLock(async () => {
      const expiredSlates = await this.expireStaleLocks();
      const chainHeight = await node.getChainHeight();
      const outputs = await this.storage.listOutputs(this.username);
      const onChain = await node.getOutputs(outputs.map((o) => o.commitment));

      const upsertOutputs: OutputData[] = [];
      const removeOutputs: string[] = [];

      for (const o of outputs) {
        const seen = onChain.get(o.commitment);

        if (seen) {
          const confirmedNow = o.status === 'unconfirmed' || o.status === 'immature';
          const heightChanged = o.blockHeight !== seen.height;
          if (!confirmedNow && !heightChanged) continue;

          const placed: OutputData = { ...o, blockHeight: seen.height };
          if (confirmedNow) {
            placed.status = maturity.isMature(placed, chainHeight) ? 'unspent' : 'immature';
          }
          upsertOutputs.push(placed);
        } else if (o.status === 'spent' && o.blockHeight !== null) {
          // Was on chain, now consumed by our finalized transaction
          removeOutputs.push(o.commitment);
        }
      }

      const confirmedSlates: string[] = [];
      const upsertTxLog: TxLogEntry[] = [];
      for (const entry of await this.storage.listTxLog(this.username)) {
        if (entry.status !== 'finalized' && !(entry.direction === 'received' && entry.status === 'pending')) {
          continue;
        }
        const landed =
          entry.outputCommitments.length > 0
            ? entry.outputCommitments.every((c) => onChain.has(c))
            : entry.inputCommitments.every((c) => removeOutputs.includes(c));
        if (landed) {
          upsertTxLog.push({ ...entry, status: 'confirmed' });
          confirmedSlates.push(entry.slateId);
        }
      }

      await this.storage.commit(this.username, { upsertOutputs, removeOutputs, upsertTxLog });

      this.logger.info(
        {
          chainHeight,
          updatedOutputs: upsertOutputs.length,
          removedOutputs: removeOutputs.length,
          confirmedSlates: confirmedSlates.length,
          expiredSlates: expiredSlates.length,
        },
        'Wallet refreshed from chain',
      );

      return {
        chainHeight,
        updatedOutputs: upsertOutputs.length,
        removedOutputs: removeOutputs.length,
        confirmedSlates,
        expiredSlates,
      };
    });
  }

  // ── Key-safe serialisation ──────────────────────────────────────────────────

  toJSON(): string {
    return `OutputLedger(${this.username})`;
  }

  toString(): string {
    return `OutputLedger(${this.username})`;
  }
}
