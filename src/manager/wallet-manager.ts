/**
 * @file src/manager/wallet-manager.ts
 *
 * WalletManager: the facade every front end talks to.
 *
 * Resolves a session token to the user's seed and ledger, hands both to the
 * slate builder, and writes one audit row per state change. The seed copy
 * obtained for an operation is zero-filled when the operation ends.
 *
 * Shares across all users:
 *   - One WalletStorage
 *   - One NodeClient
 *   - One Logger and one AuditDb
 *
 * LIFECYCLE: close() logs every session out and closes storage and audit.
 * Prefer withWalletManager(), which guarantees close() on every exit path.
 */

import { bip39Codec, type MnemonicCodec } from '../keychain/mnemonic.js';
import { encryptWalletSeed, generateWalletSeed } from '../keychain/seed-vault.js';
import { SessionRegistry } from '../session/registry.js';
import { SlateBuilder } from '../slate/builder.js';
import { transactionId, verifyTransaction } from '../slate/transaction.js';
import type { Slate, Transaction } from '../slate/types.js';
import { weightedFee, type FeePolicy } from '../wallet/fees.js';
import type { OutputLedger, RefreshResult } from '../wallet/ledger.js';
import { SqliteWalletStorage, type WalletStorage } from '../wallet/storage.js';
import { coinbaseMaturity, summarize, type MaturityPolicy } from '../wallet/summary.js';
import {
  AuthenticationError,
  InvalidSlateError,
  WalletError,
  type OutputData,
  type SelectionStrategy,
  type TxLogEntry,
  type WalletSummary,
} from '../wallet/types.js';
import { AuditDb } from '../logger/audit.js';
import type { Logger } from '../logger/logger.js';
import type { NodeClient } from '../node/types.js';

const USERNAME_RE = /^[A-Za-z0-9_.-]{1,64}$/;

export interface WalletManagerConfig {
  walletDbPath: string;
  auditDbPath: string;
  minConfirmations: number;
  coinbaseMaturity: number;
  lockTtlMs: number;
  sessionTtlMs: number;
  /** Turns a send's feeBase into a policy. Defaults to weightedFee. */
  feePolicy?: (feeBase: bigint) => FeePolicy;
  mnemonic?: MnemonicCodec;
  now?: () => number;
}

export interface NewWallet {
  /** Recovery phrase. Shown once, never stored. */
  words: string;
  token: string;
}

export class WalletManager {
  private readonly registry: SessionRegistry;
  private readonly builder: SlateBuilder;
  private readonly maturity: MaturityPolicy;
  private readonly feePolicy: (feeBase: bigint) => FeePolicy;
  private readonly mnemonic: MnemonicCodec;
  private closed = false;

  constructor(
    private readonly config: WalletManagerConfig,
    private readonly storage: WalletStorage,
    private readonly node: NodeClient,
    private readonly audit: AuditDb,
    private readonly logger: Logger,
  ) {
    this.maturity = coinbaseMaturity(config.coinbaseMaturity);
    this.feePolicy = config.feePolicy ?? weightedFee;
    this.mnemonic = config.mnemonic ?? bip39Codec;
    this.registry = new SessionRegistry(storage, logger, {
      sessionTtlMs: config.sessionTtlMs,
      lockTtlMs: config.lockTtlMs,
      ...(config.now ? { now: config.now } : {}),
    });
    this.builder = new SlateBuilder(node, logger, {
      minConfirmations: config.minConfirmations,
      maturity: this.maturity,
    });
  }

  // ── Wallet lifecycle ────────────────────────────────────────────────────────

  /** Null when the username is taken. */
  async initializeNewWallet(username: string, passphrase: string): Promise<NewWallet | null> {
    assertUsername(username);
    const seed = generateWalletSeed();
    try {
      const words = this.mnemonic.createMnemonic(seed);
      const token = await this.createWallet(username, seed, passphrase);
      if (token === null) return null;
      this.audit.log(username, 'wallet_created', {});
      return { words, token };
    } finally {
      seed.fill(0);
    }
  }

  /** Recreates a wallet from its recovery phrase. Null when the username is taken. */
  async restoreWallet(username: string, words: string, passphrase: string): Promise<string | null> {
    assertUsername(username);
    const seed = this.mnemonic.mnemonicToSeed(words);
    try {
      const token = await this.createWallet(username, seed, passphrase);
      if (token !== null) this.audit.log(username, 'wallet_restored', {});
      return token;
    } finally {
      seed.fill(0);
    }
  }

  /** Null on a wrong passphrase or an unknown user. */
  async login(username: string, passphrase: string): Promise<string | null> {
    try {
      const token = await this.registry.login(username, passphrase);
      this.audit.log(username, 'login', {});
      return token;
    } catch (err) {
      if (err instanceof AuthenticationError) {
        this.audit.log(username, 'login_failed', {});
        return null;
      }
      throw err;
    }
  }

  logout(token: string): void {
    const username = this.registry.peekUsername(token);
    this.registry.logout(token);
    if (username !== null) this.audit.log(username, 'logout', {});
  }

  // ── Reads ───────────────────────────────────────────────────────────────────

  getWalletSummary(token: string, minConfirmations = this.config.minConfirmations): Promise<WalletSummary> {
    return this.withSession(token, async (ledger, seed, username) => {
      this.auditExpired(username, await ledger.releaseExpiredLocks());
      const chainHeight = await this.node.getChainHeight();
      const coins = await ledger.getAllAvailableCoins(seed);
      return summarize(coins, chainHeight, minConfirmations, this.maturity);
    });
  }

  listOutputs(token: string): Promise<OutputData[]> {
    return this.withSession(token, (ledger) => ledger.listOutputs());
  }

  listTransactions(token: string): Promise<TxLogEntry[]> {
    return this.withSession(token, (ledger) => ledger.listTxLog());
  }

  // ── Slates ──────────────────────────────────────────────────────────────────

  send(
    token: string,
    amount: bigint,
    feeBase: bigint,
    message?: string,
    strategy: SelectionStrategy = 'smallest',
  ): Promise<Slate> {
    return this.withSession(token, async (ledger, seed, username) => {
      let slate: Slate;
      try {
        slate = await this.builder.buildSendSlate(ledger, seed, {
          amount,
          feePolicy: this.feePolicy(feeBase),
          strategy,
          ...(message !== undefined ? { message } : {}),
        });
      } catch (err) {
        if (err instanceof WalletError) this.auditFailure(username, 'send', err, { amount });
        throw err;
      }
      this.audit.log(
        username,
        'slate_sent',
        { fee: slate.fee, inputs: slate.tx.inputs.length, strategy },
        { slateId: slate.id, amount, status: 'pending' },
      );
      return slate;
    });
  }

  /** False when the slate was refused; the caller should not answer it. */
  receive(token: string, slate: Slate, message?: string): Promise<boolean> {
    return this.withSession(token, async (ledger, seed, username) => {
      let accepted: boolean;
      try {
        accepted = await this.builder.addReceiverData(ledger, seed, slate, message);
      } catch (err) {
        if (err instanceof WalletError) this.auditFailure(username, 'receive', err, { slateId: slate.id });
        throw err;
      }
      this.audit.log(
        username,
        accepted ? 'slate_received' : 'slate_rejected',
        { phase: slate.phase },
        { slateId: slate.id, amount: slate.amount, status: accepted ? 'pending' : 'rejected' },
      );
      return accepted;
    });
  }

  finalize(token: string, slate: Slate): Promise<Transaction> {
    return this.withSession(token, async (ledger, seed, username) => {
      try {
        const tx = await this.builder.finalize(ledger, seed, slate);
        this.audit.log(
          username,
          'slate_finalized',
          { txId: transactionId(tx), fee: tx.kernel.fee },
          { slateId: slate.id, amount: slate.amount, status: 'finalized' },
        );
        return tx;
      } catch (err) {
        if (err instanceof InvalidSlateError) {
          this.audit.log(username, 'slate_rejected', { error: err.message }, { slateId: slate.id, status: 'rejected' });
        }
        throw err;
      }
    });
  }

  /**
   * Releases the slate's locked inputs and unconfirmed outputs. False when
   * nothing was open.
   *
   * @throws InvalidSlateError when the slate is already finalized.
   */
  cancel(token: string, slateId: string): Promise<boolean> {
    return this.withSession(token, async (ledger, _seed, username) => {
      let released: boolean;
      try {
        released = await this.builder.cancel(ledger, slateId);
      } catch (err) {
        if (err instanceof WalletError) this.auditFailure(username, 'cancel', err, { slateId });
        throw err;
      }
      if (released) {
        this.audit.log(username, 'slate_cancelled', {}, { slateId, status: 'cancelled' });
      }
      return released;
    });
  }

  // ── Chain ───────────────────────────────────────────────────────────────────

  /** Verifies and pushes a finalized transaction to the node. */
  postTransaction(token: string, tx: Transaction): Promise<string> {
    return this.withSession(token, async (_ledger, _seed, username) => {
      verifyTransaction(tx);
      const txId = transactionId(tx);
      await this.node.postTransaction(tx);
      this.audit.log(username, 'tx_posted', { txId }, { status: 'posted' });
      this.logger.info({ username, txId }, 'Transaction posted');
      return txId;
    });
  }

  refreshOutputs(token: string): Promise<RefreshResult> {
    return this.withSession(token, async (ledger, _seed, username) => {
      const result = await ledger.refreshFromChain(this.node, this.maturity);
      this.auditExpired(username, result.expiredSlates);
      this.audit.log(username, 'outputs_refreshed', { ...result });
      return result;
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  activeSessions(): number {
    return this.registry.activeSessions();
  }

  /** Logs out every session and closes storage and audit. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.registry.clear();
    this.storage.close();
    this.audit.close();
    this.logger.info('WalletManager closed');
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private async createWallet(username: string, seed: Buffer, passphrase: string): Promise<string | null> {
    const created = await this.storage.createWallet(username, encryptWalletSeed(seed, passphrase));
    if (!created) {
      this.logger.warn({ username }, 'Username already taken');
      return null;
    }
    return this.registry.loginWithSeed(username, seed);
  }

  private auditExpired(username: string, slateIds: string[]): void {
    for (const slateId of slateIds) {
      this.audit.log(username, 'slate_expired', {}, { slateId, status: 'expired' });
    }
  }

  private auditFailure(
    username: string,
    operation: 'send' | 'receive' | 'cancel',
    err: WalletError,
    opts: { slateId?: string; amount?: bigint },
  ): void {
    this.audit.log(
      username,
      'operation_failed',
      { operation, code: err.code, error: err.message },
      { ...opts, status: 'failed' },
    );
  }

  /**
   * Runs `fn` with the session's ledger and a seed copy that is wiped
   * afterwards.
   *
   * @throws InvalidSessionError
   */
  private async withSession<T>(
    token: string,
    fn: (ledger: OutputLedger, seed: Buffer, username: string) => Promise<T>,
  ): Promise<T> {
    const ledger = this.registry.getWallet(token);
    const seed = this.registry.getSeed(token);
    try {
      return await fn(ledger, seed, ledger.username);
    } finally {
      seed.fill(0);
    }
  }
}

function assertUsername(username: string): void {
  if (!USERNAME_RE.test(username)) {
    throw new WalletError(
      'INVALID_ARGUMENT',
      'Username may only contain letters, digits, dots, hyphens and underscores (1-64 characters).',
    );
  }
}

// ── Factories ─────────────────────────────────────────────────────────────────

/** Opens storage and audit at the configured paths. */
export function startWalletManager(
  config: WalletManagerConfig,
  node: NodeClient,
  logger: Logger,
): WalletManager {
  const storage = new SqliteWalletStorage(config.walletDbPath);
  let audit: AuditDb;
  try {
    audit = new AuditDb(config.auditDbPath);
  } catch (err) {
    storage.close();
    throw err;
  }
  logger.info({ walletDbPath: config.walletDbPath }, 'WalletManager started');
  return new WalletManager(config, storage, node, audit, logger);
}

/** Runs `fn` against a fresh manager and closes it however `fn` exits. */
export async function withWalletManager<T>(
  config: WalletManagerConfig,
  node: NodeClient,
  logger: Logger,
  fn: (manager: WalletManager) => Promise<T>,
): Promise<T> {
  const manager = startWalletManager(config, node, logger);
  try {
    return await fn(manager);
  } finally {
    manager.close();
  }
}
