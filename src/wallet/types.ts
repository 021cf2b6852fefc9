/**
 * @file src/wallet/types.ts
 * Shared types, interfaces, and error classes for the wallet module.
 * All other modules import from here, never the reverse.
 */

// ── Outputs ───────────────────────────────────────────────────────────────────

/**
 * Lifecycle of one owned output.
 *
 *   unconfirmed → unspent | immature → locked → spent
 *
 * `locked` means reserved by an in-flight slate. `spent` outputs are kept
 * until the spending transaction confirms, then dropped.
 */
export type OutputStatus = 'unconfirmed' | 'unspent' | 'immature' | 'locked' | 'spent';

export type OutputFeatures = 'plain' | 'coinbase';

/** One transaction output known to belong to this wallet. Persisted. */
export interface OutputData {
  /** Derivation path of the blinding factor, e.g. `m/0/7`. Not secret. */
  keyPath: string;
  /** Hex-encoded Pedersen commitment. Unique per wallet. */
  commitment: string;
  /** Cleartext amount in base units. */
  amount: bigint;
  status: OutputStatus;
  features: OutputFeatures;
  /** Height the output was mined at, null while it is not on chain. */
  blockHeight: number | null;
  /** Slate that created or reserved this output, if any. */
  slateId: string | null;
  /** Epoch ms at which the output was locked. */
  lockedAt: number | null;
}

/**
 * An owned output together with its re-derived blinding factor.
 * Contains secret material. Never persist or log it, and do not keep it
 * beyond the operation that produced it.
 */
export interface WalletCoin {
  readonly output: OutputData;
  readonly blind: bigint;
}

/** Derived balance view. Recomputed on demand, never stored. */
export interface WalletSummary {
  lastConfirmedHeight: number;
  minimumConfirmations: number;
  total: bigint;
  awaitingConfirmation: bigint;
  immature: bigint;
  locked: bigint;
  spendable: bigint;
}

// ── Coin selection ────────────────────────────────────────────────────────────

/**
 * `all` spends every spendable coin into one change output.
 * `smallest` uses the fewest inputs, then the least leftover.
 */
export type SelectionStrategy = 'all' | 'smallest';

// ── Transaction log ───────────────────────────────────────────────────────────

export type TxDirection = 'sent' | 'received';

export type TxLogStatus = 'pending' | 'finalized' | 'confirmed' | 'cancelled' | 'expired';

/**
 * Per-slate record. The sender keeps enough public data here to re-derive
 * its secrets from the seed at finalize time; nothing secret is stored.
 */
export interface TxLogEntry {
  slateId: string;
  direction: TxDirection;
  status: TxLogStatus;
  amount: bigint;
  fee: bigint;
  createdAt: number;
  /** Commitments of the inputs this wallet spends (sender only). */
  inputCommitments: string[];
  /** Commitments of the outputs this wallet creates (change or received). */
  outputCommitments: string[];
  /** Counterparty public nonce, used for replay detection. */
  counterpartyNonce: string | null;
  /** Serialised final transaction once finalized. */
  transactionJson: string | null;
}

// ── Persistence ───────────────────────────────────────────────────────────────

/**
 * The durable form of the wallet seed. Version field allows future format
 * migrations without breaking stored wallets.
 */
export interface EncryptedSeed {
  version: 1;
  /** AES-256-GCM ciphertext, hex-encoded. */
  ciphertext: string;
  /** 12-byte GCM nonce, hex-encoded. Fresh per encryption. */
  nonce: string;
  /** 16-byte GCM authentication tag, hex-encoded. */
  authTag: string;
  /** 32-byte scrypt salt, hex-encoded. Fresh per encryption. */
  salt: string;
  algorithm: 'aes-256-gcm';
  kdf: 'scrypt';
  kdfParams: {
    N: number;
    r: number;
    p: number;
  };
}

/** One atomic batch of writes against a single wallet. */
export interface WalletChanges {
  upsertOutputs?: OutputData[];
  removeOutputs?: string[];
  upsertTxLog?: TxLogEntry[];
  seenNonces?: string[];
}

// ── Error Classes ─────────────────────────────────────────────────────────────

export type WalletErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_SESSION'
  | 'INSUFFICIENT_FUNDS'
  | 'INVALID_SLATE'
  | 'STORAGE_ERROR'
  | 'NETWORK_ERROR'
  | 'CRYPTO_ERROR'
  | 'INVALID_ARGUMENT';

/**
 * Typed error thrown by all wallet module operations.
 * Always includes a machine-readable `code` for programmatic handling.
 */
export class WalletError extends Error {
  override readonly name: string = 'WalletError';

  constructor(
    public readonly code: WalletErrorCode,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Wrong passphrase, unknown user or tampered seed. One message for all three. */
export class AuthenticationError extends WalletError {
  override readonly name: string = 'AuthenticationError';

  constructor(cause?: unknown) {
    super('AUTHENTICATION_FAILED', 'Authentication failed. Check the username and passphrase.', cause);
  }
}

export class InvalidSessionError extends WalletError {
  override readonly name: string = 'InvalidSessionError';

  constructor() {
    super('INVALID_SESSION', 'Session token is unknown, expired or logged out.');
  }
}

export class InsufficientFundsError extends WalletError {
  override readonly name: string = 'InsufficientFundsError';

  constructor(
    public readonly needed: bigint,
    public readonly available: bigint,
  ) {
    super('INSUFFICIENT_FUNDS', `Insufficient funds: need ${needed}, spendable ${available}.`);
  }
}

export class InvalidSlateError extends WalletError {
  override readonly name: string = 'InvalidSlateError';

  constructor(message: string, cause?: unknown) {
    super('INVALID_SLATE', message, cause);
  }
}

export class StorageError extends WalletError {
  override readonly name: string = 'StorageError';

  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, cause);
  }
}

export class NetworkError extends WalletError {
  override readonly name: string = 'NetworkError';

  constructor(message: string, cause?: unknown) {
    super('NETWORK_ERROR', message, cause);
  }
}

export class CryptoError extends WalletError {
  override readonly name: string = 'CryptoError';

  constructor(message: string, cause?: unknown) {
    super('CRYPTO_ERROR', message, cause);
  }
}
