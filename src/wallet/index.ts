/**
 * @file src/wallet/index.ts
 * Public API for the wallet module. Import from here, not from individual files.
 */

export { OutputLedger } from './ledger.js';
export type { LedgerOptions, RefreshResult } from './ledger.js';
export { SqliteWalletStorage } from './storage.js';
export type { WalletStorage } from './storage.js';
export { selectCoins } from './selection.js';
export type { Selection } from './selection.js';
export { weightedFee, flatFee } from './fees.js';
export type { FeePolicy } from './fees.js';
export { summarize, classifyOutput, coinbaseMaturity, confirmations } from './summary.js';
export type { BalanceBucket, MaturityPolicy } from './summary.js';
export {
  WalletError,
  AuthenticationError,
  InvalidSessionError,
  InsufficientFundsError,
  InvalidSlateError,
  StorageError,
  NetworkError,
  CryptoError,
} from './types.js';
export type {
  OutputData,
  OutputStatus,
  OutputFeatures,
  WalletCoin,
  WalletSummary,
  SelectionStrategy,
  TxDirection,
  TxLogStatus,
  TxLogEntry,
  EncryptedSeed,
  WalletChanges,
  WalletErrorCode,
} from './types.js';
