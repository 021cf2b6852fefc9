/**
 * @file src/index.ts
 * Library entry point.
 */

export { WalletManager, startWalletManager, withWalletManager } from './manager/wallet-manager.js';
export type { WalletManagerConfig, NewWallet } from './manager/wallet-manager.js';
export { SessionRegistry } from './session/registry.js';
export type { SessionRegistryOptions } from './session/registry.js';
export { SlateBuilder } from './slate/builder.js';
export type { SendParams, SlateBuilderOptions } from './slate/builder.js';
export { parseSlate, serializeSlate, parseTransaction, serializeTransaction } from './slate/codec.js';
export { verifyTransaction, transactionId } from './slate/transaction.js';
export type { Slate, SlatePhase, ParticipantData, Transaction, TxKernel } from './slate/types.js';
export { HttpNodeClient } from './node/client.js';
export type { NodeClient, ChainOutput } from './node/types.js';
export {
  encryptWalletSeed,
  decryptWalletSeed,
  generateWalletSeed,
  createDecoySeed,
} from './keychain/seed-vault.js';
export { bip39Codec } from './keychain/mnemonic.js';
export type { MnemonicCodec } from './keychain/mnemonic.js';
export { createLogger, createWalletLogger, AuditDb } from './logger/index.js';
export type { Logger } from './logger/index.js';
export * from './wallet/index.js';
