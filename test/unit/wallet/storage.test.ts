/**
 * Unit tests for src/wallet/storage.ts
 *
 * Test gates:
 *  ✅ Wallet rows are unique per username
 *  ✅ Outputs, slate log and seen nonces round-trip with bigint amounts intact
 *  ✅ Key indexes are reserved monotonically
 *  ✅ Outputs list in insertion order, not key-path text order
 *  ✅ Every failure surfaces as StorageError
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteWalletStorage } from '../../../src/wallet/storage.js';
import { encryptWalletSeed, generateWalletSeed } from '../../../src/keychain/seed-vault.js';
import { StorageError, type OutputData, type TxLogEntry } from '../../../src/wallet/types.js';

const PASS = 'test-passphrase';

function output(index: number, amount: bigint): OutputData {
  return {
    keyPath: `m/0/${index}`,
    commitment: (index + 1).toString(16).padStart(64, '0'),
    amount,
    status: 'unspent',
    features: 'plain',
    blockHeight: 10,
    slateId: null,
    lockedAt: null,
  };
}

function entry(overrides: Partial<TxLogEntry> = {}): TxLogEntry {
  return {
    slateId: 'slate-1',
    direction: 'sent',
    status: 'pending',
    amount: 15n,
    fee: 1n,
    createdAt: 1_000,
    inputCommitments: ['aa'],
    outputCommitments: ['bb'],
    counterpartyNonce: null,
    transactionJson: null,
    ...overrides,
  };
}

describe('SqliteWalletStorage', () => {
  let storage: SqliteWalletStorage;

  beforeEach(async () => {
    storage = new SqliteWalletStorage(':memory:');
    await storage.createWallet('alice', encryptWalletSeed(generateWalletSeed(), PASS));
  });

  afterEach(() => {
    storage.close();
  });

  describe('wallets', () => {
    it('refuses a second wallet with the same username', async () => {
      const again = await storage.createWallet('alice', encryptWalletSeed(generateWalletSeed(), PASS));
      expect(again).toBe(false);
    });

    it('round-trips the encrypted seed record', async () => {
      const rec = encryptWalletSeed(generateWalletSeed(), PASS);
      await storage.createWallet('bob', rec);
      expect(await storage.loadEncryptedSeed('bob')).toEqual(rec);
    });

    it('returns null for an unknown user', async () => {
      expect(await storage.loadEncryptedSeed('nobody')).toBeNull();
    });

    it('reserves key indexes 0, 1, 2…', async () => {
      expect(await storage.reserveKeyIndex('alice')).toBe(0);
      expect(await storage.reserveKeyIndex('alice')).toBe(1);
      expect(await storage.reserveKeyIndex('alice')).toBe(2);
    });

    it('keeps key indexes per wallet', async () => {
      await storage.createWallet('bob', encryptWalletSeed(generateWalletSeed(), PASS));
      await storage.reserveKeyIndex('alice');
      expect(await storage.reserveKeyIndex('bob')).toBe(0);
    });

    it('rejects a key index request for an unknown user', async () => {
      await expect(storage.reserveKeyIndex('nobody')).rejects.toThrow(StorageError);
    });
  });

  describe('outputs', () => {
    it('round-trips outputs with large amounts', async () => {
      const big = output(0, 2n ** 62n + 1n);
      await storage.commit('alice', { upsertOutputs: [big, output(1, 5n)] });
      expect(await storage.listOutputs('alice')).toEqual([big, output(1, 5n)]);
    });

    it('updates an output in place', async () => {
      await storage.commit('alice', { upsertOutputs: [output(0, 5n)] });
      const locked: OutputData = { ...output(0, 5n), status: 'locked', slateId: 'slate-1', lockedAt: 123 };
      await storage.commit('alice', { upsertOutputs: [locked] });
      expect(await storage.listOutputs('alice')).toEqual([locked]);
    });

    it('lists outputs in the order they were added, past ten key indexes', async () => {
      const outputs = Array.from({ length: 12 }, (_, i) => output(i, BigInt(i + 1)));
      await storage.commit('alice', { upsertOutputs: outputs });
      await storage.commit('alice', { upsertOutputs: [{ ...output(2, 3n), status: 'locked' }] });

      const keyPaths = (await storage.listOutputs('alice')).map((o) => o.keyPath);
      expect(keyPaths).toEqual(Array.from({ length: 12 }, (_, i) => `m/0/${i}`));
    });

    it('removes outputs', async () => {
      await storage.commit('alice', { upsertOutputs: [output(0, 5n), output(1, 6n)] });
      await storage.commit('alice', { removeOutputs: [output(0, 5n).commitment] });
      expect(await storage.listOutputs('alice')).toEqual([output(1, 6n)]);
    });

    it('keeps outputs per wallet', async () => {
      await storage.commit('alice', { upsertOutputs: [output(0, 5n)] });
      await storage.createWallet('bob', encryptWalletSeed(generateWalletSeed(), PASS));
      expect(await storage.listOutputs('bob')).toEqual([]);
    });

    it('rejects writes for a wallet that does not exist', async () => {
      await expect(storage.commit('nobody', { upsertOutputs: [output(0, 5n)] })).rejects.toThrow(StorageError);
    });
  });

  describe('slate log', () => {
    it('round-trips an entry', async () => {
      const e = entry({ counterpartyNonce: 'cc', transactionJson: '{"x":1}' });
      await storage.commit('alice', { upsertTxLog: [e] });
      expect(await storage.getTxLogEntry('alice', 'slate-1', 'sent')).toEqual(e);
    });

    it('keeps sent and received entries for the same slate apart', async () => {
      await storage.commit('alice', {
        upsertTxLog: [entry(), entry({ direction: 'received', amount: 9n })],
      });
      const received = await storage.getTxLogEntry('alice', 'slate-1', 'received');
      expect(received?.amount).toBe(9n);
      expect((await storage.listTxLog('alice')).map((e) => e.direction).sort()).toEqual(['received', 'sent']);
    });

    it('updates the status of an existing entry', async () => {
      await storage.commit('alice', { upsertTxLog: [entry()] });
      await storage.commit('alice', { upsertTxLog: [entry({ status: 'cancelled' })] });
      expect((await storage.getTxLogEntry('alice', 'slate-1', 'sent'))?.status).toBe('cancelled');
    });

    it('returns null for an unknown slate', async () => {
      expect(await storage.getTxLogEntry('alice', 'missing', 'sent')).toBeNull();
    });

    it('lists entries oldest first', async () => {
      await storage.commit('alice', {
        upsertTxLog: [entry({ slateId: 'b', createdAt: 2 }), entry({ slateId: 'a', createdAt: 3 })],
      });
      expect((await storage.listTxLog('alice')).map((e) => e.slateId)).toEqual(['b', 'a']);
    });
  });

  describe('seen nonces', () => {
    it('remembers nonces per wallet', async () => {
      await storage.commit('alice', { seenNonces: ['dd'] });
      await storage.createWallet('bob', encryptWalletSeed(generateWalletSeed(), PASS));
      expect(await storage.hasSeenNonce('alice', 'dd')).toBe(true);
      expect(await storage.hasSeenNonce('alice', 'ee')).toBe(false);
      expect(await storage.hasSeenNonce('bob', 'dd')).toBe(false);
    });

    it('ignores a nonce recorded twice', async () => {
      await storage.commit('alice', { seenNonces: ['dd'] });
      await expect(storage.commit('alice', { seenNonces: ['dd'] })).resolves.toBeUndefined();
    });
  });

  describe('lifecycle', () => {
    it('rejects every call after close()', async () => {
      storage.close();
      expect(storage.isClosed).toBe(true);
      await expect(storage.listOutputs('alice')).rejects.toThrow('wallet database is closed');
    });

    it('close() is idempotent', () => {
      storage.close();
      expect(() => storage.close()).not.toThrow();
    });
  });
});
