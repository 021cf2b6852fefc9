/**
 * Unit tests for src/slate/builder.ts
 *
 * Test gates:
 *  ✅ Send → receive → finalize produces a transaction that verifies
 *  ✅ Inputs are locked at send time and spent at finalize time
 *  ✅ Concurrent sends never select the same input
 *  ✅ Replayed, altered or out-of-phase slates change nothing
 *  ✅ Finalizing twice returns the same transaction; with other data, throws
 *  ✅ Cancel and lock expiry return coins to the spendable set
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SlateBuilder } from '../../../src/slate/builder.js';
import { verifyTransaction } from '../../../src/slate/transaction.js';
import type { Slate } from '../../../src/slate/types.js';
import { scalarToHex } from '../../../src/crypto/primitives.js';
import { flatFee } from '../../../src/wallet/fees.js';
import { OutputLedger } from '../../../src/wallet/ledger.js';
import { SqliteWalletStorage } from '../../../src/wallet/storage.js';
import { coinbaseMaturity } from '../../../src/wallet/summary.js';
import {
  InsufficientFundsError,
  InvalidSlateError,
  WalletError,
  type OutputData,
} from '../../../src/wallet/types.js';
import { FakeNode, createTestWallet, fundWallet, silentLogger } from '../../helpers/fixtures.js';

const SEND_15 = { amount: 15n, feePolicy: flatFee(1n), strategy: 'smallest' } as const;

describe('SlateBuilder', () => {
  let storage: SqliteWalletStorage;
  let node: FakeNode;
  let builder: SlateBuilder;
  let clock: number;
  let aliceSeed: Buffer;
  let bobSeed: Buffer;
  let alice: OutputLedger;
  let bob: OutputLedger;
  let funded: OutputData[];

  function ledgerFor(username: string): OutputLedger {
    return new OutputLedger(username, storage, silentLogger(), { lockTtlMs: 1_000, now: () => clock });
  }

  beforeEach(async () => {
    storage = new SqliteWalletStorage(':memory:');
    node = new FakeNode();
    builder = new SlateBuilder(node, silentLogger(), { minConfirmations: 10, maturity: coinbaseMaturity(1440) });
    clock = 50_000;
    aliceSeed = await createTestWallet(storage, 'alice');
    bobSeed = await createTestWallet(storage, 'bob');
    alice = ledgerFor('alice');
    bob = ledgerFor('bob');
    funded = await fundWallet(storage, 'alice', aliceSeed, [10n, 20n, 30n], { node });
  });

  afterEach(() => {
    storage.close();
  });

  function commitmentOf(amount: bigint): string {
    const o = funded.find((f) => f.amount === amount);
    if (!o) throw new Error(`no funded output of ${amount}`);
    return o.commitment;
  }

  // ── buildSendSlate ──────────────────────────────────────────────────────────

  describe('buildSendSlate()', () => {
    it('creates a slate that spends the best-fitting coin', async () => {
      const slate = await builder.buildSendSlate(alice, aliceSeed, SEND_15);

      expect(slate.phase).toBe('created');
      expect(slate.amount).toBe(15n);
      expect(slate.fee).toBe(1n);
      expect(slate.height).toBe(100);
      expect(slate.lockHeight).toBe(0);
      expect(slate.tx.inputs).toEqual([{ features: 'plain', commitment: commitmentOf(20n) }]);
      expect(slate.tx.outputs).toHaveLength(1);
      expect(slate.participants).toHaveLength(1);
      expect(slate.participants[0]?.partialSig).toBeNull();
      expect(slate.participants[0]?.message).toBeNull();
    });

    it('locks the inputs and records the change and the log entry', async () => {
      const slate = await builder.buildSendSlate(alice, aliceSeed, SEND_15);
      const outputs = await alice.listOutputs();

      const input = outputs.find((o) => o.commitment === commitmentOf(20n));
      expect(input?.status).toBe('locked');
      expect(input?.slateId).toBe(slate.id);
      expect(input?.lockedAt).toBe(50_000);

      const change = outputs.find((o) => o.commitment === slate.tx.outputs[0]?.commitment);
      expect(change?.amount).toBe(4n);
      expect(change?.status).toBe('unconfirmed');
      expect(change?.keyPath).toBe('m/0/3');

      const entry = await alice.getTxLogEntry(slate.id, 'sent');
      expect(entry).toMatchObject({ direction: 'sent', status: 'pending', amount: 15n, fee: 1n, createdAt: 50_000 });
      expect(entry?.inputCommitments).toEqual([commitmentOf(20n)]);
    });

    it('creates no change output on an exact match', async () => {
      const slate = await builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, amount: 19n });
      expect(slate.tx.outputs).toEqual([]);
      expect((await alice.getTxLogEntry(slate.id, 'sent'))?.outputCommitments).toEqual([]);
    });

    it('signs the sender message', async () => {
      const slate = await builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, message: 'for lunch' });
      expect(slate.participants[0]?.message).toBe('for lunch');
      expect(slate.participants[0]?.messageSig).not.toBeNull();
    });

    it('throws InsufficientFundsError and writes nothing', async () => {
      await expect(builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, amount: 100n })).rejects.toThrow(
        InsufficientFundsError,
      );
      expect(await alice.listTxLog()).toEqual([]);
      expect((await alice.listOutputs()).every((o) => o.status === 'unspent')).toBe(true);
    });

    it('never spends an immature coinbase output', async () => {
      const cbSeed = await createTestWallet(storage, 'miner');
      await fundWallet(storage, 'miner', cbSeed, [100n], { features: 'coinbase' });
      await expect(builder.buildSendSlate(ledgerFor('miner'), cbSeed, SEND_15)).rejects.toThrow(
        InsufficientFundsError,
      );
    });

    it('rejects an oversized message and a negative lock height', async () => {
      await expect(
        builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, message: 'x'.repeat(1025) }),
      ).rejects.toThrow(WalletError);
      await expect(builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, lockHeight: -1 })).rejects.toThrow(
        'lockHeight must be a non-negative integer',
      );
    });

    it('CONCURRENCY: parallel sends take disjoint inputs', async () => {
      const results = await Promise.allSettled([
        builder.buildSendSlate(alice, aliceSeed, SEND_15),
        builder.buildSendSlate(alice, aliceSeed, SEND_15),
        builder.buildSendSlate(alice, aliceSeed, SEND_15),
      ]);

      const [first, second, third] = results;
      expect(first?.status).toBe('fulfilled');
      expect(second?.status).toBe('fulfilled');
      expect(third?.status).toBe('rejected');

      if (first?.status === 'fulfilled' && second?.status === 'fulfilled') {
        expect(first.value.tx.inputs.map((i) => i.commitment)).toEqual([commitmentOf(20n)]);
        expect(second.value.tx.inputs.map((i) => i.commitment)).toEqual([commitmentOf(30n)]);
      }
      if (third?.status === 'rejected') {
        expect(third.reason).toBeInstanceOf(InsufficientFundsError);
      }
    });

    it('releases locks older than the TTL before selecting', async () => {
      const stale = await builder.buildSendSlate(alice, aliceSeed, SEND_15);
      clock += 1_000;

      const fresh = await builder.buildSendSlate(alice, aliceSeed, SEND_15);

      expect(fresh.tx.inputs).toEqual(stale.tx.inputs);
      expect((await alice.getTxLogEntry(stale.id, 'sent'))?.status).toBe('expired');
    });
  });

  // ── addReceiverData ─────────────────────────────────────────────────────────

  describe('addReceiverData()', () => {
    let created: Slate;

    beforeEach(async () => {
      created = await builder.buildSendSlate(alice, aliceSeed, SEND_15);
    });

    it('adds the receiver output and signature', async () => {
      const slate = structuredClone(created);
      expect(await builder.addReceiverData(bob, bobSeed, slate)).toBe(true);

      expect(slate.phase).toBe('received');
      expect(slate.tx.outputs).toHaveLength(2);
      expect(slate.participants).toHaveLength(2);
      expect(slate.participants[1]?.id).toBe(1);
      expect(slate.participants[1]?.partialSig).not.toBeNull();

      const [output] = await bob.listOutputs();
      expect(output).toMatchObject({ amount: 15n, status: 'unconfirmed', slateId: created.id, keyPath: 'm/0/0' });
      expect(slate.tx.outputs[1]?.commitment).toBe(output?.commitment);

      const entry = await bob.getTxLogEntry(created.id, 'received');
      expect(entry?.status).toBe('pending');
      expect(entry?.counterpartyNonce).toBe(created.participants[0]?.publicNonce);
      expect(await bob.hasSeenNonce(created.participants[0]?.publicNonce ?? '')).toBe(true);
    });

    it('REPLAY: refuses the same slate a second time', async () => {
      await builder.addReceiverData(bob, bobSeed, structuredClone(created));
      const again = structuredClone(created);

      expect(await builder.addReceiverData(bob, bobSeed, again)).toBe(false);
      expect(again).toEqual(created);
      expect(await bob.listOutputs()).toHaveLength(1);
    });

    it('REPLAY: refuses a new slate id that reuses the sender nonce', async () => {
      await builder.addReceiverData(bob, bobSeed, structuredClone(created));
      const renamed = { ...structuredClone(created), id: '1b4e28ba-2fa1-41d2-883f-0016d3cca427' };
      expect(await builder.addReceiverData(bob, bobSeed, renamed)).toBe(false);
    });

    it('refuses a slate that is not in the created phase', async () => {
      const slate = structuredClone(created);
      await builder.addReceiverData(bob, bobSeed, slate);
      expect(await builder.addReceiverData(bob, bobSeed, slate)).toBe(false);
    });

    it('refuses a slate whose amount was altered, leaving the wallet untouched', async () => {
      const altered = { ...structuredClone(created), amount: 16n };
      expect(await builder.addReceiverData(bob, bobSeed, altered)).toBe(false);
      expect(await bob.listOutputs()).toEqual([]);
      expect(await bob.listTxLog()).toEqual([]);
    });

    it('refuses a sender message that was altered after signing', async () => {
      const withMessage = await builder.buildSendSlate(alice, aliceSeed, { ...SEND_15, message: 'for lunch' });
      const sender = withMessage.participants[0];
      if (!sender) throw new Error('missing sender');

      const altered = structuredClone(withMessage);
      altered.participants = [{ ...sender, message: 'for dinner' }];
      expect(await builder.addReceiverData(bob, bobSeed, altered)).toBe(false);
      expect(await builder.addReceiverData(bob, bobSeed, structuredClone(withMessage))).toBe(true);
    });

    it('throws InvalidSlateError for a commitment that is not a group element', async () => {
      const broken = structuredClone(created);
      broken.tx.inputs = [{ features: 'plain', commitment: 'ff'.repeat(32) }];
      await expect(builder.addReceiverData(bob, bobSeed, broken)).rejects.toThrow(InvalidSlateError);
    });
  });

  // ── finalize ────────────────────────────────────────────────────────────────

  describe('finalize()', () => {
    let created: Slate;
    let received: Slate;

    beforeEach(async () => {
      created = await builder.buildSendSlate(alice, aliceSeed, SEND_15);
      received = structuredClone(created);
      await builder.addReceiverData(bob, bobSeed, received);
    });

    it('produces a balanced, signed transaction', async () => {
      const tx = await builder.finalize(alice, aliceSeed, received);

      expect(() => verifyTransaction(tx)).not.toThrow();
      expect(tx.kernel.fee).toBe(1n);
      expect(tx.kernel.lockHeight).toBe(0);
      expect(tx.offset).toBe(created.offset);
      expect(tx.inputs).toEqual([{ features: 'plain', commitment: commitmentOf(20n) }]);
      expect(tx.outputs).toHaveLength(2);
      const sorted = [...tx.outputs].sort((a, b) => (a.commitment < b.commitment ? -1 : 1));
      expect(tx.outputs).toEqual(sorted);
    });

    it('marks the inputs spent and the entry finalized', async () => {
      await builder.finalize(alice, aliceSeed, received);

      const input = (await alice.listOutputs()).find((o) => o.commitment === commitmentOf(20n));
      expect(input?.status).toBe('spent');
      const entry = await alice.getTxLogEntry(created.id, 'sent');
      expect(entry?.status).toBe('finalized');
      expect(entry?.counterpartyNonce).toBe(received.participants[1]?.publicNonce);
      expect(entry?.transactionJson).not.toBeNull();
    });

    it('returns the stored transaction when finalized again', async () => {
      const first = await builder.finalize(alice, aliceSeed, received);
      const second = await builder.finalize(alice, aliceSeed, structuredClone(received));
      expect(second).toEqual(first);
    });

    it('REPLAY: throws when finalized again with another receiver\'s data', async () => {
      const carolSeed = await createTestWallet(storage, 'carol');
      const fromCarol = structuredClone(created);
      expect(await builder.addReceiverData(ledgerFor('carol'), carolSeed, fromCarol)).toBe(true);

      await builder.finalize(alice, aliceSeed, received);
      await expect(builder.finalize(alice, aliceSeed, fromCarol)).rejects.toThrow('different receiver data');
    });

    it('carries the receiver message through', async () => {
      const slate = structuredClone(await builder.buildSendSlate(alice, aliceSeed, SEND_15));
      await builder.addReceiverData(bob, bobSeed, slate, 'thanks');
      expect(slate.participants[1]?.message).toBe('thanks');
      await expect(builder.finalize(alice, aliceSeed, slate)).resolves.toBeDefined();
    });

    it('refuses a slate that has not been received', async () => {
      await expect(builder.finalize(alice, aliceSeed, created)).rejects.toThrow('Only a received slate');
    });

    it('refuses a slate this wallet did not send', async () => {
      await expect(builder.finalize(bob, bobSeed, received)).rejects.toThrow('was not sent by this wallet');
    });

    it('refuses a bad receiver signature and leaves the slate pending', async () => {
      const forged = structuredClone(received);
      const receiver = forged.participants[1];
      if (!receiver) throw new Error('missing receiver');
      forged.participants[1] = { ...receiver, partialSig: scalarToHex(1n) };

      await expect(builder.finalize(alice, aliceSeed, forged)).rejects.toThrow(
        'Receiver partial signature does not verify',
      );
      expect((await alice.getTxLogEntry(created.id, 'sent'))?.status).toBe('pending');
    });

    it('refuses a slate whose offset was altered', async () => {
      const altered = { ...structuredClone(received), offset: scalarToHex(7n) };
      await expect(builder.finalize(alice, aliceSeed, altered)).rejects.toThrow('offset was altered');
    });

    it('refuses a slate whose fee was altered', async () => {
      const altered = { ...structuredClone(received), fee: 2n };
      await expect(builder.finalize(alice, aliceSeed, altered)).rejects.toThrow('amount or fee differs');
    });

    it('refuses a cancelled slate', async () => {
      await builder.cancel(alice, created.id);
      await expect(builder.finalize(alice, aliceSeed, received)).rejects.toThrow('is cancelled');
    });
  });

  // ── cancel ──────────────────────────────────────────────────────────────────

  describe('cancel()', () => {
    it('returns locked coins to the spendable set', async () => {
      const slate = await builder.buildSendSlate(alice, aliceSeed, SEND_15);
      expect(await builder.cancel(alice, slate.id)).toBe(true);

      const outputs = await alice.listOutputs();
      expect(outputs.map((o) => o.status)).toEqual(['unspent', 'unspent', 'unspent']);
      expect(await builder.cancel(alice, slate.id)).toBe(false);
    });

    it('refuses a finalized slate, so the mined transaction settles the balance', async () => {
      const slate = structuredClone(await builder.buildSendSlate(alice, aliceSeed, SEND_15));
      await builder.addReceiverData(bob, bobSeed, slate);
      const tx = await builder.finalize(alice, aliceSeed, slate);

      await expect(builder.cancel(alice, slate.id)).rejects.toThrow(InvalidSlateError);

      node.mine(tx);
      node.height = 200;
      await alice.refreshFromChain(node, coinbaseMaturity(1440));

      const outputs = await alice.listOutputs();
      expect(outputs.map((o) => o.amount)).toEqual([10n, 30n, 4n]);
      expect(outputs.map((o) => o.status)).toEqual(['unspent', 'unspent', 'unspent']);
      expect((await alice.getTxLogEntry(slate.id, 'sent'))?.status).toBe('confirmed');
    });

    it('drops the receiver\'s pending output', async () => {
      const slate = structuredClone(await builder.buildSendSlate(alice, aliceSeed, SEND_15));
      await builder.addReceiverData(bob, bobSeed, slate);

      expect(await builder.cancel(bob, slate.id)).toBe(true);
      expect(await bob.listOutputs()).toEqual([]);
      expect((await bob.getTxLogEntry(slate.id, 'received'))?.status).toBe('cancelled');
    });
  });
});
