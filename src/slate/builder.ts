/**
 * @file src/slate/builder.ts
 *
 * SlateBuilder: the three transitions of a slate.
 *
 *   buildSendSlate   sender    → created
 *   addReceiverData  receiver  created → received
 *   finalize         sender    received → Transaction
 *
 * Each transition reads and writes its own wallet through the ledger, under
 * the ledger's lock, and commits all of its local effects in one storage
 * batch. Nothing is written before every check has passed, so a rejected
 * slate leaves the wallet as it was.
 *
 * The sender's excess carries the kernel offset:
 *
 *   x_s = Σr_change − Σr_inputs − offset
 *
 * and both the sender's nonce and the offset are derived from the seed and
 * the slate id, so finalize recomputes them instead of reading them back.
 */

import * as crypto from 'node:crypto';
import {
  commit,
  commitValue,
  encodePoint,
  mod,
  mulBase,
  randomScalar,
  scalarToHex,
  sumCommitments,
} from '../crypto/primitives.js';
import { deriveBlind, deriveKernelOffset, deriveSenderNonce } from '../crypto/keychain.js';
import { aggregate, partialSign, sign, verify, verifyPartial, type Signature } from '../crypto/schnorr.js';
import { selectCoins } from '../wallet/selection.js';
import type { FeePolicy } from '../wallet/fees.js';
import type { OutputLedger } from '../wallet/ledger.js';
import type { MaturityPolicy } from '../wallet/summary.js';
import type { NodeClient } from '../node/types.js';
import type { Logger } from '../logger/logger.js';
import {
  InvalidSlateError,
  WalletError,
  type OutputData,
  type SelectionStrategy,
  type TxLogEntry,
} from '../wallet/types.js';
import { MAX_MESSAGE_LEN, parseTransaction, serializeTransaction } from './codec.js';
import { kernelMessage, participantMessageDigest, verifyTransaction } from './transaction.js';
import {
  RECEIVER,
  SENDER,
  validateSlate,
  type DecodedParticipant,
  type DecodedSlate,
} from './validate.js';
import type { ParticipantData, SignatureData, Slate, Transaction, TxOutput } from './types.js';

export interface SlateBuilderOptions {
  minConfirmations: number;
  maturity: MaturityPolicy;
}

export interface SendParams {
  amount: bigint;
  feePolicy: FeePolicy;
  strategy: SelectionStrategy;
  message?: string;
  lockHeight?: number;
}

export class SlateBuilder {
  constructor(
    private readonly node: NodeClient,
    private readonly logger: Logger,
    private readonly options: SlateBuilderOptions,
  ) {}

  // ── Sender: created ─────────────────────────────────────────────────────────

  /**
   * Selects inputs, creates the change output and the sender's public
   * contribution, and locks the inputs, all in one commit.
   *
   * @throws InsufficientFundsError when no selection covers amount + fee.
   */
  async buildSendSlate(ledger: OutputLedger, seed: Uint8Array, params: SendParams): Promise<Slate> {
    const message = params.message ?? null;
    assertMessage(message);
    const lockHeight = params.lockHeight ?? 0;
    if (!Number.isSafeInteger(lockHeight) || lockHeight < 0) {
      throw new WalletError('INVALID_ARGUMENT', 'lockHeight must be a non-negative integer.');
    }

    const height = await this.node.getChainHeight();

    return ledger.withLock(async () => {
      const expired = await ledger.expireStaleLocks();
      if (expired.length > 0) {
        this.logger.info({ expired }, 'Released stale slate locks before selection');
      }

      const spendable = await ledger.getSpendableCoins(
        seed,
        height,
        this.options.minConfirmations,
        this.options.maturity,
      );
      const selection = selectCoins(spendable, params.amount, params.feePolicy, params.strategy);

      const slateId = crypto.randomUUID();
      const now = ledger.timestamp();

      const changeOutputs: OutputData[] = [];
      let changeBlind = 0n;
      if (selection.change > 0n) {
        const keyPath = await ledger.nextKeyPath();
        changeBlind = deriveBlind(seed, keyPath);
        changeOutputs.push({
          keyPath,
          commitment: encodePoint(commit(changeBlind, selection.change)),
          amount: selection.change,
          status: 'unconfirmed',
          features: 'plain',
          blockHeight: null,
          slateId,
          lockedAt: null,
        });
      }

      const offset = deriveKernelOffset(seed, slateId);
      const inputBlinds = selection.inputs.reduce((acc, c) => acc + c.blind, 0n);
      const excess = mod(changeBlind - inputBlinds - offset);
      const nonce = deriveSenderNonce(seed, slateId);

      const sender: ParticipantData = {
        id: SENDER,
        publicBlindExcess: encodePoint(mulBase(excess)),
        publicNonce: encodePoint(mulBase(nonce)),
        partialSig: null,
        message,
        messageSig: message === null ? null : signatureToData(sign(excess, participantMessageDigest(message))),
      };

      const slate: Slate = {
        version: 1,
        id: slateId,
        phase: 'created',
        amount: params.amount,
        fee: selection.fee,
        height,
        lockHeight,
        offset: scalarToHex(offset),
        tx: {
          inputs: selection.inputs.map((c) => ({
            features: c.output.features,
            commitment: c.output.commitment,
          })),
          outputs: changeOutputs.map(toTxOutput),
        },
        participants: [sender],
      };

      const entry: TxLogEntry = {
        slateId,
        direction: 'sent',
        status: 'pending',
        amount: params.amount,
        fee: selection.fee,
        createdAt: now,
        inputCommitments: slate.tx.inputs.map((i) => i.commitment),
        outputCommitments: changeOutputs.map((o) => o.commitment),
        counterpartyNonce: null,
        transactionJson: null,
      };

      await ledger.commit({
        upsertOutputs: [
          ...selection.inputs.map(
            (c): OutputData => ({ ...c.output, status: 'locked', slateId, lockedAt: now }),
          ),
          ...changeOutputs,
        ],
        upsertTxLog: [entry],
      });

      this.logger.info(
        {
          slateId,
          amount: params.amount.toString(),
          fee: selection.fee.toString(),
          inputs: selection.inputs.length,
          change: selection.change.toString(),
        },
        'Send slate created',
      );

      return slate;
    });
  }

  // ── Receiver: received ──────────────────────────────────────────────────────

  /**
   * Adds the receiver's output and partial signature and advances the slate
   * to `received`, mutating it in place.
   *
   * Returns false, without touching the wallet or the slate, when the slate
   * is well-formed but must not be answered. Throws InvalidSlateError when
   * it is malformed.
   */
  async addReceiverData(
    ledger: OutputLedger,
    seed: Uint8Array,
    slate: Slate,
    message?: string,
  ): Promise<boolean> {
    const receiverMessage = message ?? null;
    assertMessage(receiverMessage);

    const decoded = validateSlate(slate);
    const reject = (reason: string): false => {
      this.logger.warn({ slateId: slate.id, reason }, 'Slate rejected');
      return false;
    };

    if (slate.phase !== 'created') return reject(`phase is ${slate.phase}`);

    const sender = decoded.participants[SENDER];
    const senderData = slate.participants[SENDER];
    if (sender === undefined || senderData === undefined) {
      throw new InvalidSlateError('Slate has no sender.');
    }
    if (!verifyMessage(sender)) return reject('sender message signature does not verify');

    // Σout − Σin + (amount + fee)·H must be exactly the sender's excess plus the offset
    const stated = sumCommitments(decoded.outputs, decoded.inputs).add(
      commitValue(slate.amount + slate.fee),
    );
    if (!stated.equals(sender.excess.add(mulBase(decoded.offset)))) {
      return reject('commitments do not sum to amount + fee');
    }

    const accepted = await ledger.withLock(async () => {
      if ((await ledger.getTxLogEntry(slate.id, 'received')) !== null) {
        return reject('slate id already received');
      }
      if (await ledger.hasSeenNonce(senderData.publicNonce)) {
        return reject('sender nonce already seen');
      }

      const keyPath = await ledger.nextKeyPath();
      const blind = deriveBlind(seed, keyPath);
      const output: OutputData = {
        keyPath,
        commitment: encodePoint(commit(blind, slate.amount)),
        amount: slate.amount,
        status: 'unconfirmed',
        features: 'plain',
        blockHeight: null,
        slateId: slate.id,
        lockedAt: null,
      };

      // The receiver has no inputs, so its excess is its output's blind
      const excessPoint = mulBase(blind);
      const nonce = randomScalar();
      const noncePoint = mulBase(nonce);
      const aggNonce = sender.nonce.add(noncePoint);
      const aggKey = sender.excess.add(excessPoint);
      const partial = partialSign(blind, nonce, aggNonce, aggKey, kernelMessage(slate.fee, slate.lockHeight));

      const receiver: ParticipantData = {
        id: RECEIVER,
        publicBlindExcess: encodePoint(excessPoint),
        publicNonce: encodePoint(noncePoint),
        partialSig: scalarToHex(partial),
        message: receiverMessage,
        messageSig:
          receiverMessage === null
            ? null
            : signatureToData(sign(blind, participantMessageDigest(receiverMessage))),
      };

      await ledger.commit({
        upsertOutputs: [output],
        upsertTxLog: [
          {
            slateId: slate.id,
            direction: 'received',
            status: 'pending',
            amount: slate.amount,
            fee: slate.fee,
            createdAt: ledger.timestamp(),
            inputCommitments: [],
            outputCommitments: [output.commitment],
            counterpartyNonce: senderData.publicNonce,
            transactionJson: null,
          },
        ],
        seenNonces: [senderData.publicNonce],
      });

      slate.tx.outputs.push(toTxOutput(output));
      slate.participants.push(receiver);
      slate.phase = 'received';
      return true;
    });

    if (accepted) {
      this.logger.info({ slateId: slate.id, amount: slate.amount.toString() }, 'Slate received');
    }
    return accepted;
  }

  // ── Sender: finalize ────────────────────────────────────────────────────────

  /**
   * Signs, aggregates and verifies the transaction, then marks the inputs
   * spent. Finalizing the same received slate again returns the stored
   * transaction; finalizing it with different receiver data is a replay.
   *
   * @throws InvalidSlateError on any inconsistency. Never returns an
   *   unbalanced transaction.
   */
  async finalize(ledger: OutputLedger, seed: Uint8Array, slate: Slate): Promise<Transaction> {
    const decoded = validateSlate(slate);
    if (slate.phase !== 'received') {
      throw new InvalidSlateError(`Only a received slate can be finalized; this one is ${slate.phase}.`);
    }

    return ledger.withLock(async () => {
      const entry = await ledger.getTxLogEntry(slate.id, 'sent');
      if (entry === null) {
        throw new InvalidSlateError(`Slate ${slate.id} was not sent by this wallet.`);
      }

      const receiverData = slate.participants[RECEIVER];
      if (receiverData === undefined) {
        throw new InvalidSlateError('Slate has no receiver.');
      }

      if (entry.status === 'finalized' || entry.status === 'confirmed') {
        if (entry.counterpartyNonce === receiverData.publicNonce && entry.transactionJson !== null) {
          this.logger.info({ slateId: slate.id }, 'Slate already finalized; returning stored transaction');
          return parseTransaction(entry.transactionJson);
        }
        throw new InvalidSlateError(`Slate ${slate.id} was already finalized with different receiver data.`);
      }
      if (entry.status !== 'pending') {
        throw new InvalidSlateError(`Slate ${slate.id} is ${entry.status} and cannot be finalized.`);
      }

      const tx = await this.signAndAssemble(ledger, seed, slate, decoded, entry);

      const stored = await ledger.listOutputs();
      const spentInputs = stored
        .filter((o) => entry.inputCommitments.includes(o.commitment))
        .map((o): OutputData => ({ ...o, status: 'spent' }));

      await ledger.commit({
        upsertOutputs: spentInputs,
        upsertTxLog: [
          {
            ...entry,
            status: 'finalized',
            counterpartyNonce: receiverData.publicNonce,
            transactionJson: serializeTransaction(tx),
          },
        ],
      });

      this.logger.info(
        { slateId: slate.id, amount: entry.amount.toString(), fee: entry.fee.toString() },
        'Slate finalized',
      );
      return tx;
    });
  }

  /**
   * Releases the wallet's reservations for a slate. False when nothing was open.
   *
   * @throws InvalidSlateError when this wallet already finalized the slate.
   */
  cancel(ledger: OutputLedger, slateId: string): Promise<boolean> {
    return ledger.withLock(() => ledger.releaseSlate(slateId, 'cancelled'));
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  /** Checks the slate against what this wallet recorded and produces the transaction. */
  private async signAndAssemble(
    ledger: OutputLedger,
    seed: Uint8Array,
    slate: Slate,
    decoded: DecodedSlate,
    entry: TxLogEntry,
  ): Promise<Transaction> {
    if (slate.amount !== entry.amount || slate.fee !== entry.fee) {
      throw new InvalidSlateError('Slate amount or fee differs from what was sent.');
    }

    const slateInputs = slate.tx.inputs.map((i) => i.commitment);
    if (!sameSet(slateInputs, entry.inputCommitments)) {
      throw new InvalidSlateError('Slate inputs differ from the ones this wallet locked.');
    }
    const slateOutputs = new Set(slate.tx.outputs.map((o) => o.commitment));
    if (
      slate.tx.outputs.length !== entry.outputCommitments.length + 1 ||
      !entry.outputCommitments.every((c) => slateOutputs.has(c))
    ) {
      throw new InvalidSlateError('Slate must carry this wallet\'s change and exactly one receiver output.');
    }

    const byCommitment = new Map((await ledger.listOutputs()).map((o) => [o.commitment, o]));
    const blindOf = (commitment: string, expected: OutputData['status']): bigint => {
      const output = byCommitment.get(commitment);
      if (output === undefined || output.status !== expected || output.slateId !== slate.id) {
        throw new InvalidSlateError(`Output ${commitment} is not ${expected} for this slate.`);
      }
      return deriveBlind(seed, output.keyPath);
    };
    const inputBlinds = entry.inputCommitments.reduce((acc, c) => acc + blindOf(c, 'locked'), 0n);
    const changeBlinds = entry.outputCommitments.reduce((acc, c) => acc + blindOf(c, 'unconfirmed'), 0n);

    const offset = deriveKernelOffset(seed, slate.id);
    if (decoded.offset !== offset) {
      throw new InvalidSlateError('Slate offset was altered.');
    }
    const excess = mod(changeBlinds - inputBlinds - offset);
    const nonce = deriveSenderNonce(seed, slate.id);

    const sender = decoded.participants[SENDER];
    const receiver = decoded.participants[RECEIVER];
    if (sender === undefined || receiver === undefined || receiver.partialSig === null) {
      throw new InvalidSlateError('Slate is missing a participant.');
    }
    if (!sender.excess.equals(mulBase(excess)) || !sender.nonce.equals(mulBase(nonce))) {
      throw new InvalidSlateError('Sender contribution was altered.');
    }

    const aggNonce = sender.nonce.add(receiver.nonce);
    const aggKey = sender.excess.add(receiver.excess);
    const msg = kernelMessage(slate.fee, slate.lockHeight);

    if (!verifyPartial(receiver.partialSig, receiver.nonce, receiver.excess, aggNonce, aggKey, msg)) {
      throw new InvalidSlateError('Receiver partial signature does not verify.');
    }
    if (!verifyMessage(receiver)) {
      throw new InvalidSlateError('Receiver message signature does not verify.');
    }

    const senderPartial = partialSign(excess, nonce, aggNonce, aggKey, msg);
    const signature = aggregate([senderPartial, receiver.partialSig], aggNonce);

    const tx: Transaction = {
      offset: slate.offset,
      inputs: [...slate.tx.inputs].sort(byCommitmentHex),
      outputs: [...slate.tx.outputs].sort(byCommitmentHex),
      kernel: {
        features: 'plain',
        fee: slate.fee,
        lockHeight: slate.lockHeight,
        excess: encodePoint(aggKey),
        excessSig: signatureToData(signature),
      },
    };

    verifyTransaction(tx);
    return tx;
  }
}

function verifyMessage(p: DecodedParticipant): boolean {
  if (p.message === null || p.messageSig === null) return p.message === null && p.messageSig === null;
  return verify(p.messageSig, p.excess, participantMessageDigest(p.message));
}

function assertMessage(message: string | null): void {
  if (message !== null && message.length > MAX_MESSAGE_LEN) {
    throw new WalletError('INVALID_ARGUMENT', `message must be at most ${MAX_MESSAGE_LEN} characters.`);
  }
}

function signatureToData(sig: Signature): SignatureData {
  return { nonce: encodePoint(sig.nonce), s: scalarToHex(sig.s) };
}

function toTxOutput(o: OutputData): TxOutput {
  return { features: o.features, commitment: o.commitment };
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const set = new Set(a);
  return a.length === b.length && set.size === a.length && b.every((x) => set.has(x));
}

function byCommitmentHex(a: { commitment: string }, b: { commitment: string }): number {
  return a.commitment < b.commitment ? -1 : a.commitment > b.commitment ? 1 : 0;
}
