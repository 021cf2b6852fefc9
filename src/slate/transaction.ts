/**
 * @file src/slate/transaction.ts
 *
 * Transaction verification. A transaction is valid when
 *
 *   Σoutputs + fee·H − Σinputs = excess + offset·G
 *
 * and the kernel signature verifies under `excess`. The first equation holds
 * only if no value was created: every H term cancels and what remains is a
 * pure multiple of G that the signers proved they know.
 */

import * as crypto from 'node:crypto';
import {
  commitValue,
  decodePoint,
  mulBase,
  scalarFromHex,
  sumCommitments,
  type Point,
} from '../crypto/primitives.js';
import { verify } from '../crypto/schnorr.js';
import { CryptoError, InvalidSlateError } from '../wallet/types.js';
import type { Transaction } from './types.js';

/** The message both parties sign: kernel features, fee and lock height. */
export function kernelMessage(fee: bigint, lockHeight: number): Buffer {
  const buf = Buffer.alloc(1 + 8 + 8);
  buf.writeUInt8(0, 0); // plain kernel
  buf.writeBigUInt64BE(fee, 1);
  buf.writeBigUInt64BE(BigInt(lockHeight), 9);
  return crypto.createHash('sha256').update(buf).digest();
}

/** Digest signed by a participant's message signature. */
export function participantMessageDigest(message: string): Buffer {
  return crypto.createHash('sha512').update(message, 'utf8').digest();
}

/** Stable identifier: SHA-256 of the kernel excess. */
export function transactionId(tx: Transaction): string {
  return crypto.createHash('sha256').update(Buffer.from(tx.kernel.excess, 'hex')).digest('hex');
}

/**
 * Throws InvalidSlateError unless the transaction balances and its kernel
 * signature verifies. Never returns for an unbalanced transaction.
 */
export function verifyTransaction(tx: Transaction): void {
  if (tx.inputs.length === 0 || tx.outputs.length === 0) {
    throw new InvalidSlateError('Transaction must have at least one input and one output.');
  }

  const inputCommitments = tx.inputs.map((i) => i.commitment);
  const outputCommitments = tx.outputs.map((o) => o.commitment);
  const all = [...inputCommitments, ...outputCommitments];
  if (new Set(all).size !== all.length) {
    throw new InvalidSlateError('Transaction repeats a commitment.');
  }

  const inputs = inputCommitments.map((c) => decode(c, 'input'));
  const outputs = outputCommitments.map((c) => decode(c, 'output'));
  const excess = decode(tx.kernel.excess, 'kernel excess');
  const sigNonce = decode(tx.kernel.excessSig.nonce, 'kernel signature nonce');

  let offset: bigint;
  let s: bigint;
  try {
    offset = scalarFromHex(tx.offset);
    s = scalarFromHex(tx.kernel.excessSig.s);
  } catch (err) {
    throw new InvalidSlateError('Transaction carries a malformed scalar.', err);
  }

  const balance = sumCommitments(outputs, inputs).add(commitValue(tx.kernel.fee));
  if (!balance.equals(excess.add(mulBase(offset)))) {
    throw new InvalidSlateError('Transaction does not balance: outputs + fee ≠ inputs.');
  }

  const msg = kernelMessage(tx.kernel.fee, tx.kernel.lockHeight);
  if (!verify({ nonce: sigNonce, s }, excess, msg)) {
    throw new InvalidSlateError('Kernel signature does not verify.');
  }
}

function decode(hex: string, what: string): Point {
  try {
    return decodePoint(hex);
  } catch (err) {
    if (err instanceof CryptoError) {
      throw new InvalidSlateError(`Transaction ${what} is not a valid commitment.`, err);
    }
    throw err;
  }
}
