import { describe, it, expect } from 'vitest';
import * as crypto from 'node:crypto';
import {
  commit,
  encodePoint,
  mod,
  mulBase,
  randomScalar,
  scalarToHex,
} from '../../../src/crypto/primitives.js';
import { sign } from '../../../src/crypto/schnorr.js';
import {
  kernelMessage,
  participantMessageDigest,
  transactionId,
  verifyTransaction,
} from '../../../src/slate/transaction.js';
import type { Transaction } from '../../../src/slate/types.js';
import { InvalidSlateError } from '../../../src/wallet/types.js';

/** One input of 20, one output of 19, fee 1, signed by a single party. */
function buildTransaction(): Transaction {
  const rIn = randomScalar();
  const rOut = randomScalar();
  const offset = randomScalar();
  const excess = mod(rOut - rIn - offset);
  const sig = sign(excess, kernelMessage(1n, 0));

  return {
    offset: scalarToHex(offset),
    inputs: [{ features: 'plain', commitment: encodePoint(commit(rIn, 20n)) }],
    outputs: [{ features: 'plain', commitment: encodePoint(commit(rOut, 19n)) }],
    kernel: {
      features: 'plain',
      fee: 1n,
      lockHeight: 0,
      excess: encodePoint(mulBase(excess)),
      excessSig: { nonce: encodePoint(sig.nonce), s: scalarToHex(sig.s) },
    },
  };
}

describe('kernelMessage()', () => {
  it('is a 32-byte digest that depends on fee and lock height', () => {
    const base = kernelMessage(1n, 0);
    expect(base).toHaveLength(32);
    expect(kernelMessage(1n, 0).equals(base)).toBe(true);
    expect(kernelMessage(2n, 0).equals(base)).toBe(false);
    expect(kernelMessage(1n, 5).equals(base)).toBe(false);
  });
});

describe('participantMessageDigest()', () => {
  it('hashes the UTF-8 message with SHA-512', () => {
    const expected = crypto.createHash('sha512').update('héllo', 'utf8').digest();
    expect(participantMessageDigest('héllo').equals(expected)).toBe(true);
  });
});

describe('transactionId()', () => {
  it('is the SHA-256 of the kernel excess bytes', () => {
    const tx = buildTransaction();
    const expected = crypto.createHash('sha256').update(Buffer.from(tx.kernel.excess, 'hex')).digest('hex');
    expect(transactionId(tx)).toBe(expected);
  });
});

describe('verifyTransaction()', () => {
  it('accepts a balanced, signed transaction', () => {
    expect(() => verifyTransaction(buildTransaction())).not.toThrow();
  });

  it('rejects a transaction whose fee creates value', () => {
    const tx = buildTransaction();
    tx.kernel.fee = 0n;
    expect(() => verifyTransaction(tx)).toThrow('does not balance');
  });

  it('rejects a signature over a different lock height', () => {
    const tx = buildTransaction();
    tx.kernel.lockHeight = 10;
    expect(() => verifyTransaction(tx)).toThrow('Kernel signature does not verify');
  });

  it('rejects a transaction with no outputs', () => {
    const tx = buildTransaction();
    tx.outputs = [];
    expect(() => verifyTransaction(tx)).toThrow('at least one input and one output');
  });

  it('rejects a repeated commitment', () => {
    const tx = buildTransaction();
    const [input] = tx.inputs;
    if (!input) throw new Error('missing input');
    tx.outputs.push({ ...input });
    expect(() => verifyTransaction(tx)).toThrow('repeats a commitment');
  });

  it('rejects a commitment that is not a group element', () => {
    const tx = buildTransaction();
    tx.inputs = [{ features: 'plain', commitment: 'ff'.repeat(32) }];
    expect(() => verifyTransaction(tx)).toThrow(InvalidSlateError);
  });

  it('rejects an offset that is not a reduced scalar', () => {
    const tx = buildTransaction();
    tx.offset = 'ff'.repeat(32);
    expect(() => verifyTransaction(tx)).toThrow('malformed scalar');
  });
});
