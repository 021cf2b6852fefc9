/**
 * @file src/wallet/fees.ts
 * Fee policies. A policy turns a transaction shape into a total fee.
 */

import { WalletError } from './types.js';

export interface FeePolicy {
  fee(inputs: number, outputs: number, kernels: number): bigint;
}

/** feeBase × max(1, 4·outputs + kernels − inputs). */
export function weightedFee(feeBase: bigint): FeePolicy {
  assertNonNegative(feeBase, 'feeBase');
  return {
    fee(inputs, outputs, kernels) {
      const weight = Math.max(1, 4 * outputs + kernels - inputs);
      return feeBase * BigInt(weight);
    },
  };
}

/** The same fee regardless of shape. */
export function flatFee(amount: bigint): FeePolicy {
  assertNonNegative(amount, 'fee');
  return { fee: () => amount };
}

function assertNonNegative(value: bigint, name: string): void {
  if (value < 0n) {
    throw new WalletError('INVALID_ARGUMENT', `${name} must not be negative.`);
  }
}
