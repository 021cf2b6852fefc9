/**
 * @file src/wallet/selection.ts
 * Coin selection. Pure: the ledger decides which coins are spendable and
 * locks the result; this module only picks.
 */

import type { FeePolicy } from './fees.js';
import {
  InsufficientFundsError,
  WalletError,
  type SelectionStrategy,
  type WalletCoin,
} from './types.js';

/** Every send has a receiver output and a change output, under one kernel. */
const SEND_OUTPUTS = 2;
const SEND_KERNELS = 1;

export interface Selection {
  inputs: WalletCoin[];
  total: bigint;
  fee: bigint;
  /** Zero means no change output is created. */
  change: bigint;
}

export function selectCoins(
  spendable: readonly WalletCoin[],
  amount: bigint,
  feePolicy: FeePolicy,
  strategy: SelectionStrategy,
): Selection {
  if (amount <= 0n) {
    throw new WalletError('INVALID_ARGUMENT', 'amount must be greater than 0.');
  }

  const available = sum(spendable);

  if (strategy === 'all') {
    const fee = feePolicy.fee(spendable.length, SEND_OUTPUTS, SEND_KERNELS);
    if (spendable.length === 0 || available < amount + fee) {
      throw new InsufficientFundsError(amount + fee, available);
    }
    return finish([...spendable], amount, fee);
  }

  // Largest first: the k largest coins tell us whether k inputs can work at all
  const byValueDesc = [...spendable].sort(compareDesc);

  for (let k = 1; k <= byValueDesc.length; k++) {
    const fee = feePolicy.fee(k, SEND_OUTPUTS, SEND_KERNELS);
    const need = amount + fee;
    if (sum(byValueDesc.slice(0, k)) < need) continue;
    return finish(pickLeastLeftover(byValueDesc, k, need), amount, fee);
  }

  const worstFee = feePolicy.fee(Math.max(1, spendable.length), SEND_OUTPUTS, SEND_KERNELS);
  throw new InsufficientFundsError(amount + worstFee, available);
}

interface CoinPick {
  indices: number[];
  total: bigint;
}

/** The k coins whose sum reaches `need` with the least leftover, ascending. */
function pickLeastLeftover(coins: readonly WalletCoin[], k: number, need: bigint): WalletCoin[] {
  const ascending = [...coins].sort(compareAsc);
  const values = ascending.map((c) => c.output.amount);
  const best = searchPick(values, 0, k, 0n, need, null);
  // k was checked against the largest coins, so a pick always exists
  if (best === null) {
    throw new InsufficientFundsError(need, sum(coins));
  }
  return best.indices.flatMap((i) => ascending.slice(i, i + 1));
}

/**
 * Depth-first branch and bound over ascending values. Returns the pick of
 * `slots` values from `start` on whose sum is the least one reaching `need`
 * and below `bound`, or null when there is none.
 */
function searchPick(
  values: readonly bigint[],
  start: number,
  slots: number,
  total: bigint,
  need: bigint,
  bound: bigint | null,
): CoinPick | null {
  if (slots === 0) {
    return total >= need && (bound === null || total < bound) ? { indices: [], total } : null;
  }
  if (total + sumRange(values, values.length - slots, values.length) < need) return null;

  let best: CoinPick | null = null;
  for (let i = start; i <= values.length - slots; i++) {
    const limit = best?.total ?? bound;
    // Values ascend, so the cheapest completion from i only grows with i
    if (limit !== null && total + sumRange(values, i, i + slots) >= limit) break;
    const value = values[i];
    if (value === undefined) break;

    const found = searchPick(values, i + 1, slots - 1, total + value, need, limit);
    if (found !== null) {
      best = { indices: [i, ...found.indices], total: found.total };
      if (found.total === need) break;
    }
  }
  return best;
}

function sumRange(values: readonly bigint[], from: number, to: number): bigint {
  return values.slice(Math.max(0, from), to).reduce((acc, v) => acc + v, 0n);
}

function finish(inputs: WalletCoin[], amount: bigint, fee: bigint): Selection {
  const total = sum(inputs);
  return { inputs, total, fee, change: total - amount - fee };
}

function sum(coins: readonly WalletCoin[]): bigint {
  return coins.reduce((acc, c) => acc + c.output.amount, 0n);
}

function compareDesc(a: WalletCoin, b: WalletCoin): number {
  if (a.output.amount !== b.output.amount) return a.output.amount > b.output.amount ? -1 : 1;
  return a.output.keyPath.localeCompare(b.output.keyPath);
}

function compareAsc(a: WalletCoin, b: WalletCoin): number {
  if (a.output.amount !== b.output.amount) return a.output.amount < b.output.amount ? -1 : 1;
  return a.output.keyPath.localeCompare(b.output.keyPath);
}
