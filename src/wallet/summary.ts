/**
 * @file src/wallet/summary.ts
 * Balance classification. Pure functions over already-loaded coins.
 */

import type { OutputData, WalletCoin, WalletSummary } from './types.js';

export type BalanceBucket = 'spendable' | 'awaitingConfirmation' | 'immature' | 'locked';

export interface MaturityPolicy {
  isMature(output: OutputData, chainHeight: number): boolean;
}

/** Coinbase outputs mature `blocks` blocks after the one they were mined in. */
export function coinbaseMaturity(blocks: number): MaturityPolicy {
  return {
    isMature(output, chainHeight) {
      if (output.features !== 'coinbase') return true;
      if (output.blockHeight === null) return false;
      return chainHeight >= output.blockHeight + blocks;
    },
  };
}

export function confirmations(output: OutputData, chainHeight: number): number {
  if (output.blockHeight === null) return 0;
  return Math.max(0, chainHeight - output.blockHeight + 1);
}

/**
 * Puts one output in exactly one bucket. Spent outputs belong to none and
 * return null; GetAllAvailableCoins never yields them.
 */
export function classifyOutput(
  output: OutputData,
  chainHeight: number,
  minConfirmations: number,
  maturity: MaturityPolicy,
): BalanceBucket | null {
  switch (output.status) {
    case 'spent':
      return null;
    case 'locked':
      return 'locked';
    case 'unconfirmed':
      return 'awaitingConfirmation';
    case 'unspent':
    case 'immature':
      if (!maturity.isMature(output, chainHeight)) return 'immature';
      return confirmations(output, chainHeight) >= minConfirmations
        ? 'spendable'
        : 'awaitingConfirmation';
  }
}

export function summarize(
  coins: readonly WalletCoin[],
  chainHeight: number,
  minConfirmations: number,
  maturity: MaturityPolicy,
): WalletSummary {
  const summary: WalletSummary = {
    lastConfirmedHeight: chainHeight,
    minimumConfirmations: minConfirmations,
    total: 0n,
    awaitingConfirmation: 0n,
    immature: 0n,
    locked: 0n,
    spendable: 0n,
  };

  for (const { output } of coins) {
    const bucket = classifyOutput(output, chainHeight, minConfirmations, maturity);
    if (bucket === null) continue;
    summary[bucket] += output.amount;
    summary.total += output.amount;
  }

  return summary;
}
