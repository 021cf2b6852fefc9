import { describe, it, expect } from 'vitest';
import {
  classifyOutput,
  coinbaseMaturity,
  confirmations,
  summarize,
} from '../../../src/wallet/summary.js';
import type { OutputData, WalletCoin } from '../../../src/wallet/types.js';

const maturity = coinbaseMaturity(1440);

function output(overrides: Partial<OutputData>): OutputData {
  return {
    keyPath: 'm/0/0',
    commitment: '00'.repeat(32),
    amount: 1n,
    status: 'unspent',
    features: 'plain',
    blockHeight: 50,
    slateId: null,
    lockedAt: null,
    ...overrides,
  };
}

describe('confirmations()', () => {
  it('counts the block the output was mined in', () => {
    expect(confirmations(output({ blockHeight: 100 }), 100)).toBe(1);
    expect(confirmations(output({ blockHeight: 50 }), 100)).toBe(51);
  });

  it('is zero off chain or above the tip', () => {
    expect(confirmations(output({ blockHeight: null }), 100)).toBe(0);
    expect(confirmations(output({ blockHeight: 100 }), 90)).toBe(0);
  });
});

describe('coinbaseMaturity()', () => {
  it('matures coinbase outputs after the configured number of blocks', () => {
    const cb = output({ features: 'coinbase', blockHeight: 50 });
    expect(maturity.isMature(cb, 1489)).toBe(false);
    expect(maturity.isMature(cb, 1490)).toBe(true);
  });

  it('treats plain outputs as always mature', () => {
    expect(maturity.isMature(output({ blockHeight: 99 }), 100)).toBe(true);
  });
});

describe('classifyOutput()', () => {
  it('puts each status in its bucket', () => {
    expect(classifyOutput(output({}), 100, 10, maturity)).toBe('spendable');
    expect(classifyOutput(output({ blockHeight: 95 }), 100, 10, maturity)).toBe('awaitingConfirmation');
    expect(classifyOutput(output({ status: 'unconfirmed', blockHeight: null }), 100, 10, maturity)).toBe('awaitingConfirmation');
    expect(classifyOutput(output({ status: 'locked' }), 100, 10, maturity)).toBe('locked');
    expect(classifyOutput(output({ features: 'coinbase' }), 100, 10, maturity)).toBe('immature');
    expect(classifyOutput(output({ status: 'spent' }), 100, 10, maturity)).toBeNull();
  });
});

describe('summarize()', () => {
  it('sums each bucket and excludes spent outputs from the total', () => {
    const coins: WalletCoin[] = [
      output({ amount: 10n }),
      output({ amount: 20n, blockHeight: 95 }),
      output({ amount: 4n, status: 'unconfirmed', blockHeight: null }),
      output({ amount: 30n, status: 'locked' }),
      output({ amount: 60n, features: 'coinbase' }),
      output({ amount: 5n, status: 'spent' }),
    ].map((o) => ({ output: o, blind: 1n }));

    expect(summarize(coins, 100, 10, maturity)).toEqual({
      lastConfirmedHeight: 100,
      minimumConfirmations: 10,
      total: 124n,
      awaitingConfirmation: 24n,
      immature: 60n,
      locked: 30n,
      spendable: 10n,
    });
  });

  it('returns zeros for an empty wallet', () => {
    const s = summarize([], 7, 1, maturity);
    expect(s.total).toBe(0n);
    expect(s.lastConfirmedHeight).toBe(7);
  });
});
