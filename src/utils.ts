import { WalletError } from './wallet/types.js';

/** Base units per coin. */
export const BASE_UNITS_PER_COIN = 1_000_000_000n;
const DECIMALS = 9;

/** Parses a decimal coin amount ("1.5") into base units. */
export function parseAmount(str: string): bigint {
  const match = /^(\d+)(?:\.(\d{1,9}))?$/.exec(str.trim());
  if (!match) {
    throw new WalletError('INVALID_ARGUMENT', `Invalid amount: ${str}`);
  }
  const whole = BigInt(match[1] ?? '0');
  const frac = BigInt((match[2] ?? '').padEnd(DECIMALS, '0'));
  return whole * BASE_UNITS_PER_COIN + frac;
}

/** Base units → fixed nine-decimal coin string. */
export function formatAmount(units: bigint): string {
  const sign = units < 0n ? '-' : '';
  const abs = units < 0n ? -units : units;
  const whole = abs / BASE_UNITS_PER_COIN;
  const frac = (abs % BASE_UNITS_PER_COIN).toString().padStart(DECIMALS, '0');
  return `${sign}${whole}.${frac}`;
}
