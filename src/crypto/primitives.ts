/**
 * @file src/crypto/primitives.ts
 *
 * Pedersen commitments over ristretto255.
 *
 *   commit(r, v) = r·G + v·H
 *
 * G is the group base point. H is hashed to the group from a fixed domain
 * string, so its discrete log relative to G is unknown to everyone. The
 * commitment is homomorphic: sums of commitments commit to sums of blinds
 * and values, which is what lets a transaction prove it balances without
 * revealing any amount.
 */

import * as crypto from 'node:crypto';
import { RistrettoPoint } from '@noble/curves/ed25519';
import { CryptoError } from '../wallet/types.js';

export type Point = InstanceType<typeof RistrettoPoint>;

/** Order of the ristretto255 group. */
export const CURVE_ORDER = 2n ** 252n + 27742317777372353535851937790883648493n;

const SCALAR_LEN = 32;

export const G: Point = RistrettoPoint.BASE;
export const H: Point = RistrettoPoint.hashToCurve(sha512(Buffer.from('slate-wallet/value-generator/v1')));
export const ZERO: Point = RistrettoPoint.ZERO;

// ── Scalars ───────────────────────────────────────────────────────────────────

export function mod(a: bigint): bigint {
  const r = a % CURVE_ORDER;
  return r >= 0n ? r : r + CURVE_ORDER;
}

/** Little-endian bytes → scalar, reduced mod the group order. */
export function scalarFromBytes(bytes: Uint8Array): bigint {
  let n = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) n = (n << 8n) | BigInt(bytes[i] ?? 0);
  return mod(n);
}

export function scalarToHex(s: bigint): string {
  const out = Buffer.alloc(SCALAR_LEN);
  let n = mod(s);
  for (let i = 0; i < SCALAR_LEN; i++) {
    out[i] = Number(n & 0xffn);
    n >>= 8n;
  }
  return out.toString('hex');
}

/** Parses a canonical 32-byte little-endian scalar. */
export function scalarFromHex(hex: string): bigint {
  if (!/^[0-9a-f]{64}$/.test(hex)) {
    throw new CryptoError('Scalar must be 32 bytes of lowercase hex.');
  }
  let n = 0n;
  const bytes = Buffer.from(hex, 'hex');
  for (let i = bytes.length - 1; i >= 0; i--) n = (n << 8n) | BigInt(bytes[i] ?? 0);
  if (n >= CURVE_ORDER) {
    throw new CryptoError('Scalar is not reduced modulo the group order.');
  }
  return n;
}

export function randomScalar(): bigint {
  for (;;) {
    const s = scalarFromBytes(crypto.randomBytes(64));
    if (s !== 0n) return s;
  }
}

/** SHA-512 over the concatenated parts, reduced to a scalar. */
export function hashToScalar(...parts: Uint8Array[]): bigint {
  const h = crypto.createHash('sha512');
  for (const part of parts) h.update(part);
  return scalarFromBytes(h.digest());
}

// ── Points ────────────────────────────────────────────────────────────────────

/** s·P, accepting a zero scalar (which the curve library rejects). */
export function mul(point: Point, s: bigint): Point {
  const k = mod(s);
  return k === 0n ? ZERO : point.multiply(k);
}

export function mulBase(s: bigint): Point {
  return mul(G, s);
}

export function sumPoints(points: readonly Point[]): Point {
  return points.reduce((acc, p) => acc.add(p), ZERO);
}

export function decodePoint(hex: string): Point {
  try {
    return RistrettoPoint.fromHex(hex);
  } catch (err) {
    throw new CryptoError('Invalid group element encoding.', err);
  }
}

export function encodePoint(point: Point): string {
  return point.toHex();
}

// ── Commitments ───────────────────────────────────────────────────────────────

/** value·H. Values are non-negative base-unit amounts. */
export function commitValue(value: bigint): Point {
  if (value < 0n) {
    throw new CryptoError('Cannot commit to a negative value.');
  }
  return mul(H, value);
}

export function commit(blind: bigint, value: bigint): Point {
  return mulBase(blind).add(commitValue(value));
}

/** Σpositive − Σnegative. */
export function sumCommitments(positive: readonly Point[], negative: readonly Point[]): Point {
  return sumPoints(positive).subtract(sumPoints(negative));
}

function sha512(data: Uint8Array): Buffer {
  return crypto.createHash('sha512').update(data).digest();
}
