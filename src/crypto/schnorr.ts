/**
 * @file src/crypto/schnorr.ts
 *
 * Two-party Schnorr signatures with an aggregate nonce and key.
 *
 *   e  = H(R ‖ X ‖ m)         R = ΣRᵢ, X = ΣXᵢ
 *   sᵢ = kᵢ + e·xᵢ            verified as sᵢ·G = Rᵢ + e·Xᵢ
 *   s  = Σsᵢ                  verified as s·G  = R  + e·X
 *
 * Every participant must know both public nonces before signing, so the
 * party that commits first signs last.
 */

import {
  hashToScalar,
  mod,
  mul,
  mulBase,
  randomScalar,
  type Point,
} from './primitives.js';

export interface Signature {
  nonce: Point;
  s: bigint;
}

export function challenge(aggNonce: Point, aggKey: Point, msg: Uint8Array): bigint {
  return hashToScalar(aggNonce.toRawBytes(), aggKey.toRawBytes(), msg);
}

export function partialSign(
  secretKey: bigint,
  secretNonce: bigint,
  aggNonce: Point,
  aggKey: Point,
  msg: Uint8Array,
): bigint {
  const e = challenge(aggNonce, aggKey, msg);
  return mod(secretNonce + e * secretKey);
}

export function verifyPartial(
  partial: bigint,
  publicNonce: Point,
  publicKey: Point,
  aggNonce: Point,
  aggKey: Point,
  msg: Uint8Array,
): boolean {
  const e = challenge(aggNonce, aggKey, msg);
  return mulBase(partial).equals(publicNonce.add(mul(publicKey, e)));
}

export function aggregate(partials: readonly bigint[], aggNonce: Point): Signature {
  return { nonce: aggNonce, s: mod(partials.reduce((acc, s) => acc + s, 0n)) };
}

export function verify(sig: Signature, publicKey: Point, msg: Uint8Array): boolean {
  const e = challenge(sig.nonce, publicKey, msg);
  return mulBase(sig.s).equals(sig.nonce.add(mul(publicKey, e)));
}

/** Single-signer signature with a fresh random nonce. */
export function sign(secretKey: bigint, msg: Uint8Array): Signature {
  const k = randomScalar();
  const nonce = mulBase(k);
  const publicKey = mulBase(secretKey);
  return { nonce, s: partialSign(secretKey, k, nonce, publicKey, msg) };
}
