/**
 * @file src/crypto/keychain.ts
 *
 * Every secret scalar the wallet uses is derived from the seed on demand:
 *
 *   blind(path)     = HMAC-SHA512(seed, "blind:" ‖ path)     mod L
 *   nonce(slateId)  = HMAC-SHA512(seed, "nonce:" ‖ slateId)  mod L
 *   offset(slateId) = HMAC-SHA512(seed, "offset:" ‖ slateId) mod L
 *
 * Only key paths and slate ids are persisted. Losing the database loses
 * bookkeeping, never keys.
 */

import * as crypto from 'node:crypto';
import { scalarFromBytes } from './primitives.js';
import { CryptoError } from '../wallet/types.js';

export const SEED_LEN = 32;

export function keyPathFor(index: number): string {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new CryptoError(`Invalid key index ${index}.`);
  }
  return `m/0/${index}`;
}

export function deriveBlind(seed: Uint8Array, keyPath: string): bigint {
  return derive(seed, `blind:${keyPath}`);
}

/**
 * The sender's signing nonce for a slate. Deterministic so that finalize
 * can recompute it without persisting it; the slate log guarantees it is
 * only ever used against one receiver nonce.
 */
export function deriveSenderNonce(seed: Uint8Array, slateId: string): bigint {
  return derive(seed, `nonce:${slateId}`);
}

/** Kernel offset the sender subtracts from its excess. Public once sent. */
export function deriveKernelOffset(seed: Uint8Array, slateId: string): bigint {
  return derive(seed, `offset:${slateId}`);
}

function derive(seed: Uint8Array, label: string): bigint {
  if (seed.length !== SEED_LEN) {
    throw new CryptoError(`Seed has length ${seed.length}. Expected ${SEED_LEN} bytes.`);
  }
  const digest = crypto.createHmac('sha512', seed).update(label, 'utf8').digest();
  const scalar = scalarFromBytes(digest);
  digest.fill(0);
  if (scalar === 0n) {
    throw new CryptoError('Derived a zero scalar.');
  }
  return scalar;
}
