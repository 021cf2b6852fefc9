/**
 * @file src/keychain/seed-vault.ts
 *
 * Handles the ONLY moment the wallet seed is turned into something durable.
 *
 * Security properties:
 *  - AES-256-GCM encryption with a fresh nonce per encryption (no nonce reuse)
 *  - GCM auth tag authenticates the ciphertext, so tampering is detected
 *  - scrypt KDF, parameters stored alongside the ciphertext
 *  - Derived key and plaintext buffers are zeroed immediately after use
 *  - Every decryption failure raises the same AuthenticationError
 *
 * ⚠️  This file must be reviewed line-by-line before any production deployment.
 */

import * as crypto from 'node:crypto';
import { SEED_LEN } from '../crypto/keychain.js';
import {
  AuthenticationError,
  CryptoError,
  WalletError,
  type EncryptedSeed,
} from '../wallet/types.js';

// ── KDF Constants ─────────────────────────────────────────────────────────────

/**
 * Production scrypt parameters.
 * N=16384 ≈ 100ms on a modern laptop. Increase N for more resistance.
 * Test environments can override via TEST_KDF_N env var for speed.
 */
const KDF_PARAMS = {
  N: 16384,
  r: 8,
  p: 1,
} as const;

const KEY_LEN = 32; // AES-256 key = 32 bytes
const NONCE_LEN = 12; // GCM nonce = 12 bytes
const SALT_LEN = 32; // scrypt salt = 32 bytes
const AUTH_TAG_LEN = 16; // GCM auth tag = 16 bytes
const MIN_PASSPHRASE_LEN = 8;

// Upper bound on a stored N so a crafted record cannot pin the CPU
const MAX_KDF_N = 1 << 20;

function costN(): number {
  const override = process.env['TEST_KDF_N'];
  return override ? parseInt(override, 10) : KDF_PARAMS.N;
}

// ── Key Derivation ────────────────────────────────────────────────────────────

/**
 * Derives a 32-byte AES key from a passphrase + salt using scrypt.
 * The returned Buffer is the only copy of the derived key in memory.
 */
function deriveKey(passphrase: string, salt: Buffer, params: EncryptedSeed['kdfParams']): Buffer {
  return crypto.scryptSync(passphrase, salt, KEY_LEN, {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 256 * params.N * params.r + 1024 * 1024,
  });
}

/**
 * Securely zeroes a Buffer's contents.
 * Called immediately after we're done with plaintext key material.
 */
function zeroBuffer(buf: Buffer): void {
  buf.fill(0);
}

// ── Public API ────────────────────────────────────────────────────────────────

/** Returns 32 bytes of fresh seed entropy. */
export function generateWalletSeed(): Buffer {
  return crypto.randomBytes(SEED_LEN);
}

/**
 * Encrypts a wallet seed under a passphrase.
 *
 * @returns The EncryptedSeed record, safe to persist.
 */
export function encryptWalletSeed(seed: Uint8Array, passphrase: string): EncryptedSeed {
  if (passphrase.length < MIN_PASSPHRASE_LEN) {
    throw new WalletError(
      'INVALID_ARGUMENT',
      `Passphrase must be at least ${MIN_PASSPHRASE_LEN} characters.`,
    );
  }
  if (seed.length !== SEED_LEN) {
    throw new WalletError('INVALID_ARGUMENT', `Seed must be ${SEED_LEN} bytes.`);
  }

  const kdfParams = { N: costN(), r: KDF_PARAMS.r, p: KDF_PARAMS.p };
  const salt = crypto.randomBytes(SALT_LEN);
  const nonce = crypto.randomBytes(NONCE_LEN);

  let derivedKey: Buffer;
  try {
    derivedKey = deriveKey(passphrase, salt, kdfParams);
  } catch (err) {
    throw new CryptoError('Key derivation failed.', err);
  }

  const plaintext = Buffer.from(seed);
  try {
    const cipher = crypto.createCipheriv('aes-256-gcm', derivedKey, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return {
      version: 1,
      ciphertext: ciphertext.toString('hex'),
      nonce: nonce.toString('hex'),
      authTag: authTag.toString('hex'),
      salt: salt.toString('hex'),
      algorithm: 'aes-256-gcm',
      kdf: 'scrypt',
      kdfParams,
    };
  } catch (err) {
    throw new CryptoError('Seed encryption failed.', err);
  } finally {
    zeroBuffer(plaintext);
    zeroBuffer(derivedKey);
  }
}

/**
 * Decrypts an EncryptedSeed. Throws AuthenticationError if the passphrase
 * is wrong, the record has been tampered with, or it is malformed; all
 * with the same message, so callers cannot tell the cases apart.
 *
 * @returns The 32-byte seed. The caller owns the buffer and should zero it.
 */
export function decryptWalletSeed(encrypted: EncryptedSeed, passphrase: string): Buffer {
  const salt = Buffer.from(encrypted.salt, 'hex');
  const nonce = Buffer.from(encrypted.nonce, 'hex');
  const authTag = Buffer.from(encrypted.authTag, 'hex');
  const ciphertext = Buffer.from(encrypted.ciphertext, 'hex');
  const { N, r, p } = encrypted.kdfParams;

  const wellFormed =
    encrypted.version === 1 &&
    salt.length === SALT_LEN &&
    nonce.length === NONCE_LEN &&
    authTag.length === AUTH_TAG_LEN &&
    ciphertext.length === SEED_LEN &&
    Number.isInteger(N) && N > 1 && N <= MAX_KDF_N && (N & (N - 1)) === 0 &&
    Number.isInteger(r) && r > 0 && r <= 32 &&
    Number.isInteger(p) && p > 0 && p <= 16;

  if (!wellFormed) {
    throw new AuthenticationError();
  }

  let derivedKey: Buffer;
  try {
    derivedKey = deriveKey(passphrase, salt, { N, r, p });
  } catch (err) {
    throw new AuthenticationError(err);
  }

  try {
    const decipher = crypto.createDecipheriv('aes-256-gcm', derivedKey, nonce);
    decipher.setAuthTag(authTag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    // Wrong passphrase and tampered ciphertext fail the same GCM tag check
    throw new AuthenticationError(err);
  } finally {
    zeroBuffer(derivedKey);
  }
}

/**
 * An EncryptedSeed nobody can open. Login decrypts it for unknown users so
 * that "no such user" costs the same KDF work as "wrong passphrase".
 */
export function createDecoySeed(): EncryptedSeed {
  return {
    version: 1,
    ciphertext: crypto.randomBytes(SEED_LEN).toString('hex'),
    nonce: crypto.randomBytes(NONCE_LEN).toString('hex'),
    authTag: crypto.randomBytes(AUTH_TAG_LEN).toString('hex'),
    salt: crypto.randomBytes(SALT_LEN).toString('hex'),
    algorithm: 'aes-256-gcm',
    kdf: 'scrypt',
    kdfParams: { N: costN(), r: KDF_PARAMS.r, p: KDF_PARAMS.p },
  };
}
