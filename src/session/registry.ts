/**
 * @file src/session/registry.ts
 *
 * SessionRegistry: maps opaque session tokens to a decrypted seed and the
 * user's OutputLedger.
 *
 * Token lifecycle: issued by login → active → logged out (terminal).
 * An active token that sits idle longer than `sessionTtlMs` is treated as
 * logged out on its next use.
 *
 * CONCURRENCY: every read and write of the token map happens between two
 * awaits, so it is atomic on the event loop. Lookups for different tokens
 * never wait on each other; only the per-user ledger lock serialises work.
 *
 * SECURITY: The held seed is the only cleartext copy that outlives a call.
 * getSeed() hands out a copy; logout() zero-fills the original.
 */

import * as crypto from 'node:crypto';
import { default as bs58 } from 'bs58';
import { createDecoySeed, decryptWalletSeed } from '../keychain/seed-vault.js';
import { OutputLedger } from '../wallet/ledger.js';
import { createWalletLogger, type Logger } from '../logger/logger.js';
import type { WalletStorage } from '../wallet/storage.js';
import { AuthenticationError, InvalidSessionError, type EncryptedSeed } from '../wallet/types.js';

const TOKEN_BYTES = 32;

export interface SessionRegistryOptions {
  /** Idle time after which a token stops working. */
  sessionTtlMs: number;
  /** Passed to every ledger the registry opens. */
  lockTtlMs: number;
  now?: () => number;
}

interface Session {
  readonly username: string;
  readonly seed: Buffer;
  lastUsedAt: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly ledgers = new Map<string, OutputLedger>();
  private readonly now: () => number;
  private decoy: EncryptedSeed | undefined;

  constructor(
    private readonly storage: WalletStorage,
    private readonly logger: Logger,
    private readonly options: SessionRegistryOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Decrypts the user's seed and opens a session.
   *
   * @throws AuthenticationError for a wrong passphrase or an unknown user.
   *   Both paths run the same key derivation.
   */
  async login(username: string, passphrase: string): Promise<string> {
    const stored = await this.storage.loadEncryptedSeed(username);

    let seed: Buffer;
    try {
      seed = decryptWalletSeed(stored ?? this.decoySeed(), passphrase);
    } catch (err) {
      this.logger.warn({ username }, 'Login failed');
      throw err instanceof AuthenticationError ? err : new AuthenticationError(err);
    }
    if (stored === null) {
      seed.fill(0);
      this.logger.warn({ username }, 'Login failed');
      throw new AuthenticationError();
    }

    return this.open(username, seed);
  }

  /** Opens a session for a seed the caller already holds, e.g. right after creation. */
  loginWithSeed(username: string, seed: Uint8Array): string {
    return this.open(username, Buffer.from(seed));
  }

  /** Idempotent. Unknown tokens are ignored. */
  logout(token: string): void {
    const session = this.sessions.get(token);
    if (!session) return;
    this.sessions.delete(token);
    session.seed.fill(0);
    this.logger.info({ username: session.username }, 'Session closed');
  }

  /**
   * A copy of the session's seed. The caller zero-fills it when done and
   * must not keep it.
   *
   * @throws InvalidSessionError
   */
  getSeed(token: string): Buffer {
    return Buffer.from(this.resolve(token).seed);
  }

  /** @throws InvalidSessionError */
  getWallet(token: string): OutputLedger {
    const session = this.resolve(token);
    const ledger = this.ledgers.get(session.username);
    if (!ledger) {
      throw new InvalidSessionError();
    }
    return ledger;
  }

  /** @throws InvalidSessionError */
  getUsername(token: string): string {
    return this.resolve(token).username;
  }

  /** The token's owner, or null. Does not refresh the idle timer. */
  peekUsername(token: string): string | null {
    return this.sessions.get(token)?.username ?? null;
  }

  activeSessions(): number {
    return this.sessions.size;
  }

  /** Logs every session out. */
  clear(): void {
    for (const token of [...this.sessions.keys()]) {
      this.logout(token);
    }
    this.ledgers.clear();
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private open(username: string, seed: Buffer): string {
    const token = bs58.encode(crypto.randomBytes(TOKEN_BYTES));
    this.sessions.set(token, { username, seed, lastUsedAt: this.now() });

    if (!this.ledgers.has(username)) {
      this.ledgers.set(
        username,
        new OutputLedger(username, this.storage, createWalletLogger(this.logger, username), {
          lockTtlMs: this.options.lockTtlMs,
          now: this.now,
        }),
      );
    }

    this.logger.info({ username, activeSessions: this.sessions.size }, 'Session opened');
    return token;
  }

  private resolve(token: string): Session {
    const session = this.sessions.get(token);
    if (!session) {
      throw new InvalidSessionError();
    }
    const now = this.now();
    if (now - session.lastUsedAt > this.options.sessionTtlMs) {
      this.logout(token);
      throw new InvalidSessionError();
    }
    session.lastUsedAt = now;
    return session;
  }

  private decoySeed(): EncryptedSeed {
    this.decoy ??= createDecoySeed();
    return this.decoy;
  }

  toJSON(): string {
    return `SessionRegistry(${this.sessions.size} active)`;
  }
}
