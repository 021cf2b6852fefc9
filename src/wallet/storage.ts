/**
 * @file src/wallet/storage.ts
 *
 * Durable wallet state: encrypted seeds, owned outputs, the slate log and
 * the set of counterparty nonces already seen.
 *
 * SECURITY: Nothing in this store is secret except the EncryptedSeed, which
 * is only ever written encrypted. Blinding factors are re-derived from the
 * seed; only their key paths live here.
 *
 * Schema version: 1
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  StorageError,
  WalletError,
  type EncryptedSeed,
  type OutputData,
  type OutputFeatures,
  type OutputStatus,
  type TxDirection,
  type TxLogEntry,
  type TxLogStatus,
  type WalletChanges,
} from './types.js';

// ── Interface ─────────────────────────────────────────────────────────────────

/**
 * Storage collaborator. Async so that a remote store can implement it;
 * every method rejects with StorageError when the backend fails.
 */
export interface WalletStorage {
  /** Returns false when the username is already taken. */
  createWallet(username: string, encryptedSeed: EncryptedSeed): Promise<boolean>;
  loadEncryptedSeed(username: string): Promise<EncryptedSeed | null>;
  /** Atomically reserves the next unused key index for this wallet. */
  reserveKeyIndex(username: string): Promise<number>;
  listOutputs(username: string): Promise<OutputData[]>;
  getTxLogEntry(username: string, slateId: string, direction: TxDirection): Promise<TxLogEntry | null>;
  listTxLog(username: string): Promise<TxLogEntry[]>;
  hasSeenNonce(username: string, nonce: string): Promise<boolean>;
  /** Applies every change in one transaction, or none of them. */
  commit(username: string, changes: WalletChanges): Promise<void>;
  close(): void;
}

// ── Row types ─────────────────────────────────────────────────────────────────

interface OutputRow {
  commitment: string;
  key_path: string;
  amount: string;
  status: OutputStatus;
  features: OutputFeatures;
  block_height: number | null;
  slate_id: string | null;
  locked_at: number | null;
}

interface TxLogRow {
  slate_id: string;
  direction: TxDirection;
  status: TxLogStatus;
  amount: string;
  fee: string;
  created_at: number;
  input_commitments: string;
  output_commitments: string;
  counterparty_nonce: string | null;
  transaction_json: string | null;
}

const hex = z.string().regex(/^[0-9a-f]+$/);

const encryptedSeedSchema = z.object({
  version: z.literal(1),
  ciphertext: hex,
  nonce: hex,
  authTag: hex,
  salt: hex,
  algorithm: z.literal('aes-256-gcm'),
  kdf: z.literal('scrypt'),
  kdfParams: z.object({
    N: z.number().int().positive(),
    r: z.number().int().positive(),
    p: z.number().int().positive(),
  }),
});

const commitmentList = z.array(z.string());

// ── SqliteWalletStorage ───────────────────────────────────────────────────────

export class SqliteWalletStorage implements WalletStorage {
  private db: InstanceType<typeof Database>;
  private closed = false;

  /** @param dbPath File path, or `:memory:` for an in-process store. */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');  // WAL mode: safe concurrent reads
      this.db.pragma('synchronous = NORMAL'); // Balance durability vs performance
      this.db.pragma('foreign_keys = ON');
      this.migrate();
    } catch (err) {
      throw new StorageError(`Cannot open wallet database at ${dbPath}.`, err);
    }
  }

  // ── Schema migration ────────────────────────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS wallets (
        username        TEXT    PRIMARY KEY,
        encrypted_seed  TEXT    NOT NULL,
        next_key_index  INTEGER NOT NULL DEFAULT 0,
        created_at      TEXT    NOT NULL
      );

      CREATE TABLE IF NOT EXISTS outputs (
        username      TEXT    NOT NULL REFERENCES wallets (username),
        commitment    TEXT    NOT NULL,
        key_path      TEXT    NOT NULL,
        amount        TEXT    NOT NULL,
        status        TEXT    NOT NULL,
        features      TEXT    NOT NULL,
        block_height  INTEGER,
        slate_id      TEXT,
        locked_at     INTEGER,
        PRIMARY KEY (username, commitment)
      );

      CREATE TABLE IF NOT EXISTS tx_log (
        username            TEXT    NOT NULL REFERENCES wallets (username),
        slate_id            TEXT    NOT NULL,
        direction           TEXT    NOT NULL,
        status              TEXT    NOT NULL,
        amount              TEXT    NOT NULL,
        fee                 TEXT    NOT NULL,
        created_at          INTEGER NOT NULL,
        input_commitments   TEXT    NOT NULL DEFAULT '[]',
        output_commitments  TEXT    NOT NULL DEFAULT '[]',
        counterparty_nonce  TEXT,
        transaction_json    TEXT,
        PRIMARY KEY (username, slate_id, direction)
      );

      CREATE TABLE IF NOT EXISTS seen_nonces (
        username  TEXT NOT NULL REFERENCES wallets (username),
        nonce     TEXT NOT NULL,
        PRIMARY KEY (username, nonce)
      );

      CREATE INDEX IF NOT EXISTS idx_outputs_status ON outputs (username, status);
    `);
  }

  // ── Wallets ─────────────────────────────────────────────────────────────────

  createWallet(username: string, encryptedSeed: EncryptedSeed): Promise<boolean> {
    return this.run('createWallet', () => {
      const result = this.db
        .prepare(`
          INSERT OR IGNORE INTO wallets (username, encrypted_seed, created_at)
          VALUES (?, ?, ?)
        `)
        .run(username, JSON.stringify(encryptedSeed), new Date().toISOString());
      return result.changes === 1;
    });
  }

  loadEncryptedSeed(username: string): Promise<EncryptedSeed | null> {
    return this.run('loadEncryptedSeed', () => {
      const row = this.db
        .prepare('SELECT encrypted_seed FROM wallets WHERE username = ?')
        .get(username) as { encrypted_seed: string } | undefined;
      if (!row) return null;

      const parsed = encryptedSeedSchema.safeParse(JSON.parse(row.encrypted_seed));
      if (!parsed.success) {
        throw new StorageError(`Stored seed record for "${username}" is corrupted.`);
      }
      return parsed.data;
    });
  }

  reserveKeyIndex(username: string): Promise<number> {
    return this.run('reserveKeyIndex', () =>
      this.db.transaction(() => {
        const row = this.db
          .prepare('SELECT next_key_index FROM wallets WHERE username = ?')
          .get(username) as { next_key_index: number } | undefined;
        if (!row) {
          throw new StorageError(`Wallet "${username}" does not exist.`);
        }
        this.db
          .prepare('UPDATE wallets SET next_key_index = next_key_index + 1 WHERE username = ?')
          .run(username);
        return row.next_key_index;
      })(),
    );
  }

  // ── Outputs ─────────────────────────────────────────────────────────────────

  listOutputs(username: string): Promise<OutputData[]> {
    return this.run('listOutputs', () => {
      const rows = this.db
        .prepare('SELECT * FROM outputs WHERE username = ? ORDER BY rowid')
        .all(username) as OutputRow[];
      return rows.map(toOutput);
    });
  }

  // ── Slate log ───────────────────────────────────────────────────────────────

  getTxLogEntry(username: string, slateId: string, direction: TxDirection): Promise<TxLogEntry | null> {
    return this.run('getTxLogEntry', () => {
      const row = this.db
        .prepare('SELECT * FROM tx_log WHERE username = ? AND slate_id = ? AND direction = ?')
        .get(username, slateId, direction) as TxLogRow | undefined;
      return row ? toTxLogEntry(row) : null;
    });
  }

  listTxLog(username: string): Promise<TxLogEntry[]> {
    return this.run('listTxLog', () => {
      const rows = this.db
        .prepare('SELECT * FROM tx_log WHERE username = ? ORDER BY created_at, slate_id')
        .all(username) as TxLogRow[];
      return rows.map(toTxLogEntry);
    });
  }

  hasSeenNonce(username: string, nonce: string): Promise<boolean> {
    return this.run('hasSeenNonce', () => {
      const row = this.db
        .prepare('SELECT 1 AS hit FROM seen_nonces WHERE username = ? AND nonce = ?')
        .get(username, nonce) as { hit: number } | undefined;
      return row !== undefined;
    });
  }

  // ── Atomic batch ────────────────────────────────────────────────────────────

  commit(username: string, changes: WalletChanges): Promise<void> {
    return this.run('commit', () => {
      const upsertOutput = this.db.prepare(`
        INSERT INTO outputs (username, commitment, key_path, amount, status, features, block_height, slate_id, locked_at)
        VALUES (@username, @commitment, @keyPath, @amount, @status, @features, @blockHeight, @slateId, @lockedAt)
        ON CONFLICT (username, commitment) DO UPDATE SET
          key_path = excluded.key_path,
          amount = excluded.amount,
          status = excluded.status,
          features = excluded.features,
          block_height = excluded.block_height,
          slate_id = excluded.slate_id,
          locked_at = excluded.locked_at
      `);
      const removeOutput = this.db.prepare('DELETE FROM outputs WHERE username = ? AND commitment = ?');
      const upsertLog = this.db.prepare(`
        INSERT INTO tx_log (username, slate_id, direction, status, amount, fee, created_at,
                            input_commitments, output_commitments, counterparty_nonce, transaction_json)
        VALUES (@username, @slateId, @direction, @status, @amount, @fee, @createdAt,
                @inputCommitments, @outputCommitments, @counterpartyNonce, @transactionJson)
        ON CONFLICT (username, slate_id, direction) DO UPDATE SET
          status = excluded.status,
          amount = excluded.amount,
          fee = excluded.fee,
          input_commitments = excluded.input_commitments,
          output_commitments = excluded.output_commitments,
          counterparty_nonce = excluded.counterparty_nonce,
          transaction_json = excluded.transaction_json
      `);
      const insertNonce = this.db.prepare('INSERT OR IGNORE INTO seen_nonces (username, nonce) VALUES (?, ?)');

      this.db.transaction(() => {
        for (const o of changes.upsertOutputs ?? []) {
          upsertOutput.run({
            username,
            commitment: o.commitment,
            keyPath: o.keyPath,
            amount: o.amount.toString(),
            status: o.status,
            features: o.features,
            blockHeight: o.blockHeight,
            slateId: o.slateId,
            lockedAt: o.lockedAt,
          });
        }
        for (const commitment of changes.removeOutputs ?? []) {
          removeOutput.run(username, commitment);
        }
        for (const e of changes.upsertTxLog ?? []) {
          upsertLog.run({
            username,
            slateId: e.slateId,
            direction: e.direction,
            status: e.status,
            amount: e.amount.toString(),
            fee: e.fee.toString(),
            createdAt: e.createdAt,
            inputCommitments: JSON.stringify(e.inputCommitments),
            outputCommitments: JSON.stringify(e.outputCommitments),
            counterpartyNonce: e.counterpartyNonce,
            transactionJson: e.transactionJson,
          });
        }
        for (const nonce of changes.seenNonces ?? []) {
          insertNonce.run(username, nonce);
        }
      })();
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /** Flush WAL and close the connection. Call on graceful shutdown. */
  close(): void {
    if (this.closed) return;
    this.db.pragma('wal_checkpoint(FULL)');
    this.db.close();
    this.closed = true;
  }

  get isClosed(): boolean { return this.closed; }

  // ── Internals ───────────────────────────────────────────────────────────────

  private run<T>(op: string, fn: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new StorageError(`${op}: wallet database is closed.`));
    }
    try {
      return Promise.resolve(fn());
    } catch (err) {
      return Promise.reject(err instanceof WalletError ? err : new StorageError(`${op} failed.`, err));
    }
  }
}

function toOutput(row: OutputRow): OutputData {
  return {
    keyPath: row.key_path,
    commitment: row.commitment,
    amount: BigInt(row.amount),
    status: row.status,
    features: row.features,
    blockHeight: row.block_height,
    slateId: row.slate_id,
    lockedAt: row.locked_at,
  };
}

function toTxLogEntry(row: TxLogRow): TxLogEntry {
  return {
    slateId: row.slate_id,
    direction: row.direction,
    status: row.status,
    amount: BigInt(row.amount),
    fee: BigInt(row.fee),
    createdAt: row.created_at,
    inputCommitments: commitmentList.parse(JSON.parse(row.input_commitments)),
    outputCommitments: commitmentList.parse(JSON.parse(row.output_commitments)),
    counterpartyNonce: row.counterparty_nonce,
    transactionJson: row.transaction_json,
  };
}
