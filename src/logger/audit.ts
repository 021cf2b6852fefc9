/**
 * @file src/logger/audit.ts
 *
 * Append-only SQLite audit database.
 * Every wallet lifecycle event and slate transition is written here for
 * later review.
 *
 * SECURITY: The `details_json` column must never contain secrets.
 * This is enforced by the `sanitiseDetails()` function which strips any field
 * whose name matches a secret-adjacent pattern before serialisation.
 * test/unit/logger/audit.test.ts verifies this property.
 *
 * Schema version: 1
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';

// ── Types ─────────────────────────────────────────────────────────────────────

export type AuditEventType =
  | 'wallet_created'
  | 'wallet_restored'
  | 'login'
  | 'login_failed'
  | 'logout'
  | 'slate_sent'
  | 'slate_received'
  | 'slate_rejected'
  | 'slate_finalized'
  | 'slate_cancelled'
  | 'slate_expired'
  | 'tx_posted'
  | 'outputs_refreshed'
  | 'operation_failed';

export interface AuditEvent {
  /** ISO 8601 timestamp. */
  ts: string;
  username: string;
  event: AuditEventType;
  slateId?: string | null;
  /** Base-unit amount as a decimal string. */
  amount?: string | null;
  status?: string | null;
  /** Arbitrary structured details, sanitised before storage. */
  details: Record<string, unknown>;
}

export interface AuditRow {
  id: number;
  ts: string;
  username: string;
  event: string;
  slate_id: string | null;
  amount: string | null;
  status: string | null;
  details_json: string;
}

export interface QueryOptions {
  username?: string;
  slateId?: string;
  event?: AuditEventType;
  limit?: number;
  before?: string; // ISO timestamp
}

// ── Forbidden field names (secret-adjacent) ──────────────────────────────────

const FORBIDDEN_FIELD_PATTERNS = [
  /^seed$/i,
  /^passphrase$/i,
  /^password$/i,
  /^token$/i,
  /^sessionToken$/i,
  /^blind$/i,
  /^secretNonce$/i,
  /^mnemonic$/i,
  /^words$/i,
];

// ── AuditDb class ─────────────────────────────────────────────────────────────

export class AuditDb {
  private db: InstanceType<typeof Database>;
  private insertStmt: ReturnType<InstanceType<typeof Database>['prepare']>;
  private closed = false;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.migrate();

    this.insertStmt = this.db.prepare(`
      INSERT INTO events (ts, username, event, slate_id, amount, status, details_json)
      VALUES (@ts, @username, @event, @slateId, @amount, @status, @detailsJson)
    `);
  }

  // ── Schema migration ────────────────────────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        ts           TEXT    NOT NULL,
        username     TEXT    NOT NULL,
        event        TEXT    NOT NULL,
        slate_id     TEXT,
        amount       TEXT,
        status       TEXT,
        details_json TEXT    NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_user ON events (username, ts);
      CREATE INDEX IF NOT EXISTS idx_event ON events (event, ts);
      CREATE INDEX IF NOT EXISTS idx_slate ON events (slate_id);
    `);
  }

  // ── Write ───────────────────────────────────────────────────────────────────

  /**
   * Inserts one audit event. The `details` object is sanitised before
   * serialisation.
   */
  insert(event: AuditEvent): void {
    if (this.closed) throw new Error('AuditDb: attempted write after close()');

    this.insertStmt.run({
      ts: event.ts,
      username: event.username,
      event: event.event,
      slateId: event.slateId ?? null,
      amount: event.amount ?? null,
      status: event.status ?? null,
      detailsJson: JSON.stringify(sanitiseDetails(event.details), bigintReplacer),
    });
  }

  /** Convenience: insert with current timestamp. */
  log(
    username: string,
    eventType: AuditEventType,
    details: Record<string, unknown>,
    slateFields?: { slateId?: string | null; amount?: bigint | null; status?: string | null },
  ): void {
    this.insert({
      ts: new Date().toISOString(),
      username,
      event: eventType,
      slateId: slateFields?.slateId ?? null,
      amount: slateFields?.amount == null ? null : slateFields.amount.toString(),
      status: slateFields?.status ?? null,
      details,
    });
  }

  // ── Query ───────────────────────────────────────────────────────────────────

  /** Returns the most recent N events, optionally filtered. */
  query(opts: QueryOptions = {}): AuditRow[] {
    const { username, slateId, event, limit = 50, before } = opts;

    const conditions: string[] = [];
    const params: Record<string, string | number> = {};

    if (username) { conditions.push('username = @username'); params['username'] = username; }
    if (slateId) { conditions.push('slate_id = @slateId'); params['slateId'] = slateId; }
    if (event) { conditions.push('event = @event'); params['event'] = event; }
    if (before) { conditions.push('ts < @before'); params['before'] = before; }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT * FROM events ${where} ORDER BY ts DESC, id DESC LIMIT @limit`;
    params['limit'] = limit;

    return this.db.prepare<Record<string, string | number>, AuditRow>(sql).all(params);
  }

  /** Returns event counts grouped by username and event type. */
  summarise(): Array<{ username: string; event: string; count: number }> {
    return this.db
      .prepare<[], { username: string; event: string; count: number }>(
        'SELECT username, event, COUNT(*) as count FROM events GROUP BY username, event ORDER BY username, event',
      )
      .all();
  }

  /** Total event count. */
  count(username?: string, event?: AuditEventType): number {
    const conditions: string[] = [];
    const params: string[] = [];

    if (username) { conditions.push('username = ?'); params.push(username); }
    if (event) { conditions.push('event = ?'); params.push(event); }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const row = this.db
      .prepare<string[], { n: number }>(`SELECT COUNT(*) as n FROM events ${where}`)
      .get(...params);
    return row?.n ?? 0;
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
}

// ── Sanitisation ──────────────────────────────────────────────────────────────

/**
 * Recursively removes any field whose name matches a secret-adjacent pattern.
 * Returns a new object; the input is not mutated.
 */
export function sanitiseDetails(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (FORBIDDEN_FIELD_PATTERNS.some((re) => re.test(key))) continue;
    result[key] = sanitiseValue(value);
  }

  return result;
}

function sanitiseValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sanitiseValue);
  if (isPlainRecord(value)) return sanitiseDetails(value);
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Throws if a serialised details JSON string mentions a secret-adjacent
 * field name. Used in tests.
 */
export function assertNoSecrets(detailsJson: string): void {
  const badPatterns = [/"seed"/i, /passphrase/i, /password/i, /"token"/i, /"blind"/i, /secretNonce/i, /mnemonic/i, /"words"/i];
  for (const pattern of badPatterns) {
    if (pattern.test(detailsJson)) {
      throw new Error(
        `AuditDb security violation: details_json contains forbidden field matching ${pattern}`,
      );
    }
  }
}
