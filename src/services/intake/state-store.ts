/**
 * @fileoverview Retry and reply-rate state storage.
 *
 * Attempt records (per message id) and the reply ledger (per normalized
 * recipient) live in process memory by default. A SQLite backing keeps
 * both across restarts without changing the tracker or limiter contracts.
 * Expired rows are pruned on access; there is no background sweep.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { AttemptRecord, MessageId } from './types.js';

export interface AttemptStore {
  get(id: MessageId): AttemptRecord | undefined;
  set(id: MessageId, record: AttemptRecord): void;
  delete(id: MessageId): void;
  clear(): void;
  close(): void;
}

export interface ReplyLedgerStore {
  /** Timestamps for `address` at or after `since`, oldest first. Older entries are dropped. */
  timestamps(address: string, since: number): number[];
  append(address: string, at: number): void;
  /** Remove one entry recorded at `at`, if present. */
  remove(address: string, at: number): void;
  clear(): void;
  close(): void;
}

// ---------------------------------------------------------------------------
// Memory
// ---------------------------------------------------------------------------

export class MemoryAttemptStore implements AttemptStore {
  private readonly map = new Map<MessageId, AttemptRecord>();

  get(id: MessageId): AttemptRecord | undefined {
    const record = this.map.get(id);
    return record ? { ...record } : undefined;
  }

  set(id: MessageId, record: AttemptRecord): void {
    this.map.set(id, { ...record });
  }

  delete(id: MessageId): void {
    this.map.delete(id);
  }

  clear(): void {
    this.map.clear();
  }

  close(): void {
    this.map.clear();
  }
}

export class MemoryReplyLedgerStore implements ReplyLedgerStore {
  private readonly map = new Map<string, number[]>();

  timestamps(address: string, since: number): number[] {
    const entries = this.map.get(address);
    if (!entries) return [];

    const kept = entries.filter((at) => at >= since).sort((a, b) => a - b);
    if (kept.length === 0) {
      this.map.delete(address);
    } else {
      this.map.set(address, kept);
    }
    return [...kept];
  }

  append(address: string, at: number): void {
    const entries = this.map.get(address) ?? [];
    entries.push(at);
    this.map.set(address, entries);
  }

  remove(address: string, at: number): void {
    const entries = this.map.get(address);
    if (!entries) return;
    const index = entries.indexOf(at);
    if (index !== -1) entries.splice(index, 1);
    if (entries.length === 0) this.map.delete(address);
  }

  clear(): void {
    this.map.clear();
  }

  close(): void {
    this.map.clear();
  }
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

type AttemptRow = {
  count: number;
  last_attempt_at: number;
  last_reason: string;
  last_code: string;
  last_fingerprint: string | null;
};

type LedgerRow = {
  sent_at: number;
};

function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  return db;
}

export class SqliteAttemptStore implements AttemptStore {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS message_attempts (
        message_id TEXT PRIMARY KEY,
        count INTEGER NOT NULL,
        last_attempt_at INTEGER NOT NULL,
        last_reason TEXT NOT NULL,
        last_code TEXT NOT NULL,
        last_fingerprint TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_message_attempts_last_attempt_at
        ON message_attempts(last_attempt_at);
    `);
  }

  get(id: MessageId): AttemptRecord | undefined {
    this.prune();
    const row = this.db
      .prepare<[string], AttemptRow>(
        'SELECT count, last_attempt_at, last_reason, last_code, last_fingerprint FROM message_attempts WHERE message_id = ?',
      )
      .get(id);
    if (!row) return undefined;

    return {
      count: row.count,
      lastAttemptAt: row.last_attempt_at,
      lastReason: row.last_reason,
      lastCode: row.last_code,
      lastFingerprint: row.last_fingerprint ?? undefined,
    };
  }

  set(id: MessageId, record: AttemptRecord): void {
    this.db
      .prepare(`
        INSERT INTO message_attempts (message_id, count, last_attempt_at, last_reason, last_code, last_fingerprint)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(message_id) DO UPDATE SET
          count = excluded.count,
          last_attempt_at = excluded.last_attempt_at,
          last_reason = excluded.last_reason,
          last_code = excluded.last_code,
          last_fingerprint = excluded.last_fingerprint
      `)
      .run(id, record.count, record.lastAttemptAt, record.lastReason, record.lastCode, record.lastFingerprint ?? null);
  }

  delete(id: MessageId): void {
    this.db.prepare('DELETE FROM message_attempts WHERE message_id = ?').run(id);
  }

  clear(): void {
    this.db.prepare('DELETE FROM message_attempts').run();
  }

  close(): void {
    this.db.close();
  }

  private prune(): void {
    const cutoff = this.now() - this.ttlMs;
    this.db.prepare('DELETE FROM message_attempts WHERE last_attempt_at < ?').run(cutoff);
  }
}

export class SqliteReplyLedgerStore implements ReplyLedgerStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reply_ledger (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        address TEXT NOT NULL,
        sent_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_reply_ledger_address_sent_at
        ON reply_ledger(address, sent_at);
    `);
  }

  timestamps(address: string, since: number): number[] {
    this.db.prepare('DELETE FROM reply_ledger WHERE address = ? AND sent_at < ?').run(address, since);
    const rows = this.db
      .prepare<[string], LedgerRow>('SELECT sent_at FROM reply_ledger WHERE address = ? ORDER BY sent_at ASC, id ASC')
      .all(address);
    return rows.map((row) => row.sent_at);
  }

  append(address: string, at: number): void {
    this.db.prepare('INSERT INTO reply_ledger (address, sent_at) VALUES (?, ?)').run(address, at);
  }

  remove(address: string, at: number): void {
    this.db
      .prepare(`
        DELETE FROM reply_ledger WHERE id = (
          SELECT id FROM reply_ledger WHERE address = ? AND sent_at = ? ORDER BY id DESC LIMIT 1
        )
      `)
      .run(address, at);
  }

  clear(): void {
    this.db.prepare('DELETE FROM reply_ledger').run();
  }

  close(): void {
    this.db.close();
  }
}

export type StateStores = {
  attempts: AttemptStore;
  ledger: ReplyLedgerStore;
};

export type StateStoreOptions =
  | { provider: 'memory' }
  | { provider: 'sqlite'; sqlitePath: string; attemptTtlMs: number };

export function createStateStores(options: StateStoreOptions): StateStores {
  if (options.provider === 'sqlite') {
    return {
      attempts: new SqliteAttemptStore(options.sqlitePath, options.attemptTtlMs),
      ledger: new SqliteReplyLedgerStore(options.sqlitePath),
    };
  }
  return {
    attempts: new MemoryAttemptStore(),
    ledger: new MemoryReplyLedgerStore(),
  };
}
