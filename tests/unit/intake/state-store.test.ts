/**
 * Unit tests for the attempt and reply-ledger stores.
 */

import { afterEach, describe, expect, it } from 'vitest';
import {
  MemoryAttemptStore,
  MemoryReplyLedgerStore,
  SqliteAttemptStore,
  SqliteReplyLedgerStore,
  createStateStores,
  type AttemptStore,
  type ReplyLedgerStore,
} from '../../../src/services/intake/state-store.js';
import type { AttemptRecord } from '../../../src/services/intake/types.js';

const record: AttemptRecord = {
  count: 2,
  lastAttemptAt: 1_000,
  lastReason: 'timed out',
  lastCode: 'REASONER_TIMEOUT',
};

const attemptStores: Array<[string, () => AttemptStore]> = [
  ['memory', () => new MemoryAttemptStore()],
  ['sqlite', () => new SqliteAttemptStore(':memory:', 60_000, () => 2_000)],
];

const ledgerStores: Array<[string, () => ReplyLedgerStore]> = [
  ['memory', () => new MemoryReplyLedgerStore()],
  ['sqlite', () => new SqliteReplyLedgerStore(':memory:')],
];

describe.each(attemptStores)('%s attempt store', (_name, create) => {
  let store: AttemptStore;

  afterEach(() => {
    store.close();
  });

  it('stores, overwrites and deletes records', () => {
    store = create();
    expect(store.get('1')).toBeUndefined();

    store.set('1', record);
    expect(store.get('1')).toEqual(record);

    store.set('1', { ...record, count: 3, lastFingerprint: 'abc' });
    expect(store.get('1')).toEqual({ ...record, count: 3, lastFingerprint: 'abc' });

    store.delete('1');
    expect(store.get('1')).toBeUndefined();
  });

  it('clear removes every record', () => {
    store = create();
    store.set('1', record);
    store.set('2', record);
    store.clear();
    expect(store.get('1')).toBeUndefined();
    expect(store.get('2')).toBeUndefined();
  });
});

describe('SqliteAttemptStore expiry', () => {
  it('drops records older than the TTL', () => {
    let now = 10_000;
    const store = new SqliteAttemptStore(':memory:', 5_000, () => now);
    store.set('1', { ...record, lastAttemptAt: 9_000 });

    expect(store.get('1')?.count).toBe(2);
    now = 14_001;
    expect(store.get('1')).toBeUndefined();
    store.close();
  });
});

describe.each(ledgerStores)('%s reply ledger', (_name, create) => {
  let store: ReplyLedgerStore;

  afterEach(() => {
    store.close();
  });

  it('returns entries at or after the cutoff, oldest first', () => {
    store = create();
    store.append('alice@example.com', 100);
    store.append('alice@example.com', 300);
    store.append('alice@example.com', 200);
    store.append('bob@example.com', 250);

    expect(store.timestamps('alice@example.com', 200)).toEqual([200, 300]);
    expect(store.timestamps('alice@example.com', 0)).toEqual([200, 300]);
    expect(store.timestamps('bob@example.com', 0)).toEqual([250]);
  });

  it('remove drops a single matching entry', () => {
    store = create();
    store.append('alice@example.com', 100);
    store.append('alice@example.com', 100);
    store.remove('alice@example.com', 100);
    expect(store.timestamps('alice@example.com', 0)).toEqual([100]);

    store.remove('alice@example.com', 999);
    expect(store.timestamps('alice@example.com', 0)).toEqual([100]);
  });

  it('clear empties the ledger', () => {
    store = create();
    store.append('alice@example.com', 100);
    store.clear();
    expect(store.timestamps('alice@example.com', 0)).toEqual([]);
  });
});

describe('createStateStores', () => {
  it('builds memory stores', () => {
    const stores = createStateStores({ provider: 'memory' });
    expect(stores.attempts).toBeInstanceOf(MemoryAttemptStore);
    expect(stores.ledger).toBeInstanceOf(MemoryReplyLedgerStore);
  });

  it('builds sqlite stores', () => {
    const stores = createStateStores({ provider: 'sqlite', sqlitePath: ':memory:', attemptTtlMs: 1_000 });
    expect(stores.attempts).toBeInstanceOf(SqliteAttemptStore);
    expect(stores.ledger).toBeInstanceOf(SqliteReplyLedgerStore);
    stores.attempts.close();
    stores.ledger.close();
  });
});
