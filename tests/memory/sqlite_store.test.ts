import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type Database from 'better-sqlite3';

import { SqliteMemoryStore, openMemoryDatabase } from '../../src/memory/sqlite_store.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('SqliteMemoryStore', () => {
  let db: Database.Database;
  let store: SqliteMemoryStore;

  beforeEach(() => {
    db = openMemoryDatabase(':memory:');
    store = new SqliteMemoryStore(db, { lookbackHours: 72, now: () => NOW });
  });

  afterEach(() => {
    db.close();
  });

  it('scores entries by shared terms', () => {
    store.record({
      summary: 'USDC bridge exploit',
      eventType: 'hack',
      assets: ['usdc'],
      keywords: ['Exploit', 'bridge'],
      action: 'sell',
      confidence: 0.8,
      createdAt: '2026-03-09T00:00:00.000Z',
    });
    store.record({
      summary: 'ETH exploit elsewhere',
      assets: ['ETH'],
      keywords: ['exploit'],
      action: 'observe',
      confidence: 0.7,
      createdAt: '2026-03-09T06:00:00.000Z',
    });
    store.record({
      summary: 'Unrelated listing',
      assets: ['SOL'],
      keywords: ['listing'],
      action: 'buy',
      confidence: 0.9,
      createdAt: '2026-03-09T07:00:00.000Z',
    });

    const entries = store.loadEntries({
      keywords: ['exploit', 'bridge'],
      assetCodes: ['USDC'],
      limit: 5,
      minConfidence: 0.6,
    });

    expect(entries.map((entry) => [entry.summary, entry.similarity])).toEqual([
      ['USDC bridge exploit', 1],
      ['ETH exploit elsewhere', 0.333],
    ]);
    expect(entries[0]?.assets).toEqual(['USDC']);
  });

  it('applies the lookback window and confidence floor', () => {
    store.record({
      summary: 'too old',
      assets: ['BTC'],
      keywords: ['etf'],
      action: 'buy',
      confidence: 0.9,
      createdAt: '2026-03-01T00:00:00.000Z',
    });
    store.record({
      summary: 'too weak',
      assets: ['BTC'],
      keywords: ['etf'],
      action: 'buy',
      confidence: 0.2,
      createdAt: '2026-03-10T00:00:00.000Z',
    });

    expect(
      store.loadEntries({ keywords: ['etf'], assetCodes: ['BTC'], limit: 3, minConfidence: 0.6 })
    ).toEqual([]);
  });

  it('returns nothing for an empty query', () => {
    expect(store.loadEntries({ keywords: [], assetCodes: [], limit: 3, minConfidence: 0 })).toEqual(
      []
    );
  });
});
