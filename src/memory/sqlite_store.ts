import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

import Database from 'better-sqlite3';

import type { MemoryEntry, MemoryQuery, SyncMemoryStore } from './types.js';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS memory_entries (
    id TEXT PRIMARY KEY,
    created_at TEXT NOT NULL,
    event_type TEXT,
    assets TEXT NOT NULL,
    keywords TEXT NOT NULL,
    action TEXT NOT NULL,
    confidence REAL NOT NULL,
    summary TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_memory_entries_created_at ON memory_entries(created_at);
`;

const INSTANCES = new Map<string, Database.Database>();

export function openMemoryDatabase(dbPath: string): Database.Database {
  const existing = INSTANCES.get(dbPath);
  if (existing) {
    return existing;
  }

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA_SQL);

  if (dbPath !== ':memory:') {
    INSTANCES.set(dbPath, db);
  }
  return db;
}

type MemoryRow = {
  id: string;
  created_at: string;
  assets: string;
  keywords: string;
  action: string;
  confidence: number;
  summary: string;
};

function isMemoryRow(value: unknown): value is MemoryRow {
  if (typeof value !== 'object' || value === null) return false;
  const row: Record<string, unknown> = { ...value };
  return (
    typeof row.id === 'string' &&
    typeof row.created_at === 'string' &&
    typeof row.assets === 'string' &&
    typeof row.keywords === 'string' &&
    typeof row.action === 'string' &&
    typeof row.confidence === 'number' &&
    typeof row.summary === 'string'
  );
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export type RecordMemoryInput = {
  summary: string;
  eventType?: string;
  assets: string[];
  keywords: string[];
  action: string;
  confidence: number;
  createdAt?: string;
};

/**
 * Memory kept in SQLite. Similarity is the share of query terms (keywords
 * and asset codes) that a stored entry also carries.
 */
export class SqliteMemoryStore implements SyncMemoryStore {
  private lookbackHours: number;
  private now: () => Date;

  constructor(
    private db: Database.Database,
    options?: { lookbackHours?: number; now?: () => Date }
  ) {
    this.lookbackHours = options?.lookbackHours ?? 168;
    this.now = options?.now ?? (() => new Date());
  }

  record(input: RecordMemoryInput): string {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO memory_entries (id, created_at, event_type, assets, keywords, action, confidence, summary)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        input.createdAt ?? this.now().toISOString(),
        input.eventType ?? null,
        input.assets.map((asset) => asset.toUpperCase()).join(','),
        input.keywords.map((keyword) => keyword.toLowerCase()).join(','),
        input.action,
        input.confidence,
        input.summary
      );
    return id;
  }

  loadEntries(query: MemoryQuery): MemoryEntry[] {
    const terms = new Set([
      ...query.keywords.map((keyword) => keyword.toLowerCase()),
      ...query.assetCodes.map((asset) => asset.toLowerCase()),
    ]);
    if (terms.size === 0) {
      return [];
    }

    const cutoff = new Date(
      this.now().getTime() - this.lookbackHours * 60 * 60 * 1000
    ).toISOString();
    const rows: unknown[] = this.db
      .prepare(
        `SELECT id, created_at, assets, keywords, action, confidence, summary
         FROM memory_entries
         WHERE created_at >= ? AND confidence >= ?
         ORDER BY created_at DESC
         LIMIT 500`
      )
      .all(cutoff, query.minConfidence);

    const entries: MemoryEntry[] = [];
    for (const row of rows) {
      if (!isMemoryRow(row)) continue;
      const assets = splitList(row.assets);
      const rowTerms = new Set([
        ...splitList(row.keywords),
        ...assets.map((asset) => asset.toLowerCase()),
      ]);
      let matched = 0;
      for (const term of terms) {
        if (rowTerms.has(term)) matched += 1;
      }
      if (matched === 0) continue;
      entries.push({
        id: row.id,
        createdAt: row.created_at,
        assets: assets.length > 0 ? assets : ['NONE'],
        action: row.action,
        confidence: row.confidence,
        similarity: Math.round((matched / terms.size) * 1000) / 1000,
        summary: row.summary,
      });
    }

    return entries.sort((a, b) => b.similarity - a.similarity).slice(0, query.limit);
  }
}
