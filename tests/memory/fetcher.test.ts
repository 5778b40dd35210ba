import { describe, expect, it, vi } from 'vitest';

import {
  createMemoryFetcher,
  disabledMemoryFetcher,
  formatMemoryEvidence,
} from '../../src/memory/fetcher.js';
import type { MemoryEntry, MemoryQuery } from '../../src/memory/types.js';

const entry = (overrides: Partial<MemoryEntry> = {}): MemoryEntry => ({
  id: 'm1',
  createdAt: '2026-01-01T00:00:00.000Z',
  assets: ['USDC'],
  action: 'sell',
  confidence: 0.8,
  similarity: 0.9,
  summary: 'USDC wobble after bridge exploit',
  ...overrides,
});

describe('createMemoryFetcher', () => {
  it('adapts an async repository', async () => {
    const fetchMemories = vi.fn(async (_query: MemoryQuery) => [
      entry(),
      entry({ id: 'm2' }),
      entry({ id: 'm3' }),
    ]);
    const fetcher = createMemoryFetcher(
      { kind: 'async', repository: { fetchMemories } },
      { limit: 2, minConfidence: 0.7 }
    );

    const entries = await fetcher.fetch(['usdc'], ['USDC']);

    expect(entries.map((item) => item.id)).toEqual(['m1', 'm2']);
    expect(fetchMemories).toHaveBeenCalledWith({
      keywords: ['usdc'],
      assetCodes: ['USDC'],
      limit: 2,
      minConfidence: 0.7,
    });
  });

  it('adapts a sync store with default options', async () => {
    const loadEntries = vi.fn((_query: MemoryQuery) => [entry()]);
    const fetcher = createMemoryFetcher({ kind: 'sync', store: { loadEntries } });

    await expect(fetcher.fetch(['hack'], [])).resolves.toHaveLength(1);
    expect(loadEntries.mock.calls[0]?.[0]).toMatchObject({ limit: 3, minConfidence: 0.6 });
  });

  it('returns nothing when disabled', async () => {
    await expect(disabledMemoryFetcher.fetch(['x'], ['Y'])).resolves.toEqual([]);
  });
});

describe('formatMemoryEvidence', () => {
  it('numbers entries with rounded scores', () => {
    expect(
      formatMemoryEvidence([entry(), entry({ summary: '', confidence: 0.66666, similarity: 1 })])
    ).toBe(
      '1. USDC wobble after bridge exploit (confidence: 0.8, similarity: 0.9)\n' +
        '2. N/A (confidence: 0.667, similarity: 1)'
    );
  });

  it('says so when there is nothing', () => {
    expect(formatMemoryEvidence([])).toBe('No similar historical events');
  });
});
