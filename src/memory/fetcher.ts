import type {
  MemoryEntry,
  MemoryFetcher,
  MemoryQuery,
  MemorySource,
} from './types.js';

export type MemoryFetcherOptions = {
  limit?: number;
  minConfidence?: number;
};

/**
 * Adapt a memory backend to the fetcher interface once, at construction.
 */
export function createMemoryFetcher(
  source: MemorySource,
  options?: MemoryFetcherOptions
): MemoryFetcher {
  const limit = options?.limit ?? 3;
  const minConfidence = options?.minConfidence ?? 0.6;
  const toQuery = (keywords: string[], assetCodes: string[]): MemoryQuery => ({
    keywords,
    assetCodes,
    limit,
    minConfidence,
  });

  switch (source.kind) {
    case 'async':
      return {
        async fetch(keywords, assetCodes) {
          const entries = await source.repository.fetchMemories(toQuery(keywords, assetCodes));
          return entries.slice(0, limit);
        },
      };
    case 'sync':
      return {
        async fetch(keywords, assetCodes) {
          return source.store.loadEntries(toQuery(keywords, assetCodes)).slice(0, limit);
        },
      };
  }
}

export const disabledMemoryFetcher: MemoryFetcher = {
  fetch: async () => [],
};

function formatScore(value: number): string {
  return Number.isFinite(value) ? String(Math.round(value * 1000) / 1000) : 'N/A';
}

export function formatMemoryEvidence(entries: MemoryEntry[]): string {
  if (entries.length === 0) {
    return 'No similar historical events';
  }
  return entries
    .map(
      (entry, index) =>
        `${index + 1}. ${entry.summary || 'N/A'} (confidence: ${formatScore(
          entry.confidence
        )}, similarity: ${formatScore(entry.similarity)})`
    )
    .join('\n');
}
