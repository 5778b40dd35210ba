/**
 * Memory Types
 *
 * Historical events retrieved as context for planning and synthesis.
 */

export interface MemoryEntry {
  id: string;
  /** ISO timestamp */
  createdAt: string;
  assets: string[];
  action: string;
  confidence: number;
  similarity: number;
  summary: string;
}

export interface MemoryQuery {
  keywords: string[];
  assetCodes: string[];
  limit: number;
  minConfidence: number;
}

/**
 * The single capability the orchestration graph depends on. An empty
 * result is not an error.
 */
export interface MemoryFetcher {
  fetch(keywords: string[], assetCodes: string[]): Promise<MemoryEntry[]>;
}

/**
 * Repository backed by a remote or otherwise asynchronous store.
 */
export interface AsyncMemoryRepository {
  fetchMemories(query: MemoryQuery): Promise<MemoryEntry[]>;
}

/**
 * Store that reads synchronously (local files, embedded database).
 */
export interface SyncMemoryStore {
  loadEntries(query: MemoryQuery): MemoryEntry[];
}

export type MemorySource =
  | { kind: 'async'; repository: AsyncMemoryRepository }
  | { kind: 'sync'; store: SyncMemoryStore };
