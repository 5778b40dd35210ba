/**
 * Local Memory Store
 *
 * Reads pattern files from disk:
 *   <basePath>/patterns/<keyword>.json   keyword-specific patterns
 *   <basePath>/patterns/core.json        patterns shared by every query
 * Each file holds `{ "patterns": [...] }`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { Logger } from '../core/logger.js';
import { toErrorMessage } from '../core/errors.js';
import type { MemoryEntry, MemoryQuery, SyncMemoryStore } from './types.js';

const MAX_PATTERNS_PER_FILE = 50;

const PatternSchema = z
  .object({
    id: z.string().optional(),
    timestamp: z.string().optional(),
    created_at: z.string().optional(),
    assets: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).optional(),
    asset: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).optional(),
    action: z.string().optional(),
    confidence: z.coerce.number().optional(),
    similarity: z.coerce.number().optional(),
    summary: z.string().optional(),
    notes: z.string().optional(),
  })
  .passthrough();

type Pattern = z.infer<typeof PatternSchema>;

const PatternFileSchema = z.object({
  patterns: z.array(z.unknown()).default([]),
});

function splitAssets(value: Pattern['assets']): string[] {
  if (value === undefined) return [];
  const parts = typeof value === 'string' ? value.split(',') : value.map(String);
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

export class LocalMemoryStore implements SyncMemoryStore {
  private patternDir: string;
  private lookbackHours: number;
  private logger: Logger;
  private now: () => Date;

  constructor(options: {
    basePath: string;
    lookbackHours?: number;
    logger?: Logger;
    now?: () => Date;
  }) {
    this.patternDir = join(options.basePath, 'patterns');
    this.lookbackHours = options.lookbackHours ?? 168;
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? (() => new Date());
  }

  loadEntries(query: MemoryQuery): MemoryEntry[] {
    if (query.keywords.length === 0) {
      return [];
    }

    const patterns: unknown[] = [];
    for (const keyword of query.keywords) {
      patterns.push(...this.readPatternFile(`${keyword.toLowerCase()}.json`));
    }
    patterns.push(...this.readPatternFile('core.json'));

    const cutoff = this.now().getTime() - this.lookbackHours * 60 * 60 * 1000;
    return this.normalize(patterns)
      .filter((entry) => Date.parse(entry.createdAt) >= cutoff)
      .filter((entry) => entry.confidence >= query.minConfidence)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, query.limit);
  }

  /**
   * Append a pattern to a category file. Duplicate summaries collapse to the
   * latest one and only the most recent patterns are kept.
   */
  savePattern(category: string, pattern: Record<string, unknown>): void {
    const fileName = `${category.toLowerCase()}.json`;
    const existing = this.readPatternFile(fileName);
    const bySummary = new Map<string, unknown>();
    for (const item of [...existing, pattern]) {
      const parsed = PatternSchema.safeParse(item);
      const key = parsed.success && parsed.data.summary ? parsed.data.summary : randomUUID();
      bySummary.set(key, item);
    }

    const timestampOf = (item: unknown): string => {
      const parsed = PatternSchema.safeParse(item);
      return parsed.success ? parsed.data.timestamp ?? parsed.data.created_at ?? '' : '';
    };
    const limited = Array.from(bySummary.values())
      .sort((a, b) => timestampOf(b).localeCompare(timestampOf(a)))
      .slice(0, MAX_PATTERNS_PER_FILE);

    mkdirSync(this.patternDir, { recursive: true });
    writeFileSync(
      join(this.patternDir, fileName),
      JSON.stringify({ patterns: limited }, null, 2),
      'utf-8'
    );
  }

  private readPatternFile(fileName: string): unknown[] {
    const path = join(this.patternDir, fileName);
    if (!existsSync(path)) {
      return [];
    }
    try {
      const parsed = PatternFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (!parsed.success) {
        this.logger.warn(`Ignoring malformed pattern file ${path}`);
        return [];
      }
      return parsed.data.patterns;
    } catch (error) {
      this.logger.warn(`Failed to read pattern file ${path}: ${toErrorMessage(error)}`);
      return [];
    }
  }

  private normalize(patterns: unknown[]): MemoryEntry[] {
    const entries: MemoryEntry[] = [];
    for (const item of patterns) {
      const parsed = PatternSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.debug('Skipping malformed memory pattern');
        continue;
      }
      const pattern = parsed.data;
      const rawTimestamp = pattern.timestamp ?? pattern.created_at;
      const createdAt = rawTimestamp ? new Date(rawTimestamp) : this.now();
      if (Number.isNaN(createdAt.getTime())) {
        this.logger.debug(`Skipping memory pattern with bad timestamp: ${rawTimestamp ?? ''}`);
        continue;
      }
      const assets = splitAssets(pattern.assets ?? pattern.asset);

      entries.push({
        id: pattern.id ?? randomUUID(),
        createdAt: createdAt.toISOString(),
        assets: assets.length > 0 ? assets : ['NONE'],
        action: pattern.action ?? 'observe',
        confidence: pattern.confidence ?? 0,
        // no real similarity for file patterns
        similarity: pattern.similarity ?? 1.0,
        summary: pattern.summary ?? pattern.notes ?? '',
      });
    }
    return entries;
  }
}
