/**
 * Search Tool Adapter
 *
 * News search through Tavily, scored for multi-source and official
 * confirmation.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { ConfigurationError, truncate } from '../../../core/errors.js';
import type { EvidenceTool, SearchInput, ToolResultEnvelope } from '../types.js';

const TAVILY_ENDPOINT = 'https://api.tavily.com/search';

const OFFICIAL_KEYWORDS = [
  '官方',
  '声明',
  '公告',
  'official',
  'statement',
  'announcement',
  'confirmed',
  'press release',
];
const PANIC_KEYWORDS = ['暴跌', '崩盘', '恐慌', 'hack', 'exploit', 'crash', 'dump'];
const NEUTRAL_KEYWORDS = ['观察', '等待', '监控', 'watch', 'monitor', 'observe'];
const OPTIMISTIC_KEYWORDS = ['恢复', '稳定', '反弹', 'recovery', 'stable', 'bounce'];

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string().default(''),
        content: z.string().default(''),
        score: z.number().default(0),
      })
    )
    .default([]),
});

export type SearchHit = z.infer<typeof TavilyResponseSchema>['results'][number];

export type SearchSentiment = { panic: number; neutral: number; optimistic: number };

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function isOfficiallyConfirmed(results: SearchHit[]): boolean {
  return results.some((item) => {
    const text = `${item.title} ${item.content}`.toLowerCase();
    return OFFICIAL_KEYWORDS.some((keyword) => text.includes(keyword));
  });
}

export function analyzeSentiment(results: SearchHit[]): SearchSentiment {
  let panic = 0;
  let neutral = 0;
  let optimistic = 0;
  for (const item of results) {
    const text = `${item.title} ${item.content}`.toLowerCase();
    if (PANIC_KEYWORDS.some((word) => text.includes(word))) panic += 1;
    if (NEUTRAL_KEYWORDS.some((word) => text.includes(word))) neutral += 1;
    if (OPTIMISTIC_KEYWORDS.some((word) => text.includes(word))) optimistic += 1;
  }
  const total = panic + neutral + optimistic;
  if (total === 0) {
    return { panic: 0.33, neutral: 0.34, optimistic: 0.33 };
  }
  return {
    panic: round2(panic / total),
    neutral: round2(neutral / total),
    optimistic: round2(optimistic / total),
  };
}

/**
 * Average provider score, lifted by multi-source (+0.15), official
 * confirmation (+0.10) and a full result page (+0.05).
 */
export function scoreSearchConfidence(
  results: SearchHit[],
  multiSource: boolean,
  officialConfirmed: boolean
): number {
  if (results.length === 0) return 0;
  let confidence = results.reduce((sum, item) => sum + item.score, 0) / results.length;
  if (multiSource) confidence = Math.min(1, confidence + 0.15);
  if (officialConfirmed) confidence = Math.min(1, confidence + 0.1);
  if (results.length >= 5) confidence = Math.min(1, confidence + 0.05);
  return round2(confidence);
}

export function buildSearchEnvelope(
  keyword: string,
  results: SearchHit[],
  multiSourceThreshold: number
): ToolResultEnvelope {
  const uniqueDomains = new Set(results.map((item) => hostOf(item.url)));
  const multiSource = uniqueDomains.size >= multiSourceThreshold;
  const officialConfirmed = isOfficiallyConfirmed(results);
  const avgScore =
    results.length > 0 ? results.reduce((sum, item) => sum + item.score, 0) / results.length : 0;

  return {
    source: 'Tavily',
    timestamp: new Date().toISOString(),
    success: true,
    data: {
      keyword,
      results: results.map((item) => ({
        title: item.title,
        source: hostOf(item.url),
        url: item.url,
        score: item.score,
      })),
      multi_source: multiSource,
      official_confirmed: officialConfirmed,
      sentiment: analyzeSentiment(results),
      source_count: results.length,
      unique_domains: uniqueDomains.size,
    },
    triggered: multiSource && avgScore >= 0.6,
    confidence: scoreSearchConfidence(results, multiSource, officialConfirmed),
    error: null,
  };
}

export type TavilySearchOptions = {
  apiKey?: string;
  multiSourceThreshold?: number;
  endpoint?: string;
};

export function createTavilySearchTool(options: TavilySearchOptions): EvidenceTool<'search'> {
  const apiKey = options.apiKey;
  if (!apiKey) {
    throw new ConfigurationError('Tavily API key is not configured (TAVILY_API_KEY)');
  }
  const threshold = options.multiSourceThreshold ?? 3;
  const endpoint = options.endpoint ?? TAVILY_ENDPOINT;

  return {
    name: 'search',
    description:
      'Search recent news to verify the event, with multi-source and official confirmation checks.',
    schema: z.object({
      keyword: z.string().min(1),
      maxResults: z.number().int().min(1).max(20),
      includeDomains: z.array(z.string()).optional(),
    }),
    run: async (input: SearchInput, ctx): Promise<ToolResultEnvelope> => {
      ctx.logger.debug(
        `Tavily request: keyword="${input.keyword}" max=${input.maxResults} domains=${
          input.includeDomains?.join(',') ?? 'all'
        }`
      );
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        signal: ctx.signal,
        body: JSON.stringify({
          api_key: apiKey,
          query: input.keyword,
          max_results: input.maxResults,
          search_depth: 'basic',
          include_answer: false,
          ...(input.includeDomains ? { include_domains: input.includeDomains } : {}),
        }),
      });

      if (response.status === 429) {
        ctx.logger.warn(`Tavily rate limited: keyword="${input.keyword}"`);
        return {
          source: 'Tavily',
          timestamp: new Date().toISOString(),
          success: false,
          data: null,
          confidence: 0,
          triggered: false,
          error: 'rate_limit',
        };
      }
      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new Error(`Tavily request failed (${response.status}): ${truncate(detail, 200)}`);
      }

      const parsed = TavilyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Tavily returned an unexpected response shape');
      }
      ctx.logger.info(
        `Tavily ok: keyword="${input.keyword}" results=${parsed.data.results.length}`
      );
      return buildSearchEnvelope(input.keyword, parsed.data.results, threshold);
    },
  };
}
