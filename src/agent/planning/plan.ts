import { z } from 'zod';

import { MalformedOutputError } from '../../core/errors.js';
import { extractJson, extractJsonText } from '../../core/json.js';
import type { ToolPlan } from './types.js';

export function createToolPlan(partial: Partial<ToolPlan> = {}): ToolPlan {
  return {
    tools: dedupeTools(partial.tools ?? []),
    searchKeywords: partial.searchKeywords ?? '',
    macroIndicators: partial.macroIndicators ?? [],
    onchainAssets: partial.onchainAssets ?? [],
    protocolSlugs: partial.protocolSlugs ?? [],
    reason: partial.reason ?? '',
    confidence: partial.confidence ?? 1.0,
  };
}

export function emptyPlan(reason: string): ToolPlan {
  return createToolPlan({ reason });
}

function dedupeTools(tools: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tools) {
    const name = raw.trim().toLowerCase();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    result.push(name);
  }
  return result;
}

const StringList = z
  .union([z.array(z.unknown()), z.string(), z.null()])
  .optional()
  .transform((value): string[] => {
    if (value === null || value === undefined) return [];
    const items = typeof value === 'string' ? value.split(',') : value;
    return items
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0);
  });

const OptionalText = z
  .union([z.string(), z.array(z.string()), z.null()])
  .optional()
  .transform((value) => {
    if (Array.isArray(value)) return value.join(' ').trim();
    return value?.trim() ?? '';
  });

/**
 * Accepts snake_case (backend output) or camelCase keys.
 */
const RawToolPlanSchema = z
  .object({
    tools: StringList,
    search_keywords: OptionalText,
    searchKeywords: OptionalText,
    macro_indicators: StringList,
    macroIndicators: StringList,
    onchain_assets: StringList,
    onchainAssets: StringList,
    protocol_slugs: StringList,
    protocolSlugs: StringList,
    reason: OptionalText,
    confidence: z.number().min(0).max(1).optional().catch(undefined),
  })
  .passthrough();

export function toolPlanFromObject(value: unknown): ToolPlan {
  const parsed = RawToolPlanSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedOutputError(
      `Tool plan failed validation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      String(JSON.stringify(value))
    );
  }
  const raw = parsed.data;
  return createToolPlan({
    tools: raw.tools,
    searchKeywords: raw.search_keywords || raw.searchKeywords,
    macroIndicators: raw.macro_indicators.length > 0 ? raw.macro_indicators : raw.macroIndicators,
    onchainAssets: raw.onchain_assets.length > 0 ? raw.onchain_assets : raw.onchainAssets,
    protocolSlugs: raw.protocol_slugs.length > 0 ? raw.protocol_slugs : raw.protocolSlugs,
    reason: raw.reason,
    ...(raw.confidence !== undefined ? { confidence: raw.confidence } : {}),
  });
}

/**
 * Parse backend text into a plan via the JSON extraction chain.
 */
export function parseToolPlan(text: string): ToolPlan {
  return toolPlanFromObject(extractJson(text));
}

const KeywordResponseSchema = z.object({
  search_keywords: OptionalText,
  searchKeywords: OptionalText,
  keywords: OptionalText,
});

/**
 * Keywords from a `{"search_keywords": ...}` reply, or the first line of a
 * plain-text reply.
 */
export function parseSearchKeywords(text: string): string {
  let value: unknown = null;
  try {
    value = extractJson(text);
  } catch (error) {
    if (!(error instanceof MalformedOutputError)) throw error;
  }
  const parsed = KeywordResponseSchema.safeParse(value);
  const fromJson = parsed.success
    ? parsed.data.search_keywords || parsed.data.searchKeywords || parsed.data.keywords
    : '';
  const keywords = fromJson || (typeof value === 'string' ? value : text.split('\n')[0] ?? '');
  return keywords.replace(/^["'`]+|["'`]+$/g, '').trim();
}

/**
 * Synthesis replies must carry a JSON object; return it as clean JSON text.
 */
export function synthesisJson(text: string, backend: string): string {
  if (!text.trim()) {
    throw new MalformedOutputError(`${backend} returned an empty synthesis response`, text);
  }
  return extractJsonText(text);
}
