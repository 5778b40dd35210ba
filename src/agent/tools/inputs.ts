/**
 * Tool Input Resolution
 *
 * Turns a tool plan plus the event into concrete tool inputs, filling in
 * whatever the planner left out from the event itself.
 */

import type { EventPayload, PreliminaryAnalysis } from '../../types/index.js';
import type { ToolPlan } from '../planning/types.js';
import type { SearchInput } from './types.js';

export type EventContext = {
  payload: EventPayload;
  preliminary: PreliminaryAnalysis;
};

/**
 * Split a comma-separated asset field into upper-case codes, dropping NONE.
 */
export function normalizeAssetCodes(raw: string | string[] | undefined): string[] {
  if (!raw) return [];
  const parts = Array.isArray(raw) ? raw : raw.split(',');
  const codes: string[] = [];
  for (const part of parts) {
    const code = part.trim().toUpperCase();
    if (code && code !== 'NONE' && !codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * Deterministic query used when the planner supplies none.
 */
export function fallbackSearchKeywords(preliminary: PreliminaryAnalysis): string {
  const asset = normalizeAssetCodes(preliminary.asset)[0] ?? '';
  return `${asset} ${preliminary.eventType}`.trim();
}

export function resolveSearchInput(
  plan: ToolPlan,
  ctx: EventContext & { searchKeywords: string },
  settings: { maxResults: number; eventDomains: Record<string, string[]> }
): SearchInput {
  const keyword =
    plan.searchKeywords.trim() || ctx.searchKeywords.trim() || fallbackSearchKeywords(ctx.preliminary);
  const includeDomains = settings.eventDomains[ctx.preliminary.eventType];
  return {
    keyword,
    maxResults: settings.maxResults,
    ...(includeDomains && includeDomains.length > 0 ? { includeDomains } : {}),
  };
}

export function resolvePriceAsset(ctx: EventContext): string | null {
  return normalizeAssetCodes(ctx.preliminary.asset)[0] ?? null;
}

const MACRO_RULES: Array<{ indicator: string; patterns: string[] }> = [
  { indicator: 'CPI', patterns: ['cpi', 'inflation', '通胀'] },
  { indicator: 'FED_FUNDS', patterns: ['rate hike', 'interest rate', '加息', '降息'] },
  { indicator: 'UNEMPLOYMENT', patterns: ['job', 'labor', '就业', '失业'] },
  { indicator: 'DXY', patterns: ['dxy', 'usd index', '美元', 'trade war', '贸易战'] },
  { indicator: 'VIX', patterns: ['war', 'conflict', 'geopolitical', '战争', '恐慌'] },
];

/**
 * Indicators from the plan, or inferred from the event text. Only the first
 * is queried.
 */
export function resolveMacroIndicators(plan: ToolPlan, ctx: EventContext): string[] {
  const fromPlan = plan.macroIndicators
    .map((indicator) => indicator.trim().toUpperCase())
    .filter((indicator) => indicator.length > 0);
  if (fromPlan.length > 0) {
    return Array.from(new Set(fromPlan));
  }

  const text = [ctx.payload.text, ctx.payload.translatedText ?? '', ctx.preliminary.summary]
    .join(' ')
    .toLowerCase();
  const inferred: string[] = [];
  for (const rule of MACRO_RULES) {
    if (rule.patterns.some((pattern) => text.includes(pattern))) {
      inferred.push(rule.indicator);
      if (rule.indicator === 'CPI' && text.includes('core')) {
        inferred.push('CORE_CPI');
      }
    }
  }
  if (inferred.length === 0 && ctx.preliminary.eventType === 'macro') {
    inferred.push('CPI');
  }
  return Array.from(new Set(inferred));
}

export function resolveOnchainAssets(plan: ToolPlan, ctx: EventContext): string[] {
  const fromPlan = normalizeAssetCodes(plan.onchainAssets);
  return fromPlan.length > 0 ? fromPlan : normalizeAssetCodes(ctx.preliminary.asset);
}

export function resolveProtocolSlugs(plan: ToolPlan, ctx: EventContext): string[] {
  const fromPlan = plan.protocolSlugs
    .map((slug) => slug.trim().toLowerCase())
    .filter((slug) => slug.length > 0);
  if (fromPlan.length > 0) {
    return Array.from(new Set(fromPlan));
  }
  return normalizeAssetCodes(ctx.preliminary.asset).map((code) => code.toLowerCase());
}
