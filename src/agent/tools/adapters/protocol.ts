/**
 * Protocol Tool Adapter
 *
 * Protocol TVL history from DefiLlama: current TVL, 24h and 7d change, and
 * the largest chains by TVL.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { truncate } from '../../../core/errors.js';
import {
  failedEnvelope,
  type EvidenceTool,
  type ProtocolInput,
  type ToolResultEnvelope,
} from '../types.js';

/** Keys in currentChainTvls that are not a chain's own TVL */
const NON_CORE_CHAIN_MARKERS = ['borrowed', 'staking', 'pool2', 'doublecounted', 'mcap'];

const ProtocolSchema = z.object({
  name: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  symbol: z.string().nullable().optional(),
  twitter: z.string().nullable().optional(),
  category: z.string().nullable().optional(),
  chains: z.array(z.string()).default([]),
  tvl: z.array(z.object({ date: z.number(), totalLiquidityUSD: z.number() })).default([]),
  currentChainTvls: z.record(z.string(), z.number()).default({}),
});

export type ProtocolPayload = z.infer<typeof ProtocolSchema>;

export type ProtocolThresholds = {
  tvlDropThresholdPct: number;
  tvlDropThresholdUsd: number;
  topChainLimit: number;
};

function pctChange(current: number, base: number | null): number | null {
  if (base === null || base === 0) return null;
  return ((current - base) / base) * 100;
}

export function selectTopChains(
  chainTvls: Record<string, number>,
  limit: number
): Array<{ chain: string; tvl_usd: number }> {
  return Object.entries(chainTvls)
    .filter(([chain, tvl]) => {
      const key = chain.toLowerCase();
      return tvl > 0 && !NON_CORE_CHAIN_MARKERS.some((marker) => key.includes(marker));
    })
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(1, limit))
    .map(([chain, tvl]) => ({ chain, tvl_usd: Math.round(tvl * 100) / 100 }));
}

export function buildProtocolEnvelope(
  slug: string,
  payload: ProtocolPayload,
  thresholds: ProtocolThresholds
): ToolResultEnvelope {
  // daily points, oldest first
  const series = [...payload.tvl].sort((a, b) => a.date - b.date);
  const at = (daysAgo: number): number | null =>
    series[series.length - 1 - daysAgo]?.totalLiquidityUSD ?? null;

  const current = at(0);
  const dayAgo = at(1);
  const weekAgo = at(7);

  const change24hPct = current === null ? null : pctChange(current, dayAgo);
  const change7dPct = current === null ? null : pctChange(current, weekAgo);
  const delta24hUsd = current !== null && dayAgo !== null ? current - dayAgo : null;
  const delta7dUsd = current !== null && weekAgo !== null ? current - weekAgo : null;

  const anomalies: Record<string, boolean> = {};
  if (change24hPct !== null && change24hPct <= -thresholds.tvlDropThresholdPct) {
    anomalies.tvl_drop_24h_pct = true;
  }
  if (change7dPct !== null && change7dPct <= -thresholds.tvlDropThresholdPct) {
    anomalies.tvl_drop_7d_pct = true;
  }
  if (delta24hUsd !== null && delta24hUsd <= -thresholds.tvlDropThresholdUsd) {
    anomalies.tvl_drop_24h_usd = true;
  }
  if (delta7dUsd !== null && delta7dUsd <= -thresholds.tvlDropThresholdUsd) {
    anomalies.tvl_drop_7d_usd = true;
  }

  return {
    source: 'DefiLlama',
    timestamp: new Date().toISOString(),
    success: true,
    data: {
      slug,
      name: payload.name ?? null,
      url: payload.url ?? null,
      symbol: payload.symbol ?? null,
      twitter: payload.twitter ?? null,
      category: payload.category ?? null,
      chains: payload.chains,
      metrics:
        current === null
          ? {}
          : {
              tvl_usd: current,
              tvl_1d_ago: dayAgo,
              tvl_7d_ago: weekAgo,
              tvl_change_24h_pct: change24hPct,
              tvl_change_7d_pct: change7dPct,
              tvl_change_24h_usd: delta24hUsd,
              tvl_change_7d_usd: delta7dUsd,
              top_chains: selectTopChains(payload.currentChainTvls, thresholds.topChainLimit),
            },
      anomalies,
      thresholds: {
        tvl_drop_threshold_pct: thresholds.tvlDropThresholdPct,
        tvl_drop_threshold_usd: thresholds.tvlDropThresholdUsd,
      },
    },
    triggered: Object.keys(anomalies).length > 0,
    confidence: 1,
    error: null,
  };
}

export type DefiLlamaProtocolOptions = ProtocolThresholds & {
  baseUrl: string;
};

export function createDefiLlamaProtocolTool(
  options: DefiLlamaProtocolOptions
): EvidenceTool<'protocol'> {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  return {
    name: 'protocol',
    description: 'Protocol TVL with 24h/7d change and the largest chains, by DefiLlama slug.',
    schema: z.object({ slug: z.string().min(1) }),
    run: async (input: ProtocolInput, ctx): Promise<ToolResultEnvelope> => {
      const slug = input.slug.trim().toLowerCase();
      const response = await fetch(`${baseUrl}/protocol/${encodeURIComponent(slug)}`, {
        headers: { Accept: 'application/json' },
        signal: ctx.signal,
      });
      if (response.status === 404 || response.status === 400) {
        ctx.logger.info(`DefiLlama protocol not found: ${slug}`);
        return failedEnvelope('DefiLlama', 'protocol_not_found');
      }
      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new Error(
          `DefiLlama protocol request failed (${response.status}): ${truncate(detail, 200)}`
        );
      }

      const parsed = ProtocolSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('DefiLlama returned an unexpected protocol payload');
      }
      return buildProtocolEnvelope(slug, parsed.data, options);
    },
  };
}
