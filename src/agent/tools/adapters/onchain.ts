/**
 * On-chain Tool Adapter
 *
 * Stablecoin circulating supply from DefiLlama. Supply shrinking fast is
 * read as redemptions; only stablecoins are covered.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { truncate } from '../../../core/errors.js';
import {
  failedEnvelope,
  type EvidenceTool,
  type OnchainInput,
  type ToolResultEnvelope,
} from '../types.js';

/** Assets the stablecoin dataset never lists */
const UNSUPPORTED_ASSETS = new Set([
  'BTC', 'ETH', 'BNB', 'SOL', 'ADA', 'XRP', 'DOGE', 'AVAX', 'DOT', 'MATIC',
  'WBTC', 'WETH', 'STETH', 'WSTETH', 'RETH', 'CBETH', 'WBETH', 'BNSOL',
  'ARB', 'OP', 'LDO', 'UNI', 'AAVE', 'LINK', 'MKR', 'SNX', 'CRV', 'SUSHI',
]);

const PeggedAmount = z.object({ peggedUSD: z.number().nullable().optional() }).nullable().optional();

const PeggedAssetSchema = z.object({
  name: z.string().default(''),
  symbol: z.string().default(''),
  gecko_id: z.string().nullable().optional(),
  pegType: z.string().nullable().optional(),
  circulating: PeggedAmount,
  circulatingPrevDay: PeggedAmount,
  circulatingPrevWeek: PeggedAmount,
  chains: z.array(z.string()).default([]),
});

const StablecoinsSchema = z.object({
  peggedAssets: z.array(z.unknown()).default([]),
});

export type PeggedAsset = z.infer<typeof PeggedAssetSchema>;

export type OnchainThresholds = {
  /** Supply drop (percent) that counts as a TVL drop */
  tvlDropThresholdPct: number;
  /** Supply drop (USD) that counts as a redemption spike */
  redemptionUsdThreshold: number;
};

/**
 * Exact symbol match wins; otherwise the last entry whose gecko id or name
 * equals the symbol.
 */
export function findPeggedAsset(entries: unknown[], symbol: string): PeggedAsset | null {
  const wanted = symbol.toLowerCase();
  let fallback: PeggedAsset | null = null;
  for (const raw of entries) {
    const parsed = PeggedAssetSchema.safeParse(raw);
    if (!parsed.success) continue;
    const entry = parsed.data;
    if (entry.symbol.toLowerCase() === wanted) return entry;
    if ((entry.gecko_id ?? '').toLowerCase() === wanted || entry.name.toLowerCase() === wanted) {
      fallback = entry;
    }
  }
  return fallback;
}

function pctChange(current: number, base: number | null): number | null {
  if (base === null || base === 0) return null;
  return ((current - base) / base) * 100;
}

export function buildOnchainEnvelope(
  symbol: string,
  entry: PeggedAsset,
  thresholds: OnchainThresholds
): ToolResultEnvelope {
  const current = entry.circulating?.peggedUSD ?? null;
  if (current === null) {
    return failedEnvelope('DefiLlama', 'missing_current_value');
  }
  const prevDay = entry.circulatingPrevDay?.peggedUSD ?? null;
  const prevWeek = entry.circulatingPrevWeek?.peggedUSD ?? null;

  const change24hPct = pctChange(current, prevDay);
  const change7dPct = pctChange(current, prevWeek);
  const redemption24hUsd = prevDay !== null && prevDay > current ? prevDay - current : 0;
  const redemption7dUsd = prevWeek !== null && prevWeek > current ? prevWeek - current : 0;

  const anomalies: Record<string, boolean> = {};
  if (change24hPct !== null && change24hPct <= -thresholds.tvlDropThresholdPct) {
    anomalies.tvl_drop_24h = true;
  }
  if (redemption24hUsd > 0 && redemption24hUsd >= thresholds.redemptionUsdThreshold) {
    anomalies.redemption_spike_24h = true;
  }
  if (change7dPct !== null && change7dPct <= -thresholds.tvlDropThresholdPct) {
    anomalies.tvl_drop_7d = true;
  }
  if (redemption7dUsd > 0 && redemption7dUsd >= thresholds.redemptionUsdThreshold) {
    anomalies.redemption_spike_7d = true;
  }

  return {
    source: 'DefiLlama',
    timestamp: new Date().toISOString(),
    success: true,
    data: {
      asset: symbol,
      metrics: {
        tvl_usd: current,
        circulating_prev_day: prevDay,
        circulating_prev_week: prevWeek,
        tvl_change_24h_pct: change24hPct,
        tvl_change_7d_pct: change7dPct,
        redemption_24h_usd: redemption24hUsd,
        redemption_7d_usd: redemption7dUsd,
        supply_breakdown: entry.chains,
        peg_type: entry.pegType ?? null,
      },
      anomalies,
      thresholds: {
        tvl_drop_threshold_pct: thresholds.tvlDropThresholdPct,
        redemption_usd_threshold: thresholds.redemptionUsdThreshold,
      },
      notes: 'Circulating supply from stablecoins.llama.fi',
    },
    triggered: Object.keys(anomalies).length > 0,
    confidence: 1,
    error: null,
  };
}

export type DefiLlamaOnchainOptions = OnchainThresholds & {
  baseUrl: string;
};

export function createDefiLlamaOnchainTool(
  options: DefiLlamaOnchainOptions
): EvidenceTool<'onchain'> {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  return {
    name: 'onchain',
    description: 'Stablecoin circulating supply, 24h/7d change and redemption spikes.',
    schema: z.object({ asset: z.string().min(1) }),
    run: async (input: OnchainInput, ctx): Promise<ToolResultEnvelope> => {
      const symbol = input.asset.trim().toUpperCase();
      if (UNSUPPORTED_ASSETS.has(symbol)) {
        ctx.logger.debug(`DefiLlama skipped non-stablecoin: ${symbol}`);
        return failedEnvelope('DefiLlama', 'asset_type_not_supported');
      }

      const response = await fetch(`${baseUrl}/stablecoins?includePrices=true`, {
        headers: { Accept: 'application/json' },
        signal: ctx.signal,
      });
      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new Error(
          `DefiLlama stablecoins request failed (${response.status}): ${truncate(detail, 200)}`
        );
      }

      const parsed = StablecoinsSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('DefiLlama returned an unexpected stablecoins payload');
      }
      const entry = findPeggedAsset(parsed.data.peggedAssets, symbol);
      if (!entry) {
        return failedEnvelope('DefiLlama', 'asset_not_found');
      }
      return buildOnchainEnvelope(symbol, entry, options);
    },
  };
}
