/**
 * Price Tool Adapter
 *
 * Price snapshot from CoinGecko with depeg and volatility checks.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { truncate } from '../../../core/errors.js';
import type { EvidenceTool, PriceInput, ToolResultEnvelope } from '../types.js';

const STABLECOINS = new Set([
  'usdc',
  'usdt',
  'dai',
  'frax',
  'busd',
  'tusd',
  'usdd',
  'gusd',
  'usdp',
  'pyusd',
  'susd',
  'lusd',
  'usde',
  'fdusd',
  'eurc',
]);

const DEFAULT_ASSET_IDS: Record<string, string> = {
  btc: 'bitcoin',
  eth: 'ethereum',
  sol: 'solana',
  bnb: 'binancecoin',
  xrp: 'ripple',
  usdc: 'usd-coin',
  usdt: 'tether',
  dai: 'dai',
};

/** |24h change| above threshold x this multiplier counts as a spike */
const VOLATILITY_SPIKE_MULTIPLIER = 5;

const SimplePriceSchema = z.record(
  z.string(),
  z.object({
    usd: z.number(),
    usd_24h_change: z.number().nullable().optional(),
    usd_24h_vol: z.number().nullable().optional(),
  })
);

export type PriceSnapshotInput = {
  asset: string;
  priceUsd: number;
  change24hPct: number | null;
  volume24hUsd: number | null;
};

export type PriceThresholds = {
  deviationThresholdPct: number;
  stablecoinTolerancePct: number;
};

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

export function buildPriceEnvelope(
  snapshot: PriceSnapshotInput,
  thresholds: PriceThresholds
): ToolResultEnvelope {
  const symbol = snapshot.asset.toLowerCase();
  const isStablecoin = STABLECOINS.has(symbol);
  const deviationPct = isStablecoin ? round4(Math.abs(snapshot.priceUsd - 1) * 100) : null;
  const change = snapshot.change24hPct;

  const priceDepeg = deviationPct !== null && deviationPct > thresholds.stablecoinTolerancePct;
  const volatilitySpike =
    change !== null &&
    Math.abs(change) >= thresholds.deviationThresholdPct * VOLATILITY_SPIKE_MULTIPLIER;

  const notes: string[] = [];
  if (priceDepeg) notes.push(`stablecoin ${deviationPct}% away from peg`);
  if (volatilitySpike) notes.push(`24h move of ${round4(change ?? 0)}%`);

  return {
    source: 'CoinGecko',
    timestamp: new Date().toISOString(),
    success: true,
    data: {
      asset: snapshot.asset.toUpperCase(),
      metrics: {
        price_usd: snapshot.priceUsd,
        deviation_pct: deviationPct,
        price_change_24h_pct: change,
        volume_24h_usd: snapshot.volume24hUsd,
        volatility_24h: change === null ? null : round4(Math.abs(change)),
      },
      anomalies: {
        price_depeg: priceDepeg,
        volatility_spike: volatilitySpike,
        funding_extreme: false,
      },
      notes: notes.join('; '),
    },
    triggered: priceDepeg || volatilitySpike,
    confidence: 0.9,
    error: null,
  };
}

export type CoinGeckoPriceOptions = PriceThresholds & {
  baseUrl: string;
  apiKey?: string;
  assetIds?: Record<string, string>;
};

export function createCoinGeckoPriceTool(options: CoinGeckoPriceOptions): EvidenceTool<'price'> {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const assetIds: Record<string, string> = { ...DEFAULT_ASSET_IDS };
  for (const [symbol, id] of Object.entries(options.assetIds ?? {})) {
    assetIds[symbol.toLowerCase()] = id;
  }

  return {
    name: 'price',
    description: 'Fetch the current USD price, 24h change and volume; flags depegs and spikes.',
    schema: z.object({ asset: z.string().min(1) }),
    run: async (input: PriceInput, ctx): Promise<ToolResultEnvelope> => {
      const symbol = input.asset.toLowerCase();
      const coinId = assetIds[symbol] ?? symbol;
      const url = new URL(`${baseUrl}/simple/price`);
      url.searchParams.set('ids', coinId);
      url.searchParams.set('vs_currencies', 'usd');
      url.searchParams.set('include_24hr_change', 'true');
      url.searchParams.set('include_24hr_vol', 'true');

      const response = await fetch(url.toString(), {
        headers: {
          Accept: 'application/json',
          ...(options.apiKey ? { 'x-cg-demo-api-key': options.apiKey } : {}),
        },
        signal: ctx.signal,
      });
      if (response.status === 429) {
        ctx.logger.warn(`CoinGecko rate limited: asset=${symbol}`);
        return {
          source: 'CoinGecko',
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
        throw new Error(`CoinGecko request failed (${response.status}): ${truncate(detail, 200)}`);
      }

      const parsed = SimplePriceSchema.safeParse(await response.json());
      const quote = parsed.success ? parsed.data[coinId] : undefined;
      if (!quote) {
        return {
          source: 'CoinGecko',
          timestamp: new Date().toISOString(),
          success: false,
          data: null,
          confidence: 0,
          triggered: false,
          error: 'asset_not_supported',
        };
      }

      return buildPriceEnvelope(
        {
          asset: input.asset,
          priceUsd: quote.usd,
          change24hPct: quote.usd_24h_change ?? null,
          volume24hUsd: quote.usd_24h_vol ?? null,
        },
        options
      );
    },
  };
}
