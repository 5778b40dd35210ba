/**
 * Macro Tool Adapter
 *
 * Latest macro indicator readings from FRED series observations, with
 * month-over-month, year-over-year and moving-average checks.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { ConfigurationError, truncate } from '../../../core/errors.js';
import { failedEnvelope, type EvidenceTool, type MacroInput, type ToolResultEnvelope } from '../types.js';

export type TriggerRules = {
  momPctThreshold?: number;
  yoyPctThreshold?: number;
  absoluteChangeThreshold?: number;
  levelThreshold?: number;
  deviationFromMaPct?: number;
  surprisePctThreshold?: number;
};

export type IndicatorSpec = {
  seriesId: string;
  name: string;
  unit: 'index' | 'percent';
  frequency: 'monthly' | 'daily';
  lookback: number;
  description: string;
  rules: TriggerRules;
};

export const MACRO_INDICATORS: Record<string, IndicatorSpec> = {
  CPI: {
    seriesId: 'CPIAUCSL',
    name: 'US CPI (urban consumers, seasonally adjusted)',
    unit: 'index',
    frequency: 'monthly',
    lookback: 14,
    description: 'Average change in prices paid by urban consumers',
    rules: { momPctThreshold: 0.3, yoyPctThreshold: 0.5, surprisePctThreshold: 0.2 },
  },
  CORE_CPI: {
    seriesId: 'CPILFESL',
    name: 'US core CPI (ex food and energy)',
    unit: 'index',
    frequency: 'monthly',
    lookback: 14,
    description: 'CPI excluding food and energy',
    rules: { momPctThreshold: 0.3, yoyPctThreshold: 0.5 },
  },
  FED_FUNDS: {
    seriesId: 'FEDFUNDS',
    name: 'Effective federal funds rate',
    unit: 'percent',
    frequency: 'monthly',
    lookback: 14,
    description: 'US effective federal funds rate',
    rules: { absoluteChangeThreshold: 0.25 },
  },
  UNEMPLOYMENT: {
    seriesId: 'UNRATE',
    name: 'US unemployment rate',
    unit: 'percent',
    frequency: 'monthly',
    lookback: 20,
    description: 'Unemployment rate published by the BLS',
    rules: { absoluteChangeThreshold: 0.3, yoyPctThreshold: 0.5 },
  },
  DXY: {
    seriesId: 'DTWEXBGS',
    name: 'Trade-weighted US dollar index',
    unit: 'index',
    frequency: 'daily',
    lookback: 90,
    description: 'Nominal broad trade-weighted dollar index',
    rules: { levelThreshold: 105, deviationFromMaPct: 1 },
  },
  VIX: {
    seriesId: 'VIXCLS',
    name: 'CBOE volatility index',
    unit: 'index',
    frequency: 'daily',
    lookback: 90,
    description: 'CBOE VIX implied volatility',
    rules: { levelThreshold: 25, deviationFromMaPct: 15 },
  },
};

const ObservationsSchema = z.object({
  observations: z.array(z.object({ date: z.string(), value: z.string() })).default([]),
});

export type Observation = { date: string; value: number };

/** FRED marks missing readings with "." */
function parseReading(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed || trimmed === '.') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function pctChange(current: number, base: number | null): number | null {
  if (base === null || base === 0) return null;
  return ((current - base) / base) * 100;
}

function exceeds(value: number | null, threshold: number | undefined): boolean {
  return threshold !== undefined && value !== null && Math.abs(value) >= threshold;
}

export type MacroMetrics = {
  value: number;
  previous: number | null;
  year_ago: number | null;
  change_abs: number | null;
  change_mom_pct: number | null;
  change_yoy_pct: number | null;
  moving_average: number | null;
  deviation_from_ma_pct: number | null;
  expectation: number | null;
  surprise: number | null;
  surprise_pct: number | null;
  release_time: string;
};

/**
 * Metrics over observations sorted newest first. Monthly series compare
 * against a 6-reading average, daily series against 30.
 */
export function computeMacroMetrics(
  spec: IndicatorSpec,
  observations: Observation[],
  expectation?: number
): MacroMetrics | null {
  const [latest, previousObs] = observations;
  if (!latest) return null;

  const value = latest.value;
  const previous = previousObs?.value ?? null;
  const yearAgo = observations[12]?.value ?? null;

  const window = observations.slice(0, spec.frequency === 'daily' ? 30 : 6);
  const movingAverage = window.reduce((sum, obs) => sum + obs.value, 0) / window.length;

  return {
    value,
    previous,
    year_ago: yearAgo,
    change_abs: previous === null ? null : value - previous,
    change_mom_pct: pctChange(value, previous),
    change_yoy_pct: pctChange(value, yearAgo),
    moving_average: movingAverage,
    deviation_from_ma_pct: pctChange(value, movingAverage),
    expectation: expectation ?? null,
    surprise: expectation === undefined ? null : value - expectation,
    surprise_pct: expectation === undefined ? null : pctChange(value, expectation),
    release_time: latest.date,
  };
}

/**
 * Only the anomalies that fired are returned.
 */
export function evaluateMacroTriggers(
  rules: TriggerRules,
  metrics: MacroMetrics
): Record<string, boolean> {
  const checks: Array<[string, boolean]> = [
    ['mom_spike', exceeds(metrics.change_mom_pct, rules.momPctThreshold)],
    ['yoy_spike', exceeds(metrics.change_yoy_pct, rules.yoyPctThreshold)],
    ['absolute_jump', exceeds(metrics.change_abs, rules.absoluteChangeThreshold)],
    [
      'level_extreme',
      rules.levelThreshold !== undefined && metrics.value >= rules.levelThreshold,
    ],
    [
      'moving_average_deviation',
      exceeds(metrics.deviation_from_ma_pct, rules.deviationFromMaPct),
    ],
    ['consensus_surprise', exceeds(metrics.surprise_pct, rules.surprisePctThreshold)],
  ];
  return Object.fromEntries(checks.filter(([, fired]) => fired));
}

export function buildMacroEnvelope(
  indicator: string,
  spec: IndicatorSpec,
  metrics: MacroMetrics
): ToolResultEnvelope {
  const anomalies = evaluateMacroTriggers(spec.rules, metrics);
  return {
    source: 'FRED',
    timestamp: new Date().toISOString(),
    success: true,
    data: {
      indicator,
      indicator_name: spec.name,
      series_id: spec.seriesId,
      frequency: spec.frequency,
      unit: spec.unit,
      release_time: metrics.release_time,
      metrics,
      anomalies,
      thresholds: spec.rules,
      notes: spec.description,
    },
    triggered: Object.keys(anomalies).length > 0,
    confidence: 1,
    error: null,
  };
}

export type FredMacroOptions = {
  apiKey?: string;
  baseUrl: string;
  /** Consensus forecasts by indicator, used for surprise checks */
  expectations?: Record<string, number>;
};

export function createFredMacroTool(options: FredMacroOptions): EvidenceTool<'macro'> {
  const apiKey = options.apiKey;
  if (!apiKey) {
    throw new ConfigurationError('FRED API key is not configured (FRED_API_KEY)');
  }
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const expectations = options.expectations ?? {};

  return {
    name: 'macro',
    description: `Latest macro indicator reading and its recent change (${Object.keys(
      MACRO_INDICATORS
    ).join(', ')}).`,
    schema: z.object({ indicator: z.string().min(1) }),
    run: async (input: MacroInput, ctx): Promise<ToolResultEnvelope> => {
      const indicator = input.indicator.trim().toUpperCase();
      const spec = MACRO_INDICATORS[indicator];
      if (!spec) {
        return failedEnvelope('FRED', 'indicator_not_supported');
      }

      const url = new URL(`${baseUrl}/series/observations`);
      url.searchParams.set('series_id', spec.seriesId);
      url.searchParams.set('limit', String(spec.lookback));
      url.searchParams.set('sort_order', 'desc');
      url.searchParams.set('file_type', 'json');
      url.searchParams.set('api_key', apiKey);

      const response = await fetch(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: ctx.signal,
      });
      if (response.status === 429) {
        ctx.logger.warn(`FRED rate limited: series=${spec.seriesId}`);
        return failedEnvelope('FRED', 'rate_limit');
      }
      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new Error(`FRED request failed (${response.status}): ${truncate(detail, 200)}`);
      }

      const parsed = ObservationsSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('FRED returned an unexpected response shape');
      }
      const observations = parsed.data.observations.flatMap((obs): Observation[] => {
        const value = parseReading(obs.value);
        return value === null ? [] : [{ date: obs.date, value }];
      });

      const metrics = computeMacroMetrics(spec, observations, expectations[indicator]);
      if (!metrics) {
        return failedEnvelope('FRED', 'no_observations');
      }
      ctx.logger.info(`FRED ok: indicator=${indicator} value=${metrics.value}`);
      return buildMacroEnvelope(indicator, spec, metrics);
    },
  };
}
