import type { OrchestrationState } from '../orchestrator/types.js';
import type { ToolResultEnvelope } from '../tools/types.js';

type Data = Record<string, unknown>;

function isRecord(value: unknown): value is Data {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(data: Data | null | undefined, key: string): unknown {
  return data ? data[key] : undefined;
}

function text(value: unknown, fallback = 'N/A'): string {
  if (value === null || value === undefined || value === '') return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function record(value: unknown): Data {
  return isRecord(value) ? value : {};
}

export function formatSearchBrief(envelope: ToolResultEnvelope | undefined): string {
  if (!envelope?.data) return 'none';
  const data = envelope.data;
  return [
    `keyword: ${text(field(data, 'keyword'), 'unknown')}`,
    `results: ${text(field(data, 'source_count'), '0')}`,
    `multi_source=${text(field(data, 'multi_source'), 'false')}`,
    `official_confirmed=${text(field(data, 'official_confirmed'), 'false')}`,
  ].join('; ');
}

export function formatSearchDetail(envelope: ToolResultEnvelope | undefined): string {
  if (!envelope?.success || !envelope.data) return 'No search results (not run or failed)';
  const data = envelope.data;
  const results = field(data, 'results');
  const lines = [
    `Keyword: ${text(field(data, 'keyword'))}`,
    `Result count: ${text(field(data, 'source_count'), '0')}`,
    `Multi-source confirmed: ${text(field(data, 'multi_source'), 'false')}`,
    `Official confirmation: ${text(field(data, 'official_confirmed'), 'false')}`,
    `Sentiment: ${text(field(data, 'sentiment'), '{}')}`,
    '',
    'Top results:',
  ];
  if (Array.isArray(results)) {
    results.slice(0, 3).forEach((item, index) => {
      const hit = record(item);
      lines.push(
        `${index + 1}. ${text(hit.title)} (source: ${text(hit.source)}, score: ${text(
          hit.score,
          '0'
        )})`
      );
    });
  }
  return lines.join('\n');
}

export function formatPriceDetail(envelope: ToolResultEnvelope | undefined): string {
  if (!envelope?.success || !envelope.data) return 'No price data (not run or failed)';
  const data = envelope.data;
  const metrics = record(field(data, 'metrics'));
  const anomalies = record(field(data, 'anomalies'));
  return [
    `Asset: ${text(field(data, 'asset'))}`,
    `Price: $${text(metrics.price_usd)}`,
    `Deviation from peg: ${text(metrics.deviation_pct)}%`,
    `24h change: ${text(metrics.price_change_24h_pct)}%`,
    `24h volume: $${text(metrics.volume_24h_usd)}`,
    `24h volatility: ${text(metrics.volatility_24h)}%`,
    '',
    'Anomalies:',
    `- stablecoin depeg: ${text(anomalies.price_depeg, 'false')}`,
    `- volatility spike: ${text(anomalies.volatility_spike, 'false')}`,
    `- extreme funding: ${text(anomalies.funding_extreme, 'false')}`,
    '',
    `Notes: ${text(field(data, 'notes'), '')}`,
  ].join('\n');
}

/**
 * Macro, on-chain and protocol payloads have no fixed shape; show them as
 * compact JSON with the envelope flags.
 */
export function formatGenericDetail(label: string, envelope: ToolResultEnvelope | undefined): string {
  if (!envelope?.success || !envelope.data) return `No ${label} data (not run or failed)`;
  return [
    `Source: ${envelope.source}`,
    `Triggered: ${envelope.triggered}`,
    `Confidence: ${envelope.confidence}`,
    `Data: ${JSON.stringify(envelope.data)}`,
  ].join('\n');
}

function status(envelope: ToolResultEnvelope | undefined): string {
  if (!envelope) return 'none';
  return envelope.triggered ? 'collected (anomaly flagged)' : 'collected';
}

/**
 * One line per tool, for planning prompts.
 */
export function formatEvidenceBrief(state: OrchestrationState): string {
  const { evidence } = state;
  return [
    `- Historical memory: ${state.memoryEvidence.formatted || 'none'}`,
    `- Search: ${formatSearchBrief(evidence.search)}`,
    `- Price: ${status(evidence.price)}`,
    `- Macro: ${status(evidence.macro)}`,
    `- On-chain: ${status(evidence.onchain)}`,
    `- Protocol: ${status(evidence.protocol)}`,
  ].join('\n');
}

/**
 * Full evidence sections, for the synthesis prompt.
 */
export function formatEvidenceDetail(state: OrchestrationState): string {
  const { evidence } = state;
  return [
    '[Search evidence]',
    formatSearchDetail(evidence.search),
    '',
    '[Price evidence]',
    formatPriceDetail(evidence.price),
    '',
    '[Macro evidence]',
    formatGenericDetail('macro', evidence.macro),
    '',
    '[On-chain evidence]',
    formatGenericDetail('on-chain', evidence.onchain),
    '',
    '[Protocol evidence]',
    formatGenericDetail('protocol', evidence.protocol),
  ].join('\n');
}
