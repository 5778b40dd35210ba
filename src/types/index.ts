/**
 * Core type definitions for the deep analysis engine
 */

// ============================================================================
// Event Types
// ============================================================================

export const EVENT_TYPES = [
  'hack',
  'regulation',
  'listing',
  'partnership',
  'macro',
  'governance',
  'airdrop',
  'celebrity',
  'depeg',
  'liquidation',
  'other',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type SignalAction = 'buy' | 'sell' | 'observe';

/**
 * Inbound message as produced by the ingestion layer. Read-only.
 */
export interface EventPayload {
  text: string;
  translatedText?: string;
  source: string;
  keywordsHit: string[];
  language: string;
  timestamp?: string;
}

/**
 * Upstream classification produced before deep analysis runs. Read-only.
 */
export interface PreliminaryAnalysis {
  eventType: EventType;
  /** Asset code(s), comma separated. `NONE` when no asset applies. */
  asset: string;
  action: SignalAction;
  confidence: number;
  summary: string;
  keywords: string[];
}

// ============================================================================
// Signal Types
// ============================================================================

export const RISK_FLAGS = [
  'price_volatility',
  'liquidity_risk',
  'regulation_risk',
  'confidence_low',
  'data_incomplete',
  'data_conflict',
  'stale_event',
  'analysis_not_news',
  'vague_timeline',
  'speculative',
  'unverifiable',
] as const;

export type KnownRiskFlag = (typeof RISK_FLAGS)[number];

export type SignalDirection = 'long' | 'short' | 'neutral';
export type SignalStrength = 'low' | 'medium' | 'high';
export type SignalTimeframe = 'short' | 'medium' | 'long';

export interface FinalSignal {
  summary: string;
  eventType: EventType;
  asset: string;
  assetName?: string;
  action: SignalAction;
  direction: SignalDirection;
  confidence: number;
  strength: SignalStrength;
  timeframe: SignalTimeframe;
  /** Known flags plus any extra flag the backend reports. */
  riskFlags: string[];
  notes: string;
  links: string[];
}
