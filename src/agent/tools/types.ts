/**
 * Evidence Tool Types
 *
 * Defines the evidence tool interface and the uniform result envelope the
 * orchestration graph consumes.
 */

import type { z } from 'zod';

import type { Logger } from '../../core/logger.js';

/**
 * Supported evidence tools.
 */
export const TOOL_NAMES = ['search', 'price', 'macro', 'onchain', 'protocol'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/**
 * Result envelope shared by every evidence tool.
 */
export interface ToolResultEnvelope {
  /** Provider that produced the result (e.g. Tavily, CoinGecko) */
  source: string;

  /** ISO timestamp of the call */
  timestamp: string;

  success: boolean;

  /** Tool-specific payload, null on failure */
  data: Record<string, unknown> | null;

  /** Provider confidence in [0, 1] */
  confidence: number;

  /** Anomaly / high-signal condition detected */
  triggered: boolean;

  error: string | null;
}

export interface SearchInput {
  keyword: string;
  maxResults: number;
  includeDomains?: string[];
}

export interface PriceInput {
  asset: string;
}

export interface MacroInput {
  indicator: string;
}

export interface OnchainInput {
  asset: string;
}

export interface ProtocolInput {
  slug: string;
}

export interface ToolInputMap {
  search: SearchInput;
  price: PriceInput;
  macro: MacroInput;
  onchain: OnchainInput;
  protocol: ProtocolInput;
}

/**
 * Context passed to tool execution.
 */
export interface ToolContext {
  /** Fires when the per-tool timeout is reached */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Definition of an evidence tool.
 */
export interface EvidenceTool<TName extends ToolName = ToolName> {
  name: TName;

  /** Human-readable description, shown to planners */
  description: string;

  /** Zod schema for input validation */
  schema: z.ZodType<ToolInputMap[TName]>;

  run(input: ToolInputMap[TName], ctx: ToolContext): Promise<ToolResultEnvelope>;
}

/**
 * Record of a tool execution for state tracking.
 */
export interface ToolExecution {
  toolName: ToolName;
  input: unknown;
  result: ToolResultEnvelope;
  timestamp: string;
  durationMs: number;
}

export function failedEnvelope(source: string, error: string): ToolResultEnvelope {
  return {
    source,
    timestamp: new Date().toISOString(),
    success: false,
    data: null,
    confidence: 0,
    triggered: false,
    error,
  };
}
