/**
 * Planning Types
 *
 * Defines the tool plan produced per planning turn and the planner
 * interface the orchestration graph drives.
 */

import type { OrchestrationState } from '../orchestrator/types.js';
import type { ToolName } from '../tools/types.js';

/**
 * Which tools to call next, with their parameters.
 */
export interface ToolPlan {
  /**
   * Tool names in call order, deduplicated. Kept as raw strings: names
   * outside the supported set are skipped by the executor, not the parser.
   */
  tools: string[];

  /** Empty unless search is requested */
  searchKeywords: string;

  macroIndicators: string[];
  onchainAssets: string[];
  protocolSlugs: string[];

  reason: string;

  /** Advisory only; routing never reads it */
  confidence: number;
}

export type PlannerKind = 'structured' | 'cli' | 'text';

export interface PlannerCallOptions {
  timeoutMs?: number;
}

/**
 * Decision-making backend. Implementations never swallow their own errors:
 * PlanningError, TimeoutError and MalformedOutputError reach the caller.
 */
export interface Planner {
  readonly kind: PlannerKind;

  /**
   * Decide which of the available tools to call next.
   */
  plan(
    state: OrchestrationState,
    availableTools: ToolName[],
    options?: PlannerCallOptions
  ): Promise<ToolPlan>;

  /**
   * Combine all evidence into a final signal, returned as JSON text.
   */
  synthesize(state: OrchestrationState, options?: PlannerCallOptions): Promise<string>;

  /**
   * Produce a short search query for a forced search turn.
   */
  generateSearchKeywords(state: OrchestrationState, options?: PlannerCallOptions): Promise<string>;
}
