/**
 * Deep Analysis Orchestrator
 *
 * Runs one event through the graph:
 *   context_gather -> planner <-> executor -> synthesis -> terminal
 *
 * The executor is visited at most `maxToolCalls` times. Planner, tool and
 * memory failures degrade to "no evidence"; a synthesis failure ends the run
 * without a signal.
 */

import { toErrorMessage } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type { EventPayload, PreliminaryAnalysis } from '../../types/index.js';
import { contextGatherNode, executorNode, plannerNode, synthesisNode } from './nodes.js';
import { createOrchestrationState } from './state.js';
import type { DeepAnalysisDeps, DeepAnalysisResult, OrchestrationState } from './types.js';

export type PlannerRoute = 'executor' | 'synthesis';
export type ExecutorRoute = 'planner' | 'synthesis';

export function routeAfterPlanner(state: OrchestrationState): PlannerRoute {
  if (state.nextTools.length === 0) return 'synthesis';
  if (state.toolCallCount >= state.maxToolCalls) return 'synthesis';
  return 'executor';
}

export function routeAfterExecutor(state: OrchestrationState): ExecutorRoute {
  return state.toolCallCount >= state.maxToolCalls ? 'synthesis' : 'planner';
}

/**
 * Run the full graph and return the terminal state. Throws when synthesis
 * fails.
 */
export async function runDeepAnalysis(
  payload: EventPayload,
  preliminary: PreliminaryAnalysis,
  deps: DeepAnalysisDeps
): Promise<OrchestrationState> {
  const logger = deps.logger ?? new Logger('info');
  const nodeDeps = { ...deps, logger };

  let state = createOrchestrationState(payload, preliminary, deps.settings.maxToolCalls);
  logger.debug(
    `Deep analysis ${state.eventId} started (${preliminary.eventType}, max ${state.maxToolCalls} turns)`
  );

  state = await contextGatherNode(state, nodeDeps);

  for (;;) {
    state = await plannerNode(state, nodeDeps);
    if (routeAfterPlanner(state) === 'synthesis') break;

    state = await executorNode(state, nodeDeps);
    if (routeAfterExecutor(state) === 'synthesis') break;
  }

  state = await synthesisNode(state, nodeDeps);
  logger.info(
    `Deep analysis ${state.eventId} finished after ${state.toolCallCount} tool turn(s): ` +
      `${state.signal?.action ?? 'unknown'} @ ${state.signal?.confidence ?? 'n/a'}`
  );
  return state;
}

/**
 * Entry point for callers: never throws, never fabricates a signal.
 */
export async function analyzeEvent(
  payload: EventPayload,
  preliminary: PreliminaryAnalysis,
  deps: DeepAnalysisDeps
): Promise<DeepAnalysisResult> {
  try {
    const state = await runDeepAnalysis(payload, preliminary, deps);
    if (!state.signal) {
      return { success: false, error: new Error('Synthesis produced no signal') };
    }
    return { success: true, signal: state.signal, state };
  } catch (error) {
    const logger = deps.logger ?? new Logger('info');
    logger.error(`Deep analysis failed: ${toErrorMessage(error)}`);
    return {
      success: false,
      error: error instanceof Error ? error : new Error(toErrorMessage(error)),
    };
  }
}
