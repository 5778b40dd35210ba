/**
 * Planner factory
 *
 * Builds the configured planner backend. With a fallback configured, a
 * primary that cannot be constructed (missing key, bad provider) is logged
 * and replaced by the fallback.
 */

import type { EngineConfig } from '../../core/config.js';
import { ConfigurationError, toErrorMessage } from '../../core/errors.js';
import type { FunctionCallingClient, LlmClient } from '../../core/llm.js';
import { Logger } from '../../core/logger.js';
import { createCliPlanner } from './cli.js';
import { createStructuredPlanner } from './structured.js';
import { createTextPlanner } from './text.js';
import type { Planner } from './types.js';

export type PlannerFactoryDeps = {
  config: EngineConfig;
  logger?: Logger;
  /** Pre-built clients, used in place of network-backed ones */
  clients?: {
    structured?: FunctionCallingClient;
    text?: LlmClient;
  };
};

export function createPlanner(type: string, deps: PlannerFactoryDeps): Planner {
  const { config } = deps;
  const logger = deps.logger ?? new Logger('info');

  switch (type) {
    case 'structured':
      return createStructuredPlanner(config.planner.structured, {
        client: deps.clients?.structured,
        logger: logger.child('planner:structured'),
      });
    case 'cli':
      return createCliPlanner(config.planner.cli, logger.child('planner:cli'));
    case 'text':
      return createTextPlanner(config.planner.text, { client: deps.clients?.text });
    default:
      throw new ConfigurationError(`Unknown planner type: ${type}`);
  }
}

export function createPlannerWithFallback(
  primary: string,
  fallback: string | undefined,
  deps: PlannerFactoryDeps
): Planner {
  const logger = deps.logger ?? new Logger('info');
  try {
    return createPlanner(primary, deps);
  } catch (error) {
    if (!fallback || fallback === primary) {
      throw error;
    }
    logger.warn(
      `Planner "${primary}" unavailable (${toErrorMessage(error)}); falling back to "${fallback}"`
    );
    return createPlanner(fallback, deps);
  }
}
