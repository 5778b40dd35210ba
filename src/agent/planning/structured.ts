/**
 * Structured Planner
 *
 * Function-calling backend: the model is forced to call `decide_next_tools`
 * and its typed arguments become the plan. Free-text replies still go
 * through the JSON extraction chain.
 */

import {
  AnthropicClient,
  type ChatMessage,
  type FunctionCallingClient,
  type FunctionSpec,
} from '../../core/llm.js';
import { Logger } from '../../core/logger.js';
import type { OrchestrationState } from '../orchestrator/types.js';
import { TOOL_NAMES, type ToolName } from '../tools/types.js';
import {
  emptyPlan,
  parseSearchKeywords,
  parseToolPlan,
  synthesisJson,
  toolPlanFromObject,
} from './plan.js';
import {
  PLANNER_SYSTEM_PROMPT,
  SYNTHESIS_SYSTEM_PROMPT,
  buildKeywordPrompt,
  buildPlannerPrompt,
  buildSynthesisPrompt,
} from './prompts.js';
import type { Planner, PlannerCallOptions, ToolPlan } from './types.js';

export const DECIDE_NEXT_TOOLS = 'decide_next_tools';

export function decideNextToolsSpec(availableTools: ToolName[]): FunctionSpec {
  const names = availableTools.length > 0 ? availableTools : [...TOOL_NAMES];
  return {
    name: DECIDE_NEXT_TOOLS,
    description: 'Decide which evidence tools to call next. Return an empty list to stop.',
    parameters: {
      type: 'object',
      properties: {
        tools: {
          type: 'array',
          items: { type: 'string', enum: names },
          description: 'Tools to call next; empty when evidence is sufficient',
        },
        search_keywords: {
          type: 'string',
          description: 'Search query, required when tools contains search',
        },
        macro_indicators: {
          type: 'array',
          items: { type: 'string' },
          description: 'Macro indicators such as CPI, FED_FUNDS, DXY, VIX',
        },
        onchain_assets: {
          type: 'array',
          items: { type: 'string' },
          description: 'Asset codes for on-chain liquidity checks',
        },
        protocol_slugs: {
          type: 'array',
          items: { type: 'string' },
          description: 'Protocol slugs for TVL checks',
        },
        reason: { type: 'string', description: 'Why these tools' },
      },
      required: ['tools', 'reason'],
    },
  };
}

export type StructuredPlannerSettings = {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
};

export class StructuredPlanner implements Planner {
  readonly kind = 'structured';
  private logger: Logger;

  /**
   * @param maxTokens - synthesis reply budget; the client's own default applies when unset
   */
  constructor(
    private client: FunctionCallingClient,
    logger?: Logger,
    private maxTokens?: number
  ) {
    this.logger = logger ?? new Logger('info');
  }

  async plan(
    state: OrchestrationState,
    availableTools: ToolName[],
    options?: PlannerCallOptions
  ): Promise<ToolPlan> {
    const messages: ChatMessage[] = [
      { role: 'system', content: PLANNER_SYSTEM_PROMPT },
      { role: 'user', content: buildPlannerPrompt(state, availableTools) },
    ];
    const response = await this.client.callFunction(messages, decideNextToolsSpec(availableTools), {
      temperature: 0.2,
      timeoutMs: options?.timeoutMs,
    });

    if (response.functionCall) {
      return toolPlanFromObject(response.functionCall.arguments);
    }
    if (response.text) {
      this.logger.debug('Structured planner returned text instead of a function call');
      return parseToolPlan(response.text);
    }
    return emptyPlan('No function call returned');
  }

  async synthesize(state: OrchestrationState, options?: PlannerCallOptions): Promise<string> {
    const response = await this.client.complete(
      [
        { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
        { role: 'user', content: buildSynthesisPrompt(state) },
      ],
      {
        temperature: 0.2,
        timeoutMs: options?.timeoutMs,
        ...(this.maxTokens ? { maxTokens: this.maxTokens } : {}),
      }
    );
    return synthesisJson(response.content, 'structured planner');
  }

  async generateSearchKeywords(
    state: OrchestrationState,
    options?: PlannerCallOptions
  ): Promise<string> {
    const response = await this.client.complete(
      [{ role: 'user', content: buildKeywordPrompt(state) }],
      { temperature: 0.2, timeoutMs: options?.timeoutMs, maxTokens: 128 }
    );
    return parseSearchKeywords(response.content);
  }
}

/**
 * Build a structured planner on the Anthropic SDK. Throws ConfigurationError
 * when no API key is available and no client is injected.
 */
export function createStructuredPlanner(
  settings: StructuredPlannerSettings,
  deps?: { client?: FunctionCallingClient; logger?: Logger }
): StructuredPlanner {
  const client =
    deps?.client ??
    new AnthropicClient({
      model: settings.model,
      apiKey: settings.apiKey,
      baseUrl: settings.baseUrl,
      maxTokens: settings.maxTokens,
    });
  return new StructuredPlanner(client, deps?.logger, settings.maxTokens);
}
