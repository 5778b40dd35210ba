/**
 * Text Planner
 *
 * Prompt-and-parse backend for any chat-completions compatible API.
 */

import { ConfigurationError, MalformedOutputError } from '../../core/errors.js';
import { OpenAiCompatibleClient, type ChatMessage, type LlmClient } from '../../core/llm.js';
import type { TextProvider } from '../../core/config.js';
import type { OrchestrationState } from '../orchestrator/types.js';
import type { ToolName } from '../tools/types.js';
import { parseSearchKeywords, parseToolPlan, synthesisJson } from './plan.js';
import {
  PLANNER_SYSTEM_PROMPT,
  SYNTHESIS_SYSTEM_PROMPT,
  buildKeywordPrompt,
  buildPlannerPrompt,
  buildSynthesisPrompt,
} from './prompts.js';
import type { Planner, PlannerCallOptions, ToolPlan } from './types.js';

const DEFAULT_BASE_URLS: Partial<Record<TextProvider, string>> = {
  openai: 'https://api.openai.com/v1',
  deepseek: 'https://api.deepseek.com/v1',
  qwen: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
};

export type TextPlannerSettings = {
  provider?: TextProvider;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
};

export function resolveTextBaseUrl(provider: TextProvider, baseUrl?: string): string {
  const resolved = baseUrl ?? DEFAULT_BASE_URLS[provider];
  if (!resolved) {
    throw new ConfigurationError(`Text planner provider "${provider}" requires a baseUrl`);
  }
  return resolved;
}

export class TextPlanner implements Planner {
  readonly kind = 'text';

  constructor(
    private client: LlmClient,
    private temperature = 0.2
  ) {}

  async plan(
    state: OrchestrationState,
    availableTools: ToolName[],
    options?: PlannerCallOptions
  ): Promise<ToolPlan> {
    const content = await this.ask(
      [
        { role: 'system', content: PLANNER_SYSTEM_PROMPT },
        { role: 'user', content: buildPlannerPrompt(state, availableTools) },
      ],
      options
    );
    return parseToolPlan(content);
  }

  async synthesize(state: OrchestrationState, options?: PlannerCallOptions): Promise<string> {
    const content = await this.ask(
      [
        { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
        { role: 'user', content: buildSynthesisPrompt(state) },
      ],
      options
    );
    return synthesisJson(content, 'text planner');
  }

  async generateSearchKeywords(
    state: OrchestrationState,
    options?: PlannerCallOptions
  ): Promise<string> {
    const content = await this.ask([{ role: 'user', content: buildKeywordPrompt(state) }], options);
    return parseSearchKeywords(content);
  }

  private async ask(messages: ChatMessage[], options?: PlannerCallOptions): Promise<string> {
    const response = await this.client.complete(messages, {
      temperature: this.temperature,
      timeoutMs: options?.timeoutMs,
    });
    const content = response.content.trim();
    if (!content) {
      throw new MalformedOutputError(
        `Text planner (${this.client.meta?.provider ?? 'unknown'}) returned an empty response`,
        response.content
      );
    }
    return content;
  }
}

/**
 * Validate settings and build a text planner. Provider, API key and model
 * are required; `generic` also needs a baseUrl.
 */
export function createTextPlanner(
  settings: TextPlannerSettings,
  deps?: { client?: LlmClient }
): TextPlanner {
  const { provider, apiKey, model } = settings;
  if (!provider) {
    throw new ConfigurationError('Text planner provider is not configured');
  }
  if (!apiKey) {
    throw new ConfigurationError(`Text planner API key is not configured for ${provider}`);
  }
  if (!model) {
    throw new ConfigurationError(`Text planner model is not configured for ${provider}`);
  }
  const baseUrl = resolveTextBaseUrl(provider, settings.baseUrl);

  const client =
    deps?.client ?? new OpenAiCompatibleClient({ provider, baseUrl, apiKey, model });
  return new TextPlanner(client, settings.temperature ?? 0.2);
}
