import Anthropic from '@anthropic-ai/sdk';
import fetch from 'node-fetch';
import { z } from 'zod';

import type {
  Message,
  MessageCreateParamsNonStreaming,
  MessageParam,
  TextBlock,
  Tool,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';

import {
  ConfigurationError,
  EngineError,
  PlanningError,
  TimeoutError,
  toErrorMessage,
  truncate,
} from './errors.js';
import { isAbortError } from './timeout.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export type LlmClientOptions = {
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
};

export type LlmClientMeta = {
  provider: 'anthropic' | 'openai' | 'deepseek' | 'qwen' | 'generic';
  model: string;
};

export interface LlmClient {
  complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse>;
  meta?: LlmClientMeta;
}

export type FunctionSpec = {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

export type FunctionCallResponse = {
  functionCall: { name: string; arguments: Record<string, unknown> } | null;
  text: string;
  model: string;
};

/**
 * Client that can force a single typed function call.
 */
export interface FunctionCallingClient extends LlmClient {
  callFunction(
    messages: ChatMessage[],
    fn: FunctionSpec,
    options?: LlmClientOptions
  ): Promise<FunctionCallResponse>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Anthropic
// ============================================================================

/**
 * The slice of the SDK this module calls; tests pass a stand-in.
 */
export interface AnthropicMessagesApi {
  create(
    body: MessageCreateParamsNonStreaming,
    options?: { timeout?: number; maxRetries?: number }
  ): Promise<Message>;
}

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  messagesApi?: AnthropicMessagesApi;
};

export class AnthropicClient implements FunctionCallingClient {
  private messagesApi: AnthropicMessagesApi;
  private model: string;
  private maxTokens: number;
  meta: LlmClientMeta;

  constructor(options: AnthropicClientOptions) {
    if (options.messagesApi) {
      this.messagesApi = options.messagesApi;
    } else {
      if (!options.apiKey) {
        throw new ConfigurationError('Anthropic API key is not configured (ANTHROPIC_API_KEY)');
      }
      // SDK retries would stretch a call past its timeout
      const client = new Anthropic({
        apiKey: options.apiKey,
        maxRetries: 0,
        ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      });
      this.messagesApi = client.messages;
    }
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1024;
    this.meta = { provider: 'anthropic', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const response = await this.send(this.buildParams(messages, options), options);
    return { content: collectText(response), model: this.model };
  }

  async callFunction(
    messages: ChatMessage[],
    fn: FunctionSpec,
    options?: LlmClientOptions
  ): Promise<FunctionCallResponse> {
    const tool: Tool = {
      name: fn.name,
      description: fn.description,
      input_schema: fn.parameters,
    };
    const response = await this.send(
      {
        ...this.buildParams(messages, options),
        tools: [tool],
        tool_choice: { type: 'tool', name: fn.name },
      },
      options
    );

    const toolUse = response.content.find(
      (block): block is ToolUseBlock => block.type === 'tool_use' && block.name === fn.name
    );
    return {
      functionCall: toolUse
        ? { name: toolUse.name, arguments: isRecord(toolUse.input) ? toolUse.input : {} }
        : null,
      text: collectText(response),
      model: this.model,
    };
  }

  private buildParams(
    messages: ChatMessage[],
    options?: LlmClientOptions
  ): MessageCreateParamsNonStreaming {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const converted: MessageParam[] = [];
    for (const msg of messages) {
      if (msg.role === 'user' || msg.role === 'assistant') {
        converted.push({ role: msg.role, content: msg.content });
      }
    }
    return {
      model: this.model,
      max_tokens: options?.maxTokens ?? this.maxTokens,
      temperature: options?.temperature ?? 0.2,
      ...(system ? { system } : {}),
      messages: converted,
    };
  }

  private async send(
    params: MessageCreateParamsNonStreaming,
    options?: LlmClientOptions
  ): Promise<Message> {
    const timeoutMs = options?.timeoutMs;
    try {
      return await this.messagesApi.create(params, {
        maxRetries: 0,
        ...(timeoutMs && timeoutMs > 0 ? { timeout: timeoutMs } : {}),
      });
    } catch (error) {
      if (error instanceof Anthropic.APIConnectionTimeoutError) {
        throw new TimeoutError(
          `Anthropic request timed out after ${timeoutMs ?? 0}ms`,
          timeoutMs ?? 0,
          { cause: error }
        );
      }
      if (error instanceof Anthropic.APIError) {
        throw new PlanningError(
          `Anthropic request failed: ${truncate(error.message, 200)}`,
          { backend: 'anthropic', status: error.status },
          { cause: error }
        );
      }
      throw new PlanningError(
        `Anthropic request failed: ${truncate(toErrorMessage(error), 200)}`,
        { backend: 'anthropic' },
        { cause: error }
      );
    }
  }
}

function collectText(response: Message): string {
  return response.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('')
    .trim();
}

// ============================================================================
// OpenAI-compatible chat completions
// ============================================================================

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .default([]),
});

export type OpenAiCompatibleOptions = {
  provider: LlmClientMeta['provider'];
  baseUrl: string;
  apiKey: string;
  model: string;
};

export class OpenAiCompatibleClient implements LlmClient {
  private baseUrl: string;
  private apiKey: string;
  private model: string;
  meta: LlmClientMeta;

  constructor(options: OpenAiCompatibleOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.meta = { provider: options.provider, model: options.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const controller = new AbortController();
    const timeoutMs = options?.timeoutMs;
    let timeout: NodeJS.Timeout | null = null;
    if (timeoutMs && timeoutMs > 0) {
      timeout = setTimeout(() => controller.abort(), timeoutMs);
    }

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: controller.signal,
        body: JSON.stringify({
          model: this.model,
          temperature: options?.temperature ?? 0.2,
          ...(typeof options?.maxTokens === 'number' ? { max_tokens: options.maxTokens } : {}),
          messages,
        }),
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new PlanningError(
          `${this.meta.provider} request failed (${response.status}): ${
            truncate(detail, 200) || 'no response body'
          }`,
          { backend: this.meta.provider, status: response.status }
        );
      }

      const parsed = ChatCompletionSchema.safeParse(await response.json());
      const text = parsed.success ? parsed.data.choices[0]?.message.content?.trim() ?? '' : '';
      return { content: text, model: this.model };
    } catch (error) {
      if (error instanceof EngineError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new TimeoutError(
          `${this.meta.provider} request timed out after ${timeoutMs ?? 0}ms`,
          timeoutMs ?? 0,
          { cause: error }
        );
      }
      throw new PlanningError(
        `${this.meta.provider} request failed: ${truncate(toErrorMessage(error), 200)}`,
        { backend: this.meta.provider },
        { cause: error }
      );
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }
}
