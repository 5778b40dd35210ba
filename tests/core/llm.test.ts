import Anthropic from '@anthropic-ai/sdk';
import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node-fetch')>()),
  default: vi.fn(),
}));

import fetch, { FetchError, Response } from 'node-fetch';

import {
  ConfigurationError,
  PlanningError,
  TimeoutError,
} from '../../src/core/errors.js';
import { AnthropicClient, OpenAiCompatibleClient } from '../../src/core/llm.js';

const fetchMock = vi.mocked(fetch);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function anthropicMessage(content: unknown[]) {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    model: 'claude-test',
    content,
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: { input_tokens: 1, output_tokens: 1 },
  };
}

describe('AnthropicClient', () => {
  it('requires an API key without an injected messages API', () => {
    expect(() => new AnthropicClient({ model: 'claude-test' })).toThrow(ConfigurationError);
  });

  it('joins text blocks and passes system prompts separately', async () => {
    const create = vi
      .fn()
      .mockResolvedValue(
        anthropicMessage([
          { type: 'text', text: '{"a":' },
          { type: 'text', text: ' 1}' },
        ])
      );
    const client = new AnthropicClient({ model: 'claude-test', messagesApi: { create } });

    const response = await client.complete(
      [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hello' },
      ],
      { maxTokens: 64, timeoutMs: 500 }
    );

    expect(response.content).toBe('{"a": 1}');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-test',
        max_tokens: 64,
        temperature: 0.2,
        system: 'be brief',
        messages: [{ role: 'user', content: 'hello' }],
      },
      { maxRetries: 0, timeout: 500 }
    );
  });

  it('forces the named tool and returns its input', async () => {
    const create = vi.fn().mockResolvedValue(
      anthropicMessage([
        {
          type: 'tool_use',
          id: 'toolu_test',
          name: 'decide_next_tools',
          input: { tools: ['price'], reason: 'check peg' },
        },
      ])
    );
    const client = new AnthropicClient({ model: 'claude-test', messagesApi: { create } });

    const response = await client.callFunction(
      [{ role: 'user', content: 'plan' }],
      {
        name: 'decide_next_tools',
        description: 'pick tools',
        parameters: { type: 'object', properties: {} },
      }
    );

    expect(response.functionCall).toEqual({
      name: 'decide_next_tools',
      arguments: { tools: ['price'], reason: 'check peg' },
    });
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      tool_choice: { type: 'tool', name: 'decide_next_tools' },
    });
  });

  it('maps SDK timeouts to TimeoutError', async () => {
    const create = vi.fn().mockRejectedValue(new Anthropic.APIConnectionTimeoutError());
    const client = new AnthropicClient({ model: 'claude-test', messagesApi: { create } });

    await expect(
      client.complete([{ role: 'user', content: 'hi' }], { timeoutMs: 50 })
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it('disables SDK retries so the timeout bounds the whole call', async () => {
    const create = vi.fn().mockResolvedValue(anthropicMessage([{ type: 'text', text: 'ok' }]));
    const client = new AnthropicClient({ model: 'claude-test', messagesApi: { create } });

    await client.complete([{ role: 'user', content: 'hi' }]);

    expect(create.mock.calls[0]?.[1]).toEqual({ maxRetries: 0 });
  });

  it('wraps transport failures in PlanningError', async () => {
    const cause = new Error('socket closed');
    const create = vi.fn().mockRejectedValue(cause);
    const client = new AnthropicClient({ model: 'claude-test', messagesApi: { create } });

    const error = await client
      .complete([{ role: 'user', content: 'hi' }])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({
      message: 'Anthropic request failed: socket closed',
      details: { backend: 'anthropic' },
      cause,
    });
  });
});

describe('OpenAiCompatibleClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  const client = () =>
    new OpenAiCompatibleClient({
      provider: 'deepseek',
      baseUrl: 'https://llm.example.test/v1/',
      apiKey: 'test-secret',
      model: 'test-model',
    });

  it('posts chat completions and trims the reply', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: '  {"tools": []}  ' } }] })
    );

    const response = await client().complete([{ role: 'user', content: 'plan' }]);

    expect(response).toEqual({ content: '{"tools": []}', model: 'test-model' });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.example.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
  });

  it('returns empty content when the reply has no choices', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

    const response = await client().complete([{ role: 'user', content: 'plan' }]);
    expect(response.content).toBe('');
  });

  it('throws PlanningError with the status on HTTP failure', async () => {
    fetchMock.mockResolvedValue(new Response('upstream unavailable', { status: 503 }));

    const error = await client()
      .complete([{ role: 'user', content: 'plan' }])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({
      message: 'deepseek request failed (503): upstream unavailable',
      details: { backend: 'deepseek', status: 503 },
    });
  });

  it('maps an aborted request to TimeoutError', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    fetchMock.mockRejectedValue(abort);

    await expect(
      client().complete([{ role: 'user', content: 'plan' }], { timeoutMs: 10 })
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it('wraps connection errors in PlanningError', async () => {
    fetchMock.mockRejectedValue(
      new FetchError('request to https://llm.example.test failed, reason: ECONNREFUSED', 'system')
    );

    const error = await client()
      .complete([{ role: 'user', content: 'plan' }])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({
      message:
        'deepseek request failed: request to https://llm.example.test failed, reason: ECONNREFUSED',
      details: { backend: 'deepseek' },
    });
  });

  it('wraps a non-JSON body in PlanningError', async () => {
    fetchMock.mockResolvedValue(new Response('<html>gateway</html>', { status: 200 }));

    const error = await client()
      .complete([{ role: 'user', content: 'plan' }])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ details: { backend: 'deepseek' } });
  });
});
