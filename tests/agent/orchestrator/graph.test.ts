import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

vi.mock('../../../src/core/process.js', () => ({
  runProcess: vi.fn(),
}));

import {
  analyzeEvent,
  routeAfterExecutor,
  routeAfterPlanner,
  runDeepAnalysis,
} from '../../../src/agent/orchestrator/orchestrator.js';
import { DailyToolQuota } from '../../../src/agent/orchestrator/quota.js';
import type { DeepAnalysisDeps } from '../../../src/agent/orchestrator/types.js';
import { CliPlanner } from '../../../src/agent/planning/cli.js';
import { createToolPlan } from '../../../src/agent/planning/plan.js';
import { MalformedOutputError } from '../../../src/core/errors.js';
import { runProcess } from '../../../src/core/process.js';
import { disabledMemoryFetcher } from '../../../src/memory/fetcher.js';
import type { MemoryFetcher } from '../../../src/memory/types.js';
import {
  ScriptedPlanner,
  envelope,
  makePayload,
  makePreliminary,
  makeRegistry,
  makeSettings,
  makeState,
  quietLogger,
  stubTool,
} from '../../helpers/fixtures.js';

const searchSchema = z.object({
  keyword: z.string().min(1),
  maxResults: z.number().int(),
  includeDomains: z.array(z.string()).optional(),
});
const priceSchema = z.object({ asset: z.string().min(1) });

const searchTool = (success = true) =>
  stubTool('search', searchSchema, ({ keyword }) =>
    envelope({ source: 'Tavily', success, data: success ? { keyword } : null })
  );
const priceTool = () =>
  stubTool('price', priceSchema, ({ asset }) => envelope({ source: 'CoinGecko', data: { asset } }));

function makeDeps(overrides: Partial<DeepAnalysisDeps> = {}): DeepAnalysisDeps {
  return {
    planner: new ScriptedPlanner(),
    tools: makeRegistry(),
    memory: disabledMemoryFetcher,
    quota: new DailyToolQuota(100),
    settings: makeSettings(),
    logger: quietLogger,
    ...overrides,
  };
}

describe('routing', () => {
  it('goes to synthesis when the plan is empty or turns are spent', () => {
    expect(routeAfterPlanner(makeState({ nextTools: [] }))).toBe('synthesis');
    expect(routeAfterPlanner(makeState({ nextTools: ['search'], toolCallCount: 3 }))).toBe(
      'synthesis'
    );
    expect(routeAfterPlanner(makeState({ nextTools: ['search'], toolCallCount: 2 }))).toBe(
      'executor'
    );
  });

  it('returns to the planner until the turn limit', () => {
    expect(routeAfterExecutor(makeState({ toolCallCount: 1 }))).toBe('planner');
    expect(routeAfterExecutor(makeState({ toolCallCount: 3 }))).toBe('synthesis');
  });
});

describe('analyzeEvent', () => {
  it('forces one search for a hack and synthesizes a signal', async () => {
    const search = stubTool('search', searchSchema, ({ keyword }) =>
      envelope({
        source: 'Tavily',
        data: { keyword, source_count: 4, multi_source: true, official_confirmed: true },
        triggered: true,
      })
    );
    const planner = new ScriptedPlanner(
      [],
      '{"summary": "Bridge exploit confirmed by several outlets", "action": "sell", ' +
        '"confidence": 0.78, "risk_flags": ["price_volatility"]}'
    );
    const quota = new DailyToolQuota(10);
    const deps = makeDeps({ planner, quota, tools: makeRegistry([search]) });

    const result = await analyzeEvent(makePayload(), makePreliminary({ confidence: 0.6 }), deps);

    if (!result.success) throw result.error;
    expect(result.signal.confidence).toBeGreaterThanOrEqual(0.75);
    expect(result.signal.confidence).toBeLessThanOrEqual(0.8);
    expect(result.signal.riskFlags).not.toContain('data_incomplete');
    expect(result.signal).toMatchObject({
      action: 'sell',
      direction: 'short',
      eventType: 'hack',
      asset: 'USDC',
      riskFlags: ['price_volatility'],
    });
    expect(result.state.trace).toEqual([
      'context_gather',
      'planner',
      'executor',
      'planner',
      'synthesis',
      'terminal',
    ]);
    expect(search.inputs).toEqual([{ keyword: 'exploit usdc bridge', maxResults: 5 }]);
    expect(result.state.evidence.search?.source).toBe('Tavily');
    expect(result.state.toolCallCount).toBe(1);
    expect(planner.planCalls).toHaveLength(0);
    expect(planner.synthesizeCalls).toHaveLength(1);
    expect(planner.synthesizeCalls[0]?.evidence.search?.data).toMatchObject({
      multi_source: true,
      official_confirmed: true,
    });
    expect(quota.status().used).toBe(1);
  });

  it('restricts forced search to the configured domains', async () => {
    const search = searchTool();
    const deps = makeDeps({
      tools: makeRegistry([search]),
      settings: makeSettings({ search: { maxResults: 3, eventDomains: { hack: ['coindesk.com'] } } }),
    });

    await runDeepAnalysis(makePayload(), makePreliminary(), deps);

    expect(search.inputs).toEqual([
      { keyword: 'exploit usdc bridge', maxResults: 3, includeDomains: ['coindesk.com'] },
    ]);
  });

  it('skips planning entirely for governance events', async () => {
    const search = searchTool();
    const planner = new ScriptedPlanner([createToolPlan({ tools: ['search'] })]);
    const deps = makeDeps({ planner, tools: makeRegistry([search]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'governance', asset: 'UNI' }),
      deps
    );

    expect(planner.planCalls).toHaveLength(0);
    expect(search.inputs).toEqual([]);
    expect(state.toolCallCount).toBe(0);
    expect(state.trace).toEqual(['context_gather', 'planner', 'synthesis', 'terminal']);
    expect(state.lastPlan?.reason).toBe('Event type governance never needs evidence');
  });

  it('asks the planner again when a forced search fails', async () => {
    const search = searchTool(false);
    const planner = new ScriptedPlanner();
    const deps = makeDeps({ planner, tools: makeRegistry([search]) });

    const state = await runDeepAnalysis(makePayload(), makePreliminary(), deps);

    expect(state.evidence).toEqual({});
    expect(state.toolExecutions).toHaveLength(1);
    expect(planner.planCalls).toHaveLength(1);
    expect(planner.planCalls[0]?.toolCallCount).toBe(1);
  });

  it('runs every planned tool in one turn', async () => {
    const search = searchTool();
    const price = priceTool();
    const planner = new ScriptedPlanner([
      createToolPlan({ tools: ['search', 'price'], searchKeywords: 'usdc listing binance' }),
    ]);
    const deps = makeDeps({ planner, tools: makeRegistry([search, price]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(search.inputs).toEqual([{ keyword: 'usdc listing binance', maxResults: 5 }]);
    expect(price.inputs).toEqual([{ asset: 'USDC' }]);
    expect(Object.keys(state.evidence).sort()).toEqual(['price', 'search']);
    expect(state.toolCallCount).toBe(1);
    expect(state.searchKeywords).toBe('usdc listing binance');
  });

  it('stops after the configured number of executor turns', async () => {
    const price = priceTool();
    const planner = new ScriptedPlanner([
      createToolPlan({ tools: ['price'] }),
      createToolPlan({ tools: ['price'] }),
      createToolPlan({ tools: ['price'] }),
    ]);
    const deps = makeDeps({
      planner,
      tools: makeRegistry([price]),
      settings: makeSettings({ maxToolCalls: 2 }),
    });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(state.toolCallCount).toBe(2);
    expect(price.inputs).toHaveLength(2);
    expect(planner.planCalls).toHaveLength(2);
    expect(state.trace).toEqual([
      'context_gather',
      'planner',
      'executor',
      'planner',
      'executor',
      'synthesis',
      'terminal',
    ]);
  });

  it('keeps earlier evidence when a later turn fails and replaces it on success', async () => {
    let call = 0;
    const price = stubTool('price', priceSchema, () => {
      call += 1;
      if (call === 2) {
        return envelope({ source: 'CoinGecko', success: false, data: null, error: 'HTTP 502' });
      }
      return envelope({ source: 'CoinGecko', data: { price_usd: call === 1 ? 1.0 : 0.97 } });
    });
    const planner = new ScriptedPlanner([
      createToolPlan({ tools: ['price'] }),
      createToolPlan({ tools: ['price'] }),
      createToolPlan({ tools: ['price'] }),
    ]);
    const deps = makeDeps({ planner, tools: makeRegistry([price]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(price.inputs).toHaveLength(3);
    expect(planner.planCalls.map((planned) => planned.evidence.price?.data)).toEqual([
      undefined,
      { price_usd: 1.0 },
      { price_usd: 1.0 },
    ]);
    expect(state.evidence.price?.data).toEqual({ price_usd: 0.97 });
    expect(planner.synthesizeCalls[0]?.evidence.price?.data).toEqual({ price_usd: 0.97 });
    expect(state.toolExecutions.map((execution) => execution.result.success)).toEqual([
      true,
      false,
      true,
    ]);
  });

  it('never visits the executor when no turns are allowed', async () => {
    const search = searchTool();
    const deps = makeDeps({
      tools: makeRegistry([search]),
      settings: makeSettings({ maxToolCalls: 0 }),
    });

    const state = await runDeepAnalysis(makePayload(), makePreliminary(), deps);

    expect(state.nextTools).toEqual(['search']);
    expect(search.inputs).toEqual([]);
    expect(state.trace).toEqual(['context_gather', 'planner', 'synthesis', 'terminal']);
  });

  it('spends turns without running tools once the daily quota is gone', async () => {
    const price = priceTool();
    const planner = new ScriptedPlanner([
      createToolPlan({ tools: ['price'] }),
      createToolPlan({ tools: ['price'] }),
    ]);
    const deps = makeDeps({
      planner,
      tools: makeRegistry([price]),
      quota: new DailyToolQuota(0),
      settings: makeSettings({ maxToolCalls: 2 }),
    });

    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    if (!result.success) throw result.error;
    expect(price.inputs).toEqual([]);
    expect(result.state.toolCallCount).toBe(2);
    expect(result.state.warnings).toEqual([
      'Daily tool quota exhausted (0 turns)',
      'Daily tool quota exhausted (0 turns)',
    ]);
  });

  it('skips unknown and uninitialized tools', async () => {
    const price = priceTool();
    const planner = new ScriptedPlanner([
      createToolPlan({ tools: ['price', 'teleport', 'macro', 'price'] }),
    ]);
    const deps = makeDeps({ planner, tools: makeRegistry([price]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(price.inputs).toEqual([{ asset: 'USDC' }]);
    expect(state.warnings).toEqual(['Unknown tool: teleport', 'Tool not initialized: macro']);
  });

  it('does not run registered tools that are disabled', async () => {
    const search = searchTool();
    const price = priceTool();
    const planner = new ScriptedPlanner([createToolPlan({ tools: ['search', 'price'] })]);
    const deps = makeDeps({
      planner,
      tools: makeRegistry([search, price]),
      settings: makeSettings({ enabledTools: ['price'] }),
    });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(search.inputs).toEqual([]);
    expect(price.inputs).toHaveLength(1);
    expect(state.warnings).toEqual(['Tool not initialized: search']);
  });

  it('skips the price tool when the event has no asset', async () => {
    const price = priceTool();
    const planner = new ScriptedPlanner([createToolPlan({ tools: ['price'] })]);
    const deps = makeDeps({ planner, tools: makeRegistry([price]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing', asset: 'NONE' }),
      deps
    );

    expect(price.inputs).toEqual([]);
    expect(state.warnings).toEqual(['Skipped price: event has no asset']);
    expect(state.toolCallCount).toBe(1);
  });

  it('goes straight to synthesis when no tools are available', async () => {
    const planner = new ScriptedPlanner([createToolPlan({ tools: ['price'] })]);
    const deps = makeDeps({ planner });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(planner.planCalls).toHaveLength(0);
    expect(state.lastPlan?.reason).toBe('No evidence tools available');
  });

  it('degrades a planner failure to an empty plan', async () => {
    const planner = new ScriptedPlanner([new Error('backend unavailable')]);
    const deps = makeDeps({ planner, tools: makeRegistry([priceTool()]) });

    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    if (!result.success) throw result.error;
    expect(result.state.toolCallCount).toBe(0);
    expect(result.state.lastPlan?.reason).toBe('Planner failed: backend unavailable');
  });

  it('fails without a signal when synthesis fails', async () => {
    const planner = new ScriptedPlanner([], new Error('model offline'));
    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'governance' }),
      makeDeps({ planner })
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('model offline');
  });

  it('fails when synthesis output has no confidence', async () => {
    const planner = new ScriptedPlanner([], '{"summary": "no score"}');
    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'governance' }),
      makeDeps({ planner })
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MalformedOutputError);
  });
});

describe('forced search keywords', () => {
  it('asks the planner when keyword generation is on', async () => {
    const search = searchTool();
    const planner = new ScriptedPlanner([], undefined, '  circle usdc bridge hack ');
    const deps = makeDeps({
      planner,
      tools: makeRegistry([search]),
      settings: makeSettings({ keywordGeneration: true }),
    });

    await runDeepAnalysis(makePayload(), makePreliminary(), deps);

    expect(planner.keywordCalls).toBe(1);
    expect(search.inputs[0]?.keyword).toBe('circle usdc bridge hack');
  });

  it('falls back to the event keywords when generation fails', async () => {
    const search = searchTool();
    const planner = new ScriptedPlanner([], undefined, new Error('rate limited'));
    const deps = makeDeps({
      planner,
      tools: makeRegistry([search]),
      settings: makeSettings({ keywordGeneration: true }),
    });

    await runDeepAnalysis(makePayload(), makePreliminary(), deps);

    expect(planner.keywordCalls).toBe(1);
    expect(search.inputs[0]?.keyword).toBe('exploit usdc bridge');
  });

  it('uses asset and event type when the event has no keywords', async () => {
    const search = searchTool();
    const planner = new ScriptedPlanner();
    const deps = makeDeps({ planner, tools: makeRegistry([search]) });

    await runDeepAnalysis(
      makePayload({ keywordsHit: [] }),
      makePreliminary({ eventType: 'regulation', asset: 'btc,eth' }),
      deps
    );

    expect(planner.keywordCalls).toBe(0);
    expect(search.inputs[0]?.keyword).toBe('BTC regulation');
  });
});

describe('context gathering', () => {
  it('passes keywords and asset codes to memory', async () => {
    const fetch = vi.fn<MemoryFetcher['fetch']>().mockResolvedValue([
      {
        id: 'm1',
        createdAt: '2026-01-01T00:00:00.000Z',
        assets: ['USDC'],
        action: 'sell',
        confidence: 0.8,
        similarity: 0.9,
        summary: 'Earlier bridge exploit',
      },
    ]);
    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'governance', asset: 'usdc, none' }),
      makeDeps({ memory: { fetch } })
    );

    expect(fetch).toHaveBeenCalledWith(['usdc', 'exploit'], ['USDC']);
    expect(state.memoryEvidence.count).toBe(1);
    expect(state.memoryEvidence.formatted).toBe(
      '1. Earlier bridge exploit (confidence: 0.8, similarity: 0.9)'
    );
  });

  it('continues with empty memory when the fetch fails', async () => {
    const fetch = vi.fn<MemoryFetcher['fetch']>().mockRejectedValue(new Error('db locked'));
    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'governance' }),
      makeDeps({ memory: { fetch } })
    );

    if (!result.success) throw result.error;
    expect(result.state.memoryEvidence).toEqual({
      entries: [],
      formatted: 'No similar historical events',
      count: 0,
    });
  });
});

describe('with the CLI planner', () => {
  const runProcessMock = vi.mocked(runProcess);

  beforeEach(() => {
    runProcessMock.mockReset();
  });

  it('treats a crashed planning call as an empty plan and still synthesizes', async () => {
    runProcessMock
      .mockResolvedValueOnce({ exitCode: 2, stdout: '', stderr: 'session expired', timedOut: false })
      .mockResolvedValueOnce({
        exitCode: 0,
        stdout: 'Final answer:\n{"summary": "Listing rumor", "action": "observe", "confidence": 0.3}',
        stderr: '',
        timedOut: false,
      });
    const planner = new CliPlanner(
      {
        path: 'planner-cli',
        args: [],
        promptVia: 'stdin',
        timeoutMs: 1_000,
        maxOutputChars: 10_000,
      },
      quietLogger
    );
    const deps = makeDeps({ planner, tools: makeRegistry([priceTool()]) });

    const result = await analyzeEvent(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    if (!result.success) throw result.error;
    expect(runProcessMock).toHaveBeenCalledTimes(2);
    expect(result.state.lastPlan?.reason).toBe(
      'Planner failed: CLI planner exited with code 2: session expired'
    );
    expect(result.signal.confidence).toBe(0.3);
    expect(result.signal.riskFlags).toEqual(['confidence_low']);
  });

  it('treats a missing CLI executable as an empty plan', async () => {
    const missing: NodeJS.ErrnoException = new Error('spawn planner-cli ENOENT');
    missing.code = 'ENOENT';
    runProcessMock
      .mockResolvedValueOnce({
        exitCode: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        spawnError: missing,
      })
      .mockResolvedValueOnce({
        exitCode: 0,
        stdout: '{"confidence": 0.5}',
        stderr: '',
        timedOut: false,
      });
    const planner = new CliPlanner(
      {
        path: 'planner-cli',
        args: [],
        promptVia: 'argument',
        timeoutMs: 1_000,
        maxOutputChars: 10_000,
      },
      quietLogger
    );
    const deps = makeDeps({ planner, tools: makeRegistry([priceTool()]) });

    const state = await runDeepAnalysis(
      makePayload(),
      makePreliminary({ eventType: 'listing' }),
      deps
    );

    expect(state.lastPlan?.reason).toBe('Planner failed: CLI executable not found: planner-cli');
    expect(state.toolCallCount).toBe(0);
    expect(state.signal?.confidence).toBe(0.5);
  });
});
