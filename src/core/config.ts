import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { EVENT_TYPES } from '../types/index.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

export const PLANNER_TYPES = ['structured', 'cli', 'text'] as const;
export const TEXT_PROVIDERS = ['openai', 'deepseek', 'qwen', 'generic'] as const;

const EventTypeSchema = z.enum(EVENT_TYPES);

const DEFAULT_EVENT_DOMAINS: Record<string, string[]> = {
  hack: ['coindesk.com', 'theblock.co', 'cointelegraph.com', 'decrypt.co'],
  regulation: ['coindesk.com', 'theblock.co', 'theblockcrypto.com'],
  listing: ['coindesk.com', 'theblock.co', 'cointelegraph.com'],
  partnership: ['coindesk.com', 'theblock.co'],
};

const ConfigSchema = z.object({
  analysis: z
    .object({
      maxToolCalls: z.number().int().min(0).default(3),
      toolDailyLimit: z.number().int().min(0).default(50),
      neverSearch: z
        .array(EventTypeSchema)
        .default(['macro', 'governance', 'airdrop', 'celebrity']),
      forceSearch: z.array(EventTypeSchema).default(['hack', 'regulation', 'partnership']),
      keywordGeneration: z.boolean().default(false),
      planTimeoutMs: z.number().default(30_000),
      synthesisTimeoutMs: z.number().default(60_000),
    })
    .default({}),
  planner: z
    .object({
      type: z.enum(PLANNER_TYPES).default('structured'),
      fallback: z.enum(PLANNER_TYPES).optional(),
      structured: z
        .object({
          model: z.string().default('claude-3-5-haiku-latest'),
          apiKey: z.string().optional(),
          baseUrl: z.string().optional(),
          maxTokens: z.number().default(1024),
        })
        .default({}),
      cli: z
        .object({
          path: z.string().default('codex'),
          args: z.array(z.string()).default(['exec']),
          promptVia: z.enum(['argument', 'stdin']).default('argument'),
          contextFile: z.string().optional(),
          timeoutMs: z.number().default(60_000),
          maxOutputChars: z.number().default(200_000),
        })
        .default({}),
      text: z
        .object({
          provider: z.enum(TEXT_PROVIDERS).optional(),
          apiKey: z.string().optional(),
          model: z.string().optional(),
          baseUrl: z.string().optional(),
          temperature: z.number().default(0.2),
        })
        .default({}),
    })
    .default({}),
  tools: z
    .object({
      timeoutMs: z.number().default(10_000),
      search: z
        .object({
          enabled: z.boolean().default(true),
          provider: z.enum(['tavily']).default('tavily'),
          apiKey: z.string().optional(),
          maxResults: z.number().int().min(1).default(5),
          multiSourceThreshold: z.number().int().min(1).default(3),
          eventDomains: z.record(z.string(), z.array(z.string())).default(DEFAULT_EVENT_DOMAINS),
        })
        .default({}),
      price: z
        .object({
          enabled: z.boolean().default(true),
          apiKey: z.string().optional(),
          baseUrl: z.string().default('https://api.coingecko.com/api/v3'),
          assetIds: z.record(z.string(), z.string()).default({}),
          deviationThresholdPct: z.number().default(2),
          stablecoinTolerancePct: z.number().default(0.5),
        })
        .default({}),
      macro: z
        .object({
          enabled: z.boolean().default(false),
          apiKey: z.string().optional(),
          baseUrl: z.string().default('https://api.stlouisfed.org/fred'),
          expectations: z.record(z.string(), z.number()).default({}),
        })
        .default({}),
      onchain: z
        .object({
          enabled: z.boolean().default(false),
          baseUrl: z.string().default('https://stablecoins.llama.fi'),
          tvlDropThresholdPct: z.number().default(20),
          redemptionUsdThreshold: z.number().default(500_000_000),
        })
        .default({}),
      protocol: z
        .object({
          enabled: z.boolean().default(false),
          baseUrl: z.string().default('https://api.llama.fi'),
          tvlDropThresholdPct: z.number().default(15),
          tvlDropThresholdUsd: z.number().default(300_000_000),
          topChainLimit: z.number().int().min(1).default(5),
        })
        .default({}),
    })
    .default({}),
  memory: z
    .object({
      enabled: z.boolean().default(true),
      limit: z.number().int().min(1).default(3),
      minConfidence: z.number().min(0).max(1).default(0.6),
      backend: z.enum(['local', 'sqlite']).default('local'),
      record: z.boolean().default(false),
      sqlite: z
        .object({
          dbPath: z.string().default('~/.deep-analysis/memory.sqlite'),
        })
        .default({}),
      local: z
        .object({
          basePath: z.string().default('~/.deep-analysis/memories'),
          lookbackHours: z.number().default(168),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof ConfigSchema>;
export type PlannerType = (typeof PLANNER_TYPES)[number];
export type TextProvider = (typeof TEXT_PROVIDERS)[number];

/**
 * Parse and default a raw config object (no file access, no env overrides).
 */
export function parseConfig(raw: unknown): EngineConfig {
  return ConfigSchema.parse(raw ?? {});
}

function readIntEnv(name: string): number | null {
  const raw = process.env[name];
  if (!raw) return null;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : null;
}

export function applyEnvOverrides(cfg: EngineConfig): EngineConfig {
  const maxToolCalls = readIntEnv('DEEP_ANALYSIS_MAX_TOOL_CALLS');
  if (maxToolCalls !== null) {
    cfg.analysis.maxToolCalls = maxToolCalls;
  }
  const dailyLimit = readIntEnv('TOOL_DAILY_LIMIT');
  if (dailyLimit !== null) {
    cfg.analysis.toolDailyLimit = dailyLimit;
  }
  const plannerType = process.env.DEEP_ANALYSIS_PLANNER;
  if (plannerType) {
    const parsed = z.enum(PLANNER_TYPES).safeParse(plannerType);
    if (parsed.success) {
      cfg.planner.type = parsed.data;
    }
  }

  cfg.planner.structured.apiKey ??= process.env.ANTHROPIC_API_KEY;
  cfg.planner.text.apiKey ??= process.env.TEXT_PLANNER_API_KEY;
  cfg.tools.search.apiKey ??= process.env.TAVILY_API_KEY;
  cfg.tools.price.apiKey ??= process.env.COINGECKO_API_KEY;
  cfg.tools.macro.apiKey ??= process.env.FRED_API_KEY;
  return cfg;
}

/**
 * Load config from `configPath`, `DEEP_ANALYSIS_CONFIG_PATH` or
 * `~/.deep-analysis/config.yaml`. A missing default file means defaults;
 * a missing explicit file is an error.
 */
export function loadConfig(configPath?: string): EngineConfig {
  const explicit = configPath ?? process.env.DEEP_ANALYSIS_CONFIG_PATH;
  const path = explicit ?? join(homedir(), '.deep-analysis', 'config.yaml');

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    parsed = yaml.parse(readFileSync(path, 'utf-8')) ?? {};
  }

  const cfg = applyEnvOverrides(parseConfig(parsed));
  cfg.memory.local.basePath = expandHome(cfg.memory.local.basePath);
  cfg.memory.sqlite.dbPath = expandHome(cfg.memory.sqlite.dbPath);
  return cfg;
}
