#!/usr/bin/env node
import 'dotenv/config';
/**
 * Deep Analysis CLI
 *
 * Command-line interface for running deep analysis on a single event.
 */

import { readFileSync } from 'node:fs';

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, PLANNER_TYPES, type EngineConfig } from '../core/config.js';
import { toErrorMessage } from '../core/errors.js';
import { Logger, resolveLogLevel } from '../core/logger.js';
import { createDeepAnalysisEngine } from '../agent/engine.js';
import { parseEventInput } from '../agent/event_input.js';
import { getDailyToolQuota } from '../agent/orchestrator/quota.js';
import { signalToJson } from '../agent/orchestrator/signal.js';

type AnalyzeOptions = {
  config?: string;
  planner?: string;
  maxToolCalls?: string;
};

function loggerFor(config: EngineConfig): Logger {
  return new Logger(resolveLogLevel(process.env.DEEP_ANALYSIS_LOG_LEVEL, config.logging.level));
}

function applyAnalyzeOptions(config: EngineConfig, options: AnalyzeOptions): EngineConfig {
  if (options.planner) {
    const planner = PLANNER_TYPES.find((type) => type === options.planner);
    if (!planner) {
      throw new Error(
        `Unknown planner "${options.planner}" (expected ${PLANNER_TYPES.join(', ')})`
      );
    }
    config.planner.type = planner;
  }
  if (options.maxToolCalls !== undefined) {
    const value = Number(options.maxToolCalls);
    if (!Number.isInteger(value) || value < 0) {
      throw new Error('--max-tool-calls must be a non-negative integer');
    }
    config.analysis.maxToolCalls = value;
  }
  return config;
}

const program = new Command();

program
  .name('deep-analysis')
  .description('Tool-augmented deep analysis for crypto market events')
  .version(VERSION);

// ============================================================================
// Analyze
// ============================================================================

program
  .command('analyze')
  .description('Run deep analysis on an event file ({ "payload": ..., "preliminary": ... })')
  .argument('<event>', 'Path to the event JSON file')
  .option('-c, --config <path>', 'Config file path')
  .option('-p, --planner <type>', `Planner backend (${PLANNER_TYPES.join(' | ')})`)
  .option('-m, --max-tool-calls <number>', 'Maximum executor turns')
  .action(async (eventPath: string, options: AnalyzeOptions) => {
    try {
      const config = applyAnalyzeOptions(loadConfig(options.config), options);
      const { payload, preliminary } = parseEventInput(
        JSON.parse(readFileSync(eventPath, 'utf-8'))
      );
      const engine = createDeepAnalysisEngine(config, { logger: loggerFor(config) });

      const result = await engine.analyze(payload, preliminary);
      if (!result.success) {
        console.error(`Deep analysis failed: ${result.error.message}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(signalToJson(result.signal), null, 2));
    } catch (error) {
      console.error(`Error: ${toErrorMessage(error)}`);
      process.exitCode = 1;
    }
  });

// ============================================================================
// Quota
// ============================================================================

program
  .command('quota')
  .description('Show the daily tool quota for this process')
  .option('-c, --config <path>', 'Config file path')
  .action((options: { config?: string }) => {
    const config = loadConfig(options.config);
    const status = getDailyToolQuota(config.analysis.toolDailyLimit).status();
    console.log(`Date (UTC): ${status.date}`);
    console.log(`Used: ${status.used}/${status.limit}`);
    console.log(`Remaining: ${status.remaining}`);
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${toErrorMessage(error)}`);
  process.exitCode = 1;
});
