/**
 * CLI Planner
 *
 * Runs an external reasoning CLI once per call and reads its stdout as the
 * reply. The prompt goes in as the final argument or on stdin.
 */

import {
  ConfigurationError,
  MalformedOutputError,
  PlanningError,
  TimeoutError,
  truncate,
} from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { runProcess } from '../../core/process.js';
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

const STDERR_PREVIEW_CHARS = 500;

export type CliPlannerSettings = {
  path: string;
  args: string[];
  promptVia: 'argument' | 'stdin';
  /** Document the CLI should read, referenced as `@<path>` in the prompt */
  contextFile?: string;
  timeoutMs: number;
  maxOutputChars: number;
};

export class CliPlanner implements Planner {
  readonly kind = 'cli';
  private logger: Logger;

  constructor(
    private settings: CliPlannerSettings,
    logger?: Logger
  ) {
    if (!settings.path.trim()) {
      throw new ConfigurationError('CLI planner path is empty');
    }
    this.logger = logger ?? new Logger('info');
  }

  async plan(
    state: OrchestrationState,
    availableTools: ToolName[],
    options?: PlannerCallOptions
  ): Promise<ToolPlan> {
    const output = await this.invoke(
      `${PLANNER_SYSTEM_PROMPT}\n\n${buildPlannerPrompt(state, availableTools)}`,
      options
    );
    return parseToolPlan(output);
  }

  async synthesize(state: OrchestrationState, options?: PlannerCallOptions): Promise<string> {
    const output = await this.invoke(
      `${SYNTHESIS_SYSTEM_PROMPT}\n\n${buildSynthesisPrompt(state)}`,
      options
    );
    return synthesisJson(output, 'cli planner');
  }

  async generateSearchKeywords(
    state: OrchestrationState,
    options?: PlannerCallOptions
  ): Promise<string> {
    return parseSearchKeywords(await this.invoke(buildKeywordPrompt(state), options));
  }

  private buildPrompt(prompt: string): string {
    if (!this.settings.contextFile) return prompt;
    return `Read @${this.settings.contextFile} for background before answering.\n\n${prompt}`;
  }

  private async invoke(prompt: string, options?: PlannerCallOptions): Promise<string> {
    const fullPrompt = this.buildPrompt(prompt);
    const timeoutMs = options?.timeoutMs ?? this.settings.timeoutMs;
    const viaStdin = this.settings.promptVia === 'stdin';
    const args = viaStdin ? [...this.settings.args] : [...this.settings.args, fullPrompt];

    const startedAt = Date.now();
    const result = await runProcess(this.settings.path, args, {
      timeoutMs,
      maxOutputChars: this.settings.maxOutputChars,
      ...(viaStdin ? { input: fullPrompt } : {}),
    });
    this.logger.debug(
      `CLI planner finished in ${Date.now() - startedAt}ms (exit=${String(result.exitCode)})`
    );

    if (result.spawnError) {
      if (result.spawnError.code === 'ENOENT') {
        throw new ConfigurationError(`CLI executable not found: ${this.settings.path}`, {
          cause: result.spawnError,
        });
      }
      throw new PlanningError(
        `CLI planner failed to start: ${result.spawnError.message}`,
        { backend: 'cli' },
        { cause: result.spawnError }
      );
    }
    if (result.timedOut) {
      throw new TimeoutError(`CLI planner timed out after ${timeoutMs}ms`, timeoutMs);
    }
    if (result.exitCode !== 0) {
      const stderr = truncate(result.stderr.trim(), STDERR_PREVIEW_CHARS);
      throw new PlanningError(
        `CLI planner exited with code ${String(result.exitCode)}: ${stderr || 'no stderr'}`,
        { backend: 'cli', exitCode: result.exitCode, stderr }
      );
    }

    const stdout = result.stdout.trim();
    if (!stdout) {
      throw new MalformedOutputError('CLI planner produced no output', result.stderr);
    }
    return stdout;
  }
}

export function createCliPlanner(settings: CliPlannerSettings, logger?: Logger): CliPlanner {
  return new CliPlanner(settings, logger);
}
