/**
 * Evidence Tool Registry
 *
 * Holds the evidence tools that are initialized for this process and runs
 * them with input validation, a per-call timeout and failure capture.
 */

import { Logger } from '../../core/logger.js';
import { ToolExecutionError, toErrorMessage } from '../../core/errors.js';
import { withTimeout } from '../../core/timeout.js';
import {
  TOOL_NAMES,
  failedEnvelope,
  type EvidenceTool,
  type ToolExecution,
  type ToolInputMap,
  type ToolName,
} from './types.js';

/**
 * Default per-tool timeout (10 seconds).
 */
const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

type ToolTable = { [K in ToolName]?: EvidenceTool<K> };

export class EvidenceToolRegistry {
  private tools: ToolTable = {};
  private logger: Logger;
  private timeoutMs: number;

  constructor(options?: { timeoutMs?: number; logger?: Logger }) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.logger = options?.logger ?? new Logger('info');
  }

  /**
   * Register a tool with the registry.
   */
  register<K extends ToolName>(tool: EvidenceTool<K>): void {
    if (this.tools[tool.name]) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    const tools: { [P in K]?: EvidenceTool<P> } = this.tools;
    tools[tool.name] = tool;
  }

  has(name: ToolName): boolean {
    return this.tools[name] !== undefined;
  }

  get<K extends ToolName>(name: K): EvidenceTool<K> | undefined {
    return this.tools[name];
  }

  /**
   * Names of initialized tools, in canonical order.
   */
  listNames(): ToolName[] {
    return TOOL_NAMES.filter((name) => this.has(name));
  }

  /**
   * Execute a tool. Never throws: failures come back as an unsuccessful
   * envelope so one tool cannot abort an executor turn.
   */
  async execute<K extends ToolName>(name: K, input: ToolInputMap[K]): Promise<ToolExecution> {
    const startedAt = Date.now();
    const timestamp = new Date(startedAt).toISOString();
    const tool = this.tools[name];

    if (!tool) {
      return {
        toolName: name,
        input,
        result: failedEnvelope(name, `Tool not initialized: ${name}`),
        timestamp,
        durationMs: 0,
      };
    }

    const parsed = tool.schema.safeParse(input);
    if (!parsed.success) {
      return {
        toolName: name,
        input,
        result: failedEnvelope(name, `Invalid input: ${parsed.error.message}`),
        timestamp,
        durationMs: 0,
      };
    }

    try {
      const result = await withTimeout(
        (signal) => tool.run(parsed.data, { signal, logger: this.logger }),
        this.timeoutMs,
        `Tool ${name}`
      );
      return { toolName: name, input, result, timestamp, durationMs: Date.now() - startedAt };
    } catch (error) {
      const wrapped = new ToolExecutionError(name, toErrorMessage(error), { cause: error });
      this.logger.warn(`Tool ${name} failed: ${wrapped.message}`);
      return {
        toolName: name,
        input,
        result: failedEnvelope(name, wrapped.message),
        timestamp,
        durationMs: Date.now() - startedAt,
      };
    }
  }
}
