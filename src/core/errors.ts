/**
 * Engine Errors
 *
 * Error taxonomy shared by planners, tools and the orchestration graph.
 * Every error below the synthesis stage is absorbed by the graph; these
 * classes let callers tell the failure modes apart.
 */

export type EngineErrorCode =
  | 'configuration'
  | 'planning'
  | 'timeout'
  | 'malformed_output'
  | 'tool_execution'
  | 'quota_exceeded';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/**
 * Missing credentials, paths or executables for a backend.
 */
export class ConfigurationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

export type PlanningErrorDetails = {
  backend: string;
  exitCode?: number | null;
  stderr?: string;
  status?: number;
};

/**
 * Backend reachable but the decision call failed.
 */
export class PlanningError extends EngineError {
  readonly details: PlanningErrorDetails;

  constructor(message: string, details: PlanningErrorDetails, options?: { cause?: unknown }) {
    super('planning', message, options);
    this.details = details;
  }
}

export class TimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super('timeout', message, options);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Backend answered but nothing in the output parsed into the expected shape.
 */
export class MalformedOutputError extends EngineError {
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string, options?: { cause?: unknown }) {
    super('malformed_output', message, options);
    this.rawOutput = truncate(rawOutput, 500);
  }
}

export class ToolExecutionError extends EngineError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super('tool_execution', message, options);
    this.toolName = toolName;
  }
}

export class QuotaExceededError extends EngineError {
  readonly limit: number;

  constructor(limit: number) {
    super('quota_exceeded', `Daily tool quota exhausted (${limit} turns)`);
    this.limit = limit;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}...`;
}
