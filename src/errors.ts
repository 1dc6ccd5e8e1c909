/**
 * Error taxonomy
 *
 * Every error thrown by the library extends TurnkitError and names the stage
 * that failed, so a caller can decide whether retrying the whole operation
 * makes sense (see isRetryable).
 */

export type ErrorStage = 'configuration' | 'transport' | 'response' | 'decode' | 'tool' | 'graph';

export class TurnkitError extends Error {
  readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/**
 * Missing or invalid option (empty prompt, no model, bad retry budget)
 */
export class ConfigurationError extends TurnkitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

/**
 * Output or argument shape that cannot be expressed as a strict JSON Schema
 */
export class SchemaInferenceError extends ConfigurationError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`cannot infer JSON schema at ${path}: ${message}`);
    this.path = path;
  }
}

export class GraphConstructionError extends ConfigurationError {}

/**
 * The model endpoint could not be reached, or kept failing, within the retry budget
 */
export class TransportError extends TurnkitError {
  readonly attempts: number;
  readonly cancelled: boolean;

  constructor(attempts: number, cause: unknown, cancelled = false) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'transport',
      cancelled
        ? `model call cancelled after ${attempts} attempt(s): ${reason}`
        : `model call failed after ${attempts} attempt(s): ${reason}`,
      { cause }
    );
    this.attempts = attempts;
    this.cancelled = cancelled;
  }
}

export class NoChoicesError extends TurnkitError {
  constructor(model: string) {
    super('response', `response from model '${model}' contained no choices`);
  }
}

export class TurnLimitError extends TurnkitError {
  readonly turns: number;

  constructor(turns: number) {
    super('response', `conversation did not finish within ${turns} model turns`);
    this.turns = turns;
  }
}

/**
 * Model content did not match the declared output shape
 */
export class DecodeError extends TurnkitError {
  readonly content: string;
  readonly issues: string[];

  constructor(content: string, issues: string[], options?: { cause?: unknown }) {
    super('decode', `failed to decode model response: ${issues.join('; ')}`, options);
    this.content = content;
    this.issues = issues;
  }
}

export class ToolNotFoundError extends TurnkitError {
  readonly toolName: string;
  readonly toolCallId: string;

  constructor(toolName: string, toolCallId: string) {
    super('tool', `model requested unknown tool '${toolName}' (call ${toolCallId})`);
    this.toolName = toolName;
    this.toolCallId = toolCallId;
  }
}

export class ToolArgumentDecodeError extends TurnkitError {
  readonly toolName: string;
  readonly toolCallId: string;
  readonly issues: string[];

  constructor(toolName: string, toolCallId: string, issues: string[], options?: { cause?: unknown }) {
    super('tool', `invalid arguments for tool '${toolName}' (call ${toolCallId}): ${issues.join('; ')}`, options);
    this.toolName = toolName;
    this.toolCallId = toolCallId;
    this.issues = issues;
  }
}

export class ToolExecutionError extends TurnkitError {
  readonly toolName: string;
  readonly toolCallId: string;

  constructor(toolName: string, toolCallId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('tool', `tool '${toolName}' failed (call ${toolCallId}): ${reason}`, { cause });
    this.toolName = toolName;
    this.toolCallId = toolCallId;
  }
}

export class GraphNodeNotFoundError extends TurnkitError {
  readonly graphName: string;
  readonly nodeName: string;

  constructor(graphName: string, nodeName: string) {
    super('graph', `node '${nodeName}' not found in graph '${graphName}'`);
    this.graphName = graphName;
    this.nodeName = nodeName;
  }
}

export class GraphNodeError extends TurnkitError {
  readonly graphName: string;
  readonly nodeName: string;

  constructor(graphName: string, nodeName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('graph', `failed to run node '${nodeName}' in graph '${graphName}': ${reason}`, { cause });
    this.graphName = graphName;
    this.nodeName = nodeName;
  }
}

/**
 * Whether repeating the same operation could succeed
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransportError && !error.cancelled;
}
