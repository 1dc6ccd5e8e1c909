/**
 * CallbackManager - Lifecycle notifications for observers of an ask call
 *
 * Each ask creates its own manager with a fresh run id. Tool executions get
 * nested run ids whose parent is the ask's run id, so a tool that makes its
 * own ask can pass `context.runId` on as `parentRunId` and observers can
 * rebuild the call tree.
 *
 * Callbacks are observers only: a callback that throws is logged and the
 * call continues.
 */

import type { Message, ToolCallRequest, Usage } from '@shared/index.js';
import type { Logger } from '@services/Logger.js';
import { formatError } from '@utils/errorUtils.js';
import { generateId } from '@utils/id.js';

interface RunLinkage {
  runId: string;
  parentRunId?: string;
}

export interface RunStartEvent extends RunLinkage {
  model: string;
  input: string;
  structured: boolean;
}

export interface RunEndEvent extends RunLinkage {
  output: unknown;
  turns: number;
}

export interface GenerationStartEvent extends RunLinkage {
  turn: number;
  model: string;
  messages: Message[];
}

export interface GenerationEndEvent extends RunLinkage {
  turn: number;
  finishReason: string | null;
  content: string | null;
  toolCalls: ToolCallRequest[];
  usage?: Usage;
}

export interface ToolCallStartEvent extends RunLinkage {
  toolName: string;
  toolCallId: string;
  arguments: string;
}

export interface ToolCallEndEvent extends ToolCallStartEvent {
  result?: string;
  error?: string;
}

export interface ErrorEvent extends RunLinkage {
  stage: 'run' | 'generation' | 'tool';
  error: unknown;
}

export interface CallbackEvents {
  onRunStart: RunStartEvent;
  onRunEnd: RunEndEvent;
  onGenerationStart: GenerationStartEvent;
  onGenerationEnd: GenerationEndEvent;
  onToolCallStart: ToolCallStartEvent;
  onToolCallEnd: ToolCallEndEvent;
  onError: ErrorEvent;
}

/**
 * Observer of ask lifecycle events; implement only the methods you need
 *
 * @example
 * ```typescript
 * const printer: AgentCallback = {
 *   name: 'printer',
 *   onToolCallEnd: event => console.log(event.toolName, event.result),
 * };
 * ```
 */
export interface AgentCallback extends CallbackHandlers {
  /** Shown in log messages when the callback fails */
  name?: string;
}

type CallbackHandlers = {
  [K in keyof CallbackEvents]?: (event: CallbackEvents[K]) => void | Promise<void>;
};

export class CallbackManager {
  readonly runId: string = generateId();
  private readonly nestedRuns: Map<string, string> = new Map();

  constructor(
    private readonly callbacks: readonly AgentCallback[],
    private readonly logger: Logger,
    readonly parentRunId?: string
  ) {}

  /**
   * Linkage for events of the ask run itself
   */
  runLinkage(): RunLinkage {
    return this.parentRunId === undefined ? { runId: this.runId } : { runId: this.runId, parentRunId: this.parentRunId };
  }

  /**
   * Create (or fetch) the nested run id of a tool call
   */
  nestedRun(toolCallId: string): RunLinkage {
    let nested = this.nestedRuns.get(toolCallId);
    if (nested === undefined) {
      nested = generateId();
      this.nestedRuns.set(toolCallId, nested);
    }
    return { runId: nested, parentRunId: this.runId };
  }

  /**
   * Deliver an event to every callback, in registration order
   */
  async emit<K extends keyof CallbackEvents>(event: K, payload: CallbackEvents[K]): Promise<void> {
    for (const callback of this.callbacks) {
      const handlers: CallbackHandlers = callback;
      const handler = handlers[event];
      if (!handler) {
        continue;
      }
      try {
        await handler(payload);
      } catch (error) {
        this.logger.warn(`[CALLBACKS] ${callback.name ?? 'callback'}.${event} failed:`, formatError(error));
      }
    }
  }
}
