/**
 * HookPipeline - Ordered request/response interceptors
 *
 * Each stage runs once per ask. Before-hooks rewrite the outgoing request
 * before the first model turn, and the rewrite carries into every later
 * turn. After-hooks see the final response or the error that ended the
 * ask. Hooks run in registration order and may be sync or async. A hook
 * that throws, or returns a value that cannot be sent, is logged and
 * skipped: the pipeline continues with the value that hook received.
 */

import type { ChatRequest, ChatResponse } from '@shared/index.js';
import type { Observation, TraceContext } from '@tracing/Tracer.js';
import type { Logger } from '@services/Logger.js';
import { formatError } from '@utils/errorUtils.js';

/**
 * Per-call state shared by the driver and its hooks
 */
export interface AskContext {
  /** Identifier of this ask call */
  readonly runId: string;
  /** Model turns started so far; 0 while before-hooks run */
  turn: number;
  readonly generationName: string;
  /** Trace linkage; a hook that opens a trace records it here */
  trace: TraceContext;
  /** Generation opened by a before-hook and closed by an after-hook */
  activeGeneration?: Observation;
  readonly signal?: AbortSignal;
  readonly logger: Logger;
}

/**
 * Result of one model call as seen by after-hooks
 *
 * `response` is undefined on the failure path.
 */
export interface RequestOutcome {
  response?: ChatResponse;
  error?: unknown;
}

export type BeforeRequestHook = (ctx: AskContext, request: ChatRequest) => ChatRequest | Promise<ChatRequest>;

export type AfterRequestHook = (ctx: AskContext, outcome: RequestOutcome) => RequestOutcome | Promise<RequestOutcome>;

export class HookPipeline {
  private readonly beforeHooks: BeforeRequestHook[];
  private readonly afterHooks: AfterRequestHook[];

  constructor(
    beforeHooks: readonly BeforeRequestHook[],
    afterHooks: readonly AfterRequestHook[],
    private readonly logger: Logger
  ) {
    this.beforeHooks = [...beforeHooks];
    this.afterHooks = [...afterHooks];
  }

  get size(): { before: number; after: number } {
    return { before: this.beforeHooks.length, after: this.afterHooks.length };
  }

  /**
   * Run every before-hook over the request
   */
  async runBefore(ctx: AskContext, request: ChatRequest): Promise<ChatRequest> {
    let current = request;
    for (const [index, hook] of this.beforeHooks.entries()) {
      try {
        const next = await hook(ctx, current);
        const problem = describeInvalidRequest(next);
        if (problem) {
          this.logger.error(`[HOOKS] Before-request hook #${index} returned an unusable request (${problem}); ignoring it`);
          continue;
        }
        current = next;
      } catch (error) {
        this.logger.error(`[HOOKS] Before-request hook #${index} failed:`, formatError(error));
      }
    }
    return current;
  }

  /**
   * Run every after-hook over the outcome of a model call
   */
  async runAfter(ctx: AskContext, outcome: RequestOutcome): Promise<RequestOutcome> {
    let current = outcome;
    for (const [index, hook] of this.afterHooks.entries()) {
      try {
        const next = await hook(ctx, current);
        if (next.response === undefined && next.error === undefined) {
          this.logger.error(`[HOOKS] After-request hook #${index} returned neither a response nor an error; ignoring it`);
          continue;
        }
        current = next;
      } catch (error) {
        this.logger.error(`[HOOKS] After-request hook #${index} failed:`, formatError(error));
      }
    }
    return current;
  }
}

function describeInvalidRequest(request: ChatRequest | undefined): string | undefined {
  if (!request) {
    return 'no request';
  }
  if (typeof request.model !== 'string' || request.model.trim() === '') {
    return 'empty model';
  }
  if (!Array.isArray(request.messages) || request.messages.length === 0) {
    return 'empty message list';
  }
  return undefined;
}
