/**
 * ToolOrchestrator - Executes one round of model tool calls
 *
 * A round is every tool call of a single assistant message:
 * 1. Every call is resolved and its arguments decoded before any handler
 *    starts, so a malformed round runs nothing.
 * 2. Handlers run concurrently under a round-scoped abort signal linked to
 *    the caller's signal.
 * 3. The round joins on every handler or on the first failure, whichever
 *    comes first. The first failure aborts the round signal and is thrown
 *    as ToolExecutionError at once, without waiting for siblings that
 *    ignore the signal. Cancelling the caller's signal fails the round the
 *    same way. No results of a failed round are returned.
 * 4. On success, results come back in call order as tool-result messages,
 *    for the driver to append in one step.
 */

import type { ToolManager, ResolvedToolCall } from '@tools/ToolManager.js';
import type { ToolContext } from '@tools/Tool.js';
import type { Client } from '@client/Client.js';
import type { ToolCallRequest, ToolResultMessage } from '@shared/index.js';
import type { CallbackManager } from './CallbackManager.js';
import type { Logger } from '@services/Logger.js';
import { withSpan, type TraceContext, type Tracer } from '@tracing/Tracer.js';
import { createToolResultMessage, serializeToolResult } from '@llm/FunctionCalling.js';
import { ToolExecutionError } from '../errors.js';
import { formatError, preview, toError } from '@utils/errorUtils.js';
import { TRACING, TEXT_LIMITS } from '@config/constants.js';

export interface ToolRoundOptions {
  client: Client;
  /** Linkage tool spans are nested under */
  trace: TraceContext;
  /** Caller's cancellation signal */
  signal?: AbortSignal;
}

interface RoundFailure {
  call: ToolCallRequest;
  error: unknown;
}

export class ToolOrchestrator {
  constructor(
    private readonly toolManager: ToolManager,
    private readonly callbacks: CallbackManager,
    private readonly logger: Logger,
    private readonly tracer?: Tracer
  ) {}

  /**
   * Execute all tool calls of one assistant message
   *
   * @returns Tool-result messages in call order
   * @throws ToolNotFoundError / ToolArgumentDecodeError before anything runs
   * @throws ToolExecutionError when a handler fails
   */
  async executeRound(toolCalls: readonly ToolCallRequest[], options: ToolRoundOptions): Promise<ToolResultMessage[]> {
    const resolved = toolCalls.map(call => this.toolManager.resolve(call));
    this.logger.debug(
      '[TOOL_ORCHESTRATOR] Executing round of',
      resolved.length,
      'tool call(s):',
      resolved.map(r => `${r.tool.name}(${preview(r.call.arguments, TEXT_LIMITS.LOG_PREVIEW_MAX)})`).join(', ')
    );

    const roundController = new AbortController();
    const parentSignal = options.signal;
    const unfinished = new Set(resolved.map(entry => entry.call));
    const failures: RoundFailure[] = [];

    let endRound: () => void = () => {};
    const roundFailed = new Promise<void>(resolve => {
      endRound = resolve;
    });

    // The first failure ends the round at once; stragglers are left to the abort signal
    const fail = (failure: RoundFailure): void => {
      failures.push(failure);
      if (failures.length === 1) {
        roundController.abort(toError(failure.error));
        endRound();
      }
    };

    const onParentAbort = (): void => {
      const [call] = unfinished;
      if (call) {
        this.logger.debug(`[TOOL_ORCHESTRATOR] Round cancelled while ${call.name} was running`);
        fail({ call, error: parentSignal?.reason });
      }
    };
    if (parentSignal?.aborted) {
      onParentAbort();
    } else {
      parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    const tasks = resolved.map(async entry => {
      if (failures.length > 0) {
        return undefined;
      }
      try {
        return await this.executeOne(entry, roundController.signal, options);
      } catch (error) {
        if (failures.length === 0) {
          this.logger.debug(`[TOOL_ORCHESTRATOR] ${entry.tool.name} failed, aborting the rest of the round`);
        }
        fail({ call: entry.call, error });
        return undefined;
      } finally {
        unfinished.delete(entry.call);
      }
    });

    const joined = Promise.all(tasks);
    try {
      await Promise.race([joined, roundFailed]);
    } finally {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }

    if (failures.length > 0) {
      const first = failures[0];
      this.logger.error(`[TOOL_ORCHESTRATOR] Tool ${first.call.name} failed:`, formatError(first.error));
      throw new ToolExecutionError(first.call.name, first.call.id, first.error);
    }

    const values = await joined;
    return values.map((value, index) => createToolResultMessage(resolved[index].call.id, value));
  }

  private async executeOne(entry: ResolvedToolCall, signal: AbortSignal, options: ToolRoundOptions): Promise<unknown> {
    const { call, tool, args } = entry;
    const nested = this.callbacks.nestedRun(call.id);
    const startEvent = { ...nested, toolName: tool.name, toolCallId: call.id, arguments: call.arguments };
    await this.callbacks.emit('onToolCallStart', startEvent);

    try {
      const result = await withSpan(
        this.tracer,
        { ...options.trace, observationName: tool.name },
        { name: `${TRACING.TOOL_SPAN_PREFIX}${tool.name}`, input: args },
        async trace => {
          const context: ToolContext = {
            client: options.client,
            toolCallId: call.id,
            runId: nested.runId,
            signal,
            trace,
            logger: this.logger,
          };
          return tool.handler(args, context);
        },
        error => this.logger.warn('[TOOL_ORCHESTRATOR] Tracer failed:', formatError(error))
      );

      this.logger.debug(`[TOOL_ORCHESTRATOR] ${tool.name} (${call.id}) completed`);
      await this.callbacks.emit('onToolCallEnd', { ...startEvent, result: serializeToolResult(result) });
      return result;
    } catch (error) {
      await this.callbacks.emit('onToolCallEnd', { ...startEvent, error: formatError(error) });
      await this.callbacks.emit('onError', { ...nested, stage: 'tool', error });
      throw error;
    }
  }
}
