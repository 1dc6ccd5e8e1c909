/**
 * Tracing plugin - Records each ask as a generation
 *
 * The before-hook opens a generation under the ask's trace, creating the
 * trace first when the ask has none and recording it on the context so
 * tool spans share it. The after-hook closes the generation with the final
 * answer and usage, or with the error that ended the ask.
 *
 * Tracer failures are logged; they never change the request or outcome.
 */

import type { Plugin } from '@client/Client.js';
import type { AfterRequestHook, AskContext, BeforeRequestHook } from '@agent/HookPipeline.js';
import type { ChatRequest } from '@shared/index.js';
import type { Tracer } from './Tracer.js';
import { formatError } from '@utils/errorUtils.js';
import { TRACING } from '@config/constants.js';

async function ensureTrace(tracer: Tracer, ctx: AskContext, request: ChatRequest): Promise<string> {
  if (ctx.trace.traceId) {
    return ctx.trace.traceId;
  }
  const trace = await tracer.startTrace({ name: TRACING.ASK_TRACE_NAME, input: request.messages });
  ctx.trace = { ...ctx.trace, traceId: trace.traceId, parentObservationId: trace.id };
  ctx.logger.debug(`[TRACING] Trace ${trace.traceId} created`);
  return trace.traceId;
}

export function tracingPlugin(tracer: Tracer): Plugin {
  const beforeRequest: BeforeRequestHook = async (ctx, request) => {
    try {
      const traceId = await ensureTrace(tracer, ctx, request);
      ctx.activeGeneration = await tracer.startGeneration({
        name: ctx.generationName,
        traceId,
        parentObservationId: ctx.trace.parentObservationId,
        model: request.model,
        input: request.messages,
      });
      ctx.logger.debug(`[TRACING] Generation ${ctx.activeGeneration.id} started for run ${ctx.runId}`);
    } catch (error) {
      ctx.logger.error('[TRACING] Failed to start generation:', formatError(error));
    }
    return request;
  };

  const afterRequest: AfterRequestHook = async (ctx, outcome) => {
    const generation = ctx.activeGeneration;
    if (!generation) {
      return outcome;
    }
    ctx.activeGeneration = undefined;

    try {
      if (outcome.error !== undefined) {
        await tracer.end(generation, { error: formatError(outcome.error) });
      } else {
        await tracer.end(generation, {
          output: outcome.response?.choices[0]?.message.content ?? null,
          usage: outcome.response?.usage,
        });
      }
    } catch (error) {
      ctx.logger.warn('[TRACING] Failed to end generation:', formatError(error));
    }
    return outcome;
  };

  return { name: 'tracing', beforeRequest, afterRequest };
}
