/**
 * Tracer - Contract for an external tracing backend
 *
 * The library never talks to a tracing service directly. It drives whatever
 * implements this interface from request hooks (generations), the tool
 * orchestrator (tool spans) and Graph.run (one trace per run).
 *
 * Linkage travels explicitly as a TraceContext record through AskOptions,
 * ToolContext and NodeArg, never through an untyped context bag.
 */

import type { Usage } from '@shared/index.js';

/**
 * Trace linkage handed from caller to callee
 */
export interface TraceContext {
  /** Trace every observation of this call belongs to */
  traceId?: string;
  /** Observation new observations are nested under */
  parentObservationId?: string;
  /** Name for the next observation (e.g. the tool being executed) */
  observationName?: string;
}

/**
 * Handle to an open trace, span or generation
 */
export interface Observation {
  id: string;
  traceId: string;
}

export interface ObservationEnd {
  output?: unknown;
  usage?: Usage;
  error?: string;
}

export interface Tracer {
  startTrace(input: { name: string; input?: unknown }): Observation | Promise<Observation>;
  startSpan(input: { name: string; traceId: string; parentObservationId?: string; input?: unknown }): Observation | Promise<Observation>;
  startGeneration(input: {
    name: string;
    traceId: string;
    parentObservationId?: string;
    model: string;
    input?: unknown;
  }): Observation | Promise<Observation>;
  end(observation: Observation, result: ObservationEnd): void | Promise<void>;
}

/**
 * Child linkage for work nested under an observation
 */
export function childTrace(observation: Observation, observationName?: string): TraceContext {
  return {
    traceId: observation.traceId,
    parentObservationId: observation.id,
    observationName,
  };
}

/**
 * Run `fn` inside a span when a tracer is present
 *
 * Tracer failures are reported through `onTracerError` and never fail `fn`;
 * errors thrown by `fn` end the span with the error and are rethrown.
 */
export async function withSpan<T>(
  tracer: Tracer | undefined,
  parent: TraceContext,
  span: { name: string; input?: unknown },
  fn: (trace: TraceContext) => Promise<T>,
  onTracerError: (error: unknown) => void
): Promise<T> {
  if (!tracer) {
    return fn(parent);
  }

  let observation: Observation | undefined;
  try {
    observation = parent.traceId
      ? await tracer.startSpan({
          name: span.name,
          traceId: parent.traceId,
          parentObservationId: parent.parentObservationId,
          input: span.input,
        })
      : await tracer.startTrace({ name: span.name, input: span.input });
  } catch (error) {
    onTracerError(error);
  }

  if (!observation) {
    return fn(parent);
  }

  const opened = observation;
  const endQuietly = async (result: ObservationEnd): Promise<void> => {
    try {
      await tracer.end(opened, result);
    } catch (error) {
      onTracerError(error);
    }
  };

  try {
    const output = await fn(childTrace(opened, parent.observationName));
    await endQuietly({ output });
    return output;
  } catch (error) {
    await endQuietly({ error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}
