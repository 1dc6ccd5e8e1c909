/**
 * Shared test doubles: a scripted transport and a recording tracer
 */

import { ModelClient } from '@llm/ModelClient.js';
import { Client, type ClientOptions } from '@client/Client.js';
import type { ChatRequest, ChatResponse, Usage } from '@shared/index.js';
import type { Observation, ObservationEnd, Tracer } from '@tracing/Tracer.js';

export type ScriptStep = ChatResponse | Error | ((request: ChatRequest) => ChatResponse | Promise<ChatResponse>);

/**
 * Transport that replays a fixed script, one step per complete() call
 */
export class ScriptedModelClient extends ModelClient {
  readonly requests: ChatRequest[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    super();
    this.steps = [...steps];
  }

  get endpoint(): string {
    return 'http://model.test/v1';
  }

  get callCount(): number {
    return this.requests.length;
  }

  async complete(request: ChatRequest, options: { signal?: AbortSignal } = {}): Promise<ChatResponse> {
    this.requests.push(request);
    this.signals.push(options.signal);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('script exhausted');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request);
    }
    return step;
  }
}

export function textResponse(content: string | null, usage?: Usage): ChatResponse {
  return {
    id: 'resp-text',
    model: 'test-model',
    choices: [{ index: 0, finishReason: 'stop', message: { role: 'assistant', content } }],
    usage,
  };
}

export function toolCallResponse(calls: Array<{ id: string; name: string; args: unknown }>): ChatResponse {
  return {
    id: 'resp-tools',
    model: 'test-model',
    choices: [
      {
        index: 0,
        finishReason: 'tool_calls',
        message: {
          role: 'assistant',
          content: null,
          tool_calls: calls.map(call => ({
            id: call.id,
            name: call.name,
            arguments: typeof call.args === 'string' ? call.args : JSON.stringify(call.args),
          })),
        },
      },
    ],
  };
}

export function testClient(transport: ModelClient, options: ClientOptions = {}): Client {
  return new Client({
    modelClient: transport,
    defaultModel: 'test-model',
    retryDelayMs: 0,
    env: {},
    ...options,
  });
}

export interface TracerEvent {
  type: 'trace' | 'span' | 'generation' | 'end';
  id: string;
  name?: string;
  traceId?: string;
  parentObservationId?: string;
  model?: string;
  result?: ObservationEnd;
}

/**
 * Tracer that records every call; ids are "<type>-<n>" in call order
 */
export class RecordingTracer implements Tracer {
  readonly events: TracerEvent[] = [];
  private counter = 0;

  startTrace(input: { name: string }): Observation {
    const id = `trace-${++this.counter}`;
    this.events.push({ type: 'trace', id, name: input.name });
    return { id, traceId: id };
  }

  startSpan(input: { name: string; traceId: string; parentObservationId?: string }): Observation {
    const id = `span-${++this.counter}`;
    this.events.push({
      type: 'span',
      id,
      name: input.name,
      traceId: input.traceId,
      parentObservationId: input.parentObservationId,
    });
    return { id, traceId: input.traceId };
  }

  startGeneration(input: { name: string; traceId: string; parentObservationId?: string; model: string }): Observation {
    const id = `generation-${++this.counter}`;
    this.events.push({
      type: 'generation',
      id,
      name: input.name,
      traceId: input.traceId,
      parentObservationId: input.parentObservationId,
      model: input.model,
    });
    return { id, traceId: input.traceId };
  }

  end(observation: Observation, result: ObservationEnd): void {
    this.events.push({ type: 'end', id: observation.id, result });
  }

  ofType(type: TracerEvent['type']): TracerEvent[] {
    return this.events.filter(event => event.type === type);
  }
}
