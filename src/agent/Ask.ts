/**
 * Ask - Conversation driver
 *
 * One ask call is one logical request that may span many model turns:
 * build the request and run the before-hooks over it once, then call the
 * model with retries and execute any requested tools concurrently, looping
 * until the model answers without tool calls. The after-hooks run once on
 * the final response or on the error that ended the call. The answer is
 * returned verbatim in free-text mode or decoded against a zod shape in
 * structured mode.
 *
 * @example
 * ```typescript
 * const capital = await ask(client, {
 *   prompt: 'What is the capital of France?',
 *   output: z.object({ capital: z.string() }),
 *   tools: [getCapital],
 * });
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { z } from 'zod';
import type { Client } from '@client/Client.js';
import type { Tool } from '@tools/Tool.js';
import { ToolManager } from '@tools/ToolManager.js';
import type { FileAttachment } from '@llm/Attachments.js';
import { buildAttachmentMessages } from '@llm/Attachments.js';
import { MessageHistory } from '@llm/MessageHistory.js';
import { hasToolCalls } from '@llm/FunctionCalling.js';
import type { ModelClient } from '@llm/ModelClient.js';
import type { ChatRequest, ChatResponse, Message, ResponseFormat, SamplingParameters } from '@shared/index.js';
import type { TraceContext } from '@tracing/Tracer.js';
import type { Logger } from '@services/Logger.js';
import { CallbackManager } from './CallbackManager.js';
import type { AskContext, RequestOutcome } from './HookPipeline.js';
import { ToolOrchestrator } from './ToolOrchestrator.js';
import { decodeOutput, responseFormatFor } from '@schema/SchemaInferencer.js';
import { ConfigurationError, NoChoicesError, TransportError, TurnLimitError } from '../errors.js';
import { formatError, isAbortError, preview } from '@utils/errorUtils.js';
import { AGENT_CONFIG, RESPONSE_FORMAT, RETRY_CONFIG, TEXT_LIMITS } from '@config/constants.js';

/**
 * Output mode: free text, or a zod shape the answer is decoded into
 */
export type OutputMode = 'text' | z.ZodTypeAny;

export interface AskBaseOptions extends SamplingParameters {
  /** User prompt; must not be empty */
  prompt: string;
  /** Optional system message placed first */
  system?: string;
  /** Model id; falls back to the client's default model */
  model?: string;
  /** Images and PDFs sent before the prompt */
  files?: readonly FileAttachment[];
  /** Tools the model may call */
  tools?: readonly Tool[];
  /** Transport attempts per model turn (default 3) */
  retries?: number;
  /** First backoff delay; doubles per attempt, capped */
  retryDelayMs?: number;
  /** Maximum model turns before TurnLimitError (default 25) */
  maxTurns?: number;
  /** Provider-specific fields merged into the request body */
  extraFields?: Record<string, unknown>;
  /** Name of the generation observation */
  generationName?: string;
  signal?: AbortSignal;
  /** Trace linkage from an enclosing graph run or tool call */
  trace?: TraceContext;
  /** Run id of the enclosing execution, for lifecycle callbacks */
  parentRunId?: string;
}

export interface TextAskOptions extends AskBaseOptions {
  output?: 'text';
}

export interface StructuredAskOptions<S extends z.ZodTypeAny> extends AskBaseOptions {
  output: S;
}

export type AskOptions = AskBaseOptions & { output?: OutputMode };

/**
 * AskOptions merged with client defaults
 */
export interface ResolvedAskConfig {
  prompt: string;
  system?: string;
  model: string;
  output: OutputMode;
  sampling: SamplingParameters;
  files: readonly FileAttachment[];
  tools: readonly Tool[];
  retries: number;
  retryDelayMs: number;
  maxTurns: number;
  extraFields?: Record<string, unknown>;
  generationName: string;
  signal?: AbortSignal;
  trace: TraceContext;
  parentRunId?: string;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Merge caller options onto client defaults
 *
 * @throws ConfigurationError on an empty prompt, a bad budget or no model
 */
export function resolveAskConfig(client: Client, options: AskOptions): ResolvedAskConfig {
  if (options.prompt.trim() === '') {
    throw new ConfigurationError('prompt must not be empty');
  }

  const model = options.model ?? client.config.defaultModel;
  if (model === undefined || model === null || model.trim() === '') {
    throw new ConfigurationError('no model given and the client has no default model');
  }

  const retryDelayMs = options.retryDelayMs ?? client.config.retryDelayMs;
  if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
    throw new ConfigurationError(`retryDelayMs must be a non-negative number (got ${retryDelayMs})`);
  }

  return {
    prompt: options.prompt,
    system: options.system,
    model,
    output: options.output ?? 'text',
    sampling: {
      temperature: options.temperature,
      topP: options.topP,
      frequencyPenalty: options.frequencyPenalty,
      presencePenalty: options.presencePenalty,
      seed: options.seed,
      maxTokens: options.maxTokens,
      reasoningEffort: options.reasoningEffort,
      user: options.user,
    },
    files: options.files ?? [],
    tools: options.tools ?? [],
    retries: requirePositiveInteger('retries', options.retries ?? RETRY_CONFIG.DEFAULT_ATTEMPTS),
    retryDelayMs,
    maxTurns: requirePositiveInteger('maxTurns', options.maxTurns ?? AGENT_CONFIG.MAX_TURNS),
    extraFields: options.extraFields,
    generationName: options.generationName ?? options.trace?.observationName ?? RESPONSE_FORMAT.GENERATION_NAME,
    signal: options.signal,
    trace: { ...options.trace },
    parentRunId: options.parentRunId,
  };
}

/**
 * Initial turn history: system, attachments (images, then PDFs), prompt
 */
export function buildInitialMessages(config: Pick<ResolvedAskConfig, 'system' | 'files' | 'prompt'>): Message[] {
  const messages: Message[] = [];
  if (config.system !== undefined && config.system !== '') {
    messages.push({ role: 'system', content: config.system });
  }
  messages.push(...buildAttachmentMessages(config.files));
  messages.push({ role: 'user', content: config.prompt });
  return messages;
}

/**
 * Backoff before the attempt following failed attempt `attempt` (1-based)
 */
export function backoffDelay(retryDelayMs: number, attempt: number): number {
  return Math.min(retryDelayMs * 2 ** (attempt - 1), RETRY_CONFIG.MAX_BACKOFF_MS);
}

/**
 * Call the model up to `retries` times
 *
 * @throws TransportError once the budget is spent or the signal fires
 */
async function completeWithRetry(
  transport: ModelClient,
  request: ChatRequest,
  config: ResolvedAskConfig,
  logger: Logger
): Promise<ChatResponse> {
  const { signal } = config;
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.retries; attempt++) {
    if (signal?.aborted) {
      throw new TransportError(attempt - 1, signal.reason ?? lastError, true);
    }

    try {
      const response = await transport.complete(request, { signal });
      if (attempt > 1) {
        logger.info(`[ASK] Model call succeeded on attempt ${attempt}/${config.retries}`);
      }
      return response;
    } catch (error) {
      lastError = error;
      if (signal?.aborted || isAbortError(error)) {
        throw new TransportError(attempt, error, true);
      }
      logger.warn(`[ASK] Model call attempt ${attempt}/${config.retries} to ${transport.endpoint} failed:`, formatError(error));
    }

    if (attempt < config.retries) {
      const waitTime = backoffDelay(config.retryDelayMs, attempt);
      try {
        await delay(waitTime, undefined, { signal });
      } catch (error) {
        throw new TransportError(attempt, error, true);
      }
    }
  }

  throw new TransportError(config.retries, lastError);
}

function unwrapOutcome(outcome: RequestOutcome): ChatResponse {
  if (outcome.error !== undefined) {
    throw outcome.error;
  }
  if (!outcome.response) {
    throw new ConfigurationError('after-request hooks produced neither a response nor an error');
  }
  return outcome.response;
}

/**
 * Run a conversation to its final answer
 *
 * @throws ConfigurationError, TransportError, NoChoicesError, TurnLimitError,
 *   DecodeError, ToolNotFoundError, ToolArgumentDecodeError, ToolExecutionError
 */
export function ask<S extends z.ZodTypeAny>(client: Client, options: StructuredAskOptions<S>): Promise<z.infer<S>>;
export function ask(client: Client, options: TextAskOptions): Promise<string>;
export async function ask(client: Client, options: AskOptions): Promise<unknown> {
  const config = resolveAskConfig(client, options);
  const logger = client.logger;

  // Built per call so no tool state leaks between asks
  const toolManager = new ToolManager(config.tools, logger);
  const functionDefinitions = toolManager.getFunctionDefinitions();
  const responseFormat: ResponseFormat | undefined =
    config.output === 'text' ? undefined : responseFormatFor(config.output);

  const callbacks = new CallbackManager(client.callbacks, logger, config.parentRunId);
  const orchestrator = new ToolOrchestrator(toolManager, callbacks, logger, client.tracer);

  const ctx: AskContext = {
    runId: callbacks.runId,
    turn: 0,
    generationName: config.generationName,
    trace: config.trace,
    signal: config.signal,
    logger,
  };

  logger.debug(
    `[ASK] Run ${ctx.runId}: model=${config.model} mode=${config.output === 'text' ? 'text' : 'structured'} tools=${toolManager.size}`
  );
  await callbacks.emit('onRunStart', {
    ...callbacks.runLinkage(),
    model: config.model,
    input: config.prompt,
    structured: config.output !== 'text',
  });

  try {
    const output = await run();
    await callbacks.emit('onRunEnd', { ...callbacks.runLinkage(), output, turns: ctx.turn });
    return output;
  } catch (error) {
    logger.debug(`[ASK] Run ${ctx.runId} failed:`, formatError(error));
    await callbacks.emit('onError', { ...callbacks.runLinkage(), stage: 'run', error });
    throw error;
  }

  async function run(): Promise<unknown> {
    const request = await client.hooks.runBefore(ctx, {
      model: config.model,
      messages: buildInitialMessages(config),
      ...config.sampling,
      responseFormat,
      tools: functionDefinitions.length > 0 ? functionDefinitions : undefined,
      parallelToolCalls: functionDefinitions.length > 0 ? true : undefined,
      extraFields: config.extraFields,
    });

    let outcome: RequestOutcome;
    try {
      outcome = { response: await runTurns(request) };
    } catch (error) {
      outcome = { error };
    }

    const response = unwrapOutcome(await client.hooks.runAfter(ctx, outcome));
    const choice = response.choices[0];
    if (!choice) {
      throw new NoChoicesError(request.model);
    }
    return finish(choice.message.content ?? '');
  }

  /**
   * Model turns and tool rounds until an answer without tool calls
   */
  async function runTurns(request: ChatRequest): Promise<ChatResponse> {
    // Starts from the hooked messages so a rewrite carries into every turn
    const history = new MessageHistory(request.messages);

    for (let turn = 1; turn <= config.maxTurns; turn++) {
      ctx.turn = turn;
      const turnRequest: ChatRequest = { ...request, messages: history.getMessages() };

      await callbacks.emit('onGenerationStart', {
        ...callbacks.runLinkage(),
        turn,
        model: turnRequest.model,
        messages: turnRequest.messages,
      });

      let response: ChatResponse;
      try {
        response = await completeWithRetry(client.transport, turnRequest, config, logger);
      } catch (error) {
        await callbacks.emit('onError', { ...callbacks.runLinkage(), stage: 'generation', error });
        throw error;
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new NoChoicesError(turnRequest.model);
      }

      const message = choice.message;
      await callbacks.emit('onGenerationEnd', {
        ...callbacks.runLinkage(),
        turn,
        finishReason: choice.finishReason,
        content: message.content,
        toolCalls: message.tool_calls ?? [],
        usage: response.usage,
      });

      if (!hasToolCalls(message)) {
        return response;
      }

      history.addMessage({ role: 'assistant', content: message.content, tool_calls: message.tool_calls });
      logger.debug(`[ASK] Turn ${turn}: model requested ${message.tool_calls.length} tool call(s)`);

      const results = await orchestrator.executeRound(message.tool_calls, {
        client,
        trace: ctx.trace,
        signal: config.signal,
      });
      history.addMessages(results);
    }

    logger.error(`[ASK] Run ${ctx.runId} reached the turn limit of ${config.maxTurns}`);
    throw new TurnLimitError(config.maxTurns);
  }

  function finish(content: string): unknown {
    logger.debug(`[ASK] Final content: ${preview(content, TEXT_LIMITS.LOG_PREVIEW_MAX)}`);
    if (config.output === 'text') {
      return content;
    }
    return decodeOutput(config.output, content);
  }
}
