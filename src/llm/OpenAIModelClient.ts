/**
 * OpenAIModelClient - OpenAI-compatible chat-completion transport
 *
 * Works with any endpoint that speaks the chat-completions protocol
 * (OpenAI, OpenRouter, Gemini's OpenAI surface, local servers).
 * The SDK's own retries are disabled: the driver owns the retry budget.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { ModelClient, type CompleteOptions } from './ModelClient.js';
import type { ChatRequest, ChatResponse, ContentPart, Message } from '@shared/index.js';
import { API_TIMEOUTS } from '@config/constants.js';
import type { Logger } from '@services/Logger.js';

export interface OpenAIModelClientConfig {
  apiKey: string;
  /** Base URL of the endpoint; the SDK default when omitted */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  logger?: Logger;
}

function toContentPart(part: ContentPart): ChatCompletionContentPart {
  switch (part.type) {
    case 'text':
      return { type: 'text', text: part.text };
    case 'image_url':
      return { type: 'image_url', image_url: { url: part.image_url.url } };
    case 'file':
      return { type: 'file', file: { file_data: part.file.file_data, filename: part.file.filename } };
  }
}

/**
 * Convert a protocol message to the SDK's message type
 */
export function toOpenAIMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return {
        role: 'user',
        content: typeof message.content === 'string' ? message.content : message.content.map(toContentPart),
      };
    case 'assistant':
      return message.tool_calls && message.tool_calls.length > 0
        ? {
            role: 'assistant',
            content: message.content,
            tool_calls: message.tool_calls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          }
        : { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.tool_call_id, content: message.content };
  }
}

/**
 * Build the SDK request body; unset sampling parameters are left out
 */
export function toOpenAIParams(request: ChatRequest): ChatCompletionCreateParamsNonStreaming {
  const params: ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    messages: request.messages.map(toOpenAIMessage),
  };

  if (request.temperature !== undefined) params.temperature = request.temperature;
  if (request.topP !== undefined) params.top_p = request.topP;
  if (request.frequencyPenalty !== undefined) params.frequency_penalty = request.frequencyPenalty;
  if (request.presencePenalty !== undefined) params.presence_penalty = request.presencePenalty;
  if (request.seed !== undefined) params.seed = request.seed;
  if (request.maxTokens !== undefined) params.max_tokens = request.maxTokens;
  if (request.reasoningEffort !== undefined) params.reasoning_effort = request.reasoningEffort;
  if (request.user !== undefined) params.user = request.user;

  if (request.responseFormat) {
    params.response_format = {
      type: 'json_schema',
      json_schema: {
        name: request.responseFormat.json_schema.name,
        schema: request.responseFormat.json_schema.schema,
        strict: request.responseFormat.json_schema.strict,
      },
    };
  }

  if (request.tools && request.tools.length > 0) {
    params.tools = request.tools.map((tool): ChatCompletionTool => ({
      type: 'function',
      function: {
        name: tool.function.name,
        description: tool.function.description,
        parameters: tool.function.parameters,
        strict: tool.function.strict,
      },
    }));
    if (request.parallelToolCalls !== undefined) {
      params.parallel_tool_calls = request.parallelToolCalls;
    }
  }

  if (request.extraFields) {
    // Provider-specific keys travel in the body untouched
    Object.assign(params, request.extraFields);
  }

  return params;
}

/**
 * Convert the SDK response to the protocol response
 */
export function fromOpenAIResponse(completion: ChatCompletion): ChatResponse {
  return {
    id: completion.id,
    model: completion.model,
    choices: completion.choices.map(choice => ({
      index: choice.index,
      finishReason: choice.finish_reason ?? null,
      message: {
        role: 'assistant',
        content: choice.message.content,
        tool_calls: choice.message.tool_calls?.map(call => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        })),
      },
    })),
    usage: completion.usage
      ? {
          promptTokens: completion.usage.prompt_tokens,
          completionTokens: completion.usage.completion_tokens,
          totalTokens: completion.usage.total_tokens,
        }
      : undefined,
  };
}

export class OpenAIModelClient extends ModelClient {
  private readonly client: OpenAI;
  private readonly logger?: Logger;

  /**
   * @example
   * ```typescript
   * const transport = new OpenAIModelClient({
   *   apiKey: process.env.OPENAI_API_KEY ?? '',
   *   baseURL: 'https://openrouter.ai/api/v1',
   * });
   * ```
   */
  constructor(config: OpenAIModelClientConfig) {
    super();
    this.logger = config.logger;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? API_TIMEOUTS.MODEL_REQUEST,
      defaultHeaders: config.headers,
      maxRetries: 0,
    });
  }

  get endpoint(): string {
    return this.client.baseURL;
  }

  async complete(request: ChatRequest, options: CompleteOptions = {}): Promise<ChatResponse> {
    const params = toOpenAIParams(request);
    this.logger?.debug(
      `[OPENAI_CLIENT] POST ${this.endpoint}/chat/completions model=${params.model} messages=${params.messages.length}`
    );

    const completion = await this.client.chat.completions.create(params, { signal: options.signal });

    this.logger?.debug(
      `[OPENAI_CLIENT] Response ${completion.id}: ${completion.choices.length} choice(s), usage=${JSON.stringify(completion.usage ?? null)}`
    );
    return fromOpenAIResponse(completion);
  }
}
