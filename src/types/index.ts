/**
 * Shared types for the conversation protocol
 *
 * Shapes follow OpenAI-compatible chat-completion semantics; the transport
 * converts them to and from the SDK's own types.
 */

// ===========================================
// MESSAGES
// ===========================================

export interface TextContentPart {
  type: 'text';
  text: string;
}

export interface ImageContentPart {
  type: 'image_url';
  image_url: {
    url: string;
  };
}

export interface FileContentPart {
  type: 'file';
  file: {
    file_data: string;
    filename: string;
  };
}

export type ContentPart = TextContentPart | ImageContentPart | FileContentPart;

/**
 * A tool call requested by the model
 */
export interface ToolCallRequest {
  /** Unique within one assistant turn */
  id: string;
  name: string;
  /** Raw JSON argument text, decoded by the tool */
  arguments: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string | ContentPart[];
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: ToolCallRequest[];
}

export interface ToolResultMessage {
  role: 'tool';
  tool_call_id: string;
  content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolResultMessage;

// ===========================================
// REQUEST / RESPONSE
// ===========================================

/**
 * JSON Schema object produced by the schema inferencer
 */
export type JsonSchema = {
  type?: string | string[];
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  enum?: Array<string | number | boolean | null>;
};

/**
 * Tool declaration sent with the request
 */
export interface FunctionDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchema;
    strict: boolean;
  };
}

export interface ResponseFormat {
  type: 'json_schema';
  json_schema: {
    name: string;
    schema: JsonSchema;
    strict: boolean;
  };
}

export type ReasoningEffort = 'low' | 'medium' | 'high';

/**
 * Sampling parameters; undefined means "not set" so an explicit 0 is sent
 */
export interface SamplingParameters {
  temperature?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  seed?: number;
  maxTokens?: number;
  reasoningEffort?: ReasoningEffort;
  user?: string;
}

export interface ChatRequest extends SamplingParameters {
  model: string;
  messages: Message[];
  responseFormat?: ResponseFormat;
  tools?: FunctionDefinition[];
  parallelToolCalls?: boolean;
  /** Provider-specific fields merged into the request body */
  extraFields?: Record<string, unknown>;
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatChoice {
  index: number;
  finishReason: string | null;
  message: AssistantMessage;
}

export interface ChatResponse {
  id: string;
  model: string;
  choices: ChatChoice[];
  usage?: Usage;
}
