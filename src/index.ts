/**
 * turnkit - Conversation driver and node-graph engine for
 * OpenAI-compatible chat-completion endpoints
 */

// Client & configuration
export { Client, type ClientOptions, type Plugin } from '@client/Client.js';
export {
  DEFAULT_CLIENT_CONFIG,
  ENV_VARS,
  resolveClientConfig,
  validateConfigValue,
  type ClientConfig,
  type ClientConfigInput,
} from '@config/defaults.js';

// Conversation driver
export {
  ask,
  resolveAskConfig,
  buildInitialMessages,
  backoffDelay,
  type AskBaseOptions,
  type AskOptions,
  type TextAskOptions,
  type StructuredAskOptions,
  type OutputMode,
  type ResolvedAskConfig,
} from '@agent/Ask.js';
export {
  HookPipeline,
  type AskContext,
  type RequestOutcome,
  type BeforeRequestHook,
  type AfterRequestHook,
} from '@agent/HookPipeline.js';
export {
  CallbackManager,
  type AgentCallback,
  type CallbackEvents,
  type RunStartEvent,
  type RunEndEvent,
  type GenerationStartEvent,
  type GenerationEndEvent,
  type ToolCallStartEvent,
  type ToolCallEndEvent,
  type ErrorEvent,
} from '@agent/CallbackManager.js';

// Tools
export { defineTool, toolId, type Tool, type ToolContext, type ToolDefinition, type ToolHandler } from '@tools/Tool.js';

// Schema
export { inferJsonSchema, responseFormatFor, decodeOutput, strictShape } from '@schema/SchemaInferencer.js';

// Transport & messages
export { ModelClient, type CompleteOptions } from '@llm/ModelClient.js';
export { OpenAIModelClient, type OpenAIModelClientConfig } from '@llm/OpenAIModelClient.js';
export { filePdf, filePng, fileFromDataUri, type FileAttachment } from '@llm/Attachments.js';
export { openRouterProviders, openRouterFileParser, mergeExtraFields, type ParserEngine } from '@llm/ProviderFields.js';
export type * from '@shared/index.js';

// Graph
export {
  Graph,
  defineNode,
  type GraphNode,
  type NodeArg,
  type NodeResult,
  type GraphOptions,
  type GraphRunOptions,
} from '@graph/Graph.js';
export { Transition } from '@graph/Transition.js';
export { aiCallNode, type AICallNodeOptions } from '@graph/AICallNode.js';

// MCP
export { MCPToolServer, type MCPToolServerOptions } from '@mcp/MCPToolServer.js';

// Tracing
export { type Tracer, type TraceContext, type Observation, type ObservationEnd } from '@tracing/Tracer.js';
export { tracingPlugin } from '@tracing/TracingPlugin.js';

// Logging & errors
export { Logger, LogLevel, logger, type LogEntry, type LoggerOptions } from '@services/Logger.js';
export * from './errors.js';
