/**
 * Library-wide constants for retries, limits, buffer sizes and naming
 *
 * These values are for internal use and maintenance - callers tune behavior
 * through ClientOptions and AskOptions, not by editing this file.
 */

// ===========================================
// RETRY
// ===========================================

/**
 * Retry configuration for model calls
 */
export const RETRY_CONFIG = {
  /** Transport attempts per model call when the caller sets none */
  DEFAULT_ATTEMPTS: 3,

  /** First backoff delay between attempts (milliseconds) */
  DEFAULT_DELAY_MS: 100,

  /** Upper bound for the exponential backoff (milliseconds) */
  MAX_BACKOFF_MS: 2000,
} as const;

// ===========================================
// NETWORK
// ===========================================

/**
 * Timeouts for the model endpoint
 */
export const API_TIMEOUTS = {
  /** Per-request timeout handed to the OpenAI SDK (10 minutes) */
  MODEL_REQUEST: 600000,
} as const;

// ===========================================
// CONVERSATION
// ===========================================

export const AGENT_CONFIG = {
  /** Maximum model turns in one ask call before giving up */
  MAX_TURNS: 25,
} as const;

/**
 * Names sent to the endpoint
 */
export const RESPONSE_FORMAT = {
  /** Name of the json_schema response format */
  SCHEMA_NAME: 'json_schema_response',

  /** Default generation name used by tracing */
  GENERATION_NAME: 'chat-completion',
} as const;

// ===========================================
// TRACING
// ===========================================

export const TRACING = {
  /** Prefix of the trace created for each graph run */
  GRAPH_TRACE_PREFIX: 'graph_',

  /** Prefix of the span created for each tool call */
  TOOL_SPAN_PREFIX: 'tool_call_',

  /** Trace opened by the tracing plugin when an ask has none */
  ASK_TRACE_NAME: 'turnkit-chat-trace',
} as const;

// ===========================================
// BUFFERS & TEXT
// ===========================================

export const BUFFER_SIZES = {
  /** Maximum number of log entries kept in memory */
  MAX_LOG_BUFFER_SIZE: 1000,

  /** Maximum characters of a single stored log message */
  MAX_LOG_MESSAGE_LENGTH: 4000,
} as const;

export const TEXT_LIMITS = {
  /** Characters of model content or tool arguments shown in log previews */
  LOG_PREVIEW_MAX: 200,
} as const;

export const MCP_CONFIG = {
  /** Prefix of the tool call id derived from an MCP request id */
  CALL_ID_PREFIX: 'mcp-',
} as const;

export const ID_GENERATION = {
  /** Random bytes in a run identifier (32 hex chars) */
  ID_BYTES: 16,
} as const;
