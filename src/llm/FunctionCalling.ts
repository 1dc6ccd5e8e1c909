/**
 * FunctionCalling - Utilities for tool-call messages
 *
 * Provides utilities for:
 * - Serializing tool results into tool-result messages
 * - Inspecting assistant messages for tool calls
 */

import type { AssistantMessage, ToolResultMessage } from '@shared/index.js';

/**
 * Serialize a tool handler's return value to message text
 *
 * Strings are passed through; everything else is JSON. A handler that
 * returns nothing produces "null" so the model still sees a result.
 */
export function serializeToolResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  const json = JSON.stringify(result);
  return json === undefined ? 'null' : json;
}

/**
 * Create a tool-result message tagged with the originating call id
 *
 * @param toolCallId - ID of the tool call
 * @param result - Value returned by the handler
 */
export function createToolResultMessage(toolCallId: string, result: unknown): ToolResultMessage {
  return {
    role: 'tool',
    tool_call_id: toolCallId,
    content: serializeToolResult(result),
  };
}

/**
 * Check if an assistant message requests tool calls
 */
export function hasToolCalls(message: AssistantMessage): message is AssistantMessage & { tool_calls: NonNullable<AssistantMessage['tool_calls']> } {
  return Array.isArray(message.tool_calls) && message.tool_calls.length > 0;
}
