/**
 * Tool - Capability the model can call during an ask
 *
 * A tool pairs a unique name with a zod argument shape and a handler.
 * The shape is sent to the model as a strict function schema and used to
 * decode the model's argument text before the handler runs.
 *
 * @example
 * ```typescript
 * const getCapital = defineTool({
 *   name: 'get_capital',
 *   description: 'Look up the capital city of a country',
 *   parameters: z.object({ country: z.string() }),
 *   handler: async ({ country }) => capitals[country],
 * });
 * ```
 */

import type { z } from 'zod';
import type { Client } from '@client/Client.js';
import type { Logger } from '@services/Logger.js';
import type { TraceContext } from '@tracing/Tracer.js';

/**
 * Scoped context handed to a tool handler
 */
export interface ToolContext {
  /** Client that issued the ask; lets a tool make nested asks */
  client: Client;
  /** Id of the tool call being served */
  toolCallId: string;
  /** Nested run id of this execution; pass as `parentRunId` to nested asks */
  runId: string;
  /** Aborted when the ask is cancelled or a sibling tool in the round fails */
  signal: AbortSignal;
  /** Linkage for nested asks and spans */
  trace: TraceContext;
  logger: Logger;
}

export type ToolHandler<S extends z.AnyZodObject> = (
  args: z.infer<S>,
  context: ToolContext
) => unknown | Promise<unknown>;

export interface Tool<S extends z.AnyZodObject = z.AnyZodObject> {
  /** Normalized tool id sent to the model */
  readonly name: string;
  readonly description: string;
  readonly parameters: S;
  // Method syntax keeps Tool<S> assignable to Tool for heterogeneous tool lists
  handler(args: z.infer<S>, context: ToolContext): unknown | Promise<unknown>;
}

export interface ToolDefinition<S extends z.AnyZodObject> {
  /** Display name; normalized with toolId() */
  name: string;
  description: string;
  parameters: S;
  handler: ToolHandler<S>;
}

/**
 * Normalize a tool name: lower-case, spaces and dashes become underscores
 */
export function toolId(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function defineTool<S extends z.AnyZodObject>(definition: ToolDefinition<S>): Tool<S> {
  return {
    name: toolId(definition.name),
    description: definition.description,
    parameters: definition.parameters,
    handler: definition.handler,
  };
}
