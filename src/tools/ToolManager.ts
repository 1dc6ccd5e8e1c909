/**
 * ToolManager - Per-call registry of the tools offered to the model
 *
 * Built fresh for every ask from the caller's tool list, so no tool state
 * is shared between calls. Handles registration, function definition
 * generation and resolution of model tool calls to decoded invocations.
 */

import type { Tool } from './Tool.js';
import { ToolValidator } from './ToolValidator.js';
import type { FunctionDefinition, ToolCallRequest } from '@shared/index.js';
import { ConfigurationError, ToolNotFoundError } from '../errors.js';
import { inferJsonSchema } from '@schema/SchemaInferencer.js';
import type { Logger } from '@services/Logger.js';

/**
 * A tool call matched to its tool with decoded arguments
 */
export interface ResolvedToolCall {
  call: ToolCallRequest;
  tool: Tool;
  args: Record<string, unknown>;
}

export class ToolManager {
  private readonly tools: Map<string, Tool> = new Map();
  private readonly functionDefinitions: FunctionDefinition[] = [];
  private readonly validator = new ToolValidator();

  /**
   * @throws ConfigurationError on duplicate tool names
   * @throws SchemaInferenceError when a tool's argument shape is unsupported
   */
  constructor(tools: readonly Tool[], private readonly logger: Logger) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new ConfigurationError(`duplicate tool name '${tool.name}'`);
      }
      this.tools.set(tool.name, tool);
      this.functionDefinitions.push({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: inferJsonSchema(tool.parameters, `tools.${tool.name}`),
          strict: true,
        },
      });
    }
    this.logger.debug(`[TOOL_MANAGER] Registered ${this.tools.size} tool(s)`);
  }

  /**
   * Get a tool by name
   */
  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Function definitions for the request, in registration order
   */
  getFunctionDefinitions(): FunctionDefinition[] {
    return this.functionDefinitions;
  }

  /**
   * Resolve a model tool call to its tool and decoded arguments
   *
   * @throws ToolNotFoundError for unknown names
   * @throws ToolArgumentDecodeError for malformed arguments
   */
  resolve(call: ToolCallRequest): ResolvedToolCall {
    const tool = this.tools.get(call.name);
    if (!tool) {
      this.logger.error(`[TOOL_MANAGER] Model requested unknown tool '${call.name}'`);
      throw new ToolNotFoundError(call.name, call.id);
    }

    const args = this.validator.decodeArguments(tool, call);
    return { call, tool, args };
  }
}
