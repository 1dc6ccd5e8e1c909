/**
 * MCPToolServer - Serves turnkit tools to MCP clients
 *
 * Each tool is listed with the same strict input schema the model sees.
 * A call is decoded through ToolManager exactly like a model tool call and
 * the handler runs with the serving client, so tools can make nested asks.
 *
 * Unknown tool names are protocol errors; argument and handler failures
 * come back as `isError` results the calling model can read.
 *
 * @example
 * ```typescript
 * const server = new MCPToolServer(client, { name: 'capitals', version: '1.0.0', tools: [getCapital] });
 * await server.connect(new StdioServerTransport());
 * ```
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool as MCPToolDescriptor,
} from '@modelcontextprotocol/sdk/types.js';
import type { Client } from '@client/Client.js';
import type { Tool, ToolContext } from '@tools/Tool.js';
import { ToolManager, type ResolvedToolCall } from '@tools/ToolManager.js';
import { serializeToolResult } from '@llm/FunctionCalling.js';
import type { ToolCallRequest } from '@shared/index.js';
import { ToolExecutionError, ToolNotFoundError } from '../errors.js';
import { formatError } from '@utils/errorUtils.js';
import { generateId } from '@utils/id.js';
import { MCP_CONFIG } from '@config/constants.js';

export interface MCPToolServerOptions {
  /** Server name announced to clients */
  name: string;
  version: string;
  tools: readonly Tool[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

export class MCPToolServer {
  readonly server: Server;
  private readonly toolManager: ToolManager;
  private readonly descriptors: MCPToolDescriptor[];

  /**
   * @throws ConfigurationError on duplicate tool names
   * @throws SchemaInferenceError when a tool's argument shape is unsupported
   */
  constructor(
    private readonly client: Client,
    options: MCPToolServerOptions
  ) {
    this.toolManager = new ToolManager(options.tools, client.logger);
    this.descriptors = this.toolManager.getFunctionDefinitions().map(({ function: definition }): MCPToolDescriptor => ({
      name: definition.name,
      description: definition.description,
      inputSchema: {
        type: 'object',
        properties: definition.parameters.properties,
        required: definition.parameters.required,
        additionalProperties: false,
      },
    }));

    this.server = new Server(
      { name: options.name, version: options.version },
      { capabilities: { tools: { listChanged: false } } }
    );
    this.server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: this.descriptors }));
    this.server.setRequestHandler(CallToolRequestSchema, (request, extra) => {
      const call: ToolCallRequest = {
        id: `${MCP_CONFIG.CALL_ID_PREFIX}${String(extra.requestId)}`,
        name: request.params.name,
        arguments: JSON.stringify(request.params.arguments ?? {}),
      };
      return this.callTool(call, extra.signal);
    });

    for (const descriptor of this.descriptors) {
      client.logger.info(`[MCP] Serving tool ${descriptor.name} on ${options.name}`);
    }
  }

  /**
   * Start serving over a transport (stdio, HTTP, in-memory)
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
    this.client.logger.debug(`[MCP] Connected with ${this.descriptors.length} tool(s)`);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  private async callTool(call: ToolCallRequest, signal: AbortSignal): Promise<CallToolResult> {
    let resolved: ResolvedToolCall;
    try {
      resolved = this.toolManager.resolve(call);
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        throw new McpError(ErrorCode.InvalidParams, `unknown tool '${call.name}'`);
      }
      return errorResult(formatError(error));
    }

    const context: ToolContext = {
      client: this.client,
      toolCallId: call.id,
      runId: generateId(),
      signal,
      trace: {},
      logger: this.client.logger,
    };

    try {
      const result = await resolved.tool.handler(resolved.args, context);
      this.client.logger.debug(`[MCP] ${call.name} (${call.id}) completed`);
      const content: CallToolResult['content'] = [{ type: 'text', text: serializeToolResult(result) }];
      return isRecord(result) ? { content, structuredContent: result } : { content };
    } catch (error) {
      const failure = new ToolExecutionError(call.name, call.id, error);
      this.client.logger.error(`[MCP] ${failure.message}`);
      return errorResult(failure.message);
    }
  }
}
