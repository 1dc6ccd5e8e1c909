/**
 * ToolValidator - Strict decoding of model-supplied tool arguments
 *
 * Arguments arrive as raw JSON text. Decoding is strict: malformed JSON,
 * missing required fields, wrongly typed fields and undeclared fields (at
 * any depth) all fail with ToolArgumentDecodeError carrying one issue per
 * problem.
 */

import type { z } from 'zod';
import type { Tool } from './Tool.js';
import type { ToolCallRequest } from '@shared/index.js';
import { ToolArgumentDecodeError } from '../errors.js';
import { formatIssues, strictShape } from '@schema/SchemaInferencer.js';

export class ToolValidator {
  private readonly strictShapes = new WeakMap<z.ZodTypeAny, z.ZodTypeAny>();

  /**
   * Decode the argument text of a tool call against the tool's shape
   *
   * @param tool - Resolved tool
   * @param call - Tool call as requested by the model
   * @returns Decoded arguments
   * @throws ToolArgumentDecodeError
   */
  decodeArguments<S extends z.AnyZodObject>(tool: Tool<S>, call: ToolCallRequest): z.infer<S> {
    // Some providers send an empty string for tools without parameters
    const text = call.arguments.trim() === '' ? '{}' : call.arguments;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolArgumentDecodeError(tool.name, call.id, [`invalid JSON: ${reason}`], { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ToolArgumentDecodeError(tool.name, call.id, ['arguments must be a JSON object']);
    }

    const result = this.strictParameters(tool.parameters).safeParse(parsed);
    if (!result.success) {
      throw new ToolArgumentDecodeError(tool.name, call.id, formatIssues(result.error), { cause: result.error });
    }
    return result.data;
  }

  private strictParameters(parameters: z.AnyZodObject): z.ZodTypeAny {
    let strict = this.strictShapes.get(parameters);
    if (!strict) {
      strict = strictShape(parameters);
      this.strictShapes.set(parameters, strict);
    }
    return strict;
  }
}
