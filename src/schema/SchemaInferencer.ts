/**
 * SchemaInferencer - Converts zod shapes into strict-mode JSON Schema
 *
 * Strict mode, as chat-completion endpoints expect it:
 * - every object has `additionalProperties: false`
 * - every object lists its required properties explicitly
 *
 * Shapes that cannot be expressed (unions, records, any, dates, ...) fail
 * here, when the request is built, never while decoding a response.
 */

import { z } from 'zod';
import { SchemaInferenceError, DecodeError } from '../errors.js';
import { RESPONSE_FORMAT } from '@config/constants.js';
import type { JsonSchema, ResponseFormat } from '@shared/index.js';

/**
 * Convert a zod shape into a strict JSON Schema
 *
 * @param shape - zod schema describing the value
 * @param path - location used in error messages
 * @throws SchemaInferenceError for unsupported shapes
 */
export function inferJsonSchema(shape: z.ZodTypeAny, path: string = '$'): JsonSchema {
  const schema = inferInner(shape, path);
  if (shape.description !== undefined && schema.description === undefined) {
    schema.description = shape.description;
  }
  return schema;
}

function inferInner(shape: z.ZodTypeAny, path: string): JsonSchema {
  if (shape instanceof z.ZodOptional) {
    return inferJsonSchema(shape.unwrap(), path);
  }

  if (shape instanceof z.ZodDefault) {
    return inferJsonSchema(shape.removeDefault(), path);
  }

  // Refinements validate on decode; the wire shape is the inner one
  if (shape instanceof z.ZodEffects) {
    return inferJsonSchema(shape.innerType(), path);
  }

  if (shape instanceof z.ZodNullable) {
    return makeNullable(inferJsonSchema(shape.unwrap(), path), path);
  }

  if (shape instanceof z.ZodObject) {
    return inferObject(shape, path);
  }

  if (shape instanceof z.ZodArray) {
    return {
      type: 'array',
      items: inferJsonSchema(shape.element, `${path}[]`),
    };
  }

  if (shape instanceof z.ZodString) {
    return { type: 'string' };
  }

  if (shape instanceof z.ZodNumber) {
    return { type: shape.isInt ? 'integer' : 'number' };
  }

  if (shape instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }

  if (shape instanceof z.ZodEnum) {
    const options: string[] = shape.options;
    return { type: 'string', enum: [...options] };
  }

  if (shape instanceof z.ZodLiteral) {
    const value: unknown = shape.value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return { type: typeof value, enum: [value] };
    }
    throw new SchemaInferenceError(path, `unsupported literal value ${String(value)}`);
  }

  throw new SchemaInferenceError(path, `unsupported shape ${shape.constructor.name}`);
}

function inferObject(shape: z.AnyZodObject, path: string): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries<z.ZodTypeAny>(shape.shape)) {
    properties[key] = inferJsonSchema(field, `${path}.${key}`);
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

function makeNullable(schema: JsonSchema, path: string): JsonSchema {
  if (typeof schema.type === 'string') {
    const nullable: JsonSchema = { ...schema, type: [schema.type, 'null'] };
    if (schema.enum) {
      nullable.enum = [...schema.enum, null];
    }
    return nullable;
  }
  throw new SchemaInferenceError(path, 'nullable is only supported on single-typed shapes');
}

/**
 * Build the json_schema response format for a structured answer
 *
 * @throws SchemaInferenceError when the root is not an object
 */
export function responseFormatFor(shape: z.ZodTypeAny, name: string = RESPONSE_FORMAT.SCHEMA_NAME): ResponseFormat {
  const schema = inferJsonSchema(shape);
  if (schema.type !== 'object') {
    throw new SchemaInferenceError('$', 'structured output must be an object at the root');
  }

  return {
    type: 'json_schema',
    json_schema: {
      name,
      schema,
      strict: true,
    },
  };
}

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Copy of a shape that rejects undeclared keys at every object depth
 *
 * The wire schema sets `additionalProperties: false` on every object, so
 * decoding holds nested objects to the same rule. Checks, refinements and
 * defaults of the original shape are kept.
 */
export function strictShape(shape: z.ZodTypeAny): z.ZodTypeAny {
  if (shape instanceof z.ZodObject) {
    const fields: z.ZodRawShape = {};
    for (const [key, field] of Object.entries<z.ZodTypeAny>(shape.shape)) {
      fields[key] = strictShape(field);
    }
    return new z.ZodObject({ ...shape._def, shape: () => fields, unknownKeys: 'strict' });
  }

  if (shape instanceof z.ZodArray) {
    return new z.ZodArray({ ...shape._def, type: strictShape(shape.element) });
  }

  if (shape instanceof z.ZodOptional) {
    return new z.ZodOptional({ ...shape._def, innerType: strictShape(shape.unwrap()) });
  }

  if (shape instanceof z.ZodNullable) {
    return new z.ZodNullable({ ...shape._def, innerType: strictShape(shape.unwrap()) });
  }

  if (shape instanceof z.ZodDefault) {
    return new z.ZodDefault({ ...shape._def, innerType: strictShape(shape.removeDefault()) });
  }

  if (shape instanceof z.ZodEffects) {
    return new z.ZodEffects({ ...shape._def, schema: strictShape(shape.innerType()) });
  }

  return shape;
}

/**
 * Decode model content into the declared shape
 *
 * Undeclared keys fail at any depth, as the strict wire schema promises.
 *
 * @throws DecodeError on malformed JSON or a shape mismatch; no partial value
 */
export function decodeOutput<S extends z.ZodTypeAny>(shape: S, content: string): z.infer<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError(content, [`invalid JSON: ${reason}`], { cause: error });
  }

  const result = strictShape(shape).safeParse(parsed);
  if (!result.success) {
    throw new DecodeError(content, formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}
