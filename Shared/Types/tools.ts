/**
 * Shared tool definition types for MCP services
 */

import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ValidationError } from './errors.js';
import { isRecord } from '../Utils/guards.js';

/**
 * Standard MCP tool definition format
 */
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
  annotations?: ToolAnnotations;
};

/**
 * Per-call context handed to every handler. `signal` fires when the caller
 * cancels the request or its connection closes.
 */
export interface ToolContext {
  signal: AbortSignal;
}

/**
 * Generic tool handler function type
 */
export type ToolHandler<TInput = unknown, TOutput = unknown> = (
  input: TInput,
  context: ToolContext
) => Promise<TOutput>;

/**
 * Type-erased tool map entry used by registries and the HTTP /tools/call endpoint.
 * `call` validates input via schema then invokes the handler.
 */
export interface ToolMapEntry {
  tool: ToolDefinition;
  schema: z.ZodType;
  call: (input: unknown, context: ToolContext) => Promise<unknown>;
}

/**
 * Render zod issues as `path: message` pairs, e.g. `page: Number must be greater than 0`.
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Convert a zod object schema into the JSON Schema shape MCP clients expect in tools/list.
 */
export function toInputSchema(schema: z.ZodType): ToolDefinition['inputSchema'] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const inputSchema: ToolDefinition['inputSchema'] = { type: 'object', properties: {} };
  if (!isRecord(json)) return inputSchema;

  if (isRecord(json.properties)) {
    inputSchema.properties = json.properties;
  }
  if (Array.isArray(json.required)) {
    const required = json.required.filter((key): key is string => typeof key === 'string');
    if (required.length > 0) inputSchema.required = required;
  }
  return inputSchema;
}

/**
 * Create a type-safe ToolMapEntry.
 * Validation and handler call happen in the same generic scope where T is known,
 * so safeParse().data (T) flows directly into handler (T) — no cast needed.
 */
export function toolEntry<T>(
  definition: Omit<ToolDefinition, 'inputSchema'>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: ToolHandler<T>
): ToolMapEntry {
  return {
    tool: { ...definition, inputSchema: toInputSchema(schema) },
    schema,
    async call(input: unknown, context: ToolContext): Promise<unknown> {
      const result = schema.safeParse(input);
      if (!result.success) {
        throw new ValidationError(`Invalid parameters: ${formatZodIssues(result.error)}`, {
          issues: result.error.issues,
        });
      }
      return handler(result.data, context);
    },
  };
}
