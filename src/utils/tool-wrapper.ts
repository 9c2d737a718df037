import { z } from 'zod';
import type { InputSchema, PropertySchema, ToolHandler } from '../types/mcp.js';
import type { ToolResult } from '../types/tools.js';
import { fromZodError } from './error-handler.js';
import { createLogger } from './logger.js';

const logger = createLogger('ToolWrapper');

export interface ToolDefinition<S extends z.AnyZodObject, R extends ToolResult> {
  name: string;
  description: string;
  schema: S;
  handler: (args: z.infer<S>) => R | Promise<R>;
}

/**
 * Binds caller arguments to a handler by name. The zod schema is the single
 * declaration of a tool's parameters: it fills defaults for omitted optional
 * arguments, rejects missing or mistyped required ones, and is rendered as the
 * JSON schema published by tools/list.
 */
export class ToolWrapper<S extends z.AnyZodObject, R extends ToolResult> implements ToolHandler {
  public readonly name: string;
  public readonly description: string;
  public readonly inputSchema: InputSchema;

  constructor(private readonly definition: ToolDefinition<S, R>) {
    this.name = definition.name;
    this.description = definition.description;
    this.inputSchema = zodToJsonSchema(definition.schema);
  }

  async execute(args: unknown): Promise<R> {
    const parsed = this.definition.schema.safeParse(args ?? {});
    if (!parsed.success) {
      throw fromZodError(`Invalid arguments for ${this.name}`, parsed.error);
    }

    logger.debug({ tool: this.name, args: parsed.data }, 'Executing tool');

    return this.definition.handler(parsed.data);
  }
}

export function wrapTool<S extends z.AnyZodObject, R extends ToolResult>(
  definition: ToolDefinition<S, R>
): ToolWrapper<S, R> {
  return new ToolWrapper(definition);
}

export function zodToJsonSchema(schema: z.AnyZodObject): InputSchema {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const { property, optional } = zodFieldToJsonSchema(field);
    properties[key] = property;

    if (!optional) {
      required.push(key);
    }
  }

  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

function zodFieldToJsonSchema(field: z.ZodTypeAny): { property: PropertySchema; optional: boolean } {
  if (field instanceof z.ZodDefault) {
    const inner = zodFieldToJsonSchema(field.removeDefault());
    const value: unknown = field._def.defaultValue();
    const property: PropertySchema = { ...inner.property };

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      property.default = value;
    }

    return { property, optional: true };
  }

  if (field instanceof z.ZodOptional) {
    return { property: zodFieldToJsonSchema(field.unwrap()).property, optional: true };
  }

  const property: PropertySchema = { type: primitiveType(field) };
  if (field.description) {
    property.description = field.description;
  }

  return { property, optional: false };
}

function primitiveType(field: z.ZodTypeAny): PropertySchema['type'] {
  if (field instanceof z.ZodString) return 'string';
  if (field instanceof z.ZodNumber) return 'number';
  if (field instanceof z.ZodBoolean) return 'boolean';

  throw new Error(`Unsupported parameter type: ${field.constructor.name}`);
}
