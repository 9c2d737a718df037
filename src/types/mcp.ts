import { z } from 'zod';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from './tools.js';

export { ErrorCode };

export const JSONRPC_VERSION = '2.0';

export const RequestIdSchema = z.union([z.string(), z.number()]).nullable();

export type RequestId = z.infer<typeof RequestIdSchema>;

export const RequestEnvelopeSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema.default(null),
  method: z.string().min(1),
  params: z.record(z.unknown()).default({})
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;

export const RpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string()
});

export type RpcError = z.infer<typeof RpcErrorSchema>;

/**
 * A response carries either `result` or `error`, never both. Strict objects
 * make an envelope holding both (or neither) fail to decode.
 */
export const ResponseEnvelopeSchema = z.union([
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema,
    result: z.record(z.unknown())
  }).strict(),
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema,
    error: RpcErrorSchema
  }).strict()
]);

export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

export const PropertySchemaSchema = z.object({
  type: z.enum(['string', 'number', 'boolean']),
  description: z.string().optional(),
  default: z.union([z.string(), z.number(), z.boolean()]).optional()
});

export type PropertySchema = z.infer<typeof PropertySchemaSchema>;

export const InputSchemaSchema = z.object({
  type: z.literal('object'),
  properties: z.record(PropertySchemaSchema),
  required: z.array(z.string()).optional()
});

export type InputSchema = z.infer<typeof InputSchemaSchema>;

export const ToolDescriptorSchema = z.object({
  name: z.string(),
  description: z.string(),
  inputSchema: InputSchemaSchema
});

export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

export const ServerInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional()
});

export type ServerInfo = z.infer<typeof ServerInfoSchema>;

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()),
  serverInfo: ServerInfoSchema
});

export type InitializeResult = z.infer<typeof InitializeResultSchema>;

export const ListToolsResultSchema = z.object({
  tools: z.array(ToolDescriptorSchema)
});

export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;

export const TextContentSchema = z.object({
  type: z.literal('text'),
  text: z.string()
});

export const CallToolResultSchema = z.object({
  content: z.array(TextContentSchema)
});

export type CallToolResult = z.infer<typeof CallToolResultSchema>;

export const CallToolParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({})
});

export type PingResult = { pong: true };

/**
 * A tool as the registry sees it: a descriptor plus an executor that binds
 * loosely-typed caller arguments to the handler.
 */
export interface ToolHandler {
  name: string;
  description: string;
  inputSchema: InputSchema;
  execute(args: unknown): Promise<ToolResult>;
}
