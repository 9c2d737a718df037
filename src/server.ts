import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  isJSONRPCNotification,
  isJSONRPCRequest,
  JSONRPCMessageSchema,
  type JSONRPCMessage
} from '@modelcontextprotocol/sdk/types.js';

import { mcpConfig } from './config/mcp.config.js';
import { createDefaultRegistry } from './tools/index.js';
import type { ToolRegistry, ToolsInfo } from './tools/registry.js';
import {
  CallToolParamsSchema,
  ErrorCode,
  JSONRPC_VERSION,
  RequestEnvelopeSchema,
  RequestIdSchema,
  type CallToolResult,
  type InitializeResult,
  type ListToolsResult,
  type PingResult,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
  type ServerInfo
} from './types/mcp.js';
import { fromZodError, getErrorMessage, MCPError, toRpcError } from './utils/error-handler.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('SimpleMCPServer');

export interface SimpleMCPServerOptions {
  host?: string;
  port?: number;
  registry?: ToolRegistry;
  serverInfo?: ServerInfo;
}

type MethodResult = InitializeResult | ListToolsResult | CallToolResult | PingResult;

export class SimpleMCPServer {
  readonly host: string;
  readonly port: number;
  private readonly registry: ToolRegistry;
  private readonly serverInfo: ServerInfo;
  private transport?: Transport;

  constructor(options: SimpleMCPServerOptions = {}) {
    this.host = options.host ?? mcpConfig.serverHost;
    this.port = options.port ?? mcpConfig.serverPort;
    this.registry = options.registry ?? createDefaultRegistry();
    this.serverInfo = options.serverInfo ?? { ...mcpConfig.server };

    logger.info({ count: this.registry.size }, 'Tools registered');
  }

  /**
   * Dispatches one decoded request. Always resolves to exactly one response
   * whose id echoes the request id; failures never escape as rejections.
   */
  async handleRequest(message: unknown): Promise<ResponseEnvelope> {
    const decoded = RequestEnvelopeSchema.safeParse(message);
    if (!decoded.success) {
      const error = fromZodError('Invalid Request', decoded.error);
      logger.warn({ errors: error.errors }, 'Rejected malformed request envelope');
      return this.errorResponse(readRequestId(message), new MCPError(ErrorCode.InvalidRequest, error.message));
    }

    const request = decoded.data;
    logger.info({ method: request.method, id: request.id }, 'Received request');

    try {
      const result = await this.route(request);
      return { jsonrpc: JSONRPC_VERSION, id: request.id, result };
    } catch (error) {
      logger.error({ method: request.method, id: request.id, error: getErrorMessage(error) }, 'Error handling request');
      return this.errorResponse(request.id, error);
    }
  }

  /**
   * Wire-level entry: JSON text in, JSON text out. Unparseable text yields a
   * Parse error response with a null id.
   */
  async handleRaw(payload: string): Promise<string> {
    let message: unknown;
    try {
      message = JSON.parse(payload);
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Received unparseable payload');
      const response = this.errorResponse(null, new MCPError(ErrorCode.ParseError, 'Parse error'));
      return JSON.stringify(response);
    }

    return JSON.stringify(await this.handleRequest(message));
  }

  getToolsInfo(): ToolsInfo {
    return this.registry.getToolsInfo();
  }

  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    logger.info({ host: this.host, port: this.port }, 'Starting MCP server');

    for (const name of this.registry.getNames()) {
      logger.info({ tool: name }, 'Available tool');
    }

    transport.onmessage = (message: JSONRPCMessage) => {
      this.relay(transport, message).catch(error => {
        logger.error({ error: getErrorMessage(error) }, 'Failed to deliver response');
      });
    };
    transport.onerror = (error: Error) => {
      logger.error({ error: error.message }, 'Transport error');
    };
    transport.onclose = () => {
      logger.info('Transport closed');
    };

    await transport.start();
    this.transport = transport;

    logger.info('Server is ready to accept requests');
  }

  async stop(): Promise<void> {
    logger.info('Stopping MCP server...');

    if (this.transport) {
      await this.transport.close();
      this.transport = undefined;
    }

    logger.info('MCP server stopped');
  }

  private async route(request: RequestEnvelope): Promise<MethodResult> {
    switch (request.method) {
      case 'initialize':
        return this.handleInitialize();
      case 'tools/list':
        return this.handleListTools();
      case 'tools/call':
        return this.handleCallTool(request.params);
      case 'ping':
        return { pong: true };
      default:
        throw new MCPError(ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
    }
  }

  private handleInitialize(): InitializeResult {
    logger.info('Client initialized');

    return {
      protocolVersion: mcpConfig.protocolVersion,
      capabilities: {
        tools: {}
      },
      serverInfo: { ...this.serverInfo }
    };
  }

  private handleListTools(): ListToolsResult {
    logger.debug('Listing available tools');
    return { tools: this.registry.list() };
  }

  private async handleCallTool(params: Record<string, unknown>): Promise<CallToolResult> {
    const parsed = CallToolParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw fromZodError('Invalid tools/call params', parsed.error);
    }

    const { name, arguments: args } = parsed.data;
    logger.info({ tool: name, args }, 'Tool called');

    const result = await this.registry.execute(name, args);
    logger.info({ tool: name }, 'Tool executed successfully');

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2)
        }
      ]
    };
  }

  private async relay(transport: Transport, message: JSONRPCMessage): Promise<void> {
    if (isJSONRPCRequest(message)) {
      const response = await this.handleRequest(message);
      await transport.send(JSONRPCMessageSchema.parse(response));
      return;
    }

    if (isJSONRPCNotification(message)) {
      logger.debug({ method: message.method }, 'Ignoring notification');
      return;
    }

    logger.warn('Ignoring unexpected message from client');
  }

  private errorResponse(id: RequestId, error: unknown): ResponseEnvelope {
    return {
      jsonrpc: JSONRPC_VERSION,
      id,
      error: toRpcError(error)
    };
  }
}

function readRequestId(message: unknown): RequestId {
  if (typeof message !== 'object' || message === null || !('id' in message)) {
    return null;
  }

  const id = RequestIdSchema.safeParse(message.id);
  return id.success ? id.data : null;
}
