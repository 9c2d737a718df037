import { z } from 'zod';
import { mcpConfig } from '../config/mcp.config.js';
import type { ClientTransport } from '../transport/types.js';
import {
  CallToolResultSchema,
  InitializeResultSchema,
  JSONRPC_VERSION,
  ListToolsResultSchema,
  type RequestEnvelope,
  type ResponseEnvelope,
  type ServerInfo,
  type ToolDescriptor
} from '../types/mcp.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('MCPClient');

const ToolOutputSchema = z.record(z.unknown());

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface MCPClientOptions {
  host?: string;
  port?: number;
  clientInfo?: { name: string; version: string };
}

/**
 * Client side of one session. Every public operation reports failure through
 * its return value (false, [] or {}) and never throws.
 *
 * Operations are serialized: a call made while another is in flight waits
 * for it, so request ids and state transitions never interleave.
 */
export class MCPClient {
  readonly host: string;
  readonly port: number;
  private readonly clientInfo: { name: string; version: string };
  private state: ConnectionState = 'disconnected';
  private nextRequestId = 1;
  // Bumped by disconnect(); a handshake started under an older epoch must not mark the session connected.
  private epoch = 0;
  private serverInfo: ServerInfo | null = null;
  private discoveredTools: ToolDescriptor[] = [];
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly transport: ClientTransport, options: MCPClientOptions = {}) {
    this.host = options.host ?? mcpConfig.serverHost;
    this.port = options.port ?? mcpConfig.serverPort;
    this.clientInfo = options.clientInfo ?? { ...mcpConfig.client };
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getServerInfo(): ServerInfo | null {
    return this.serverInfo;
  }

  getDiscoveredTools(): ToolDescriptor[] {
    return [...this.discoveredTools];
  }

  connect(): Promise<boolean> {
    const epoch = this.epoch;

    return this.exclusive(async () => {
      if (epoch !== this.epoch) {
        logger.info('Connect cancelled by disconnect');
        return false;
      }

      logger.info({ host: this.host, port: this.port }, 'Connecting to MCP server');
      this.state = 'connecting';

      try {
        const response = await this.send('initialize', {
          protocolVersion: mcpConfig.protocolVersion,
          capabilities: { tools: {} },
          clientInfo: this.clientInfo
        });

        if ('error' in response) {
          logger.error({ error: response.error }, 'Failed to initialize connection');
          this.state = 'disconnected';
          return false;
        }

        const { serverInfo } = InitializeResultSchema.parse(response.result);
        if (epoch !== this.epoch) {
          logger.info('Handshake completed after disconnect, staying disconnected');
          return false;
        }

        this.serverInfo = serverInfo;
        this.state = 'connected';

        logger.info({ server: serverInfo.name, version: serverInfo.version }, 'Connected to MCP server');
        return true;
      } catch (error) {
        logger.error({ error: getErrorMessage(error) }, 'Connection failed');
        this.state = 'disconnected';
        return false;
      }
    });
  }

  discoverTools(): Promise<ToolDescriptor[]> {
    return this.exclusive(async () => {
      if (this.state !== 'connected') {
        logger.warn('Not connected to server');
        return [];
      }

      try {
        const response = await this.send('tools/list');

        if ('error' in response) {
          logger.error({ error: response.error }, 'Failed to discover tools');
          return [];
        }

        const { tools } = ListToolsResultSchema.parse(response.result);
        this.discoveredTools = tools;

        logger.info({ count: tools.length }, 'Discovered tools');
        return [...tools];
      } catch (error) {
        logger.error({ error: getErrorMessage(error) }, 'Tool discovery failed');
        return [];
      }
    });
  }

  /**
   * Resolves to the tool's own result mapping, or to `{}` when there is none
   * to give: not connected, an error response, or a payload that does not decode.
   */
  callTool(name: string, args: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
    return this.exclusive(async () => {
      if (this.state !== 'connected') {
        logger.warn({ tool: name }, 'Not connected to server');
        return {};
      }

      try {
        logger.info({ tool: name, args }, 'Calling tool');
        const response = await this.send('tools/call', { name, arguments: args });

        if ('error' in response) {
          logger.error({ tool: name, error: response.error }, 'Tool call failed');
          return {};
        }

        const { content } = CallToolResultSchema.parse(response.result);
        const first = content[0];
        if (!first) {
          logger.warn({ tool: name }, 'No content returned from tool');
          return {};
        }

        const decoded: unknown = JSON.parse(first.text);
        const output = ToolOutputSchema.parse(decoded);

        logger.info({ tool: name }, 'Tool executed successfully');
        return output;
      } catch (error) {
        logger.error({ tool: name, error: getErrorMessage(error) }, 'Tool call failed');
        return {};
      }
    });
  }

  disconnect(): void {
    this.epoch++;
    this.state = 'disconnected';
    logger.info('Disconnected from MCP server');
  }

  formatTools(): string {
    if (this.discoveredTools.length === 0) {
      return 'No tools available. Run discoverTools() first.';
    }

    const lines = ['Available Tools:', '='.repeat(50)];

    this.discoveredTools.forEach((tool, index) => {
      lines.push(`${index + 1}. ${tool.name}`);
      lines.push(`   Description: ${tool.description}`);

      const properties = Object.entries(tool.inputSchema.properties);
      const required = tool.inputSchema.required || [];

      if (properties.length > 0) {
        lines.push('   Parameters:');
        for (const [param, schema] of properties) {
          const mark = required.includes(param) ? ' *' : '';
          lines.push(`     - ${param} (${schema.type})${mark}`);
        }
      }

      lines.push('');
    });

    return lines.join('\n');
  }

  private async send(method: string, params: Record<string, unknown> = {}): Promise<ResponseEnvelope> {
    const request: RequestEnvelope = {
      jsonrpc: JSONRPC_VERSION,
      id: this.nextRequestId++,
      method,
      params
    };

    const response = await this.transport.send(request);
    if (response.id !== request.id) {
      throw new Error(`Response id ${String(response.id)} does not match request id ${String(request.id)}`);
    }

    return response;
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.pending.then(operation);
    // The queue only tracks completion; the caller still sees the outcome through `run`.
    this.pending = run.then(() => undefined, () => undefined);
    return run;
  }
}
