/**
 * Client session tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MCPClient } from '../../clients/mcp-client.js';
import { SimpleMCPServer } from '../../server.js';
import { ToolRegistry } from '../../tools/registry.js';
import { listFilesTool } from '../../tools/file/list-files.js';
import { echoTool } from '../../tools/system/echo.js';
import { getSystemInfoTool } from '../../tools/system/get-system-info.js';
import { InProcessTransport } from '../../transport/in-process.js';
import type { ClientTransport } from '../../transport/types.js';
import type { RequestEnvelope, ResponseEnvelope } from '../../types/mcp.js';

class RecordingTransport implements ClientTransport {
  readonly requests: RequestEnvelope[] = [];
  readonly responses: ResponseEnvelope[] = [];

  constructor(private readonly inner: ClientTransport) {}

  async send(request: RequestEnvelope): Promise<ResponseEnvelope> {
    this.requests.push(request);
    const response = await this.inner.send(request);
    this.responses.push(response);
    return response;
  }
}

/** Fails the first round trip as if the server were unreachable. */
class FlakyTransport implements ClientTransport {
  private failed = false;

  constructor(private readonly inner: ClientTransport) {}

  async send(request: RequestEnvelope): Promise<ResponseEnvelope> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('connection refused');
    }

    return this.inner.send(request);
  }
}

/** Holds every round trip until `open()` is called. */
class GatedTransport implements ClientTransport {
  private readonly gate: Promise<void>;
  open: () => void = () => {};

  constructor(private readonly inner: ClientTransport) {
    this.gate = new Promise(resolve => {
      this.open = resolve;
    });
  }

  async send(request: RequestEnvelope): Promise<ResponseEnvelope> {
    await this.gate;
    return this.inner.send(request);
  }
}

/** Delegates to a real server but replaces the result of every tools/call. */
class ScriptedToolTransport implements ClientTransport {
  constructor(private readonly inner: ClientTransport, private readonly toolResult: Record<string, unknown>) {}

  async send(request: RequestEnvelope): Promise<ResponseEnvelope> {
    if (request.method === 'tools/call') {
      return { jsonrpc: '2.0', id: request.id, result: this.toolResult };
    }

    return this.inner.send(request);
  }
}

function serverTransport(server = new SimpleMCPServer()): InProcessTransport {
  return new InProcessTransport(server, 0);
}

describe('MCPClient', () => {
  let client: MCPClient;
  let transport: RecordingTransport;

  beforeEach(() => {
    transport = new RecordingTransport(serverTransport());
    client = new MCPClient(transport);
  });

  describe('before connecting', () => {
    it('should start disconnected', () => {
      expect(client.getState()).toBe('disconnected');
      expect(client.isConnected()).toBe(false);
      expect(client.getServerInfo()).toBeNull();
    });

    it('should refuse work without sending anything', async () => {
      expect(await client.discoverTools()).toEqual([]);
      expect(await client.callTool('system.echo', { message: 'hi' })).toEqual({});
      expect(transport.requests).toHaveLength(0);
    });

    it('should explain that no tools are known yet', () => {
      expect(client.formatTools()).toBe('No tools available. Run discoverTools() first.');
    });
  });

  describe('connect', () => {
    it('should perform the initialize handshake', async () => {
      expect(await client.connect()).toBe(true);

      expect(client.getState()).toBe('connected');
      expect(client.getServerInfo()).toEqual({
        name: 'Simple MCP Server',
        version: '1.0.0',
        description: 'A demonstration MCP server with various tools'
      });
      expect(transport.requests[0]).toEqual({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {
          protocolVersion: '2024-11-05',
          capabilities: { tools: {} },
          clientInfo: { name: 'Simple MCP Client', version: '1.0.0' }
        }
      });
    });

    it('should return false when the round trip fails and allow a retry', async () => {
      const flakyClient = new MCPClient(new FlakyTransport(serverTransport()));

      expect(await flakyClient.connect()).toBe(false);
      expect(flakyClient.getState()).toBe('disconnected');

      expect(await flakyClient.connect()).toBe(true);
      expect(flakyClient.getState()).toBe('connected');
    });

    it('should return false on an error response', async () => {
      const refusing: ClientTransport = {
        send: async request => ({
          jsonrpc: '2.0',
          id: request.id,
          error: { code: -32603, message: 'test failure' }
        })
      };
      const refusedClient = new MCPClient(refusing);

      expect(await refusedClient.connect()).toBe(false);
      expect(refusedClient.getState()).toBe('disconnected');
      expect(refusedClient.getServerInfo()).toBeNull();
    });

    it('should return false when the response answers another request', async () => {
      const confused: ClientTransport = {
        send: async () => ({ jsonrpc: '2.0', id: 999, result: {} })
      };
      const confusedClient = new MCPClient(confused);

      expect(await confusedClient.connect()).toBe(false);
      expect(confusedClient.getState()).toBe('disconnected');
    });
  });

  describe('disconnect during connect', () => {
    it('should stay disconnected when the handshake completes afterwards', async () => {
      const gated = new GatedTransport(serverTransport());
      const gatedClient = new MCPClient(gated);

      const pending = gatedClient.connect();
      await vi.waitFor(() => {
        expect(gatedClient.getState()).toBe('connecting');
      });

      gatedClient.disconnect();
      gated.open();

      expect(await pending).toBe(false);
      expect(gatedClient.getState()).toBe('disconnected');
      expect(gatedClient.getServerInfo()).toBeNull();
      expect(await gatedClient.callTool('system.echo', { message: 'hi' })).toEqual({});
    });

    it('should not connect when disconnected before the handshake starts', async () => {
      const pending = client.connect();
      client.disconnect();

      expect(await pending).toBe(false);
      expect(client.getState()).toBe('disconnected');
      expect(transport.requests).toHaveLength(0);
    });

    it('should connect again after a cancelled handshake', async () => {
      const pending = client.connect();
      client.disconnect();
      await pending;

      expect(await client.connect()).toBe(true);
      expect(client.getState()).toBe('connected');
    });
  });

  describe('discoverTools', () => {
    it('should fetch and remember the catalog', async () => {
      await client.connect();

      const tools = await client.discoverTools();

      expect(tools).toHaveLength(10);
      expect(tools[0]?.name).toBe('calculator.add');
      expect(client.getDiscoveredTools()).toEqual(tools);
    });
  });

  describe('callTool', () => {
    beforeEach(async () => {
      await client.connect();
    });

    it('should return the decoded tool result', async () => {
      expect(await client.callTool('weather.get_weather', { city: 'Paris' })).toEqual({
        city: 'Paris',
        weather: { temperature: 20, condition: 'Unknown', humidity: 50 },
        timestamp: expect.any(String),
        source: 'mock_data',
        note: 'City not found, returning default data'
      });
    });

    it('should return an empty mapping when the server reports an error', async () => {
      expect(await client.callTool('calculator.divide', { a: 1, b: 0 })).toEqual({});

      expect(transport.responses[1]).toEqual({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32603, message: 'Cannot divide by zero' }
      });
    });

    it('should use a fresh, increasing id for every request', async () => {
      await client.discoverTools();
      await client.callTool('calculator.power', { a: 2, b: 8 });
      await client.callTool('system.echo', { message: 'again' });

      expect(transport.requests.map(request => request.id)).toEqual([1, 2, 3, 4]);
      expect(transport.responses.map(response => response.id)).toEqual([1, 2, 3, 4]);
    });

    it('should return an empty mapping after disconnecting', async () => {
      client.disconnect();

      expect(client.getState()).toBe('disconnected');
      expect(await client.callTool('system.echo', { message: 'late' })).toEqual({});
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe('malformed tool content', () => {
    const cases: Array<[string, Record<string, unknown>]> = [
      ['no content items', { content: [] }],
      ['text that is not JSON', { content: [{ type: 'text', text: 'not json' }] }],
      ['JSON that is not a mapping', { content: [{ type: 'text', text: '[1,2]' }] }],
      ['a result without content', { value: 1 }]
    ];

    it.each(cases)('should return an empty mapping for %s', async (_label, toolResult) => {
      const scriptedClient = new MCPClient(new ScriptedToolTransport(serverTransport(), toolResult));
      await scriptedClient.connect();

      expect(await scriptedClient.callTool('system.echo', { message: 'hi' })).toEqual({});
    });
  });

  describe('serialization', () => {
    it('should queue a call issued while connecting behind the handshake', async () => {
      const [connected, echoed] = await Promise.all([
        client.connect(),
        client.callTool('system.echo', { message: 'queued' })
      ]);

      expect(connected).toBe(true);
      expect(echoed).toMatchObject({ message: 'queued', status: 'echoed' });
      expect(transport.requests.map(request => request.method)).toEqual(['initialize', 'tools/call']);
    });
  });

  describe('formatTools', () => {
    it('should render a numbered listing with required parameters starred', async () => {
      const registry = new ToolRegistry([echoTool, listFilesTool, getSystemInfoTool]);
      const smallClient = new MCPClient(serverTransport(new SimpleMCPServer({ registry })));
      await smallClient.connect();
      await smallClient.discoverTools();

      expect(smallClient.formatTools()).toBe([
        'Available Tools:',
        '==================================================',
        '1. system.echo',
        '   Description: Echo a message back',
        '   Parameters:',
        '     - message (string) *',
        '',
        '2. file.list_files',
        '   Description: List files in a directory',
        '   Parameters:',
        '     - directory (string)',
        '',
        '3. system.get_system_info',
        '   Description: Get basic system information',
        ''
      ].join('\n'));
    });
  });
});
