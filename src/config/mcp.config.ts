export const mcpConfig = {
  serverHost: process.env.MCP_SERVER_HOST || 'localhost',
  // Accepted for parity with a socket transport; nothing listens on it.
  serverPort: parseInt(process.env.MCP_SERVER_PORT || '8080', 10),
  simulatedLatencyMs: parseInt(process.env.MCP_SIMULATED_LATENCY_MS || '500', 10),
  protocolVersion: '2024-11-05',
  server: {
    name: 'Simple MCP Server',
    version: '1.0.0',
    description: 'A demonstration MCP server with various tools'
  },
  client: {
    name: 'Simple MCP Client',
    version: '1.0.0'
  }
};
