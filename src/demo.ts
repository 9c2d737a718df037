#!/usr/bin/env node

import 'dotenv/config';
import { MCPClient } from './clients/mcp-client.js';
import { SimpleMCPServer } from './server.js';
import { InProcessTransport } from './transport/in-process.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Demo');

const EXAMPLE_CALLS: Array<{ label: string; tool: string; args: Record<string, unknown> }> = [
  { label: 'Calculator Result', tool: 'calculator.add', args: { a: 10, b: 5 } },
  { label: 'Weather Result', tool: 'weather.get_weather', args: { city: 'New York' } },
  { label: 'Echo Result', tool: 'system.echo', args: { message: 'Hello MCP!' } }
];

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function main() {
  const server = new SimpleMCPServer();
  const client = new MCPClient(new InProcessTransport(server));

  if (!(await client.connect())) {
    logger.error('Could not connect to the MCP server');
    process.exitCode = 1;
    return;
  }

  await client.discoverTools();
  print(client.formatTools());

  logger.info('Running example tool calls...');

  for (const { label, tool, args } of EXAMPLE_CALLS) {
    const result = await client.callTool(tool, args);
    print(`${label}:`);
    print(Object.keys(result).length > 0 ? JSON.stringify(result, null, 2) : '(no data)');
    print('');
  }

  client.disconnect();
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Demo failed');
  process.exit(1);
});
