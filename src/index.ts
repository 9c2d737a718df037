#!/usr/bin/env node

import 'dotenv/config';
import { SimpleMCPServer } from './server.js';
import { isEntryPoint } from './utils/entry-point.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Main');

async function main() {
  try {
    const server = new SimpleMCPServer();

    process.on('SIGINT', async () => {
      logger.info('Received SIGINT, shutting down gracefully...');
      await server.stop();
      process.exit(0);
    });

    process.on('SIGTERM', async () => {
      logger.info('Received SIGTERM, shutting down gracefully...');
      await server.stop();
      process.exit(0);
    });

    process.on('uncaughtException', (error) => {
      logger.error({ err: error }, 'Uncaught exception');
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error({ reason }, 'Unhandled rejection');
      process.exit(1);
    });

    await server.start();
    logger.info({ tools: server.getToolsInfo() }, 'Simple MCP Server is running...');

  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

if (isEntryPoint(import.meta.url)) {
  main().catch((error) => {
    logger.fatal({ err: error }, 'Fatal error');
    process.exit(1);
  });
}

export { SimpleMCPServer } from './server.js';
export { MCPClient } from './clients/mcp-client.js';
export type { ConnectionState, MCPClientOptions } from './clients/mcp-client.js';
export { InProcessTransport } from './transport/in-process.js';
export type { ClientTransport, RawMessageHandler } from './transport/types.js';
export { ToolRegistry } from './tools/registry.js';
export { builtinTools, createDefaultRegistry } from './tools/index.js';
export { wrapTool } from './utils/tool-wrapper.js';
export * from './types/mcp.js';
export * from './types/tools.js';
