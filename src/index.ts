#!/usr/bin/env node
/**
 * @fileoverview Process entry point: composes the container, starts the MCP
 * server on stdio and shuts down on SIGINT/SIGTERM.
 * @module src/index
 */
import 'reflect-metadata';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { config } from '@/config/index.js';
import { composeContainer } from '@/container/index.js';
import { createMcpServer } from '@/mcp-server/server.js';
import { logger, requestContextService } from '@/utils/index.js';

async function start(): Promise<void> {
  const context = requestContextService.createRequestContext({
    operation: 'ServerStartup',
  });

  logger.setLevel(config.logLevel);
  composeContainer();

  const server = createMcpServer();
  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`, context);
    try {
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.crit('Error while closing the server', {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);
  logger.notice('Server listening on stdio', {
    ...context,
    outputDir: config.outputDir,
  });
}

start().catch((error: unknown) => {
  logger.crit('Server failed to start', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
