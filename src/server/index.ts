#!/usr/bin/env node
// mcp-swarm-orchestrator/src/server/index.ts
// MCP Server entry point - data dirs, event log, provider, runtime, stdio transport
// Individual registrations live in tools/, resources.ts, and eventWiring.ts

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeProviders, resolveProviderOptions, createInvoker } from '../providers/index.js';
import { logger } from '../services/logger.js';
import { ensureDataDirs, DATA_DIR } from '../services/dataDir.js';
import { initializeEventLog, shutdownEventLog } from '../services/eventLog.js';
import { errorMessage } from '../services/errors.js';
import { createRuntime } from './runtime.js';
import { createServer, SERVER_NAME } from './server.js';
import { wireEvents } from './eventWiring.js';

/** Main entry point */
async function main(): Promise<void> {
  logger.info(`${SERVER_NAME} starting...`);

  ensureDataDirs();
  logger.info(`Data directory: ${DATA_DIR}`);

  const logFile = initializeEventLog();
  logger.info(`Event log: ${logFile}`);

  initializeProviders();
  const { provider, options } = resolveProviderOptions();
  const runtime = createRuntime({ invoker: createInvoker(provider, options) });
  logger.info(`Provider ${provider} (${options.model}); ${runtime.registry.count} agent(s) registered`);

  const removed = runtime.sessions.cleanupStale();
  if (removed > 0) logger.info(`Removed ${removed} stale session file(s)`);

  const server = createServer(runtime);
  const transport = new StdioServerTransport();

  // Wire event bus → MCP logging/resource notifications
  const unwire = wireEvents(server);

  await server.connect(transport);
  logger.info(`${SERVER_NAME} running`);

  let shuttingDown = false;
  function gracefulShutdown(reason: string): void {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Shutting down (${reason})...`);
    unwire();
    shutdownEventLog();
    void server.close()
      .catch((err: unknown) => logger.warn(`Error closing server: ${errorMessage(err)}`))
      .finally(() => process.exit(0));
  }

  // Clients stop stdio servers by closing stdin
  process.stdin.on('end', () => gracefulShutdown('stdin closed'));
  process.stdin.on('close', () => gracefulShutdown('stdin closed'));

  // POSIX signals
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
