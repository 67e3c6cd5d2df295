// mcp-swarm-orchestrator/src/server/server.ts
// Assemble the MCP server - tool groups and resources over one runtime

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SwarmRuntime } from './runtime.js';
import { registerSwarmTools } from './tools/swarmTools.js';
import { registerRoutingTools } from './tools/routingTools.js';
import { registerHitlTools } from './tools/hitlTools.js';
import { registerResources } from './resources.js';

export const SERVER_NAME = 'mcp-swarm-orchestrator';
export const SERVER_VERSION = '0.1.0';

/** Create and configure the MCP server */
export function createServer(runtime: SwarmRuntime): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerSwarmTools(server, runtime);
  registerRoutingTools(server, runtime);
  registerHitlTools(server, runtime);
  registerResources(server, runtime);

  return server;
}
