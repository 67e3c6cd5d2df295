// mcp-swarm-orchestrator/src/server/resources.ts
// MCP resource registrations: agent roster, recent events, swarm sessions

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SwarmRuntime } from './runtime.js';
import { getRecentEvents } from '../services/eventLog.js';
import { errorMessage } from '../services/errors.js';

function jsonContents(uri: string, data: unknown) {
  return {
    contents: [{
      uri,
      text: JSON.stringify(data, null, 2),
      mimeType: 'application/json',
    }],
  };
}

export function registerResources(server: McpServer, runtime: SwarmRuntime): void {
  // ===== swarm://agents - Registered agent descriptors =====
  server.resource(
    'agent-roster',
    'swarm://agents',
    { description: 'Registered agents with version, handoff support and specialties', mimeType: 'application/json' },
    async (uri) => jsonContents(uri.href, runtime.registry.list())
  );

  // ===== swarm://events - Recent orchestration events =====
  server.resource(
    'recent-events',
    'swarm://events',
    { description: 'Most recent orchestration events from the JSONL event log', mimeType: 'application/json' },
    async (uri) => jsonContents(uri.href, getRecentEvents())
  );

  // ===== swarm://sessions/{contextId} =====
  server.resource(
    'swarm-session',
    new ResourceTemplate('swarm://sessions/{contextId}', {
      list: async () => ({
        resources: runtime.sessions.list().map(s => ({
          uri: `swarm://sessions/${s.contextId}`,
          name: `${s.contextId} (${s.status})`,
          mimeType: 'application/json',
        })),
      }),
    }),
    { description: 'Persisted state of one swarm execution', mimeType: 'application/json' },
    async (uri, params) => {
      const raw = params.contextId;
      const contextId = Array.isArray(raw) ? raw[0] : raw;
      let data: unknown;
      try {
        data = runtime.sessions.read(contextId) ?? { error: `Session ${contextId} not found` };
      } catch (err) {
        data = { error: errorMessage(err) };
      }
      return jsonContents(uri.href, data);
    }
  );
}
