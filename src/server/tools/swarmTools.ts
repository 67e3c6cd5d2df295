// mcp-swarm-orchestrator/src/server/tools/swarmTools.ts
// Swarm tools: execute, parse a handoff, handoff stats, agent roster, sessions, flag

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SwarmRuntime } from '../runtime.js';
import { parseHandoff } from '../../services/handoffParser.js';
import { isHandoffsEnabled, setHandoffsEnabled } from '../../services/preferences.js';
import { AgentNotFoundError, MaxHandoffsExceeded, errorMessage } from '../../services/errors.js';
import { toolError, toolResult } from './toolErrors.js';

export function registerSwarmTools(server: McpServer, runtime: SwarmRuntime): void {
  // ===== swarm_execute =====
  server.tool(
    'swarm_execute',
    'Run a task through the agent swarm, following HANDOFF DECLARATION blocks until an agent finishes.',
    {
      initialAgent: z.string().min(1).describe('Agent to start with'),
      task: z.record(z.unknown()).default({}).describe('Task context for the first agent'),
      contextId: z.string().regex(/^[A-Za-z0-9_.-]+$/).optional().describe('Execution context id'),
      maxHandoffs: z.number().int().min(0).optional().describe('Hard cap on handoffs'),
      repeatTolerance: z.number().int().min(1).optional().describe('Allowed repeats of a directed agent pair'),
    },
    async (params) => {
      try {
        const result = await runtime.orchestrator.execute(params);
        return toolResult(result);
      } catch (err) {
        if (err instanceof AgentNotFoundError) {
          return toolError('swarm_execute', err.message, {
            candidates: err.candidates,
            handoffChain: err.chain,
            lastAgent: err.lastAgent,
            lastOutput: err.lastOutput,
          });
        }
        if (err instanceof MaxHandoffsExceeded) {
          return toolError('swarm_execute', err.message, {
            handoffChain: err.chain,
            lastAgent: err.lastAgent,
            lastOutput: err.lastOutput,
          });
        }
        return toolError('swarm_execute', errorMessage(err));
      }
    }
  );

  // ===== swarm_parse_handoff =====
  server.tool(
    'swarm_parse_handoff',
    'Parse a HANDOFF DECLARATION block from agent output. Returns ok, malformed (with reason) or absent.',
    {
      output: z.string().describe('Raw agent output'),
    },
    async ({ output }) => toolResult(parseHandoff(output))
  );

  // ===== swarm_handoff_stats =====
  server.tool(
    'swarm_handoff_stats',
    'Handoff totals, unique agent pairs and the most common pairs across executions in this server.',
    {},
    async () => toolResult(runtime.orchestrator.getHandoffStats())
  );

  // ===== swarm_list_agents =====
  server.tool(
    'swarm_list_agents',
    'List registered agent descriptors with version, handoff support and specialties.',
    {
      handoffOnly: z.boolean().default(false).describe('Only agents that can declare handoffs'),
    },
    async ({ handoffOnly }) => {
      const agents = runtime.registry.list().filter(a => !handoffOnly || a.supportsHandoff);
      return toolResult({
        count: agents.length,
        handoffsEnabled: isHandoffsEnabled(runtime.configDir),
        agents: agents.map(a => ({
          name: a.name,
          version: a.version,
          fileName: a.fileName,
          supportsHandoff: a.supportsHandoff,
          specialties: a.specialties,
        })),
      });
    }
  );

  // ===== swarm_get_session =====
  server.tool(
    'swarm_get_session',
    'Read the persisted session for an execution context.',
    {
      contextId: z.string().describe('Execution context id'),
    },
    async ({ contextId }) => {
      try {
        const session = runtime.sessions.read(contextId);
        if (!session) return toolError('swarm_get_session', `No session for context '${contextId}'`);
        return toolResult(session);
      } catch (err) {
        return toolError('swarm_get_session', errorMessage(err));
      }
    }
  );

  // ===== swarm_set_handoffs =====
  server.tool(
    'swarm_set_handoffs',
    'Turn handoff following on or off. When off, declared handoffs are reported but not followed.',
    {
      enabled: z.boolean().describe('Follow declared handoffs'),
    },
    async ({ enabled }) => {
      try {
        const prefs = setHandoffsEnabled(enabled, runtime.configDir);
        return toolResult({ status: 'updated', ...prefs, effective: isHandoffsEnabled(runtime.configDir) });
      } catch (err) {
        return toolError('swarm_set_handoffs', errorMessage(err));
      }
    }
  );
}
