// mcp-swarm-orchestrator/src/server/tools/routingTools.ts
// Adaptive routing tools: load decisions, outcome recording, stats, reset, query routing

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SwarmRuntime } from '../runtime.js';
import { generateTaskId } from '../../services/adaptiveRouting.js';
import { errorMessage } from '../../services/errors.js';
import { toolError, toolResult } from './toolErrors.js';

export function registerRoutingTools(server: McpServer, runtime: SwarmRuntime): void {
  const { routing, coordinator } = runtime;

  // ===== routing_should_load =====
  server.tool(
    'routing_should_load',
    'Decide whether a task of the given complexity warrants loading a specialist agent for its domain.',
    {
      domain: z.string().min(1).describe('Domain label'),
      complexity: z.number().min(1).max(10).describe('Task complexity 1-10'),
    },
    async ({ domain, complexity }) => {
      try {
        const decision = routing.shouldLoadAgent(domain, complexity);
        return toolResult({ domain, complexity, ...decision });
      } catch (err) {
        return toolError('routing_should_load', errorMessage(err));
      }
    }
  );

  // ===== routing_record_outcome =====
  server.tool(
    'routing_record_outcome',
    'Record a finished task so the domain threshold can adapt. Duplicate task ids are ignored.',
    {
      taskId: z.string().min(1).optional().describe('Unique task id; generated when omitted'),
      domain: z.string().min(1).describe('Domain label'),
      complexity: z.number().min(1).max(10).describe('Task complexity 1-10'),
      agentUsed: z.string().nullable().default(null).describe('Agent that handled the task'),
      agentLoaded: z.boolean().describe('Whether a specialist was loaded'),
      success: z.boolean().describe('Whether the task succeeded'),
      qualityScore: z.number().min(0).max(1).default(0.5).describe('0-1 quality rating'),
      userCorrections: z.number().int().min(0).default(0).describe('Corrections the user made'),
      query: z.string().optional().describe('Original query text'),
    },
    async (params) => {
      const taskId = params.taskId ?? generateTaskId();
      try {
        const recorded = routing.recordOutcome({
          ...params,
          taskId,
          timestamp: new Date().toISOString(),
        });
        const stats = routing.getDomainStats(params.domain);
        return toolResult({
          taskId,
          recorded,
          domain: params.domain,
          currentThreshold: stats.currentThreshold,
          sampleCount: stats.totalTasks,
          ...(stats.degraded ? { degraded: true } : {}),
        });
      } catch (err) {
        return toolError('routing_record_outcome', errorMessage(err));
      }
    }
  );

  // ===== routing_stats =====
  server.tool(
    'routing_stats',
    'Routing statistics for one domain (optionally with threshold history) or for all domains.',
    {
      domain: z.string().optional().describe('Domain; omit for all'),
      includeHistory: z.boolean().default(false).describe('Include threshold change history'),
    },
    async ({ domain, includeHistory }) => {
      try {
        if (!domain) {
          return toolResult({
            ...routing.getAllStats(),
            storeAvailable: routing.isStoreAvailable(),
            coordinator: coordinator.getRoutingStats(),
          });
        }
        const stats = routing.getDomainStats(domain);
        return toolResult(includeHistory ? { ...stats, history: routing.getThresholdHistory(domain) } : stats);
      } catch (err) {
        return toolError('routing_stats', errorMessage(err));
      }
    }
  );

  // ===== routing_reset_domain =====
  server.tool(
    'routing_reset_domain',
    'Reset a domain threshold to its base value.',
    {
      domain: z.string().min(1).describe('Domain to reset'),
    },
    async ({ domain }) => {
      try {
        const threshold = routing.resetDomain(domain);
        if (!threshold) {
          return toolError('routing_reset_domain', `Learning store unavailable - '${domain}' not reset`);
        }
        return toolResult({ status: 'reset', threshold });
      } catch (err) {
        return toolError('routing_reset_domain', errorMessage(err));
      }
    }
  );

  // ===== routing_route_query =====
  server.tool(
    'routing_route_query',
    'Classify a free-text query and choose a strategy (direct, single_agent or swarm) and initial agent.',
    {
      query: z.string().min(1).describe('Query to route'),
      domain: z.string().optional().describe('Override the detected domain'),
      complexity: z.number().min(1).max(10).optional().describe('Override the assessed complexity'),
    },
    async ({ query, domain, complexity }) => {
      try {
        return toolResult(coordinator.route(query, { domain, complexity }));
      } catch (err) {
        return toolError('routing_route_query', errorMessage(err));
      }
    }
  );
}
