// mcp-swarm-orchestrator/src/server/tools/hitlTools.ts
// Human-in-the-loop tools: pause check, decision recording, stats

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SwarmRuntime } from '../runtime.js';
import { errorMessage } from '../../services/errors.js';
import { toolError, toolResult } from './toolErrors.js';

export function registerHitlTools(server: McpServer, runtime: SwarmRuntime): void {
  const { hitl } = runtime;

  // ===== hitl_should_pause =====
  server.tool(
    'hitl_should_pause',
    'Check whether an action should pause for human confirmation. Counts toward the per-type rate limit.',
    {
      type: z.string().min(1).describe('Action type'),
      target: z.string().optional().describe('Target resource'),
      path: z.string().optional().describe('Filesystem path or ref'),
      targets: z.array(z.string()).optional().describe('Bulk targets'),
      environment: z.string().optional().describe('Environment'),
      confidenceOverride: z.number().min(0).max(1).optional().describe('Explicit confidence'),
    },
    async (action) => {
      try {
        const decision = hitl.shouldPause(action);
        return toolResult({ actionType: action.type, ...decision });
      } catch (err) {
        return toolError('hitl_should_pause', errorMessage(err));
      }
    }
  );

  // ===== hitl_record_decision =====
  server.tool(
    'hitl_record_decision',
    'Record a human approval or rejection so confidence for that action type adapts.',
    {
      type: z.string().min(1).describe('Action type'),
      approved: z.boolean().describe('Human approved the action'),
      feedback: z.string().optional().describe('Free-text feedback'),
      target: z.string().optional().describe('Target resource'),
      environment: z.string().optional().describe('Environment'),
    },
    async ({ type, approved, feedback, target, environment }) => {
      try {
        const record = hitl.recordDecision({ type, target, environment }, approved, feedback);
        if (!record) {
          return toolError('hitl_record_decision', 'Learning store unavailable - decision not recorded');
        }
        return toolResult({
          status: 'recorded',
          record,
          learnedConfidence: hitl.getLearnedConfidence(type),
        });
      } catch (err) {
        return toolError('hitl_record_decision', errorMessage(err));
      }
    }
  );

  // ===== hitl_stats =====
  server.tool(
    'hitl_stats',
    'Approval statistics and the most recent human decisions.',
    {
      limit: z.number().int().min(0).default(10).describe('Recent decisions to include'),
    },
    async ({ limit }) => {
      try {
        return toolResult({
          ...hitl.getStats(),
          storeAvailable: hitl.isStoreAvailable(),
          recent: hitl.getRecentDecisions(limit),
        });
      } catch (err) {
        return toolError('hitl_stats', errorMessage(err));
      }
    }
  );
}
