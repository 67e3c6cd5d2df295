// mcp-swarm-orchestrator/src/server/tools/toolErrors.ts
// Shared response helpers - every failed tool call returns the expected
// parameter schema so callers can self-correct without guessing shapes.

/** Schema hints keyed by tool name → param name → description */
const TOOL_SCHEMAS: Record<string, Record<string, string>> = {
  // ----- swarmTools -----
  swarm_execute: {
    initialAgent: 'string (required) - agent to start with, e.g. "dns_specialist"',
    task: 'Record<string,unknown> (default: {}) - task context handed to the first agent',
    contextId: 'string (optional) - execution context id [A-Za-z0-9_.-]; generated when omitted',
    maxHandoffs: 'number (optional, default: 10) - hard cap on accepted handoffs',
    repeatTolerance: 'number (optional, default: 1) - repeats of a directed agent pair before the cycle guard stops the run',
  },
  swarm_parse_handoff: {
    output: 'string (required) - raw agent output containing a HANDOFF DECLARATION block',
  },
  swarm_handoff_stats: {},
  swarm_list_agents: {
    handoffOnly: 'boolean (default: false) - only agents that can declare handoffs',
  },
  swarm_get_session: {
    contextId: 'string (required) - execution context id',
  },
  swarm_set_handoffs: {
    enabled: 'boolean (required) - follow declared handoffs (true) or only report them (false)',
  },

  // ----- routingTools -----
  routing_should_load: {
    domain: 'string (required) - domain label, e.g. "dns" or "general"',
    complexity: 'number (required) - task complexity 1-10',
  },
  routing_record_outcome: {
    taskId: 'string (required) - unique task id; duplicates are ignored',
    domain: 'string (required) - domain label',
    complexity: 'number (required) - task complexity 1-10',
    agentUsed: 'string | null (default: null) - agent that handled the task',
    agentLoaded: 'boolean (required) - whether a specialist agent was loaded',
    success: 'boolean (required) - whether the task succeeded',
    qualityScore: 'number (default: 0.5) - 0-1 quality rating',
    userCorrections: 'number (default: 0) - corrections the user had to make',
    query: 'string (optional) - original query text',
  },
  routing_stats: {
    domain: 'string (optional) - one domain; omit for all domains',
    includeHistory: 'boolean (default: false) - include threshold change history (single domain only)',
  },
  routing_reset_domain: {
    domain: 'string (required) - domain to reset to the base threshold',
  },
  routing_route_query: {
    query: 'string (required) - free-text request to classify and route',
    domain: 'string (optional) - override the detected domain',
    complexity: 'number (optional) - override the assessed complexity',
  },

  // ----- hitlTools -----
  hitl_should_pause: {
    type: 'string (required) - action type, e.g. "file_write" or "database_drop"',
    target: 'string (optional) - target resource',
    path: 'string (optional) - filesystem path or ref',
    targets: 'string[] (optional) - bulk targets',
    environment: 'string (optional) - "production" | "staging" | "development"',
    confidenceOverride: 'number (optional) - explicit 0-1 confidence',
  },
  hitl_record_decision: {
    type: 'string (required) - action type',
    approved: 'boolean (required) - human approved the action',
    feedback: 'string (optional) - free-text feedback',
    target: 'string (optional) - target resource',
    environment: 'string (optional) - environment of the action',
  },
  hitl_stats: {
    limit: 'number (default: 10) - recent decisions to include',
  },
};

/**
 * Build a standardized error response with schema hints for self-correction.
 * `details` carries diagnostics such as the handoff chain of an aborted run.
 */
export function toolError(tool: string, message: string, details?: Record<string, unknown>) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify({
        error: message,
        tool,
        ...(details ?? {}),
        expectedSchema: TOOL_SCHEMAS[tool] || {},
      }, null, 2),
    }],
    isError: true as const,
  };
}

/** Successful JSON tool response */
export function toolResult(data: unknown) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(data, null, 2),
    }],
  };
}
