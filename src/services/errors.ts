// mcp-swarm-orchestrator/src/services/errors.ts
// Error taxonomy for the orchestration layer.
//
// Fatal to an execution: AgentNotFoundError, MaxHandoffsExceeded.
// Recovered locally:     LearningStoreUnavailable (adaptive controllers fall back).
// Configuration:         DuplicateAgentError (raised by registry scan).
// Caller input:          InvalidRecordError (outcome or decision fails its schema).
//
// Malformed handoff blocks and cycle-guard trips are not errors: the parser
// reports them as data and the orchestrator completes normally.

import type { HandoffHistoryEntry } from '../types/index.js';

/** Chain + last output attached to every fatal execution error */
export interface ExecutionDiagnostics {
  chain?: HandoffHistoryEntry[];
  lastOutput?: string;
  lastAgent?: string;
}

export class AgentNotFoundError extends Error {
  readonly agentName: string;
  readonly candidates: string[];
  readonly chain: HandoffHistoryEntry[];
  readonly lastOutput?: string;
  readonly lastAgent?: string;

  constructor(agentName: string, candidates: string[], diagnostics: ExecutionDiagnostics = {}) {
    const hint = candidates.length > 0
      ? `Available agents: ${candidates.join(', ')}`
      : 'No agents are registered';
    super(`Agent '${agentName}' not found. ${hint}`);
    this.name = 'AgentNotFoundError';
    this.agentName = agentName;
    this.candidates = candidates;
    this.chain = diagnostics.chain ?? [];
    this.lastOutput = diagnostics.lastOutput;
    this.lastAgent = diagnostics.lastAgent;
  }
}

export class MaxHandoffsExceeded extends Error {
  readonly maxHandoffs: number;
  readonly chain: HandoffHistoryEntry[];
  readonly lastOutput?: string;
  readonly lastAgent?: string;

  constructor(maxHandoffs: number, diagnostics: ExecutionDiagnostics & { requestedAgent: string }) {
    const chain = diagnostics.chain ?? [];
    const path = chain.length > 0
      ? [chain[0].fromAgent, ...chain.map(e => e.toAgent)].join(' → ')
      : diagnostics.lastAgent ?? '';
    super(
      `Exceeded ${maxHandoffs} handoffs. Chain: ${path}; ` +
      `rejected handoff to '${diagnostics.requestedAgent}'`,
    );
    this.name = 'MaxHandoffsExceeded';
    this.maxHandoffs = maxHandoffs;
    this.chain = chain;
    this.lastOutput = diagnostics.lastOutput;
    this.lastAgent = diagnostics.lastAgent;
  }
}

export class DuplicateAgentError extends Error {
  readonly agentName: string;
  readonly files: string[];

  constructor(agentName: string, files: string[]) {
    super(`Agents '${files.join("' and '")}' both normalise to name '${agentName}'`);
    this.name = 'DuplicateAgentError';
    this.agentName = agentName;
    this.files = files;
  }
}

export class LearningStoreUnavailable extends Error {
  readonly store: string;

  constructor(store: string, cause: unknown) {
    super(`Learning store '${store}' unavailable: ${errorMessage(cause)}`);
    this.name = 'LearningStoreUnavailable';
    this.store = store;
  }
}

/** A record rejected before it reached a learning store */
export class InvalidRecordError extends Error {
  readonly store: string;
  readonly issues: string[];

  constructor(store: string, issues: string[]) {
    super(`Invalid ${store} record: ${issues.join('; ')}`);
    this.name = 'InvalidRecordError';
    this.store = store;
    this.issues = issues;
  }
}

/** Message text from anything thrown */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
