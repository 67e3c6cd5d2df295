// mcp-swarm-orchestrator/src/types/handoff.ts
// Handoff domain types - declarations, chain entries, execution results

/** A transfer-of-control request parsed from one agent's output */
export interface HandoffDeclaration {
  toAgent: string;
  reason: string;
  context: Record<string, unknown>;
  timestamp: string;
}

/** Parser outcome. Malformed and absent are data, never exceptions. */
export type HandoffParseResult =
  | { kind: 'ok'; declaration: HandoffDeclaration }
  | { kind: 'malformed'; reason: string }
  | { kind: 'absent' };

/** One accepted handoff; the ordered list for an execution is its chain */
export interface HandoffHistoryEntry {
  fromAgent: string;
  toAgent: string;
  reason: string;
  /** Bytes of the declared context, JSON-encoded */
  contextSize: number;
  timestamp: string;
}

export type SwarmState =
  | { status: 'idle' }
  | { status: 'running'; agent: string; hop: number }
  | { status: 'complete'; agent: string; reason: TerminationReason }
  | { status: 'aborted'; agent: string; error: string };

export type TerminationReason =
  | 'no-handoff'
  | 'terminal-agent'
  | 'handoffs-disabled'
  | 'cycle-detected';

export interface AgentOutput {
  agent: string;
  output: string;
}

export interface SwarmExecutionRequest {
  initialAgent: string;
  task: Record<string, unknown>;
  /** Execution-context identifier; generated when omitted */
  contextId?: string;
  maxHandoffs?: number;
  repeatTolerance?: number;
}

export interface SwarmExecutionResult {
  contextId: string;
  finalOutput: string;
  initialAgent: string;
  finalAgent: string;
  handoffChain: HandoffHistoryEntry[];
  totalHandoffs: number;
  terminationReason: TerminationReason;
  /** Why the loop stopped early (cycle guard, malformed block) */
  diagnostic?: string;
  /** Handoff that was parsed but not followed because handoffs are disabled */
  suppressedHandoff?: HandoffDeclaration;
  intermediateOutputs: AgentOutput[];
  /** Context the final agent received */
  context: Record<string, unknown>;
  agentsInvolved: string[];
  executionTimeMs: number;
}

export interface HandoffPathCount {
  from: string;
  to: string;
  count: number;
}

export interface HandoffStats {
  totalHandoffs: number;
  uniquePaths: number;
  mostCommonHandoffs: HandoffPathCount[];
}

/** Persisted per-execution state */
export interface SwarmSession {
  contextId: string;
  version: string;
  initialAgent: string;
  currentAgent: string;
  status: 'running' | 'complete' | 'aborted';
  handoffChain: HandoffHistoryEntry[];
  createdAt: string;
  updatedAt: string;
}
