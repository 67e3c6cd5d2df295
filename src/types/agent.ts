// mcp-swarm-orchestrator/src/types/agent.ts
// Agent domain types - capability descriptors and the invocation seam

/** A scanned agent capability descriptor. Frozen once the registry is built. */
export interface AgentDescriptor {
  /** Normalised name, e.g. `dns_specialist` for `dns_specialist_agent_v2.md` */
  readonly name: string;
  /** Version tag taken from the file name (`v2`), `v1` when absent */
  readonly version: string;
  /** Absolute path of the descriptor file */
  readonly path: string;
  readonly fileName: string;
  /** Descriptor declares Integration Points + HANDOFF DECLARATION */
  readonly supportsHandoff: boolean;
  readonly specialties: readonly string[];
}

/**
 * Text-generation collaborator: runs a fully assembled prompt for an agent
 * and resolves with the agent's raw output.
 */
export type AgentInvoker = (agent: AgentDescriptor, prompt: string) => Promise<string>;
